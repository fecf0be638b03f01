/**
 * I/O module exports.
 */

export { FileSink, LineTrackingSink, StringSink, type OutputSink } from "./sink.js";
export {
  patchFile,
  patchWithTemplate,
  readFileNamelist,
  readText,
  writeText,
  writeFileNamelist,
  writeToSink,
  type PatchFileOptions,
} from "./files.js";
