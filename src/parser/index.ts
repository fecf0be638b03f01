/**
 * Parser module exports.
 */

export {
  StreamingParser,
  DEFAULT_PATCH_OPTIONS,
  parseNamelist,
  patchNamelist,
  type PatchOptions,
} from "./streaming-parser.js";
export { readValue, joinTokens } from "./value-reader.js";
export { readTarget, assignValue, type AssignmentTarget } from "./assign.js";
export { findValueEnd } from "./tokens.js";
