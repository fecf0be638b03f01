/**
 * Patch command: apply a patch file while keeping the original layout.
 */

import { info } from "../../core/logger.js";
import { patchFile, readFileNamelist, readText } from "../../io/files.js";
import { StringSink } from "../../io/sink.js";
import { StreamingParser } from "../../parser/streaming-parser.js";

export interface PatchCommandOptions {
  output?: string;
  include: string[];
  exclude: string[];
  force: boolean;
}

/**
 * Patch `path` with the document in `patchPath`. Returns the patched
 * text when there is no output file, otherwise undefined.
 */
export async function executePatch(
  path: string,
  patchPath: string,
  options: PatchCommandOptions
): Promise<string | undefined> {
  const patch = await readFileNamelist(patchPath);
  const patchOptions = {
    include: options.include,
    exclude: options.exclude,
    force: options.force,
  };

  if (options.output !== undefined) {
    await patchFile(path, patch, options.output, patchOptions);
    info(`Patched ${path} -> ${options.output}`);
    return undefined;
  }

  const sink = new StringSink();
  new StreamingParser(await readText(path)).parseAndPatch(sink, patch, patchOptions);
  return sink.toString();
}
