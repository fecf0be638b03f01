/**
 * Format command: rewrite a document in canonical form.
 */

import { info } from "../../core/logger.js";
import { readFileNamelist, writeFileNamelist } from "../../io/files.js";
import type { WriteOptions } from "../../namelist/options.js";

export interface FormatCommandOptions {
  output?: string;
  write: Partial<WriteOptions>;
}

/**
 * Canonical text of `path`. With an output path the text is written
 * there as well.
 */
export async function executeFormat(path: string, options: FormatCommandOptions): Promise<string> {
  const nml = await readFileNamelist(path);
  const text = nml.toText(options.write);
  if (options.output !== undefined) {
    await writeFileNamelist(nml, options.output, options.write);
    info(`Formatted ${path} -> ${options.output}`);
  }
  return text;
}
