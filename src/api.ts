/**
 * The operations most callers need: parse, write, apply and patch.
 */

import { readFileNamelist, writeFileNamelist, writeToSink } from "./io/files.js";
import { StringSink, type OutputSink } from "./io/sink.js";
import type { Namelist } from "./namelist/namelist.js";
import type { WriteOptions } from "./namelist/options.js";
import { StreamingParser, type PatchOptions } from "./parser/streaming-parser.js";
import type { ScanOptions } from "./scanner/lexer.js";

export { patchFile, patchWithTemplate, writeToSink } from "./io/files.js";

/**
 * Parse namelist text.
 */
export function reads(text: string, scanOptions?: Partial<ScanOptions>): Namelist {
  return new StreamingParser(text, scanOptions).parse();
}

/**
 * Parse a namelist file.
 */
export function read(path: string, scanOptions?: Partial<ScanOptions>): Promise<Namelist> {
  return readFileNamelist(path, scanOptions);
}

/**
 * Canonical text of a document.
 */
export function writes(nml: Namelist, options?: Partial<WriteOptions>): string {
  const sink = new StringSink();
  writeToSink(nml, sink, options);
  return sink.toString();
}

export function write(nml: Namelist, path: string, options?: Partial<WriteOptions>): Promise<void> {
  return writeFileNamelist(nml, path, options);
}

/**
 * A copy of `original` with `patchDoc` applied; the original is left
 * untouched.
 */
export function patch(original: Namelist, patchDoc: Namelist): Namelist {
  const result = original.clone();
  result.applyPatch(patchDoc);
  return result;
}

export interface PatchTextResult {
  text: string;
  namelist: Namelist;
}

/**
 * Patch namelist text, keeping its layout.
 */
export function patchText(
  text: string,
  patchDoc: Namelist,
  options?: Partial<PatchOptions>
): PatchTextResult {
  const sink = new StringSink();
  const namelist = patchToSink(text, patchDoc, sink, options);
  return { text: sink.toString(), namelist };
}

export function patchToSink(
  text: string,
  patchDoc: Namelist,
  sink: OutputSink,
  options?: Partial<PatchOptions>
): Namelist {
  return new StreamingParser(text).parseAndPatch(sink, patchDoc, options);
}
