/**
 * Reading, writing and patching namelist files.
 */

import { readFile, writeFile } from "node:fs/promises";
import {
  FileAlreadyExistsError,
  MissingTemplateInfoError,
  NamelistError,
  NamelistIoError,
  TemplateError,
} from "../core/errors.js";
import { debug } from "../core/logger.js";
import type { Namelist } from "../namelist/namelist.js";
import type { WriteOptions } from "../namelist/options.js";
import { StreamingParser, type PatchOptions } from "../parser/streaming-parser.js";
import type { ScanOptions } from "../scanner/lexer.js";
import { StringSink, type OutputSink } from "./sink.js";

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read a whole file as UTF-8 text.
 */
export async function readText(path: string): Promise<string> {
  try {
    const text = await readFile(path, "utf-8");
    debug(`Read ${text.length} characters from ${path}`);
    return text;
  } catch (err) {
    throw new NamelistIoError(path, reason(err));
  }
}

/**
 * Write UTF-8 text, refusing to replace an existing file unless `force`.
 */
export async function writeText(path: string, text: string, force: boolean): Promise<void> {
  try {
    await writeFile(path, text, { encoding: "utf-8", flag: force ? "w" : "wx" });
  } catch (err) {
    if (errorCode(err) === "EEXIST") {
      throw new FileAlreadyExistsError(path);
    }
    throw new NamelistIoError(path, reason(err));
  }
  debug(`Wrote ${text.length} characters to ${path}`);
}

/**
 * Parse a namelist file.
 */
export async function readFileNamelist(
  path: string,
  scanOptions?: Partial<ScanOptions>
): Promise<Namelist> {
  return new StreamingParser(await readText(path), scanOptions).parse();
}

/**
 * Write canonical text to a sink.
 */
export function writeToSink(
  nml: Namelist,
  sink: OutputSink,
  options: Partial<WriteOptions> = {}
): void {
  sink.write(nml.toText(options));
}

/**
 * Write canonical text to a file. An existing file is only replaced
 * with `force`.
 */
export async function writeFileNamelist(
  nml: Namelist,
  path: string,
  options: Partial<WriteOptions> = {}
): Promise<void> {
  await writeText(path, nml.toText(options), options.force ?? false);
}

export interface PatchFileOptions extends PatchOptions {
  /** Replace an existing output file */
  force: boolean;
}

/**
 * Patch `input` into `output`, keeping the input's layout. Returns the
 * patched document. Nothing is written when the input fails to parse.
 */
export async function patchFile(
  input: string,
  patch: Namelist,
  output: string,
  options: Partial<PatchFileOptions> = {}
): Promise<Namelist> {
  const text = await readText(input);
  const sink = new StringSink();
  const result = new StreamingParser(text).parseAndPatch(sink, patch, options);

  const inPlace = output === input;
  await writeText(output, sink.toString(), inPlace || (options.force ?? false));
  debug(inPlace ? `Patched ${input} in place` : `Patched ${input} into ${output}`);
  return result;
}

/**
 * Patch the namelist file `template`. The text is returned, and also
 * written to `output` when given.
 */
export async function patchWithTemplate(
  template: string,
  patch: Namelist,
  output?: string,
  options: Partial<PatchFileOptions> = {}
): Promise<string> {
  const text = await readText(template);
  const parser = new StreamingParser(text);

  let groups: number;
  try {
    groups = parser.parse().size;
  } catch (err) {
    if (err instanceof NamelistError) {
      throw new TemplateError(`${template}: ${err.message}`);
    }
    throw err;
  }
  if (groups === 0) {
    throw new MissingTemplateInfoError(`patching with template ${template} (no groups)`);
  }

  const sink = new StringSink();
  parser.parseAndPatch(sink, patch, options);
  const result = sink.toString();

  if (output !== undefined) {
    await writeText(output, result, options.force ?? false);
  }
  return result;
}
