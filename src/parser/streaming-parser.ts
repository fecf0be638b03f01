/**
 * Streaming parser for namelist text.
 *
 * Two passes over the same token machinery:
 * - parse(): structural parse of the whitespace-free token list into a
 *   Namelist
 * - parseAndPatch(): one forward pass over the complete token list that
 *   copies the input to a sink, substituting patched values and
 *   appending new variables and groups, while building the resulting
 *   Namelist
 *
 * State machine (both modes):
 * ┌─────────────┐   & / $ name   ┌─────────────┐
 * │ OUTSIDE     │ ─────────────► │  IN_GROUP   │ ◄──────────┐
 * └─────────────┘ ◄───────────── └──────┬──────┘            │
 *                 / $ &end $end         │ name =            │ , / next name
 *                                       ▼                   │
 *                                ┌─────────────┐            │
 *                                │  IN_VALUE   │ ───────────┘
 *                                └─────────────┘
 *
 * The cursor only moves forward; value ends are found by lookahead.
 */

import {
  IncompatiblePatchError,
  InvalidTokenError,
  ParseError,
  PatchError,
  UnexpectedEofError,
} from "../core/errors.js";
import { debug } from "../core/logger.js";
import { LineTrackingSink, type OutputSink } from "../io/sink.js";
import { mergeValues } from "../namelist/merge.js";
import type { NamelistGroup } from "../namelist/group.js";
import { Namelist } from "../namelist/namelist.js";
import { resolveWriteOptions, type WriteOptions } from "../namelist/options.js";
import { createGroupMatcher } from "../namelist/select.js";
import { formatVariable } from "../namelist/write.js";
import type { ScanOptions } from "../scanner/lexer.js";
import { scan, scanIncludingWhitespace } from "../scanner/scanner.js";
import { TokenType, describeToken, isNameToken, isTrivia, type Token } from "../scanner/token.js";
import { canConvertTo } from "../values/convert.js";
import { formatValue, resolveFormatOptions, type FormatOptions } from "../values/format.js";
import {
  derivedType,
  derivedTypeArray,
  type DerivedFields,
  type Value,
} from "../values/value.js";
import { assignValue, readTarget, type AssignmentTarget } from "./assign.js";
import {
  closeLength,
  findValueEnd,
  isAssignmentStart,
  skipWhitespace,
  trailingComment,
} from "./tokens.js";
import { readValue } from "./value-reader.js";

/**
 * Options for the patching pass.
 */
export interface PatchOptions {
  /** Indentation of appended variable lines */
  indent: string;
  /** Formatting of substituted and appended values */
  format?: Partial<FormatOptions>;
  /** Glob patterns of groups to patch; all when empty */
  include?: readonly string[];
  /** Glob patterns of groups to leave alone */
  exclude?: readonly string[];
  /** Reject substitutions whose value cannot convert to the original's type */
  checkTypes: boolean;
}

export const DEFAULT_PATCH_OPTIONS: Readonly<PatchOptions> = Object.freeze({
  indent: "    ",
  checkTypes: false,
});

/**
 * Per-group working set of the patching pass.
 */
/**
 * What has been written for one group name so far. A group that occurs
 * twice in the input shares this between occurrences.
 */
interface PatchProgress {
  /** Patch variables already substituted or appended */
  used: Set<string>;
  /** Derived components already substituted or appended, per variable */
  usedComponents: Map<string, Set<string>>;
}

interface GroupPatchState extends PatchProgress {
  patch: NamelistGroup | undefined;
  result: NamelistGroup;
  /** Whitespace not yet written, held back for appends at the close */
  pending: string;
}

function startsGroup(tokens: readonly Token[], index: number): boolean {
  const token = tokens[index];
  return (
    (token?.type === TokenType.GroupStart || token?.type === TokenType.GroupStartAlt) &&
    closeLength(tokens, index) !== 2
  );
}

function lastSignificantLine(tokens: readonly Token[], from: number, to: number): number | undefined {
  for (let i = to - 1; i >= from; i--) {
    const token = tokens[i];
    if (token !== undefined && !isTrivia(token)) {
      return token.line;
    }
  }
  return undefined;
}

function componentKey(target: AssignmentTarget): string {
  const index = target.bounds?.[0]?.start;
  return `${index ?? ""}%${target.fields.join("%")}`;
}

function lookupField(fields: DerivedFields, path: readonly string[]): Value | undefined {
  const [head, ...rest] = path;
  if (head === undefined) return undefined;
  const value = fields.get(head);
  if (rest.length === 0 || value === undefined) return value;
  return value.kind === "derived_type" ? lookupField(value.fields, rest) : undefined;
}

/**
 * Flatten derived fields into `[path, leaf value]` pairs.
 */
function leafFields(fields: DerivedFields, prefix: string[] = []): Array<[string[], Value]> {
  return [...fields].flatMap(([name, value]): Array<[string[], Value]> =>
    value.kind === "derived_type"
      ? leafFields(value.fields, [...prefix, name])
      : [[[...prefix, name], value]]
  );
}

/**
 * Namelist parser.
 *
 * Usage:
 * ```typescript
 * const parser = new StreamingParser(text);
 * const nml = parser.parse();
 *
 * const sink = new StringSink();
 * parser.parseAndPatch(sink, patch);
 * ```
 */
export class StreamingParser {
  private readonly input: string;
  private readonly scanOptions: Partial<ScanOptions>;

  constructor(input: string, scanOptions: Partial<ScanOptions> = {}) {
    this.input = input;
    this.scanOptions = scanOptions;
  }

  // ==========================================================================
  // Structural parse
  // ==========================================================================

  parse(): Namelist {
    const tokens = scan(this.input, this.scanOptions);
    const nml = new Namelist();

    let i = 0;
    while (i < tokens.length) {
      const token = tokens[i];
      if (token === undefined || token.type === TokenType.Eof) break;

      if (startsGroup(tokens, i)) {
        i = this.parseGroup(tokens, i, nml);
        continue;
      }
      if (token.type !== TokenType.Comment) {
        debug(`Skipping ${describeToken(token)} outside any group`);
      }
      i += Math.max(1, closeLength(tokens, i));
    }
    return nml;
  }

  private parseGroup(tokens: readonly Token[], start: number, nml: Namelist): number {
    const nameToken = this.expectGroupName(tokens, start, start + 1);
    const group = nml.insertGroup(nameToken.lexeme);

    let i = start + 2;
    for (;;) {
      const token = tokens[i];
      if (token === undefined || token.type === TokenType.Eof) {
        throw new UnexpectedEofError(group.name);
      }
      const close = closeLength(tokens, i);
      if (close > 0) {
        return i + close;
      }
      this.checkStatement(tokens, i, group.name);
      if (isAssignmentStart(tokens, i)) {
        i = this.parseAssignment(tokens, i, group);
        continue;
      }
      i++;
    }
  }

  private parseAssignment(tokens: readonly Token[], start: number, group: NamelistGroup): number {
    const { target, assignIndex } = readTarget(tokens, start, group.name);
    const valueStart = assignIndex + 1;
    const valueEnd = findValueEnd(tokens, valueStart);

    assignValue(group, target, readValue(tokens.slice(valueStart, valueEnd), target.name));
    this.captureComment(tokens, group, target.name, assignIndex, valueEnd);
    return valueEnd;
  }

  // ==========================================================================
  // Parse and patch
  // ==========================================================================

  /**
   * Copy the input to `sink`, replacing values the patch defines and
   * appending the patch's new variables and groups. Returns the
   * document the output describes.
   */
  parseAndPatch(
    sink: OutputSink,
    patch: Namelist,
    options: Partial<PatchOptions> = {}
  ): Namelist {
    const resolved: PatchOptions = { ...DEFAULT_PATCH_OPTIONS, ...options };
    const format = resolveFormatOptions(resolved.format);
    const writeOptions = resolveWriteOptions({ indent: resolved.indent });
    const selected = createGroupMatcher({ include: resolved.include, exclude: resolved.exclude });

    const tokens = scanIncludingWhitespace(this.input, this.scanOptions);
    const out = new LineTrackingSink(sink);
    const result = new Namelist();
    const seen = new Map<string, PatchProgress>();

    let i = 0;
    while (i < tokens.length) {
      const token = tokens[i];
      if (token === undefined || token.type === TokenType.Eof) break;

      if (startsGroup(tokens, i)) {
        i = this.patchGroup(tokens, i, out, patch, result, seen, {
          options: resolved,
          format,
          writeOptions,
          selected,
        });
        continue;
      }
      out.write(token.lexeme);
      i++;
    }

    for (const patchGroup of patch.groups()) {
      if (seen.has(patchGroup.name) || !selected(patchGroup.name)) continue;
      debug(`Appending group '${patchGroup.name}'`);

      if (!out.atLineStart()) out.write("\n");
      out.write(out.isEmpty() ? `&${patchGroup.name}\n` : `\n&${patchGroup.name}\n`);
      for (const [name, value] of patchGroup.entries()) {
        for (const line of formatVariable(name, value, patchGroup.metadata(name), writeOptions, format)) {
          out.write(`${line}\n`);
        }
      }
      out.write("/\n");
      result.setGroup(patchGroup.clone());
    }
    return result;
  }

  private patchGroup(
    tokens: readonly Token[],
    start: number,
    out: LineTrackingSink,
    patch: Namelist,
    result: Namelist,
    seen: Map<string, PatchProgress>,
    ctx: PatchContext
  ): number {
    const open = tokens[start];
    if (open !== undefined) out.write(open.lexeme);
    let i = skipWhitespace(tokens, start + 1);
    for (let k = start + 1; k < i; k++) {
      out.write(tokens[k]?.lexeme ?? "");
    }
    const nameToken = this.expectGroupName(tokens, start, i);
    out.write(nameToken.lexeme);
    i++;

    const name = nameToken.lexeme.toLowerCase();
    let progress = seen.get(name);
    if (progress === undefined) {
      progress = { used: new Set(), usedComponents: new Map() };
      seen.set(name, progress);
    }
    const state: GroupPatchState = {
      ...progress,
      patch: ctx.selected(name) ? patch.getGroup(name) : undefined,
      result: result.insertGroup(name),
      pending: "",
    };

    const flush = (): void => {
      out.write(state.pending);
      state.pending = "";
    };

    for (;;) {
      const token = tokens[i];
      if (token === undefined || token.type === TokenType.Eof) {
        throw new UnexpectedEofError(name);
      }

      const close = closeLength(tokens, i);
      if (close > 0) {
        this.appendUnseen(out, state, ctx);
        for (let k = 0; k < close; k++) {
          out.write(tokens[i + k]?.lexeme ?? "");
        }
        this.finishGroup(state);
        return i + close;
      }

      if (token.type === TokenType.Whitespace) {
        state.pending += token.lexeme;
        i++;
        continue;
      }

      this.checkStatement(tokens, i, name);
      flush();
      if (isAssignmentStart(tokens, i)) {
        i = this.patchAssignment(tokens, i, out, state, ctx);
        continue;
      }
      out.write(token.lexeme);
      i++;
    }
  }

  private patchAssignment(
    tokens: readonly Token[],
    start: number,
    out: LineTrackingSink,
    state: GroupPatchState,
    ctx: PatchContext
  ): number {
    const group = state.result.name;
    const { target, assignIndex } = readTarget(tokens, start, group);
    for (let k = start; k <= assignIndex; k++) {
      out.write(tokens[k]?.lexeme ?? "");
    }

    const valueStart = skipWhitespace(tokens, assignIndex + 1);
    for (let k = assignIndex + 1; k < valueStart; k++) {
      out.write(tokens[k]?.lexeme ?? "");
    }
    const valueEnd = findValueEnd(tokens, valueStart);
    const span = tokens.slice(valueStart, valueEnd);
    const original = readValue(span, target.name);
    const replacement = this.replacementFor(state, target);

    if (replacement === undefined) {
      for (const token of span) {
        out.write(token.lexeme);
      }
      assignValue(state.result, target, original);
    } else {
      this.checkReplacement(target, original, replacement, ctx.options);
      out.write(formatValue(replacement, ctx.format));
      assignValue(state.result, target, replacement);
      debug(`Patched ${group}%${target.name}`);
    }

    this.captureComment(tokens, state.result, target.name, assignIndex, valueEnd);
    return valueEnd;
  }

  /**
   * The patch value for this assignment's target, marking it used.
   */
  private replacementFor(state: GroupPatchState, target: AssignmentTarget): Value | undefined {
    const value = state.patch?.get(target.name);
    if (value === undefined) {
      return undefined;
    }

    if (target.fields.length === 0) {
      if (value.kind === "derived_type" || value.kind === "derived_type_array") {
        throw new PatchError(
          "derived type values can only replace component assignments",
          state.result.name,
          target.name
        );
      }
      state.used.add(target.name);
      return value;
    }

    let fields: DerivedFields | undefined;
    if (value.kind === "derived_type" && target.bounds === undefined) {
      fields = value.fields;
    } else if (value.kind === "derived_type_array" && target.bounds !== undefined) {
      const origin = state.patch?.getStartIndices(target.name)?.[0] ?? 1;
      fields = value.elements[(target.bounds[0]?.start ?? origin) - origin];
    } else {
      throw new IncompatiblePatchError(
        target.name,
        target.bounds === undefined ? "derived_type" : "derived_type_array",
        value.kind
      );
    }

    state.used.add(target.name);
    const component = fields === undefined ? undefined : lookupField(fields, target.fields);
    if (component !== undefined) {
      const used = state.usedComponents.get(target.name) ?? new Set<string>();
      used.add(componentKey(target));
      state.usedComponents.set(target.name, used);
    }
    return component;
  }

  private checkReplacement(
    target: AssignmentTarget,
    original: Value,
    replacement: Value,
    options: PatchOptions
  ): void {
    if (
      options.checkTypes &&
      original.kind !== "null" &&
      original.kind !== replacement.kind &&
      !canConvertTo(replacement, original.kind)
    ) {
      throw new IncompatiblePatchError(target.name, original.kind, replacement.kind);
    }
  }

  /**
   * Write patch variables (and derived components) this group never
   * assigned, just before its close.
   */
  private appendUnseen(out: LineTrackingSink, state: GroupPatchState, ctx: PatchContext): void {
    const lines: string[] = [];
    const patch = state.patch;

    if (patch !== undefined) {
      for (const [name, value] of patch.entries()) {
        const unseen = state.used.has(name) ? this.unseenComponents(state, name, value) : value;
        if (unseen === undefined) continue;
        const metadata = state.used.has(name) ? {} : patch.metadata(name);
        lines.push(...formatVariable(name, unseen, metadata, ctx.writeOptions, ctx.format));
        state.used.add(name);
        this.markComponents(state, name, unseen);
        debug(`Appending ${state.result.name}%${name}`);
      }
    }

    const pending = state.pending;
    state.pending = "";
    if (lines.length === 0) {
      out.write(pending);
      return;
    }

    const body = lines.map((line) => `${line}\n`).join("");
    const lastNewline = pending.lastIndexOf("\n");
    if (lastNewline === -1) {
      out.write(`${pending}\n${body}`);
    } else {
      out.write(pending.slice(0, lastNewline + 1));
      out.write(body);
      out.write(pending.slice(lastNewline + 1));
    }
  }

  private markComponents(state: GroupPatchState, name: string, value: Value): void {
    const used = state.usedComponents.get(name) ?? new Set<string>();
    if (value.kind === "derived_type") {
      for (const [path] of leafFields(value.fields)) {
        used.add(`%${path.join("%")}`);
      }
    } else if (value.kind === "derived_type_array") {
      const origin = state.patch?.getStartIndices(name)?.[0] ?? 1;
      value.elements.forEach((fields, i) => {
        for (const [path] of leafFields(fields)) {
          used.add(`${origin + i}%${path.join("%")}`);
        }
      });
    } else {
      return;
    }
    state.usedComponents.set(name, used);
  }

  /**
   * Components of a partly substituted derived value that the original
   * never assigned.
   */
  private unseenComponents(state: GroupPatchState, name: string, value: Value): Value | undefined {
    const used = state.usedComponents.get(name) ?? new Set<string>();
    const origin = state.patch?.getStartIndices(name)?.[0] ?? 1;

    if (value.kind === "derived_type") {
      const rest = leafFields(value.fields).filter(([path]) => !used.has(`%${path.join("%")}`));
      return rest.length === 0
        ? undefined
        : derivedType(rest.map(([path, v]): [string, Value] => [path.join("%"), v]));
    }
    if (value.kind === "derived_type_array") {
      let remaining = false;
      const elements = value.elements.map((fields, i) => {
        const rest = leafFields(fields).filter(
          ([path]) => !used.has(`${origin + i}%${path.join("%")}`)
        );
        remaining ||= rest.length > 0;
        return new Map(rest.map(([path, v]): [string, Value] => [path.join("%"), v]));
      });
      return remaining ? derivedTypeArray(elements) : undefined;
    }
    return undefined;
  }

  /**
   * Add what was appended at the close to the group's document entries.
   * Substituted values were stored as they were written.
   */
  private finishGroup(state: GroupPatchState): void {
    const patch = state.patch;
    if (patch === undefined) return;

    for (const [name, value] of patch.entries()) {
      const existing = state.result.get(name);
      if (existing === undefined) {
        state.result.insert(name, value);
        const { startIndices, comment } = patch.metadata(name);
        if (startIndices !== undefined) state.result.setStartIndices(name, startIndices);
        if (comment !== undefined) state.result.setComment(name, comment);
      } else if (existing.kind === "derived_type" && value.kind === "derived_type") {
        state.result.insert(name, mergeValues(existing, value));
      } else if (existing.kind === "derived_type_array" && value.kind === "derived_type_array") {
        const length = Math.max(existing.elements.length, value.elements.length);
        const elements = Array.from(
          { length },
          (_, i) => new Map([...(existing.elements[i] ?? []), ...(value.elements[i] ?? [])])
        );
        state.result.insert(name, derivedTypeArray(elements));
      }
    }
  }

  // ==========================================================================
  // Shared
  // ==========================================================================

  private expectGroupName(tokens: readonly Token[], open: number, at: number): Token {
    const opener = tokens[open];
    const token = tokens[at];
    if (token === undefined || !isNameToken(token)) {
      const where = token ?? opener;
      throw new ParseError(
        `Expected group name after '${opener?.lexeme ?? "&"}'`,
        where?.line ?? 0,
        where?.column ?? 0
      );
    }
    return token;
  }

  /**
   * Reject tokens that cannot stand where a statement is expected.
   */
  private checkStatement(tokens: readonly Token[], index: number, group: string): void {
    const token = tokens[index];
    if (token === undefined) return;

    if (token.type === TokenType.GroupStart) {
      throw new ParseError(
        `Unexpected '${token.lexeme}' inside group '${group}'`,
        token.line,
        token.column
      );
    }
    if (token.type === TokenType.Invalid) {
      throw new InvalidTokenError(token.lexeme, ["variable name", "/"], token.line, token.column);
    }
    if (isNameToken(token) && !isAssignmentStart(tokens, index)) {
      throw new ParseError(
        `Expected '=' after variable name '${token.lexeme}'`,
        token.line,
        token.column
      );
    }
    if (
      !isTrivia(token) &&
      token.type !== TokenType.Comma &&
      !isAssignmentStart(tokens, index)
    ) {
      debug(`Skipping ${describeToken(token)} in group '${group}'`);
    }
  }

  private captureComment(
    tokens: readonly Token[],
    group: NamelistGroup,
    name: string,
    assignIndex: number,
    valueEnd: number
  ): void {
    const line = lastSignificantLine(tokens, assignIndex, valueEnd);
    if (line === undefined) return;
    const comment = trailingComment(tokens, valueEnd, line);
    if (comment !== undefined && comment !== "") {
      group.setComment(name, comment);
    }
  }
}

interface PatchContext {
  options: PatchOptions;
  format: FormatOptions;
  writeOptions: WriteOptions;
  selected: (group: string) => boolean;
}

// ============================================================================
// Convenience functions
// ============================================================================

/**
 * Parse namelist text into a document.
 */
export function parseNamelist(input: string, scanOptions?: Partial<ScanOptions>): Namelist {
  return new StreamingParser(input, scanOptions).parse();
}

/**
 * Patch namelist text, writing the result to `sink`.
 */
export function patchNamelist(
  input: string,
  patch: Namelist,
  sink: OutputSink,
  options?: Partial<PatchOptions>,
  scanOptions?: Partial<ScanOptions>
): Namelist {
  return new StreamingParser(input, scanOptions).parseAndPatch(sink, patch, options);
}
