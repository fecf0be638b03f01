/**
 * Custom error classes for nmlkit.
 */

export type ErrorCategory =
  | "io"
  | "parse"
  | "syntax"
  | "eof"
  | "token"
  | "value"
  | "index"
  | "duplicate"
  | "not_found"
  | "conversion"
  | "file_exists"
  | "format"
  | "template"
  | "patch"
  | "dimension"
  | "validation"
  | "custom";

export type ErrorSeverity = "warning" | "error" | "fatal";

/**
 * Where an error happened, as far as it is known.
 */
export interface ErrorContext {
  line?: number;
  column?: number;
  group?: string;
  variable?: string;
}

export class NamelistError extends Error {
  readonly category: ErrorCategory = "custom";
  readonly recoverable: boolean = true;
  readonly severity: ErrorSeverity = "error";

  constructor(
    message: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = "NamelistError";
  }

  context(): ErrorContext {
    return {};
  }

  /**
   * Multi-line report used by `--debug` output.
   */
  detailedReport(): string {
    let report = `Error Category: ${this.category}\n`;
    report += `Recoverable: ${this.recoverable}\n`;
    report += `Message: ${this.message}\n`;

    const ctx = this.context();
    const lines: string[] = [];
    if (ctx.line !== undefined) lines.push(`  Line: ${ctx.line}`);
    if (ctx.column !== undefined) lines.push(`  Column: ${ctx.column}`);
    if (ctx.group !== undefined) lines.push(`  Group: ${ctx.group}`);
    if (ctx.variable !== undefined) lines.push(`  Variable: ${ctx.variable}`);
    if (lines.length > 0) {
      report += `\nContext:\n${lines.join("\n")}\n`;
    }
    return report;
  }
}

// ============================================================================
// I/O
// ============================================================================

export class NamelistIoError extends NamelistError {
  override readonly category = "io";
  override readonly recoverable = false;

  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`I/O error on ${path}: ${reason}`);
    this.name = "NamelistIoError";
  }
}

export class FileAlreadyExistsError extends NamelistError {
  override readonly category = "file_exists";
  override readonly severity = "warning";

  constructor(public readonly path: string) {
    super(
      `File already exists: ${path}\n` +
        "Pass force to overwrite it."
    );
    this.name = "FileAlreadyExistsError";
  }
}

// ============================================================================
// Lexical and syntactic
// ============================================================================

export class ParseError extends NamelistError {
  override readonly category = "parse";
  override readonly recoverable = false;

  constructor(
    public readonly detail: string,
    public readonly line: number,
    public readonly column: number
  ) {
    super(`Parse error at line ${line}, column ${column}: ${detail}`);
    this.name = "ParseError";
  }

  override context(): ErrorContext {
    return { line: this.line, column: this.column };
  }
}

export class InvalidSyntaxError extends NamelistError {
  override readonly category = "syntax";
  override readonly recoverable = false;

  constructor(
    public readonly detail: string,
    public readonly position: number
  ) {
    super(`Invalid syntax at position ${position}: ${detail}`);
    this.name = "InvalidSyntaxError";
  }
}

export class UnexpectedEofError extends NamelistError {
  override readonly category = "eof";
  override readonly recoverable = false;
  override readonly severity = "fatal";

  constructor(public readonly group?: string) {
    super(
      group === undefined
        ? "Unexpected end of file"
        : `Unexpected end of file inside group '${group}'`
    );
    this.name = "UnexpectedEofError";
  }

  override context(): ErrorContext {
    return this.group === undefined ? {} : { group: this.group };
  }
}

export class InvalidTokenError extends NamelistError {
  override readonly category = "token";
  override readonly recoverable = false;

  constructor(
    public readonly token: string,
    public readonly expected: readonly string[],
    public readonly line: number,
    public readonly column: number
  ) {
    super(
      `Invalid token '${token}' at line ${line}, column ${column}. ` +
        `Expected one of: ${expected.join(", ")}`
    );
    this.name = "InvalidTokenError";
  }

  override context(): ErrorContext {
    return { line: this.line, column: this.column };
  }
}

// ============================================================================
// Values
// ============================================================================

export class InvalidValueError extends NamelistError {
  override readonly category = "value";

  constructor(
    public readonly variable: string,
    public readonly value: string,
    public readonly expectedType: string
  ) {
    super(
      `Invalid value '${value}' for variable '${variable}'. Expected type: ${expectedType}`
    );
    this.name = "InvalidValueError";
  }

  override context(): ErrorContext {
    return { variable: this.variable };
  }
}

export class InvalidIndexError extends NamelistError {
  override readonly category = "index";

  constructor(
    public readonly variable: string,
    public readonly index: string,
    public readonly detail: string
  ) {
    super(`Invalid index '${index}' for variable '${variable}': ${detail}`);
    this.name = "InvalidIndexError";
  }

  override context(): ErrorContext {
    return { variable: this.variable };
  }
}

export class TypeConversionError extends NamelistError {
  override readonly category = "conversion";

  constructor(
    public readonly from: string,
    public readonly to: string,
    public readonly value: string
  ) {
    super(`Cannot convert '${value}' from ${from} to ${to}`);
    this.name = "TypeConversionError";
  }
}

export class InvalidFormatError extends NamelistError {
  override readonly category = "format";

  constructor(
    public readonly format: string,
    public readonly detail: string
  ) {
    super(`Invalid format '${format}': ${detail}`);
    this.name = "InvalidFormatError";
  }
}

export class DimensionMismatchError extends NamelistError {
  override readonly category = "dimension";

  constructor(
    public readonly expected: string,
    public readonly actual: string,
    public readonly variable?: string
  ) {
    super(
      variable === undefined
        ? `Dimension mismatch: expected ${expected}, got ${actual}`
        : `Dimension mismatch for variable '${variable}': expected ${expected}, got ${actual}`
    );
    this.name = "DimensionMismatchError";
  }

  override context(): ErrorContext {
    return this.variable === undefined ? {} : { variable: this.variable };
  }
}

// ============================================================================
// Structure
// ============================================================================

export class DuplicateNameError extends NamelistError {
  override readonly category = "duplicate";
  override readonly severity = "warning";

  constructor(
    public readonly duplicateName: string,
    public readonly itemType: "group" | "variable"
  ) {
    super(`Duplicate ${itemType} name: '${duplicateName}'`);
    this.name = "DuplicateNameError";
  }
}

export class VariableNotFoundError extends NamelistError {
  override readonly category = "not_found";
  override readonly severity = "warning";

  constructor(
    public readonly variable: string,
    public readonly group: string
  ) {
    super(`Variable '${variable}' not found in group '${group}'`);
    this.name = "VariableNotFoundError";
  }

  override context(): ErrorContext {
    return { group: this.group, variable: this.variable };
  }
}

export class GroupNotFoundError extends NamelistError {
  override readonly category = "not_found";
  override readonly severity = "warning";

  constructor(public readonly group: string) {
    super(`Group '${group}' not found`);
    this.name = "GroupNotFoundError";
  }

  override context(): ErrorContext {
    return { group: this.group };
  }
}

export class ValidationError extends NamelistError {
  override readonly category = "validation";

  constructor(
    public readonly detail: string,
    public readonly group?: string,
    public readonly variable?: string
  ) {
    super(`Validation error: ${detail}`);
    this.name = "ValidationError";
  }

  override context(): ErrorContext {
    const ctx: ErrorContext = {};
    if (this.group !== undefined) ctx.group = this.group;
    if (this.variable !== undefined) ctx.variable = this.variable;
    return ctx;
  }
}

// ============================================================================
// Patching and templates
// ============================================================================

export class PatchError extends NamelistError {
  override readonly category = "patch";

  constructor(
    public readonly detail: string,
    public readonly group?: string,
    public readonly variable?: string
  ) {
    super(PatchError.describe(detail, group, variable));
    this.name = "PatchError";
  }

  private static describe(detail: string, group?: string, variable?: string): string {
    if (group !== undefined && variable !== undefined) {
      return `Patch error in group '${group}', variable '${variable}': ${detail}`;
    }
    if (group !== undefined) return `Patch error in group '${group}': ${detail}`;
    if (variable !== undefined) return `Patch error with variable '${variable}': ${detail}`;
    return `Patch error: ${detail}`;
  }

  override context(): ErrorContext {
    const ctx: ErrorContext = {};
    if (this.group !== undefined) ctx.group = this.group;
    if (this.variable !== undefined) ctx.variable = this.variable;
    return ctx;
  }
}

export class IncompatiblePatchError extends NamelistError {
  override readonly category = "patch";

  constructor(
    public readonly variable: string,
    public readonly originalType: string,
    public readonly patchType: string
  ) {
    super(
      `Cannot patch variable '${variable}': incompatible types (${originalType} vs ${patchType})`
    );
    this.name = "IncompatiblePatchError";
  }

  override context(): ErrorContext {
    return { variable: this.variable };
  }
}

export class TemplateError extends NamelistError {
  override readonly category = "template";

  constructor(
    public readonly detail: string,
    public readonly templatePosition?: number
  ) {
    super(
      templatePosition === undefined
        ? `Template error: ${detail}`
        : `Template error at position ${templatePosition}: ${detail}`
    );
    this.name = "TemplateError";
  }
}

export class MissingTemplateInfoError extends NamelistError {
  override readonly category = "template";
  override readonly recoverable = false;
  override readonly severity = "fatal";

  constructor(public readonly operation: string) {
    super(`Missing template information required for ${operation}`);
    this.name = "MissingTemplateInfoError";
  }
}

export class CustomError extends NamelistError {
  constructor(message: string) {
    super(message);
    this.name = "CustomError";
  }
}
