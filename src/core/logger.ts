/**
 * Diagnostics for the parser, file operations and CLI.
 *
 * stdout carries namelist text or JSON only, so every level writes to
 * stderr. The CLI sets the flags once from `--quiet`/`--debug` in a
 * preAction hook; library callers may call configureLogger themselves.
 *
 * Levels in use:
 * - debug: skipped stray tokens, patch substitutions and appends,
 *   characters read and written
 * - info: where `format` and `patch` wrote their output
 * - error: the CLI's final error message
 */

interface LoggerState {
  quiet: boolean;
  debug: boolean;
}

const state: LoggerState = {
  quiet: false,
  debug: false,
};

export function configureLogger(options: { quiet?: boolean; debug?: boolean }): void {
  // --quiet overrides --debug
  if (options.quiet) {
    state.quiet = true;
    state.debug = false;
  } else {
    state.quiet = false;
    state.debug = options.debug ?? false;
  }
}

export function getLoggerState(): Readonly<LoggerState> {
  return { ...state };
}

/**
 * Back to the defaults: info shown, debug hidden. Tests call this
 * between cases since the state is process-wide.
 */
export function resetLogger(): void {
  state.quiet = false;
  state.debug = false;
}

/**
 * The CLI also uses this to decide whether to print a detailed error
 * report.
 */
export function isDebugEnabled(): boolean {
  return state.debug && !state.quiet;
}

export function warn(message: string): void {
  if (!state.quiet) {
    console.error(message);
  }
}

export function info(message: string): void {
  if (!state.quiet) {
    console.error(message);
  }
}

/**
 * Trace line, prefixed `[DEBUG] `.
 */
export function debug(message: string): void {
  if (isDebugEnabled()) {
    console.error(`[DEBUG] ${message}`);
  }
}

/**
 * Shown even under --quiet.
 */
export function error(message: string): void {
  console.error(message);
}
