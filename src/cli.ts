#!/usr/bin/env node
/**
 * nmlkit CLI entry point.
 */

import { Command } from "commander";
import { executeFormat } from "./commands/format/index.js";
import { executeMerge } from "./commands/merge/index.js";
import { executePatch } from "./commands/patch/index.js";
import {
  parseGlobList,
  parseStrategy,
  toWriteOptions,
  type WriteFlags,
} from "./commands/shared.js";
import { SHOW_FORMATS, executeShow, isShowFormat } from "./commands/show/index.js";
import { executeValidate } from "./commands/validate/index.js";
import { InvalidFormatError, NamelistError } from "./core/errors.js";
import { configureLogger, isDebugEnabled, error as logError } from "./core/logger.js";
import { getVersion } from "./core/version.js";

interface GlobalFlags {
  quiet?: boolean;
  debug?: boolean;
}

interface OutputFlags extends WriteFlags {
  output?: string;
}

interface PatchFlags {
  output?: string;
  groups?: string[];
  excludeGroups?: string[];
  force?: boolean;
}

const program = new Command();

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function addWriteFlags(command: Command): Command {
  return command
    .option("--column-width <n>", "Wrap array values past this column (0 disables)")
    .option("--indent <n>", "Spaces before each assignment")
    .option("--uppercase", "Upper-case names and logicals", false)
    .option("--sort", "Sort groups and variables by name", false)
    .option("--end-comma", "End each assignment with a comma", false)
    .option("--float-precision <n>", "Fixed number of fraction digits for reals");
}

program
  .name("nmlkit")
  .description("Read, format and patch Fortran namelist files")
  .option("-q, --quiet", "Suppress informational output", false)
  .option("--debug", "Print debug output to stderr", false)
  .hook("preAction", () => {
    const flags = program.opts<GlobalFlags>();
    configureLogger({ quiet: flags.quiet, debug: flags.debug });
  });

// show command
program
  .command("show")
  .description("List groups and variables with their types")
  .argument("<file>", "Namelist file")
  .option("--format <format>", `Output format (${SHOW_FORMATS.join("|")})`, "table")
  .action(async (file: string, options: { format: string }) => {
    try {
      if (!isShowFormat(options.format)) {
        throw new InvalidFormatError(options.format, `expected one of ${SHOW_FORMATS.join(", ")}`);
      }
      process.stdout.write(await executeShow(file, options.format));
      process.exit(0);
    } catch (error) {
      handleError(error);
    }
  });

// format command
addWriteFlags(
  program
    .command("format")
    .description("Print or write the canonical form of a namelist")
    .argument("<file>", "Namelist file")
    .option("-o, --output <file>", "Write to a file instead of stdout")
    .option("--force", "Overwrite the output file", false)
).action(async (file: string, options: OutputFlags) => {
  try {
    const text = await executeFormat(file, {
      output: options.output,
      write: toWriteOptions(options),
    });
    if (options.output === undefined) {
      process.stdout.write(text);
    }
    process.exit(0);
  } catch (error) {
    handleError(error);
  }
});

// patch command
program
  .command("patch")
  .description("Apply a patch namelist, keeping the original layout")
  .argument("<file>", "Namelist file to patch")
  .argument("<patch-file>", "Namelist holding the new values")
  .option("-o, --output <file>", "Write to a file instead of stdout")
  .option("--groups <globs>", "Only patch groups matching these globs", collect)
  .option("--exclude-groups <globs>", "Leave groups matching these globs alone", collect)
  .option("--force", "Overwrite the output file", false)
  .action(async (file: string, patchFile: string, options: PatchFlags) => {
    try {
      const text = await executePatch(file, patchFile, {
        output: options.output,
        include: parseGlobList(options.groups),
        exclude: parseGlobList(options.excludeGroups),
        force: options.force ?? false,
      });
      if (text !== undefined) {
        process.stdout.write(text);
      }
      process.exit(0);
    } catch (error) {
      handleError(error);
    }
  });

// validate command
program
  .command("validate")
  .description("Check a namelist for inconsistent values")
  .argument("<file>", "Namelist file")
  .action(async (file: string) => {
    try {
      const { issues, report } = await executeValidate(file);
      process.stdout.write(report);
      process.exit(issues.length > 0 ? 1 : 0);
    } catch (error) {
      handleError(error);
    }
  });

// merge command
addWriteFlags(
  program
    .command("merge")
    .description("Merge a second namelist into the first and print the result")
    .argument("<file>", "Base namelist")
    .argument("<other>", "Namelist to merge in")
    .option("--strategy <name>", "replace|update|append|skip_existing", "update")
).action(async (file: string, other: string, options: WriteFlags & { strategy: string }) => {
  try {
    const text = await executeMerge(
      file,
      other,
      parseStrategy(options.strategy),
      toWriteOptions(options)
    );
    process.stdout.write(text);
    process.exit(0);
  } catch (error) {
    handleError(error);
  }
});

/**
 * Handle errors and exit with appropriate code.
 */
function handleError(error: unknown): never {
  if (error instanceof NamelistError) {
    logError(`Error: ${error.message}`);
    if (process.env.DEBUG || isDebugEnabled()) {
      logError(error.detailedReport());
    }
    process.exit(error.exitCode);
  }

  if (error instanceof Error) {
    logError(`Unexpected error: ${error.message}`);
    if (process.env.DEBUG || isDebugEnabled()) {
      logError(error.stack ?? "");
    }
  } else {
    logError("An unexpected error occurred");
  }

  process.exit(1);
}

async function main(): Promise<void> {
  program.version(await getVersion());
  await program.parseAsync();
}

main().catch(handleError);
