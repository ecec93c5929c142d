/// # command line
///
/// ```bash
/// codeprint test.cc                            # → test.html
/// codeprint src/ --open                        # → src/bundle.html, then open it
/// codeprint src/ --not-match-f test,mock --exclude-ext h -o out.html
/// ```
///
/// `--not-match-f` and `--exclude-ext` can be repeated, and each value can be
/// a comma-separated list; `createExclusionRules` folds them all together.

import { readFileSync } from "fs";
import { Command, CommanderError } from "commander";
import { z } from "zod";
import { convert, type ConvertDeps } from "./convert.js";
import { CodeprintError } from "./errors.js";
import type { Logger } from "./types.js";

export type CliLogger = Logger & Pick<Console, "error">;

export interface CliDeps extends ConvertDeps {
  logger?: CliLogger;
}

interface CliOptions {
  output?: string;
  open?: boolean;
  notMatchF: string[];
  excludeExt: string[];
}

const packageSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return packageSchema.parse(JSON.parse(raw)).version;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(deps: CliDeps = {}): Command {
  const program = new Command();

  program
    .name("codeprint")
    .description("Convert source code to syntax-highlighted HTML")
    .version(readVersion())
    .argument("<path>", "source file or directory to convert")
    .option("-o, --output <file>", "output HTML file (default: <source>.html, or bundle.html for a directory)")
    .option("--open", "open the result in the default browser")
    .option("--not-match-f <patterns>", "exclude files whose name contains a pattern (repeatable, comma-separated)", collect, [])
    .option("--exclude-ext <extensions>", "exclude files with an extension (repeatable, comma-separated)", collect, [])
    .option("--verbose", "print stack traces for errors")
    .action(async (path: string, options: CliOptions) => {
      await convert(
        {
          source: path,
          output: options.output,
          open: options.open,
          notMatch: options.notMatchF,
          excludeExt: options.excludeExt
        },
        deps
      );
    });

  return program;
}

/// ## run
///
/// parses `argv` (node-style, program name and script first), runs, and
/// returns the exit code instead of exiting, so tests can call it.
/// commander prints its own usage errors; ours get a one-line `✗ Error:`.

export async function run(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const logger = deps.logger ?? console;
  const program = createProgram({ ...deps, logger }).exitOverride();

  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    logger.error(`✗ Error: ${error instanceof Error ? error.message : String(error)}`);
    const verbose = program.opts<{ verbose?: boolean }>().verbose ?? false;
    if (verbose && error instanceof Error && error.stack) {
      logger.error(`\n${error.stack}`);
    } else if (!(error instanceof CodeprintError)) {
      logger.error("rerun with --verbose for the stack trace");
    }
    return 1;
  }
}
