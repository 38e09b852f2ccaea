/**
 * Command tree and top-level error handling
 */

import { readFileSync } from "node:fs";
import { Command, CommanderError } from "commander";
import { createBenchCommand } from "./commands/bench.js";
import { createStructureCommand } from "./commands/structure.js";
import { createVerifyCommand } from "./commands/verify.js";
import { isVerbose } from "./lib/env.js";
import { formatCliError, mapErrorToExitCode } from "./lib/errors.js";
import { writeStderr } from "./lib/io.js";
import { colorize } from "./lib/render.js";

function readVersion(): string {
  const parsed: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    typeof parsed.version === "string"
  ) {
    return parsed.version;
  }
  return "0.0.0";
}

/**
 * Build a fresh command tree. Commander errors are thrown rather than exiting.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("wrinkle-list")
    .description("Benchmark and verify wrinkle lists against array and linked sequences")
    .version(readVersion())
    .option("--verbose", "Show error causes and stack traces, and print command metrics to stderr")
    .configureOutput({
      writeErr: (str) => writeStderr(colorize(str, "red", process.stderr)),
    })
    .exitOverride();

  program.addCommand(createBenchCommand());
  program.addCommand(createVerifyCommand());
  program.addCommand(createStructureCommand());

  // Subcommands report parse errors through the same output and exit handling
  for (const command of program.commands) {
    command.copyInheritedSettings(program);
  }

  return program;
}

/**
 * Parse and run, resolving to the process exit code
 */
export async function run(argv: string[]): Promise<number> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // Commander has already printed its own message
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = program.opts<{ verbose?: boolean }>().verbose === true || isVerbose();
    writeStderr(colorize(`Error: ${formatCliError(err, verbose)}`, "red", process.stderr) + "\n");
    return mapErrorToExitCode(err);
  }
}
