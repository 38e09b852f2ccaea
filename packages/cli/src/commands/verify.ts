/**
 * Lockstep equivalence check across sequence implementations
 */

import { Command } from "commander";
import { runHarness } from "@wrinkle-list/testkit";
import { CliError } from "../lib/errors.js";
import { colorize, printJson } from "../lib/render.js";
import { harnessFields, verboseFlag, withTiming } from "../lib/telemetry.js";
import { addWorkloadOptions, toHarnessOptions } from "./options.js";
import type { WorkloadCommandOptions } from "./options.js";

/**
 * Create the verify command
 */
export function createVerifyCommand(): Command {
  const verify = new Command("verify").description(
    "Replay a seeded workload on each sequence and check their contents agree"
  );

  addWorkloadOptions(verify, { size: 500, ops: 5000 }).action(
    (options: WorkloadCommandOptions, command: Command) => {
      const report = withTiming("cli.verify", () => runHarness(toHarnessOptions(options)), {
        verbose: verboseFlag(command),
        fields: harnessFields,
      });

      if (options.json) {
        printJson({
          seed: report.seed,
          mode: report.mode,
          consistent: report.consistent,
          mismatches: report.mismatches,
          sizes: Object.fromEntries(report.subjects.map((s) => [s.name, s.finalSize])),
        });
      } else if (report.consistent) {
        console.log(
          colorize(
            `OK: ${report.subjects.length} sequences agree (${report.mode}, seed ${report.seed})`,
            "green"
          )
        );
      }

      if (!report.consistent) {
        throw new CliError(
          `Sequences diverged from ${report.subjects[0]?.name ?? "the first sequence"}: ${report.mismatches.join(", ")} (seed ${report.seed})`,
          { exitCode: 2 }
        );
      }
    }
  );

  return verify;
}
