/**
 * Timing comparison across sequence implementations
 */

import { Command } from "commander";
import { runHarness } from "@wrinkle-list/testkit";
import type { HarnessReport } from "@wrinkle-list/testkit";
import { colorize, formatMs, formatTable, printJson, printLines } from "../lib/render.js";
import { harnessFields, verboseFlag, withTiming } from "../lib/telemetry.js";
import { addWorkloadOptions, toHarnessOptions } from "./options.js";
import type { WorkloadCommandOptions } from "./options.js";

/**
 * Render per-operation totals, one row per sequence
 */
export function formatBenchReport(report: HarnessReport): string[] {
  const operations = Object.keys(report.subjects[0]?.timings ?? {});
  const rows = report.subjects.map((subject) => [
    subject.name,
    ...operations.map((op) => formatMs(subject.timings[op] ?? 0)),
    formatMs(subject.totalMs),
  ]);

  const unit = report.mode === "random" ? "operations" : "pass pairs";
  return [
    `${report.mode} workload: size=${report.size} ${unit}=${report.ops} seed=${report.seed}`,
    "",
    ...formatTable(["sequence", ...operations, "total"], rows),
    "",
    report.consistent
      ? colorize("Contents match", "green")
      : colorize(`Contents differ: ${report.mismatches.join(", ")}`, "red"),
  ];
}

/**
 * Create the bench command
 */
export function createBenchCommand(): Command {
  const bench = new Command("bench").description(
    "Time a seeded workload against each selected sequence"
  );

  addWorkloadOptions(bench, { size: 1000, ops: 10000 }).action(
    (options: WorkloadCommandOptions, command: Command) => {
      const report = withTiming("cli.bench", () => runHarness(toHarnessOptions(options)), {
        verbose: verboseFlag(command),
        fields: harnessFields,
      });

      if (options.json) {
        printJson(report);
      } else {
        printLines(formatBenchReport(report));
      }
    }
  );

  return bench;
}
