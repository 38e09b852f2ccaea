/**
 * Command metrics on stderr
 *
 * A metric line reads `metric <key> duration_ms=<ms> success=<bool> <field>=<value>...`
 * and is written only under `--verbose` or `WRINKLE_LIST_CLI_DEBUG=1`.
 */

import type { Command } from "commander";
import { clock } from "@wrinkle-list/testkit";
import type { HarnessReport } from "@wrinkle-list/testkit";
import type { WrinkleList } from "@wrinkle-list/core";
import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

export type MetricFields = Record<string, string | number | boolean>;

export interface TimingOptions<T> {
  /** `--verbose` from the command line */
  verbose?: boolean;
  /** Fields describing a successful result */
  fields?: (result: T) => MetricFields;
}

const NEWLINES = /[\r\n]+/g;

function metricPart(part: string | number | boolean): string {
  return String(part).replace(NEWLINES, " ").trim();
}

/**
 * Whether `--verbose` was given anywhere above or on this command
 */
export function verboseFlag(command: Command): boolean {
  return command.optsWithGlobals<{ verbose?: boolean }>().verbose === true;
}

export function formatMetric(key: string, fields: MetricFields): string {
  const parts = [`metric ${metricPart(key)}`];
  for (const [name, value] of Object.entries(fields)) {
    parts.push(`${metricPart(name)}=${metricPart(value)}`);
  }
  return parts.join(" ");
}

export function emitMetric(key: string, fields: MetricFields, verbose = false): void {
  if (verbose || isVerbose()) {
    writeStderr(formatMetric(key, fields) + "\n");
  }
}

/**
 * Run a command body on the workload clock and emit its duration, outcome
 * and, when it succeeds, the fields derived from its result
 */
export function withTiming<T>(label: string, body: () => T, options: TimingOptions<T> = {}): T {
  const start = clock.now();
  let fields: MetricFields = { success: false };

  try {
    const result = body();
    fields = { success: true, ...options.fields?.(result) };
    return result;
  } finally {
    emitMetric(
      label,
      { duration_ms: (clock.now() - start).toFixed(3), ...fields },
      options.verbose
    );
  }
}

/**
 * Summary of a harness run: its seed and shape, how many sequences ran,
 * whether they agreed and which one was slowest
 */
export function harnessFields(report: HarnessReport): MetricFields {
  let slowest = "";
  let slowestMs = -1;
  for (const subject of report.subjects) {
    if (subject.totalMs > slowestMs) {
      slowest = subject.name;
      slowestMs = subject.totalMs;
    }
  }

  return {
    seed: report.seed,
    mode: report.mode,
    size: report.size,
    ops: report.ops,
    sequences: report.subjects.length,
    consistent: report.consistent,
    ...(slowest === "" ? {} : { slowest }),
  };
}

/**
 * Layout counters of an edited list
 */
export function layoutFields(list: WrinkleList<string>): MetricFields {
  const { size, backboneLength, wrinkleCount, tailLength } = list.stats();
  return { size, backbone: backboneLength, wrinkles: wrinkleCount, tail: tailLength };
}
