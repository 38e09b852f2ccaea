/**
 * Workload options shared by the bench and verify commands
 */

import type { Command } from "commander";
import { SEQUENCE_KINDS } from "@wrinkle-list/testkit";
import type { HarnessOptions, SequenceKind, WorkloadMode } from "@wrinkle-list/testkit";
import { parseKinds, parseMode, parseNonNegativeInt, parseSeed } from "../lib/arg.js";
import { resolveSeed } from "../lib/env.js";

export interface WorkloadCommandOptions {
  size: number;
  ops: number;
  seed?: number;
  lists: SequenceKind[];
  mode: WorkloadMode;
  snapshotEvery: number;
  json?: boolean;
}

/**
 * Register the workload options with the given defaults
 */
export function addWorkloadOptions(
  command: Command,
  defaults: { size: number; ops: number }
): Command {
  return command
    .option(
      "--size <n>",
      "Initial number of elements",
      (v: string) => parseNonNegativeInt(v, "--size"),
      defaults.size
    )
    .option(
      "--ops <n>",
      "Random operations, or forward/backward pass pairs in cursor mode",
      (v: string) => parseNonNegativeInt(v, "--ops"),
      defaults.ops
    )
    .option("--seed <n>", "Workload seed (default: WRINKLE_LIST_SEED or clock)", (v: string) =>
      parseSeed(v, "--seed")
    )
    .option(
      "--lists <kinds>",
      "Sequences to run: array, linked, wrinkle (or a,l,w)",
      (v: string) => parseKinds(v, "--lists"),
      [...SEQUENCE_KINDS]
    )
    .option("--mode <mode>", "Workload: random or cursor", (v: string) => parseMode(v, "--mode"), "random")
    .option(
      "--snapshot-every <n>",
      "Random mode: rebuild the wrinkle list every N operations (0: never)",
      (v: string) => parseNonNegativeInt(v, "--snapshot-every"),
      0
    )
    .option("--json", "Output as JSON for machine consumption");
}

export function toHarnessOptions(options: WorkloadCommandOptions): HarnessOptions {
  return {
    kinds: options.lists,
    size: options.size,
    ops: options.ops,
    seed: resolveSeed(options.seed),
    mode: options.mode,
    snapshotEvery: options.snapshotEvery,
  };
}
