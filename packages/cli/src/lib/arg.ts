/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { SEQUENCE_KINDS, WORKLOAD_MODES } from "@wrinkle-list/testkit";
import type { SequenceKind, WorkloadMode } from "@wrinkle-list/testkit";

const MAX_COUNT = 10_000_000;

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string, max = MAX_COUNT): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);

  // Keep workloads within what a single process can hold
  if (parsed > max) {
    throw new InvalidArgumentError(`${name} must be <= ${max}`);
  }

  return parsed;
}

/**
 * Parse a seed: any integer, reduced to 32 bits
 */
export function parseSeed(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^-?\d+$/.test(trimmed) || !Number.isSafeInteger(Number(trimmed))) {
    throw new InvalidArgumentError(`${name} must be an integer`);
  }

  return Number(trimmed) >>> 0;
}

const KIND_ALIASES: Record<string, SequenceKind> = {
  a: "array",
  l: "linked",
  w: "wrinkle",
};

/**
 * Parse a comma separated list of sequence kinds, by name or initial (`a,l,w`)
 */
export function parseKinds(value: string, name: string): SequenceKind[] {
  const kinds: SequenceKind[] = [];

  for (const raw of value.split(",")) {
    const token = raw.trim().toLowerCase();
    if (!token) continue;

    const kind = KIND_ALIASES[token] ?? SEQUENCE_KINDS.find((k) => k === token);
    if (kind === undefined) {
      throw new InvalidArgumentError(
        `${name} accepts ${SEQUENCE_KINDS.join(", ")} (or a, l, w), got "${raw.trim()}"`
      );
    }
    if (!kinds.includes(kind)) {
      kinds.push(kind);
    }
  }

  if (kinds.length === 0) {
    throw new InvalidArgumentError(`${name} must name at least one sequence`);
  }
  return kinds;
}

/**
 * Parse a workload mode
 */
export function parseMode(value: string, name: string): WorkloadMode {
  const mode = WORKLOAD_MODES.find((m) => m === value.trim().toLowerCase());
  if (mode === undefined) {
    throw new InvalidArgumentError(`${name} must be one of ${WORKLOAD_MODES.join(", ")}`);
  }
  return mode;
}
