/**
 * Layout dump of a wrinkle list after a seeded edit burst
 */

import { Command } from "commander";
import { WrinkleList } from "@wrinkle-list/core";
import { SeededRandom } from "@wrinkle-list/testkit";
import { parseNonNegativeInt, parseSeed } from "../lib/arg.js";
import { resolveSeed } from "../lib/env.js";
import { printJson, printLines } from "../lib/render.js";
import { layoutFields, verboseFlag, withTiming } from "../lib/telemetry.js";

interface StructureOptions {
  size: number;
  ops: number;
  seed?: number;
  json?: boolean;
}

/**
 * Snapshot `size` elements labelled `B0..`, then apply `ops` seeded edits without
 * another snapshot: two in three insert a label `I0..`, the rest remove
 */
export function buildEditedList(size: number, ops: number, seed: number): WrinkleList<string> {
  const list = new WrinkleList<string>();
  for (let i = 0; i < size; i++) {
    list.append(`B${i}`);
  }
  list.snapshot();

  const rng = new SeededRandom(seed, "structure");
  let inserted = 0;
  for (let i = 0; i < ops; i++) {
    if (list.size === 0 || rng.nextInt(3) < 2) {
      list.insert(rng.nextInt(list.size + 1), `I${inserted++}`);
    } else {
      list.removeAt(rng.nextInt(list.size));
    }
  }
  return list;
}

/**
 * Create the structure command
 */
export function createStructureCommand(): Command {
  return new Command("structure")
    .description("Print the backbone, wrinkle and tail layout after a seeded edit burst")
    .option("--size <n>", "Elements captured by the snapshot", (v: string) => parseNonNegativeInt(v, "--size", 1000), 10)
    .option("--ops <n>", "Edits applied after the snapshot", (v: string) => parseNonNegativeInt(v, "--ops", 1000), 5)
    .option("--seed <n>", "Edit seed (default: WRINKLE_LIST_SEED or clock)", (v: string) =>
      parseSeed(v, "--seed")
    )
    .option("--json", "Output as JSON for machine consumption")
    .action((options: StructureOptions, command: Command) => {
      const seed = resolveSeed(options.seed);
      const list = withTiming("cli.structure", () => buildEditedList(options.size, options.ops, seed), {
        verbose: verboseFlag(command),
        fields: (edited) => ({ seed, ops: options.ops, ...layoutFields(edited) }),
      });

      if (options.json) {
        printJson({
          seed,
          items: list.toArray(),
          structure: list.structure(),
          wrinkles: list.wrinkles(),
          stats: list.stats(),
        });
        return;
      }

      const stats = list.stats();
      printLines([
        `seed=${seed}`,
        list.toString(),
        list.structure(),
        `size=${stats.size} backbone=${stats.backboneLength} wrinkles=${stats.wrinkleCount} tail=${stats.tailLength}`,
      ]);
    });
}
