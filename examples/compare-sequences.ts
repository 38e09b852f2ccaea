/**
 * Sequence Comparison Example
 *
 * Replays one seeded workload on array, linked and wrinkle sequences.
 * Run with: npm run build && npx tsx examples/compare-sequences.ts
 */

import { runHarness, SEQUENCE_KINDS } from "@wrinkle-list/testkit";

for (const mode of ["random", "cursor"] as const) {
  const report = runHarness({
    kinds: SEQUENCE_KINDS,
    size: 5000,
    ops: mode === "random" ? 20000 : 2,
    seed: 2024,
    mode,
    snapshotEvery: 2000,
  });

  console.log(`\n${mode} workload (seed ${report.seed})`);
  for (const subject of report.subjects) {
    console.log(`  ${subject.name.padEnd(16)} ${subject.totalMs.toFixed(1)}ms`);
  }
  console.log(report.consistent ? "  ✅ contents match" : `  ❌ ${report.mismatches.join(", ")}`);
}
