/**
 * Basic Usage Example
 *
 * Demonstrates positional edits, snapshots and cursors on a WrinkleList.
 * Run with: npm run build && npx tsx examples/basic-usage.ts
 */

import { StaleCursorError, WrinkleList } from "@wrinkle-list/core";

function main(): void {
  // Build and snapshot: every lookup now starts from the backbone
  console.log("📦 Building list...");
  const list = WrinkleList.from(["mon", "tue", "wed", "thu", "fri"]);
  list.snapshot();
  console.log(`✅ ${list.toString()}`);

  // Edits after the snapshot are recorded as wrinkles
  console.log("\n✏️  Editing...");
  list.insert(2, "holiday");
  list.removeAt(5);
  list.append("sat");
  console.log(`✅ ${list.toString()}`);
  console.log(`   get(3) = ${list.get(3)}`);
  console.log(`   wrinkles: ${JSON.stringify(list.wrinkles())}`);
  console.log(`   layout: ${list.structure()}`);

  // Cursors edit in place
  console.log("\n🔁 Walking with a cursor...");
  const cursor = list.cursor();
  while (cursor.hasNext()) {
    const day = cursor.next();
    if (day === "holiday") {
      cursor.remove();
    } else {
      cursor.set(day.toUpperCase());
    }
  }
  console.log(`✅ ${list.toString()}`);

  // Outside edits invalidate open cursors
  const stale = list.cursor();
  list.snapshot();
  try {
    stale.next();
  } catch (err) {
    if (err instanceof StaleCursorError) {
      console.log(`\n⚠️  ${err.message}`);
    } else {
      throw err;
    }
  }

  console.log(`\n📊 ${JSON.stringify(list.stats())}`);
}

main();
