/**
 * Shared list layouts for tests
 *
 * Each builder snapshots a ten-element backbone `B0..B9` and then edits it so
 * lookups have to cross wrinkles, emptied slots or the tail.
 */

import { WrinkleList } from "../wrinkle-list.js";
import { Logger } from "../observability/logs.js";

export const quietLogger = new Logger();
quietLogger.setEnabled(false);

export function labels(prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i}`);
}

/**
 * `[B0..B9]`, freshly snapshotted
 */
export function flatList(): WrinkleList<string> {
  const list = WrinkleList.from(labels("B", 10), { logger: quietLogger });
  list.snapshot();
  return list;
}

/**
 * `[I0, I1, B0, I2, I3, I4, B1, I5, B2, B3, B4, I6, B5, B6, B7, B8, B9, T0, T1, T2]`
 */
export function growingList(): WrinkleList<string> {
  const list = flatList();
  list.insert(0, "I0");
  list.insert(1, "I1");
  list.insert(3, "I2");
  list.insert(4, "I3");
  list.insert(5, "I4");
  list.insert(7, "I5");
  list.insert(11, "I6");
  list.push("T0", "T1", "T2");
  return list;
}

/**
 * `[B0, B1, B2, I0, B3, B4, I1, I2, I3, B5, I4, B6, I5, I6, B7, B8, B9]`
 */
export function interleavedList(): WrinkleList<string> {
  const list = flatList();
  list.insert(3, "I0");
  list.insert(6, "I1");
  list.insert(7, "I2");
  list.insert(8, "I3");
  list.insert(10, "I4");
  list.insert(12, "I6");
  list.insert(12, "I5");
  return list;
}

/**
 * `[B0, B1, B2, B4, B5, B8, B9]`
 */
export function thinnedList(): WrinkleList<string> {
  const list = flatList();
  list.removeAt(7);
  list.removeAt(6);
  list.removeAt(3);
  return list;
}

/**
 * `[I0, B1, I1, I2, I3, B4, I4, B6, T0, T1]`, with slot bases removed under
 * their own wrinkles and the head slot emptied
 */
export function churnedList(): WrinkleList<string> {
  const list = flatList();
  list.removeAt(9);
  list.removeAt(8);
  list.push("T0", "T1");
  list.removeAt(7);
  list.insert(6, "I4");
  list.removeAt(5);
  list.insert(4, "I3");
  list.insert(4, "I2");
  list.removeAt(3);
  list.insert(2, "I1");
  list.removeAt(3);
  list.removeAt(0);
  list.insert(0, "I0");
  return list;
}

/**
 * `[T0, T1, T2, T3]` without any snapshot
 */
export function tailOnlyList(): WrinkleList<string> {
  return WrinkleList.from(labels("T", 4), { logger: quietLogger });
}
