/**
 * Tests for list cursors
 */

import { describe, it, expect } from "vitest";
import { WrinkleList } from "./wrinkle-list.js";
import {
  CursorExhaustedError,
  IllegalCursorStateError,
  IndexOutOfRangeError,
  StaleCursorError,
} from "./errors.js";
import { flatList, growingList, quietLogger, thinnedList } from "./__fixtures__/lists.js";

describe("ListCursor", () => {
  describe("remove()", () => {
    it("should remove a backbone element reached moving forward", () => {
      const list = growingList();
      const cursor = list.cursor(8);

      expect(cursor.next()).toBe("B2");
      expect(cursor.remove()).toBe("B2");
      expect(list.get(7)).toBe("I5");
      expect(list.get(8)).toBe("B3");
      expect(cursor.nextIndex()).toBe(8);
    });

    it("should remove a backbone element reached moving backward", () => {
      const list = growingList();
      const cursor = list.cursor(9);

      expect(cursor.previous()).toBe("B2");
      cursor.remove();
      expect(list.get(7)).toBe("I5");
      expect(list.get(8)).toBe("B3");
      expect(cursor.nextIndex()).toBe(8);
    });

    it("should refuse a second remove without another step", () => {
      const list = flatList();
      const cursor = list.cursor();
      cursor.next();
      cursor.remove();

      expect(() => cursor.remove()).toThrow(IllegalCursorStateError);
      expect(() => cursor.set("X")).toThrow(IllegalCursorStateError);
    });

    it("should keep lookups consistent after a backward remove followed by an insert", () => {
      const list = flatList();
      const cursor = list.cursor(10);

      expect(cursor.previous()).toBe("B9");
      expect(cursor.previous()).toBe("B8");
      cursor.remove();
      cursor.insert("N");

      expect(list.toArray()).toEqual(["B0", "B1", "B2", "B3", "B4", "B5", "B6", "B7", "N", "B9"]);
      expect(list.get(7)).toBe("B7");
      expect(list.get(8)).toBe("N");
      expect(list.get(9)).toBe("B9");
    });
  });

  describe("insert()", () => {
    it("should insert before the next element", () => {
      const list = thinnedList();
      const cursor = list.cursor(5);

      cursor.insert("H1");
      expect(list.get(5)).toBe("H1");
      expect(cursor.previous()).toBe("H1");
      expect(cursor.previous()).toBe("B5");

      cursor.insert("H2");
      expect(list.get(4)).toBe("H2");
      expect(list.toArray()).toEqual(["B0", "B1", "B2", "B4", "H2", "B5", "H1", "B8", "B9"]);
    });

    it("should insert after the element just returned", () => {
      const list = thinnedList();
      const cursor = list.cursor(4);

      expect(cursor.next()).toBe("B5");
      cursor.insert("H1");
      expect(list.get(5)).toBe("H1");
      expect(cursor.nextIndex()).toBe(6);
    });

    it("should insert at the head of a snapshot", () => {
      const list = flatList();
      const cursor = list.cursor(0);

      cursor.insert("H");

      expect(list.wrinkles()).toEqual([{ index: 0, offset: 1 }]);
      expect(list.get(0)).toBe("H");
      for (let i = 1; i <= 10; i++) {
        expect(list.get(i)).toBe(`B${i - 1}`);
      }
      expect(cursor.nextIndex()).toBe(1);
      expect(cursor.next()).toBe("B0");
    });

    it("should insert at the head after the first slot was emptied", () => {
      const list = flatList();
      const cursor = list.cursor();

      cursor.next();
      cursor.remove();
      cursor.insert("H");
      cursor.insert("G");

      expect(list.wrinkles()).toEqual([
        { index: 0, offset: -1 },
        { index: 1, offset: 2 },
      ]);
      expect(list.structure()).toBe(
        "{X, (H, G, [B1]), [B2], [B3], [B4], [B5], [B6], [B7], [B8], [B9]}"
      );

      const items = list.toArray();
      expect(items).toEqual(["H", "G", "B1", "B2", "B3", "B4", "B5", "B6", "B7", "B8", "B9"]);
      items.forEach((item, i) => expect(list.get(i)).toBe(item));
    });

    it("should insert into an empty list", () => {
      const list = new WrinkleList<number>({ logger: quietLogger });
      const cursor = list.cursor();

      cursor.insert(2);
      expect(list.get(0)).toBe(2);
      expect(cursor.hasNext()).toBe(false);
      expect(cursor.hasPrevious()).toBe(true);
    });

    it("should keep the last returned element current", () => {
      const list = flatList();
      const cursor = list.cursor(3);

      cursor.next();
      cursor.insert("N");
      cursor.set("S");

      expect(list.toArray().slice(2, 6)).toEqual(["B2", "S", "N", "B4"]);
    });

    it("should interleave with its own removals", () => {
      const list = flatList();
      const cursor = list.cursor();

      cursor.next();
      cursor.remove();
      expect(cursor.next()).toBe("B1");
      cursor.insert("N");
      expect(cursor.next()).toBe("B2");

      expect(list.get(0)).toBe("B1");
      expect(list.get(1)).toBe("N");
      expect(list.get(2)).toBe("B2");
      expect(list.size).toBe(10);
    });
  });

  describe("set()", () => {
    it("should replace the last returned element without a structural change", () => {
      const list = flatList();
      const before = list.stats().modCount;
      const cursor = list.cursor(3);

      cursor.next();
      cursor.set("S");

      expect(list.get(3)).toBe("S");
      expect(list.stats().modCount).toBe(before);
      expect(cursor.next()).toBe("B4");
    });

    it("should refuse to set before any step", () => {
      expect(() => flatList().cursor().set("X")).toThrow(IllegalCursorStateError);
    });
  });

  describe("navigation", () => {
    it("should start at the end when opened at size", () => {
      const list = flatList();
      const cursor = list.cursor(10);

      expect(cursor.hasNext()).toBe(false);
      expect(cursor.hasPrevious()).toBe(true);
      expect(cursor.nextIndex()).toBe(10);
      expect(cursor.previousIndex()).toBe(9);
      expect(cursor.previous()).toBe("B9");
    });

    it("should walk backward across wrinkles and the tail", () => {
      const list = growingList();
      const cursor = list.cursor(list.size);
      const seen: string[] = [];

      while (cursor.hasPrevious()) {
        seen.push(cursor.previous());
      }

      expect(seen.reverse()).toEqual(list.toArray());
    });

    it("should throw when stepping past either end", () => {
      const list = flatList();

      expect(() => list.cursor(10).next()).toThrow(CursorExhaustedError);
      expect(() => list.cursor(0).previous()).toThrow(CursorExhaustedError);
      expect(() => list.cursor(0).previous()).toThrow("No previous element");
    });

    it("should reject start positions outside 0..size", () => {
      const list = flatList();

      expect(() => list.cursor(-1)).toThrow(IndexOutOfRangeError);
      expect(() => list.cursor(11)).toThrow(IndexOutOfRangeError);
    });
  });

  describe("concurrent modification", () => {
    it("should fail after an outside structural edit", () => {
      const list = flatList();
      const cursor = list.cursor();
      cursor.next();
      list.append("X");

      expect(() => cursor.next()).toThrow(StaleCursorError);
      expect(() => cursor.remove()).toThrow(StaleCursorError);
      expect(cursor.hasNext()).toBe(true);
    });

    it("should fail after a snapshot", () => {
      const list = flatList();
      const cursor = list.cursor();
      list.snapshot();

      expect(() => cursor.next()).toThrow(StaleCursorError);
    });

    it("should not fail after an outside set", () => {
      const list = flatList();
      const cursor = list.cursor();
      list.set(0, "X");

      expect(cursor.next()).toBe("X");
    });

    it("should make one cursor stale when another edits", () => {
      const list = flatList();
      const first = list.cursor();
      const second = list.cursor();

      second.next();
      second.remove();

      expect(() => first.next()).toThrow(StaleCursorError);
    });

    it("should fail iteration when the list changes underneath", () => {
      const list = flatList();

      expect(() => {
        for (const item of list) {
          if (item === "B3") list.removeAt(0);
        }
      }).toThrow(StaleCursorError);
    });
  });

  describe("iteration", () => {
    it("should yield every element in order", () => {
      const list = growingList();
      expect([...list]).toEqual(list.toArray());
    });
  });
});
