import { describe, expect, test } from "@jest/globals";
import { RingCursor } from "./ringCursor";

describe("RingCursor", () => {
  test("starts empty with one slot reserved", () => {
    const c = new RingCursor(11);
    expect(c.isEmpty).toBe(true);
    expect(c.isFull).toBe(false);
    expect(c.utilization).toBe(0);
    expect(c.available).toBe(10);
  });

  test("rejects capacities below 2 and non-integers", () => {
    expect(() => new RingCursor(1)).toThrow("RingCursor capacity must be an integer >= 2 (got 1)");
    expect(() => new RingCursor(2.5)).toThrow(Error);
  });

  test("offsetAfter wraps once the sum reaches capacity", () => {
    const c = new RingCursor(11);
    expect(c.offsetAfter(3, 4)).toBe(7);
    expect(c.offsetAfter(10, 1)).toBe(0);
    expect(c.offsetAfter(9, 2)).toBe(0);
    expect(c.offsetAfter(9, 3)).toBe(1);
  });

  test("utilization accounts for a wrapped head", () => {
    const c = new RingCursor(11);
    c.advanceHead(7);
    expect(c.utilization).toBe(7);
    expect(c.available).toBe(3);

    c.advanceTail(5);
    c.advanceHead(6);
    expect(c.head).toBe(2);
    expect(c.tail).toBe(5);
    expect(c.utilization).toBe(8);
    expect(c.available).toBe(2);
  });

  test("is full after capacity - 1 units", () => {
    const c = new RingCursor(11);
    c.advanceHead(10);
    expect(c.isFull).toBe(true);
    expect(c.isEmpty).toBe(false);
    expect(c.available).toBe(0);
  });

  test("becomes empty again when the tail catches the head across the wrap", () => {
    const c = new RingCursor(5);
    for (let i = 0; i < 7; i++) {
      c.advanceHead(3);
      c.advanceTail(3);
      expect(c.isEmpty).toBe(true);
    }
    expect(c.head).toBe(1);
    expect(c.tail).toBe(1);
  });

  test("snapshot and reset", () => {
    const c = new RingCursor(6);
    c.advanceHead(4);
    c.advanceTail(1);
    expect(c.snapshot()).toEqual({ head: 4, tail: 1, capacity: 6, utilization: 3, available: 2 });

    c.reset();
    expect(c.snapshot()).toEqual({ head: 0, tail: 0, capacity: 6, utilization: 0, available: 5 });
  });
});
