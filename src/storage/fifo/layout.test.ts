import { describe, expect, test } from "@jest/globals";
import { alignTo, computeLayout, ledgerSlotTypeFor, parseOptions } from "./layout";
import { InvalidAllocatorOptionsError } from "./protocol";

describe("computeLayout", () => {
  test("sizes both rings with a reserved slot and a wrap overhang", () => {
    expect(computeLayout({ bufferSize: 100, minBlockSize: 5, maxBlockSize: 10 })).toEqual({
      dataCapacity: 101,
      dataBytes: 110,
      ledgerCapacity: 21,
      ledgerSlotType: "u8",
      ledgerOffset: 110,
      totalBytes: 131,
    });
  });

  test("aligns a wider ledger after the data region", () => {
    expect(computeLayout({ bufferSize: 1000, minBlockSize: 2, maxBlockSize: 301 })).toEqual({
      dataCapacity: 1001,
      dataBytes: 1301,
      ledgerCapacity: 501,
      ledgerSlotType: "u16",
      ledgerOffset: 1302,
      totalBytes: 2304,
    });
  });
});

describe("ledgerSlotTypeFor", () => {
  test("picks the narrowest slot that holds maxBlockSize", () => {
    expect(ledgerSlotTypeFor(1)).toBe("u8");
    expect(ledgerSlotTypeFor(255)).toBe("u8");
    expect(ledgerSlotTypeFor(256)).toBe("u16");
    expect(ledgerSlotTypeFor(65535)).toBe("u16");
    expect(ledgerSlotTypeFor(65536)).toBe("u32");
  });
});

describe("alignTo", () => {
  test("rounds up to the next multiple", () => {
    expect(alignTo(13, 4)).toBe(16);
    expect(alignTo(16, 4)).toBe(16);
    expect(alignTo(7, 1)).toBe(7);
  });
});

describe("parseOptions", () => {
  test("accepts valid options", () => {
    expect(parseOptions({ bufferSize: 10, minBlockSize: 1, maxBlockSize: 1 })).toEqual({
      bufferSize: 10,
      minBlockSize: 1,
      maxBlockSize: 1,
    });
  });

  test("rejects minBlockSize above maxBlockSize", () => {
    let caught: unknown;
    try {
      parseOptions({ bufferSize: 100, minBlockSize: 6, maxBlockSize: 5 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidAllocatorOptionsError);
    if (caught instanceof InvalidAllocatorOptionsError) {
      expect(caught.issues).toEqual(["minBlockSize: minBlockSize (6) must not exceed maxBlockSize (5)"]);
    }
  });

  test("rejects maxBlockSize above bufferSize", () => {
    expect(() => parseOptions({ bufferSize: 8, minBlockSize: 1, maxBlockSize: 10 })).toThrow(
      "Invalid FIFO allocator options: maxBlockSize: maxBlockSize (10) must not exceed bufferSize (8)"
    );
  });

  test("rejects zero and fractional sizes", () => {
    expect(() => parseOptions({ bufferSize: 100, minBlockSize: 0, maxBlockSize: 10 })).toThrow(
      InvalidAllocatorOptionsError
    );
    expect(() => parseOptions({ bufferSize: 10.5, minBlockSize: 1, maxBlockSize: 2 })).toThrow(
      InvalidAllocatorOptionsError
    );
  });
});
