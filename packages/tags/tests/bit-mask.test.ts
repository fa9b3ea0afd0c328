/**
 * Bit Mask Tests
 *
 * MSB-first packing, padding and index shifting of per-file masks.
 */

import { describe, expect, it } from "vitest";
import { BitMask } from "../src/bit-mask.js";
import { setBits } from "./helpers/set-bits.js";

function maskOf(length: number, ...bits: number[]): BitMask {
  const mask = new BitMask(length);
  for (const index of bits) {
    mask.set(index, true);
  }
  return mask;
}

describe("BitMask", () => {
  it("starts all clear", () => {
    const mask = new BitMask(10);
    expect(mask.length).toBe(10);
    expect(mask.toBytes()).toEqual(new Uint8Array([0, 0]));
    expect(setBits(mask)).toEqual([]);
  });

  it("rejects negative or fractional lengths", () => {
    expect(() => new BitMask(-1)).toThrow(RangeError);
    expect(() => new BitMask(1.5)).toThrow(RangeError);
  });

  it("packs bits most significant first", () => {
    const mask = maskOf(10, 0, 9);
    expect(mask.toBytes()).toEqual(new Uint8Array([0x80, 0x40]));
    expect(mask.get(0)).toBe(true);
    expect(mask.get(1)).toBe(false);
    expect(mask.get(9)).toBe(true);
  });

  it("clears a bit", () => {
    const mask = maskOf(8, 3, 4);
    mask.set(3, false);
    expect(mask.toBytes()).toEqual(new Uint8Array([0x08]));
  });

  it("rejects out-of-range indices", () => {
    const mask = new BitMask(4);
    expect(() => mask.get(4)).toThrow(RangeError);
    expect(() => mask.set(-1, true)).toThrow(RangeError);
    expect(() => mask.removeAt(4)).toThrow(RangeError);
  });

  describe("fromBytes", () => {
    it("zeroes padding bits", () => {
      const mask = BitMask.fromBytes(new Uint8Array([0xff, 0xff]), 10);
      expect(mask.toBytes()).toEqual(new Uint8Array([0xff, 0xc0]));
      expect(setBits(mask)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    it("ignores bytes past the mask", () => {
      const mask = BitMask.fromBytes(new Uint8Array([0x01, 0xff]), 8);
      expect(mask.toBytes()).toEqual(new Uint8Array([0x01]));
    });

    it("rejects too few bytes", () => {
      expect(() => BitMask.fromBytes(new Uint8Array([0xff]), 9)).toThrow(RangeError);
    });

    it("copies its input", () => {
      const source = new Uint8Array([0x80]);
      const mask = BitMask.fromBytes(source, 8);
      source[0] = 0;
      expect(mask.get(0)).toBe(true);
    });
  });

  describe("removeAt", () => {
    it("shifts later bits down", () => {
      const mask = maskOf(10, 1, 3, 9);
      mask.removeAt(3);
      expect(mask.length).toBe(9);
      expect(setBits(mask)).toEqual([1, 8]);
      expect(mask.toBytes()).toEqual(new Uint8Array([0x40, 0x80]));
    });

    it("drops a trailing byte that is no longer needed", () => {
      const mask = maskOf(9, 8);
      mask.removeAt(0);
      expect(mask.length).toBe(8);
      expect(mask.toBytes()).toEqual(new Uint8Array([0x01]));
    });

    it("empties a single-bit mask", () => {
      const mask = maskOf(1, 0);
      mask.removeAt(0);
      expect(mask.length).toBe(0);
      expect(mask.toBytes()).toEqual(new Uint8Array([]));
    });
  });

  describe("insertAt", () => {
    it("shifts later bits up", () => {
      const mask = maskOf(8, 0, 7);
      mask.insertAt(0);
      expect(mask.length).toBe(9);
      expect(setBits(mask)).toEqual([1, 8]);
      expect(mask.toBytes()).toEqual(new Uint8Array([0x40, 0x80]));
    });

    it("appends at the end", () => {
      const mask = maskOf(9, 1, 8);
      mask.insertAt(9, true);
      expect(setBits(mask)).toEqual([1, 8, 9]);
      expect(mask.toBytes()).toEqual(new Uint8Array([0x40, 0xc0]));
    });

    it("rejects indices past the end", () => {
      expect(() => new BitMask(2).insertAt(3)).toThrow(RangeError);
    });
  });
});
