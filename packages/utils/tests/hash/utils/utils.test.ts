/**
 * Hex Conversion Tests
 *
 * Checksums are reported as lowercase hex strings.
 */

import { describe, expect, it } from "vitest";
import { bytesToHex } from "../../../src/hash/utils/index.js";

describe("bytesToHex", () => {
  it("converts empty array", () => {
    expect(bytesToHex(new Uint8Array([]))).toBe("");
  });

  it("pads single digits with zero", () => {
    expect(bytesToHex(new Uint8Array([0x0a, 0x0b, 0xff]))).toBe("0a0bff");
  });

  it("uses lowercase digits", () => {
    expect(bytesToHex(new Uint8Array([0xde, 0xad, 0xbe, 0xef]))).toBe("deadbeef");
  });
});
