/**
 * MD5 Fingerprint Tests
 *
 * Known digests for the hex fingerprint of serialized sections.
 */

import { describe, expect, it } from "vitest";
import { md5Hex } from "../../../src/hash/md5/index.js";

const encoder = new TextEncoder();

describe("md5Hex", () => {
  it("hashes empty input", () => {
    expect(md5Hex(new Uint8Array(0))).toBe("d41d8cd98f00b204e9800998ecf8427e");
  });

  it("hashes 'abc'", () => {
    expect(md5Hex(encoder.encode("abc"))).toBe("900150983cd24fb0d6963f7d28e17f72");
  });
});
