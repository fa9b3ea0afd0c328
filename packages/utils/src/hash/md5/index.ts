/**
 * MD5 fingerprint of serialized manifest sections.
 *
 * Archive manifests identify their sections by MD5; this is a content
 * fingerprint, not a security primitive.
 */

import { md5 } from "@noble/hashes/legacy";
import { bytesToHex } from "../utils/index.js";

/**
 * Compute the MD5 digest of data as a lowercase hex string
 */
export function md5Hex(data: Uint8Array): string {
  return bytesToHex(md5(data));
}
