/**
 * Hex conversion helpers for checksums
 */

/**
 * Convert bytes to a lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  let hex = "";
  for (const b of bytes) {
    hex += b.toString(16).padStart(2, "0");
  }
  return hex;
}
