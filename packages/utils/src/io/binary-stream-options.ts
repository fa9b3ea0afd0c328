/**
 * Byte order of multi-byte integers.
 */
export type ByteOrder = "big" | "little";

/**
 * How strings are framed in the stream.
 *
 * - `null-terminated`: UTF-8 bytes followed by a single 0x00
 * - `u8-prefixed` / `u16-prefixed` / `u32-prefixed`: byte length first,
 *   using the stream byte order, then the UTF-8 bytes
 */
export type StringEncoding = "null-terminated" | "u8-prefixed" | "u16-prefixed" | "u32-prefixed";

/**
 * Conventions shared by a reader and the writer producing its input.
 */
export interface BinaryStreamOptions {
  /** Integer byte order (default: "big") */
  byteOrder?: ByteOrder;
  /** String framing (default: "null-terminated") */
  stringEncoding?: StringEncoding;
}

export interface ResolvedBinaryStreamOptions {
  littleEndian: boolean;
  stringEncoding: StringEncoding;
}

export function resolveStreamOptions(
  options: BinaryStreamOptions = {},
): ResolvedBinaryStreamOptions {
  return {
    littleEndian: (options.byteOrder ?? "big") === "little",
    stringEncoding: options.stringEncoding ?? "null-terminated",
  };
}
