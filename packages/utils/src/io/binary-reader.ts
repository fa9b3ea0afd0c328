import {
  type BinaryStreamOptions,
  type ResolvedBinaryStreamOptions,
  resolveStreamOptions,
} from "./binary-stream-options.js";
import { FormatError } from "./format-error.js";

/**
 * Sequential reader over an in-memory byte buffer.
 *
 * Every read advances the cursor. Reads past the end of the buffer throw
 * {@link FormatError} and leave the cursor where it was.
 */
export class BinaryReader {
  private readonly data: Uint8Array;
  private readonly view: DataView;
  private readonly options: ResolvedBinaryStreamOptions;
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });
  private position = 0;

  constructor(data: Uint8Array, options?: BinaryStreamOptions) {
    this.data = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.options = resolveStreamOptions(options);
  }

  /** Current cursor position */
  get offset(): number {
    return this.position;
  }

  /** Number of unread bytes */
  get remaining(): number {
    return this.data.length - this.position;
  }

  readUint8(): number {
    this.require(1, "u8");
    const value = this.view.getUint8(this.position);
    this.position += 1;
    return value;
  }

  readUint16(): number {
    this.require(2, "u16");
    const value = this.view.getUint16(this.position, this.options.littleEndian);
    this.position += 2;
    return value;
  }

  readUint32(): number {
    this.require(4, "u32");
    const value = this.view.getUint32(this.position, this.options.littleEndian);
    this.position += 4;
    return value;
  }

  /** Read exactly `length` bytes. The result is a copy. */
  readBytes(length: number): Uint8Array {
    this.require(length, `${length} bytes`);
    const result = this.data.slice(this.position, this.position + length);
    this.position += length;
    return result;
  }

  /**
   * Read a string framed according to the stream's string encoding.
   */
  readString(): string {
    const start = this.position;
    let bytes: Uint8Array;

    switch (this.options.stringEncoding) {
      case "null-terminated": {
        const end = this.data.indexOf(0, start);
        if (end < 0) {
          throw new FormatError("Unterminated string", start);
        }
        bytes = this.data.subarray(start, end);
        this.position = end + 1;
        break;
      }
      case "u8-prefixed":
        bytes = this.readPrefixed(this.readUint8(), start);
        break;
      case "u16-prefixed":
        bytes = this.readPrefixed(this.readUint16(), start);
        break;
      case "u32-prefixed":
        bytes = this.readPrefixed(this.readUint32(), start);
        break;
      default: {
        const encoding: never = this.options.stringEncoding;
        throw new Error(`Unsupported string encoding: ${String(encoding)}`);
      }
    }

    try {
      return this.decoder.decode(bytes);
    } catch {
      this.position = start;
      throw new FormatError("Malformed UTF-8 string", start);
    }
  }

  private readPrefixed(length: number, start: number): Uint8Array {
    if (this.remaining < length) {
      const available = this.remaining;
      this.position = start;
      throw new FormatError(
        `String length ${length} exceeds remaining ${available} bytes`,
        start,
      );
    }
    const bytes = this.data.subarray(this.position, this.position + length);
    this.position += length;
    return bytes;
  }

  private require(length: number, what: string): void {
    if (!Number.isInteger(length) || length < 0) {
      throw new FormatError(`Invalid read length: ${length}`, this.position);
    }
    if (this.remaining < length) {
      throw new FormatError(
        `Unexpected end of stream: wanted ${what}, have ${this.remaining} bytes`,
        this.position,
      );
    }
  }
}
