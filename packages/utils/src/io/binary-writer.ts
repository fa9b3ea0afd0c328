import {
  type BinaryStreamOptions,
  type ResolvedBinaryStreamOptions,
  resolveStreamOptions,
} from "./binary-stream-options.js";

const INITIAL_CAPACITY = 256;

const PREFIX_LIMITS = {
  "u8-prefixed": 0xff,
  "u16-prefixed": 0xffff,
  "u32-prefixed": 0xffffffff,
} as const;

/**
 * Growable sequential writer producing a byte buffer.
 *
 * Values that do not fit the declared width throw `RangeError`
 * before anything is written.
 */
export class BinaryWriter {
  private buffer = new Uint8Array(INITIAL_CAPACITY);
  private view = new DataView(this.buffer.buffer);
  private readonly options: ResolvedBinaryStreamOptions;
  private readonly encoder = new TextEncoder();
  private length = 0;

  constructor(options?: BinaryStreamOptions) {
    this.options = resolveStreamOptions(options);
  }

  /** Number of bytes written so far */
  get offset(): number {
    return this.length;
  }

  writeUint8(value: number): void {
    checkRange(value, 0xff, "u8");
    this.ensureCapacity(1);
    this.view.setUint8(this.length, value);
    this.length += 1;
  }

  writeUint16(value: number): void {
    checkRange(value, 0xffff, "u16");
    this.ensureCapacity(2);
    this.view.setUint16(this.length, value, this.options.littleEndian);
    this.length += 2;
  }

  writeUint32(value: number): void {
    checkRange(value, 0xffffffff, "u32");
    this.ensureCapacity(4);
    this.view.setUint32(this.length, value, this.options.littleEndian);
    this.length += 4;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
  }

  /**
   * Write a string framed according to the stream's string encoding.
   */
  writeString(value: string): void {
    const bytes = this.encoder.encode(value);
    const encoding = this.options.stringEncoding;

    if (encoding === "null-terminated") {
      if (bytes.includes(0)) {
        throw new RangeError("Null-terminated string must not contain NUL");
      }
      this.writeBytes(bytes);
      this.writeUint8(0);
      return;
    }

    checkRange(bytes.length, PREFIX_LIMITS[encoding], `${encoding} string length`);
    if (encoding === "u8-prefixed") {
      this.writeUint8(bytes.length);
    } else if (encoding === "u16-prefixed") {
      this.writeUint16(bytes.length);
    } else {
      this.writeUint32(bytes.length);
    }
    this.writeBytes(bytes);
  }

  /**
   * Copy of the written bytes, optionally restricted to `[start, end)`.
   */
  toBytes(start = 0, end = this.length): Uint8Array {
    return this.buffer.slice(start, Math.min(end, this.length));
  }

  private ensureCapacity(extra: number): void {
    const required = this.length + extra;
    if (required <= this.buffer.length) return;

    let capacity = this.buffer.length * 2;
    while (capacity < required) {
      capacity *= 2;
    }
    const grown = new Uint8Array(capacity);
    grown.set(this.buffer.subarray(0, this.length));
    this.buffer = grown;
    this.view = new DataView(grown.buffer);
  }
}

function checkRange(value: number, max: number, what: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new RangeError(`Value ${value} does not fit ${what}`);
  }
}
