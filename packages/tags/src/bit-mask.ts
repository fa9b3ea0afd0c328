/**
 * Fixed-length bit vector, one bit per archive file.
 *
 * Bits are stored in the on-disk layout: bit `i` lives in byte `i >> 3`,
 * most significant bit first. Padding bits past `length` are always zero.
 */
export class BitMask {
  private bytes: Uint8Array;
  private size: number;

  constructor(length = 0) {
    checkLength(length);
    this.size = length;
    this.bytes = new Uint8Array(byteLength(length));
  }

  /**
   * Create a mask from packed bytes.
   *
   * Only the first `ceil(length / 8)` bytes are used; padding bits
   * past `length` are cleared.
   */
  static fromBytes(bytes: Uint8Array, length: number): BitMask {
    const mask = new BitMask(length);
    const needed = byteLength(length);
    if (bytes.length < needed) {
      throw new RangeError(`Need ${needed} bytes for ${length} bits, got ${bytes.length}`);
    }
    mask.bytes.set(bytes.subarray(0, needed));
    mask.clearPadding();
    return mask;
  }

  /** Number of bits */
  get length(): number {
    return this.size;
  }

  get(index: number): boolean {
    this.checkIndex(index);
    return (this.bytes[index >> 3] & bitOf(index)) !== 0;
  }

  set(index: number, value: boolean): void {
    this.checkIndex(index);
    if (value) {
      this.bytes[index >> 3] |= bitOf(index);
    } else {
      this.bytes[index >> 3] &= ~bitOf(index);
    }
  }

  /**
   * Remove the bit at `index`, shifting every later bit down by one.
   */
  removeAt(index: number): void {
    this.checkIndex(index);
    for (let i = index; i < this.size - 1; i++) {
      this.set(i, this.get(i + 1));
    }
    this.set(this.size - 1, false);
    this.size--;

    const needed = byteLength(this.size);
    if (needed < this.bytes.length) {
      this.bytes = this.bytes.slice(0, needed);
    }
  }

  /**
   * Insert a bit at `index`, shifting every later bit up by one.
   * `index` may equal `length` to append.
   */
  insertAt(index: number, value = false): void {
    if (!Number.isInteger(index) || index < 0 || index > this.size) {
      throw new RangeError(`Insert index ${index} out of range [0, ${this.size}]`);
    }

    const needed = byteLength(this.size + 1);
    if (needed > this.bytes.length) {
      const grown = new Uint8Array(needed);
      grown.set(this.bytes);
      this.bytes = grown;
    }
    this.size++;

    for (let i = this.size - 1; i > index; i--) {
      this.set(i, this.get(i - 1));
    }
    this.set(index, value);
  }

  /** Packed copy, `ceil(length / 8)` bytes */
  toBytes(): Uint8Array {
    return this.bytes.slice();
  }

  private clearPadding(): void {
    const used = this.size & 7;
    if (used !== 0) {
      this.bytes[this.bytes.length - 1] &= (0xff << (8 - used)) & 0xff;
    }
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new RangeError(`Bit index ${index} out of range [0, ${this.size})`);
    }
  }
}

function byteLength(bits: number): number {
  return (bits + 7) >>> 3;
}

function bitOf(index: number): number {
  return 0x80 >>> (index & 7);
}

function checkLength(length: number): void {
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Invalid bit mask length: ${length}`);
  }
}
