/**
 * Raised when binary data cannot be decoded: the stream ends early,
 * a declared length cannot be satisfied or a string is malformed.
 *
 * A decoder that throws this leaves its target partially populated;
 * the target must be discarded.
 */
export class FormatError extends Error {
  /** Byte offset in the source stream where decoding failed */
  readonly offset: number;

  constructor(message: string, offset: number) {
    super(message);
    this.name = "FormatError";
    this.offset = offset;
  }
}
