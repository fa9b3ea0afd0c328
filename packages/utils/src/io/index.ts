export { BinaryReader } from "./binary-reader.js";
export {
  type BinaryStreamOptions,
  type ByteOrder,
  type ResolvedBinaryStreamOptions,
  resolveStreamOptions,
  type StringEncoding,
} from "./binary-stream-options.js";
export { BinaryWriter } from "./binary-writer.js";
export { FormatError } from "./format-error.js";
