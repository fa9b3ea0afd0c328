import { type BinaryReader, type BinaryWriter, FormatError } from "@archive-manifest/utils";
import { BitMask } from "./bit-mask.js";
import { MAX_TAG_TYPE_ID } from "./tag-types.js";

/**
 * A single tag: its name, category and the set of files carrying it.
 *
 * Layout on disk:
 * - name (string framing per stream options)
 * - type id: u16
 * - mask: ceil(fileCount / 8) bytes, MSB first
 */
export class TagEntry {
  name: string;
  typeId: number;
  fileMask: BitMask;

  constructor(name: string, typeId: number, fileMask: BitMask = new BitMask()) {
    if (!Number.isInteger(typeId) || typeId < 0 || typeId > MAX_TAG_TYPE_ID) {
      throw new RangeError(`Tag type id ${typeId} does not fit u16`);
    }
    this.name = name;
    this.typeId = typeId;
    this.fileMask = fileMask;
  }

  /**
   * Decode one entry. `fileCount` comes from the section header.
   *
   * @throws FormatError when the stream cannot supply the entry
   */
  static read(reader: BinaryReader, fileCount: number): TagEntry {
    if (!Number.isInteger(fileCount) || fileCount < 0) {
      throw new FormatError(`Invalid file count: ${fileCount}`, reader.offset);
    }

    const name = reader.readString();
    const typeId = reader.readUint16();

    const maskLength = Math.ceil(fileCount / 8);
    if (reader.remaining < maskLength) {
      throw new FormatError(
        `Tag "${name}" needs ${maskLength} mask bytes for ${fileCount} files, ${reader.remaining} remain`,
        reader.offset,
      );
    }
    const mask = BitMask.fromBytes(reader.readBytes(maskLength), fileCount);

    return new TagEntry(name, typeId, mask);
  }

  write(writer: BinaryWriter): void {
    writer.writeString(this.name);
    writer.writeUint16(this.typeId);
    writer.writeBytes(this.fileMask.toBytes());
  }
}
