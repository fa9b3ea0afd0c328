import {
  BinaryReader,
  type BinaryStreamOptions,
  BinaryWriter,
  FormatError,
  md5Hex,
} from "@archive-manifest/utils";
import { BitMask } from "./bit-mask.js";
import { defaultTags } from "./default-tags.js";
import { TagEntry } from "./tag-entry.js";
import { sortTags } from "./tag-order.js";

/**
 * Optional logger for codec diagnostics.
 */
export interface TagLogger {
  debug?: (...args: unknown[]) => void;
}

export interface TagCollectionOptions {
  logger?: TagLogger;
}

export interface ReadTagsOptions extends BinaryStreamOptions {
  /** Fail when bytes remain after the last entry (default: false) */
  strict?: boolean;
}

/**
 * Tags of one archive manifest, keyed by name without regard to case.
 *
 * Every entry's mask has one bit per file in the owning manifest's file
 * list. The manifest keeps them in step by calling {@link insertFileIndex}
 * and {@link removeFileIndex} alongside its own list changes.
 *
 * Mutations never fail on unknown names or negative indices; they do nothing.
 *
 * @example
 * ```ts
 * const tags = new TagCollection();
 * tags.loadDefaultTags(21000, files.length);
 * tags.setTags(0, true, "Windows", "enUS");
 * const bytes = tags.toBytes();
 * ```
 */
export class TagCollection {
  private readonly entries = new Map<string, TagEntry>();
  private readonly logger?: TagLogger;
  private lastChecksum: string | undefined;

  constructor(options: TagCollectionOptions = {}) {
    this.logger = options.logger;
  }

  /**
   * Decode a collection from a tag section.
   */
  static fromBytes(
    bytes: Uint8Array,
    tagCount: number,
    fileCount: number,
    options: ReadTagsOptions & TagCollectionOptions = {},
  ): TagCollection {
    const { strict = false, logger, ...streamOptions } = options;
    const collection = new TagCollection({ logger });
    const reader = new BinaryReader(bytes, streamOptions);
    collection.read(reader, tagCount, fileCount);

    if (strict && reader.remaining > 0) {
      throw new FormatError(`${reader.remaining} trailing bytes after tags`, reader.offset);
    }
    return collection;
  }

  /** Entries in map order */
  get tags(): IterableIterator<TagEntry> {
    return this.entries.values();
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Hex MD5 of the bytes produced by the last {@link write}.
   * Cleared by every mutation made through this collection.
   */
  get checksum(): string | undefined {
    return this.lastChecksum;
  }

  /**
   * Decode `tagCount` entries of `fileCount` bits each, adding them
   * to the collection.
   *
   * On failure the collection is left partially populated and must be
   * discarded.
   *
   * @throws FormatError on truncated or malformed input, or a duplicate name
   */
  read(reader: BinaryReader, tagCount: number, fileCount: number): void {
    this.lastChecksum = undefined;
    const start = reader.offset;

    for (let i = 0; i < tagCount; i++) {
      const entryOffset = reader.offset;
      const entry = TagEntry.read(reader, fileCount);
      const key = keyOf(entry.name);
      if (this.entries.has(key)) {
        throw new FormatError(`Duplicate tag: ${entry.name}`, entryOffset);
      }
      this.entries.set(key, entry);
    }

    this.logger?.debug?.(
      `Read ${tagCount} tags over ${fileCount} files (${reader.offset - start} bytes)`,
    );
  }

  /**
   * Encode every entry in serialization order and record the checksum
   * of the written bytes.
   */
  write(writer: BinaryWriter): void {
    const start = writer.offset;
    for (const entry of sortTags(this.entries.values())) {
      entry.write(writer);
    }
    this.lastChecksum = md5Hex(writer.toBytes(start));

    this.logger?.debug?.(
      `Wrote ${this.entries.size} tags (${writer.offset - start} bytes, md5 ${this.lastChecksum})`,
    );
  }

  /**
   * Encode the collection into a new buffer.
   */
  toBytes(options?: BinaryStreamOptions): Uint8Array {
    const writer = new BinaryWriter(options);
    this.write(writer);
    return writer.toBytes();
  }

  /**
   * Add a tag with an all-clear mask. An existing tag of the same name
   * is replaced, see {@link addOrUpdate}.
   */
  add(name: string, typeId: number, fileCount: number): void {
    this.addOrUpdate(new TagEntry(name, typeId, new BitMask(fileCount)), fileCount);
  }

  /**
   * Store `entry`. A new name gets a fresh all-clear mask of `fileCount`
   * bits. An existing name is replaced by `entry` as given, mask included:
   * masks are not merged.
   */
  addOrUpdate(entry: TagEntry, fileCount: number): void {
    const key = keyOf(entry.name);
    if (!this.entries.has(key)) {
      entry.fileMask = new BitMask(fileCount);
    }
    this.entries.set(key, entry);
    this.lastChecksum = undefined;
  }

  /** Remove a tag by name. Absent tags are ignored. */
  remove(entry: TagEntry | string): void {
    const name = typeof entry === "string" ? entry : entry.name;
    if (this.entries.delete(keyOf(name))) {
      this.lastChecksum = undefined;
    }
  }

  clear(): void {
    this.entries.clear();
    this.lastChecksum = undefined;
  }

  tryGet(name: string): TagEntry | undefined {
    return this.entries.get(keyOf(name));
  }

  containsTag(name: string): boolean {
    return this.entries.has(keyOf(name));
  }

  /**
   * Names of the tags carried by the file at `index`, in map order.
   * Negative indices, which stand for files not yet placed in the list,
   * yield nothing.
   */
  *tagsForFile(index: number): Generator<string> {
    if (!isFileIndex(index)) return;
    for (const entry of this.entries.values()) {
      if (index < entry.fileMask.length && entry.fileMask.get(index)) {
        yield entry.name;
      }
    }
  }

  /**
   * Set or clear the file at `index` for the named tags, or for every
   * tag when none are named. Unknown names are skipped.
   */
  setTags(index: number, value: boolean, ...tags: string[]): void {
    if (!isFileIndex(index)) return;

    const targets =
      tags.length === 0
        ? [...this.entries.values()]
        : tags.flatMap((name) => this.entries.get(keyOf(name)) ?? []);

    for (const entry of targets) {
      if (index < entry.fileMask.length) {
        entry.fileMask.set(index, value);
      }
    }
    this.lastChecksum = undefined;
  }

  /**
   * Drop the file at `index` from every mask, shifting later files down.
   * Call together with the removal from the manifest's file list.
   */
  removeFileIndex(index: number): void {
    if (!isFileIndex(index)) return;
    for (const entry of this.entries.values()) {
      if (index < entry.fileMask.length) {
        entry.fileMask.removeAt(index);
      }
    }
    this.lastChecksum = undefined;
  }

  /**
   * Open an untagged slot at `index` in every mask, shifting later files
   * up. `index` equal to the file count appends.
   * Call together with the insertion into the manifest's file list.
   */
  insertFileIndex(index: number): void {
    if (!isFileIndex(index)) return;
    for (const entry of this.entries.values()) {
      if (index <= entry.fileMask.length) {
        entry.fileMask.insertAt(index);
      }
    }
    this.lastChecksum = undefined;
  }

  /**
   * Replace all tags with the default set for `build`.
   */
  loadDefaultTags(build: number, fileCount: number): void {
    this.entries.clear();
    for (const entry of defaultTags(build, fileCount)) {
      this.addOrUpdate(entry, fileCount);
    }
    this.lastChecksum = undefined;
  }
}

function isFileIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0;
}

/**
 * Ordinal case-insensitive key: each code point is upper-cased on its own,
 * and kept as-is when its upper case spans several code points ("ß").
 */
function keyOf(name: string): string {
  let key = "";
  for (const ch of name) {
    const upper = ch.toUpperCase();
    key += [...upper].length === 1 ? upper : ch;
  }
  return key;
}
