import type { TagEntry } from "./tag-entry.js";
import { TagType } from "./tag-types.js";

/**
 * Serialization order of tag entries.
 *
 * Entries are grouped by type id. Alternate tags belong with the locales:
 * they sort after every locale tag and before the next category.
 * Within a group, names compare by UTF-16 code unit, independent of locale.
 */
export function compareTags(a: TagEntry, b: TagEntry): number {
  const [aGroup, aRank] = sortKey(a.typeId);
  const [bGroup, bRank] = sortKey(b.typeId);
  if (aGroup !== bGroup) return aGroup - bGroup;
  if (aRank !== bRank) return aRank - bRank;
  return compareOrdinal(a.name, b.name);
}

/**
 * Sorted copy of the entries, in serialization order
 */
export function sortTags(entries: Iterable<TagEntry>): TagEntry[] {
  return [...entries].sort(compareTags);
}

function sortKey(typeId: number): [group: number, rank: number] {
  return typeId === TagType.Alternate ? [TagType.Locale, 1] : [typeId, 0];
}

function compareOrdinal(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
