import { BitMask } from "./bit-mask.js";
import { TagEntry } from "./tag-entry.js";
import { TagType } from "./tag-types.js";

/** Builds after this one carry region tags */
export const REGION_TAGS_AFTER_BUILD = 18761;

/** Builds after this one carry speech/text and Alternate tags */
export const CONTENT_TAGS_AFTER_BUILD = 20426;

interface DefaultTag {
  readonly name: string;
  readonly typeId: number;
}

const BASE_TAGS: readonly DefaultTag[] = [
  { name: "OSX", typeId: TagType.Platform },
  { name: "Web", typeId: TagType.Platform },
  { name: "Windows", typeId: TagType.Platform },
  { name: "x86_32", typeId: TagType.Architecture },
  { name: "x86_64", typeId: TagType.Architecture },
  { name: "deDE", typeId: TagType.Locale },
  { name: "enUS", typeId: TagType.Locale },
  { name: "esES", typeId: TagType.Locale },
  { name: "esMX", typeId: TagType.Locale },
  { name: "frFR", typeId: TagType.Locale },
  { name: "itIT", typeId: TagType.Locale },
  { name: "koKR", typeId: TagType.Locale },
  { name: "ptBR", typeId: TagType.Locale },
  { name: "ruRU", typeId: TagType.Locale },
  { name: "zhCN", typeId: TagType.Locale },
  { name: "zhTW", typeId: TagType.Locale },
];

const REGION_TAGS: readonly DefaultTag[] = [
  { name: "CN", typeId: TagType.Region },
  { name: "EU", typeId: TagType.Region },
  { name: "KR", typeId: TagType.Region },
  { name: "TW", typeId: TagType.Region },
  { name: "US", typeId: TagType.Region },
];

const CONTENT_TAGS: readonly DefaultTag[] = [
  { name: "speech", typeId: TagType.Feature },
  { name: "text", typeId: TagType.Feature },
  { name: "Alternate", typeId: TagType.Alternate },
];

/**
 * The tag set a manifest of the given build starts with.
 *
 * Every entry gets its own all-clear mask of `fileCount` bits.
 */
export function defaultTags(build: number, fileCount: number): TagEntry[] {
  const catalog = [...BASE_TAGS];
  if (build > REGION_TAGS_AFTER_BUILD) {
    catalog.push(...REGION_TAGS);
  }
  if (build > CONTENT_TAGS_AFTER_BUILD) {
    catalog.push(...CONTENT_TAGS);
  }
  return catalog.map((tag) => new TagEntry(tag.name, tag.typeId, new BitMask(fileCount)));
}
