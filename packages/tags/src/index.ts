export { FormatError } from "@archive-manifest/utils";
export { BitMask } from "./bit-mask.js";
export { CONTENT_TAGS_AFTER_BUILD, defaultTags, REGION_TAGS_AFTER_BUILD } from "./default-tags.js";
export {
  type ReadTagsOptions,
  TagCollection,
  type TagCollectionOptions,
  type TagLogger,
} from "./tag-collection.js";
export { TagEntry } from "./tag-entry.js";
export { compareTags, sortTags } from "./tag-order.js";
export { type KnownTagType, MAX_TAG_TYPE_ID, TagType } from "./tag-types.js";
