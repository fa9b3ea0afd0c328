/**
 * Tag categories used by archive manifests.
 *
 * Several tags share one category; the id is not unique per tag.
 */
export const TagType = {
  Platform: 1,
  Architecture: 2,
  Locale: 3,
  Region: 4,
  Feature: 5,
  /** Locale-like tag stored under its own id */
  Alternate: 0x4000,
} as const;

export type KnownTagType = (typeof TagType)[keyof typeof TagType];

/** Largest value a type id can hold on disk (u16) */
export const MAX_TAG_TYPE_ID = 0xffff;
