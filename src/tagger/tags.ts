import { TagValidationError } from "./errors";

/** Tags applied to every discovered resource. Never mutated once built. */
export type TagSet = Readonly<Record<string, string>>;

export interface KeyValueTag {
  Key: string;
  Value: string;
}

/**
 * Documented tag restrictions of a service that validates its input
 */
export interface TagLimits {
  maxTags: number;
  maxKeyLength: number;
  maxValueLength: number;
  reservedPrefix: string;
}

export const MAP_MIGRATED_TAG_KEY = "map-migrated";

export const STANDARD_TAG_LIMITS: TagLimits = {
  maxTags: 50,
  maxKeyLength: 128,
  maxValueLength: 256,
  reservedPrefix: "aws:",
};

/**
 * Builds the run's TagSet: the map-migrated baseline overlaid with the custom tags.
 */
export function createTagSet(
  mapMigratedValue: string,
  customTags: Record<string, string>
): TagSet {
  return Object.freeze({
    [MAP_MIGRATED_TAG_KEY]: mapMigratedValue,
    ...customTags,
  });
}

export function isEmptyTagSet(tags: TagSet): boolean {
  return Object.keys(tags).length === 0;
}

/**
 * Converts the TagSet to the list-of-pairs shape used by most service APIs
 */
export function toTagList(tags: TagSet): KeyValueTag[] {
  return Object.entries(tags).map(([Key, Value]) => ({
    Key,
    Value,
  }));
}

/**
 * Converts the TagSet to the flat map shape (Glue, VPC Lattice)
 */
export function toTagMap(tags: TagSet): Record<string, string> {
  return { ...tags };
}

export function formatTags(tags: TagSet | KeyValueTag[]): string {
  const pairs = Array.isArray(tags)
    ? tags.map((tag) => `${tag.Key}: ${tag.Value}`)
    : Object.entries(tags).map(([key, value]) => `${key}: ${value}`);
  return `{${pairs.join(", ")}}`;
}

/**
 * Checks the TagSet against a service's limits. Throws TagValidationError on the
 * first violation.
 */
export function validateTagSet(tags: TagSet, limits: TagLimits): void {
  const entries = Object.entries(tags);
  if (entries.length > limits.maxTags) {
    throw new TagValidationError(
      `number of tags exceeds maximum limit of ${limits.maxTags}`
    );
  }

  for (const [key, value] of entries) {
    if (key.startsWith(limits.reservedPrefix)) {
      throw new TagValidationError(
        `tag key cannot start with '${limits.reservedPrefix}': ${key}`
      );
    }
    if (key.length < 1 || key.length > limits.maxKeyLength) {
      throw new TagValidationError(
        `tag key length must be between 1 and ${limits.maxKeyLength} characters: ${key}`
      );
    }
    if (value.length > limits.maxValueLength) {
      throw new TagValidationError(
        `tag value length must not exceed ${limits.maxValueLength} characters for key: ${key}`
      );
    }
  }
}
