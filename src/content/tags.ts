import { InvalidTagError } from "../errors.js";

/**
 * Tags start and end with a lowercase letter or digit and may contain `:` and
 * `-` in between, e.g. `system:32` or `mega-man:torso:component:12`. The colon
 * separates subtags.
 */
const TAG_PATTERN = /^[a-z0-9](?:[a-z0-9:-]*[a-z0-9])?$/;

/** Trims and validates a single tag. */
export function parseTag(value: unknown): string {
  if (typeof value !== "string") {
    throw new InvalidTagError(value, "tags must be strings");
  }
  const cleaned = value.trim();
  if (!TAG_PATTERN.test(cleaned)) {
    throw new InvalidTagError(value, "only 'a-z', '0-9', ':' and '-' are allowed");
  }
  return cleaned;
}

/**
 * Normalises a tag collection into a sorted, de-duplicated, frozen array.
 * Strings are split on whitespace so `"raw calibrated"` yields two tags.
 */
export function normaliseTags(input: string | Iterable<string> | undefined): readonly string[] {
  if (input === undefined) {
    return Object.freeze([]);
  }
  const candidates = typeof input === "string" ? input.split(/\s+/).filter((entry) => entry.length > 0) : input;
  const tags = new Set<string>();
  for (const candidate of candidates) {
    tags.add(parseTag(candidate));
  }
  return Object.freeze([...tags].sort());
}

/** Every subtag of every tag, e.g. `a:b` and `c` give `a`, `b`, `c`. */
export function subtags(tags: readonly string[]): readonly string[] {
  const result = new Set<string>();
  for (const tag of tags) {
    for (const part of tag.split(":")) {
      result.add(part);
    }
  }
  return [...result].sort();
}

/** Exact match after validating `tag`; subtags do not match. */
export function hasTag(tags: readonly string[], tag: string): boolean {
  return tags.includes(parseTag(tag));
}
