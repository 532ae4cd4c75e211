/**
 * Registry format tags
 */

import { REGISTRY_FORMAT_SEPARATOR } from "#/constants";
import type { RegistryFormatTag } from "./registry.types";

/**
 * Split a format string into its set of tags. Order is irrelevant and
 * duplicates collapse; unknown tags are kept so callers can report them.
 *
 * @example
 * parseRegistryFormat("one-level;unversioned") → Set { "one-level", "unversioned" }
 */
export function parseRegistryFormat(format: string): Set<string> {
  const tags = format
    .split(REGISTRY_FORMAT_SEPARATOR)
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);

  return new Set(tags);
}

export function hasFormatTags(tags: ReadonlySet<string>, ...required: RegistryFormatTag[]): boolean {
  return required.every((tag) => tags.has(tag));
}

/**
 * Join tags back into the stored form.
 */
export function formatRegistryFormat(tags: Iterable<RegistryFormatTag>): string {
  return Array.from(new Set(tags)).join(REGISTRY_FORMAT_SEPARATOR);
}
