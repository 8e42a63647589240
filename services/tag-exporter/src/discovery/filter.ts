import type { Tag } from "./types";

/**
 * True when every search tag is present on the resource with the same key
 * and value. An empty search set always matches.
 */
export function matchesSearchTags(
  tags: readonly Tag[],
  searchTags: readonly Tag[],
): boolean {
  return searchTags.every((search) =>
    tags.some((t) => t.key === search.key && t.value === search.value),
  );
}
