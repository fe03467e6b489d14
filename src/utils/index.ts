/**
 * Shared utilities
 */

// Re-export logger module
export * from "./logger.js";

// Re-export file system utilities
export * from "./fs.js";

export * from "./paths.js";

// =============================================================================
// Ordering
// =============================================================================

/**
 * Code-unit string comparison. Stable across locales, unlike localeCompare.
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Candidates that look like a misspelling of `name`
 */
export function suggestNames(name: string, candidates: Iterable<string>, limit = 3): string[] {
  const normalize = (value: string) => value.toLowerCase().replace(/[-_\s]/g, "");
  const wanted = normalize(name);
  if (wanted.length === 0) return [];

  const matches: string[] = [];
  for (const candidate of candidates) {
    const normalized = normalize(candidate);
    if (normalized.includes(wanted) || wanted.includes(normalized)) {
      matches.push(candidate);
    }
  }
  return matches.sort(compareStrings).slice(0, limit);
}
