/**
 * Artifact identity, ordering and path formation
 *
 * @module
 */

import * as path from "node:path";
import type { Artifact, ArtifactSelector, LocatorParams } from "../../types/index.js";
import { compareStrings } from "../../utils/index.js";

/** `{BUILDING}`, `{NETWORK_TYPE}`: upper-case names in braces */
const PLACEHOLDER = /\{([A-Z][A-Z0-9_]*)\}/g;

/**
 * Stable identity of an artifact: "<category>/<nameTemplate>"
 */
export function artifactKey(artifact: Pick<Artifact, "category" | "nameTemplate">): string {
  return `${artifact.category}/${artifact.nameTemplate}`;
}

/**
 * Orders artifacts by category, then name template
 */
export function compareArtifacts(a: Artifact, b: Artifact): number {
  return compareStrings(a.category, b.category) || compareStrings(a.nameTemplate, b.nameTemplate);
}

/**
 * Placeholder a locator parameter expands: `building` fills `{BUILDING}`,
 * `networkType` and `network_type` fill `{NETWORK_TYPE}`
 */
export function placeholderFor(param: string): string {
  return `{${param.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toUpperCase()}}`;
}

/**
 * Placeholder names in the category and name template, in order of appearance
 */
export function placeholdersOf(artifact: Pick<Artifact, "category" | "nameTemplate">): string[] {
  const names = [...artifactKey(artifact).matchAll(PLACEHOLDER)].map((match) => match[1] ?? "");
  return [...new Set(names)];
}

export function isTemplated(artifact: Artifact): boolean {
  return placeholdersOf(artifact).length > 0;
}

/**
 * Dry-run path for an artifact. Placeholders without a matching parameter are
 * kept verbatim.
 */
export function formatPath(
  artifact: Artifact,
  scenario: string,
  params: LocatorParams = {}
): string {
  const values = new Map(
    Object.entries(params).map(([name, value]): [string, string] => [placeholderFor(name), value])
  );
  const expand = (text: string) => text.replace(PLACEHOLDER, (match) => values.get(match) ?? match);
  return path.posix.join(scenario, expand(artifact.category), expand(artifact.nameTemplate));
}

/**
 * Set of artifacts named by catalog selectors (whole categories or single files)
 */
export class ArtifactSelection {
  private readonly categories = new Set<string>();
  private readonly keys = new Set<string>();

  constructor(selectors: readonly ArtifactSelector[] = []) {
    for (const selector of selectors) {
      if (selector.name === undefined) {
        this.categories.add(selector.category);
      } else {
        this.keys.add(artifactKey({ category: selector.category, nameTemplate: selector.name }));
      }
    }
  }

  has(artifact: Artifact): boolean {
    return this.categories.has(artifact.category) || this.keys.has(artifactKey(artifact));
  }

  get size(): number {
    return this.categories.size + this.keys.size;
  }
}
