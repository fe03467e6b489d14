/**
 * Locator Registry
 *
 * Static catalog of named accessors, each bound to the artifact it resolves and
 * to the direction a call means for the calling script by default. Built once
 * from configuration and frozen; there is no way to register accessors later.
 *
 * @module
 */

import type { Accessor, Artifact, ArtifactKind, Direction } from "../../types/index.js";
import { err, ok, type Result } from "../../types/result.js";
import { compareStrings, createLogger, suggestNames } from "../../utils/index.js";
import { ConfigurationError, ErrorCode, UnknownAccessorError } from "../errors.js";
import { artifactKey, compareArtifacts } from "./artifact.js";

const logger = createLogger("locator-registry");

/** Accessor names appear verbatim in rendered edge labels */
export const ACCESSOR_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_.-]*$/;

/**
 * Registry input for one accessor
 */
export interface AccessorDefinition {
  name: string;
  category: string;
  nameTemplate: string;
  kind: ArtifactKind;
  direction: Direction;
}

export class LocatorRegistry {
  private readonly byName: ReadonlyMap<string, Accessor>;
  private readonly artifactList: readonly Artifact[];

  private constructor(accessors: Map<string, Accessor>, artifacts: Artifact[]) {
    this.byName = accessors;
    this.artifactList = Object.freeze(artifacts);
    Object.freeze(this);
  }

  /**
   * Builds the registry. Rejects duplicate or malformed names, templates that
   * carry a directory, and artifacts registered with two different kinds.
   *
   * @throws ConfigurationError listing every problem found
   */
  static fromEntries(entries: readonly AccessorDefinition[]): LocatorRegistry {
    const issues: string[] = [];
    const accessors = new Map<string, Accessor>();
    const artifacts = new Map<string, Artifact>();

    for (const entry of entries) {
      if (accessors.has(entry.name)) {
        issues.push(`accessor "${entry.name}" is registered more than once`);
        continue;
      }
      if (!ACCESSOR_NAME_PATTERN.test(entry.name)) {
        issues.push(
          `accessor "${entry.name}": names start with a letter and use letters, digits, "_", "-" or "."`
        );
        continue;
      }
      if (entry.nameTemplate.includes("/")) {
        issues.push(
          `accessor "${entry.name}": name template "${entry.nameTemplate}" contains "/"; ` +
            "put directories in the category"
        );
        continue;
      }

      const key = artifactKey(entry);
      let artifact = artifacts.get(key);
      if (!artifact) {
        artifact = Object.freeze({
          category: entry.category,
          nameTemplate: entry.nameTemplate,
          kind: entry.kind,
        });
        artifacts.set(key, artifact);
      } else if (artifact.kind !== entry.kind) {
        issues.push(
          `accessor "${entry.name}": artifact "${key}" is already registered as ` +
            `"${artifact.kind}", not "${entry.kind}"`
        );
        continue;
      }

      accessors.set(
        entry.name,
        Object.freeze({ name: entry.name, artifact, direction: entry.direction })
      );
    }

    if (issues.length > 0) {
      throw new ConfigurationError(
        `Invalid locator registry (${issues.length} problem(s))`,
        ErrorCode.LOCATOR_INVALID_REGISTRY,
        { issues }
      );
    }

    const sortedArtifacts = [...artifacts.values()].sort(compareArtifacts);
    logger.debug(
      { accessors: accessors.size, artifacts: sortedArtifacts.length },
      "Locator registry loaded"
    );
    return new LocatorRegistry(accessors, sortedArtifacts);
  }

  /**
   * @throws UnknownAccessorError if the name is not registered
   */
  resolve(name: string): Accessor {
    const accessor = this.byName.get(name);
    if (!accessor) {
      throw new UnknownAccessorError(name, suggestNames(name, this.byName.keys()));
    }
    return accessor;
  }

  tryResolve(name: string): Result<Accessor, UnknownAccessorError> {
    const accessor = this.byName.get(name);
    return accessor
      ? ok(accessor)
      : err(new UnknownAccessorError(name, suggestNames(name, this.byName.keys())));
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /** Accessors sorted by name */
  accessors(): Accessor[] {
    return [...this.byName.values()].sort((a, b) => compareStrings(a.name, b.name));
  }

  /** Distinct artifacts sorted by category, then name */
  artifacts(): readonly Artifact[] {
    return this.artifactList;
  }

  get size(): number {
    return this.byName.size;
  }
}
