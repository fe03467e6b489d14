/**
 * Catalog Loader
 *
 * Reads an artifact catalog (accessors, external and published artifact
 * selectors, declared scripts), validates it with zod and turns it into the
 * frozen registry and script definitions the pipeline consumes.
 *
 * @module
 */

import * as path from "node:path";
import type { DeclaredScript } from "../../types/index.js";
import { err, isErr, ok, type Result } from "../../types/result.js";
import {
  createLogger,
  getBundledCatalogPath,
  isMissingFileError,
  readJsonFile,
} from "../../utils/index.js";
import { CatalogSchema, safeValidate, type CatalogDocument } from "../../utils/validation.js";
import { ConfigurationError, ErrorCode } from "../errors.js";
import { ArtifactSelection, LocatorRegistry } from "../locator/index.js";

const logger = createLogger("catalog");

export interface Catalog {
  /** File the catalog came from, or a label for in-memory documents */
  source: string;
  registry: LocatorRegistry;
  scripts: DeclaredScript[];
  externalArtifacts: ArtifactSelection;
  publishedOutputs: ArtifactSelection;
}

/**
 * Validates a parsed catalog document
 */
export function parseCatalog(
  data: unknown,
  source: string = "<inline>"
): Result<Catalog, ConfigurationError> {
  const validated = safeValidate(CatalogSchema, data);
  if (!validated.ok) {
    return err(
      new ConfigurationError(`Invalid catalog ${source}`, ErrorCode.CATALOG_INVALID, {
        source,
        issues: validated.error,
      })
    );
  }
  const document = validated.value;

  let registry: LocatorRegistry;
  try {
    registry = LocatorRegistry.fromEntries(document.accessors);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return err(
        new ConfigurationError(`Invalid catalog ${source}`, ErrorCode.CATALOG_INVALID, {
          source,
          issues: error.issues,
        })
      );
    }
    throw error;
  }

  const issues = scriptIssues(document, registry);
  if (issues.length > 0) {
    return err(
      new ConfigurationError(`Invalid catalog ${source}`, ErrorCode.CATALOG_INVALID, {
        source,
        issues,
      })
    );
  }

  const scripts = document.scripts.map(
    (script): DeclaredScript => ({
      kind: "declared",
      name: script.name,
      description: script.description,
      calls: script.calls,
    })
  );

  return ok({
    source,
    registry,
    scripts,
    externalArtifacts: new ArtifactSelection(document.externalArtifacts),
    publishedOutputs: new ArtifactSelection(document.publishedOutputs),
  });
}

/**
 * Loads a catalog file; the bundled urban-energy catalog when no path is given
 *
 * @throws ConfigurationError when the file is missing, is not JSON or does not validate
 */
export async function loadCatalog(filePath?: string): Promise<Catalog> {
  const source = path.resolve(filePath ?? getBundledCatalogPath());

  let data: unknown;
  try {
    data = await readJsonFile(source);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigurationError(`Catalog not found: ${source}`, ErrorCode.CONFIG_NOT_FOUND, {
        source,
      });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Catalog ${source} is not valid JSON`, ErrorCode.CATALOG_INVALID, {
      source,
      issues: [reason],
    });
  }

  const parsed = parseCatalog(data, source);
  if (isErr(parsed)) {
    logger.warn({ source, issues: parsed.error.issues }, "Catalog rejected");
    throw parsed.error;
  }

  logger.info(
    {
      source,
      accessors: parsed.value.registry.size,
      scripts: parsed.value.scripts.length,
    },
    "Catalog loaded"
  );
  return parsed.value;
}

function scriptIssues(document: CatalogDocument, registry: LocatorRegistry): string[] {
  const issues: string[] = [];
  const seen = new Set<string>();

  document.scripts.forEach((script, index) => {
    if (seen.has(script.name)) {
      issues.push(`scripts.${index}.name: script "${script.name}" is declared more than once`);
    }
    seen.add(script.name);

    script.calls.forEach((call, callIndex) => {
      const resolved = registry.tryResolve(call.accessor);
      if (isErr(resolved)) {
        issues.push(`scripts.${index}.calls.${callIndex}.accessor: ${resolved.error.message}`);
      }
    });
  });

  return issues;
}
