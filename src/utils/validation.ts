/**
 * Runtime Validation Schemas
 *
 * Zod schemas for the artifact catalog and the project configuration.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";
import { err, ok, type Result } from "../types/result.js";

// =============================================================================
// Catalog Schema
// =============================================================================

export const ArtifactKindSchema = z.enum([
  "weather",
  "gis",
  "spreadsheet-archetype",
  "tabular-property",
  "computed-result",
  "json-metadata",
]);

export const DirectionSchema = z.enum(["read", "write"]);

/**
 * One registered accessor and the artifact it resolves
 */
export const AccessorEntrySchema = z.object({
  name: z.string().min(1),
  /** Directory of the artifact, relative to the scenario */
  category: z.string().min(1),
  /** File name; may contain placeholders such as {BUILDING} */
  nameTemplate: z.string().min(1),
  kind: ArtifactKindSchema,
  direction: DirectionSchema,
  description: z.string().optional(),
});

export type AccessorEntry = z.infer<typeof AccessorEntrySchema>;

export const ArtifactSelectorSchema = z.object({
  category: z.string().min(1),
  name: z.string().min(1).optional(),
});

export const DeclaredCallSchema = z.object({
  accessor: z.string().min(1),
  direction: DirectionSchema.optional(),
  /** Placeholder values keyed by parameter name, e.g. { "building": "B001" } */
  params: z.record(z.string().regex(/^[A-Za-z][A-Za-z0-9_]*$/), z.string().min(1)).optional(),
});

export const DeclaredScriptSchema = z.object({
  /** Also names the script's documentation page, so no path separators */
  name: z
    .string()
    .regex(
      /^[A-Za-z][A-Za-z0-9_.-]*$/,
      'script names start with a letter and use letters, digits, "_", "-" or "."'
    ),
  description: z.string().optional(),
  calls: z.array(DeclaredCallSchema),
});

export type DeclaredScriptEntry = z.infer<typeof DeclaredScriptSchema>;

/**
 * Artifact catalog document
 */
export const CatalogSchema = z.object({
  version: z.literal(1),
  accessors: z.array(AccessorEntrySchema).min(1),
  /** Artifacts supplied from outside the pipeline (user data, reference databases) */
  externalArtifacts: z.array(ArtifactSelectorSchema).default([]),
  /** Final deliverables nobody inside the pipeline is expected to read */
  publishedOutputs: z.array(ArtifactSelectorSchema).default([]),
  scripts: z.array(DeclaredScriptSchema).default([]),
});

export type CatalogDocument = z.infer<typeof CatalogSchema>;

// =============================================================================
// Project Configuration Schema
// =============================================================================

/**
 * Project configuration schema (artifact-flow.config.json)
 */
export const ProjectConfigSchema = z.object({
  /** Catalog path, relative to the configuration file; the bundled catalog when absent */
  catalog: z.string().min(1).optional(),

  /** Root segment of dry-run paths */
  scenario: z.string().min(1).default("{SCENARIO}"),

  /** Number of dry runs in flight; available cores when absent */
  concurrency: z.number().int().positive().optional(),

  /** Where rendered graphs and documents are written */
  outputDir: z.string().min(1).default("docs/graphs"),

  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).optional(),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Safely validate data against a schema
 *
 * @returns The parsed data, or the readable issue list
 */
export function safeValidate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): Result<T, string[]> {
  const result = schema.safeParse(data);
  if (result.success) {
    return ok(result.data);
  }
  return err(formatZodError(result.error));
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
