/**
 * Project configuration (artifact-flow.config.json)
 *
 * @module
 */

import * as path from "node:path";
import { err, ok, type Result } from "../../types/result.js";
import {
  createLogger,
  getConfigPath,
  getProjectRoot,
  isMissingFileError,
  readJsonFile,
} from "../../utils/index.js";
import { ProjectConfigSchema, safeValidate, type ProjectConfig } from "../../utils/validation.js";
import { ConfigurationError, ErrorCode } from "../errors.js";

const logger = createLogger("config");

/**
 * Configuration with every path made absolute
 */
export interface ResolvedProjectConfig extends ProjectConfig {
  projectRoot: string;
  /** The file the settings came from; absent when defaults are in use */
  configPath?: string;
}

export interface LoadProjectConfigOptions {
  projectRoot?: string;
  /** Explicit configuration file; it must exist */
  configPath?: string;
}

/**
 * Loads the project configuration. A missing default file yields the defaults;
 * a missing explicit file is an error.
 */
export async function loadProjectConfig(
  options: LoadProjectConfigOptions = {}
): Promise<Result<ResolvedProjectConfig, ConfigurationError>> {
  const projectRoot = path.resolve(options.projectRoot ?? getProjectRoot());
  const explicit = options.configPath !== undefined;
  const configPath = path.resolve(projectRoot, options.configPath ?? getConfigPath(projectRoot));

  let data: unknown;
  try {
    data = await readJsonFile(configPath);
  } catch (error) {
    if (isMissingFileError(error) && !explicit) {
      logger.debug({ configPath }, "No project configuration; using defaults");
      return ok(resolveProjectConfig(ProjectConfigSchema.parse({}), projectRoot));
    }
    if (isMissingFileError(error)) {
      return err(
        new ConfigurationError(
          `Configuration file not found: ${configPath}`,
          ErrorCode.CONFIG_NOT_FOUND,
          { configPath }
        )
      );
    }
    const reason = error instanceof Error ? error.message : String(error);
    return err(
      new ConfigurationError(`Configuration ${configPath} is not valid JSON`, ErrorCode.CONFIG_INVALID, {
        configPath,
        issues: [reason],
      })
    );
  }

  const validated = safeValidate(ProjectConfigSchema, data);
  if (!validated.ok) {
    return err(
      new ConfigurationError(`Invalid configuration ${configPath}`, ErrorCode.CONFIG_INVALID, {
        configPath,
        issues: validated.error,
      })
    );
  }

  logger.debug({ configPath }, "Project configuration loaded");
  return ok(resolveProjectConfig(validated.value, projectRoot, configPath));
}

/**
 * Makes `catalog` relative to the configuration file and `outputDir` relative
 * to the project root absolute
 */
export function resolveProjectConfig(
  config: ProjectConfig,
  projectRoot: string,
  configPath?: string
): ResolvedProjectConfig {
  const base = configPath ? path.dirname(configPath) : projectRoot;
  return {
    ...config,
    catalog: config.catalog !== undefined ? path.resolve(base, config.catalog) : undefined,
    outputDir: path.resolve(projectRoot, config.outputDir),
    projectRoot,
    configPath,
  };
}
