/**
 * Project-relative locations and the bundled catalog
 */

import * as path from "node:path";
import { fileURLToPath } from "node:url";

export const CONFIG_FILE = "artifact-flow.config.json";

export function getProjectRoot(): string {
  return process.cwd();
}

export function getConfigPath(projectRoot: string = getProjectRoot()): string {
  return path.join(projectRoot, CONFIG_FILE);
}

/**
 * Directory of catalogs shipped with the package.
 * src/utils and dist/utils both sit two levels below the package root.
 */
export function getBundledCatalogDir(): string {
  return fileURLToPath(new URL("../../catalog/", import.meta.url));
}

export function getBundledCatalogPath(): string {
  return path.join(getBundledCatalogDir(), "urban-energy.json");
}
