/**
 * Catalog Module
 *
 * @module
 */

export { loadCatalog, parseCatalog, type Catalog } from "./catalog-loader.js";
export {
  loadProjectConfig,
  resolveProjectConfig,
  type LoadProjectConfigOptions,
  type ResolvedProjectConfig,
} from "./project-config.js";
