/**
 * Locator Module
 *
 * @module
 */

export { ACCESSOR_NAME_PATTERN, LocatorRegistry, type AccessorDefinition } from "./registry.js";
export {
  ArtifactSelection,
  artifactKey,
  compareArtifacts,
  formatPath,
  isTemplated,
  placeholderFor,
  placeholdersOf,
} from "./artifact.js";
