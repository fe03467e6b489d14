/**
 * Renderer Module
 *
 * @module
 */

export {
  SCRIPT_STYLE,
  nodeIds,
  pageFileName,
  quote,
  renderDot,
  type Grouping,
  type RenderOptions,
} from "./dot-renderer.js";
export { parseDot } from "./dot-parser.js";
export {
  buildSchemaDocument,
  type AccessorSchema,
  type SchemaDocument,
} from "./schema-document.js";
