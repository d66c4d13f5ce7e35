/**
 * Tool catalog module exports.
 *
 * @module catalog
 */

export { tokenize, ToolSearcher } from "./search.js";
export { ToolCatalog, type ToolCatalogOptions } from "./store.js";
export {
  type SearchHit,
  type SearchSource,
  type ToolDescriptor,
  ToolDescriptorSchema,
  type ToolInputSchema,
  ToolInputSchemaSchema,
} from "./types.js";
