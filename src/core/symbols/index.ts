/**
 * Symbol Model Module
 *
 * Loads a symbol dump into the linked, read-only symbol graph the extractor walks.
 *
 * @module
 */

export type * from "./types.js";
export { isTypeSymbol, isMemberSymbol } from "./types.js";
export { displayNamespace, displayType, displayMethod, GLOBAL_NAMESPACE_DISPLAY } from "./display.js";
export { getFullMetadataName } from "./metadata-name.js";
export { SymbolDumpSchema, type SymbolDump, type SymbolDumpInput } from "./metadata-schema.js";
export { parseSymbolDump, loadSymbolSet, loadSymbolSetFromFile } from "./metadata-loader.js";
