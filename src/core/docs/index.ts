/**
 * Documentation Cross-Reference Module
 *
 * @module
 */

export type {
  CrossReference,
  DocumentedSymbol,
  ICrossReferenceProvider,
} from "./interfaces/ICrossReferenceProvider.js";
export {
  DocCommentCrossReferenceProvider,
  docIdTypeName,
  splitParameterTypes,
} from "./impl/DocCommentCrossReferenceProvider.js";
