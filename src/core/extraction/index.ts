/**
 * Graph Extraction Module
 *
 * Turns a loaded symbol set into triples:
 * - Inclusion policy decides which types and members are part of the surface
 * - The extractor walks the target module and writes to a triple sink
 *
 * @module
 */

// =============================================================================
// Options
// =============================================================================

export {
  DEFAULT_EXTRACTION_OPTIONS,
  resolveExtractionOptions,
  type ExtractionOptions,
  type ExtractionOptionsInput,
} from "./options.js";

export {
  shouldIncludeType,
  shouldIncludeMember,
  type InclusionOptions,
} from "./inclusion-policy.js";

// =============================================================================
// Extractor
// =============================================================================

export {
  SymbolGraphExtractor,
  MAX_TYPE_DEPTH,
  allTypes,
  type ExtractionStats,
} from "./graph-extractor.js";

export {
  formatConstantValue,
  formatTypedConstant,
  formatConstructorArguments,
  formatNamedArguments,
} from "./attribute-format.js";
