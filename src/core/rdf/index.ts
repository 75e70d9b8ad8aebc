/**
 * RDF Vocabulary & IRI Minting
 *
 * @module
 */

export * from "./ontology.js";
export { IriMinter, escapeIriSegment, DEFAULT_BASE_URI } from "./iri-minter.js";
