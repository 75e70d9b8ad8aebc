/**
 * ICrossReferenceProvider - Extra edges derived from documentation
 *
 * Supplies the targets of `throws` and `relatedTo` edges for a symbol.
 * Both sequences are lazy and finite, in source order. Anything that cannot
 * be resolved is left out rather than reported.
 *
 * @module
 */

import type { MemberSymbol, NamedTypeSymbol, TypeSymbol } from "../../symbols/types.js";

/** Symbols that carry documentation the provider can read */
export type DocumentedSymbol = NamedTypeSymbol | MemberSymbol;

/** A see-also target: either a type or a member */
export type CrossReference = TypeSymbol | MemberSymbol;

export interface ICrossReferenceProvider {
  /**
   * Exception types the symbol is documented to throw
   */
  exceptionTypesFor(symbol: DocumentedSymbol): Iterable<TypeSymbol>;

  /**
   * Types and members the symbol's documentation points to
   */
  seeAlsoFor(symbol: DocumentedSymbol): Iterable<CrossReference>;
}
