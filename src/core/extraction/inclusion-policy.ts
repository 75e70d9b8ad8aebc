/**
 * Inclusion Policy
 *
 * Decides whether a type or member is part of the extracted surface.
 * Compiler-synthesized symbols are dropped unless explicitly requested;
 * otherwise declared accessibility decides.
 *
 * @module
 */

import type { Accessibility, MemberSymbol, NamedTypeSymbol } from "../symbols/types.js";
import type { ExtractionOptions } from "./options.js";

export type InclusionOptions = Pick<
  ExtractionOptions,
  "includePrivate" | "includeInternal" | "includeCompilerGenerated"
>;

interface Declared {
  readonly declaredAccessibility: Accessibility;
  readonly isImplicitlyDeclared: boolean;
}

function isIncluded(symbol: Declared, options: InclusionOptions): boolean {
  if (symbol.isImplicitlyDeclared && !options.includeCompilerGenerated) {
    return false;
  }

  switch (symbol.declaredAccessibility) {
    case "Private":
      return options.includePrivate;
    case "Internal":
    case "ProtectedAndInternal":
      return options.includeInternal;
    default:
      return true;
  }
}

export function shouldIncludeType(type: NamedTypeSymbol, options: InclusionOptions): boolean {
  return isIncluded(type, options);
}

export function shouldIncludeMember(member: MemberSymbol, options: InclusionOptions): boolean {
  return isIncluded(member, options);
}
