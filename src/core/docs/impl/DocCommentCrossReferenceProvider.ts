/**
 * Doc-comment cross references
 *
 * Reads `<exception cref="...">` and `<seealso cref="...">` out of a symbol's
 * documentation XML and resolves each cref against the loaded symbol set.
 *
 * Cref forms: `T:Ns.Type`, `M:Ns.Type.Method(System.Int32)`, `P:`, `F:`, `E:`
 * for members, `N:` for namespaces and `!:` for references the compiler could
 * not bind. Namespace and error references never resolve. A cref without a
 * prefix is tried as a type first, then as a member.
 *
 * @module
 */

import { parseFragment } from "parse5";
import type { DefaultTreeAdapterMap } from "parse5";
import { createLogger } from "../../../utils/logger.js";
import { displayNamespace, displayType } from "../../symbols/display.js";
import { getFullMetadataName } from "../../symbols/metadata-name.js";
import type {
  MemberSymbol,
  NamedTypeSymbol,
  ParameterSymbol,
  SymbolSet,
  TypeSymbol,
} from "../../symbols/types.js";
import type {
  CrossReference,
  DocumentedSymbol,
  ICrossReferenceProvider,
} from "../interfaces/ICrossReferenceProvider.js";

const logger = createLogger("doc-comments");

type P5Node = DefaultTreeAdapterMap["node"];
type P5Element = DefaultTreeAdapterMap["element"];

export class DocCommentCrossReferenceProvider implements ICrossReferenceProvider {
  constructor(private readonly symbols: SymbolSet) {}

  *exceptionTypesFor(symbol: DocumentedSymbol): Iterable<TypeSymbol> {
    for (const cref of crefsOf(symbol, "exception")) {
      const resolved = this.resolveCref(cref);
      if (resolved && resolved.kind === "named") {
        yield resolved;
      }
    }
  }

  *seeAlsoFor(symbol: DocumentedSymbol): Iterable<CrossReference> {
    for (const cref of crefsOf(symbol, "seealso")) {
      const resolved = this.resolveCref(cref);
      if (resolved) {
        yield resolved;
      }
    }
  }

  // ===========================================================================
  // Cref resolution
  // ===========================================================================

  resolveCref(cref: string): NamedTypeSymbol | MemberSymbol | null {
    const colon = cref.indexOf(":");
    const hasPrefix = colon > 0 && colon < 3;
    const prefix = hasPrefix ? cref.slice(0, colon) : "";
    const name = hasPrefix ? cref.slice(colon + 1) : cref;

    switch (prefix) {
      case "T":
        return this.symbols.getTypeByMetadataName(name);
      case "M":
        return this.resolveMethod(name);
      case "P":
      case "F":
      case "E":
        return this.resolveMember(name, null);
      case "":
        return this.symbols.getTypeByMetadataName(name) ?? this.resolveMember(name, null);
      default:
        return null;
    }
  }

  private resolveMethod(name: string): MemberSymbol | null {
    const paren = name.indexOf("(");
    if (paren <= 0) {
      return this.resolveMember(name, null);
    }

    const paramsPart = name.slice(paren + 1).replace(/\)+$/, "");
    const paramTypes = paramsPart === "" ? [] : splitParameterTypes(paramsPart);
    return this.resolveMember(name.slice(0, paren), paramTypes);
  }

  private resolveMember(memberPath: string, paramTypes: string[] | null): MemberSymbol | null {
    const lastDot = memberPath.lastIndexOf(".");
    if (lastDot < 0) return null;

    const type = this.symbols.getTypeByMetadataName(memberPath.slice(0, lastDot));
    if (!type) return null;

    // `#` marks dots inside the member name, e.g. `#ctor` or `I#Method`
    const memberName = memberPath.slice(lastDot + 1).replaceAll("#", ".");
    const candidates = type.members.filter((member) => member.name === memberName);

    const [first] = candidates;
    if (!first) return null;
    if (candidates.length === 1 || paramTypes === null) return first;

    const match = candidates.find(
      (member) => member.kind === "method" && parametersMatch(member.parameters, paramTypes)
    );
    return match ?? first;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function crefsOf(symbol: DocumentedSymbol, tagName: string): string[] {
  const xml = symbol.documentationXml;
  if (xml.trim() === "") return [];

  try {
    const crefs: string[] = [];
    for (const element of descendants(parseFragment(xml), tagName)) {
      const cref = element.attrs.find((attr) => attr.name === "cref")?.value;
      if (cref) crefs.push(cref);
    }
    return crefs;
  } catch (error) {
    logger.debug({ err: error, symbol: symbol.name }, "Unreadable documentation comment");
    return [];
  }
}

function* descendants(node: P5Node, tagName: string): Generator<P5Element> {
  const children = "childNodes" in node ? node.childNodes : [];
  for (const child of children) {
    if ("tagName" in child) {
      if (child.tagName === tagName) yield child;
      yield* descendants(child, tagName);
    }
  }
}

/**
 * Split a cref parameter list at top-level commas, e.g.
 * `System.Int32,System.Collections.Generic.List{System.String}`.
 */
export function splitParameterTypes(paramsPart: string): string[] {
  const types: string[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < paramsPart.length; i++) {
    switch (paramsPart[i]) {
      case "{":
      case "<":
      case "[":
        depth++;
        break;
      case "}":
      case ">":
      case "]":
        depth--;
        break;
      case ",":
        if (depth === 0) {
          types.push(paramsPart.slice(start, i).trim());
          start = i + 1;
        }
        break;
    }
  }

  if (start < paramsPart.length) {
    types.push(paramsPart.slice(start).trim());
  }
  return types;
}

function parametersMatch(parameters: readonly ParameterSymbol[], expected: readonly string[]): boolean {
  if (parameters.length !== expected.length) return false;

  return parameters.every((param, i) => {
    const name = expected[i];
    return (
      name === docIdParameterName(param) ||
      name === getFullMetadataName(param.type) ||
      name === displayType(param.type)
    );
  });
}

function docIdParameterName(param: ParameterSymbol): string {
  return param.refKind === "None" ? docIdTypeName(param.type) : `${docIdTypeName(param.type)}@`;
}

/**
 * Type name in documentation ID form, e.g. `System.Collections.Generic.List{System.String}`,
 * `System.Int32[0:,0:]`, `` `0 `` for a type's first type parameter and `` ``0 `` for a method's.
 */
export function docIdTypeName(type: TypeSymbol): string {
  switch (type.kind) {
    case "array": {
      const bounds = type.rank === 1 ? "" : Array.from({ length: type.rank }, () => "0:").join(",");
      return `${docIdTypeName(type.elementType)}[${bounds}]`;
    }
    case "pointer":
      return `${docIdTypeName(type.pointedAtType)}*`;
    case "typeParameter":
      return type.declaringMethod ? `\`\`${type.ordinal}` : `\`${type.ordinal}`;
    case "named":
      return docIdNamedTypeName(type);
  }
}

function docIdNamedTypeName(type: NamedTypeSymbol): string {
  let prefix = "";
  if (type.containingType) {
    prefix = `${docIdNamedTypeName(type.containingType)}.`;
  } else if (!type.containingNamespace.isGlobalNamespace) {
    prefix = `${displayNamespace(type.containingNamespace)}.`;
  }

  const isConstructed = type.originalDefinition !== type && !type.isUnboundGenericType;
  if (isConstructed) {
    return `${prefix}${type.name}{${type.typeArguments.map(docIdTypeName).join(",")}}`;
  }
  const arity = type.typeParameters.length;
  return arity > 0 ? `${prefix}${type.name}\`${arity}` : `${prefix}${type.name}`;
}
