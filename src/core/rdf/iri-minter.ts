/**
 * IRI Minter
 *
 * Deterministic, hierarchical identifiers for symbols:
 *
 * ```
 * {base}/assembly/{name}/{version}
 * {base}/namespace/_global_ | {base}/namespace/{dotted.path}
 * {base}/type/{module}/{version}/{metadataName} | {base}/type/_builtin_/{metadataName}
 * {typeIri}/member/{name}{signature}
 * {memberIri}/param/{ordinal}
 * {ownerIri}/typeparam/{ordinal}
 * {targetIri}/attr/{index}
 * ```
 *
 * Pure: the same symbol always mints the same string.
 *
 * @module
 */

import { InvalidArgumentError } from "../errors.js";
import { getFullMetadataName } from "../symbols/metadata-name.js";
import { displayNamespace } from "../symbols/display.js";
import type {
  AnySymbol,
  MemberSymbol,
  MethodSymbol,
  ModuleSymbol,
  NamespaceSymbol,
  ParameterSymbol,
  PropertySymbol,
  RefKind,
  TypeParameterSymbol,
  TypeSymbol,
} from "../symbols/types.js";
import { SHARED_ONTOLOGY_NS } from "./ontology.js";

export const DEFAULT_BASE_URI = "http://dotnet.example/";

const UNRESERVED = /^[A-Za-z0-9\-_.~]$/;

/**
 * Percent-encodes everything except ASCII letters, digits and `-_.~`.
 * Non-ASCII characters are encoded as their UTF-8 bytes.
 */
export function escapeIriSegment(value: string): string {
  let escaped = "";
  for (const ch of value) {
    if (UNRESERVED.test(ch)) {
      escaped += ch;
      continue;
    }
    for (const byte of Buffer.from(ch, "utf8")) {
      escaped += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    }
  }
  return escaped;
}

// Out and ref are the same by-reference signature, so they share a marker
const REF_MARKERS: Record<RefKind, string> = {
  None: "",
  Ref: "ref ",
  Out: "ref ",
  In: "in ",
};

function memberSignature(member: MemberSymbol): string {
  if (member.kind === "method") {
    const params = member.parameters.map(
      (p) => `${REF_MARKERS[p.refKind]}${getFullMetadataName(p.type)}`
    );
    return `(${params.join(",")})`;
  }
  if (member.kind === "property" && member.isIndexer) {
    return `[${member.parameters.map((p) => getFullMetadataName(p.type)).join(",")}]`;
  }
  return "";
}

function containingModuleOf(type: TypeSymbol): ModuleSymbol | null {
  switch (type.kind) {
    case "named":
      return type.containingModule;
    case "typeParameter":
      if (type.declaringType) return type.declaringType.containingModule;
      return type.declaringMethod?.containingType.containingModule ?? null;
    case "array":
    case "pointer":
      return null;
  }
}

export class IriMinter {
  /** Base URI without trailing slashes */
  readonly baseUri: string;

  constructor(baseUri: string = DEFAULT_BASE_URI) {
    this.baseUri = baseUri.replace(/\/+$/, "");
  }

  get ontologyPrefix(): string {
    return SHARED_ONTOLOGY_NS;
  }

  /** Ontology for platform-specific terms, scoped under the base URI */
  get platformOntologyPrefix(): string {
    return `${this.baseUri}/ontology/`;
  }

  module(module: ModuleSymbol): string {
    return `${this.baseUri}/assembly/${escapeIriSegment(module.name)}/${escapeIriSegment(module.version)}`;
  }

  namespace(ns: NamespaceSymbol): string {
    if (ns.isGlobalNamespace) return `${this.baseUri}/namespace/_global_`;
    return `${this.baseUri}/namespace/${escapeIriSegment(displayNamespace(ns))}`;
  }

  type(type: TypeSymbol): string {
    const name = escapeIriSegment(getFullMetadataName(type));
    const module = containingModuleOf(type);
    if (!module) return `${this.baseUri}/type/_builtin_/${name}`;
    return `${this.baseUri}/type/${escapeIriSegment(module.name)}/${escapeIriSegment(module.version)}/${name}`;
  }

  member(member: MemberSymbol): string {
    const signature = memberSignature(member);
    // Signature escaped with the name: raw parentheses, commas and spaces are not valid in N-Triples IRIs
    return `${this.type(member.containingType)}/member/${escapeIriSegment(member.name + signature)}`;
  }

  parameter(owner: MethodSymbol | PropertySymbol, param: ParameterSymbol): string {
    return `${this.member(owner)}/param/${param.ordinal}`;
  }

  typeParameter(owner: AnySymbol, typeParam: TypeParameterSymbol): string {
    let ownerIri: string;
    if (owner.kind === "named") {
      ownerIri = this.type(owner);
    } else if (owner.kind === "method") {
      ownerIri = this.member(owner);
    } else {
      throw new InvalidArgumentError(
        `Type parameter '${typeParam.name}' cannot be owned by a ${owner.kind}`,
        { argument: "owner", ownerKind: owner.kind }
      );
    }
    return `${ownerIri}/typeparam/${typeParam.ordinal}`;
  }

  attribute(target: AnySymbol, index: number): string {
    return `${this.attributeTarget(target)}/attr/${index}`;
  }

  private attributeTarget(target: AnySymbol): string {
    switch (target.kind) {
      case "module":
        return this.module(target);
      case "named":
        return this.type(target);
      case "method":
      case "property":
      case "field":
      case "event":
        return this.member(target);
      case "parameter":
        return this.parameter(target.containingSymbol, target);
      default:
        throw new InvalidArgumentError(`Attributes cannot target a ${target.kind}`, {
          argument: "target",
          targetKind: target.kind,
        });
    }
  }
}
