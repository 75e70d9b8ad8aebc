/**
 * Symbol Graph Extractor
 *
 * Walks the type surface of one module and emits it as triples:
 *
 * 1. Module facts
 * 2. Every type declared in the module's namespace tree (nested types included),
 *    filtered by the inclusion policy
 * 3. Per type: traits, relationships, type parameters, generic shape,
 *    attributes, documentation cross-references, then its members
 *
 * Types from other modules are emitted on first reach with a reduced fact
 * set. A reference to an included type of the target module only yields its
 * IRI; the top-level walk describes it in full. Visited sets keyed by IRI
 * make every emission happen once and break reference cycles.
 *
 * @module
 */

import { ErrorCode, ExtractionError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { IriMinter } from "../rdf/iri-minter.js";
import {
  AsmProps,
  AttrProps,
  AttrRels,
  Classes,
  MemberProps,
  MemberRels,
  NsProps,
  NsRels,
  ParamProps,
  ParamRels,
  PLATFORM_LANGUAGE,
  PLATFORM_PREFIX,
  RDF_NS,
  RDF_TYPE,
  RDFS_NS,
  SHARED_PREFIX,
  TypeArgProps,
  TypeParamProps,
  TypeParamRels,
  TypeProps,
  TypeRels,
  XSD_NS,
} from "../rdf/ontology.js";
import type { ITripleSink } from "../sink/interfaces/ITripleSink.js";
import { displayNamespace, displayType } from "../symbols/display.js";
import type {
  AnySymbol,
  ArrayTypeSymbol,
  AttributeData,
  EventSymbol,
  FieldSymbol,
  MethodKind,
  MethodSymbol,
  ModuleSymbol,
  NamedTypeSymbol,
  NamespaceSymbol,
  ParameterSymbol,
  PointerTypeSymbol,
  PropertySymbol,
  SymbolSet,
  TypeParameterSymbol,
  TypeSymbol,
} from "../symbols/types.js";
import { isTypeSymbol } from "../symbols/types.js";
import type {
  DocumentedSymbol,
  ICrossReferenceProvider,
} from "../docs/interfaces/ICrossReferenceProvider.js";
import { DocCommentCrossReferenceProvider } from "../docs/impl/DocCommentCrossReferenceProvider.js";
import {
  formatConstantValue,
  formatConstructorArguments,
  formatNamedArguments,
} from "./attribute-format.js";
import { shouldIncludeMember, shouldIncludeType } from "./inclusion-policy.js";
import {
  resolveExtractionOptions,
  type ExtractionOptions,
  type ExtractionOptionsInput,
} from "./options.js";

const logger = createLogger("extractor");

/** Nesting limit for referenced types (generic arguments, array elements, ...) */
export const MAX_TYPE_DEPTH = 256;

/**
 * Method kinds extracted as members. Accessors, event handlers and delegate
 * invokes are described through their property, event or delegate type.
 */
const EXTRACTED_METHOD_KINDS: ReadonlySet<MethodKind> = new Set<MethodKind>([
  "Ordinary",
  "Constructor",
  "StaticConstructor",
  "Destructor",
  "UserDefinedOperator",
  "Conversion",
]);

/**
 * Result of one extraction run.
 */
export interface ExtractionStats {
  /** Types that passed the inclusion policy */
  typeCount: number;
  /** Triples emitted by the sink so far */
  tripleCount: number;
  durationMs: number;
}

/**
 * Extracts a module's type graph into a triple sink.
 *
 * @example
 * ```typescript
 * const sink = new MemoryTripleSink();
 * const extractor = new SymbolGraphExtractor(sink, { includePrivate: true });
 * const stats = extractor.extract(symbols, symbols.targetModule);
 * await sink.close();
 * ```
 */
export class SymbolGraphExtractor {
  readonly options: ExtractionOptions;
  readonly iris: IriMinter;
  private readonly emittedTypes = new Set<string>();
  private readonly emittedNamespaces = new Set<string>();
  private crossReferences: ICrossReferenceProvider | null = null;
  private target: ModuleSymbol | null = null;
  private moduleIri = "";
  private depth = 0;

  /**
   * @param crossReferences - Source of `throws`/`relatedTo` edges. When omitted,
   *   documentation comments of the extracted symbol set are used; pass `null`
   *   to disable.
   */
  constructor(
    private readonly sink: ITripleSink,
    options: ExtractionOptionsInput = {},
    private readonly configuredCrossReferences?: ICrossReferenceProvider | null
  ) {
    this.options = resolveExtractionOptions(options);
    this.iris = new IriMinter(this.options.baseUri);

    sink.addPrefix("rdf", RDF_NS);
    sink.addPrefix("rdfs", RDFS_NS);
    sink.addPrefix("xsd", XSD_NS);
    sink.addPrefix(SHARED_PREFIX, this.iris.ontologyPrefix);
    sink.addPrefix(PLATFORM_PREFIX, this.iris.platformOntologyPrefix);
  }

  // ===========================================================================
  // Run
  // ===========================================================================

  /**
   * Emit the graph of `target`. Aborting `signal` stops the walk before the
   * next top-level type with an EXTRACTION_ABORTED error.
   */
  extract(symbols: SymbolSet, target: ModuleSymbol, signal?: AbortSignal): ExtractionStats {
    const startTime = Date.now();
    this.emittedTypes.clear();
    this.emittedNamespaces.clear();
    this.depth = 0;
    this.crossReferences =
      this.configuredCrossReferences === undefined
        ? new DocCommentCrossReferenceProvider(symbols)
        : this.configuredCrossReferences;

    logger.info({ module: target.name, version: target.version }, "Extracting module");

    this.target = target;
    this.moduleIri = this.extractModule(target);

    let typeCount = 0;
    for (const type of allTypes(target.globalNamespace)) {
      if (signal?.aborted) {
        throw new ExtractionError("Extraction aborted", ErrorCode.EXTRACTION_ABORTED, {
          module: target.name,
          typeCount,
        });
      }
      if (shouldIncludeType(type, this.options)) {
        this.extractType(type);
        typeCount++;
      }
    }

    const stats: ExtractionStats = {
      typeCount,
      tripleCount: this.sink.tripleCount,
      durationMs: Date.now() - startTime,
    };
    logger.info(stats, "Extraction complete");
    return stats;
  }

  // ===========================================================================
  // Predicates
  // ===========================================================================

  private tg(name: string): string {
    return `${this.iris.ontologyPrefix}${name}`;
  }

  private dn(name: string): string {
    return `${this.iris.platformOntologyPrefix}${name}`;
  }

  private tag(subject: string, className: string): void {
    this.sink.emitIri(subject, RDF_TYPE, this.tg(className));
  }

  // ===========================================================================
  // Module
  // ===========================================================================

  private extractModule(module: ModuleSymbol): string {
    const iri = this.iris.module(module);
    const { sink } = this;

    this.tag(iri, Classes.Assembly);
    sink.emitLiteral(iri, this.tg(AsmProps.name), module.name);
    sink.emitLiteral(iri, this.tg(AsmProps.version), module.version);
    if (module.culture !== "") {
      sink.emitLiteral(iri, this.dn(AsmProps.culture), module.culture);
    }
    if (module.publicKeyToken !== "") {
      sink.emitLiteral(iri, this.dn(AsmProps.publicKeyToken), module.publicKeyToken);
    }
    sink.emitBool(iri, this.dn(AsmProps.isInteractive), module.isInteractive);
    sink.emitLiteral(iri, this.tg(TypeProps.language), PLATFORM_LANGUAGE);

    this.extractAttributes(iri, module, module.attributes);
    return iri;
  }

  // ===========================================================================
  // Types
  // ===========================================================================

  private extractType(type: NamedTypeSymbol): void {
    const typeIri = this.iris.type(type);
    if (this.emittedTypes.has(typeIri)) return;
    this.emittedTypes.add(typeIri);

    logger.debug({ type: displayType(type) }, "Extracting type");
    const { sink } = this;

    this.tag(typeIri, Classes.Type);
    this.tag(typeIri, typeClass(type));

    sink.emitLiteral(typeIri, this.tg(TypeProps.name), type.name);
    sink.emitLiteral(typeIri, this.tg(TypeProps.fullName), displayType(type));
    sink.emitLiteral(typeIri, this.tg(TypeProps.typeKind), type.typeKind);
    sink.emitLiteral(typeIri, this.tg(TypeProps.accessibility), type.declaredAccessibility);

    sink.emitBool(typeIri, this.tg(TypeProps.isAbstract), type.isAbstract);
    sink.emitBool(typeIri, this.tg(TypeProps.isSealed), type.isSealed);
    sink.emitBool(typeIri, this.tg(TypeProps.isStatic), type.isStatic);
    sink.emitBool(typeIri, this.tg(TypeProps.isGeneric), type.typeArguments.length > 0);
    sink.emitBool(typeIri, this.tg(TypeProps.isValueType), type.isValueType);
    sink.emitBool(typeIri, this.tg(TypeProps.isRecord), type.isRecord);
    sink.emitBool(typeIri, this.dn(TypeProps.isRefLikeType), type.isRefLikeType);
    sink.emitBool(typeIri, this.tg(TypeProps.isReadOnly), type.isReadOnly);
    sink.emitBool(typeIri, this.dn(TypeProps.isUnmanagedType), type.isUnmanagedType);

    if (type.specialType !== null) {
      sink.emitLiteral(typeIri, this.dn(TypeProps.specialType), type.specialType);
    }
    if (type.typeKind === "Enum" && type.enumUnderlyingType) {
      sink.emitIri(
        typeIri,
        this.dn(TypeProps.enumUnderlyingType),
        this.ensureTypeEmitted(type.enumUnderlyingType)
      );
    }

    sink.emitIri(typeIri, this.tg(TypeRels.definedInAssembly), this.moduleIri);

    if (!type.containingNamespace.isGlobalNamespace) {
      sink.emitIri(
        typeIri,
        this.tg(TypeRels.inNamespace),
        this.ensureNamespaceEmitted(type.containingNamespace)
      );
    }

    if (type.baseType && type.baseType.specialType !== "System_Object") {
      sink.emitIri(typeIri, this.tg(TypeRels.inherits), this.ensureTypeEmitted(type.baseType));
    }

    for (const iface of type.interfaces) {
      sink.emitIri(typeIri, this.tg(TypeRels.implements), this.ensureTypeEmitted(iface));
    }

    if (type.containingType) {
      sink.emitIri(typeIri, this.tg(TypeRels.nestedIn), this.iris.type(type.containingType));
    }

    for (const tp of type.typeParameters) {
      this.extractTypeParameter(typeIri, type, tp);
    }

    if (isConstructedGeneric(type)) {
      sink.emitIri(
        typeIri,
        this.tg(TypeRels.genericDefinition),
        this.iris.type(type.originalDefinition)
      );
      this.emitTypeArguments(typeIri, type);
    }

    this.extractAttributes(typeIri, type, type.attributes);
    this.extractCrossReferences(typeIri, type);

    for (const member of type.members) {
      if (!shouldIncludeMember(member, this.options)) continue;

      switch (member.kind) {
        case "method":
          if (EXTRACTED_METHOD_KINDS.has(member.methodKind)) {
            this.extractMethod(typeIri, member);
          }
          break;
        case "property":
          this.extractProperty(typeIri, member);
          break;
        case "field":
          this.extractField(typeIri, member);
          break;
        case "event":
          this.extractEvent(typeIri, member);
          break;
      }
    }
  }

  /**
   * Mint the IRI of a referenced type, emitting a reduced description the
   * first time it is reached. Members of referenced types are never walked.
   */
  private ensureTypeEmitted(type: TypeSymbol): string {
    if (this.depth >= MAX_TYPE_DEPTH) {
      throw new ExtractionError(
        `Type reference nesting exceeds ${MAX_TYPE_DEPTH} levels at ${displayType(type)}`,
        ErrorCode.EXTRACTION_DEPTH_EXCEEDED,
        { type: displayType(type) }
      );
    }

    this.depth++;
    try {
      switch (type.kind) {
        case "array":
          return this.ensureArrayTypeEmitted(type);
        case "pointer":
          return this.ensurePointerTypeEmitted(type);
        case "typeParameter":
          return this.iris.type(type);
        case "named":
          return this.ensureNamedTypeEmitted(type);
      }
    } finally {
      this.depth--;
    }
  }

  private ensureNamedTypeEmitted(type: NamedTypeSymbol): string {
    const typeIri = this.iris.type(type);
    if (this.emittedTypes.has(typeIri)) return typeIri;

    // `ICol<T>` in `MyList<T> : ICol<T>` shares its definition's IRI
    const definition = type.originalDefinition;
    if (type !== definition && typeIri === this.iris.type(definition)) {
      return this.ensureNamedTypeEmitted(definition);
    }

    // Left unvisited: the top-level walk describes it in full
    if (this.isExtractedDefinition(type)) return typeIri;

    this.emittedTypes.add(typeIri);
    if (!this.options.includeExternalTypes) return typeIri;

    const { sink } = this;
    this.tag(typeIri, Classes.Type);
    sink.emitLiteral(typeIri, this.tg(TypeProps.name), type.name);
    sink.emitLiteral(typeIri, this.tg(TypeProps.fullName), displayType(type));
    sink.emitLiteral(typeIri, this.tg(TypeProps.typeKind), type.typeKind);

    if (type.containingModule) {
      sink.emitIri(
        typeIri,
        this.tg(TypeRels.definedInAssembly),
        this.iris.module(type.containingModule)
      );
    }

    if (!type.containingNamespace.isGlobalNamespace) {
      sink.emitIri(
        typeIri,
        this.tg(TypeRels.inNamespace),
        this.ensureNamespaceEmitted(type.containingNamespace)
      );
    }

    if (isConstructedGeneric(type)) {
      sink.emitIri(
        typeIri,
        this.tg(TypeRels.genericDefinition),
        this.ensureTypeEmitted(type.originalDefinition)
      );
      this.emitTypeArguments(typeIri, type);
    }

    return typeIri;
  }

  private isExtractedDefinition(type: NamedTypeSymbol): boolean {
    return (
      type === type.originalDefinition &&
      type.containingModule === this.target &&
      shouldIncludeType(type, this.options)
    );
  }

  private ensureArrayTypeEmitted(type: ArrayTypeSymbol): string {
    const typeIri = this.iris.type(type);
    if (this.emittedTypes.has(typeIri)) return typeIri;
    this.emittedTypes.add(typeIri);

    const { sink } = this;
    this.tag(typeIri, Classes.Type);
    sink.emitLiteral(typeIri, this.tg(TypeProps.name), displayType(type));
    sink.emitLiteral(typeIri, this.tg(TypeProps.typeKind), "Array");
    sink.emitInt(typeIri, this.tg(TypeProps.arrayRank), type.rank);
    sink.emitIri(
      typeIri,
      this.tg(TypeRels.arrayElementType),
      this.ensureTypeEmitted(type.elementType)
    );
    return typeIri;
  }

  private ensurePointerTypeEmitted(type: PointerTypeSymbol): string {
    const typeIri = this.iris.type(type);
    if (this.emittedTypes.has(typeIri)) return typeIri;
    this.emittedTypes.add(typeIri);

    const { sink } = this;
    this.tag(typeIri, Classes.Type);
    sink.emitLiteral(typeIri, this.tg(TypeProps.name), displayType(type));
    sink.emitLiteral(typeIri, this.tg(TypeProps.typeKind), "Pointer");
    sink.emitIri(
      typeIri,
      this.tg(TypeRels.pointerElementType),
      this.ensureTypeEmitted(type.pointedAtType)
    );
    return typeIri;
  }

  /**
   * Type arguments become `{typeIri}/typearg/{i}` nodes so their order is queryable.
   */
  private emitTypeArguments(typeIri: string, type: NamedTypeSymbol): void {
    type.typeArguments.forEach((arg, index) => {
      const argIri = this.ensureTypeEmitted(arg);
      const argNodeIri = `${typeIri}/typearg/${index}`;
      this.sink.emitIri(typeIri, this.tg(TypeRels.typeArgument), argNodeIri);
      this.sink.emitInt(argNodeIri, this.tg(TypeArgProps.index), index);
      this.sink.emitIri(argNodeIri, this.tg(TypeArgProps.type), argIri);
    });
  }

  private ensureNamespaceEmitted(ns: NamespaceSymbol): string {
    const nsIri = this.iris.namespace(ns);
    if (this.emittedNamespaces.has(nsIri)) return nsIri;
    this.emittedNamespaces.add(nsIri);

    this.tag(nsIri, Classes.Namespace);
    this.sink.emitLiteral(nsIri, this.tg(NsProps.name), ns.name);
    this.sink.emitLiteral(nsIri, this.tg(NsProps.fullName), displayNamespace(ns));

    const parent = ns.containingNamespace;
    if (parent && !parent.isGlobalNamespace) {
      this.sink.emitIri(
        nsIri,
        this.tg(NsRels.parentNamespace),
        this.ensureNamespaceEmitted(parent)
      );
    }
    return nsIri;
  }

  private extractTypeParameter(
    ownerIri: string,
    owner: NamedTypeSymbol | MethodSymbol,
    tp: TypeParameterSymbol
  ): void {
    const tpIri = this.iris.typeParameter(owner, tp);
    const { sink } = this;

    this.tag(tpIri, Classes.TypeParameter);
    sink.emitLiteral(tpIri, this.tg(TypeParamProps.name), tp.name);
    sink.emitInt(tpIri, this.tg(TypeParamProps.ordinal), tp.ordinal);
    sink.emitLiteral(tpIri, this.tg(TypeParamProps.variance), tp.variance);

    sink.emitBool(tpIri, this.dn(TypeParamProps.hasReferenceTypeConstraint), tp.hasReferenceTypeConstraint);
    sink.emitBool(tpIri, this.dn(TypeParamProps.hasValueTypeConstraint), tp.hasValueTypeConstraint);
    sink.emitBool(tpIri, this.dn(TypeParamProps.hasUnmanagedTypeConstraint), tp.hasUnmanagedTypeConstraint);
    sink.emitBool(tpIri, this.dn(TypeParamProps.hasNotNullConstraint), tp.hasNotNullConstraint);
    sink.emitBool(tpIri, this.dn(TypeParamProps.hasConstructorConstraint), tp.hasConstructorConstraint);

    sink.emitIri(ownerIri, this.tg(TypeRels.hasTypeParameter), tpIri);
    sink.emitIri(tpIri, this.tg(TypeParamRels.typeParameterOf), ownerIri);

    for (const constraint of tp.constraintTypes) {
      sink.emitIri(
        tpIri,
        this.tg(TypeParamRels.constrainedToType),
        this.ensureTypeEmitted(constraint)
      );
    }
  }

  // ===========================================================================
  // Members
  // ===========================================================================

  private emitMemberHeader(
    memberIri: string,
    memberClass: string,
    member: { name: string; declaredAccessibility: string }
  ): void {
    this.tag(memberIri, Classes.Member);
    this.tag(memberIri, memberClass);
    this.sink.emitLiteral(memberIri, this.tg(MemberProps.name), member.name);
    this.sink.emitLiteral(memberIri, this.tg(MemberProps.accessibility), member.declaredAccessibility);
  }

  private linkMember(typeIri: string, memberIri: string): void {
    this.sink.emitIri(typeIri, this.tg(TypeRels.hasMember), memberIri);
    this.sink.emitIri(memberIri, this.tg(MemberRels.memberOf), typeIri);
  }

  private extractMethod(typeIri: string, method: MethodSymbol): void {
    const methodIri = this.iris.member(method);
    const { sink } = this;
    const isConstructor =
      method.methodKind === "Constructor" || method.methodKind === "StaticConstructor";

    this.emitMemberHeader(
      methodIri,
      isConstructor ? Classes.Constructor : Classes.Method,
      method
    );
    sink.emitLiteral(methodIri, this.tg(MemberProps.methodKind), method.methodKind);
    sink.emitBool(methodIri, this.tg(MemberProps.isStatic), method.isStatic);
    sink.emitBool(methodIri, this.tg(MemberProps.isAbstract), method.isAbstract);
    sink.emitBool(methodIri, this.tg(MemberProps.isVirtual), method.isVirtual);
    sink.emitBool(methodIri, this.tg(MemberProps.isOverride), method.isOverride);
    sink.emitBool(methodIri, this.tg(MemberProps.isSealed), method.isSealed);
    sink.emitBool(methodIri, this.tg(MemberProps.isExtern), method.isExtern);
    sink.emitBool(methodIri, this.tg(MemberProps.isAsync), method.isAsync);
    sink.emitBool(methodIri, this.tg(MemberProps.isExtensionMethod), method.isExtensionMethod);
    sink.emitBool(methodIri, this.tg(MemberProps.isPartialDefinition), method.isPartialDefinition);
    sink.emitBool(methodIri, this.tg(MemberProps.isReadOnly), method.isReadOnly);

    this.linkMember(typeIri, methodIri);

    if (method.returnType) {
      sink.emitIri(methodIri, this.tg(MemberRels.returnType), this.ensureTypeEmitted(method.returnType));
    }

    for (const tp of method.typeParameters) {
      this.extractTypeParameter(methodIri, method, tp);
    }
    for (const param of method.parameters) {
      this.extractParameter(methodIri, method, param);
    }

    if (method.overriddenMethod) {
      sink.emitIri(methodIri, this.tg(MemberRels.overridesMethod), this.iris.member(method.overriddenMethod));
    }
    for (const impl of method.explicitInterfaceImplementations) {
      sink.emitIri(methodIri, this.tg(MemberRels.explicitInterfaceImplementation), this.iris.member(impl));
    }

    // Return-value attributes hang off a pseudo target but keep counting the method's index
    const next = this.extractAttributes(methodIri, method, method.attributes);
    this.extractAttributes(`${methodIri}/return`, method, method.returnTypeAttributes, next);

    this.extractCrossReferences(methodIri, method);
  }

  private extractProperty(typeIri: string, property: PropertySymbol): void {
    const propIri = this.iris.member(property);
    const { sink } = this;
    const { getMethod, setMethod } = property;

    this.emitMemberHeader(propIri, Classes.Property, property);
    sink.emitBool(propIri, this.tg(MemberProps.isStatic), property.isStatic);
    sink.emitBool(propIri, this.tg(MemberProps.isAbstract), property.isAbstract);
    sink.emitBool(propIri, this.tg(MemberProps.isVirtual), property.isVirtual);
    sink.emitBool(propIri, this.tg(MemberProps.isOverride), property.isOverride);
    sink.emitBool(propIri, this.tg(MemberProps.isSealed), property.isSealed);
    sink.emitBool(propIri, this.tg(MemberProps.isRequired), property.isRequired);
    sink.emitBool(propIri, this.tg(MemberProps.hasGetter), getMethod !== null);
    sink.emitBool(propIri, this.tg(MemberProps.hasSetter), setMethod !== null);

    if (getMethod) {
      sink.emitLiteral(propIri, this.tg(MemberProps.getterAccessibility), getMethod.declaredAccessibility);
    }
    if (setMethod) {
      sink.emitLiteral(propIri, this.tg(MemberProps.setterAccessibility), setMethod.declaredAccessibility);
      sink.emitBool(propIri, this.tg(MemberProps.isInitOnly), setMethod.isInitOnly);
    }

    this.linkMember(typeIri, propIri);
    sink.emitIri(propIri, this.tg(MemberRels.propertyType), this.ensureTypeEmitted(property.type));

    for (const param of property.parameters) {
      this.extractParameter(propIri, property, param);
    }

    if (property.overriddenProperty) {
      sink.emitIri(propIri, this.tg(MemberRels.overridesMethod), this.iris.member(property.overriddenProperty));
    }
    for (const impl of property.explicitInterfaceImplementations) {
      sink.emitIri(propIri, this.tg(MemberRels.explicitInterfaceImplementation), this.iris.member(impl));
    }

    this.extractAttributes(propIri, property, property.attributes);
    this.extractCrossReferences(propIri, property);
  }

  private extractField(typeIri: string, field: FieldSymbol): void {
    const fieldIri = this.iris.member(field);
    const { sink } = this;

    this.emitMemberHeader(fieldIri, Classes.Field, field);
    sink.emitBool(fieldIri, this.tg(MemberProps.isStatic), field.isStatic);
    sink.emitBool(fieldIri, this.tg(MemberProps.isReadOnly), field.isReadOnly);
    sink.emitBool(fieldIri, this.tg(MemberProps.isConst), field.isConst);
    sink.emitBool(fieldIri, this.tg(MemberProps.isVolatile), field.isVolatile);
    sink.emitBool(fieldIri, this.tg(MemberProps.isRequired), field.isRequired);

    if (field.hasConstantValue) {
      sink.emitLiteral(fieldIri, this.tg(MemberProps.constValue), formatConstantValue(field.constantValue));
    }

    this.linkMember(typeIri, fieldIri);
    sink.emitIri(fieldIri, this.tg(MemberRels.fieldType), this.ensureTypeEmitted(field.type));

    this.extractAttributes(fieldIri, field, field.attributes);
  }

  private extractEvent(typeIri: string, event: EventSymbol): void {
    const eventIri = this.iris.member(event);
    const { sink } = this;

    this.emitMemberHeader(eventIri, Classes.Event, event);
    sink.emitBool(eventIri, this.tg(MemberProps.isStatic), event.isStatic);
    sink.emitBool(eventIri, this.tg(MemberProps.isAbstract), event.isAbstract);
    sink.emitBool(eventIri, this.tg(MemberProps.isVirtual), event.isVirtual);
    sink.emitBool(eventIri, this.tg(MemberProps.isOverride), event.isOverride);
    sink.emitBool(eventIri, this.tg(MemberProps.isSealed), event.isSealed);

    this.linkMember(typeIri, eventIri);
    sink.emitIri(eventIri, this.tg(MemberRels.eventType), this.ensureTypeEmitted(event.type));

    if (event.overriddenEvent) {
      sink.emitIri(eventIri, this.tg(MemberRels.overridesMethod), this.iris.member(event.overriddenEvent));
    }
    for (const impl of event.explicitInterfaceImplementations) {
      sink.emitIri(eventIri, this.tg(MemberRels.explicitInterfaceImplementation), this.iris.member(impl));
    }

    this.extractAttributes(eventIri, event, event.attributes);
  }

  private extractParameter(
    memberIri: string,
    owner: MethodSymbol | PropertySymbol,
    param: ParameterSymbol
  ): void {
    const paramIri = this.iris.parameter(owner, param);
    const { sink } = this;

    this.tag(paramIri, Classes.Parameter);
    sink.emitLiteral(paramIri, this.tg(ParamProps.name), param.name);
    sink.emitInt(paramIri, this.tg(ParamProps.ordinal), param.ordinal);
    sink.emitBool(paramIri, this.tg(ParamProps.isOptional), param.isOptional);
    sink.emitBool(paramIri, this.tg(ParamProps.isParams), param.isParams);
    sink.emitBool(paramIri, this.tg(ParamProps.isThis), param.isThis);
    sink.emitBool(paramIri, this.tg(ParamProps.isDiscard), param.isDiscard);
    sink.emitLiteral(paramIri, this.tg(ParamProps.refKind), param.refKind);
    sink.emitBool(paramIri, this.tg(ParamProps.hasExplicitDefaultValue), param.hasExplicitDefaultValue);

    if (param.hasExplicitDefaultValue) {
      sink.emitLiteral(paramIri, this.tg(ParamProps.defaultValue), formatConstantValue(param.explicitDefaultValue));
    }

    sink.emitIri(memberIri, this.tg(MemberRels.hasParameter), paramIri);
    sink.emitIri(paramIri, this.tg(ParamRels.parameterOf), memberIri);
    sink.emitIri(paramIri, this.tg(ParamRels.parameterType), this.ensureTypeEmitted(param.type));

    this.extractAttributes(paramIri, param, param.attributes);
  }

  // ===========================================================================
  // Attributes & cross-references
  // ===========================================================================

  /**
   * Emit attribute instances of `target`, numbering them from `startIndex`.
   * Returns the next free index.
   */
  private extractAttributes(
    targetIri: string,
    target: AnySymbol,
    attributes: readonly AttributeData[],
    startIndex = 0
  ): number {
    if (!this.options.includeAttributes) return startIndex;

    let index = startIndex;
    for (const attribute of attributes) {
      this.extractAttribute(targetIri, target, attribute, index++);
    }
    return index;
  }

  private extractAttribute(
    targetIri: string,
    target: AnySymbol,
    attribute: AttributeData,
    index: number
  ): void {
    if (!attribute.attributeClass) return;

    const attrIri = this.iris.attribute(target, index);
    const { sink } = this;

    this.tag(attrIri, Classes.Attribute);
    sink.emitIri(targetIri, this.tg(TypeRels.hasAttribute), attrIri);
    sink.emitIri(attrIri, this.tg(AttrRels.attributeOf), targetIri);
    sink.emitIri(attrIri, this.tg(AttrRels.attributeType), this.ensureTypeEmitted(attribute.attributeClass));

    if (attribute.constructorArguments.length > 0) {
      sink.emitLiteral(attrIri, this.tg(AttrProps.constructorArguments), formatConstructorArguments(attribute));
    }
    if (attribute.namedArguments.length > 0) {
      sink.emitLiteral(attrIri, this.tg(AttrProps.namedArguments), formatNamedArguments(attribute));
    }
  }

  private extractCrossReferences(
    subjectIri: string,
    symbol: DocumentedSymbol
  ): void {
    const provider = this.crossReferences;
    if (!provider) return;

    if (this.options.extractExceptions) {
      for (const exceptionType of provider.exceptionTypesFor(symbol)) {
        this.sink.emitIri(subjectIri, this.tg(TypeRels.throws), this.ensureTypeEmitted(exceptionType));
      }
    }

    if (this.options.extractSeeAlso) {
      for (const related of provider.seeAlsoFor(symbol)) {
        const relatedIri = isTypeSymbol(related)
          ? this.ensureTypeEmitted(related)
          : this.iris.member(related);
        this.sink.emitIri(subjectIri, this.tg(TypeRels.relatedTo), relatedIri);
      }
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Every type in a namespace tree: each type followed by its nested types,
 * then child namespaces in declaration order.
 */
export function* allTypes(ns: NamespaceSymbol): Generator<NamedTypeSymbol> {
  for (const type of ns.typeMembers) {
    yield type;
    yield* nestedTypes(type);
  }
  for (const child of ns.namespaceMembers) {
    yield* allTypes(child);
  }
}

function* nestedTypes(type: NamedTypeSymbol): Generator<NamedTypeSymbol> {
  for (const nested of type.typeMembers) {
    yield nested;
    yield* nestedTypes(nested);
  }
}

function typeClass(type: NamedTypeSymbol): string {
  if (type.isRecord) return Classes.Record;

  switch (type.typeKind) {
    case "Class":
      return Classes.Class;
    case "Struct":
      return Classes.Struct;
    case "Interface":
      return Classes.Interface;
    case "Enum":
      return Classes.Enum;
    case "Delegate":
      return Classes.Delegate;
  }
}

function isConstructedGeneric(type: NamedTypeSymbol): boolean {
  return (
    type.typeArguments.length > 0 &&
    !type.isUnboundGenericType &&
    type !== type.originalDefinition
  );
}

