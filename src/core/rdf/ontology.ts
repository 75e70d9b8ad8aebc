/**
 * Ontology Vocabulary
 *
 * Local names of the classes and predicates used in the emitted graph.
 * Shared terms live under the `tg:` ontology; platform-only terms (ref-like,
 * unmanaged, special types, constraint flags, module identity details) live
 * under the per-base-URI `dn:` ontology.
 *
 * @module
 */

// =============================================================================
// Namespaces & Prefixes
// =============================================================================

export const RDF_NS = "http://www.w3.org/1999/02/22-rdf-syntax-ns#";
export const RDFS_NS = "http://www.w3.org/2000/01/rdf-schema#";
export const XSD_NS = "http://www.w3.org/2001/XMLSchema#";

export const RDF_TYPE = `${RDF_NS}type`;

export const XSD = {
  boolean: `${XSD_NS}boolean`,
  integer: `${XSD_NS}integer`,
  long: `${XSD_NS}long`,
  string: `${XSD_NS}string`,
} as const;

/** Ontology shared by every language front end */
export const SHARED_ONTOLOGY_NS = "http://typegraph.example/ontology/";

export const SHARED_PREFIX = "tg";
export const PLATFORM_PREFIX = "dn";

/** Value of the module's `tg:language` literal */
export const PLATFORM_LANGUAGE = "dotnet";

// =============================================================================
// Classes
// =============================================================================

export const Classes = {
  Assembly: "Assembly",
  Namespace: "Namespace",
  Type: "Type",
  Class: "Class",
  Struct: "Struct",
  Interface: "Interface",
  Enum: "Enum",
  Delegate: "Delegate",
  Record: "Record",
  Member: "Member",
  Method: "Method",
  Constructor: "Constructor",
  Property: "Property",
  Field: "Field",
  Event: "Event",
  Parameter: "Parameter",
  TypeParameter: "TypeParameter",
  Attribute: "Attribute",
} as const;

// =============================================================================
// Predicates
// =============================================================================

export const TypeProps = {
  name: "name",
  fullName: "fullName",
  typeKind: "typeKind",
  accessibility: "accessibility",
  isAbstract: "isAbstract",
  isSealed: "isSealed",
  isStatic: "isStatic",
  isGeneric: "isGeneric",
  isValueType: "isValueType",
  isRecord: "isRecord",
  isRefLikeType: "isRefLikeType",
  isReadOnly: "isReadOnly",
  isUnmanagedType: "isUnmanagedType",
  specialType: "specialType",
  enumUnderlyingType: "enumUnderlyingType",
  arrayRank: "arrayRank",
  language: "language",
} as const;

export const TypeRels = {
  definedInAssembly: "definedInAssembly",
  inNamespace: "inNamespace",
  inherits: "inherits",
  implements: "implements",
  nestedIn: "nestedIn",
  hasMember: "hasMember",
  hasTypeParameter: "hasTypeParameter",
  hasAttribute: "hasAttribute",
  genericDefinition: "genericDefinition",
  typeArgument: "typeArgument",
  arrayElementType: "arrayElementType",
  pointerElementType: "pointerElementType",
  throws: "throws",
  relatedTo: "relatedTo",
} as const;

/** Facts on a reified type-argument node */
export const TypeArgProps = {
  index: "index",
  type: "type",
} as const;

export const MemberProps = {
  name: "name",
  accessibility: "accessibility",
  isStatic: "isStatic",
  isAbstract: "isAbstract",
  isVirtual: "isVirtual",
  isOverride: "isOverride",
  isSealed: "isSealed",
  isExtern: "isExtern",
  isAsync: "isAsync",
  isReadOnly: "isReadOnly",
  isConst: "isConst",
  isVolatile: "isVolatile",
  isRequired: "isRequired",
  isInitOnly: "isInitOnly",
  hasGetter: "hasGetter",
  hasSetter: "hasSetter",
  getterAccessibility: "getterAccessibility",
  setterAccessibility: "setterAccessibility",
  constValue: "constValue",
  isExtensionMethod: "isExtensionMethod",
  isPartialDefinition: "isPartialDefinition",
  methodKind: "methodKind",
} as const;

export const MemberRels = {
  memberOf: "memberOf",
  returnType: "returnType",
  propertyType: "propertyType",
  fieldType: "fieldType",
  eventType: "eventType",
  hasParameter: "hasParameter",
  overridesMethod: "overridesMethod",
  explicitInterfaceImplementation: "explicitInterfaceImplementation",
} as const;

export const ParamProps = {
  name: "name",
  ordinal: "ordinal",
  isOptional: "isOptional",
  isParams: "isParams",
  isThis: "isThis",
  isDiscard: "isDiscard",
  refKind: "refKind",
  defaultValue: "defaultValue",
  hasExplicitDefaultValue: "hasExplicitDefaultValue",
} as const;

export const ParamRels = {
  parameterType: "parameterType",
  parameterOf: "parameterOf",
} as const;

export const TypeParamProps = {
  name: "name",
  ordinal: "ordinal",
  variance: "variance",
  hasReferenceTypeConstraint: "hasReferenceTypeConstraint",
  hasValueTypeConstraint: "hasValueTypeConstraint",
  hasUnmanagedTypeConstraint: "hasUnmanagedTypeConstraint",
  hasNotNullConstraint: "hasNotNullConstraint",
  hasConstructorConstraint: "hasConstructorConstraint",
} as const;

export const TypeParamRels = {
  typeParameterOf: "typeParameterOf",
  constrainedToType: "constrainedToType",
} as const;

export const AttrProps = {
  constructorArguments: "constructorArguments",
  namedArguments: "namedArguments",
} as const;

export const AttrRels = {
  attributeOf: "attributeOf",
  attributeType: "attributeType",
} as const;

export const AsmProps = {
  name: "name",
  version: "version",
  culture: "culture",
  publicKeyToken: "publicKeyToken",
  isInteractive: "isInteractive",
} as const;

export const NsProps = {
  name: "name",
  fullName: "fullName",
} as const;

export const NsRels = {
  parentNamespace: "parentNamespace",
} as const;
