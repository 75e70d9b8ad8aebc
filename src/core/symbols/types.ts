/**
 * Symbol Model
 *
 * Read-only projection of a compiled module's reflective metadata. The graph is
 * shared and cyclic (a type's members reference types that reference it back),
 * so every link is an object reference rather than an id.
 *
 * All symbol kinds are tagged with a `kind` discriminant and matched
 * exhaustively at the extraction sites.
 *
 * @module
 */

// =============================================================================
// Enumerations
// =============================================================================

export type Accessibility =
  | "NotApplicable"
  | "Private"
  | "ProtectedAndInternal"
  | "Protected"
  | "Internal"
  | "ProtectedOrInternal"
  | "Public";

export type NamedTypeKind = "Class" | "Struct" | "Interface" | "Enum" | "Delegate";

export type MethodKind =
  | "Ordinary"
  | "Constructor"
  | "StaticConstructor"
  | "Destructor"
  | "UserDefinedOperator"
  | "Conversion"
  | "PropertyGet"
  | "PropertySet"
  | "EventAdd"
  | "EventRemove"
  | "EventRaise"
  | "DelegateInvoke"
  | "ExplicitInterfaceImplementation";

export type RefKind = "None" | "Ref" | "Out" | "In";

export type Variance = "None" | "Out" | "In";

/**
 * Special-type tags for the platform's built-in types.
 * Only `System_Object` changes extraction behaviour (it is never an `inherits` target).
 */
export type SpecialType =
  | "System_Object"
  | "System_Void"
  | "System_Boolean"
  | "System_Char"
  | "System_SByte"
  | "System_Byte"
  | "System_Int16"
  | "System_UInt16"
  | "System_Int32"
  | "System_UInt32"
  | "System_Int64"
  | "System_UInt64"
  | "System_Decimal"
  | "System_Single"
  | "System_Double"
  | "System_String"
  | "System_IntPtr"
  | "System_UIntPtr"
  | "System_Enum"
  | "System_ValueType"
  | "System_Delegate"
  | "System_MulticastDelegate"
  | "System_Array"
  | "System_DateTime";

// =============================================================================
// Module & Namespace
// =============================================================================

export interface ModuleSymbol {
  readonly kind: "module";
  readonly name: string;
  readonly version: string;
  readonly culture: string;
  /** Lowercase hex, empty when the module is not strong-named */
  readonly publicKeyToken: string;
  readonly isInteractive: boolean;
  readonly globalNamespace: NamespaceSymbol;
  readonly attributes: readonly AttributeData[];
}

export interface NamespaceSymbol {
  readonly kind: "namespace";
  /** Last segment; empty for the global namespace */
  readonly name: string;
  readonly containingNamespace: NamespaceSymbol | null;
  readonly isGlobalNamespace: boolean;
  readonly namespaceMembers: readonly NamespaceSymbol[];
  /** Top-level types declared directly in this namespace (not nested types) */
  readonly typeMembers: readonly NamedTypeSymbol[];
}

// =============================================================================
// Types
// =============================================================================

export interface TypeTraits {
  readonly isAbstract: boolean;
  readonly isSealed: boolean;
  readonly isStatic: boolean;
  readonly isValueType: boolean;
  readonly isRecord: boolean;
  readonly isRefLikeType: boolean;
  readonly isReadOnly: boolean;
  readonly isUnmanagedType: boolean;
}

export interface NamedTypeSymbol extends TypeTraits {
  readonly kind: "named";
  readonly name: string;
  readonly typeKind: NamedTypeKind;
  readonly declaredAccessibility: Accessibility;
  readonly isImplicitlyDeclared: boolean;
  /** Null for built-ins that live outside any module */
  readonly containingModule: ModuleSymbol | null;
  readonly containingNamespace: NamespaceSymbol;
  readonly containingType: NamedTypeSymbol | null;
  readonly typeParameters: readonly TypeParameterSymbol[];
  /** For a definition these are its own type parameters */
  readonly typeArguments: readonly TypeSymbol[];
  /** The definition itself when this is not a constructed type */
  readonly originalDefinition: NamedTypeSymbol;
  readonly isUnboundGenericType: boolean;
  readonly baseType: NamedTypeSymbol | null;
  readonly interfaces: readonly NamedTypeSymbol[];
  readonly enumUnderlyingType: NamedTypeSymbol | null;
  readonly specialType: SpecialType | null;
  readonly typeMembers: readonly NamedTypeSymbol[];
  readonly members: readonly MemberSymbol[];
  readonly attributes: readonly AttributeData[];
  readonly documentationXml: string;
}

export interface ArrayTypeSymbol {
  readonly kind: "array";
  readonly elementType: TypeSymbol;
  readonly rank: number;
}

export interface PointerTypeSymbol {
  readonly kind: "pointer";
  readonly pointedAtType: TypeSymbol;
}

export interface TypeParameterSymbol {
  readonly kind: "typeParameter";
  readonly name: string;
  readonly ordinal: number;
  readonly variance: Variance;
  readonly hasReferenceTypeConstraint: boolean;
  readonly hasValueTypeConstraint: boolean;
  readonly hasUnmanagedTypeConstraint: boolean;
  readonly hasNotNullConstraint: boolean;
  readonly hasConstructorConstraint: boolean;
  readonly constraintTypes: readonly TypeSymbol[];
  /** Exactly one of declaringType / declaringMethod is set */
  readonly declaringType: NamedTypeSymbol | null;
  readonly declaringMethod: MethodSymbol | null;
}

export type TypeSymbol =
  | NamedTypeSymbol
  | ArrayTypeSymbol
  | PointerTypeSymbol
  | TypeParameterSymbol;

// =============================================================================
// Members
// =============================================================================

interface MemberSymbolBase {
  readonly name: string;
  readonly declaredAccessibility: Accessibility;
  readonly containingType: NamedTypeSymbol;
  readonly isStatic: boolean;
  readonly isImplicitlyDeclared: boolean;
  readonly attributes: readonly AttributeData[];
  readonly documentationXml: string;
}

export interface MethodSymbol extends MemberSymbolBase {
  readonly kind: "method";
  readonly methodKind: MethodKind;
  /** Null when the method returns void */
  readonly returnType: TypeSymbol | null;
  readonly isAbstract: boolean;
  readonly isVirtual: boolean;
  readonly isOverride: boolean;
  readonly isSealed: boolean;
  readonly isExtern: boolean;
  readonly isAsync: boolean;
  readonly isExtensionMethod: boolean;
  readonly isPartialDefinition: boolean;
  readonly isReadOnly: boolean;
  readonly isInitOnly: boolean;
  readonly typeParameters: readonly TypeParameterSymbol[];
  readonly parameters: readonly ParameterSymbol[];
  readonly overriddenMethod: MethodSymbol | null;
  readonly explicitInterfaceImplementations: readonly MethodSymbol[];
  readonly returnTypeAttributes: readonly AttributeData[];
}

export interface AccessorInfo {
  readonly declaredAccessibility: Accessibility;
  readonly isInitOnly: boolean;
}

export interface PropertySymbol extends MemberSymbolBase {
  readonly kind: "property";
  readonly type: TypeSymbol;
  readonly isIndexer: boolean;
  readonly isAbstract: boolean;
  readonly isVirtual: boolean;
  readonly isOverride: boolean;
  readonly isSealed: boolean;
  readonly isRequired: boolean;
  readonly getMethod: AccessorInfo | null;
  readonly setMethod: AccessorInfo | null;
  /** Indexer parameters; empty for ordinary properties */
  readonly parameters: readonly ParameterSymbol[];
  readonly overriddenProperty: PropertySymbol | null;
  readonly explicitInterfaceImplementations: readonly PropertySymbol[];
}

export interface FieldSymbol extends MemberSymbolBase {
  readonly kind: "field";
  readonly type: TypeSymbol;
  readonly isReadOnly: boolean;
  readonly isConst: boolean;
  readonly isVolatile: boolean;
  readonly isRequired: boolean;
  readonly hasConstantValue: boolean;
  readonly constantValue: ConstantValue;
}

export interface EventSymbol extends MemberSymbolBase {
  readonly kind: "event";
  readonly type: TypeSymbol;
  readonly isAbstract: boolean;
  readonly isVirtual: boolean;
  readonly isOverride: boolean;
  readonly isSealed: boolean;
  readonly overriddenEvent: EventSymbol | null;
  readonly explicitInterfaceImplementations: readonly EventSymbol[];
}

export type MemberSymbol = MethodSymbol | PropertySymbol | FieldSymbol | EventSymbol;

export interface ParameterSymbol {
  readonly kind: "parameter";
  readonly name: string;
  readonly ordinal: number;
  readonly type: TypeSymbol;
  readonly containingSymbol: MethodSymbol | PropertySymbol;
  readonly isOptional: boolean;
  readonly isParams: boolean;
  readonly isThis: boolean;
  readonly isDiscard: boolean;
  readonly refKind: RefKind;
  readonly hasExplicitDefaultValue: boolean;
  readonly explicitDefaultValue: ConstantValue;
  readonly attributes: readonly AttributeData[];
}

// =============================================================================
// Attributes & constants
// =============================================================================

export type ConstantValue = string | number | boolean | null;

export type TypedConstant =
  | { readonly kind: "primitive"; readonly value: ConstantValue }
  | { readonly kind: "enum"; readonly value: number }
  | { readonly kind: "type"; readonly value: TypeSymbol | null }
  | { readonly kind: "array"; readonly values: readonly TypedConstant[] | null };

export interface AttributeData {
  /** Null when the attribute's type could not be resolved */
  readonly attributeClass: NamedTypeSymbol | null;
  readonly constructorArguments: readonly TypedConstant[];
  readonly namedArguments: readonly (readonly [string, TypedConstant])[];
}

// =============================================================================
// Aggregates
// =============================================================================

export type AnySymbol =
  | ModuleSymbol
  | NamespaceSymbol
  | TypeSymbol
  | MemberSymbol
  | ParameterSymbol;

/**
 * Loaded symbol forest: every module reachable from the target, plus lookups.
 */
export interface SymbolSet {
  readonly modules: readonly ModuleSymbol[];
  readonly targetModule: ModuleSymbol;
  /** Looks up a type definition by its full metadata name, e.g. `Sample.Outer+Inner`1` */
  getTypeByMetadataName(metadataName: string): NamedTypeSymbol | null;
}

export function isTypeSymbol(symbol: AnySymbol): symbol is TypeSymbol {
  return (
    symbol.kind === "named" ||
    symbol.kind === "array" ||
    symbol.kind === "pointer" ||
    symbol.kind === "typeParameter"
  );
}

export function isMemberSymbol(symbol: AnySymbol): symbol is MemberSymbol {
  return (
    symbol.kind === "method" ||
    symbol.kind === "property" ||
    symbol.kind === "field" ||
    symbol.kind === "event"
  );
}
