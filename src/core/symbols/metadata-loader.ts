/**
 * Symbol Dump Loader
 *
 * Validates a symbol dump and links its id-addressed records into the
 * read-only, cyclic object graph the extractor walks.
 *
 * Linking runs in passes so that forward and cyclic references resolve:
 * 1. modules and their global namespaces
 * 2. type definitions (with their type parameters), namespaces, nesting
 * 3. method shells, so method type parameters can be referenced
 * 4. type references, members, parameters, attributes
 * 5. member-to-member links (overrides, explicit implementations)
 *
 * Constructed generics, arrays and pointers are interned: the same structural
 * reference always yields the same object.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import { ErrorCode, MetadataLoadError, isTypeGraphError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";
import { formatZodError, safeValidate } from "../../utils/validation.js";
import {
  SymbolDumpSchema,
  type AttributeInput,
  type ConstantInput,
  type MemberInput,
  type ModuleInput,
  type ParameterInput,
  type SymbolDump,
  type TypeInput,
  type TypeParameterInput,
  type TypeRef,
} from "./metadata-schema.js";
import { getFullMetadataName } from "./metadata-name.js";
import type {
  AccessorInfo,
  Accessibility,
  ArrayTypeSymbol,
  AttributeData,
  ConstantValue,
  EventSymbol,
  FieldSymbol,
  MemberSymbol,
  MethodKind,
  MethodSymbol,
  ModuleSymbol,
  NamedTypeKind,
  NamedTypeSymbol,
  NamespaceSymbol,
  ParameterSymbol,
  PointerTypeSymbol,
  PropertySymbol,
  RefKind,
  SpecialType,
  SymbolSet,
  TypedConstant,
  TypeParameterSymbol,
  TypeSymbol,
  Variance,
} from "./types.js";

const logger = createLogger("metadata-loader");

// =============================================================================
// Symbol implementations
// =============================================================================

class NamespaceImpl implements NamespaceSymbol {
  readonly kind = "namespace";
  readonly isGlobalNamespace: boolean;
  readonly namespaceMembers: NamespaceImpl[] = [];
  readonly typeMembers: NamedTypeSymbol[] = [];
  private readonly children = new Map<string, NamespaceImpl>();

  constructor(
    readonly name: string,
    readonly containingNamespace: NamespaceImpl | null
  ) {
    this.isGlobalNamespace = containingNamespace === null;
  }

  child(name: string): NamespaceImpl {
    let ns = this.children.get(name);
    if (!ns) {
      ns = new NamespaceImpl(name, this);
      this.children.set(name, ns);
      this.namespaceMembers.push(ns);
    }
    return ns;
  }

  resolvePath(path: string): NamespaceImpl {
    if (path === "") return this;
    return path.split(".").reduce<NamespaceImpl>((ns, segment) => ns.child(segment), this);
  }
}

class ModuleImpl implements ModuleSymbol {
  readonly kind = "module";
  readonly name: string;
  readonly version: string;
  readonly culture: string;
  readonly publicKeyToken: string;
  readonly isInteractive: boolean;
  readonly globalNamespace = new NamespaceImpl("", null);
  attributes: AttributeData[] = [];

  constructor(input: ModuleInput) {
    this.name = input.name;
    this.version = input.version;
    this.culture = input.culture;
    this.publicKeyToken = input.publicKeyToken.toLowerCase();
    this.isInteractive = input.isInteractive;
  }
}

class TypeParameterImpl implements TypeParameterSymbol {
  readonly kind = "typeParameter";
  readonly name: string;
  readonly variance: Variance;
  readonly hasReferenceTypeConstraint: boolean;
  readonly hasValueTypeConstraint: boolean;
  readonly hasUnmanagedTypeConstraint: boolean;
  readonly hasNotNullConstraint: boolean;
  readonly hasConstructorConstraint: boolean;
  constraintTypes: TypeSymbol[] = [];

  constructor(
    readonly input: TypeParameterInput,
    readonly ordinal: number,
    readonly declaringType: NamedTypeSymbol | null,
    readonly declaringMethod: MethodSymbol | null
  ) {
    this.name = input.name;
    this.variance = input.variance;
    this.hasReferenceTypeConstraint = input.hasReferenceTypeConstraint;
    this.hasValueTypeConstraint = input.hasValueTypeConstraint;
    this.hasUnmanagedTypeConstraint = input.hasUnmanagedTypeConstraint;
    this.hasNotNullConstraint = input.hasNotNullConstraint;
    this.hasConstructorConstraint = input.hasConstructorConstraint;
  }
}

class NamedTypeDefinition implements NamedTypeSymbol {
  readonly kind = "named";
  readonly name: string;
  readonly typeKind: NamedTypeKind;
  readonly declaredAccessibility: Accessibility;
  readonly isImplicitlyDeclared: boolean;
  readonly isAbstract: boolean;
  readonly isSealed: boolean;
  readonly isStatic: boolean;
  readonly isValueType: boolean;
  readonly isRecord: boolean;
  readonly isRefLikeType: boolean;
  readonly isReadOnly: boolean;
  readonly isUnmanagedType: boolean;
  readonly specialType: SpecialType | null;
  readonly documentationXml: string;
  readonly isUnboundGenericType = false;
  readonly typeParameters: TypeParameterImpl[];
  containingType: NamedTypeSymbol | null = null;
  baseType: NamedTypeSymbol | null = null;
  interfaces: NamedTypeSymbol[] = [];
  enumUnderlyingType: NamedTypeSymbol | null = null;
  readonly typeMembers: NamedTypeSymbol[] = [];
  readonly members: MemberSymbol[] = [];
  attributes: AttributeData[] = [];

  constructor(
    readonly input: TypeInput,
    readonly containingModule: ModuleSymbol | null,
    readonly containingNamespace: NamespaceImpl
  ) {
    this.name = input.name;
    this.typeKind = input.kind;
    this.declaredAccessibility = input.accessibility;
    this.isImplicitlyDeclared = input.isImplicitlyDeclared;
    this.isAbstract = input.isAbstract;
    this.isSealed = input.isSealed;
    this.isStatic = input.isStatic;
    this.isValueType = input.isValueType;
    this.isRecord = input.isRecord;
    this.isRefLikeType = input.isRefLikeType;
    this.isReadOnly = input.isReadOnly;
    this.isUnmanagedType = input.isUnmanagedType;
    this.specialType = input.specialType;
    this.documentationXml = input.documentation;
    this.typeParameters = input.typeParameters.map(
      (tp, ordinal) => new TypeParameterImpl(tp, ordinal, this, null)
    );
  }

  get typeArguments(): readonly TypeSymbol[] {
    return this.typeParameters;
  }

  get originalDefinition(): NamedTypeSymbol {
    return this;
  }
}

/**
 * A generic definition with type arguments substituted. Everything except the
 * arguments is read from the definition; base types and members are not substituted.
 */
class ConstructedNamedType implements NamedTypeSymbol {
  readonly kind = "named";

  constructor(
    readonly originalDefinition: NamedTypeDefinition,
    readonly typeArguments: readonly TypeSymbol[],
    readonly isUnboundGenericType: boolean
  ) {}

  get name() { return this.originalDefinition.name; }
  get typeKind() { return this.originalDefinition.typeKind; }
  get declaredAccessibility() { return this.originalDefinition.declaredAccessibility; }
  get isImplicitlyDeclared() { return this.originalDefinition.isImplicitlyDeclared; }
  get isAbstract() { return this.originalDefinition.isAbstract; }
  get isSealed() { return this.originalDefinition.isSealed; }
  get isStatic() { return this.originalDefinition.isStatic; }
  get isValueType() { return this.originalDefinition.isValueType; }
  get isRecord() { return this.originalDefinition.isRecord; }
  get isRefLikeType() { return this.originalDefinition.isRefLikeType; }
  get isReadOnly() { return this.originalDefinition.isReadOnly; }
  get isUnmanagedType() { return this.originalDefinition.isUnmanagedType; }
  get specialType(): SpecialType | null { return null; }
  get documentationXml() { return this.originalDefinition.documentationXml; }
  get containingModule() { return this.originalDefinition.containingModule; }
  get containingNamespace() { return this.originalDefinition.containingNamespace; }
  get containingType() { return this.originalDefinition.containingType; }
  get typeParameters() { return this.originalDefinition.typeParameters; }
  get baseType() { return this.originalDefinition.baseType; }
  get interfaces() { return this.originalDefinition.interfaces; }
  get enumUnderlyingType() { return this.originalDefinition.enumUnderlyingType; }
  get typeMembers() { return this.originalDefinition.typeMembers; }
  get members() { return this.originalDefinition.members; }
  get attributes() { return this.originalDefinition.attributes; }
}

class ArrayTypeImpl implements ArrayTypeSymbol {
  readonly kind = "array";
  constructor(readonly elementType: TypeSymbol, readonly rank: number) {}
}

class PointerTypeImpl implements PointerTypeSymbol {
  readonly kind = "pointer";
  constructor(readonly pointedAtType: TypeSymbol) {}
}

class MethodImpl implements MethodSymbol {
  readonly kind = "method";
  readonly name: string;
  readonly declaredAccessibility: Accessibility;
  readonly isStatic: boolean;
  readonly isImplicitlyDeclared: boolean;
  readonly documentationXml: string;
  readonly methodKind: MethodKind;
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
  readonly typeParameters: TypeParameterImpl[];
  returnType: TypeSymbol | null = null;
  readonly parameters: ParameterSymbol[] = [];
  overriddenMethod: MethodSymbol | null = null;
  explicitInterfaceImplementations: MethodSymbol[] = [];
  attributes: AttributeData[] = [];
  returnTypeAttributes: AttributeData[] = [];

  constructor(
    readonly input: Extract<MemberInput, { kind: "method" }>,
    readonly containingType: NamedTypeSymbol
  ) {
    this.name = input.name;
    this.declaredAccessibility = input.accessibility;
    this.isStatic = input.isStatic;
    this.isImplicitlyDeclared = input.isImplicitlyDeclared;
    this.documentationXml = input.documentation;
    this.methodKind = input.methodKind;
    this.isAbstract = input.isAbstract;
    this.isVirtual = input.isVirtual;
    this.isOverride = input.isOverride;
    this.isSealed = input.isSealed;
    this.isExtern = input.isExtern;
    this.isAsync = input.isAsync;
    this.isExtensionMethod = input.isExtensionMethod;
    this.isPartialDefinition = input.isPartialDefinition;
    this.isReadOnly = input.isReadOnly;
    this.isInitOnly = input.isInitOnly;
    this.typeParameters = input.typeParameters.map(
      (tp, ordinal) => new TypeParameterImpl(tp, ordinal, null, this)
    );
  }
}

class PropertyImpl implements PropertySymbol {
  readonly kind = "property";
  readonly parameters: ParameterSymbol[] = [];
  overriddenProperty: PropertySymbol | null = null;
  explicitInterfaceImplementations: PropertySymbol[] = [];

  constructor(
    readonly input: Extract<MemberInput, { kind: "property" }>,
    readonly containingType: NamedTypeSymbol,
    readonly type: TypeSymbol,
    readonly attributes: readonly AttributeData[]
  ) {}

  get name() { return this.input.name; }
  get declaredAccessibility() { return this.input.accessibility; }
  get isStatic() { return this.input.isStatic; }
  get isImplicitlyDeclared() { return this.input.isImplicitlyDeclared; }
  get documentationXml() { return this.input.documentation; }
  get isIndexer() { return this.input.isIndexer; }
  get isAbstract() { return this.input.isAbstract; }
  get isVirtual() { return this.input.isVirtual; }
  get isOverride() { return this.input.isOverride; }
  get isSealed() { return this.input.isSealed; }
  get isRequired() { return this.input.isRequired; }

  get getMethod(): AccessorInfo | null {
    return toAccessor(this.input.getter, this.input.accessibility);
  }

  get setMethod(): AccessorInfo | null {
    return toAccessor(this.input.setter, this.input.accessibility);
  }
}

function toAccessor(
  input: { accessibility?: Accessibility; isInitOnly: boolean } | null,
  fallback: Accessibility
): AccessorInfo | null {
  if (!input) return null;
  return {
    declaredAccessibility: input.accessibility ?? fallback,
    isInitOnly: input.isInitOnly,
  };
}

class FieldImpl implements FieldSymbol {
  readonly kind = "field";

  constructor(
    readonly input: Extract<MemberInput, { kind: "field" }>,
    readonly containingType: NamedTypeSymbol,
    readonly type: TypeSymbol,
    readonly attributes: readonly AttributeData[]
  ) {}

  get name() { return this.input.name; }
  get declaredAccessibility() { return this.input.accessibility; }
  get isStatic() { return this.input.isStatic; }
  get isImplicitlyDeclared() { return this.input.isImplicitlyDeclared; }
  get documentationXml() { return this.input.documentation; }
  get isReadOnly() { return this.input.isReadOnly; }
  get isConst() { return this.input.isConst; }
  get isVolatile() { return this.input.isVolatile; }
  get isRequired() { return this.input.isRequired; }
  get hasConstantValue() { return this.input.hasConstantValue; }
  get constantValue(): ConstantValue { return this.input.constantValue; }
}

class EventImpl implements EventSymbol {
  readonly kind = "event";
  overriddenEvent: EventSymbol | null = null;
  explicitInterfaceImplementations: EventSymbol[] = [];

  constructor(
    readonly input: Extract<MemberInput, { kind: "event" }>,
    readonly containingType: NamedTypeSymbol,
    readonly type: TypeSymbol,
    readonly attributes: readonly AttributeData[]
  ) {}

  get name() { return this.input.name; }
  get declaredAccessibility() { return this.input.accessibility; }
  get isStatic() { return this.input.isStatic; }
  get isImplicitlyDeclared() { return this.input.isImplicitlyDeclared; }
  get documentationXml() { return this.input.documentation; }
  get isAbstract() { return this.input.isAbstract; }
  get isVirtual() { return this.input.isVirtual; }
  get isOverride() { return this.input.isOverride; }
  get isSealed() { return this.input.isSealed; }
}

class ParameterImpl implements ParameterSymbol {
  readonly kind = "parameter";
  readonly name: string;
  readonly refKind: RefKind;
  readonly isOptional: boolean;
  readonly isParams: boolean;
  readonly isThis: boolean;
  readonly isDiscard: boolean;
  readonly hasExplicitDefaultValue: boolean;
  readonly explicitDefaultValue: ConstantValue;

  constructor(
    input: ParameterInput,
    readonly ordinal: number,
    readonly type: TypeSymbol,
    readonly containingSymbol: MethodSymbol | PropertySymbol,
    readonly attributes: readonly AttributeData[]
  ) {
    this.name = input.name;
    this.refKind = input.refKind;
    this.isOptional = input.isOptional;
    this.isParams = input.isParams;
    this.isThis = input.isThis;
    this.isDiscard = input.isDiscard;
    this.hasExplicitDefaultValue = input.hasDefaultValue;
    this.explicitDefaultValue = input.defaultValue;
  }
}

// =============================================================================
// Linker
// =============================================================================

class SymbolLinker {
  private readonly modules = new Map<string, ModuleImpl>();
  private readonly types = new Map<string, NamedTypeDefinition>();
  private readonly members = new Map<string, MemberSymbol>();
  private readonly methodShells = new Map<MemberInput, MethodImpl>();
  private readonly interned = new Map<string, TypeSymbol>();
  private readonly builtinNamespace = new NamespaceImpl("", null);

  constructor(private readonly dump: SymbolDump) {}

  link(): SymbolSet {
    for (const input of this.dump.modules) {
      if (this.modules.has(input.id)) {
        throw duplicateId("module", input.id);
      }
      this.modules.set(input.id, new ModuleImpl(input));
    }

    const target = this.modules.get(this.dump.target);
    if (!target) {
      throw new MetadataLoadError(
        `Target module '${this.dump.target}' is not declared`,
        ErrorCode.METADATA_TARGET_NOT_FOUND,
        { target: this.dump.target }
      );
    }

    this.createTypes();
    this.createMethodShells();
    this.resolveTypes();
    this.resolveMemberLinks();

    for (const input of this.dump.modules) {
      const module = this.modules.get(input.id);
      if (module) module.attributes = this.resolveAttributes(input.attributes);
    }

    logger.debug(
      { modules: this.modules.size, types: this.types.size, interned: this.interned.size },
      "Linked symbol dump"
    );

    return createSymbolSet([...this.modules.values()], target, [...this.types.values()]);
  }

  private createTypes(): void {
    const inputs = new Map<string, TypeInput>();
    for (const input of this.dump.types) {
      if (inputs.has(input.id)) throw duplicateId("type", input.id);
      inputs.set(input.id, input);
    }

    for (const input of this.dump.types) {
      const root = this.outermostInput(input, inputs);
      const module = root.module === null ? null : this.moduleById(root.module, input.id);
      const globalNs = module ? module.globalNamespace : this.builtinNamespace;
      this.types.set(
        input.id,
        new NamedTypeDefinition(input, module, globalNs.resolvePath(root.namespace))
      );
    }

    for (const def of this.types.values()) {
      const parentId = def.input.containingType;
      if (parentId === undefined) {
        def.containingNamespace.typeMembers.push(def);
        continue;
      }
      const parent = this.typeById(parentId, def.input.id);
      def.containingType = parent;
      parent.typeMembers.push(def);
    }
  }

  private outermostInput(input: TypeInput, inputs: Map<string, TypeInput>): TypeInput {
    const seen = new Set<string>([input.id]);
    let current = input;
    while (current.containingType !== undefined) {
      const parent = inputs.get(current.containingType);
      if (!parent) throw unresolved("type", current.containingType, current.id);
      if (seen.has(parent.id)) {
        throw new MetadataLoadError(
          `Type '${input.id}' is nested inside itself`,
          ErrorCode.METADATA_INVALID,
          { typeId: input.id }
        );
      }
      seen.add(parent.id);
      current = parent;
    }
    return current;
  }

  private createMethodShells(): void {
    for (const def of this.types.values()) {
      for (const member of def.input.members) {
        if (member.kind !== "method") continue;
        const method = new MethodImpl(member, def);
        this.methodShells.set(member, method);
        this.registerMember(member.id, method);
      }
    }
  }

  private resolveTypes(): void {
    for (const def of this.types.values()) {
      const { input } = def;
      for (const tp of def.typeParameters) {
        tp.constraintTypes = tp.input.constraintTypes.map((ref) => this.resolve(ref));
      }
      def.baseType = input.baseType === null ? null : this.resolveNamed(input.baseType);
      def.interfaces = input.interfaces.map((ref) => this.resolveNamed(ref));
      def.enumUnderlyingType =
        input.enumUnderlyingType === null ? null : this.resolveNamed(input.enumUnderlyingType);
      def.attributes = this.resolveAttributes(input.attributes);

      for (const member of input.members) {
        def.members.push(this.createMember(member, def));
      }
    }
  }

  private createMember(input: MemberInput, owner: NamedTypeDefinition): MemberSymbol {
    switch (input.kind) {
      case "method": {
        const method = this.methodShells.get(input);
        if (!method) {
          throw new MetadataLoadError(`Method '${input.name}' was not prepared`, ErrorCode.METADATA_INVALID);
        }
        for (const tp of method.typeParameters) {
          tp.constraintTypes = tp.input.constraintTypes.map((ref) => this.resolve(ref));
        }
        method.returnType = input.returnType === null ? null : this.resolve(input.returnType);
        input.parameters.forEach((param, ordinal) => {
          method.parameters.push(this.createParameter(param, ordinal, method));
        });
        method.attributes = this.resolveAttributes(input.attributes);
        method.returnTypeAttributes = this.resolveAttributes(input.returnAttributes);
        return method;
      }
      case "property": {
        const property = new PropertyImpl(
          input,
          owner,
          this.resolve(input.type),
          this.resolveAttributes(input.attributes)
        );
        input.parameters.forEach((param, ordinal) => {
          property.parameters.push(this.createParameter(param, ordinal, property));
        });
        this.registerMember(input.id, property);
        return property;
      }
      case "field": {
        const field = new FieldImpl(
          input,
          owner,
          this.resolve(input.type),
          this.resolveAttributes(input.attributes)
        );
        this.registerMember(input.id, field);
        return field;
      }
      case "event": {
        const event = new EventImpl(
          input,
          owner,
          this.resolve(input.type),
          this.resolveAttributes(input.attributes)
        );
        this.registerMember(input.id, event);
        return event;
      }
    }
  }

  private createParameter(
    input: ParameterInput,
    ordinal: number,
    owner: MethodSymbol | PropertySymbol
  ): ParameterSymbol {
    return new ParameterImpl(
      input,
      ordinal,
      this.resolve(input.type),
      owner,
      this.resolveAttributes(input.attributes)
    );
  }

  private resolveMemberLinks(): void {
    for (const def of this.types.values()) {
      for (const member of def.members) {
        if (member instanceof MethodImpl) {
          const { overrides, explicitImplementations } = member.input;
          if (overrides !== undefined) {
            member.overriddenMethod = this.memberOfKind(overrides, "method");
          }
          member.explicitInterfaceImplementations = explicitImplementations.map((id) =>
            this.memberOfKind(id, "method")
          );
        } else if (member instanceof PropertyImpl) {
          const { overrides, explicitImplementations } = member.input;
          if (overrides !== undefined) {
            member.overriddenProperty = this.memberOfKind(overrides, "property");
          }
          member.explicitInterfaceImplementations = explicitImplementations.map((id) =>
            this.memberOfKind(id, "property")
          );
        } else if (member instanceof EventImpl) {
          const { overrides, explicitImplementations } = member.input;
          if (overrides !== undefined) {
            member.overriddenEvent = this.memberOfKind(overrides, "event");
          }
          member.explicitInterfaceImplementations = explicitImplementations.map((id) =>
            this.memberOfKind(id, "event")
          );
        }
      }
    }
  }

  private memberOfKind<K extends MemberSymbol["kind"]>(
    id: string,
    kind: K
  ): Extract<MemberSymbol, { kind: K }> {
    const member = this.members.get(id);
    if (!member) throw unresolved("member", id);
    if (!isMemberOfKind(member, kind)) {
      throw new MetadataLoadError(
        `Member '${id}' is a ${member.kind}, expected a ${kind}`,
        ErrorCode.METADATA_INVALID,
        { memberId: id }
      );
    }
    return member;
  }

  private registerMember(id: string | undefined, member: MemberSymbol): void {
    if (id === undefined) return;
    if (this.members.has(id)) throw duplicateId("member", id);
    this.members.set(id, member);
  }

  // ---------------------------------------------------------------------------
  // Type references
  // ---------------------------------------------------------------------------

  private resolve(ref: TypeRef): TypeSymbol {
    if (typeof ref === "string") {
      return this.typeById(ref);
    }

    if ("def" in ref) {
      const definition = this.typeById(ref.def);
      if (ref.unbound) {
        return this.intern(`${ref.def}<>`, () =>
          new ConstructedNamedType(definition, definition.typeParameters, true)
        );
      }
      if (ref.args.length !== definition.typeParameters.length) {
        throw new MetadataLoadError(
          `Type '${ref.def}' takes ${definition.typeParameters.length} type arguments, got ${ref.args.length}`,
          ErrorCode.METADATA_INVALID,
          { typeId: ref.def }
        );
      }
      const args = ref.args.map((arg) => this.resolve(arg));
      if (args.every((arg, i) => arg === definition.typeParameters[i])) {
        return definition;
      }
      return this.intern(refKey(ref), () => new ConstructedNamedType(definition, args, false));
    }

    if ("array" in ref) {
      const element = this.resolve(ref.array);
      return this.intern(refKey(ref), () => new ArrayTypeImpl(element, ref.rank ?? 1));
    }

    if ("pointer" in ref) {
      const pointedAt = this.resolve(ref.pointer);
      return this.intern(refKey(ref), () => new PointerTypeImpl(pointedAt));
    }

    if ("typeParam" in ref) {
      const owner = this.typeById(ref.type);
      const tp = owner.typeParameters[ref.typeParam];
      if (!tp) throw unresolved("type parameter", `${ref.type}#${ref.typeParam}`);
      return tp;
    }

    const method = this.members.get(ref.method);
    if (!(method instanceof MethodImpl)) throw unresolved("method", ref.method);
    const tp = method.typeParameters[ref.methodTypeParam];
    if (!tp) throw unresolved("type parameter", `${ref.method}#${ref.methodTypeParam}`);
    return tp;
  }

  private resolveNamed(ref: TypeRef): NamedTypeSymbol {
    const type = this.resolve(ref);
    if (type.kind !== "named") {
      throw new MetadataLoadError(
        `Expected a named type, got ${type.kind} (${refKey(ref)})`,
        ErrorCode.METADATA_INVALID
      );
    }
    return type;
  }

  private intern(key: string, create: () => TypeSymbol): TypeSymbol {
    let type = this.interned.get(key);
    if (!type) {
      type = create();
      this.interned.set(key, type);
    }
    return type;
  }

  private typeById(id: string, referencedBy?: string): NamedTypeDefinition {
    const type = this.types.get(id);
    if (!type) throw unresolved("type", id, referencedBy);
    return type;
  }

  private moduleById(id: string, referencedBy: string): ModuleImpl {
    const module = this.modules.get(id);
    if (!module) throw unresolved("module", id, referencedBy);
    return module;
  }

  // ---------------------------------------------------------------------------
  // Attributes
  // ---------------------------------------------------------------------------

  private resolveAttributes(inputs: readonly AttributeInput[]): AttributeData[] {
    return inputs.map((input) => ({
      attributeClass: input.type === null ? null : this.resolveNamed(input.type),
      constructorArguments: input.args.map((arg) => this.resolveConstant(arg)),
      namedArguments: Object.entries(input.named).map(
        ([name, value]) => [name, this.resolveConstant(value)] as const
      ),
    }));
  }

  private resolveConstant(input: ConstantInput): TypedConstant {
    if (input === null || typeof input !== "object") {
      return { kind: "primitive", value: input };
    }
    if ("enum" in input) {
      return { kind: "enum", value: input.enum };
    }
    if ("type" in input) {
      return { kind: "type", value: input.type === null ? null : this.resolve(input.type) };
    }
    return {
      kind: "array",
      values: input.array === null ? null : input.array.map((value) => this.resolveConstant(value)),
    };
  }
}

function isMemberOfKind<K extends MemberSymbol["kind"]>(
  member: MemberSymbol,
  kind: K
): member is Extract<MemberSymbol, { kind: K }> {
  return member.kind === kind;
}

function refKey(ref: TypeRef): string {
  if (typeof ref === "string") return ref;
  if ("def" in ref) return `${ref.def}<${ref.args.map(refKey).join(",")}>`;
  if ("array" in ref) return `${refKey(ref.array)}[${ref.rank ?? 1}]`;
  if ("pointer" in ref) return `${refKey(ref.pointer)}*`;
  if ("typeParam" in ref) return `!${ref.type}#${ref.typeParam}`;
  return `!!${ref.method}#${ref.methodTypeParam}`;
}

function duplicateId(what: string, id: string): MetadataLoadError {
  return new MetadataLoadError(`Duplicate ${what} id '${id}'`, ErrorCode.METADATA_INVALID, { id });
}

function unresolved(what: string, id: string, referencedBy?: string): MetadataLoadError {
  const suffix = referencedBy ? ` (referenced by '${referencedBy}')` : "";
  return new MetadataLoadError(
    `Unresolved ${what} '${id}'${suffix}`,
    ErrorCode.METADATA_UNRESOLVED_REFERENCE,
    { id, referencedBy }
  );
}

function createSymbolSet(
  modules: readonly ModuleSymbol[],
  targetModule: ModuleSymbol,
  definitions: readonly NamedTypeSymbol[]
): SymbolSet {
  let byMetadataName: Map<string, NamedTypeSymbol> | null = null;

  return {
    modules,
    targetModule,
    getTypeByMetadataName(metadataName: string): NamedTypeSymbol | null {
      if (!byMetadataName) {
        byMetadataName = new Map();
        // Target module wins when two modules declare the same name
        const ordered = [
          ...definitions.filter((d) => d.containingModule === targetModule),
          ...definitions.filter((d) => d.containingModule !== targetModule),
        ];
        for (const def of ordered) {
          const name = getFullMetadataName(def);
          if (!byMetadataName.has(name)) byMetadataName.set(name, def);
        }
      }
      return byMetadataName.get(metadataName) ?? null;
    },
  };
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Validates raw JSON against the dump schema.
 */
export function parseSymbolDump(json: unknown, filePath?: string): SymbolDump {
  const result = safeValidate(SymbolDumpSchema, json);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new MetadataLoadError(
      `Invalid symbol dump: ${issues.join("; ")}`,
      ErrorCode.METADATA_INVALID,
      { filePath, issues }
    );
  }
  return result.data;
}

/**
 * Links a dump (raw or already parsed) into a symbol set.
 */
export function loadSymbolSet(dump: unknown): SymbolSet {
  return new SymbolLinker(parseSymbolDump(dump)).link();
}

/**
 * Reads, validates and links a symbol dump file.
 */
export async function loadSymbolSetFromFile(filePath: string): Promise<SymbolSet> {
  let json: unknown;
  try {
    const content = await fs.readFile(filePath, "utf-8");
    json = JSON.parse(content);
  } catch (error) {
    throw new MetadataLoadError(
      `Failed to read symbol dump: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.METADATA_READ_FAILED,
      { filePath }
    );
  }

  try {
    const symbols = new SymbolLinker(parseSymbolDump(json, filePath)).link();
    logger.info({ filePath, module: symbols.targetModule.name }, "Loaded symbol dump");
    return symbols;
  } catch (error) {
    if (isTypeGraphError(error) && !(error instanceof MetadataLoadError && error.filePath)) {
      throw new MetadataLoadError(error.message, error.code, { ...error.context, filePath });
    }
    throw error;
  }
}
