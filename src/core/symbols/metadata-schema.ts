/**
 * Symbol Dump Schema
 *
 * Zod schemas for the JSON symbol dump a metadata front end writes for one
 * compiled module and the modules it references. Records live in flat arrays
 * addressed by string ids; type references are structural.
 *
 * Type reference forms:
 * - `"t1"`                                  a type definition
 * - `{ "def": "t2", "args": [...] }`        a constructed generic
 * - `{ "array": <ref>, "rank": 2 }`         an array (rank defaults to 1)
 * - `{ "pointer": <ref> }`                  a pointer
 * - `{ "typeParam": 0, "type": "t2" }`      a type's type parameter
 * - `{ "methodTypeParam": 0, "method": "m1" }` a method's type parameter
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Enumerations
// =============================================================================

export const AccessibilitySchema = z.enum([
  "NotApplicable",
  "Private",
  "ProtectedAndInternal",
  "Protected",
  "Internal",
  "ProtectedOrInternal",
  "Public",
]);

export const NamedTypeKindSchema = z.enum(["Class", "Struct", "Interface", "Enum", "Delegate"]);

export const MethodKindSchema = z.enum([
  "Ordinary",
  "Constructor",
  "StaticConstructor",
  "Destructor",
  "UserDefinedOperator",
  "Conversion",
  "PropertyGet",
  "PropertySet",
  "EventAdd",
  "EventRemove",
  "EventRaise",
  "DelegateInvoke",
  "ExplicitInterfaceImplementation",
]);

export const RefKindSchema = z.enum(["None", "Ref", "Out", "In"]);

export const VarianceSchema = z.enum(["None", "Out", "In"]);

export const SpecialTypeSchema = z.enum([
  "System_Object",
  "System_Void",
  "System_Boolean",
  "System_Char",
  "System_SByte",
  "System_Byte",
  "System_Int16",
  "System_UInt16",
  "System_Int32",
  "System_UInt32",
  "System_Int64",
  "System_UInt64",
  "System_Decimal",
  "System_Single",
  "System_Double",
  "System_String",
  "System_IntPtr",
  "System_UIntPtr",
  "System_Enum",
  "System_ValueType",
  "System_Delegate",
  "System_MulticastDelegate",
  "System_Array",
  "System_DateTime",
]);

// =============================================================================
// Type references & constants
// =============================================================================

export type TypeRef =
  | string
  | { def: string; args: TypeRef[]; unbound?: boolean }
  | { array: TypeRef; rank?: number }
  | { pointer: TypeRef }
  | { typeParam: number; type: string }
  | { methodTypeParam: number; method: string };

export const TypeRefSchema: z.ZodType<TypeRef> = z.lazy(() =>
  z.union([
    z.string().min(1),
    z.object({
      def: z.string().min(1),
      args: z.array(TypeRefSchema),
      unbound: z.boolean().optional(),
    }),
    z.object({ array: TypeRefSchema, rank: z.number().int().min(1).optional() }),
    z.object({ pointer: TypeRefSchema }),
    z.object({ typeParam: z.number().int().min(0), type: z.string().min(1) }),
    z.object({ methodTypeParam: z.number().int().min(0), method: z.string().min(1) }),
  ])
);

export const ConstantValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type ConstantInput =
  | string
  | number
  | boolean
  | null
  | { type: TypeRef | null }
  | { enum: number }
  | { array: ConstantInput[] | null };

export const ConstantInputSchema: z.ZodType<ConstantInput> = z.lazy(() =>
  z.union([
    ConstantValueSchema,
    z.object({ type: TypeRefSchema.nullable() }),
    z.object({ enum: z.number() }),
    z.object({ array: z.array(ConstantInputSchema).nullable() }),
  ])
);

export const AttributeInputSchema = z.object({
  /** Null when the front end could not resolve the attribute's type */
  type: TypeRefSchema.nullable(),
  args: z.array(ConstantInputSchema).default([]),
  named: z.record(ConstantInputSchema).default({}),
});

// =============================================================================
// Records
// =============================================================================

const flag = () => z.boolean().default(false);
const attributes = () => z.array(AttributeInputSchema).default([]);

export const TypeParameterInputSchema = z.object({
  name: z.string().min(1),
  variance: VarianceSchema.default("None"),
  hasReferenceTypeConstraint: flag(),
  hasValueTypeConstraint: flag(),
  hasUnmanagedTypeConstraint: flag(),
  hasNotNullConstraint: flag(),
  hasConstructorConstraint: flag(),
  constraintTypes: z.array(TypeRefSchema).default([]),
});

export const ParameterInputSchema = z.object({
  name: z.string(),
  type: TypeRefSchema,
  refKind: RefKindSchema.default("None"),
  isOptional: flag(),
  isParams: flag(),
  isThis: flag(),
  isDiscard: flag(),
  hasDefaultValue: flag(),
  defaultValue: ConstantValueSchema.default(null),
  attributes: attributes(),
});

const memberBase = {
  /** Needed only when another record refers to this member */
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  accessibility: AccessibilitySchema.default("Public"),
  isStatic: flag(),
  isImplicitlyDeclared: flag(),
  attributes: attributes(),
  documentation: z.string().default(""),
};

export const AccessorInputSchema = z.object({
  /** Defaults to the property's own accessibility */
  accessibility: AccessibilitySchema.optional(),
  isInitOnly: flag(),
});

export const MethodInputSchema = z.object({
  ...memberBase,
  kind: z.literal("method"),
  methodKind: MethodKindSchema.default("Ordinary"),
  returnType: TypeRefSchema.nullable().default(null),
  isAbstract: flag(),
  isVirtual: flag(),
  isOverride: flag(),
  isSealed: flag(),
  isExtern: flag(),
  isAsync: flag(),
  isExtensionMethod: flag(),
  isPartialDefinition: flag(),
  isReadOnly: flag(),
  isInitOnly: flag(),
  typeParameters: z.array(TypeParameterInputSchema).default([]),
  parameters: z.array(ParameterInputSchema).default([]),
  overrides: z.string().min(1).optional(),
  explicitImplementations: z.array(z.string().min(1)).default([]),
  returnAttributes: attributes(),
});

export const PropertyInputSchema = z.object({
  ...memberBase,
  kind: z.literal("property"),
  type: TypeRefSchema,
  isIndexer: flag(),
  isAbstract: flag(),
  isVirtual: flag(),
  isOverride: flag(),
  isSealed: flag(),
  isRequired: flag(),
  getter: AccessorInputSchema.nullable().default(null),
  setter: AccessorInputSchema.nullable().default(null),
  parameters: z.array(ParameterInputSchema).default([]),
  overrides: z.string().min(1).optional(),
  explicitImplementations: z.array(z.string().min(1)).default([]),
});

export const FieldInputSchema = z.object({
  ...memberBase,
  kind: z.literal("field"),
  type: TypeRefSchema,
  isReadOnly: flag(),
  isConst: flag(),
  isVolatile: flag(),
  isRequired: flag(),
  hasConstantValue: flag(),
  constantValue: ConstantValueSchema.default(null),
});

export const EventInputSchema = z.object({
  ...memberBase,
  kind: z.literal("event"),
  type: TypeRefSchema,
  isAbstract: flag(),
  isVirtual: flag(),
  isOverride: flag(),
  isSealed: flag(),
  overrides: z.string().min(1).optional(),
  explicitImplementations: z.array(z.string().min(1)).default([]),
});

export const MemberInputSchema = z.discriminatedUnion("kind", [
  MethodInputSchema,
  PropertyInputSchema,
  FieldInputSchema,
  EventInputSchema,
]);

export const TypeInputSchema = z.object({
  id: z.string().min(1),
  /** Module id; null for built-ins that belong to no module */
  module: z.string().min(1).nullable(),
  /** Dotted namespace path; empty for the global namespace. Ignored for nested types. */
  namespace: z.string().default(""),
  name: z.string().min(1),
  kind: NamedTypeKindSchema.default("Class"),
  accessibility: AccessibilitySchema.default("Public"),
  containingType: z.string().min(1).optional(),
  typeParameters: z.array(TypeParameterInputSchema).default([]),
  baseType: TypeRefSchema.nullable().default(null),
  interfaces: z.array(TypeRefSchema).default([]),
  enumUnderlyingType: TypeRefSchema.nullable().default(null),
  specialType: SpecialTypeSchema.nullable().default(null),
  isAbstract: flag(),
  isSealed: flag(),
  isStatic: flag(),
  isValueType: flag(),
  isRecord: flag(),
  isRefLikeType: flag(),
  isReadOnly: flag(),
  isUnmanagedType: flag(),
  isImplicitlyDeclared: flag(),
  members: z.array(MemberInputSchema).default([]),
  attributes: attributes(),
  documentation: z.string().default(""),
});

export const ModuleInputSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  version: z.string().default("0.0.0.0"),
  culture: z.string().default(""),
  publicKeyToken: z
    .string()
    .regex(/^([0-9a-fA-F]{2})*$/, "publicKeyToken must be hex")
    .default(""),
  isInteractive: flag(),
  attributes: attributes(),
});

export const SymbolDumpSchema = z.object({
  formatVersion: z.literal(1),
  /** Id of the module to extract */
  target: z.string().min(1),
  modules: z.array(ModuleInputSchema).min(1),
  types: z.array(TypeInputSchema).default([]),
});

export type SymbolDump = z.infer<typeof SymbolDumpSchema>;
export type SymbolDumpInput = z.input<typeof SymbolDumpSchema>;
export type ModuleInput = z.infer<typeof ModuleInputSchema>;
export type TypeInput = z.infer<typeof TypeInputSchema>;
export type MemberInput = z.infer<typeof MemberInputSchema>;
export type MethodInput = z.infer<typeof MethodInputSchema>;
export type PropertyInput = z.infer<typeof PropertyInputSchema>;
export type ParameterInput = z.infer<typeof ParameterInputSchema>;
export type TypeParameterInput = z.infer<typeof TypeParameterInputSchema>;
export type AttributeInput = z.infer<typeof AttributeInputSchema>;
