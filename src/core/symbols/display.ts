/**
 * Display Strings
 *
 * Human-readable renderings of symbols, used for `fullName` literals,
 * `typeof(...)` attribute arguments and method-owned type parameter names.
 * Built-in types render as their language keyword (`string`, `int`).
 *
 * @module
 */

import type {
  MethodSymbol,
  NamedTypeSymbol,
  NamespaceSymbol,
  ParameterSymbol,
  SpecialType,
  TypeSymbol,
} from "./types.js";

const KEYWORD_ALIASES: Partial<Record<SpecialType, string>> = {
  System_Object: "object",
  System_Void: "void",
  System_Boolean: "bool",
  System_Char: "char",
  System_SByte: "sbyte",
  System_Byte: "byte",
  System_Int16: "short",
  System_UInt16: "ushort",
  System_Int32: "int",
  System_UInt32: "uint",
  System_Int64: "long",
  System_UInt64: "ulong",
  System_Decimal: "decimal",
  System_Single: "float",
  System_Double: "double",
  System_String: "string",
};

export const GLOBAL_NAMESPACE_DISPLAY = "<global namespace>";

/**
 * Dotted path of a namespace, e.g. `System.Collections.Generic`.
 */
export function displayNamespace(ns: NamespaceSymbol): string {
  if (ns.isGlobalNamespace) return GLOBAL_NAMESPACE_DISPLAY;

  const segments: string[] = [];
  let current: NamespaceSymbol | null = ns;
  while (current && !current.isGlobalNamespace) {
    segments.unshift(current.name);
    current = current.containingNamespace;
  }
  return segments.join(".");
}

export function displayType(type: TypeSymbol): string {
  switch (type.kind) {
    case "array":
      return `${displayType(type.elementType)}[${",".repeat(Math.max(0, type.rank - 1))}]`;
    case "pointer":
      return `${displayType(type.pointedAtType)}*`;
    case "typeParameter":
      return type.name;
    case "named":
      return displayNamedType(type);
  }
}

function displayNamedType(type: NamedTypeSymbol): string {
  const keyword = type.specialType ? KEYWORD_ALIASES[type.specialType] : undefined;
  if (keyword) return keyword;

  let prefix = "";
  if (type.containingType) {
    prefix = `${displayNamedType(type.containingType)}.`;
  } else if (!type.containingNamespace.isGlobalNamespace) {
    prefix = `${displayNamespace(type.containingNamespace)}.`;
  }

  return `${prefix}${type.name}${displayTypeArgumentList(type)}`;
}

function displayTypeArgumentList(type: NamedTypeSymbol): string {
  const args = type.typeArguments;
  if (args.length === 0) return "";
  if (type.isUnboundGenericType) return `<${",".repeat(args.length - 1)}>`;
  return `<${args.map(displayType).join(", ")}>`;
}

function displayParameter(param: ParameterSymbol): string {
  const modifier = param.refKind === "None" ? "" : `${param.refKind.toLowerCase()} `;
  return `${modifier}${displayType(param.type)}`;
}

/**
 * e.g. `Sample.C.Map<TOut>(string, ref int)`
 */
export function displayMethod(method: MethodSymbol): string {
  const typeParams =
    method.typeParameters.length > 0
      ? `<${method.typeParameters.map((tp) => tp.name).join(", ")}>`
      : "";
  const params = method.parameters.map(displayParameter).join(", ");
  return `${displayNamedType(method.containingType)}.${method.name}${typeParams}(${params})`;
}
