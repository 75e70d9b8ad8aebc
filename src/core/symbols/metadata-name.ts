/**
 * Full metadata names
 *
 * `Namespace.Outer`1+Inner` for definitions,
 * `System.Collections.Generic.Dictionary`2[System.String,System.Int32]` for
 * constructed generics, `Elem[]` / `Elem[,]` / `Elem*` for arrays and pointers, and
 * `T:{owner}.{name}` for type parameters so that `A<T>.T` and `B<T>.T` differ.
 *
 * @module
 */

import { displayMethod, displayNamespace } from "./display.js";
import type { NamedTypeSymbol, TypeSymbol } from "./types.js";

export function getFullMetadataName(type: TypeSymbol): string {
  switch (type.kind) {
    case "array":
      // `[,]` for rank 2 keeps `int[,]` apart from `int[]` and the jagged `int[][]`
      return `${getFullMetadataName(type.elementType)}[${",".repeat(type.rank - 1)}]`;
    case "pointer":
      return `${getFullMetadataName(type.pointedAtType)}*`;
    case "typeParameter": {
      let owner = "";
      if (type.declaringType) {
        owner = getFullMetadataName(type.declaringType);
      } else if (type.declaringMethod) {
        owner = displayMethod(type.declaringMethod);
      }
      return `T:${owner}.${type.name}`;
    }
    case "named":
      return namedTypeMetadataName(type);
  }
}

function namedTypeMetadataName(type: NamedTypeSymbol): string {
  const containing: NamedTypeSymbol[] = [];
  for (let current = type.containingType; current; current = current.containingType) {
    containing.unshift(current);
  }

  let name = "";
  if (!type.containingNamespace.isGlobalNamespace) {
    name += `${displayNamespace(type.containingNamespace)}.`;
  }
  for (const outer of containing) {
    name += `${outer.name}${genericSuffix(outer)}+`;
  }
  return `${name}${type.name}${genericSuffix(type)}`;
}

function genericSuffix(type: NamedTypeSymbol): string {
  const { typeParameters, typeArguments } = type;
  if (typeParameters.length === 0 && typeArguments.length === 0) return "";

  const arity = typeParameters.length > 0 ? typeParameters.length : typeArguments.length;
  let suffix = `\`${arity}`;

  const isConstructed =
    typeArguments.length > 0 && !typeArguments.every((arg) => arg.kind === "typeParameter");
  if (isConstructed) {
    suffix += `[${typeArguments.map(getFullMetadataName).join(",")}]`;
  }
  return suffix;
}
