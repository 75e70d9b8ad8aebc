/**
 * Human-readable rendering of attribute arguments and constant values.
 *
 * @module
 */

import { displayType } from "../symbols/display.js";
import type { AttributeData, ConstantValue, TypedConstant } from "../symbols/types.js";

/**
 * `null`, or the value's string form
 */
export function formatConstantValue(value: ConstantValue): string {
  return value === null ? "null" : String(value);
}

/**
 * e.g. `"text"`, `42`, `typeof(string)`, `[1, 2]`, `null`
 */
export function formatTypedConstant(constant: TypedConstant): string {
  switch (constant.kind) {
    case "primitive":
      return typeof constant.value === "string"
        ? `"${constant.value}"`
        : formatConstantValue(constant.value);
    case "enum":
      return String(constant.value);
    case "type":
      return constant.value === null ? "null" : `typeof(${displayType(constant.value)})`;
    case "array":
      return constant.values === null
        ? "null"
        : `[${constant.values.map(formatTypedConstant).join(", ")}]`;
  }
}

export function formatConstructorArguments(attribute: AttributeData): string {
  return attribute.constructorArguments.map(formatTypedConstant).join(", ");
}

export function formatNamedArguments(attribute: AttributeData): string {
  return attribute.namedArguments
    .map(([name, value]) => `${name}=${formatTypedConstant(value)}`)
    .join(", ");
}
