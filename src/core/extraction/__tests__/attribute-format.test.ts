import { describe, it, expect } from "vitest";
import {
  formatConstantValue,
  formatConstructorArguments,
  formatNamedArguments,
  formatTypedConstant,
} from "../attribute-format.js";
import { loadSymbolSet } from "../../symbols/metadata-loader.js";

describe("formatConstantValue", () => {
  it("renders null and primitives", () => {
    expect(formatConstantValue(null)).toBe("null");
    expect(formatConstantValue(42)).toBe("42");
    expect(formatConstantValue(true)).toBe("true");
    expect(formatConstantValue("text")).toBe("text");
  });
});

describe("formatTypedConstant", () => {
  it("quotes strings but not other primitives", () => {
    expect(formatTypedConstant({ kind: "primitive", value: "a" })).toBe('"a"');
    expect(formatTypedConstant({ kind: "primitive", value: 1.5 })).toBe("1.5");
    expect(formatTypedConstant({ kind: "primitive", value: null })).toBe("null");
  });

  it("renders enums by value and arrays element-wise", () => {
    expect(formatTypedConstant({ kind: "enum", value: 4 })).toBe("4");
    expect(
      formatTypedConstant({
        kind: "array",
        values: [
          { kind: "primitive", value: 1 },
          { kind: "primitive", value: "b" },
        ],
      })
    ).toBe('[1, "b"]');
    expect(formatTypedConstant({ kind: "array", values: null })).toBe("null");
    expect(formatTypedConstant({ kind: "type", value: null })).toBe("null");
  });
});

describe("attribute arguments", () => {
  const symbols = loadSymbolSet({
    formatVersion: 1,
    target: "m",
    modules: [{ id: "m", name: "Attrs" }],
    types: [
      { id: "string", module: "m", namespace: "System", name: "String", specialType: "System_String" },
      { id: "usage", module: "m", namespace: "System", name: "AttributeUsageAttribute" },
      {
        id: "marker",
        module: "m",
        name: "Marker",
        attributes: [
          {
            type: "usage",
            args: [{ enum: 12 }, { type: { array: "string" } }],
            named: { AllowMultiple: true, Name: "x" },
          },
        ],
      },
    ],
  });
  const marker = symbols.getTypeByMetadataName("Marker");
  const [attribute] = marker?.attributes ?? [];

  it("joins constructor arguments", () => {
    if (!attribute) throw new Error("attribute not loaded");
    expect(formatConstructorArguments(attribute)).toBe("12, typeof(string[])");
  });

  it("joins named arguments as key=value pairs", () => {
    if (!attribute) throw new Error("attribute not loaded");
    expect(formatNamedArguments(attribute)).toBe('AllowMultiple=true, Name="x"');
  });
});
