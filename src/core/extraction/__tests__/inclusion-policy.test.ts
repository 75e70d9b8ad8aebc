import { describe, it, expect } from "vitest";
import { shouldIncludeMember, shouldIncludeType, type InclusionOptions } from "../inclusion-policy.js";
import { loadSymbolSet } from "../../symbols/metadata-loader.js";
import type { Accessibility, NamedTypeSymbol } from "../../symbols/types.js";

const ACCESSIBILITIES: Accessibility[] = [
  "Public",
  "Protected",
  "ProtectedOrInternal",
  "Internal",
  "ProtectedAndInternal",
  "Private",
];

function loadTypes(): NamedTypeSymbol[] {
  const symbols = loadSymbolSet({
    formatVersion: 1,
    target: "m",
    modules: [{ id: "m", name: "Policy" }],
    types: [
      ...ACCESSIBILITIES.map((accessibility) => ({
        id: accessibility,
        module: "m",
        name: accessibility,
        accessibility,
      })),
      {
        id: "generated",
        module: "m",
        name: "<>c",
        isImplicitlyDeclared: true,
        members: [
          { kind: "field" as const, name: "<>9", isImplicitlyDeclared: true, type: "Public" },
          { kind: "field" as const, name: "Visible", accessibility: "Private" as const, type: "Public" },
        ],
      },
    ],
  });
  return [...symbols.targetModule.globalNamespace.typeMembers];
}

const defaults: InclusionOptions = {
  includePrivate: false,
  includeInternal: true,
  includeCompilerGenerated: false,
};

describe("inclusion policy", () => {
  const types = loadTypes();
  const declared = types.filter((t) => !t.isImplicitlyDeclared);
  const generated = types.find((t) => t.isImplicitlyDeclared);

  function included(options: InclusionOptions): string[] {
    return declared.filter((t) => shouldIncludeType(t, options)).map((t) => t.name);
  }

  it("includes everything but private by default", () => {
    expect(included(defaults)).toEqual([
      "Public",
      "Protected",
      "ProtectedOrInternal",
      "Internal",
      "ProtectedAndInternal",
    ]);
  });

  it("gates internal and protected-and-internal on includeInternal", () => {
    expect(included({ ...defaults, includeInternal: false })).toEqual([
      "Public",
      "Protected",
      "ProtectedOrInternal",
    ]);
  });

  it("gates private on includePrivate", () => {
    expect(included({ ...defaults, includePrivate: true })).toEqual(ACCESSIBILITIES);
  });

  it("excludes compiler-synthesized symbols unless requested", () => {
    if (!generated) throw new Error("generated type not loaded");
    expect(shouldIncludeType(generated, defaults)).toBe(false);
    expect(shouldIncludeType(generated, { ...defaults, includeCompilerGenerated: true })).toBe(true);
  });

  it("applies the same rules to members", () => {
    if (!generated) throw new Error("generated type not loaded");
    const [synthesized, visible] = generated.members;
    if (!synthesized || !visible) throw new Error("members not loaded");

    expect(shouldIncludeMember(synthesized, defaults)).toBe(false);
    expect(shouldIncludeMember(synthesized, { ...defaults, includeCompilerGenerated: true })).toBe(true);
    expect(shouldIncludeMember(visible, defaults)).toBe(false);
    expect(shouldIncludeMember(visible, { ...defaults, includePrivate: true })).toBe(true);
  });

  it("checks compiler generation before accessibility", () => {
    if (!generated) throw new Error("generated type not loaded");
    const [synthesized] = generated.members;
    if (!synthesized) throw new Error("members not loaded");
    expect(
      shouldIncludeMember(synthesized, { includePrivate: true, includeInternal: true, includeCompilerGenerated: false })
    ).toBe(false);
  });
});
