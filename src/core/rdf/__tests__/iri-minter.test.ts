import { describe, it, expect } from "vitest";
import { IriMinter, escapeIriSegment, DEFAULT_BASE_URI } from "../iri-minter.js";
import { InvalidArgumentError } from "../../errors.js";
import { loadSymbolSet } from "../../symbols/metadata-loader.js";
import type { MemberSymbol, NamedTypeSymbol, SymbolSet } from "../../symbols/types.js";
import type { SymbolDumpInput } from "../../symbols/metadata-schema.js";
import { getFullMetadataName } from "../../symbols/metadata-name.js";
import { displayType } from "../../symbols/display.js";

function overloadDump(): SymbolDumpInput {
  return {
    formatVersion: 1,
    target: "lib",
    modules: [
      { id: "lib", name: "Lib", version: "2.1.0.0" },
      { id: "corlib", name: "System.Runtime", version: "8.0.0.0" },
    ],
    types: [
      { id: "int", module: "corlib", namespace: "System", name: "Int32", specialType: "System_Int32" },
      { id: "long", module: "corlib", namespace: "System", name: "Int64", specialType: "System_Int64" },
      {
        id: "calc",
        module: "lib",
        namespace: "Lib.Math",
        name: "Calc",
        typeParameters: [{ name: "T" }],
        members: [
          { kind: "method", name: "Add", parameters: [{ name: "a", type: "int" }] },
          {
            kind: "method",
            name: "Add",
            parameters: [
              { name: "a", type: "int" },
              { name: "b", type: "int" },
            ],
          },
          { kind: "method", name: "Add", parameters: [{ name: "a", type: "long" }] },
          { kind: "method", name: "Swap", parameters: [{ name: "x", type: "int", refKind: "Ref" }] },
          { kind: "method", name: "Swap", parameters: [{ name: "x", type: "int", refKind: "Out" }] },
          { kind: "method", name: "Peek", parameters: [{ name: "x", type: "int", refKind: "In" }] },
          { kind: "method", id: "calc.id", name: "Id", typeParameters: [{ name: "U" }] },
          { kind: "field", name: "Total", type: "long" },
          {
            kind: "property",
            name: "Item",
            type: "int",
            isIndexer: true,
            getter: {},
            parameters: [
              { name: "row", type: "int" },
              { name: "col", type: "long" },
            ],
          },
        ],
      },
      { id: "calc.part", module: "lib", name: "Part", containingType: "calc" },
      {
        id: "grid",
        module: "lib",
        namespace: "Lib.Math",
        name: "Grid",
        members: [
          { kind: "field", name: "Cells", type: { array: "int", rank: 2 } },
          { kind: "field", name: "Raw", type: { pointer: "int" } },
          { kind: "field", name: "Calcs", type: { def: "calc", args: ["long"] } },
          { kind: "field", name: "Flat", type: { array: "int" } },
          { kind: "field", name: "Jagged", type: { array: { array: "int" } } },
        ],
      },
      { id: "global", module: "lib", name: "Top" },
    ],
  };
}

function typeNamed(symbols: SymbolSet, name: string): NamedTypeSymbol {
  const type = symbols.getTypeByMetadataName(name);
  if (!type) throw new Error(`${name} not loaded`);
  return type;
}

function membersNamed(type: NamedTypeSymbol, name: string): MemberSymbol[] {
  return type.members.filter((m) => m.name === name);
}

describe("escapeIriSegment", () => {
  it("keeps unreserved characters", () => {
    expect(escapeIriSegment("Abc-123_x.y~z")).toBe("Abc-123_x.y~z");
  });

  it("percent-encodes reserved characters with uppercase hex", () => {
    expect(escapeIriSegment("List`1[System.String]")).toBe("List%601%5BSystem.String%5D");
    expect(escapeIriSegment("a b,c")).toBe("a%20b%2Cc");
    expect(escapeIriSegment("Outer+Inner")).toBe("Outer%2BInner");
  });

  it("encodes non-ASCII characters as UTF-8 bytes", () => {
    expect(escapeIriSegment("é")).toBe("%C3%A9");
    expect(escapeIriSegment("😀")).toBe("%F0%9F%98%80");
  });
});

describe("IriMinter", () => {
  const symbols = loadSymbolSet(overloadDump());
  const minter = new IriMinter();
  const calc = typeNamed(symbols, "Lib.Math.Calc`1");
  const grid = typeNamed(symbols, "Lib.Math.Grid");
  const CALC = "http://dotnet.example/type/Lib/2.1.0.0/Lib.Math.Calc%601";

  it("trims trailing slashes from the base URI", () => {
    expect(DEFAULT_BASE_URI).toBe("http://dotnet.example/");
    expect(new IriMinter("http://example.test///").baseUri).toBe("http://example.test");
  });

  it("mints module, namespace and type IRIs", () => {
    expect(minter.module(symbols.targetModule)).toBe("http://dotnet.example/assembly/Lib/2.1.0.0");
    expect(minter.namespace(calc.containingNamespace)).toBe("http://dotnet.example/namespace/Lib.Math");
    expect(minter.namespace(symbols.targetModule.globalNamespace)).toBe(
      "http://dotnet.example/namespace/_global_"
    );
    expect(minter.type(calc)).toBe(CALC);
    expect(minter.type(typeNamed(symbols, "Top"))).toBe("http://dotnet.example/type/Lib/2.1.0.0/Top");
  });

  it("joins nested type names with +", () => {
    expect(minter.type(typeNamed(symbols, "Lib.Math.Calc`1+Part"))).toBe(`${CALC}%2BPart`);
  });

  it("mints arrays and pointers as builtin types", () => {
    const [cells, raw, calcs] = grid.members;
    if (cells?.kind !== "field" || raw?.kind !== "field" || calcs?.kind !== "field") {
      throw new Error("Grid fields not loaded");
    }
    expect(minter.type(cells.type)).toBe("http://dotnet.example/type/_builtin_/System.Int32%5B%2C%5D");
    expect(minter.type(raw.type)).toBe("http://dotnet.example/type/_builtin_/System.Int32%2A");
    expect(minter.type(calcs.type)).toBe(
      "http://dotnet.example/type/Lib/2.1.0.0/Lib.Math.Calc%601%5BSystem.Int64%5D"
    );
  });

  it("keeps rank-2, rank-1 and jagged arrays apart", () => {
    const fieldTypes = grid.members.flatMap((m) => (m.kind === "field" ? [m.type] : []));
    const [cells, , , flat, jagged] = fieldTypes;
    if (!cells || !flat || !jagged) throw new Error("Grid fields not loaded");

    expect(getFullMetadataName(cells)).toBe("System.Int32[,]");
    expect(getFullMetadataName(flat)).toBe("System.Int32[]");
    expect(getFullMetadataName(jagged)).toBe("System.Int32[][]");
    expect(displayType(cells)).toBe("int[,]");
    expect(new Set([cells, flat, jagged].map((t) => minter.type(t))).size).toBe(3);
  });

  it("mints type parameters under their declaring type's module", () => {
    const [t] = calc.typeParameters;
    if (!t) throw new Error("T not loaded");
    expect(minter.type(t)).toBe("http://dotnet.example/type/Lib/2.1.0.0/T%3ALib.Math.Calc%601.T");
    expect(minter.typeParameter(calc, t)).toBe(`${CALC}/typeparam/0`);
  });

  it("gives overloads differing in count or types distinct IRIs", () => {
    const iris = membersNamed(calc, "Add").map((m) => minter.member(m));
    expect(iris).toEqual([
      `${CALC}/member/Add%28System.Int32%29`,
      `${CALC}/member/Add%28System.Int32%2CSystem.Int32%29`,
      `${CALC}/member/Add%28System.Int64%29`,
    ]);
  });

  it("mints ref and out overloads to the same IRI", () => {
    const [byRef, byOut] = membersNamed(calc, "Swap");
    if (!byRef || !byOut) throw new Error("Swap overloads not loaded");
    expect(minter.member(byRef)).toBe(`${CALC}/member/Swap%28ref%20System.Int32%29`);
    expect(minter.member(byOut)).toBe(minter.member(byRef));
  });

  it("marks in parameters separately", () => {
    const [peek] = membersNamed(calc, "Peek");
    if (!peek) throw new Error("Peek not loaded");
    expect(minter.member(peek)).toBe(`${CALC}/member/Peek%28in%20System.Int32%29`);
  });

  it("mints fields without a signature and indexers with bracketed parameters", () => {
    const [total] = membersNamed(calc, "Total");
    const [item] = membersNamed(calc, "Item");
    if (!total || item?.kind !== "property") throw new Error("Calc members not loaded");

    expect(minter.member(total)).toBe(`${CALC}/member/Total`);
    const itemIri = `${CALC}/member/Item%5BSystem.Int32%2CSystem.Int64%5D`;
    expect(minter.member(item)).toBe(itemIri);

    const [, col] = item.parameters;
    if (!col) throw new Error("Indexer parameters not loaded");
    expect(minter.parameter(item, col)).toBe(`${itemIri}/param/1`);
  });

  it("mints method type parameters and attributes under their owner", () => {
    const [id] = membersNamed(calc, "Id");
    if (id?.kind !== "method") throw new Error("Id not loaded");
    const [u] = id.typeParameters;
    if (!u) throw new Error("U not loaded");

    const idIri = `${CALC}/member/Id%28%29`;
    expect(minter.typeParameter(id, u)).toBe(`${idIri}/typeparam/0`);
    expect(minter.attribute(id, 3)).toBe(`${idIri}/attr/3`);
    expect(minter.attribute(symbols.targetModule, 0)).toBe("http://dotnet.example/assembly/Lib/2.1.0.0/attr/0");
  });

  it("is pure", () => {
    expect(minter.type(calc)).toBe(minter.type(calc));
    expect(new IriMinter().type(calc)).toBe(minter.type(calc));
  });

  it("rejects owners that cannot carry type parameters or attributes", () => {
    const [t] = calc.typeParameters;
    if (!t) throw new Error("T not loaded");
    expect(() => minter.typeParameter(symbols.targetModule, t)).toThrow(InvalidArgumentError);
    expect(() => minter.attribute(calc.containingNamespace, 0)).toThrow(InvalidArgumentError);
  });
});
