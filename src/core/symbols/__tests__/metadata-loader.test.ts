import { describe, it, expect, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { loadSymbolSet, loadSymbolSetFromFile, parseSymbolDump } from "../metadata-loader.js";
import { getFullMetadataName } from "../metadata-name.js";
import { displayMethod, displayType } from "../display.js";
import type { SymbolDumpInput } from "../metadata-schema.js";
import type { NamedTypeSymbol, SymbolSet } from "../types.js";
import { ErrorCode, MetadataLoadError } from "../../errors.js";

const FIXTURE = fileURLToPath(new URL("../../__tests__/fixtures/shapes-dump.json", import.meta.url));

function typeNamed(symbols: SymbolSet, name: string): NamedTypeSymbol {
  const type = symbols.getTypeByMetadataName(name);
  if (!type) throw new Error(`${name} not loaded`);
  return type;
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error");
}

function genericDump(): SymbolDumpInput {
  return {
    formatVersion: 1,
    target: "app",
    modules: [
      { id: "app", name: "App" },
      { id: "lib", name: "Lib" },
    ],
    types: [
      { id: "int", module: "lib", namespace: "System", name: "Int32", specialType: "System_Int32" },
      { id: "list", module: "lib", namespace: "System.Collections.Generic", name: "List", typeParameters: [{ name: "T" }] },
      {
        id: "holder",
        module: "app",
        namespace: "App",
        name: "Holder",
        typeParameters: [{ name: "T" }],
        members: [
          { kind: "field", name: "A", type: { def: "list", args: ["int"] } },
          { kind: "field", name: "B", type: { def: "list", args: ["int"] } },
          { kind: "field", name: "C", type: { array: "int" } },
          { kind: "field", name: "D", type: { array: "int" } },
          { kind: "field", name: "Self", type: { def: "holder", args: [{ typeParam: 0, type: "holder" }] } },
          {
            kind: "method",
            id: "holder.pick",
            name: "Pick",
            typeParameters: [{ name: "U" }],
            returnType: { methodTypeParam: 0, method: "holder.pick" },
            parameters: [{ name: "items", type: { def: "list", args: [{ methodTypeParam: 0, method: "holder.pick" }] } }],
          },
          { kind: "field", name: "Open", type: { def: "list", args: [], unbound: true } },
        ],
      },
      { id: "dup-lib", module: "lib", namespace: "App", name: "Twin" },
      { id: "dup-app", module: "app", namespace: "App", name: "Twin" },
    ],
  };
}

describe("loadSymbolSet", () => {
  const symbols = loadSymbolSet(genericDump());
  const holder = typeNamed(symbols, "App.Holder`1");

  function fieldType(name: string) {
    const field = holder.members.find((m) => m.name === name);
    if (field?.kind !== "field") throw new Error(`${name} not loaded`);
    return field.type;
  }

  it("interns constructed generics and arrays", () => {
    expect(fieldType("A")).toBe(fieldType("B"));
    expect(fieldType("C")).toBe(fieldType("D"));
    expect(getFullMetadataName(fieldType("A"))).toBe("System.Collections.Generic.List`1[System.Int32]");
    expect(displayType(fieldType("A"))).toBe("System.Collections.Generic.List<int>");
  });

  it("resolves a generic applied to its own parameters to the definition", () => {
    expect(fieldType("Self")).toBe(holder);
  });

  it("keeps unbound generics distinct from the definition", () => {
    const open = fieldType("Open");
    if (open.kind !== "named") throw new Error("Open is not a named type");
    expect(open.isUnboundGenericType).toBe(true);
    expect(open.originalDefinition).toBe(typeNamed(symbols, "System.Collections.Generic.List`1"));
    expect(displayType(open)).toBe("System.Collections.Generic.List<>");
  });

  it("links method type parameters referenced from the method's own signature", () => {
    const pick = holder.members.find((m) => m.name === "Pick");
    if (pick?.kind !== "method") throw new Error("Pick not loaded");
    const [u] = pick.typeParameters;
    if (!u) throw new Error("U not loaded");

    expect(pick.returnType).toBe(u);
    expect(u.declaringMethod).toBe(pick);
    expect(displayMethod(pick)).toBe("App.Holder<T>.Pick<U>(System.Collections.Generic.List<U>)");
  });

  it("prefers the target module when two modules declare the same name", () => {
    expect(typeNamed(symbols, "App.Twin").containingModule).toBe(symbols.targetModule);
    expect(symbols.getTypeByMetadataName("App.Missing")).toBeNull();
  });
});

describe("loadSymbolSet errors", () => {
  it("reports dangling type references", () => {
    const dump = genericDump();
    dump.types?.push({ id: "broken", module: "app", name: "Broken", baseType: "nowhere" });
    expect(catchError(() => loadSymbolSet(dump))).toMatchObject({
      code: ErrorCode.METADATA_UNRESOLVED_REFERENCE,
      context: { id: "nowhere" },
    });
  });

  it("reports a target module that is not declared", () => {
    expect(catchError(() => loadSymbolSet({ ...genericDump(), target: "ghost" }))).toMatchObject({
      code: ErrorCode.METADATA_TARGET_NOT_FOUND,
    });
  });

  it("rejects dumps that fail validation", () => {
    const error = catchError(() => parseSymbolDump({ formatVersion: 2, target: "app", modules: [] }));
    expect(error).toBeInstanceOf(MetadataLoadError);
    expect(error).toMatchObject({ code: ErrorCode.METADATA_INVALID });
  });

  it("rejects duplicate ids", () => {
    const dump = genericDump();
    dump.types?.push({ id: "int", module: "app", name: "Other" });
    expect(catchError(() => loadSymbolSet(dump))).toMatchObject({
      code: ErrorCode.METADATA_INVALID,
      message: "Duplicate type id 'int'",
    });
  });

  it("rejects types nested inside themselves", () => {
    const dump = genericDump();
    dump.types?.push(
      { id: "a", module: "app", name: "A", containingType: "b" },
      { id: "b", module: "app", name: "B", containingType: "a" }
    );
    expect(catchError(() => loadSymbolSet(dump))).toMatchObject({ code: ErrorCode.METADATA_INVALID });
  });

  it("rejects the wrong number of type arguments", () => {
    const dump = genericDump();
    dump.types?.push({
      id: "bad",
      module: "app",
      name: "Bad",
      baseType: { def: "list", args: ["int", "int"] },
    });
    expect(catchError(() => loadSymbolSet(dump))).toMatchObject({
      code: ErrorCode.METADATA_INVALID,
      message: "Type 'list' takes 1 type arguments, got 2",
    });
  });
});

describe("loadSymbolSetFromFile", () => {
  const tempDirs: string[] = [];

  afterAll(async () => {
    await Promise.all(tempDirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
  });

  async function writeTemp(content: string): Promise<string> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "typegraph-"));
    tempDirs.push(dir);
    const file = path.join(dir, "dump.json");
    await fs.writeFile(file, content, "utf-8");
    return file;
  }

  it("reads and links a dump from disk", async () => {
    const symbols = await loadSymbolSetFromFile(FIXTURE);
    const circle = typeNamed(symbols, "Shapes.Geometry.Circle");
    const shape = typeNamed(symbols, "Shapes.Geometry.Shape");

    expect(symbols.targetModule.name).toBe("Shapes");
    expect(symbols.targetModule.version).toBe("1.2.0.0");
    expect(circle.baseType).toBe(shape);
    expect(circle.containingNamespace.name).toBe("Geometry");

    const area = circle.members.find((m) => m.name === "Area");
    if (area?.kind !== "method") throw new Error("Area not loaded");
    expect(area.overriddenMethod).toBe(shape.members[0]);
  });

  it("reports missing files as read failures", async () => {
    await expect(loadSymbolSetFromFile(path.join(os.tmpdir(), "no-such-dump.json"))).rejects.toMatchObject({
      code: ErrorCode.METADATA_READ_FAILED,
    });
  });

  it("reports malformed JSON as a read failure", async () => {
    const file = await writeTemp("{ not json");
    await expect(loadSymbolSetFromFile(file)).rejects.toMatchObject({
      code: ErrorCode.METADATA_READ_FAILED,
      filePath: file,
    });
  });

  it("attaches the file path to linking errors", async () => {
    const file = await writeTemp(
      JSON.stringify({ formatVersion: 1, target: "m", modules: [{ id: "m", name: "M" }], types: [{ id: "t", module: "x", name: "T" }] })
    );
    await expect(loadSymbolSetFromFile(file)).rejects.toMatchObject({
      code: ErrorCode.METADATA_UNRESOLVED_REFERENCE,
      filePath: file,
    });
  });
});
