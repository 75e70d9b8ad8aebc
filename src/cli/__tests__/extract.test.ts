import { describe, it, expect, afterAll } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import {
  extractCommand,
  parseFormat,
  resolveOutputPath,
  toExtractionOptions,
  type ExtractCommandOptions,
} from "../commands/extract.js";
import { ConfigurationError, ErrorCode } from "../../core/errors.js";

const FIXTURE = fileURLToPath(new URL("../../core/__tests__/fixtures/shapes-dump.json", import.meta.url));
const CIRCLE = "http://dotnet.example/type/Shapes/1.2.0.0/Shapes.Geometry.Circle";

function commandOptions(overrides: Partial<ExtractCommandOptions> = {}): ExtractCommandOptions {
  return {
    format: "ntriples",
    includeInternal: true,
    extractExceptions: true,
    extractSeealso: true,
    quiet: true,
    ...overrides,
  };
}

describe("toExtractionOptions", () => {
  it("maps default flags to the default options", () => {
    expect(toExtractionOptions(commandOptions())).toEqual({
      baseUri: undefined,
      includePrivate: false,
      includeInternal: true,
      includeCompilerGenerated: false,
      includeAttributes: true,
      includeExternalTypes: true,
      extractExceptions: true,
      extractSeeAlso: true,
    });
  });

  it("inverts the exclude flags and passes the negated ones through", () => {
    const options = toExtractionOptions(
      commandOptions({
        baseUri: "https://example.test/",
        includePrivate: true,
        includeInternal: false,
        excludeAttributes: true,
        excludeExternalTypes: true,
        extractExceptions: false,
        extractSeealso: false,
      })
    );
    expect(options).toMatchObject({
      baseUri: "https://example.test/",
      includePrivate: true,
      includeInternal: false,
      includeAttributes: false,
      includeExternalTypes: false,
      extractExceptions: false,
      extractSeeAlso: false,
    });
  });
});

describe("parseFormat", () => {
  it("accepts the supported formats", () => {
    expect(parseFormat("ntriples")).toBe("ntriples");
    expect(parseFormat("turtle")).toBe("turtle");
  });

  it("rejects anything else", () => {
    expect(() => parseFormat("rdfxml")).toThrow(ConfigurationError);
    expect(() => parseFormat("rdfxml")).toThrow('Unknown output format "rdfxml"');
  });
});

describe("resolveOutputPath", () => {
  it("swaps the dump extension for the format's", () => {
    expect(resolveOutputPath(path.join("out", "app.json"), "ntriples")).toBe(path.join("out", "app.nt"));
    expect(resolveOutputPath("app.symbols.json", "turtle")).toBe("app.symbols.ttl");
  });

  it("keeps an explicit output, including stdout", () => {
    expect(resolveOutputPath("app.json", "turtle", "graph.ttl")).toBe("graph.ttl");
    expect(resolveOutputPath("app.json", "turtle", "-")).toBe("-");
  });
});

describe("extractCommand", () => {
  const tempDirs: string[] = [];

  afterAll(async () => {
    await Promise.all(tempDirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
  });

  async function tempFile(name: string): Promise<string> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "typegraph-cli-"));
    tempDirs.push(dir);
    return path.join(dir, name);
  }

  it("writes N-Triples for the dump's target module", async () => {
    const output = await tempFile("shapes.nt");
    await extractCommand(FIXTURE, commandOptions({ output }));

    const lines = (await fs.readFile(output, "utf-8")).split("\n");
    expect(lines[0]).toBe("# @prefix rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#> .");
    expect(lines).toContain(
      `<${CIRCLE}> <http://www.w3.org/1999/02/22-rdf-syntax-ns#type> <http://typegraph.example/ontology/Class> .`
    );
    expect(lines).toContain(`<${CIRCLE}> <http://typegraph.example/ontology/name> "Circle" .`);
  });

  it("writes Turtle with prefixes up front", async () => {
    const output = await tempFile("shapes.ttl");
    await extractCommand(FIXTURE, commandOptions({ output, format: "turtle" }));

    const lines = (await fs.readFile(output, "utf-8")).split("\n");
    expect(lines.slice(0, 6)).toEqual([
      "@prefix rdf: <http://www.w3.org/1999/02/22-rdf-syntax-ns#> .",
      "@prefix rdfs: <http://www.w3.org/2000/01/rdf-schema#> .",
      "@prefix xsd: <http://www.w3.org/2001/XMLSchema#> .",
      "@prefix tg: <http://typegraph.example/ontology/> .",
      "@prefix dn: <http://dotnet.example/ontology/> .",
      "",
    ]);
    expect(lines).toContain(`<${CIRCLE}> <http://typegraph.example/ontology/isAbstract> false .`);
  });

  it("fails on an unknown format before reading the dump", async () => {
    await expect(extractCommand("missing.json", commandOptions({ format: "rdfxml" }))).rejects.toMatchObject({
      code: ErrorCode.CONFIGURATION_ERROR,
    });
  });

  it("surfaces load failures", async () => {
    const output = await tempFile("never.nt");
    await expect(
      extractCommand(path.join(os.tmpdir(), "no-such-dump.json"), commandOptions({ output }))
    ).rejects.toMatchObject({ code: ErrorCode.METADATA_READ_FAILED });
  });
});
