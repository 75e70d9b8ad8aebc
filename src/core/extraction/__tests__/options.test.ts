import { describe, it, expect } from "vitest";
import { DEFAULT_EXTRACTION_OPTIONS, resolveExtractionOptions } from "../options.js";
import { ConfigurationError, ErrorCode } from "../../errors.js";

describe("resolveExtractionOptions", () => {
  it("fills every default", () => {
    expect(resolveExtractionOptions()).toEqual({
      baseUri: "http://dotnet.example/",
      includePrivate: false,
      includeInternal: true,
      includeCompilerGenerated: false,
      includeAttributes: true,
      includeExternalTypes: true,
      extractExceptions: true,
      extractSeeAlso: true,
    });
    expect(DEFAULT_EXTRACTION_OPTIONS).toEqual(resolveExtractionOptions({}));
    expect(Object.isFrozen(DEFAULT_EXTRACTION_OPTIONS)).toBe(true);
  });

  it("keeps explicit values", () => {
    const options = resolveExtractionOptions({ includePrivate: true, baseUri: "https://example.test/" });
    expect(options.includePrivate).toBe(true);
    expect(options.baseUri).toBe("https://example.test/");
    expect(options.includeInternal).toBe(true);
  });

  it("reports invalid fields as a configuration error", () => {
    let error: unknown;
    try {
      resolveExtractionOptions({ baseUri: "relative/path" });
    } catch (caught) {
      error = caught;
    }
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ code: ErrorCode.CONFIGURATION_ERROR });
  });
});
