/**
 * Runtime Validation Schemas
 *
 * Zod schemas for validating configuration at runtime.
 * Provides type-safe validation with automatic TypeScript type inference.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Output Format Schema
// =============================================================================

/**
 * Supported triple serializations
 */
export const TripleFormatSchema = z.enum(["ntriples", "turtle"]);

// =============================================================================
// Extraction Options Schema
// =============================================================================

/**
 * Extraction options schema
 */
export const ExtractionOptionsSchema = z.object({
  /** Base URI every minted IRI starts with */
  baseUri: z.string().url().default("http://dotnet.example/"),

  /** Include private types and members */
  includePrivate: z.boolean().default(false),

  /** Include internal and protected-and-internal types and members */
  includeInternal: z.boolean().default(true),

  /** Include compiler-synthesized symbols */
  includeCompilerGenerated: z.boolean().default(false),

  /** Emit attribute instances */
  includeAttributes: z.boolean().default(true),

  /** Describe types referenced from outside the target module */
  includeExternalTypes: z.boolean().default(true),

  /** Emit `throws` edges from documented exceptions */
  extractExceptions: z.boolean().default(true),

  /** Emit `relatedTo` edges from documented see-also references */
  extractSeeAlso: z.boolean().default(true),
});

export type ExtractionOptions = z.infer<typeof ExtractionOptionsSchema>;
export type ExtractionOptionsInput = z.input<typeof ExtractionOptionsSchema>;

// =============================================================================
// Validation Utilities
// =============================================================================

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: z.ZodError };

/**
 * Safely validate data against a schema (returns result object)
 */
export function safeValidate<Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  data: unknown
): ValidationResult<Output> {
  const result = schema.safeParse(data);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
