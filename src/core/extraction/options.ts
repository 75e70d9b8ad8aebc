/**
 * Extraction options resolution
 *
 * @module
 */

import { ConfigurationError } from "../errors.js";
import {
  ExtractionOptionsSchema,
  formatZodError,
  safeValidate,
  type ExtractionOptions,
  type ExtractionOptionsInput,
} from "../../utils/validation.js";

export type { ExtractionOptions, ExtractionOptionsInput };

export const DEFAULT_EXTRACTION_OPTIONS: Readonly<ExtractionOptions> = Object.freeze(
  ExtractionOptionsSchema.parse({})
);

/**
 * Fill defaults and validate. Throws ConfigurationError listing every invalid field.
 */
export function resolveExtractionOptions(partial: ExtractionOptionsInput = {}): ExtractionOptions {
  const result = safeValidate(ExtractionOptionsSchema, partial);
  if (!result.success) {
    const issues = formatZodError(result.error);
    throw new ConfigurationError(`Invalid extraction options: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}
