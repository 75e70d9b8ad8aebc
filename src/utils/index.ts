/**
 * Shared utilities
 */

export { createLogger, setLogLevel, type LogLevel, type Logger } from "./logger.js";

export {
  ExtractionOptionsSchema,
  TripleFormatSchema,
  formatZodError,
  safeValidate,
  type ValidationResult,
} from "./validation.js";
