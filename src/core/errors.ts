/**
 * Error Classes for TypeGraph-RDF
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Metadata loading errors (1xxx)
  METADATA_READ_FAILED = "E1000",
  METADATA_INVALID = "E1001",
  METADATA_UNRESOLVED_REFERENCE = "E1002",
  METADATA_TARGET_NOT_FOUND = "E1003",

  // Extraction errors (2xxx)
  EXTRACTION_FAILED = "E2000",
  EXTRACTION_DEPTH_EXCEEDED = "E2001",
  EXTRACTION_ABORTED = "E2002",

  // Sink errors (3xxx)
  SINK_WRITE_FAILED = "E3000",
  SINK_CLOSED = "E3001",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  CONFIGURATION_ERROR = "E9003",
}

/**
 * Base error class for all TypeGraph-RDF errors
 */
export class TypeGraphError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "TypeGraphError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Raised when a caller hands the core a symbol it cannot mint an identifier for.
 * Indicates a programming error; the run is aborted.
 */
export class InvalidArgumentError extends TypeGraphError {
  public readonly argument?: string;

  constructor(
    message: string,
    context?: Record<string, unknown> & { argument?: string }
  ) {
    super(message, ErrorCode.INVALID_ARGUMENT, context);
    this.name = "InvalidArgumentError";
    this.argument = context?.argument;
  }
}

/**
 * Symbol dump loading errors
 */
export class MetadataLoadError extends TypeGraphError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.METADATA_INVALID,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "MetadataLoadError";
    this.filePath = context?.filePath;
  }

  toString(): string {
    const location = this.filePath ? ` in ${this.filePath}` : "";
    return `[${this.code}] ${this.name}: ${this.message}${location}`;
  }
}

/**
 * Configuration errors
 */
export class ConfigurationError extends TypeGraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Graph walk errors
 */
export class ExtractionError extends TypeGraphError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.EXTRACTION_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "ExtractionError";
  }
}

/**
 * Triple sink output errors
 */
export class SinkError extends TypeGraphError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SINK_WRITE_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "SinkError";
  }
}

/**
 * Check if an error is a TypeGraphError
 */
export function isTypeGraphError(error: unknown): error is TypeGraphError {
  return error instanceof TypeGraphError;
}

/**
 * Wrap an unknown error in a TypeGraphError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): TypeGraphError {
  if (isTypeGraphError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new TypeGraphError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new TypeGraphError(
    typeof error === "string" ? error : defaultMessage,
    code
  );
}
