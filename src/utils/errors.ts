/**
 * Standard error classes for Eventsmith
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  UNSUPPORTED_FILE_TYPE = "UNSUPPORTED_FILE_TYPE",
  TRANSFORM_NOT_FOUND = "TRANSFORM_NOT_FOUND",
  TRANSFORM_PARSE_ERROR = "TRANSFORM_PARSE_ERROR",
  COERCION_ERROR = "COERCION_ERROR",
  EXPRESSION_ERROR = "EXPRESSION_ERROR",
  CAPABILITY_LOAD_ERROR = "CAPABILITY_LOAD_ERROR",
  INPUT_READ_ERROR = "INPUT_READ_ERROR",
  INVALID_RECORD = "INVALID_RECORD",
  SINK_ERROR = "SINK_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class EventsmithError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "EventsmithError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class ConfigError extends EventsmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class UnsupportedFileTypeError extends EventsmithError {
  constructor(
    public readonly file: string,
    public readonly fileType: string,
  ) {
    super(
      ErrorCode.UNSUPPORTED_FILE_TYPE,
      `File type not supported by importer: ${fileType} (${file})`,
      { file, fileType },
    );
    this.name = "UnsupportedFileTypeError";
  }
}

export class TransformNotFoundError extends EventsmithError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorCode.TRANSFORM_NOT_FOUND, message, details);
    this.name = "TransformNotFoundError";
  }
}

export class TransformParseError extends EventsmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.TRANSFORM_PARSE_ERROR, message, details, options);
    this.name = "TransformParseError";
  }
}

export class CoercionError extends EventsmithError {
  constructor(
    public readonly field: string,
    public readonly value: unknown,
    public readonly coercion: string,
  ) {
    super(
      ErrorCode.COERCION_ERROR,
      `Cannot convert field '${field}' value ${JSON.stringify(value)} to ${coercion}`,
      { field, value, coercion },
    );
    this.name = "CoercionError";
  }
}

export class ExpressionEvaluationError extends EventsmithError {
  constructor(
    public readonly rule: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(
      ErrorCode.EXPRESSION_ERROR,
      `Expression for '${rule}' failed: ${message}`,
      { rule },
      options,
    );
    this.name = "ExpressionEvaluationError";
  }
}

export class CapabilityLoadError extends EventsmithError {
  constructor(
    public readonly capability: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(
      ErrorCode.CAPABILITY_LOAD_ERROR,
      `Failed to load required module '${capability}': ${message}`,
      { capability },
      options,
    );
    this.name = "CapabilityLoadError";
  }
}

export class InputReadError extends EventsmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.INPUT_READ_ERROR, message, details, options);
    this.name = "InputReadError";
  }
}

export class InvalidRecordError extends EventsmithError {
  constructor(
    public readonly file: string,
    public readonly line: number,
    public readonly field: string,
  ) {
    super(
      ErrorCode.INVALID_RECORD,
      `Invalid ${field} on line ${line} of ${file}`,
      { file, line, field },
    );
    this.name = "InvalidRecordError";
  }
}

export class SinkError extends EventsmithError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.SINK_ERROR, message, details, options);
    this.name = "SinkError";
  }
}

/**
 * Message of a thrown value, including values from another realm
 * that fail `instanceof Error`
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message;
  }
  return String(error);
}
