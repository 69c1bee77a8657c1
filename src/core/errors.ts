/**
 * hookscan errors
 *
 * Every failure the engine raises carries an ErrorCode. The CLI prints the
 * code in front of the message; scan results keep it per failed module.
 */

export enum ErrorCode {
  // Module loading and parsing (2xxx)
  PARSE_FAILED = "E2000",
  PARSE_MODULE_NOT_FOUND = "E2001",

  // Scanning (3xxx)
  SCAN_MODULE_FAILED = "E3000",
  SCAN_NO_MODULES = "E3001",
  CATALOG_FINALIZED = "E3002",

  // Output (4xxx)
  OUTPUT_WRITE_FAILED = "E4000",
  OUTPUT_DIRECTORY_MISSING = "E4001",
  OUTPUT_RECORD_INVALID = "E4002",
  OUTPUT_CONTAINS_INPUT = "E4003",

  // General (9xxx)
  UNKNOWN_ERROR = "E9000",
  INVALID_ARGUMENT = "E9001",
  CONFIGURATION_ERROR = "E9002",
}

export type ErrorContext = Record<string, unknown>;

export class HookScanError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: ErrorContext;

  constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN_ERROR, context?: ErrorContext) {
    super(message);
    this.name = "HookScanError";
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Failure tied to one plugin module
 */
export abstract class ModuleError extends HookScanError {
  public readonly moduleName?: string;

  constructor(message: string, code: ErrorCode, context?: ErrorContext & { moduleName?: string }) {
    super(message, code, context);
    this.moduleName = context?.moduleName;
  }

  override toString(): string {
    const location = this.moduleName ? ` (module ${this.moduleName})` : "";
    return `${super.toString()}${location}`;
  }
}

export class ParsingError extends ModuleError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PARSE_FAILED,
    context?: ErrorContext & { moduleName?: string }
  ) {
    super(message, code, context);
    this.name = "ParsingError";
  }
}

export class ScanError extends ModuleError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SCAN_MODULE_FAILED,
    context?: ErrorContext & { moduleName?: string }
  ) {
    super(message, code, context);
    this.name = "ScanError";
  }
}

export class ConfigurationError extends HookScanError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.CONFIGURATION_ERROR,
    context?: ErrorContext
  ) {
    super(message, code, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Writing the analysis files failed, or a record does not fit hooks.json
 */
export class OutputError extends HookScanError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.OUTPUT_WRITE_FAILED,
    context?: ErrorContext & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "OutputError";
    this.filePath = context?.filePath;
  }
}

export function isHookScanError(error: unknown): error is HookScanError {
  return error instanceof HookScanError;
}

/**
 * Returns hookscan errors as they are and wraps anything else under `code`.
 */
export function toHookScanError(
  error: unknown,
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): HookScanError {
  if (isHookScanError(error)) return error;

  if (error instanceof Error) {
    return new HookScanError(error.message, code, { cause: error.name });
  }
  return new HookScanError(typeof error === "string" ? error : "Unexpected failure", code);
}
