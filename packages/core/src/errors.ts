import { extractStatusCode } from './utils/error-utils.js';

export enum ErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  INPUT_INVALID = 'INPUT_INVALID',
  IO_FILE_NOT_FOUND = 'IO_FILE_NOT_FOUND',
  IO_DIR_NOT_FOUND = 'IO_DIR_NOT_FOUND',
  IO_PERMISSION_DENIED = 'IO_PERMISSION_DENIED',
  INSUFFICIENT_SPACE = 'INSUFFICIENT_SPACE',
  DEFINITION_INVALID = 'DEFINITION_INVALID',
  UNSUPPORTED_ACTION = 'UNSUPPORTED_ACTION',
  COMPONENT_NOT_FOUND = 'COMPONENT_NOT_FOUND',
  SOURCE_UNREACHABLE = 'SOURCE_UNREACHABLE',
  HTTP_ERROR = 'HTTP_ERROR',
  NO_MATCHING_ASSET = 'NO_MATCHING_ASSET',
  AMBIGUOUS_MATCH = 'AMBIGUOUS_MATCH',
  DOWNLOAD_CANCELLED = 'DOWNLOAD_CANCELLED',
  DOWNLOAD_TIMEOUT = 'DOWNLOAD_TIMEOUT',
  ARCHIVE_CORRUPT = 'ARCHIVE_CORRUPT',
  UNSAFE_ARCHIVE_PATH = 'UNSAFE_ARCHIVE_PATH',
  AMBIGUOUS_SOURCE_MATCH = 'AMBIGUOUS_SOURCE_MATCH',
  STEP_EXECUTION_FAILED = 'STEP_EXECUTION_FAILED',
  MANIFEST_CORRUPT = 'MANIFEST_CORRUPT',
  COMPONENT_NOT_INSTALLED = 'COMPONENT_NOT_INSTALLED',
  COMPONENT_NOT_TRASHED = 'COMPONENT_NOT_TRASHED',
  RESTORE_CONFLICT = 'RESTORE_CONFLICT',
  INTERNAL_UNKNOWN = 'INTERNAL_UNKNOWN',
}
type ErrorContext = Record<string, string | number | boolean | null | undefined>;
export class PackwrightError extends Error {
  public readonly code: ErrorCode;
  public readonly userMessage: string;
  public readonly context: ErrorContext;
  public readonly recoverable: boolean;
  constructor(
    message: string,
    code: ErrorCode,
    userMessage?: string,
    context: ErrorContext = {},
    recoverable = false
  ) {
    super(message);
    this.name = 'PackwrightError';
    this.code = code;
    this.userMessage = userMessage ?? message;
    this.context = context;
    this.recoverable = recoverable;
    Error.captureStackTrace(this, PackwrightError);
  }
  static fromError(
    error: unknown,
    code = ErrorCode.INTERNAL_UNKNOWN,
    userMessage?: string
  ): PackwrightError {
    if (error instanceof PackwrightError) return error;
    const message = error instanceof Error ? error.message : String(error);
    const context = error instanceof Error ? { originalError: error.name } : {};
    return new PackwrightError(message, code, userMessage, context);
  }
}
export class ConfigurationError extends PackwrightError {
  constructor(message: string, configKey?: string) {
    super(
      message,
      ErrorCode.CONFIG_INVALID,
      `Configuration issue: ${message}`,
      { configKey },
      false
    );
    this.name = 'ConfigurationError';
  }
}

function classifyStatus(statusCode: number | undefined): { code: ErrorCode; recoverable: boolean } {
  if (statusCode === undefined) {
    return { code: ErrorCode.SOURCE_UNREACHABLE, recoverable: true };
  }
  const recoverable = statusCode === 408 || statusCode === 429 || statusCode >= 500;
  return { code: ErrorCode.HTTP_ERROR, recoverable };
}

/**
 * Transport-level failure talking to a remote source. Without a status code the
 * source was never reached; with one, the response was not 2xx.
 */
export class ApiError extends PackwrightError {
  public readonly statusCode?: number;
  constructor(message: string, statusCode?: number, context: ErrorContext = {}) {
    const { code, recoverable } = classifyStatus(statusCode);
    const userMessage =
      statusCode === undefined
        ? `Source unreachable: ${message}`
        : `Request failed with HTTP ${String(statusCode)}: ${message}`;
    super(message, code, userMessage, { ...context, statusCode }, recoverable);
    this.name = 'ApiError';
    this.statusCode = statusCode;
  }

  static fromFetchError(error: unknown, url: string): ApiError {
    if (error instanceof ApiError) return error;
    if (error instanceof Error) {
      return new ApiError(error.message, extractStatusCode(error), {
        url,
        originalError: error.name,
      });
    }
    return new ApiError(String(error), undefined, { url });
  }
}

/**
 * A processing step failed. `partialPaths` lists the files the component had
 * already written before the failure; they are left on disk.
 */
export class StepExecutionError extends PackwrightError {
  public readonly action: string;
  public readonly reason: string;
  public readonly partialPaths: string[];
  constructor(
    action: string,
    reason: string,
    partialPaths: string[] = [],
    code: ErrorCode = ErrorCode.STEP_EXECUTION_FAILED,
    context: ErrorContext = {}
  ) {
    super(
      `Step '${action}' failed: ${reason}`,
      code,
      `Processing step '${action}' failed: ${reason}`,
      { ...context, action, partialPathCount: partialPaths.length },
      false
    );
    this.name = 'StepExecutionError';
    this.action = action;
    this.reason = reason;
    this.partialPaths = partialPaths;
  }
}

export class ManifestCorruptError extends PackwrightError {
  constructor(filePath: string, detail: string) {
    super(
      `Manifest file is corrupt: ${filePath}: ${detail}`,
      ErrorCode.MANIFEST_CORRUPT,
      `Refusing to continue: ${filePath} could not be read (${detail}). Fix or move the file before retrying.`,
      { path: filePath },
      false
    );
    this.name = 'ManifestCorruptError';
  }
}
