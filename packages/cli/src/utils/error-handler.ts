import { PackwrightError, ErrorCode } from '@packwright/core';
import { Logger } from './cli-helpers.js';

export const SUGGESTIONS: Partial<Record<ErrorCode, string[]>> = {
  [ErrorCode.CONFIG_INVALID]: [
    'Check the variables in your .env file',
    'RESOLUTION_MODE accepts strict or best-effort',
  ],
  [ErrorCode.DEFINITION_INVALID]: [
    'Check the component registry file for missing or empty fields',
    'Every component needs a unique id and a source',
  ],
  [ErrorCode.UNSUPPORTED_ACTION]: [
    'Use one of the supported processing step actions',
    'Run `packwright components --format json` to see valid definitions',
  ],
  [ErrorCode.IO_FILE_NOT_FOUND]: [
    'Double-check the file path',
    'Set REGISTRY_FILE if the registry lives elsewhere',
  ],
  [ErrorCode.IO_DIR_NOT_FOUND]: ['Confirm the target root is mounted and the path is valid'],
  [ErrorCode.SOURCE_UNREACHABLE]: ['Verify your network connection', 'Retry after a short wait'],
  [ErrorCode.HTTP_ERROR]: [
    'A GITHUB_TOKEN raises the API rate limit',
    'Confirm the repository and release still exist',
  ],
  [ErrorCode.INSUFFICIENT_SPACE]: ['Free some space on the target device, then retry'],
  [ErrorCode.IO_PERMISSION_DENIED]: ['Check that the target device is not write-protected'],
  [ErrorCode.MANIFEST_CORRUPT]: [
    'Back up and repair the file named above, or move it aside',
    'Without it, installed files can no longer be tracked',
  ],
};

const SENSITIVE_KEYS = new Set([
  'token',
  'apikey',
  'api_key',
  'secret',
  'password',
  'authorization',
  'credential',
]);

export function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

function provideSuggestions(error: PackwrightError): void {
  const errorSuggestions = SUGGESTIONS[error.code];
  if (errorSuggestions && errorSuggestions.length > 0) {
    console.error('\n💡 Hints:');
    errorSuggestions.forEach((suggestion) => {
      Logger.info(`• ${suggestion}`);
    });
  }
}

export const ErrorHandler = {
  formatError(error: unknown): void {
    if (error instanceof PackwrightError) {
      Logger.fail(error.userMessage);
      if (Object.keys(error.context).length > 0) {
        console.error('   Extra details:');
        for (const [key, value] of Object.entries(error.context)) {
          if (value !== undefined && value !== null) {
            console.error(`   ${key}: ${isSensitiveKey(key) ? '***REDACTED***' : String(value)}`);
          }
        }
      }
      console.error(`   Code: ${error.code}`);
      provideSuggestions(error);
    } else if (error instanceof Error) {
      Logger.fail(error.message);
    } else {
      Logger.fail(`Something went wrong unexpectedly: ${String(error)}`);
    }
  },
  getExitCode(error: unknown): number {
    if (error instanceof PackwrightError) {
      switch (error.code) {
        case ErrorCode.CONFIG_INVALID:
        case ErrorCode.INPUT_INVALID:
        case ErrorCode.DEFINITION_INVALID:
        case ErrorCode.UNSUPPORTED_ACTION:
        case ErrorCode.COMPONENT_NOT_FOUND:
          return 2;
        case ErrorCode.IO_FILE_NOT_FOUND:
        case ErrorCode.IO_DIR_NOT_FOUND:
        case ErrorCode.IO_PERMISSION_DENIED:
        case ErrorCode.INSUFFICIENT_SPACE:
          return 3;
        case ErrorCode.SOURCE_UNREACHABLE:
        case ErrorCode.HTTP_ERROR:
        case ErrorCode.DOWNLOAD_TIMEOUT:
          return 4;
        case ErrorCode.MANIFEST_CORRUPT:
          return 5;
        default:
          return 1;
      }
    }
    return 1;
  },
  handleCliError(error: unknown): never {
    ErrorHandler.formatError(error);
    const exitCode = ErrorHandler.getExitCode(error);
    process.exit(exitCode);
  },
} as const;
