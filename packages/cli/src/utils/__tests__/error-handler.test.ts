import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ConfigurationError,
  ErrorCode,
  ManifestCorruptError,
  PackwrightError,
} from '@packwright/core';
import { ErrorHandler, isSensitiveKey } from '../error-handler.js';

describe('ErrorHandler', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('getExitCode', () => {
    it.each([
      [ErrorCode.DEFINITION_INVALID, 2],
      [ErrorCode.COMPONENT_NOT_FOUND, 2],
      [ErrorCode.IO_DIR_NOT_FOUND, 3],
      [ErrorCode.INSUFFICIENT_SPACE, 3],
      [ErrorCode.SOURCE_UNREACHABLE, 4],
      [ErrorCode.HTTP_ERROR, 4],
      [ErrorCode.STEP_EXECUTION_FAILED, 1],
    ])('maps %s to %i', (code, exitCode) => {
      expect(ErrorHandler.getExitCode(new PackwrightError('x', code))).toBe(exitCode);
    });

    it('treats configuration and manifest errors by their code', () => {
      expect(ErrorHandler.getExitCode(new ConfigurationError('bad'))).toBe(2);
      const corrupt = new ManifestCorruptError('/sd/.packwright/manifest.json', 'bad json');
      expect(ErrorHandler.getExitCode(corrupt)).toBe(5);
    });

    it('uses 1 for anything that is not a PackwrightError', () => {
      expect(ErrorHandler.getExitCode(new Error('plain'))).toBe(1);
      expect(ErrorHandler.getExitCode('text')).toBe(1);
    });
  });

  describe('formatError', () => {
    it('prints context and redacts sensitive keys', () => {
      const errors: unknown[] = [];
      vi.spyOn(console, 'error').mockImplementation((line: unknown) => {
        errors.push(line);
      });
      vi.spyOn(console, 'log').mockImplementation(() => undefined);

      ErrorHandler.formatError(
        new PackwrightError('Request failed', ErrorCode.HTTP_ERROR, 'GitHub said no', {
          repository: 'example-org/hekate',
          token: 'test-token',
          statusCode: undefined,
        })
      );

      expect(errors).toContain('   repository: example-org/hekate');
      expect(errors).toContain('   token: ***REDACTED***');
      expect(errors).toContain('   Code: HTTP_ERROR');
      expect(errors.some((line) => String(line).includes('statusCode'))).toBe(false);
      expect(errors.some((line) => String(line).includes('test-token'))).toBe(false);
    });
  });

  it('recognises sensitive keys regardless of case', () => {
    expect(isSensitiveKey('Authorization')).toBe(true);
    expect(isSensitiveKey('API_KEY')).toBe(true);
    expect(isSensitiveKey('repository')).toBe(false);
  });
});
