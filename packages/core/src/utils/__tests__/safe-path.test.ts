import { describe, it, expect } from 'vitest';
import { join, resolve } from 'path';
import {
  isReservedPath,
  normalizeRelativePath,
  resolveWithin,
  resolveWritable,
} from '../safe-path.js';
import { PackwrightError, ErrorCode } from '../../errors.js';

function unsafeCode(fn: () => unknown): ErrorCode | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof PackwrightError ? error.code : undefined;
  }
  return undefined;
}

describe('normalizeRelativePath', () => {
  it('converts separators and drops empty and dot segments', () => {
    expect(normalizeRelativePath('./switch\\\\hekate//payload.bin')).toBe('switch/hekate/payload.bin');
    expect(normalizeRelativePath('/atmosphere/')).toBe('atmosphere');
    expect(normalizeRelativePath('')).toBe('');
  });

  it.each(['../evil.txt', 'a/../../b', 'a\\..\\b', 'C:/Windows', '//server/share', 'a\0b'])(
    'rejects %j',
    (raw) => {
      expect(unsafeCode(() => normalizeRelativePath(raw))).toBe(ErrorCode.UNSAFE_ARCHIVE_PATH);
    }
  );

  it('keeps names that merely contain dots', () => {
    expect(normalizeRelativePath('a/..b/c..')).toBe('a/..b/c..');
  });
});

describe('isReservedPath', () => {
  it('matches the state directory case-insensitively', () => {
    expect(isReservedPath('.packwright')).toBe(true);
    expect(isReservedPath('.Packwright/manifest.json')).toBe(true);
    expect(isReservedPath('switch/.packwright')).toBe(false);
  });
});

describe('resolveWithin', () => {
  const root = resolve('/tmp/sd-root');

  it('joins segments below the root', () => {
    expect(resolveWithin(root, 'switch/', 'tool', 'tool.nro')).toEqual({
      absolute: join(root, 'switch', 'tool', 'tool.nro'),
      relative: 'switch/tool/tool.nro',
    });
  });

  it('skips empty segments', () => {
    expect(resolveWithin(root, '', 'boot.ini').relative).toBe('boot.ini');
  });

  it('refuses to escape the root', () => {
    expect(unsafeCode(() => resolveWithin(root, 'switch', '../../etc'))).toBe(
      ErrorCode.UNSAFE_ARCHIVE_PATH
    );
  });
});

describe('resolveWritable', () => {
  const root = resolve('/tmp/sd-root');

  it('refuses the root itself and the state directory', () => {
    expect(unsafeCode(() => resolveWritable(root, ''))).toBe(ErrorCode.UNSAFE_ARCHIVE_PATH);
    expect(unsafeCode(() => resolveWritable(root, '.packwright', 'manifest.json'))).toBe(
      ErrorCode.UNSAFE_ARCHIVE_PATH
    );
  });

  it('allows ordinary paths', () => {
    expect(resolveWritable(root, 'bootloader/hekate_ipl.ini').relative).toBe(
      'bootloader/hekate_ipl.ini'
    );
  });
});
