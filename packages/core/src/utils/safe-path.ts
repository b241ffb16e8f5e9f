import { isAbsolute, relative, resolve, sep } from 'path';
import { PackwrightError, ErrorCode } from '../errors.js';

/** Directory under every target root that holds manifest, trash index and quarantine. */
export const STATE_DIR_NAME = '.packwright';

function unsafe(path: string, reason: string): PackwrightError {
  return new PackwrightError(
    `Unsafe path '${path}': ${reason}`,
    ErrorCode.UNSAFE_ARCHIVE_PATH,
    `Refusing to use path '${path}' because it ${reason}`,
    { path }
  );
}

/**
 * Normalize an archive- or definition-relative path to POSIX form without
 * leading `./` or `/`. Throws UNSAFE_ARCHIVE_PATH for drive letters, UNC
 * prefixes and any `..` segment.
 */
export function normalizeRelativePath(rawPath: string): string {
  const slashed = rawPath.replace(/\\/g, '/');
  if (/^[a-zA-Z]:/.test(slashed)) {
    throw unsafe(rawPath, 'carries a drive letter');
  }
  if (slashed.startsWith('//')) {
    throw unsafe(rawPath, 'is a network path');
  }

  const parts: string[] = [];
  for (const segment of slashed.split('/')) {
    if (segment === '' || segment === '.') continue;
    if (segment === '..') {
      throw unsafe(rawPath, 'contains a parent-directory segment');
    }
    if (segment.includes('\0')) {
      throw unsafe(rawPath, 'contains a NUL byte');
    }
    parts.push(segment);
  }
  return parts.join('/');
}

/** True when `relPath` is the reserved state directory or lies inside it. */
export function isReservedPath(relPath: string): boolean {
  const first = relPath.split('/')[0] ?? '';
  return first.toLowerCase() === STATE_DIR_NAME;
}

/**
 * Join relative segments onto `root`, re-validating that the result stays
 * inside it. Returns both the absolute path and the normalized relative path.
 */
export function resolveWithin(
  root: string,
  ...segments: string[]
): { absolute: string; relative: string } {
  const joined = segments.filter((s) => s !== '').join('/');
  const relPath = normalizeRelativePath(joined);
  const absoluteRoot = resolve(root);
  const absolute = resolve(absoluteRoot, ...relPath.split('/'));
  const rel = relative(absoluteRoot, absolute);
  if (rel.startsWith('..') || isAbsolute(rel)) {
    throw unsafe(joined, 'resolves outside the target root');
  }
  return { absolute, relative: rel.split(sep).join('/') };
}

/** Like resolveWithin, but also refuses the reserved state directory. */
export function resolveWritable(
  root: string,
  ...segments: string[]
): { absolute: string; relative: string } {
  const resolved = resolveWithin(root, ...segments);
  if (resolved.relative === '' || isReservedPath(resolved.relative)) {
    throw unsafe(resolved.relative || '.', `targets the reserved ${STATE_DIR_NAME} directory or the root itself`);
  }
  return resolved;
}
