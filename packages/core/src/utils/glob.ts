import { minimatch } from 'minimatch';

/**
 * Case-insensitive glob test where only `*` and `?` are wildcards; braces,
 * brackets, extglobs and a leading `!` or `#` match themselves. Patterns
 * without a slash match the last path segment anywhere in the tree; patterns
 * with one match the whole path.
 */
export function matchesPattern(filePath: string, pattern: string): boolean {
  return minimatch(filePath, pattern.replace(/[\\[\]]/g, '\\$&'), {
    nocase: true,
    dot: true,
    matchBase: true,
    nobrace: true,
    noext: true,
    nonegate: true,
    nocomment: true,
  });
}

export function filterByPattern<T>(
  items: T[],
  pattern: string,
  pathOf: (item: T) => string
): { matched: T[]; skipped: number } {
  const matched: T[] = [];
  let skipped = 0;

  for (const item of items) {
    if (matchesPattern(pathOf(item), pattern)) {
      matched.push(item);
    } else {
      skipped++;
    }
  }

  return { matched, skipped };
}
