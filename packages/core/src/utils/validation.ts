import type { z } from 'zod';
import { accessSync, statSync, constants as fsConstants } from 'fs';
import type { Stats } from 'fs';
import { PackwrightError, ErrorCode } from '../errors.js';
import { errorMessage } from './error-utils.js';

export type PathKind = 'file' | 'directory';

export interface PathRequirement {
  kind: PathKind;
  /** How the path is named in messages, e.g. "Target root". */
  label: string;
  writable?: boolean;
}

/**
 * Fail early, before any work starts, when a path given on the command line
 * is missing, of the wrong kind, or cannot be used the way the caller needs.
 */
export function requirePath(path: string, { kind, label, writable = false }: PathRequirement): void {
  const notFoundCode = kind === 'file' ? ErrorCode.IO_FILE_NOT_FOUND : ErrorCode.IO_DIR_NOT_FOUND;
  const context = { path, kind };

  if (!path) {
    throw new PackwrightError(
      `${label} path is required`,
      ErrorCode.INPUT_INVALID,
      `Provide a path for the ${label.toLowerCase()}`
    );
  }

  let stats: Stats | undefined;
  try {
    stats = statSync(path, { throwIfNoEntry: false });
  } catch (error) {
    throw new PackwrightError(
      `Cannot inspect ${label.toLowerCase()} ${path}: ${errorMessage(error)}`,
      ErrorCode.IO_PERMISSION_DENIED,
      `Cannot access ${label.toLowerCase()} ${path}`,
      context
    );
  }

  if (!stats) {
    throw new PackwrightError(
      `${label} not found: ${path}`,
      notFoundCode,
      `Cannot find ${label.toLowerCase()} ${path}`,
      context
    );
  }
  if (kind === 'file' ? !stats.isFile() : !stats.isDirectory()) {
    throw new PackwrightError(
      `${label} is not a ${kind}: ${path}`,
      notFoundCode,
      `Expected ${label.toLowerCase()} ${path} to be a ${kind}`,
      context
    );
  }

  try {
    accessSync(path, writable ? fsConstants.R_OK | fsConstants.W_OK : fsConstants.R_OK);
  } catch {
    const access = writable ? 'writable' : 'readable';
    throw new PackwrightError(
      `${label} is not ${access}: ${path}`,
      ErrorCode.IO_PERMISSION_DENIED,
      `${label} ${path} is not ${access}`,
      context
    );
  }
}

/** One numbered line per issue, `(root)` standing for the value itself. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue, i) => {
    const where = issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)';
    return `${String(i + 1)}. [${where}] ${issue.message}`;
  });
}

export function validate<T>(
  schema: z.ZodType<T>,
  data: unknown,
  subject?: string,
  code: ErrorCode = ErrorCode.INPUT_INVALID
): T {
  const parsed = schema.safeParse(data);
  if (parsed.success) return parsed.data;

  const issues = describeIssues(parsed.error);
  throw new PackwrightError(
    `Validation failed${subject ? ` for ${subject}` : ''}:\n${issues.map((line) => `  ${line}`).join('\n')}`,
    code,
    `Invalid data${subject ? ` in ${subject}` : ''}: ${String(issues.length)} issue(s) found`,
    { field: subject }
  );
}
