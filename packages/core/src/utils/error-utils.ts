export function extractStatusCode(error: Error): number | undefined {
  return 'status' in error && typeof error.status === 'number' ? error.status : undefined;
}

/** The errno code of a Node system error, e.g. `ENOENT`. */
export function extractErrnoCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined;
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

export function sanitizeErrorMessage(message: string): string {
  if (message.includes('<!DOCTYPE') || message.includes('<html')) {
    return message
      .replace(/<[^>]*>/g, '')
      .replace(/\s+/g, ' ')
      .trim()
      .slice(0, 200);
  }
  return message;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
