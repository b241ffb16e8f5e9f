import { PackwrightError, ApiError, ErrorCode } from '../errors.js';
import { sanitizeErrorMessage } from '../utils/error-utils.js';

export interface DownloadOptions {
  chunkSize: number;
  /** Caller cancellation, checked between chunks. */
  signal?: AbortSignal;
  timeoutMs?: number;
  onProgress?: (receivedBytes: number, totalBytes: number | undefined) => void;
}

export interface Downloader {
  fetch(url: string, options: DownloadOptions): AsyncIterable<Uint8Array>;
}

function cancelled(url: string): PackwrightError {
  return new PackwrightError(
    `Download cancelled: ${url}`,
    ErrorCode.DOWNLOAD_CANCELLED,
    'The download was cancelled',
    { url }
  );
}

function timedOut(url: string, timeoutMs: number | undefined): PackwrightError {
  return new PackwrightError(
    `Download timed out after ${String(timeoutMs)}ms: ${url}`,
    ErrorCode.DOWNLOAD_TIMEOUT,
    `The download did not finish within ${String(timeoutMs)}ms`,
    { url, timeoutMs },
    true
  );
}

export class HttpDownloader implements Downloader {
  constructor(private readonly userAgent = 'packwright') {}

  async *fetch(url: string, options: DownloadOptions): AsyncGenerator<Uint8Array> {
    const timeoutSignal =
      options.timeoutMs !== undefined ? AbortSignal.timeout(options.timeoutMs) : undefined;
    const signals = [options.signal, timeoutSignal].filter(
      (s): s is AbortSignal => s !== undefined
    );
    const signal = signals.length > 0 ? AbortSignal.any(signals) : undefined;

    const abortError = (): PackwrightError =>
      options.signal?.aborted ? cancelled(url) : timedOut(url, options.timeoutMs);
    const throwIfAborted = (): void => {
      if (signal?.aborted) throw abortError();
    };

    throwIfAborted();
    const response = await fetch(url, {
      headers: { 'User-Agent': this.userAgent },
      redirect: 'follow',
      signal,
    }).catch((error: unknown) => {
      if (signal?.aborted) throw abortError();
      throw ApiError.fromFetchError(error, url);
    });

    if (!response.ok) {
      const text = await response.text().catch((): string => '');
      throw new ApiError(
        `Download failed (${String(response.status)}): ${sanitizeErrorMessage(text.slice(0, 200)) || response.statusText}`,
        response.status,
        { url }
      );
    }
    if (!response.body) return;

    const lengthHeader = response.headers.get('content-length');
    const total = lengthHeader ? parseInt(lengthHeader, 10) : undefined;
    const reader = response.body.getReader();
    let received = 0;
    let finished = false;
    let pending: Uint8Array[] = [];
    let pendingSize = 0;
    const flush = (): Uint8Array => {
      const out = Buffer.concat(pending, pendingSize);
      pending = [];
      pendingSize = 0;
      return out;
    };

    try {
      for (;;) {
        throwIfAborted();
        const result = await reader.read().catch((error: unknown) => {
          if (signal?.aborted) throw abortError();
          throw ApiError.fromFetchError(error, url);
        });
        if (result.done) {
          finished = true;
          break;
        }

        const value = result.value;
        received += value.length;
        options.onProgress?.(received, total);

        let offset = 0;
        while (offset < value.length) {
          const take = Math.min(options.chunkSize - pendingSize, value.length - offset);
          pending.push(value.subarray(offset, offset + take));
          pendingSize += take;
          offset += take;
          if (pendingSize === options.chunkSize) {
            throwIfAborted();
            yield flush();
          }
        }
      }
      if (pendingSize > 0) {
        yield flush();
      }
    } finally {
      if (finished) {
        reader.releaseLock();
      } else {
        // consumer stopped early or a chunk failed; release the connection.
        // An errored body rejects cancel() with its own error, which must not
        // replace the typed one already thrown.
        await reader.cancel().catch((): void => undefined);
      }
    }
  }
}

export async function readAll(stream: AsyncIterable<Uint8Array>): Promise<Buffer> {
  const chunks: Uint8Array[] = [];
  let size = 0;
  for await (const chunk of stream) {
    chunks.push(chunk);
    size += chunk.length;
  }
  return Buffer.concat(chunks, size);
}
