import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join, relative, sep } from 'path';
import AdmZip from 'adm-zip';
import { ApiError } from '../errors.js';
import type { Downloader } from '../download/downloader.js';
import type { Release, ReleaseIndex } from '../resolver/release-index.js';

/** Zip bytes holding the given files; names ending in `/` become directory entries. */
export function zipOf(files: Record<string, string>): Buffer {
  const zip = new AdmZip();
  for (const [name, content] of Object.entries(files)) {
    zip.addFile(name, Buffer.from(content, 'utf-8'));
  }
  return zip.toBuffer();
}

export async function makeTempDir(label: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `packwright-${label}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Every file under `root` as sorted POSIX relative paths. */
export async function listFiles(root: string): Promise<string[]> {
  const found: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    for (const entry of await readdir(dir, { withFileTypes: true })) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(full);
      } else if (entry.isFile()) {
        found.push(relative(root, full).split(sep).join('/'));
      }
    }
  };
  await walk(root);
  return found.sort();
}

export async function readText(root: string, relPath: string): Promise<string> {
  return readFile(join(root, ...relPath.split('/')), 'utf-8');
}

/** Serves canned bytes per URL; unknown URLs fail the way an unreachable host does. */
export class FakeDownloader implements Downloader {
  readonly requested: string[] = [];

  constructor(
    private readonly files: Record<string, Buffer>,
    private readonly failures: Record<string, Error> = {}
  ) {}

  async *fetch(url: string): AsyncGenerator<Uint8Array> {
    this.requested.push(url);
    const failure = this.failures[url];
    if (failure) throw failure;
    const bytes = this.files[url];
    if (!bytes) {
      throw new ApiError(`connect ECONNREFUSED ${url}`, undefined, { url });
    }
    yield bytes;
  }
}

export class FakeReleaseIndex implements ReleaseIndex {
  readonly calls: string[] = [];

  constructor(private readonly releases: Record<string, Release[] | Error>) {}

  async listReleases(repoOwner: string, repoName: string): Promise<Release[]> {
    const key = `${repoOwner}/${repoName}`;
    this.calls.push(key);
    const found = this.releases[key];
    if (found instanceof Error) throw found;
    return found ?? [];
  }
}

/**
 * A response whose body serves `parts`, then stalls. Like a real fetch body,
 * it errors with the signal's reason once the request signal aborts.
 */
export function stallingResponse(parts: number[][], init?: RequestInit): Response {
  const signal = init?.signal ?? undefined;
  let next = 0;
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      signal?.addEventListener('abort', () => {
        controller.error(signal.reason);
      });
    },
    pull(controller) {
      const part = parts[next++];
      if (part) {
        controller.enqueue(Uint8Array.from(part));
        return;
      }
      return new Promise<void>(() => undefined);
    },
  });
  return new Response(body);
}
