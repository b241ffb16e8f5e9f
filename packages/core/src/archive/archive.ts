import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, extname } from 'node:path';
import AdmZip from 'adm-zip';
import { PackwrightError, ErrorCode } from '../errors.js';
import { errorMessage } from '../utils/error-utils.js';
import { normalizeRelativePath } from '../utils/safe-path.js';

export type ArchiveFormat = 'zip' | 'file';

export interface ArchiveEntry {
  /** POSIX path relative to the archive root, no leading slash. */
  path: string;
  isDirectory: boolean;
}

export interface ArchiveHandle {
  readonly format: ArchiveFormat;
  readonly filename: string;
  listEntries(): ArchiveEntry[];
  read(entryPath: string): Buffer;
  /** Write one file entry to `destinationPath`, creating parent directories. */
  extract(entryPath: string, destinationPath: string): Promise<void>;
}

const ARCHIVE_EXTENSIONS = new Set(['.zip', '.7z', '.rar', '.tar', '.gz']);

function isZip(bytes: Uint8Array): boolean {
  return bytes.length >= 4 && bytes[0] === 0x50 && bytes[1] === 0x4b;
}

function corrupt(filename: string, detail: string): PackwrightError {
  return new PackwrightError(
    `Archive ${filename} is unreadable: ${detail}`,
    ErrorCode.ARCHIVE_CORRUPT,
    `The downloaded file ${filename} is not a readable archive`,
    { filename }
  );
}

function unsafeEntry(filename: string, entry: string, reason: string): PackwrightError {
  return new PackwrightError(
    `Archive ${filename} contains unsafe entry '${entry}': ${reason}`,
    ErrorCode.UNSAFE_ARCHIVE_PATH,
    `Refusing to extract ${filename}: entry '${entry}' ${reason}`,
    { filename, entry }
  );
}

function missingEntry(filename: string, entryPath: string): PackwrightError {
  return new PackwrightError(
    `Entry '${entryPath}' not found in ${filename}`,
    ErrorCode.INPUT_INVALID,
    `Archive ${filename} has no file '${entryPath}'`,
    { filename, entry: entryPath }
  );
}

/** Validate and normalize a raw entry name, rejecting absolute and escaping paths. */
function safeEntryPath(filename: string, rawName: string): string {
  const slashed = rawName.replace(/\\/g, '/');
  if (slashed.startsWith('/')) {
    throw unsafeEntry(filename, rawName, 'is absolute');
  }
  try {
    return normalizeRelativePath(slashed);
  } catch (error) {
    throw unsafeEntry(filename, rawName, errorMessage(error).replace(/^Unsafe path '[^']*': /, ''));
  }
}

class ZipArchive implements ArchiveHandle {
  readonly format = 'zip';
  private readonly entries = new Map<string, AdmZip.IZipEntry>();
  private readonly directories = new Set<string>();

  constructor(
    readonly filename: string,
    zipEntries: AdmZip.IZipEntry[]
  ) {
    for (const entry of zipEntries) {
      const path = safeEntryPath(filename, entry.entryName);
      if (path === '') continue;
      if (entry.isDirectory) {
        this.directories.add(path);
      } else {
        this.entries.set(path, entry);
      }
    }
  }

  listEntries(): ArchiveEntry[] {
    return [
      ...[...this.directories].map((path) => ({ path, isDirectory: true })),
      ...[...this.entries.keys()].map((path) => ({ path, isDirectory: false })),
    ];
  }

  read(entryPath: string): Buffer {
    const entry = this.entries.get(entryPath);
    if (!entry) throw missingEntry(this.filename, entryPath);
    try {
      return entry.getData();
    } catch (error) {
      throw corrupt(this.filename, `${entryPath}: ${errorMessage(error)}`);
    }
  }

  async extract(entryPath: string, destinationPath: string): Promise<void> {
    const data = this.read(entryPath);
    await mkdir(dirname(destinationPath), { recursive: true });
    await writeFile(destinationPath, data);
  }
}

/** A downloaded file that is not an archive, exposed as one entry named after the download. */
class SingleFileArchive implements ArchiveHandle {
  readonly format = 'file';
  private readonly entryPath: string;

  constructor(
    readonly filename: string,
    private readonly bytes: Buffer
  ) {
    this.entryPath = safeEntryPath(filename, filename);
  }

  listEntries(): ArchiveEntry[] {
    return [{ path: this.entryPath, isDirectory: false }];
  }

  read(entryPath: string): Buffer {
    if (entryPath !== this.entryPath) throw missingEntry(this.filename, entryPath);
    return this.bytes;
  }

  async extract(entryPath: string, destinationPath: string): Promise<void> {
    const data = this.read(entryPath);
    await mkdir(dirname(destinationPath), { recursive: true });
    await writeFile(destinationPath, data);
  }
}

/**
 * Open downloaded bytes. Zip content is recognised by its magic bytes; any
 * other file whose name does not carry an archive extension becomes a
 * single-entry archive. Every entry path is validated here, before the
 * caller can write anything.
 */
export function openArchive(bytes: Uint8Array, filename: string): ArchiveHandle {
  const buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  if (isZip(buffer)) {
    let zipEntries: AdmZip.IZipEntry[];
    try {
      zipEntries = new AdmZip(buffer).getEntries();
    } catch (error) {
      throw corrupt(filename, errorMessage(error));
    }
    return new ZipArchive(filename, zipEntries);
  }

  if (ARCHIVE_EXTENSIONS.has(extname(filename).toLowerCase())) {
    throw corrupt(filename, 'content is not a zip archive');
  }
  return new SingleFileArchive(filename, buffer);
}
