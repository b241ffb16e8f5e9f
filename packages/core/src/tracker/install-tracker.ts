import { cp, lstat, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { z } from 'zod';
import { PackwrightError, ManifestCorruptError, ErrorCode } from '../errors.js';
import { errorMessage, extractErrnoCode } from '../utils/error-utils.js';
import { STATE_DIR_NAME, resolveWithin } from '../utils/safe-path.js';
import { InstalledManifestSchema, TrashIndexSchema } from '../schemas/manifest.schema.js';
import type {
  InstalledManifest,
  InstalledManifestEntry,
  TrashEntry,
  TrashIndex,
} from '../schemas/manifest.schema.js';

export interface InstallMetadata {
  name?: string;
  version?: string;
  category?: string;
}

export interface PathFailure {
  path: string;
  code: ErrorCode;
  message: string;
}

export type OperationStatus = 'ok' | 'noop' | 'partial' | 'failed';

/** Outcome of a trash, restore or purge for one component. */
export interface ComponentOperationResult {
  componentId: string;
  status: OperationStatus;
  /** Original relative paths that were moved, restored or purged. */
  paths: string[];
  warnings: string[];
  failures: PathFailure[];
  error?: { code: ErrorCode; message: string };
}

export interface TrashedComponent {
  componentId: string;
  movedAt: number;
  entries: TrashEntry[];
  snapshot?: InstalledManifestEntry;
}

export interface RecordInstallResult {
  entry: InstalledManifestEntry;
  /** Paths owned by the previous install that were deleted from disk. */
  removedPaths: string[];
  warnings: string[];
}

const MANIFEST_FILE = 'manifest.json';
const TRASH_FILE = 'trash.json';
const TRASH_DIR = 'trash';

/**
 * Quarantine folder for a component. Ids may contain `/` or consist of dots,
 * so the name is percent-encoded down to characters FAT filesystems accept.
 */
export function trashFolderName(componentId: string): string {
  return encodeURIComponent(componentId).replace(
    /[.!~*'()]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

function emptyManifest(): InstalledManifest {
  return { version: 1, components: [] };
}

function emptyTrash(): TrashIndex {
  return { version: 1, entries: [], snapshots: [] };
}

async function readState<T>(filePath: string, schema: z.ZodType<T>, empty: () => T): Promise<T> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (extractErrnoCode(error) === 'ENOENT') return empty();
    throw new ManifestCorruptError(filePath, errorMessage(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ManifestCorruptError(filePath, `invalid JSON (${errorMessage(error)})`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first && first.path.length > 0 ? first.path.join('.') : '(root)';
    throw new ManifestCorruptError(filePath, `${where}: ${first?.message ?? 'schema mismatch'}`);
  }
  return result.data;
}

async function writeState(filePath: string, data: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmp = `${filePath}.tmp`;
  await writeFile(tmp, JSON.stringify(data, null, 2) + '\n', 'utf-8');
  await rename(tmp, filePath);
}

async function exists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (extractErrnoCode(error) === 'ENOENT') return false;
    throw error;
  }
}

/** Rename, falling back to copy and delete across devices. */
async function movePath(from: string, to: string): Promise<void> {
  await mkdir(dirname(to), { recursive: true });
  try {
    await rename(from, to);
  } catch (error) {
    if (extractErrnoCode(error) !== 'EXDEV') throw error;
    await cp(from, to, { recursive: true });
    await rm(from, { recursive: true, force: true });
  }
}

async function sameFileContent(a: string, b: string): Promise<boolean> {
  const [statA, statB] = await Promise.all([lstat(a), lstat(b)]);
  if (!statA.isFile() || !statB.isFile() || statA.size !== statB.size) return false;
  const [bytesA, bytesB] = await Promise.all([readFile(a), readFile(b)]);
  return bytesA.equals(bytesB);
}

function failureFrom(path: string, error: unknown): PathFailure {
  if (error instanceof PackwrightError) {
    return { path, code: error.code, message: error.message };
  }
  const errno = extractErrnoCode(error);
  const code =
    errno === 'ENOSPC'
      ? ErrorCode.INSUFFICIENT_SPACE
      : errno === 'EACCES' || errno === 'EPERM'
        ? ErrorCode.IO_PERMISSION_DENIED
        : errno === 'ENOENT'
          ? ErrorCode.IO_FILE_NOT_FOUND
          : ErrorCode.INTERNAL_UNKNOWN;
  return { path, code, message: errorMessage(error) };
}

function failedResult(componentId: string, code: ErrorCode, message: string): ComponentOperationResult {
  return { componentId, status: 'failed', paths: [], warnings: [], failures: [], error: { code, message } };
}

/**
 * Owns the persisted state under `<targetRoot>/.packwright/`: which files
 * each installed component owns, and which trashed files wait in quarantine.
 * Every mutating call loads the current state and writes it back before
 * returning. Unreadable state files stop every operation.
 */
export class InstallTracker {
  readonly stateDir: string;
  readonly manifestFile: string;
  readonly trashFile: string;
  readonly trashRoot: string;

  constructor(
    readonly targetRoot: string,
    private readonly now: () => number = Date.now
  ) {
    this.stateDir = join(targetRoot, STATE_DIR_NAME);
    this.manifestFile = join(this.stateDir, MANIFEST_FILE);
    this.trashFile = join(this.stateDir, TRASH_FILE);
    this.trashRoot = join(this.stateDir, TRASH_DIR);
  }

  async listInstalled(): Promise<InstalledManifestEntry[]> {
    return (await this.loadManifest()).components;
  }

  async listTrashed(): Promise<TrashEntry[]> {
    return (await this.loadTrash()).entries;
  }

  /** Trashed component ids with their snapshot, in trash order. */
  async listTrashedComponents(): Promise<TrashedComponent[]> {
    const trash = await this.loadTrash();
    const grouped = new Map<string, TrashEntry[]>();
    for (const entry of trash.entries) {
      grouped.set(entry.componentId, [...(grouped.get(entry.componentId) ?? []), entry]);
    }
    return [...grouped].map(([componentId, entries]) => ({
      componentId,
      movedAt: Math.max(...entries.map((e) => e.movedAt)),
      entries,
      snapshot: trash.snapshots.find((s) => s.componentId === componentId),
    }));
  }

  /**
   * Upsert the owned-path set of a component. Paths the previous install
   * owned but the new one does not are deleted from disk first, unless
   * another installed component still owns them.
   */
  async recordInstall(
    componentId: string,
    writtenPaths: string[],
    metadata: InstallMetadata = {}
  ): Promise<RecordInstallResult> {
    const manifest = await this.loadManifest();
    const ownedPaths = [...new Set(writtenPaths)];
    const keep = new Set(ownedPaths);
    const previous = manifest.components.find((c) => c.componentId === componentId);
    const ownedElsewhere = new Set(
      manifest.components
        .filter((c) => c.componentId !== componentId)
        .flatMap((c) => c.ownedPaths)
    );

    const removedPaths: string[] = [];
    const warnings: string[] = [];
    for (const stale of previous?.ownedPaths ?? []) {
      if (keep.has(stale)) continue;
      if (ownedPaths.some((p) => p.startsWith(`${stale}/`))) continue;
      if (ownedElsewhere.has(stale)) {
        warnings.push(`Kept ${stale}: also owned by another component`);
        continue;
      }
      const { absolute } = resolveWithin(this.targetRoot, stale);
      await rm(absolute, { recursive: true, force: true });
      removedPaths.push(stale);
    }

    const entry: InstalledManifestEntry = {
      componentId,
      installedAt: this.now(),
      ownedPaths,
      ...metadata,
    };
    const index = manifest.components.findIndex((c) => c.componentId === componentId);
    if (index >= 0) {
      manifest.components[index] = entry;
    } else {
      manifest.components.push(entry);
    }
    await writeState(this.manifestFile, manifest);

    return { entry, removedPaths, warnings };
  }

  async moveToTrash(componentIds: string[]): Promise<ComponentOperationResult[]> {
    const results: ComponentOperationResult[] = [];
    for (const componentId of componentIds) {
      results.push(await this.trashOne(componentId));
    }
    return results;
  }

  async restore(componentIds: string[]): Promise<ComponentOperationResult[]> {
    const results: ComponentOperationResult[] = [];
    for (const componentId of componentIds) {
      results.push(await this.restoreOne(componentId));
    }
    return results;
  }

  /** Permanently delete trashed files and forget them. */
  async purgeTrash(componentIds: string[]): Promise<ComponentOperationResult[]> {
    const results: ComponentOperationResult[] = [];
    for (const componentId of componentIds) {
      const trash = await this.loadTrash();
      const entries = trash.entries.filter((e) => e.componentId === componentId);
      if (entries.length === 0) {
        results.push(
          failedResult(componentId, ErrorCode.COMPONENT_NOT_TRASHED, `'${componentId}' is not in the trash`)
        );
        continue;
      }
      await this.dropTrashGeneration(trash, componentId);
      await writeState(this.trashFile, trash);
      results.push({
        componentId,
        status: 'ok',
        paths: entries.map((e) => e.originalRelativePath),
        warnings: [],
        failures: [],
      });
    }
    return results;
  }

  private async trashOne(componentId: string): Promise<ComponentOperationResult> {
    const manifest = await this.loadManifest();
    const trash = await this.loadTrash();
    const installed = manifest.components.find((c) => c.componentId === componentId);
    if (!installed) {
      return failedResult(
        componentId,
        ErrorCode.COMPONENT_NOT_INSTALLED,
        `'${componentId}' is not installed`
      );
    }

    const warnings: string[] = [];
    if (trash.entries.some((e) => e.componentId === componentId)) {
      await this.dropTrashGeneration(trash, componentId);
      warnings.push(`Purged an older trashed copy of '${componentId}'`);
    }

    const movedAt = this.now();
    const folder = trashFolderName(componentId);
    const moved: string[] = [];
    const failures: PathFailure[] = [];
    let remaining = installed.ownedPaths;

    for (const [i, relPath] of installed.ownedPaths.entries()) {
      try {
        const source = resolveWithin(this.targetRoot, relPath);
        const destination = resolveWithin(this.trashRoot, folder, String(movedAt), relPath);
        const trashRelativePath = `${folder}/${String(movedAt)}/${source.relative}`;
        if (!(await exists(source.absolute))) {
          trash.entries.push({
            componentId,
            originalRelativePath: relPath,
            trashRelativePath,
            movedAt,
            missing: true,
          });
          warnings.push(`${relPath} was already missing`);
          continue;
        }
        await movePath(source.absolute, destination.absolute);
        trash.entries.push({ componentId, originalRelativePath: relPath, trashRelativePath, movedAt });
        moved.push(relPath);
      } catch (error) {
        failures.push(failureFrom(relPath, error));
        remaining = installed.ownedPaths.slice(i);
        break;
      }
    }

    trash.snapshots = [...trash.snapshots.filter((s) => s.componentId !== componentId), installed];
    manifest.components =
      failures.length === 0
        ? manifest.components.filter((c) => c.componentId !== componentId)
        : manifest.components.map((c) =>
            c.componentId === componentId ? { ...c, ownedPaths: remaining } : c
          );
    await writeState(this.trashFile, trash);
    await writeState(this.manifestFile, manifest);

    return {
      componentId,
      status: failures.length === 0 ? 'ok' : moved.length > 0 ? 'partial' : 'failed',
      paths: moved,
      warnings,
      failures,
    };
  }

  private async restoreOne(componentId: string): Promise<ComponentOperationResult> {
    const manifest = await this.loadManifest();
    const trash = await this.loadTrash();
    const entries = trash.entries.filter((e) => e.componentId === componentId);
    const installed = manifest.components.find((c) => c.componentId === componentId);

    if (entries.length === 0) {
      if (installed) {
        return { componentId, status: 'noop', paths: [], warnings: [], failures: [] };
      }
      return failedResult(
        componentId,
        ErrorCode.COMPONENT_NOT_TRASHED,
        `'${componentId}' is neither installed nor in the trash`
      );
    }

    const restored: string[] = [];
    const failures: PathFailure[] = [];
    const pending = new Set<TrashEntry>();

    for (const entry of entries) {
      if (entry.missing) continue;
      try {
        const source = resolveWithin(this.trashRoot, entry.trashRelativePath);
        const destination = resolveWithin(this.targetRoot, entry.originalRelativePath);
        if (await exists(destination.absolute)) {
          if (!(await sameFileContent(source.absolute, destination.absolute))) {
            pending.add(entry);
            failures.push({
              path: entry.originalRelativePath,
              code: ErrorCode.RESTORE_CONFLICT,
              message: `${entry.originalRelativePath} already exists with different content`,
            });
            continue;
          }
          await rm(source.absolute, { recursive: true, force: true });
        } else {
          await movePath(source.absolute, destination.absolute);
        }
        restored.push(entry.originalRelativePath);
      } catch (error) {
        pending.add(entry);
        failures.push(failureFrom(entry.originalRelativePath, error));
      }
    }

    const snapshot = trash.snapshots.find((s) => s.componentId === componentId);
    const missing = new Set(entries.filter((e) => e.missing).map((e) => e.originalRelativePath));
    const stillTrashed = new Set([...pending].map((e) => e.originalRelativePath));
    const base: InstalledManifestEntry = snapshot ?? {
      componentId,
      installedAt: this.now(),
      ownedPaths: entries.map((e) => e.originalRelativePath),
    };
    const entry: InstalledManifestEntry = {
      ...base,
      ownedPaths: base.ownedPaths.filter((p) => !missing.has(p) && !stillTrashed.has(p)),
    };

    if (pending.size === 0) {
      await this.dropTrashGeneration(trash, componentId);
    } else {
      trash.entries = trash.entries.filter((e) => e.componentId !== componentId || pending.has(e));
    }
    if (entry.ownedPaths.length > 0 || pending.size === 0) {
      const index = manifest.components.findIndex((c) => c.componentId === componentId);
      if (index >= 0) {
        manifest.components[index] = entry;
      } else {
        manifest.components.push(entry);
      }
    }
    await writeState(this.trashFile, trash);
    await writeState(this.manifestFile, manifest);

    return {
      componentId,
      status: failures.length === 0 ? 'ok' : restored.length > 0 ? 'partial' : 'failed',
      paths: restored,
      warnings: [...missing].map((p) => `${p} was missing when trashed and was not restored`),
      failures,
    };
  }

  /** Remove a component's quarantined files, index entries and snapshot from `trash` in place. */
  private async dropTrashGeneration(trash: TrashIndex, componentId: string): Promise<void> {
    const { absolute } = resolveWithin(this.trashRoot, trashFolderName(componentId));
    await rm(absolute, { recursive: true, force: true });
    trash.entries = trash.entries.filter((e) => e.componentId !== componentId);
    trash.snapshots = trash.snapshots.filter((s) => s.componentId !== componentId);
  }

  private loadManifest(): Promise<InstalledManifest> {
    return readState(this.manifestFile, InstalledManifestSchema, emptyManifest);
  }

  private loadTrash(): Promise<TrashIndex> {
    return readState(this.trashFile, TrashIndexSchema, emptyTrash);
  }
}
