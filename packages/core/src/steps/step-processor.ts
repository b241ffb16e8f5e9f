import { rm } from 'node:fs/promises';
import { posix } from 'node:path';
import { PackwrightError, StepExecutionError, ErrorCode } from '../errors.js';
import { extractErrnoCode } from '../utils/error-utils.js';
import { matchesPattern } from '../utils/glob.js';
import { normalizeRelativePath, resolveWritable } from '../utils/safe-path.js';
import type { ArchiveEntry, ArchiveHandle } from '../archive/archive.js';
import type { Step } from '../schemas/component.schema.js';

export interface ApplyStepsOptions {
  onStep?: (step: Step, index: number) => void;
}

export interface StepsResult {
  /** Paths relative to the target root, in first-write order, each listed once. */
  writtenPaths: string[];
  warnings: string[];
}

const DEFAULT_STEPS: Step[] = [{ action: 'extract_all_to_root' }];

function failure(reason: string, code = ErrorCode.STEP_EXECUTION_FAILED): PackwrightError {
  return new PackwrightError(reason, code);
}

function toStepError(action: string, error: unknown, partialPaths: string[]): StepExecutionError {
  if (error instanceof PackwrightError) {
    return new StepExecutionError(action, error.message, partialPaths, error.code, error.context);
  }
  const errno = extractErrnoCode(error);
  const reason = error instanceof Error ? error.message : String(error);
  if (errno === 'ENOSPC') {
    return new StepExecutionError(action, reason, partialPaths, ErrorCode.INSUFFICIENT_SPACE);
  }
  if (errno === 'EACCES' || errno === 'EPERM') {
    return new StepExecutionError(action, reason, partialPaths, ErrorCode.IO_PERMISSION_DENIED);
  }
  return new StepExecutionError(action, reason, partialPaths, ErrorCode.STEP_EXECUTION_FAILED, {
    errno,
  });
}

class StepRunner {
  private readonly written = new Set<string>();
  readonly warnings: string[] = [];
  private readonly files: ArchiveEntry[];

  constructor(
    private readonly archive: ArchiveHandle,
    private readonly targetRoot: string
  ) {
    this.files = archive.listEntries().filter((entry) => !entry.isDirectory);
  }

  get writtenPaths(): string[] {
    return [...this.written];
  }

  async run(step: Step): Promise<void> {
    switch (step.action) {
      case 'extract_all_to_root':
        for (const entry of this.files) {
          await this.place(entry.path, entry.path);
        }
        return;
      case 'extract_all_to_path':
        for (const entry of this.files) {
          await this.place(entry.path, step.targetPath, entry.path);
        }
        return;
      case 'extract_subfolder_to_path':
        return this.extractSubfolder(step.subfolderName, step.targetPath ?? '');
      case 'copy_single_file': {
        const entry = this.singleFile();
        await this.place(entry.path, step.targetPath, posix.basename(entry.path));
        return;
      }
      case 'copy_to_derived_folder': {
        const entry = this.singleFile();
        const filename = posix.basename(entry.path);
        await this.place(entry.path, step.targetPath, posix.parse(filename).name, filename);
        return;
      }
      case 'find_and_copy':
        return this.findAndCopy(step.sourcePattern, step.targetPath, step.required ?? false);
      case 'find_and_rename':
        return this.findAndRename(
          step.sourcePattern,
          step.targetPath,
          step.targetFilename,
          step.required ?? false
        );
      case 'delete_path':
        return this.deletePath(step.path);
      default: {
        const unhandled: never = step;
        throw failure(`unhandled step ${JSON.stringify(unhandled)}`, ErrorCode.UNSUPPORTED_ACTION);
      }
    }
  }

  private async place(entryPath: string, ...destination: string[]): Promise<string> {
    const { absolute, relative } = resolveWritable(this.targetRoot, ...destination);
    await this.archive.extract(entryPath, absolute);
    this.written.add(relative);
    return relative;
  }

  private async extractSubfolder(subfolderName: string, targetPath: string): Promise<void> {
    const prefix = normalizeRelativePath(subfolderName);
    if (prefix === '') {
      throw failure(`subfolder name '${subfolderName}' is empty after normalization`);
    }
    const matches = this.files.filter((entry) => entry.path.startsWith(`${prefix}/`));
    if (matches.length === 0) {
      throw failure(`archive ${this.archive.filename} has no files under '${prefix}/'`);
    }
    for (const entry of matches) {
      await this.place(entry.path, targetPath, entry.path.slice(prefix.length + 1));
    }
  }

  /** The single root-level file, else the only file in the archive. */
  private singleFile(): ArchiveEntry {
    const rootFiles = this.files.filter((entry) => !entry.path.includes('/'));
    const [onlyRoot] = rootFiles;
    if (onlyRoot && rootFiles.length === 1) return onlyRoot;
    const [onlyFile] = this.files;
    if (onlyFile && this.files.length === 1) return onlyFile;
    throw failure(
      `expected a single file in ${this.archive.filename}, found ${String(this.files.length)}`
    );
  }

  private async findAndCopy(pattern: string, targetPath: string, required: boolean): Promise<void> {
    const matches = this.files.filter((entry) => matchesPattern(entry.path, pattern));
    if (matches.length === 0) {
      this.noMatch(pattern, required);
      return;
    }
    const sources = new Map<string, string>();
    for (const entry of matches) {
      const relative = await this.place(entry.path, targetPath, posix.basename(entry.path));
      const previous = sources.get(relative);
      if (previous !== undefined) {
        this.warnings.push(`'${entry.path}' overwrote '${previous}' at ${relative}`);
      }
      sources.set(relative, entry.path);
    }
  }

  private async findAndRename(
    pattern: string,
    targetPath: string,
    targetFilename: string,
    required: boolean
  ): Promise<void> {
    const matches = this.files.filter((entry) => matchesPattern(entry.path, pattern));
    const [match] = matches;
    if (!match) {
      this.noMatch(pattern, required);
      return;
    }
    if (matches.length > 1) {
      throw failure(
        `pattern '${pattern}' matches ${String(matches.length)} files: ${matches.map((m) => m.path).join(', ')}`,
        ErrorCode.AMBIGUOUS_SOURCE_MATCH
      );
    }
    await this.place(match.path, targetPath, targetFilename);
  }

  private noMatch(pattern: string, required: boolean): void {
    if (required) {
      throw failure(`no file in ${this.archive.filename} matches '${pattern}'`);
    }
    this.warnings.push(`No file in ${this.archive.filename} matches '${pattern}'`);
  }

  private async deletePath(path: string): Promise<void> {
    const { absolute, relative } = resolveWritable(this.targetRoot, path);
    await rm(absolute, { recursive: true, force: true });
    for (const written of this.written) {
      if (written === relative || written.startsWith(`${relative}/`)) {
        this.written.delete(written);
      }
    }
  }
}

/**
 * Run placement steps in order against an opened archive. The first failing
 * step stops the run with a StepExecutionError listing what had already been
 * written; those files stay on disk. An empty step list extracts everything
 * to the root.
 */
export async function applySteps(
  steps: readonly Step[],
  archive: ArchiveHandle,
  targetRoot: string,
  options: ApplyStepsOptions = {}
): Promise<StepsResult> {
  const runner = new StepRunner(archive, targetRoot);
  const plan = steps.length > 0 ? steps : DEFAULT_STEPS;

  for (const [index, step] of plan.entries()) {
    options.onStep?.(step, index);
    try {
      await runner.run(step);
    } catch (error) {
      throw toStepError(step.action, error, runner.writtenPaths);
    }
  }

  return { writtenPaths: runner.writtenPaths, warnings: runner.warnings };
}
