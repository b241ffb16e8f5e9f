import { readFile, rm } from 'node:fs/promises';
import { basename } from 'node:path';
import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { PackwrightError, ErrorCode } from '../errors.js';
import { openArchive } from '../archive/archive.js';
import { withRootLock } from '../assembler/concurrency.js';
import { InstallTracker } from '../tracker/install-tracker.js';
import { PackManifestSchema } from '../schemas/pack-manifest.schema.js';
import { errorMessage } from '../utils/error-utils.js';
import { resolveWritable } from '../utils/safe-path.js';
import { requirePath, validate } from '../utils/validation.js';

export interface InstallPackOptions {
  packPath: string;
  targetRoot: string;
  /** Paths under the target root removed before extraction. */
  cleanPaths?: string[];
}

export interface InstallPackResult {
  packName: string;
  cleaned: string[];
  extracted: string[];
  installed: { componentId: string; files: string[] }[];
  warnings: string[];
}

const PACK_MANIFEST = 'manifest.json';

/**
 * Extract a previously built pack onto a target root and record one
 * installed entry per component listed in the pack's manifest.
 */
export async function runInstallPack(
  options: InstallPackOptions,
  progress?: ProgressReporter
): Promise<InstallPackResult> {
  const p = progress ?? new SilentProgress();
  const { packPath, targetRoot } = options;

  p.section(`Installing ${basename(packPath)}`);
  requirePath(targetRoot, { kind: 'directory', label: 'Target root', writable: true });
  requirePath(packPath, { kind: 'file', label: 'Pack archive' });
  const tracker = new InstallTracker(targetRoot);
  await tracker.listInstalled();

  const archive = openArchive(await readFile(packPath), basename(packPath));
  if (archive.format !== 'zip') {
    throw new PackwrightError(
      `${packPath} is not a zip archive`,
      ErrorCode.INPUT_INVALID,
      `${basename(packPath)} is not a pack archive`,
      { path: packPath }
    );
  }

  let rawManifest: unknown;
  try {
    rawManifest = JSON.parse(archive.read(PACK_MANIFEST).toString('utf-8'));
  } catch (error) {
    throw new PackwrightError(
      `Pack ${packPath} has no readable ${PACK_MANIFEST}: ${errorMessage(error)}`,
      ErrorCode.INPUT_INVALID,
      `${basename(packPath)} does not contain a valid pack manifest`,
      { path: packPath }
    );
  }
  const manifest = validate(PackManifestSchema, rawManifest, 'pack manifest');
  const skip = new Set([PACK_MANIFEST, `${manifest.packName}.txt`]);

  return withRootLock(targetRoot, async () => {
    const result: InstallPackResult = {
      packName: manifest.packName,
      cleaned: [],
      extracted: [],
      installed: [],
      warnings: [],
    };

    for (const cleanPath of options.cleanPaths ?? []) {
      const { absolute, relative } = resolveWritable(targetRoot, cleanPath);
      await rm(absolute, { recursive: true, force: true });
      result.cleaned.push(relative);
    }
    if (result.cleaned.length > 0) {
      p.info(`Cleaned ${result.cleaned.join(', ')}`);
    }

    p.start('Extracting pack');
    for (const entry of archive.listEntries()) {
      if (entry.isDirectory || skip.has(entry.path)) continue;
      const { absolute, relative } = resolveWritable(targetRoot, entry.path);
      await archive.extract(entry.path, absolute);
      result.extracted.push(relative);
    }
    p.succeed(`Extracted ${String(result.extracted.length)} files`);

    const extracted = new Set(result.extracted);
    for (const [componentId, component] of Object.entries(manifest.components)) {
      const files = component.files.filter((file) => extracted.has(file));
      if (files.length < component.files.length) {
        result.warnings.push(
          `${componentId}: ${String(component.files.length - files.length)} listed file(s) missing from the pack`
        );
      }
      const recorded = await tracker.recordInstall(componentId, files, {
        name: component.name,
        version: component.version,
        category: component.category,
      });
      result.warnings.push(...recorded.warnings.map((w) => `${componentId}: ${w}`));
      result.installed.push({ componentId, files });
    }
    for (const warning of result.warnings) p.warn(warning);
    p.info(`Recorded ${String(result.installed.length)} components`);

    return result;
  });
}
