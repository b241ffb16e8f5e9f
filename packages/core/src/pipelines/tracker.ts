import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { withRootLock } from '../assembler/concurrency.js';
import { InstallTracker } from '../tracker/install-tracker.js';
import type { ComponentOperationResult, TrashedComponent } from '../tracker/install-tracker.js';
import type { InstalledManifestEntry } from '../schemas/manifest.schema.js';
import { requirePath } from '../utils/validation.js';

export interface TargetOptions {
  targetRoot: string;
}

export interface TrackerOperationOptions extends TargetOptions {
  componentIds: string[];
}

function openTracker(targetRoot: string, writable = false): InstallTracker {
  requirePath(targetRoot, { kind: 'directory', label: 'Target root', writable });
  return new InstallTracker(targetRoot);
}

function report(p: ProgressReporter, verb: string, results: ComponentOperationResult[]): void {
  for (const r of results) {
    for (const warning of r.warnings) p.warn(`${r.componentId}: ${warning}`);
    for (const f of r.failures) p.warn(`${r.componentId}: ${f.path}: ${f.message}`);
    switch (r.status) {
      case 'ok':
        p.start(r.componentId);
        p.succeed(`${r.componentId}: ${verb} ${String(r.paths.length)} path(s)`);
        break;
      case 'noop':
        p.info(`${r.componentId}: nothing to do`);
        break;
      case 'partial':
        p.start(r.componentId);
        p.fail(`${r.componentId}: ${verb} ${String(r.paths.length)} path(s), ${String(r.failures.length)} failed`);
        break;
      case 'failed':
        p.start(r.componentId);
        p.fail(`${r.componentId}: ${r.error?.message ?? `${String(r.failures.length)} path(s) failed`}`);
        break;
    }
  }
}

export async function runListInstalled(
  options: TargetOptions,
  progress?: ProgressReporter
): Promise<InstalledManifestEntry[]> {
  const p = progress ?? new SilentProgress();
  const entries = await openTracker(options.targetRoot).listInstalled();
  p.info(`${String(entries.length)} installed component(s)`);
  return entries;
}

export async function runListTrashed(
  options: TargetOptions,
  progress?: ProgressReporter
): Promise<TrashedComponent[]> {
  const p = progress ?? new SilentProgress();
  const trashed = await openTracker(options.targetRoot).listTrashedComponents();
  p.info(`${String(trashed.length)} trashed component(s)`);
  return trashed;
}

export async function runTrash(
  options: TrackerOperationOptions,
  progress?: ProgressReporter
): Promise<ComponentOperationResult[]> {
  const p = progress ?? new SilentProgress();
  const tracker = openTracker(options.targetRoot, true);
  p.section('Moving to Trash');
  const results = await withRootLock(options.targetRoot, () => tracker.moveToTrash(options.componentIds));
  report(p, 'trashed', results);
  return results;
}

export async function runRestore(
  options: TrackerOperationOptions,
  progress?: ProgressReporter
): Promise<ComponentOperationResult[]> {
  const p = progress ?? new SilentProgress();
  const tracker = openTracker(options.targetRoot, true);
  p.section('Restoring from Trash');
  const results = await withRootLock(options.targetRoot, () => tracker.restore(options.componentIds));
  report(p, 'restored', results);
  return results;
}

export async function runPurge(
  options: TrackerOperationOptions,
  progress?: ProgressReporter
): Promise<ComponentOperationResult[]> {
  const p = progress ?? new SilentProgress();
  const tracker = openTracker(options.targetRoot, true);
  p.section('Purging Trash');
  const results = await withRootLock(options.targetRoot, () => tracker.purgeTrash(options.componentIds));
  report(p, 'purged', results);
  return results;
}
