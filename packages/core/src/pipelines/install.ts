import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { createDownloader, createResolver, selectComponentIds } from './services.js';
import type { PipelineServices } from './services.js';
import { PackAssembler } from '../assembler/pack-assembler.js';
import type { BuildResult } from '../assembler/pack-assembler.js';
import { InstallTracker } from '../tracker/install-tracker.js';
import { loadRegistry, saveRegistry } from '../registry/registry.js';
import { requirePath } from '../utils/validation.js';
import type { Config, ResolutionMode } from '../utils/config.js';

export interface InstallOptions extends PipelineServices {
  config: Config;
  targetRoot: string;
  componentIds?: string[];
  resolutionMode?: ResolutionMode;
  versions?: Record<string, string>;
  signal?: AbortSignal;
}

/** Install components straight into a live target root and record what each one owns. */
export async function runInstall(
  options: InstallOptions,
  progress?: ProgressReporter
): Promise<BuildResult> {
  const p = progress ?? new SilentProgress();
  const { config, targetRoot } = options;

  p.section(`Installing into ${targetRoot}`);
  requirePath(targetRoot, { kind: 'directory', label: 'Target root', writable: true });
  const tracker = new InstallTracker(targetRoot);
  // refuse to write anything while the manifest is unreadable
  await tracker.listInstalled();

  const registry = await loadRegistry(config.paths.registryFile);
  const ids = selectComponentIds(registry, options.componentIds);

  const assembler = new PackAssembler({
    config,
    registry,
    resolver: createResolver(config, options.releaseIndex),
    downloader: createDownloader(config, options.downloader),
    progress: p,
    signal: options.signal,
  });
  const result = await assembler.assemble(
    ids,
    { kind: 'target', targetRoot, tracker },
    { resolutionMode: options.resolutionMode, versions: options.versions }
  );

  await saveRegistry(config.paths.registryFile, registry);
  p.info(
    `${String(result.succeeded.length)} of ${String(ids.length)} components installed, ${String(result.failures.length)} failed`
  );
  return result;
}
