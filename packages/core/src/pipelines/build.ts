import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { createDownloader, createResolver, selectComponentIds } from './services.js';
import type { PipelineServices } from './services.js';
import { PackAssembler } from '../assembler/pack-assembler.js';
import type { BuildResult } from '../assembler/pack-assembler.js';
import { loadRegistry, saveRegistry } from '../registry/registry.js';
import type { Config, ResolutionMode } from '../utils/config.js';

export interface BuildOptions extends PipelineServices {
  config: Config;
  /** Components to bundle; every registered component when empty. */
  componentIds?: string[];
  resolutionMode?: ResolutionMode;
  versions?: Record<string, string>;
  /** Free text added to the pack summary. */
  comment?: string;
  signal?: AbortSignal;
  now?: () => Date;
}

export async function runBuild(
  options: BuildOptions,
  progress?: ProgressReporter
): Promise<BuildResult> {
  const p = progress ?? new SilentProgress();
  const { config } = options;

  p.section('Building Pack');
  p.start(`Loading ${config.paths.registryFile}`);
  const registry = await loadRegistry(config.paths.registryFile);
  const ids = selectComponentIds(registry, options.componentIds);
  p.succeed(`Selected ${String(ids.length)} of ${String(registry.size)} components`);

  const assembler = new PackAssembler({
    config,
    registry,
    resolver: createResolver(config, options.releaseIndex),
    downloader: createDownloader(config, options.downloader),
    progress: p,
    signal: options.signal,
    now: options.now,
  });

  const result = await assembler.assemble(
    ids,
    {
      kind: 'archive',
      outputDir: config.paths.outputDir,
      prefix: config.pack.prefix,
      skeletonArchive: config.paths.skeletonArchive,
      comment: options.comment,
    },
    { resolutionMode: options.resolutionMode, versions: options.versions }
  );

  await saveRegistry(config.paths.registryFile, registry);
  p.info(
    `${String(result.succeeded.length)} of ${String(ids.length)} components built, ${String(result.failures.length)} failed`
  );
  return result;
}
