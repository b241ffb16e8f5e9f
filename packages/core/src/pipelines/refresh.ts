import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { createResolver, selectComponentIds } from './services.js';
import type { PipelineServices } from './services.js';
import { PackwrightError, ErrorCode } from '../errors.js';
import { loadRegistry, saveRegistry } from '../registry/registry.js';
import { errorMessage } from '../utils/error-utils.js';
import type { Config } from '../utils/config.js';

export interface RefreshOptions extends PipelineServices {
  config: Config;
  componentIds?: string[];
}

export interface RefreshedVersion {
  componentId: string;
  previousVersion?: string;
  version?: string;
  filename: string;
}

export interface RefreshResult {
  refreshed: RefreshedVersion[];
  failures: { componentId: string; code: ErrorCode; message: string }[];
}

/**
 * Resolve each selected component and cache the result in the registry file.
 * The registry is written once, after every component was tried.
 */
export async function runRefreshVersions(
  options: RefreshOptions,
  progress?: ProgressReporter
): Promise<RefreshResult> {
  const p = progress ?? new SilentProgress();
  const { config } = options;
  const registryFile = config.paths.registryFile;

  p.section('Refreshing Versions');
  const registry = await loadRegistry(registryFile);
  const resolver = createResolver(config, options.releaseIndex);
  const result: RefreshResult = { refreshed: [], failures: [] };

  for (const id of selectComponentIds(registry, options.componentIds)) {
    p.start(`Resolving ${id}`);
    try {
      const definition = registry.require(id);
      const asset = await resolver.resolve(definition.source, {
        onAmbiguous: (candidates) => {
          p.warn(`${id}: ${String(candidates.length)} assets match, using ${candidates[0] ?? ''}`);
        },
      });
      registry.recordResolution(id, asset);
      result.refreshed.push({
        componentId: id,
        previousVersion: definition.resolvedVersion,
        version: asset.version,
        filename: asset.filename,
      });
      p.succeed(`${id}: ${asset.version ?? asset.filename}`);
    } catch (error) {
      const code = error instanceof PackwrightError ? error.code : ErrorCode.INTERNAL_UNKNOWN;
      result.failures.push({ componentId: id, code, message: errorMessage(error) });
      p.fail(`${id}: ${errorMessage(error)}`);
    }
  }

  if (result.refreshed.length > 0) {
    p.start(`Saving ${registryFile}`);
    await saveRegistry(registryFile, registry);
    p.succeed(`Saved ${String(result.refreshed.length)} refreshed version(s)`);
  }
  return result;
}
