import type { ProgressReporter } from './progress.js';
import { SilentProgress } from './progress.js';
import { loadRegistry } from '../registry/registry.js';
import type { Config } from '../utils/config.js';
import type { ComponentDefinition } from '../schemas/component.schema.js';

export interface ComponentsOptions {
  config: Config;
  /** Only these ids, in this order; an unknown id fails with COMPONENT_NOT_FOUND. */
  componentIds?: string[];
  /** Case-insensitive category filter. */
  category?: string;
}

export async function runComponents(
  options: ComponentsOptions,
  progress?: ProgressReporter
): Promise<ComponentDefinition[]> {
  const p = progress ?? new SilentProgress();
  const { registryFile } = options.config.paths;

  p.section('Component Registry');
  p.start(`Reading ${registryFile}`);
  const registry = await loadRegistry(registryFile);
  const selected =
    options.componentIds && options.componentIds.length > 0
      ? options.componentIds.map((id) => registry.require(id))
      : registry.list();

  const category = options.category?.toLowerCase();
  const components = category
    ? selected.filter((c) => c.category.toLowerCase() === category)
    : selected;

  const unresolved = components.filter((c) => !c.resolvedAsset).length;
  p.succeed(`${String(components.length)} of ${String(registry.size)} components`);
  if (unresolved > 0) {
    p.info(`${String(unresolved)} never resolved; run refresh to look them up`);
  }
  return components;
}
