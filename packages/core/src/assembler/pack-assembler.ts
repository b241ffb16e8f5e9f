import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import AdmZip from 'adm-zip';
import { PackwrightError, StepExecutionError, ManifestCorruptError, ErrorCode } from '../errors.js';
import { openArchive } from '../archive/archive.js';
import { readAll } from '../download/downloader.js';
import { applySteps } from '../steps/step-processor.js';
import type { StepsResult } from '../steps/step-processor.js';
import { InstallTracker } from '../tracker/install-tracker.js';
import { PackManifestSchema } from '../schemas/pack-manifest.schema.js';
import { errorMessage, extractErrnoCode } from '../utils/error-utils.js';
import { withRetry } from '../utils/retry.js';
import { createLimiter, withRootLock } from './concurrency.js';
import {
  buildChangelog,
  computeContentHash,
  formatBuildDate,
  renderSummary,
} from './pack-summary.js';
import { SilentProgress } from '../pipelines/progress.js';
import type { ProgressReporter } from '../pipelines/progress.js';
import type { Config, ResolutionMode } from '../utils/config.js';
import { assetPlan } from '../registry/registry.js';
import type { AssetPlan, ComponentRegistry } from '../registry/registry.js';
import type { VersionResolver } from '../resolver/version-resolver.js';
import type { Downloader } from '../download/downloader.js';
import type {
  ComponentDefinition,
  ComponentSource,
  ResolvedAsset,
  Step,
} from '../schemas/component.schema.js';
import type { PackComponent, PackManifest } from '../schemas/pack-manifest.schema.js';

export type AssembleMode =
  | {
      kind: 'archive';
      outputDir: string;
      prefix: string;
      /** Zip whose tree seeds the staging directory. */
      skeletonArchive?: string;
      comment?: string;
    }
  | { kind: 'target'; targetRoot: string; tracker?: InstallTracker };

export interface ComponentFailure {
  componentId: string;
  code: ErrorCode;
  message: string;
  action?: string;
  /** Files already written when a step failed; left on disk. */
  partialPaths: string[];
}

export interface BuildResult {
  perComponentFiles: Record<string, string[]>;
  failures: ComponentFailure[];
  warnings: string[];
  succeeded: string[];
  archivePath?: string;
  packName?: string;
  contentHash?: string;
}

export interface AssembleOptions {
  resolutionMode?: ResolutionMode;
  /** Release tag per component id, overriding the latest release. */
  versions?: Record<string, string>;
}

export interface PackAssemblerDeps {
  config: Config;
  registry: ComponentRegistry;
  resolver: VersionResolver;
  downloader: Downloader;
  progress?: ProgressReporter;
  signal?: AbortSignal;
  now?: () => Date;
}

interface PreparedPart {
  asset: ResolvedAsset;
  bytes: Buffer;
  processingSteps: Step[];
}

interface Prepared {
  definition: ComponentDefinition;
  /** Downloaded assets in placement order; one unless the source lists several. */
  parts: PreparedPart[];
  version?: string;
  warnings: string[];
}

type PrepareOutcome = { ok: true; value: Prepared } | { ok: false; failure: ComponentFailure };

export function describeSource(source: ComponentSource): string {
  switch (source.kind) {
    case 'release':
      return `github:${source.repoOwner}/${source.repoName}`;
    case 'direct':
      return source.url;
  }
}

function toFailure(componentId: string, error: unknown): ComponentFailure {
  if (error instanceof StepExecutionError) {
    return {
      componentId,
      code: error.code,
      message: error.message,
      action: error.action,
      partialPaths: error.partialPaths,
    };
  }
  if (error instanceof PackwrightError) {
    return { componentId, code: error.code, message: error.message, partialPaths: [] };
  }
  const errno = extractErrnoCode(error);
  const code =
    errno === 'ENOSPC'
      ? ErrorCode.INSUFFICIENT_SPACE
      : errno === 'EACCES' || errno === 'EPERM'
        ? ErrorCode.IO_PERMISSION_DENIED
        : ErrorCode.INTERNAL_UNKNOWN;
  return { componentId, code, message: errorMessage(error), partialPaths: [] };
}

/**
 * Runs selected components through resolve, download, extract and place.
 * Downloads run ahead through a bounded limiter; placement and bookkeeping
 * happen one component at a time under the destination root's lock. One
 * component failing never stops the others.
 */
export class PackAssembler {
  private readonly progress: ProgressReporter;
  private readonly now: () => Date;

  constructor(private readonly deps: PackAssemblerDeps) {
    this.progress = deps.progress ?? new SilentProgress();
    this.now = deps.now ?? ((): Date => new Date());
  }

  async assemble(
    componentIds: string[],
    mode: AssembleMode,
    options: AssembleOptions = {}
  ): Promise<BuildResult> {
    const result: BuildResult = { perComponentFiles: {}, failures: [], warnings: [], succeeded: [] };
    const ids = [...new Set(componentIds)];
    const limit = createLimiter(this.deps.config.download.concurrency);

    const pending = new Map<string, Promise<PrepareOutcome>>();
    for (const id of ids) {
      const definition = this.deps.registry.get(id);
      if (definition) {
        pending.set(id, limit(() => this.prepare(definition, options)));
      }
    }

    if (mode.kind === 'target') {
      const tracker = mode.tracker ?? new InstallTracker(mode.targetRoot);
      await this.placeAll(ids, pending, mode.targetRoot, tracker, result);
      return result;
    }

    const staging = await mkdtemp(join(tmpdir(), 'packwright-'));
    try {
      await this.seedSkeleton(staging, mode.skeletonArchive, result);
      const packComponents = await this.placeAll(ids, pending, staging, undefined, result);
      if (result.succeeded.length === 0) {
        this.progress.warn('No component succeeded; no pack archive was written');
      } else {
        await this.writePack(staging, mode, packComponents, result);
      }
    } finally {
      await rm(staging, { recursive: true, force: true });
    }
    return result;
  }

  /** Place prepared components one at a time, in selection order. */
  private async placeAll(
    ids: string[],
    pending: Map<string, Promise<PrepareOutcome>>,
    destinationRoot: string,
    tracker: InstallTracker | undefined,
    result: BuildResult
  ): Promise<Record<string, PackComponent>> {
    const packComponents: Record<string, PackComponent> = {};
    for (const id of ids) {
      const outcome = await pending.get(id);
      if (!outcome) {
        this.recordFailure(result, {
          componentId: id,
          code: ErrorCode.COMPONENT_NOT_FOUND,
          message: `Unknown component '${id}'`,
          partialPaths: [],
        });
        continue;
      }
      if (!outcome.ok) {
        this.recordFailure(result, outcome.failure);
        continue;
      }

      const { definition, parts, version, warnings } = outcome.value;
      for (const warning of warnings) {
        result.warnings.push(`${id}: ${warning}`);
        this.progress.warn(`${id}: ${warning}`);
      }

      this.progress.start(`Installing ${definition.name || id}`);
      try {
        const placed = await withRootLock(destinationRoot, async () => {
          const steps = await this.placeParts(parts, destinationRoot);
          if (tracker) {
            const recorded = await tracker.recordInstall(id, steps.writtenPaths, {
              name: definition.name || undefined,
              version: version ?? definition.resolvedVersion,
              category: definition.category,
            });
            steps.warnings.push(...recorded.warnings);
            if (recorded.removedPaths.length > 0) {
              steps.warnings.push(
                `Removed ${String(recorded.removedPaths.length)} file(s) left by the previous install`
              );
            }
          }
          return steps;
        });

        result.perComponentFiles[id] = placed.writtenPaths;
        result.warnings.push(...placed.warnings.map((w) => `${id}: ${w}`));
        result.succeeded.push(id);
        packComponents[id] = {
          name: definition.name || id,
          version: version ?? definition.resolvedVersion ?? 'unknown',
          category: definition.category,
          source: describeSource(definition.source),
          files: placed.writtenPaths,
        };
        this.progress.succeed(
          `${definition.name || id}: ${String(placed.writtenPaths.length)} file(s) placed`
        );
      } catch (error) {
        if (error instanceof ManifestCorruptError) throw error;
        this.recordFailure(result, toFailure(id, error));
      }
    }
    return packComponents;
  }

  /**
   * Apply each part's steps in order and merge what they wrote. A failing part
   * stops the component; its partial paths include earlier parts' files.
   */
  private async placeParts(parts: PreparedPart[], destinationRoot: string): Promise<StepsResult> {
    const written = new Set<string>();
    const warnings: string[] = [];
    for (const part of parts) {
      try {
        const archive = openArchive(part.bytes, part.asset.filename);
        const steps = await applySteps(part.processingSteps, archive, destinationRoot);
        steps.writtenPaths.forEach((path) => written.add(path));
        warnings.push(...steps.warnings);
      } catch (error) {
        if (error instanceof StepExecutionError && written.size > 0) {
          throw new StepExecutionError(
            error.action,
            error.reason,
            [...new Set([...written, ...error.partialPaths])],
            error.code,
            error.context
          );
        }
        throw error;
      }
    }
    return { writtenPaths: [...written], warnings };
  }

  private recordFailure(result: BuildResult, failure: ComponentFailure): void {
    result.failures.push(failure);
    this.progress.fail(`${failure.componentId}: ${failure.message}`);
  }

  /** Resolve and download one component. Never rejects. */
  private async prepare(
    definition: ComponentDefinition,
    options: AssembleOptions
  ): Promise<PrepareOutcome> {
    const { config, resolver, registry } = this.deps;
    const mode = options.resolutionMode ?? config.resolution.mode;
    const warnings: string[] = [];

    const plans = assetPlan(definition);
    let resolved: Array<AssetPlan & { asset: ResolvedAsset }>;
    try {
      resolved = await resolver.resolveParts(definition.source, plans, {
        mode,
        version: options.versions?.[definition.id],
        onAmbiguous: (candidates) => {
          warnings.push(`several assets match, using ${candidates[0] ?? ''} of ${candidates.join(', ')}`);
        },
      });
      const [primary] = resolved;
      if (primary) registry.recordResolution(definition.id, primary.asset);
    } catch (error) {
      // the cache holds one asset, so only single-asset components can fall back to it
      const cached = definition.resolvedAsset;
      if (mode === 'strict' || !cached || plans.length !== 1) {
        return { ok: false, failure: toFailure(definition.id, error) };
      }
      warnings.push(
        `resolution failed (${errorMessage(error)}); using cached ${cached.version ?? cached.filename}`
      );
      resolved = plans.map((plan) => ({ ...plan, asset: cached }));
    }

    try {
      const parts: PreparedPart[] = [];
      for (const { asset, processingSteps } of resolved) {
        parts.push({ asset, processingSteps, bytes: await this.download(definition.id, asset) });
      }
      return {
        ok: true,
        value: { definition, parts, version: resolved[0]?.asset.version, warnings },
      };
    } catch (error) {
      return { ok: false, failure: toFailure(definition.id, error) };
    }
  }

  private download(componentId: string, asset: ResolvedAsset): Promise<Buffer> {
    const { config, downloader, signal } = this.deps;
    return withRetry(
      () =>
        readAll(
          downloader.fetch(asset.downloadUrl, {
            chunkSize: config.download.chunkSize,
            timeoutMs: config.download.timeoutMs,
            signal,
          })
        ),
      {
        retries: config.download.retries,
        signal,
        onRetry: (attempt, delayMs, error) => {
          if (!config.debug.verbose) return;
          this.progress.info(
            `${componentId}: download attempt ${String(attempt)} failed (${errorMessage(error)}), retrying in ${String(Math.round(delayMs))}ms`
          );
        },
      }
    );
  }

  private async seedSkeleton(
    staging: string,
    skeletonArchive: string | undefined,
    result: BuildResult
  ): Promise<void> {
    if (!skeletonArchive) return;
    let bytes: Buffer;
    try {
      bytes = await readFile(skeletonArchive);
    } catch (error) {
      if (extractErrnoCode(error) !== 'ENOENT') throw error;
      const warning = `Skeleton archive ${skeletonArchive} not found; building without it`;
      result.warnings.push(warning);
      this.progress.warn(warning);
      return;
    }
    await applySteps([], openArchive(bytes, skeletonArchive), staging);
  }

  private async writePack(
    staging: string,
    mode: Extract<AssembleMode, { kind: 'archive' }>,
    components: Record<string, PackComponent>,
    result: BuildResult
  ): Promise<void> {
    const builtAt = this.now();
    const versions = Object.fromEntries(
      Object.entries(components).map(([id, component]) => [id, component.version])
    );
    const contentHash = computeContentHash(versions);
    const packName = `${mode.prefix}-${formatBuildDate(builtAt)}-${contentHash}`;
    const manifest: PackManifest = {
      packName,
      buildDate: builtAt.toISOString(),
      builderVersion: this.deps.config.app.version,
      contentHash,
      components,
    };

    const lastBuildFile = join(mode.outputDir, 'last-build.json');
    const previous = await this.readLastBuild(lastBuildFile, result);

    this.progress.start(`Writing ${packName}.zip`);
    await writeFile(join(staging, 'manifest.json'), JSON.stringify(manifest, null, 2) + '\n', 'utf-8');
    await writeFile(
      join(staging, `${packName}.txt`),
      renderSummary(manifest, previous ? buildChangelog(manifest, previous) : undefined, mode.comment),
      'utf-8'
    );

    const zip = new AdmZip();
    zip.addLocalFolder(staging);
    await mkdir(mode.outputDir, { recursive: true });
    const archivePath = join(mode.outputDir, `${packName}.zip`);
    await writeFile(archivePath, zip.toBuffer());
    await writeFile(lastBuildFile, JSON.stringify(manifest, null, 2) + '\n', 'utf-8');

    result.archivePath = archivePath;
    result.packName = packName;
    result.contentHash = contentHash;
    this.progress.succeed(`Pack written to ${archivePath}`);
  }

  private async readLastBuild(
    filePath: string,
    result: BuildResult
  ): Promise<PackManifest | undefined> {
    let content: string;
    try {
      content = await readFile(filePath, 'utf-8');
    } catch (error) {
      if (extractErrnoCode(error) === 'ENOENT') return undefined;
      throw error;
    }
    try {
      return PackManifestSchema.parse(JSON.parse(content));
    } catch (error) {
      const warning = `Ignoring unreadable ${filePath}: ${errorMessage(error)}`;
      result.warnings.push(warning);
      this.progress.warn(warning);
      return undefined;
    }
  }
}
