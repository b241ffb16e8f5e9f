// Registry
export {
  ComponentRegistry,
  loadRegistry,
  saveRegistry,
  parseComponentDefinition,
  assetPlan,
} from './registry/registry.js';
export type { AssetPlan } from './registry/registry.js';

// Resolver
export { VersionResolver, filenameFromUrl, versionFromUrl } from './resolver/version-resolver.js';
export type { ResolveOptions } from './resolver/version-resolver.js';
export { GitHubReleaseIndex } from './resolver/github-release-index.js';
export type { ReleaseIndex, Release, ReleaseAsset } from './resolver/release-index.js';

// Download and extraction
export { HttpDownloader, readAll } from './download/downloader.js';
export type { Downloader, DownloadOptions } from './download/downloader.js';
export { openArchive } from './archive/archive.js';
export type { ArchiveHandle, ArchiveEntry, ArchiveFormat } from './archive/archive.js';

// Steps
export { applySteps } from './steps/step-processor.js';
export type { ApplyStepsOptions, StepsResult } from './steps/step-processor.js';

// Assembler
export { PackAssembler, describeSource } from './assembler/pack-assembler.js';
export type {
  AssembleMode,
  AssembleOptions,
  BuildResult,
  ComponentFailure,
} from './assembler/pack-assembler.js';
export { computeContentHash, buildChangelog, renderSummary } from './assembler/pack-summary.js';
export type { Changelog } from './assembler/pack-summary.js';

// Tracker
export { InstallTracker, trashFolderName } from './tracker/install-tracker.js';
export type {
  ComponentOperationResult,
  OperationStatus,
  PathFailure,
  RecordInstallResult,
  TrashedComponent,
  InstallMetadata,
} from './tracker/install-tracker.js';

// Pipelines
export type { ProgressReporter } from './pipelines/progress.js';
export { SilentProgress } from './pipelines/progress.js';
export { runComponents } from './pipelines/components.js';
export type { ComponentsOptions } from './pipelines/components.js';
export { runRefreshVersions } from './pipelines/refresh.js';
export type { RefreshOptions, RefreshResult, RefreshedVersion } from './pipelines/refresh.js';
export { runBuild } from './pipelines/build.js';
export type { BuildOptions } from './pipelines/build.js';
export { runInstall } from './pipelines/install.js';
export type { InstallOptions } from './pipelines/install.js';
export { runInstallPack } from './pipelines/install-pack.js';
export type { InstallPackOptions, InstallPackResult } from './pipelines/install-pack.js';
export {
  runListInstalled,
  runListTrashed,
  runTrash,
  runRestore,
  runPurge,
} from './pipelines/tracker.js';
export type { TargetOptions, TrackerOperationOptions } from './pipelines/tracker.js';
export type { PipelineServices } from './pipelines/services.js';

// Config
export { loadConfig, ResolutionModeSchema } from './utils/config.js';
export type { Config, ResolutionMode } from './utils/config.js';

// Errors
export {
  PackwrightError,
  ConfigurationError,
  ApiError,
  StepExecutionError,
  ManifestCorruptError,
  ErrorCode,
} from './errors.js';

// Validation (core utilities only)
export { validate, requirePath, describeIssues } from './utils/validation.js';
export type { PathKind, PathRequirement } from './utils/validation.js';

// Retry utility
export { withRetry, backoffDelay } from './utils/retry.js';
export type { RetryPolicy } from './utils/retry.js';

// Paths and patterns
export { matchesPattern, filterByPattern } from './utils/glob.js';
export { STATE_DIR_NAME, normalizeRelativePath } from './utils/safe-path.js';

// Schemas (re-export for consumers that need them)
export { PackageJsonSchema } from './schemas/package.schema.js';
export {
  ComponentDefinitionSchema,
  StepSchema,
  SourceSchema,
  AssetSpecSchema,
  STEP_ACTIONS,
} from './schemas/component.schema.js';
export type {
  ComponentDefinition,
  ComponentSource,
  ReleaseSource,
  DirectSource,
  AssetSpec,
  ResolvedAsset,
  Step,
  StepAction,
} from './schemas/component.schema.js';
export type {
  InstalledManifestEntry,
  TrashEntry,
} from './schemas/manifest.schema.js';
export { PackManifestSchema } from './schemas/pack-manifest.schema.js';
export type { PackManifest, PackComponent } from './schemas/pack-manifest.schema.js';
