import { GitHubReleaseIndex } from '../resolver/github-release-index.js';
import { VersionResolver } from '../resolver/version-resolver.js';
import { HttpDownloader } from '../download/downloader.js';
import type { Config } from '../utils/config.js';
import type { ReleaseIndex } from '../resolver/release-index.js';
import type { Downloader } from '../download/downloader.js';
import type { ComponentRegistry } from '../registry/registry.js';

/** Collaborators a pipeline talks to over the network. Tests pass in-process stand-ins. */
export interface PipelineServices {
  releaseIndex?: ReleaseIndex;
  downloader?: Downloader;
}

export function createResolver(config: Config, releaseIndex?: ReleaseIndex): VersionResolver {
  const index =
    releaseIndex ??
    new GitHubReleaseIndex({
      token: config.github.token,
      baseUrl: config.github.baseUrl,
      perPage: config.github.releasesPerPage,
    });
  return new VersionResolver(index, config.resolution.mode);
}

export function createDownloader(config: Config, downloader?: Downloader): Downloader {
  return downloader ?? new HttpDownloader(`${config.app.name}/${config.app.version}`);
}

/** The requested ids, or every registered id when none were given. */
export function selectComponentIds(registry: ComponentRegistry, componentIds?: string[]): string[] {
  return componentIds && componentIds.length > 0 ? componentIds : registry.ids();
}
