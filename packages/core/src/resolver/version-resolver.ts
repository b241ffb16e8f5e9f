import { PackwrightError, ErrorCode } from '../errors.js';
import { matchesPattern } from '../utils/glob.js';
import { errorMessage } from '../utils/error-utils.js';
import type { ResolutionMode } from '../utils/config.js';
import type {
  ComponentSource,
  DirectSource,
  ReleaseSource,
  ResolvedAsset,
} from '../schemas/component.schema.js';
import type { Release, ReleaseIndex } from './release-index.js';

export interface ResolveOptions {
  /** `strict` turns several matching assets into AMBIGUOUS_MATCH. */
  mode?: ResolutionMode;
  /** Release tag to resolve instead of the most recent one. */
  version?: string;
  /** Called with every matching filename when best-effort mode picks the first of several. */
  onAmbiguous?: (candidates: string[]) => void;
}

const URL_VERSION_PATTERN = /\/([vV]?\d+(?:\.\d+)*)\//;

function stripV(tag: string): string {
  return tag.replace(/^v/i, '');
}

export function filenameFromUrl(url: string): string {
  const pathname = new URL(url).pathname;
  const last = pathname.split('/').filter(Boolean).at(-1);
  if (!last) return 'download';
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

export function versionFromUrl(url: string): string | undefined {
  return URL_VERSION_PATTERN.exec(new URL(url).pathname)?.[1];
}

export class VersionResolver {
  constructor(
    private readonly index: ReleaseIndex,
    private readonly defaultMode: ResolutionMode = 'best-effort'
  ) {}

  async resolve(source: ComponentSource, options: ResolveOptions = {}): Promise<ResolvedAsset> {
    switch (source.kind) {
      case 'direct':
        return this.resolveDirect(source);
      case 'release': {
        const release = await this.findRelease(source, options);
        return this.matchAsset(source, release, source.assets?.[0]?.assetPattern, options);
      }
    }
  }

  /**
   * Resolve several assets of one component against a single release listing,
   * in the order given. A part without its own `assetPattern` uses the
   * source's; a direct source gives every part its URL.
   */
  async resolveParts<P extends { assetPattern?: string }>(
    source: ComponentSource,
    parts: readonly P[],
    options: ResolveOptions = {}
  ): Promise<Array<P & { asset: ResolvedAsset }>> {
    if (source.kind === 'direct') {
      const asset = this.resolveDirect(source);
      return parts.map((part) => ({ ...part, asset }));
    }
    const release = await this.findRelease(source, options);
    return parts.map((part) => ({
      ...part,
      asset: this.matchAsset(source, release, part.assetPattern, options),
    }));
  }

  private resolveDirect(source: DirectSource): ResolvedAsset {
    return {
      downloadUrl: source.url,
      version: versionFromUrl(source.url),
      filename: filenameFromUrl(source.url),
    };
  }

  private async findRelease(source: ReleaseSource, options: ResolveOptions): Promise<Release> {
    const repository = `${source.repoOwner}/${source.repoName}`;
    let releases: Release[];
    try {
      releases = await this.index.listReleases(source.repoOwner, source.repoName);
    } catch (error) {
      const statusCode =
        error instanceof PackwrightError && typeof error.context.statusCode === 'number'
          ? error.context.statusCode
          : undefined;
      throw new PackwrightError(
        `Release index for ${repository} is unreachable: ${errorMessage(error)}`,
        ErrorCode.SOURCE_UNREACHABLE,
        `Could not reach the release listing for ${repository}`,
        { repository, statusCode },
        true
      );
    }
    return this.pickRelease(releases, options.version ?? source.pinnedVersion, repository);
  }

  private matchAsset(
    source: ReleaseSource,
    release: Release,
    assetPattern: string | undefined,
    options: ResolveOptions
  ): ResolvedAsset {
    const repository = `${source.repoOwner}/${source.repoName}`;
    const mode = options.mode ?? this.defaultMode;
    const pattern = assetPattern ?? source.assetPattern;
    if (pattern === undefined) {
      throw new PackwrightError(
        `No asset pattern configured for ${repository}`,
        ErrorCode.DEFINITION_INVALID,
        `The release source ${repository} names no asset to download`,
        { repository }
      );
    }

    const matches = release.assets.filter((asset) => matchesPattern(asset.filename, pattern));
    const [first] = matches;
    if (!first) {
      throw new PackwrightError(
        `No asset matching '${pattern}' in ${repository}@${release.tag}`,
        ErrorCode.NO_MATCHING_ASSET,
        `Release ${release.tag} of ${repository} has no asset matching '${pattern}'`,
        { repository, tag: release.tag, pattern }
      );
    }

    if (matches.length > 1) {
      const candidates = matches.map((asset) => asset.filename);
      if (mode === 'strict') {
        throw new PackwrightError(
          `Pattern '${pattern}' matches ${String(matches.length)} assets in ${repository}@${release.tag}: ${candidates.join(', ')}`,
          ErrorCode.AMBIGUOUS_MATCH,
          `Asset pattern '${pattern}' is ambiguous for ${repository}@${release.tag}`,
          { repository, tag: release.tag, pattern }
        );
      }
      options.onAmbiguous?.(candidates);
    }

    return { downloadUrl: first.downloadUrl, version: release.tag, filename: first.filename };
  }

  private pickRelease(releases: Release[], version: string | undefined, repository: string): Release {
    if (version) {
      const wanted = stripV(version);
      const found = releases.find((r) => r.tag === version || stripV(r.tag) === wanted);
      if (!found) {
        const available = releases
          .slice(0, 5)
          .map((r) => r.tag)
          .join(', ');
        throw new PackwrightError(
          `Version '${version}' not found among recent releases of ${repository}`,
          ErrorCode.NO_MATCHING_ASSET,
          `Release '${version}' of ${repository} was not found (recent: ${available || 'none'})`,
          { repository, version }
        );
      }
      return found;
    }

    const [latest] = releases;
    if (!latest) {
      throw new PackwrightError(
        `No releases published for ${repository}`,
        ErrorCode.NO_MATCHING_ASSET,
        `Repository ${repository} has no releases`,
        { repository }
      );
    }
    return latest;
  }
}
