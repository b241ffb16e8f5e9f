import { z } from 'zod';
import { Octokit } from '@octokit/rest';
import { PackwrightError, ApiError } from '../errors.js';
import { validate } from '../utils/validation.js';
import { extractStatusCode, sanitizeErrorMessage } from '../utils/error-utils.js';
import { ReleaseSchema } from './release-index.js';
import type { Release, ReleaseIndex } from './release-index.js';

export interface GitHubReleaseIndexOptions {
  token?: string;
  baseUrl?: string;
  perPage?: number;
}

export class GitHubReleaseIndex implements ReleaseIndex {
  private octokit: Octokit;
  private readonly perPage: number;

  constructor(options: GitHubReleaseIndexOptions = {}) {
    this.octokit = new Octokit({
      ...(options.token ? { auth: options.token } : {}),
      ...(options.baseUrl ? { baseUrl: options.baseUrl } : {}),
    });
    this.perPage = options.perPage ?? 10;
  }

  async listReleases(repoOwner: string, repoName: string): Promise<Release[]> {
    try {
      const { data } = await this.octokit.rest.repos.listReleases({
        owner: repoOwner,
        repo: repoName,
        per_page: this.perPage,
      });
      const releases = data.map((release) => ({
        tag: release.tag_name,
        name: release.name ?? undefined,
        publishedAt: release.published_at ?? undefined,
        assets: release.assets.map((asset) => ({
          filename: asset.name,
          downloadUrl: asset.browser_download_url,
          size: asset.size,
        })),
      }));
      return validate(z.array(ReleaseSchema), releases, 'GitHub releases');
    } catch (error) {
      if (error instanceof PackwrightError) {
        throw error;
      }
      if (error instanceof Error) {
        throw new ApiError(
          `Could not list releases for ${repoOwner}/${repoName}: ${sanitizeErrorMessage(error.message)}`,
          extractStatusCode(error),
          { provider: 'github', repository: `${repoOwner}/${repoName}` }
        );
      }
      throw error;
    }
  }
}
