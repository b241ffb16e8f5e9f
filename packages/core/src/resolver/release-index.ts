import { z } from 'zod';

export const ReleaseAssetSchema = z.object({
  filename: z.string().min(1),
  downloadUrl: z.url(),
  size: z.number().int().nonnegative().optional(),
});
export type ReleaseAsset = z.infer<typeof ReleaseAssetSchema>;

export const ReleaseSchema = z.object({
  tag: z.string(),
  name: z.string().optional(),
  publishedAt: z.string().optional(),
  assets: z.array(ReleaseAssetSchema),
});
export type Release = z.infer<typeof ReleaseSchema>;

/** Remote release listing, most-recent release first. */
export interface ReleaseIndex {
  listReleases(repoOwner: string, repoName: string): Promise<Release[]>;
}
