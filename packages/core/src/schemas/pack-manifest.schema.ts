import { z } from 'zod';

export const PackComponentSchema = z.object({
  name: z.string(),
  version: z.string(),
  category: z.string(),
  source: z.string(),
  files: z.array(z.string()),
});
export type PackComponent = z.infer<typeof PackComponentSchema>;

/** The `manifest.json` embedded at the root of every built pack. */
export const PackManifestSchema = z.object({
  packName: z.string().min(1),
  buildDate: z.string(),
  builderVersion: z.string(),
  contentHash: z.string(),
  components: z.record(z.string(), PackComponentSchema),
});
export type PackManifest = z.infer<typeof PackManifestSchema>;
