import { z } from 'zod';

export const InstalledManifestEntrySchema = z.object({
  componentId: z.string().min(1),
  installedAt: z.number().int().nonnegative(),
  ownedPaths: z.array(z.string().min(1)),
  name: z.string().optional(),
  version: z.string().optional(),
  category: z.string().optional(),
});
export type InstalledManifestEntry = z.infer<typeof InstalledManifestEntrySchema>;

export const InstalledManifestSchema = z.object({
  version: z.literal(1),
  components: z.array(InstalledManifestEntrySchema),
});
export type InstalledManifest = z.infer<typeof InstalledManifestSchema>;

export const TrashEntrySchema = z.object({
  componentId: z.string().min(1),
  originalRelativePath: z.string().min(1),
  trashRelativePath: z.string().min(1),
  movedAt: z.number().int().nonnegative(),
  missing: z.boolean().optional(),
});
export type TrashEntry = z.infer<typeof TrashEntrySchema>;

export const TrashIndexSchema = z.object({
  version: z.literal(1),
  entries: z.array(TrashEntrySchema),
  snapshots: z.array(InstalledManifestEntrySchema),
});
export type TrashIndex = z.infer<typeof TrashIndexSchema>;
