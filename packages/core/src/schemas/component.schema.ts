import { z } from 'zod';

const NonEmpty = z.string().trim().min(1, 'must be a non-empty string');

export const STEP_ACTIONS = [
  'extract_all_to_root',
  'extract_all_to_path',
  'extract_subfolder_to_path',
  'copy_single_file',
  'copy_to_derived_folder',
  'find_and_copy',
  'find_and_rename',
  'delete_path',
] as const;
export type StepAction = (typeof STEP_ACTIONS)[number];

export const StepSchema = z.discriminatedUnion('action', [
  z.strictObject({ action: z.literal('extract_all_to_root') }),
  z.strictObject({ action: z.literal('extract_all_to_path'), targetPath: NonEmpty }),
  z.strictObject({
    action: z.literal('extract_subfolder_to_path'),
    subfolderName: NonEmpty,
    targetPath: NonEmpty.optional(),
  }),
  z.strictObject({ action: z.literal('copy_single_file'), targetPath: NonEmpty }),
  z.strictObject({ action: z.literal('copy_to_derived_folder'), targetPath: NonEmpty }),
  z.strictObject({
    action: z.literal('find_and_copy'),
    sourcePattern: NonEmpty,
    targetPath: NonEmpty,
    required: z.boolean().optional(),
  }),
  z.strictObject({
    action: z.literal('find_and_rename'),
    sourcePattern: NonEmpty,
    targetPath: NonEmpty,
    targetFilename: NonEmpty,
    required: z.boolean().optional(),
  }),
  z.strictObject({ action: z.literal('delete_path'), path: NonEmpty }),
]);
export type Step = z.infer<typeof StepSchema>;

export const AssetSpecSchema = z.strictObject({
  assetPattern: NonEmpty,
  processingSteps: z.array(StepSchema).default([]),
});
export type AssetSpec = z.infer<typeof AssetSpecSchema>;

export const ReleaseSourceSchema = z
  .strictObject({
    kind: z.literal('release'),
    repoOwner: NonEmpty,
    repoName: NonEmpty,
    /** One asset, placed by the component's `processingSteps`. */
    assetPattern: NonEmpty.optional(),
    /** Several assets of the same release, each placed by its own steps, in order. */
    assets: z.array(AssetSpecSchema).min(1).optional(),
    pinnedVersion: NonEmpty.optional(),
  })
  .refine((source) => (source.assetPattern === undefined) !== (source.assets === undefined), {
    error: 'set exactly one of assetPattern or assets',
    path: ['assetPattern'],
  });
export type ReleaseSource = z.infer<typeof ReleaseSourceSchema>;

export const DirectSourceSchema = z.strictObject({
  kind: z.literal('direct'),
  url: z.url(),
});
export type DirectSource = z.infer<typeof DirectSourceSchema>;

export const SourceSchema = z.discriminatedUnion('kind', [ReleaseSourceSchema, DirectSourceSchema]);
export type ComponentSource = z.infer<typeof SourceSchema>;

export const ResolvedAssetSchema = z.object({
  downloadUrl: z.url(),
  version: z.string().optional(),
  filename: NonEmpty,
});
export type ResolvedAsset = z.infer<typeof ResolvedAssetSchema>;

export const ComponentDefinitionSchema = z
  .object({
    id: NonEmpty,
    name: z.string().default(''),
    category: z.string().default('Uncategorized'),
    description: z.string().default(''),
    source: SourceSchema,
    processingSteps: z.array(StepSchema).default([]),
    resolvedVersion: z.string().optional(),
    resolvedAsset: ResolvedAssetSchema.optional(),
  })
  .refine(
    (definition) =>
      definition.source.kind !== 'release' ||
      definition.source.assets === undefined ||
      definition.processingSteps.length === 0,
    {
      error: 'processingSteps go inside each entry of source.assets',
      path: ['processingSteps'],
    }
  );
export type ComponentDefinition = z.infer<typeof ComponentDefinitionSchema>;

export const RegistryFileSchema = z.object({
  components: z.array(z.unknown()),
});
