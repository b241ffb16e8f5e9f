import { z } from 'zod';

const OutputFormatSchema = z.enum(['table', 'json', 'yaml']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

const PIN_PATTERN = /^[^=\s]+=\S+$/;

/** Repeated `--pin <id=tag>` values folded into a map of release tags per component. */
const PinsSchema = z
  .array(z.string().regex(PIN_PATTERN, 'Use <component-id>=<release-tag>'))
  .default([])
  .transform((pins) =>
    Object.fromEntries(
      pins.map((pin) => {
        const i = pin.indexOf('=');
        return [pin.slice(0, i), pin.slice(i + 1)];
      })
    )
  );

const TargetSchema = z.string().trim().min(1, 'Provide the target root with --target');

export const ComponentsOptionsSchema = z.object({
  category: z.string().optional(),
  format: OutputFormatSchema.default('table'),
});

export const RefreshOptionsSchema = z.object({
  format: OutputFormatSchema.default('table'),
});

export const BuildOptionsSchema = z.object({
  comment: z.string().optional(),
  strict: z.boolean().optional().default(false),
  pin: PinsSchema,
  format: z.enum(['table', 'json']).default('table'),
});

export const InstallOptionsSchema = z.object({
  target: TargetSchema,
  strict: z.boolean().optional().default(false),
  pin: PinsSchema,
  format: z.enum(['table', 'json']).default('table'),
});

export const InstallPackOptionsSchema = z.object({
  target: TargetSchema,
  clean: z.array(z.string().min(1)).default([]),
  format: OutputFormatSchema.default('table'),
});

export const TargetOptionsSchema = z.object({
  target: TargetSchema,
  format: OutputFormatSchema.default('table'),
});

export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
