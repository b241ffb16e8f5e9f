import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export const ResolutionModeSchema = z.enum(['strict', 'best-effort']);
export type ResolutionMode = z.infer<typeof ResolutionModeSchema>;

const ConfigSchema = z.object({
  github: z.object({
    token: z.string().optional(),
    baseUrl: z.url().default('https://api.github.com'),
    releasesPerPage: z.number().int().min(1).max(100).default(10),
  }),
  download: z.object({
    chunkSize: z
      .number()
      .int()
      .min(1024)
      .max(64 * 1024 * 1024)
      .default(2 * 1024 * 1024),
    timeoutMs: z.number().int().min(1000).max(3_600_000).default(120_000),
    concurrency: z.number().int().min(1).max(16).default(3),
    retries: z.number().int().min(0).max(10).default(2),
  }),
  resolution: z.object({
    mode: ResolutionModeSchema.default('best-effort'),
  }),
  paths: z.object({
    registryFile: z.string().min(1).default('components.json'),
    skeletonArchive: z.string().min(1).default('assets/skeleton.zip'),
    outputDir: z.string().min(1).default('dist-packs'),
  }),
  pack: z.object({
    prefix: z.string().min(1).default('PACK'),
  }),
  debug: z.object({
    verbose: z.boolean().default(false),
  }),
  app: z.object({
    name: z.string().default('packwright'),
    version: z.string().default('0.1.0'),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

const ENV_MAP: Record<string, string> = {
  GITHUB_TOKEN: 'github.token',
  GITHUB_BASE_URL: 'github.baseUrl',
  GITHUB_RELEASES_PER_PAGE: 'github.releasesPerPage',
  DOWNLOAD_CHUNK_SIZE: 'download.chunkSize',
  DOWNLOAD_TIMEOUT: 'download.timeoutMs',
  DOWNLOAD_CONCURRENCY: 'download.concurrency',
  DOWNLOAD_RETRIES: 'download.retries',
  RESOLUTION_MODE: 'resolution.mode',
  REGISTRY_FILE: 'paths.registryFile',
  SKELETON_ARCHIVE: 'paths.skeletonArchive',
  OUTPUT_DIR: 'paths.outputDir',
  PACK_PREFIX: 'pack.prefix',
  VERBOSE: 'debug.verbose',
};

type Coercer = (raw: string) => unknown;

const toNumber: Coercer = (raw) => {
  const n = parseInt(raw, 10);
  return isNaN(n) ? raw : n;
};
const toBoolean: Coercer = (raw) => raw.toLowerCase() === 'true';
const identity: Coercer = (raw) => raw;

const COERCE_MAP: Record<string, Coercer> = {
  'github.releasesPerPage': toNumber,
  'download.chunkSize': toNumber,
  'download.timeoutMs': toNumber,
  'download.concurrency': toNumber,
  'download.retries': toNumber,
  'debug.verbose': toBoolean,
};

/** Env values grouped by config section, e.g. `DOWNLOAD_RETRIES` under `download.retries`. */
function configFromEnv(
  env: Record<string, string | undefined>
): Record<string, Record<string, unknown>> {
  const config: Record<string, Record<string, unknown>> = {
    github: {},
    download: {},
    resolution: {},
    paths: {},
    pack: {},
    debug: {},
    app: {},
  };

  for (const [envVar, dotPath] of Object.entries(ENV_MAP)) {
    const raw = env[envVar];
    if (raw === undefined || raw === '') continue;
    const [section, key] = dotPath.split('.');
    if (!section || !key) continue;
    const coerce = COERCE_MAP[dotPath] ?? identity;
    const target = config[section] ?? {};
    target[key] = coerce(raw);
    config[section] = target;
  }

  return config;
}

/**
 * Build a validated configuration from environment-style key/value pairs.
 * Pipelines receive the result explicitly; nothing in core reads process.env.
 */
export function loadConfig(env: Record<string, string | undefined> = {}): Config {
  try {
    return ConfigSchema.parse(configFromEnv(env));
  } catch (error) {
    if (error instanceof z.ZodError) {
      const summary = error.issues
        .map((issue, idx) => `${String(idx + 1)}. ${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Config validation failed: ${summary}`, 'validation');
    }
    throw error;
  }
}
