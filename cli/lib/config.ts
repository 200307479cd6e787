import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { ConfigurationError } from './errors';

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

const LocalStorageSchema = z.object({
  driver: z.literal('local'),
  root: z.string().default('data/media'),
});

const S3StorageSchema = z.object({
  driver: z.literal('s3'),
  bucket: z.string(),
  region: z.string().default('us-east-1'),
  endpoint: z.string().url().optional(),
  forcePathStyle: z.boolean().default(true),
});

/**
 * Zod schema for the gallery configuration file
 */
const GalleryConfigSchema = z.object({
  logLevel: LogLevelSchema.default('info'),
  database: z.object({
    url: z.string().optional(),
    maxConnections: z.number().int().positive().default(10),
  }).default({}),
  storage: z.discriminatedUnion('driver', [LocalStorageSchema, S3StorageSchema]).default({ driver: 'local' }),
  signing: z.object({
    secret: z.string().min(1).optional(),
    baseUrl: z.string().default('/media'),
    algorithm: z.enum(['md5', 'sha256']).default('md5'),
    defaultTtlSeconds: z.number().int().positive().default(3600),
  }).default({}),
  ingest: z.object({
    archiveMaxBytes: z.number().int().positive().default(100 * 1024 * 1024),
  }).default({}),
  enrichment: z.object({
    detectorUrl: z.string().url().optional(),
    recognizerUrl: z.string().url().optional(),
    timeoutMs: z.number().int().positive().default(30000),
    pools: z.object({
      gpu: z.number().int().positive().default(1),
      cpu: z.number().int().positive().default(2),
    }).default({}),
  }).default({}),
});

export type GalleryConfig = z.infer<typeof GalleryConfigSchema>;
export type StorageConfig = GalleryConfig['storage'];
export type SigningConfig = GalleryConfig['signing'];
export type EnrichmentConfig = GalleryConfig['enrichment'];

export interface ConfigLoaderOptions {
  configDir?: string;
  fileName?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Loads `config/gallery.config.json`, substitutes `${VAR}` placeholders, applies
 * environment overrides and validates the result. Each loader caches its own
 * result; nothing is shared between instances.
 */
export class ConfigLoader {
  private cached: GalleryConfig | null = null;
  private readonly configPath: string;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: ConfigLoaderOptions = {}) {
    const configDir = options.configDir ?? path.join(process.cwd(), 'config');
    this.configPath = path.join(configDir, options.fileName ?? 'gallery.config.json');
    this.env = options.env ?? process.env;
  }

  async load(): Promise<GalleryConfig> {
    if (this.cached) return this.cached;

    const raw = await this.readRaw();

    let parsed: GalleryConfig;
    try {
      parsed = GalleryConfigSchema.parse(replaceEnvVars(raw, this.env));
    } catch (error) {
      if (error instanceof z.ZodError) {
        const errors = error.errors.map(e => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
        throw new ConfigurationError(`Configuration validation failed for ${this.configPath}:\n${errors}`);
      }
      throw error;
    }

    this.cached = applyEnvOverrides(parsed, this.env);
    return this.cached;
  }

  clearCache(): void {
    this.cached = null;
  }

  private async readRaw(): Promise<unknown> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        logger.warn(`Config file not found at ${this.configPath}, using defaults`);
        return {};
      }
      throw error;
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to parse ${this.configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}

/**
 * Replace `${VAR_NAME}` placeholders in string values with environment values
 */
function replaceEnvVars(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      const resolved = env[varName];
      if (resolved === undefined) {
        throw new ConfigurationError(`Environment variable ${varName} is not defined`);
      }
      return resolved;
    });
  }

  if (Array.isArray(value)) {
    return value.map(item => replaceEnvVars(item, env));
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = replaceEnvVars(item, env);
    }
    return result;
  }

  return value;
}

function applyEnvOverrides(config: GalleryConfig, env: NodeJS.ProcessEnv): GalleryConfig {
  const storage: StorageConfig =
    config.storage.driver === 'local' && env.GALLERY_STORAGE_ROOT
      ? { ...config.storage, root: env.GALLERY_STORAGE_ROOT }
      : config.storage;

  return {
    ...config,
    logLevel: env.LOG_LEVEL ? LogLevelSchema.parse(env.LOG_LEVEL.toLowerCase()) : config.logLevel,
    database: { ...config.database, url: env.DATABASE_URL || config.database.url },
    storage,
    signing: {
      ...config.signing,
      // dedicated secret first; the shared application secret only when none is configured
      secret: env.GALLERY_SIGNED_URL_SECRET || config.signing.secret || env.SECRET_KEY || undefined,
      baseUrl: env.GALLERY_MEDIA_BASE_URL || config.signing.baseUrl,
    },
  };
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
