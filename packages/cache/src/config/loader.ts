import fs from 'fs';
import yaml from 'js-yaml';
import {
  ConfigError,
  EmbeddingsCacheConfigSchema,
  type EmbeddingsCacheConfig,
  type EmbeddingsCacheConfigInput,
} from '@embedcache/shared';

export interface CacheConfigOptions {
  /** YAML file to read; a missing file is an error */
  configPath?: string;
  /** Environment variables (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  /** Highest-precedence values, e.g. from code */
  overrides?: EmbeddingsCacheConfigInput;
}

type ConfigRecord = Record<string, unknown>;

export const CACHE_ENV = {
  backend: 'EMBEDDINGS_CACHE_BACKEND',
  redisUrl: 'EMBEDDINGS_CACHE_REDIS_URL',
  timeoutMs: 'EMBEDDINGS_CACHE_TIMEOUT_MS',
} as const;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class CacheConfigLoader {
  static loadYaml(filePath: string): ConfigRecord {
    if (!fs.existsSync(filePath)) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  static mergeConfigs(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
    const output: ConfigRecord = { ...target };

    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  static fromEnv(env: NodeJS.ProcessEnv): ConfigRecord {
    const config: ConfigRecord = {};
    const remote: ConfigRecord = {};

    const backend = env[CACHE_ENV.backend];
    if (backend) {
      config.backend = backend;
    }

    const url = env[CACHE_ENV.redisUrl];
    if (url) {
      remote.url = url;
    }

    const timeout = env[CACHE_ENV.timeoutMs];
    if (timeout) {
      const timeoutMs = Number(timeout);
      if (!Number.isInteger(timeoutMs)) {
        throw new ConfigError(`${CACHE_ENV.timeoutMs} must be an integer, got "${timeout}"`);
      }
      remote.timeoutMs = timeoutMs;
    }

    if (Object.keys(remote).length > 0) {
      config.remote = remote;
    }
    return config;
  }

  /**
   * Resolves the cache configuration.
   * Precedence: overrides > environment > config file > schema defaults.
   */
  static load(options: CacheConfigOptions = {}): EmbeddingsCacheConfig {
    const env = options.env ?? process.env;

    let merged: ConfigRecord = {};
    if (options.configPath) {
      merged = this.mergeConfigs(merged, this.loadYaml(options.configPath));
    }
    merged = this.mergeConfigs(merged, this.fromEnv(env));
    if (options.overrides) {
      merged = this.mergeConfigs(merged, { ...options.overrides });
    }

    const result = EmbeddingsCacheConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }
    return result.data;
  }
}

export function loadEmbeddingsCacheConfig(options: CacheConfigOptions = {}): EmbeddingsCacheConfig {
  return CacheConfigLoader.load(options);
}
