/**
 * Configuration loader and manager
 */

import { existsSync, readFileSync, readdirSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { validatePipelineConfig, type PipelineConfig } from './schema.js';
import { ConfigError } from '../types.js';
import { logger } from '../util/logger.js';

/**
 * Cache for loaded configurations
 */
const configCache = new Map<string, PipelineConfig>();

export interface LoadConfigOptions {
  configDir?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and validate a pipeline configuration from configs/<name>.yaml,
 * then apply environment overrides
 */
export function loadPipelineConfig(name: string, options: LoadConfigOptions = {}): PipelineConfig {
  const env = options.env ?? process.env;
  const configDir = options.configDir ?? resolve(process.cwd(), 'configs');
  const cacheKey = `${configDir}:${name}`;

  // Check cache first
  const cached = configCache.get(cacheKey);
  if (cached) {
    return applyEnvOverrides(cached, env);
  }

  const configPath = resolve(configDir, `${name}.yaml`);
  if (!existsSync(configPath)) {
    throw new ConfigError(`Configuration file not found: ${configPath}`);
  }

  let rawConfig: unknown;
  try {
    logger.debug(`Loading config from ${configPath}`);
    rawConfig = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to load configuration for '${name}': ${error}`);
  }

  // Substitute environment variables
  const processedConfig = substituteEnvVars(rawConfig, env);

  const validation = validatePipelineConfig(processedConfig);
  if (!validation.success || !validation.data) {
    throw new ConfigError(`Invalid configuration '${name}':\n${validation.errors.join('\n')}`);
  }

  const config = validation.data;
  configCache.set(cacheKey, config);

  logger.info(`Loaded configuration: ${name}`, {
    region: config.region,
    sources: config.sources.map(source => source.name),
  });

  return applyEnvOverrides(config, env);
}

/**
 * DAILY_LEAD_LIMIT and STATE_DIR take precedence over the file
 */
export function applyEnvOverrides(config: PipelineConfig, env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  let result = config;

  const limit = env.DAILY_LEAD_LIMIT?.trim();
  if (limit) {
    const parsed = Number(limit);
    if (!Number.isInteger(parsed) || parsed < 0) {
      throw new ConfigError(`DAILY_LEAD_LIMIT must be a non-negative integer, got '${limit}'`);
    }
    result = { ...result, daily_limit: parsed };
  }

  const stateDir = env.STATE_DIR?.trim();
  if (stateDir) {
    result = { ...result, state_dir: stateDir };
  }

  return result;
}

/**
 * Proxy API keys from SCRAPER_API_KEYS (comma separated) or SCRAPER_API_KEY
 */
export function resolveApiKeys(env: NodeJS.ProcessEnv = process.env): string[] {
  const raw = env.SCRAPER_API_KEYS ?? env.SCRAPER_API_KEY ?? '';
  const keys = raw
    .split(',')
    .map(key => key.trim())
    .filter(key => key.length > 0);

  if (keys.length === 0) {
    throw new ConfigError('No proxy API keys configured: set SCRAPER_API_KEYS or SCRAPER_API_KEY');
  }

  return Array.from(new Set(keys));
}

/**
 * Get all available pipeline configurations
 */
export function getAvailableConfigs(configDir: string = resolve(process.cwd(), 'configs')): string[] {
  try {
    return readdirSync(configDir)
      .filter((file: string) => file.endsWith('.yaml'))
      .map((file: string) => file.replace('.yaml', ''));
  } catch (error) {
    logger.warn('Could not read configs directory', { error });
    return [];
  }
}

/**
 * Clear configuration cache
 */
export function clearConfigCache(): void {
  configCache.clear();
  logger.debug('Configuration cache cleared');
}

/**
 * Substitute ${VAR_NAME} references in every string of the configuration
 */
export function substituteEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([^}]+)\}/g, (match: string, varName: string) => {
      const replacement = env[varName];
      if (replacement === undefined) {
        logger.warn(`Environment variable not found: ${varName}`);
        return match; // Keep original if not found
      }
      return replacement;
    });
  }

  if (Array.isArray(value)) {
    return value.map(item => substituteEnvVars(item, env));
  }

  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, nested] of Object.entries(value)) {
      result[key] = substituteEnvVars(nested, env);
    }
    return result;
  }

  return value;
}

export { loadRegion, clearRegionCache, type Region } from './region.js';
export { resolveSource } from './schema.js';
export type { PipelineConfig, SourceConfig, ResolvedSourceConfig, FetchDefaults } from './schema.js';
