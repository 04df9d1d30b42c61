/**
 * Configuration loader
 *
 * Reads clientkey.yaml, resolves ${ENV:VAR} references and validates the
 * result against ApiKeyConfigSchema.
 */

import fs from 'fs/promises';
import yaml from 'yaml';
import { ZodError } from 'zod';
import { ApiKeyConfigSchema, type ApiKeyConfig } from './schema.js';
import { logger } from '../utils/logger.js';
import { ClientKeyError, ConfigurationError } from '../utils/errors.js';

export type { ApiKeyConfig, ApiKeyConfigInput, CodecLayoutName } from './schema.js';
export { ApiKeyConfigSchema, CodecLayoutSchema } from './schema.js';

const MAX_CONFIG_BYTES = 1024 * 1024;

/**
 * Load configuration from a YAML file
 *
 * @param configPath Path to clientkey.yaml
 * @throws ConfigurationError if the file is unreadable, too large or invalid
 */
export async function loadConfig(configPath: string): Promise<ApiKeyConfig> {
  logger.info(`[config] Loading configuration from ${configPath}`);

  try {
    const stats = await fs.stat(configPath);
    if (stats.size > MAX_CONFIG_BYTES) {
      throw new ConfigurationError(
        `Config file ${configPath} exceeds 1MB size limit`,
        'config_too_large'
      );
    }

    const fileContent = await fs.readFile(configPath, 'utf-8');
    const rawConfig: unknown = yaml.parse(fileContent, {
      maxAliasCount: 50,
      schema: 'core',
      uniqueKeys: true,
    });

    const config = resolveConfig(rawConfig ?? {});
    logger.info('[config] Configuration loaded successfully');
    return config;
  } catch (error) {
    if (error instanceof ClientKeyError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load config: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Validate an in-memory configuration object
 *
 * ${ENV:VAR} string values are replaced from process.env before validation.
 */
export function resolveConfig(raw: unknown): ApiKeyConfig {
  const resolved = resolveEnvReferences(raw);
  try {
    return ApiKeyConfigSchema.parse(resolved);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(
        `Invalid configuration: ${issues.join('; ')}`,
        'configuration_error',
        { issues }
      );
    }
    throw error;
  }
}

/**
 * Configuration with every value at its default
 */
export function defaultConfig(): ApiKeyConfig {
  return ApiKeyConfigSchema.parse({});
}

function resolveEnvReferences(obj: unknown): unknown {
  if (typeof obj === 'string') {
    const envMatch = /^\$\{ENV:([A-Z_][A-Z0-9_]*)\}$/.exec(obj);
    if (!envMatch) {
      return obj;
    }
    const envVar = envMatch[1] ?? '';
    const value = process.env[envVar];
    if (value === undefined) {
      throw new ConfigurationError(
        `Environment variable ${envVar} not found`,
        'config_resolution_error'
      );
    }
    // YAML would have typed a literal number; keep that behaviour for env values
    return /^\d+$/.test(value) ? Number(value) : value;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => resolveEnvReferences(item));
  }

  if (obj !== null && typeof obj === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      resolved[key] = resolveEnvReferences(value);
    }
    return resolved;
  }

  return obj;
}
