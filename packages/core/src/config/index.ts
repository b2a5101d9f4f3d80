/**
 * Configuration loader
 *
 * Reads ephemera.yaml, resolves ${ENV:VAR} and ${file:path} references, then
 * validates against EphemeraConfigSchema.
 */

import fs from 'fs/promises';
import path from 'path';
import yaml from 'yaml';
import { ZodError } from 'zod';
import { EphemeraConfigSchema, type EphemeraConfig } from './schema.js';
import { logger } from '../utils/logger.js';
import { ConfigurationError, EphemeraError } from '../utils/errors.js';

export * from './schema.js';

const MAX_CONFIG_BYTES = 1024 * 1024;

const ENV_REFERENCE = /^\$\{ENV:([A-Z_][A-Z0-9_]*)\}$/;
const FILE_REFERENCE = /^\$\{file:(.+)\}$/;

/**
 * Load configuration from a YAML file
 *
 * @param configPath Path to ephemera.yaml
 * @returns Validated configuration with defaults applied
 * @throws ConfigurationError if the file is unreadable, a reference cannot be resolved,
 *   or validation fails
 */
export async function loadConfig(configPath: string): Promise<EphemeraConfig> {
  logger.info(`[config] Loading configuration from ${configPath}`);

  try {
    const stats = await fs.stat(configPath);
    if (stats.size > MAX_CONFIG_BYTES) {
      throw new ConfigurationError(`Config file ${configPath} exceeds 1MB size limit`);
    }

    const fileContent = await fs.readFile(configPath, 'utf-8');
    const rawConfig: unknown = yaml.parse(fileContent, {
      maxAliasCount: 50,
      schema: 'core',
      uniqueKeys: true,
    });

    const baseDir = path.dirname(path.resolve(configPath));
    const resolved = await resolveReferences(rawConfig ?? {}, baseDir);

    const config = parseConfig(resolved);
    logger.info('[config] Configuration loaded successfully');
    return config;
  } catch (error) {
    if (error instanceof EphemeraError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new ConfigurationError(`Failed to load config: ${error.message}`, undefined, {
        cause: error,
      });
    }
    throw error;
  }
}

/**
 * Validate an already-parsed configuration object
 */
export function parseConfig(raw: unknown): EphemeraConfig {
  try {
    return EphemeraConfigSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw configurationErrorFromZod(error);
    }
    throw error;
  }
}

/**
 * Convert zod issues to a ConfigurationError listing every offending path
 */
export function configurationErrorFromZod(error: ZodError): ConfigurationError {
  const issues = error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const summary = issues.map(issue => `${issue.path || '(root)'}: ${issue.message}`).join('; ');
  return new ConfigurationError(`Invalid configuration: ${summary}`, { issues });
}

/**
 * Resolve ${ENV:VAR} and ${file:path} string references anywhere in the tree
 */
async function resolveReferences(value: unknown, baseDir: string): Promise<unknown> {
  if (typeof value === 'string') {
    const envMatch = ENV_REFERENCE.exec(value);
    if (envMatch?.[1]) {
      const resolved = process.env[envMatch[1]];
      if (resolved === undefined) {
        throw new ConfigurationError(`Environment variable ${envMatch[1]} not found`);
      }
      return resolved;
    }

    const fileMatch = FILE_REFERENCE.exec(value);
    if (fileMatch?.[1]) {
      const filePath = path.resolve(baseDir, fileMatch[1]);
      try {
        return (await fs.readFile(filePath, 'utf-8')).trim();
      } catch (error) {
        throw new ConfigurationError(`Cannot read referenced file ${fileMatch[1]}`, undefined, {
          cause: error,
        });
      }
    }

    return value;
  }

  if (Array.isArray(value)) {
    return Promise.all(value.map(item => resolveReferences(item, baseDir)));
  }

  if (value !== null && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, child] of Object.entries(value)) {
      resolved[key] = await resolveReferences(child, baseDir);
    }
    return resolved;
  }

  return value;
}
