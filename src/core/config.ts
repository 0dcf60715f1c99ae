/**
 * Configuration loader for cloud-sweep.
 *
 * Loads optional defaults (profile, region, output format, log level, retry
 * window) from a YAML file or from an AWS Systems Manager (SSM) parameter,
 * validates the structure, and caches the result.
 */

import { readFile } from 'node:fs/promises';
import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { LRUCache } from 'lru-cache';
import yaml from 'js-yaml';
import { z } from 'zod';
import {
  ConfigurationError,
  ConfigValidationError,
  ParameterNotFoundError,
  describeError,
} from '@shared/errors';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('cloud-sweep:config');

/**
 * Prefix marking a configuration source as an SSM parameter name.
 */
export const SSM_SOURCE_PREFIX = 'ssm:';

/**
 * Environment variable naming the default configuration source.
 */
export const CONFIG_ENV_VAR = 'CLOUD_SWEEP_CONFIG';

/**
 * Configuration schema validation using Zod.
 *
 * Every field is optional; unknown keys are rejected so typos surface early.
 */
const ConfigSchema = z
  .object({
    profile: z.string().min(1).optional(),
    region: z.string().min(1).optional(),
    format: z.enum(['jsonl', 'json', 'tsv', 'csv', 'table']).optional(),
    log_level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    retry: z
      .object({
        days: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

/**
 * LRU cache for configuration objects.
 * Prevents re-reading the same file or SSM parameter within one process.
 */
const configCache = new LRUCache<string, Config>({
  max: 32,
  ttl: 1000 * 60 * 5, // 5 minutes TTL
});

/**
 * Loads configuration from a file path or an `ssm:<parameter>` source.
 *
 * An empty document yields an empty configuration.
 *
 * @param source - File path, or SSM parameter name prefixed with "ssm:"
 * @param client - Optional SSM client for testing
 * @returns Parsed and validated configuration object
 *
 * @throws {ParameterNotFoundError} If the SSM parameter is not found
 * @throws {ConfigurationError} If the configuration cannot be read or parsed
 * @throws {ConfigValidationError} If fields are unknown or have the wrong type
 */
export async function loadConfig(source: string, client?: SSMClient): Promise<Config> {
  const cached = configCache.get(source);
  if (cached) {
    logger.debug(`Using cached config for source: ${source}`);
    return cached;
  }

  const document = source.startsWith(SSM_SOURCE_PREFIX)
    ? await readSsmParameter(source.slice(SSM_SOURCE_PREFIX.length), client)
    : await readConfigFile(source);

  let parsed: unknown;
  try {
    parsed = yaml.load(document);
  } catch (error) {
    throw new ConfigurationError(
      `Failed to parse YAML configuration from ${source}: ${describeError(error)}`,
      { cause: error }
    );
  }

  const result = ConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const problems = result.error.errors.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')} (${issue.message})` : issue.message
    );
    throw new ConfigValidationError(
      `Configuration validation failed for ${source}: ${problems.join(', ')}`,
      { cause: result.error }
    );
  }

  configCache.set(source, result.data);

  logger.debug({ source }, 'Config loaded successfully');
  return result.data;
}

async function readConfigFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Could not read config file ${path}: ${describeError(error)}`, {
      cause: error,
    });
  }
}

async function readSsmParameter(parameterName: string, client?: SSMClient): Promise<string> {
  logger.info(`Loading config from SSM: ${parameterName}`);

  const ssmClient = client ?? new SSMClient({});

  let parameterValue: string;
  try {
    const response = await ssmClient.send(new GetParameterCommand({ Name: parameterName }));
    parameterValue = response.Parameter?.Value ?? '';
  } catch (error) {
    // Type guard for AWS SDK errors
    if (error instanceof Error && error.name === 'ParameterNotFound') {
      throw new ParameterNotFoundError(`Could not find SSM parameter: ${parameterName}`, {
        cause: error,
      });
    }
    throw new ConfigurationError(
      `Failed to retrieve SSM parameter ${parameterName}: ${describeError(error)}`,
      { cause: error }
    );
  }

  if (!parameterValue) {
    throw new ConfigurationError(`SSM parameter ${parameterName} exists but has no value`);
  }
  return parameterValue;
}

/**
 * Clears the configuration cache.
 * Useful for testing or forcing a fresh config reload.
 */
export function clearConfigCache(): void {
  configCache.clear();
  logger.debug('Config cache cleared');
}
