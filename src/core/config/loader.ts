import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { ZodError } from 'zod';
import {
  PartialWheelsConfigSchema,
  WheelsConfigSchema,
  type PartialWheelsConfig,
  type WheelsConfig,
} from './types.js';
import { ConfigError, ConfigErrorCode } from '../errors/index.js';
import { isEnvFlagSet } from '../../utils/index.js';

export const WHEELS_DIR_NAME = '.wheels';
export const CONFIG_FILE_NAME = 'config.json';

/**
 * Get the home directory at runtime (not at module load time)
 * This allows for proper mocking in tests
 */
function getHomeDir(): string {
  return os.homedir();
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load and merge configuration from all sources
 *
 * Loading order (priority):
 * 1. Defaults
 * 2. Global config (~/.wheels/config.json)
 * 3. Project config (./.wheels/config.json) - Overrides global
 * 4. Environment (WHEELS_TERRAFORM_PATH, WHEELS_DEBUG)
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<WheelsConfig> {
  const cwd = options.cwd || process.cwd();
  const env = options.env || process.env;

  let config: PartialWheelsConfig = {};

  const globalConfig = await readConfigFile(path.join(getHomeDir(), WHEELS_DIR_NAME, CONFIG_FILE_NAME));
  if (globalConfig) {
    config = mergeConfigs(config, globalConfig);
  }

  const projectConfig = await readConfigFile(path.join(cwd, WHEELS_DIR_NAME, CONFIG_FILE_NAME));
  if (projectConfig) {
    config = mergeConfigs(config, projectConfig);
  }

  config = mergeConfigs(config, configFromEnv(env));

  return WheelsConfigSchema.parse(config);
}

/**
 * Merge two partial configurations
 * - scalars: local overrides global
 * - disabledPlugins / extraCommands: union, global entries first
 */
export function mergeConfigs(global: PartialWheelsConfig, local: PartialWheelsConfig): PartialWheelsConfig {
  const result: PartialWheelsConfig = { ...global, ...local };

  if (global.disabledPlugins || local.disabledPlugins) {
    result.disabledPlugins = union(global.disabledPlugins, local.disabledPlugins);
  }
  if (global.extraCommands || local.extraCommands) {
    result.extraCommands = union(global.extraCommands, local.extraCommands);
  }

  return result;
}

export function getDefaultConfig(): WheelsConfig {
  return WheelsConfigSchema.parse({});
}

function configFromEnv(env: NodeJS.ProcessEnv): PartialWheelsConfig {
  const result: PartialWheelsConfig = {};

  const terraformPath = env.WHEELS_TERRAFORM_PATH;
  if (terraformPath) {
    result.terraformPath = terraformPath;
  }

  const debug = env.WHEELS_DEBUG;
  if (debug !== undefined && debug !== '') {
    result.debug = isEnvFlagSet('WHEELS_DEBUG', env);
  }

  return result;
}

function union(first: string[] = [], second: string[] = []): string[] {
  return Array.from(new Set([...first, ...second]));
}

async function readConfigFile(filePath: string): Promise<PartialWheelsConfig | null> {
  let content: string;
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) return null;
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch {
    throw new ConfigError(
      `Invalid JSON in config file: ${filePath}`,
      ConfigErrorCode.INVALID_JSON,
      'Check the configuration file syntax.',
    );
  }

  const parsed = PartialWheelsConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid config file ${filePath}: ${describeIssues(parsed.error)}`,
      ConfigErrorCode.INVALID_VALUE,
      `Supported keys: ${Object.keys(WheelsConfigSchema.shape).join(', ')}`,
    );
  }

  return parsed.data;
}

function describeIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
