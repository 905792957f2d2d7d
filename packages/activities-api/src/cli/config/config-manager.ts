/**
 * Configuration Manager for the activities CLI
 *
 * Manages YAML configuration file at ~/.mergington/config.yaml
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname } from 'node:path';
import * as yaml from 'js-yaml';
import { CAPACITY_POLICIES, ConfigurationError } from '@mergington/activities-core';

import type { ActivitiesConfig, ConfigLogLevel } from './types.js';
import { APP_PATHS, CONFIG_LOG_LEVELS, DEFAULT_CONFIG } from './types.js';

/**
 * Expand ~ to home directory
 */
export function expandPath(path: string): string {
  if (path.startsWith('~')) {
    return path.replace('~', homedir());
  }
  return path;
}

/**
 * Get the full path to config file
 */
export function getConfigPath(): string {
  return expandPath(APP_PATHS.CONFIG);
}

/**
 * Check if config file exists
 */
export function configExists(): boolean {
  return existsSync(getConfigPath());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load configuration from file
 *
 * @returns Configuration merged with defaults
 * @throws ConfigurationError if config file doesn't exist or is invalid
 */
export async function loadConfig(): Promise<ActivitiesConfig> {
  const configPath = getConfigPath();

  if (!existsSync(configPath)) {
    throw new ConfigurationError(
      'file',
      `Configuration file not found: ${configPath}\nRun 'activities init' to create it.`
    );
  }

  let parsed: unknown;
  try {
    const content = await readFile(configPath, 'utf-8');
    parsed = yaml.load(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError('file', `Failed to load configuration: ${message}`);
  }

  if (!isRecord(parsed) || parsed.version === undefined) {
    throw new ConfigurationError('version', 'Invalid configuration: missing required fields');
  }

  const config = mergeWithDefaults(parsed);
  const errors = [...validateEnumFields(parsed), ...validateConfig(config)];
  if (errors.length > 0) {
    throw new ConfigurationError('file', `Invalid configuration:\n- ${errors.join('\n- ')}`, {
      errors,
    });
  }
  return config;
}

/**
 * Save configuration to file
 */
export async function saveConfig(config: ActivitiesConfig): Promise<void> {
  const configPath = getConfigPath();
  const configDir = dirname(configPath);

  if (!existsSync(configDir)) {
    await mkdir(configDir, { recursive: true });
  }

  const content = yaml.dump(config, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
  });

  const fileContent = `# Mergington Activities API Configuration
# Generated: ${new Date().toISOString()}

${content}`;

  await writeFile(configPath, fileContent, 'utf-8');
}

/**
 * Create default configuration file
 *
 * @param overwrite - Whether to overwrite existing config
 * @returns Path to created config file
 * @throws ConfigurationError if config exists and overwrite is false
 */
export async function createDefaultConfig(overwrite = false): Promise<string> {
  const configPath = getConfigPath();

  if (existsSync(configPath) && !overwrite) {
    throw new ConfigurationError(
      'file',
      `Configuration file already exists: ${configPath}\nUse --force to overwrite.`
    );
  }

  await saveConfig(DEFAULT_CONFIG);
  return configPath;
}

/**
 * Merge user config with defaults
 *
 * Sections that are not objects fall back to defaults; field values are
 * kept as written so validateConfig() can report them.
 */
export function mergeWithDefaults(raw: Record<string, unknown>): ActivitiesConfig {
  const server: Record<string, unknown> = isRecord(raw.server) ? raw.server : {};
  const registry: Record<string, unknown> = isRecord(raw.registry) ? raw.registry : {};
  const logging: Record<string, unknown> = isRecord(raw.logging) ? raw.logging : {};

  return {
    version: typeof raw.version === 'number' ? raw.version : Number.NaN,
    server: {
      host: typeof server.host === 'string' ? server.host : DEFAULT_CONFIG.server.host,
      port: server.port === undefined ? DEFAULT_CONFIG.server.port : Number(server.port),
    },
    registry: {
      capacity_policy:
        CAPACITY_POLICIES.find((policy) => policy === registry.capacity_policy) ??
        DEFAULT_CONFIG.registry.capacity_policy,
      seed_file: typeof registry.seed_file === 'string' ? registry.seed_file : null,
    },
    logging: {
      level: parseLogLevel(logging.level) ?? DEFAULT_CONFIG.logging.level,
    },
  };
}

/**
 * Enum fields that mergeWithDefaults() would silently replace
 */
function validateEnumFields(raw: Record<string, unknown>): string[] {
  const errors: string[] = [];
  const registry: Record<string, unknown> = isRecord(raw.registry) ? raw.registry : {};
  const logging: Record<string, unknown> = isRecord(raw.logging) ? raw.logging : {};

  if (
    registry.capacity_policy !== undefined &&
    !CAPACITY_POLICIES.some((policy) => policy === registry.capacity_policy)
  ) {
    errors.push(`registry.capacity_policy must be one of: ${CAPACITY_POLICIES.join(', ')}`);
  }
  if (logging.level !== undefined && parseLogLevel(logging.level) === undefined) {
    errors.push(`logging.level must be one of: ${CONFIG_LOG_LEVELS.join(', ')}`);
  }
  return errors;
}

function parseLogLevel(value: unknown): ConfigLogLevel | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const lower = value.toLowerCase();
  return CONFIG_LOG_LEVELS.find((level) => level === lower);
}

/**
 * Validate configuration object
 *
 * @returns Array of validation error messages (empty if valid)
 */
export function validateConfig(config: ActivitiesConfig): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.version) || config.version < 1) {
    errors.push('version must be a positive integer');
  }

  if (!config.server.host || config.server.host.trim().length === 0) {
    errors.push('server.host must be a non-empty string');
  }

  const { port } = config.server;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    errors.push('server.port must be an integer between 0 and 65535');
  }

  if (!CAPACITY_POLICIES.includes(config.registry.capacity_policy)) {
    errors.push(`registry.capacity_policy must be one of: ${CAPACITY_POLICIES.join(', ')}`);
  }

  if (!CONFIG_LOG_LEVELS.includes(config.logging.level)) {
    errors.push(`logging.level must be one of: ${CONFIG_LOG_LEVELS.join(', ')}`);
  }

  return errors;
}
