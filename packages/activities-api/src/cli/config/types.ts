/**
 * Configuration types for the activities CLI
 */

import type { CapacityPolicy } from '@mergington/activities-core';

/**
 * Log level names as written in the config file
 */
export type ConfigLogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export const CONFIG_LOG_LEVELS: readonly ConfigLogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'none',
];

export interface ServerConfig {
  /** Interface to bind */
  host: string;
  /** TCP port; 0 picks a free port */
  port: number;
}

export interface RegistryConfig {
  /**
   * Whether signup rejects once max_participants is reached
   * @default 'advisory'
   */
  capacity_policy: CapacityPolicy;
  /**
   * Seed catalog JSON file. Supports ~ expansion.
   * Null or absent uses the bundled catalog.
   */
  seed_file?: string | null;
}

export interface LoggingConfig {
  level: ConfigLogLevel;
}

/**
 * Main configuration, stored as YAML
 */
export interface ActivitiesConfig {
  /** Config schema version */
  version: number;
  server: ServerConfig;
  registry: RegistryConfig;
  logging: LoggingConfig;
}

export const DEFAULT_CONFIG: ActivitiesConfig = {
  version: 1,
  server: {
    host: '127.0.0.1',
    port: 8000,
  },
  registry: {
    capacity_policy: 'advisory',
    seed_file: null,
  },
  logging: {
    level: 'error',
  },
};

export const APP_PATHS = {
  /** Configuration file */
  CONFIG: '~/.mergington/config.yaml',
} as const;
