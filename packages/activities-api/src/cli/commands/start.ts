/**
 * activities start command
 *
 * Build a seeded registry and serve it over HTTP until interrupted
 */

import {
  ActivityRegistry,
  ConfigurationError,
  DebugLogger,
  loadSeedCatalog,
  setLogLevel,
  type LogLevel,
} from '@mergington/activities-core';
import { createApiServer, type ApiServer } from '../../api/index.js';
import { configExists, expandPath, loadConfig } from '../config/config-manager.js';
import type { ActivitiesConfig, ConfigLogLevel, ServerConfig } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/types.js';

const logger = new DebugLogger('start');

const LOG_LEVELS: Record<ConfigLogLevel, LogLevel> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARN',
  error: 'ERROR',
  none: 'NONE',
};

export interface StartOptions {
  /** Port from the command line */
  port?: string;
  /** Host from the command line */
  host?: string;
}

/**
 * Load the config file, or fall back to defaults when none has been created
 */
export async function resolveConfig(): Promise<ActivitiesConfig> {
  if (!configExists()) {
    logger.info('No configuration file found, using defaults');
    return DEFAULT_CONFIG;
  }
  return loadConfig();
}

/**
 * Apply command line options and environment variables on top of the config.
 * Precedence: command line > ACTIVITIES_API_HOST / ACTIVITIES_API_PORT > config file.
 */
export function resolveServerConfig(
  config: ActivitiesConfig,
  options: StartOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  const host = options.host ?? env.ACTIVITIES_API_HOST ?? config.server.host;
  const rawPort = options.port ?? env.ACTIVITIES_API_PORT;

  if (rawPort === undefined) {
    return { host, port: config.server.port };
  }

  const port = Number(rawPort);
  if (!/^\d+$/.test(rawPort) || port > 65535) {
    throw new ConfigurationError('server.port', `Invalid port: ${rawPort}`);
  }
  return { host, port };
}

/**
 * Create the registry from config and start listening
 */
export async function runServer(
  config: ActivitiesConfig,
  serverConfig: ServerConfig
): Promise<ApiServer> {
  if (!process.env.ACTIVITIES_LOG_LEVEL) {
    setLogLevel(LOG_LEVELS[config.logging.level]);
  }

  const seedPath = config.registry.seed_file ? expandPath(config.registry.seed_file) : undefined;
  const registry = new ActivityRegistry(loadSeedCatalog(seedPath), {
    capacityPolicy: config.registry.capacity_policy,
  });
  logger.info(`Loaded ${registry.size} activities (capacity policy: ${registry.capacityPolicy})`);

  const server = createApiServer({
    registry,
    host: serverConfig.host,
    port: serverConfig.port,
  });
  await server.start();
  return server;
}

/**
 * Execute start command
 */
export async function startCommand(options: StartOptions = {}): Promise<void> {
  const config = await resolveConfig();
  const serverConfig = resolveServerConfig(config, options);
  const server = await runServer(config, serverConfig);

  console.log(`Activities API running at http://${serverConfig.host}:${server.port}`);
  console.log('Press Ctrl+C to stop.');

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to stop server:', error);
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
