/**
 * activities init command
 *
 * Write the default configuration file
 */

import { configExists, createDefaultConfig, getConfigPath } from '../config/config-manager.js';

export interface InitOptions {
  /** Overwrite an existing configuration */
  force?: boolean;
}

/**
 * Execute init command
 */
export async function initCommand(options: InitOptions = {}): Promise<void> {
  if (configExists() && !options.force) {
    console.log(`Configuration already exists: ${getConfigPath()}`);
    console.log('Use --force to overwrite.');
    return;
  }

  const configPath = await createDefaultConfig(options.force ?? false);
  console.log(`Created configuration: ${configPath}`);
  console.log('\nNext: activities start');
}
