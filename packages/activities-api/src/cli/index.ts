#!/usr/bin/env tsx

/**
 * Activities CLI
 *
 * Entry point for the activities command
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { initCommand } from './commands/init.js';
import { listCommand } from './commands/list.js';
import { startCommand } from './commands/start.js';
import { formatCliError } from './format-error.js';

// Read version from package.json at runtime
const getVersion = (): string => {
  try {
    const pkgPath = fileURLToPath(new URL('../../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg) {
      return String(pkg.version);
    }
    return 'unknown';
  } catch {
    return 'unknown'; // Fallback if package.json not found
  }
};
const VERSION = getVersion();

const program = new Command();

program
  .name('activities')
  .description('Mergington High School extracurricular activities API')
  .version(VERSION, '-v, --version', 'Print version information');

program
  .command('init')
  .description('Create the default configuration file')
  .option('-f, --force', 'Overwrite existing configuration')
  .action(async (options: { force?: boolean }) => {
    await initCommand({ force: options.force });
  });

program
  .command('start')
  .description('Start the HTTP API')
  .option('-p, --port <port>', 'Port number (overrides config)')
  .option('--host <host>', 'Interface to bind (overrides config)')
  .action(async (options: { port?: string; host?: string }) => {
    await startCommand({ port: options.port, host: options.host });
  });

program
  .command('list')
  .description('Print the seeded activity catalog')
  .option('--seed <file>', 'Seed catalog JSON file')
  .action((options: { seed?: string }) => {
    listCommand({ seedFile: options.seed });
  });

// If no arguments, show help
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch((error: unknown) => {
    console.error(formatCliError(error));
    process.exit(1);
  });
}
