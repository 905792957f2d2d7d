/**
 * Unit tests for CLI commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import request from 'supertest';
import { ConfigurationError, setLogLevel } from '@mergington/activities-core';

import { initCommand } from '../../src/cli/commands/init.js';
import { formatCatalog, listCommand } from '../../src/cli/commands/list.js';
import {
  resolveConfig,
  resolveServerConfig,
  runServer,
} from '../../src/cli/commands/start.js';
import { configExists, loadConfig, saveConfig } from '../../src/cli/config/config-manager.js';
import { DEFAULT_CONFIG } from '../../src/cli/config/types.js';
import { formatCliError } from '../../src/cli/format-error.js';
import type { ApiServer } from '../../src/api/index.js';

describe('CLI commands', () => {
  let testDir: string;
  let originalHome: string | undefined;

  beforeEach(async () => {
    testDir = join(
      tmpdir(),
      `activities-cli-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
    );
    await mkdir(testDir, { recursive: true });
    originalHome = process.env.HOME;
    process.env.HOME = testDir;
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    if (originalHome !== undefined) {
      process.env.HOME = originalHome;
    } else {
      delete process.env.HOME;
    }
    setLogLevel(null);
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('init', () => {
    it('should create the config file', async () => {
      await initCommand();

      expect(configExists()).toBe(true);
      expect(await loadConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should leave an existing config alone without --force', async () => {
      await saveConfig({ ...DEFAULT_CONFIG, server: { host: '127.0.0.1', port: 4242 } });

      await initCommand();

      expect((await loadConfig()).server.port).toBe(4242);
      expect(console.log).toHaveBeenCalledWith('Use --force to overwrite.');
    });

    it('should overwrite with --force', async () => {
      await saveConfig({ ...DEFAULT_CONFIG, server: { host: '127.0.0.1', port: 4242 } });

      await initCommand({ force: true });

      expect((await loadConfig()).server.port).toBe(8000);
    });
  });

  describe('list', () => {
    it('should align names and show enrollment', () => {
      const lines = formatCatalog({
        Chess: {
          description: 'd',
          schedule: 'Fridays',
          maxParticipants: 12,
          participants: ['a@x.edu', 'b@x.edu'],
        },
        'Robotics Club': {
          description: 'd',
          schedule: 'Mondays',
          maxParticipants: 8,
          participants: [],
        },
      });

      expect(lines).toEqual([
        'Chess           2/12  Fridays',
        'Robotics Club    0/8  Mondays',
      ]);
    });

    it('should return nothing for an empty catalog', () => {
      expect(formatCatalog({})).toEqual([]);
    });

    it('should print the bundled catalog', () => {
      listCommand();

      expect(console.log).toHaveBeenCalledWith('\n9 activities\n');
    });
  });

  describe('formatCliError()', () => {
    it('should print only the message of a configuration error', () => {
      const error = new ConfigurationError('server.port', 'Invalid port: 70000');

      expect(formatCliError(error)).toBe(
        "Error: Configuration error for 'server.port': Invalid port: 70000"
      );
    });

    it('should pass other errors through with their stack', () => {
      const error = new TypeError('boom');

      expect(formatCliError(error)).toBe(error);
    });
  });

  describe('start', () => {
    let server: ApiServer | null = null;

    afterEach(async () => {
      await server?.stop();
      server = null;
    });

    it('should fall back to defaults without a config file', async () => {
      expect(await resolveConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should read the config file when present', async () => {
      await saveConfig({ ...DEFAULT_CONFIG, server: { host: '127.0.0.1', port: 9100 } });

      expect((await resolveConfig()).server.port).toBe(9100);
    });

    it('should prefer command line over environment over config', () => {
      const env = { ACTIVITIES_API_HOST: '10.0.0.1', ACTIVITIES_API_PORT: '9001' };

      expect(resolveServerConfig(DEFAULT_CONFIG, {}, {})).toEqual({
        host: '127.0.0.1',
        port: 8000,
      });
      expect(resolveServerConfig(DEFAULT_CONFIG, {}, env)).toEqual({
        host: '10.0.0.1',
        port: 9001,
      });
      expect(resolveServerConfig(DEFAULT_CONFIG, { host: '0.0.0.0', port: '3000' }, env)).toEqual(
        { host: '0.0.0.0', port: 3000 }
      );
    });

    it('should reject invalid ports', () => {
      expect(() => resolveServerConfig(DEFAULT_CONFIG, { port: 'eighty' }, {})).toThrow(
        ConfigurationError
      );
      expect(() => resolveServerConfig(DEFAULT_CONFIG, { port: '65536' }, {})).toThrow(
        'Invalid port: 65536'
      );
    });

    it('should serve a registry built with the configured capacity policy', async () => {
      const config = {
        ...DEFAULT_CONFIG,
        registry: { capacity_policy: 'enforce' as const, seed_file: null },
        logging: { level: 'none' as const },
      };

      server = await runServer(config, { host: '127.0.0.1', port: 0 });

      const base = `http://127.0.0.1:${server.port}`;
      const res = await request(base).get('/health');
      expect(res.status).toBe(200);
      expect(res.body.activities).toBe(9);
    });
  });
});
