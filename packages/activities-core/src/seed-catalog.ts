/**
 * Seed catalog loader
 *
 * Reads the initial activities from a JSON file (snake_case keys, the same
 * shape the HTTP API returns) and validates each record before it reaches
 * a registry.
 *
 * @module seed-catalog
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { ActivityRegistry, type ActivityRegistryOptions } from './activity-registry.js';
import { debug } from './debug-logger.js';
import { SeedValidationError } from './errors.js';
import type { ActivityCatalog, ActivityRecord } from './types.js';

/**
 * Bundled catalog of the school's activities
 */
export const DEFAULT_SEED_PATH = fileURLToPath(
  new URL('../data/activities.json', import.meta.url)
);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

function parseRecord(source: string, name: string, raw: unknown): ActivityRecord {
  const fail = (field: string, message: string): never => {
    throw new SeedValidationError(source, `"${name}".${field} ${message}`, {
      activity: name,
      field,
    });
  };

  if (!isRecord(raw)) {
    return fail('(record)', 'must be an object');
  }

  const { description, schedule, max_participants: maxParticipants, participants } = raw;

  if (!isNonEmptyString(description)) {
    return fail('description', 'must be a non-empty string');
  }
  if (!isNonEmptyString(schedule)) {
    return fail('schedule', 'must be a non-empty string');
  }
  if (
    typeof maxParticipants !== 'number' ||
    !Number.isInteger(maxParticipants) ||
    maxParticipants <= 0
  ) {
    return fail('max_participants', 'must be a positive integer');
  }
  if (
    !Array.isArray(participants) ||
    !participants.every((p): p is string => typeof p === 'string')
  ) {
    return fail('participants', 'must be an array of strings');
  }
  if (new Set(participants).size !== participants.length) {
    return fail('participants', 'must not contain duplicates');
  }
  if (participants.length > maxParticipants) {
    return fail(
      'participants',
      `exceeds max_participants (${participants.length} > ${maxParticipants})`
    );
  }

  return { description, schedule, maxParticipants, participants: [...participants] };
}

/**
 * Validate an already-parsed catalog object
 *
 * @param source - Label used in error messages (usually the file path)
 */
export function parseSeedCatalog(raw: unknown, source = '<inline>'): ActivityCatalog {
  if (!isRecord(raw)) {
    throw new SeedValidationError(source, 'top level must be an object keyed by activity name');
  }

  // fromEntries defines own keys, so a name like "__proto__" stays an activity
  return Object.fromEntries(
    Object.entries(raw).map(([name, record]): [string, ActivityRecord] => {
      if (name.trim().length === 0) {
        throw new SeedValidationError(source, 'activity names must be non-empty');
      }
      return [name, parseRecord(source, name, record)];
    })
  );
}

/**
 * Load and validate a seed catalog file
 *
 * @param path - JSON file to read (default: bundled catalog)
 */
export function loadSeedCatalog(path: string = DEFAULT_SEED_PATH): ActivityCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SeedValidationError(path, `could not be read: ${message}`);
  }

  const catalog = parseSeedCatalog(raw, path);
  debug(`[seed] Loaded ${Object.keys(catalog).length} activities from ${path}`);
  return catalog;
}

/**
 * Build a fresh registry from a seed file. Each call returns an independent registry.
 */
export function createSeedRegistry(
  options: ActivityRegistryOptions & { seedPath?: string } = {}
): ActivityRegistry {
  const { seedPath, ...registryOptions } = options;
  return new ActivityRegistry(loadSeedCatalog(seedPath), registryOptions);
}
