/**
 * @mergington/activities-core
 *
 * In-memory activity registry, seed catalog and shared error/logging utilities.
 */

export * from './types.js';
export * from './errors.js';
export { ActivityRegistry, cloneRecord, type ActivityRegistryOptions } from './activity-registry.js';
export {
  DEFAULT_SEED_PATH,
  createSeedRegistry,
  loadSeedCatalog,
  parseSeedCatalog,
} from './seed-catalog.js';
export { DebugLogger, setLogLevel, isLogLevel, type LogLevel } from './debug-logger.js';
