/**
 * activities list command
 *
 * Print the seed catalog without starting a server
 */

import { loadSeedCatalog, type ActivityCatalog } from '@mergington/activities-core';
import { expandPath } from '../config/config-manager.js';

export interface ListOptions {
  /** Seed catalog to read instead of the bundled one */
  seedFile?: string;
}

/**
 * One line per activity: name, enrollment and schedule
 */
export function formatCatalog(catalog: ActivityCatalog): string[] {
  const names = Object.keys(catalog);
  const width = Math.max(0, ...names.map((name) => name.length));

  return names.map((name) => {
    const { participants, maxParticipants, schedule } = catalog[name];
    const enrollment = `${participants.length}/${maxParticipants}`.padStart(5);
    return `${name.padEnd(width)}  ${enrollment}  ${schedule}`;
  });
}

/**
 * Execute list command
 */
export function listCommand(options: ListOptions = {}): void {
  const catalog = loadSeedCatalog(options.seedFile ? expandPath(options.seedFile) : undefined);
  const lines = formatCatalog(catalog);

  console.log(`\n${lines.length} activities\n`);
  for (const line of lines) {
    console.log(line);
  }
  console.log('');
}
