/**
 * In-memory activity registry
 *
 * Owns the mapping from activity name to record. Every operation is
 * synchronous, so a signup or unregister runs to completion on the event
 * loop before any other request can observe the participant list.
 */

import { DebugLogger } from './debug-logger.js';
import {
  ActivityFullError,
  ActivityNotFoundError,
  AlreadySignedUpError,
  NotSignedUpError,
} from './errors.js';
import type {
  ActivityCatalog,
  ActivityRecord,
  CapacityPolicy,
  SignupResult,
  UnregisterResult,
} from './types.js';

const logger = new DebugLogger('registry');

export interface ActivityRegistryOptions {
  /** Default: 'advisory' */
  capacityPolicy?: CapacityPolicy;
}

export function cloneRecord(record: ActivityRecord): ActivityRecord {
  return { ...record, participants: [...record.participants] };
}

export class ActivityRegistry {
  private readonly activities = new Map<string, ActivityRecord>();
  readonly capacityPolicy: CapacityPolicy;

  constructor(seed: ActivityCatalog = {}, options: ActivityRegistryOptions = {}) {
    this.capacityPolicy = options.capacityPolicy ?? 'advisory';
    for (const [name, record] of Object.entries(seed)) {
      this.activities.set(name, cloneRecord(record));
    }
  }

  get size(): number {
    return this.activities.size;
  }

  /**
   * Snapshot of every activity; mutating the result does not touch the registry
   */
  listActivities(): ActivityCatalog {
    return Object.fromEntries(
      Array.from(this.activities, ([name, record]): [string, ActivityRecord] => [
        name,
        cloneRecord(record),
      ])
    );
  }

  getActivity(name: string): ActivityRecord {
    return cloneRecord(this.require(name));
  }

  signup(name: string, email: string): SignupResult {
    const activity = this.require(name);

    if (activity.participants.includes(email)) {
      throw new AlreadySignedUpError(name, email);
    }

    if (
      this.capacityPolicy === 'enforce' &&
      activity.participants.length >= activity.maxParticipants
    ) {
      throw new ActivityFullError(name, activity.maxParticipants);
    }

    activity.participants.push(email);
    logger.info(
      `Signed up ${email} for ${name} (${activity.participants.length}/${activity.maxParticipants})`
    );

    return { message: `Signed up ${email} for ${name}` };
  }

  unregister(name: string, email: string): UnregisterResult {
    const activity = this.require(name);

    const index = activity.participants.indexOf(email);
    if (index === -1) {
      throw new NotSignedUpError(name, email);
    }

    activity.participants.splice(index, 1);
    logger.info(`Unregistered ${email} from ${name}`);

    return { message: `Unregistered ${email} from ${name}` };
  }

  private require(name: string): ActivityRecord {
    const activity = this.activities.get(name);
    if (!activity) {
      throw new ActivityNotFoundError(name);
    }
    return activity;
  }
}
