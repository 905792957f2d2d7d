/**
 * Type definitions for the activity registry
 */

/**
 * A named extracurricular offering
 */
export interface ActivityRecord {
  description: string;
  /** Free-text meeting time, e.g. "Fridays, 3:30 PM - 5:00 PM" */
  schedule: string;
  /** Positive integer capacity */
  maxParticipants: number;
  /** Participant emails in signup order */
  participants: string[];
}

/**
 * Mapping from activity name to its record
 */
export type ActivityCatalog = Record<string, ActivityRecord>;

/**
 * Whether signup rejects once `maxParticipants` is reached.
 *
 * - `advisory`: capacity is informational only, signups are never rejected for it
 * - `enforce`: signup fails with ActivityFullError when the list is full
 */
export type CapacityPolicy = 'advisory' | 'enforce';

export const CAPACITY_POLICIES: readonly CapacityPolicy[] = ['advisory', 'enforce'];

export interface SignupResult {
  message: string;
}

export interface UnregisterResult {
  message: string;
}
