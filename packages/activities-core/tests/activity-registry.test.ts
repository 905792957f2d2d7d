/**
 * Unit tests for ActivityRegistry
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ActivityRegistry } from '../src/activity-registry.js';
import {
  ActivityFullError,
  ActivityNotFoundError,
  AlreadySignedUpError,
  NotSignedUpError,
} from '../src/errors.js';
import type { ActivityCatalog } from '../src/types.js';

function buildSeed(): ActivityCatalog {
  return {
    'Chess Club': {
      description: 'Board strategy practice',
      schedule: 'Fridays, 3:30 PM - 5:00 PM',
      maxParticipants: 3,
      participants: ['alice@example.edu', 'bob@example.edu'],
    },
    'Drama Club': {
      description: 'Stage productions',
      schedule: 'Thursdays, 3:30 PM - 5:30 PM',
      maxParticipants: 10,
      participants: [],
    },
  };
}

describe('ActivityRegistry', () => {
  let registry: ActivityRegistry;

  beforeEach(() => {
    registry = new ActivityRegistry(buildSeed());
  });

  describe('constructor', () => {
    it('should default to the advisory capacity policy', () => {
      expect(registry.capacityPolicy).toBe('advisory');
    });

    it('should copy the seed so later seed edits do not leak in', () => {
      const seed = buildSeed();
      const isolated = new ActivityRegistry(seed);

      seed['Chess Club'].participants.push('mallory@example.edu');

      expect(isolated.getActivity('Chess Club').participants).toEqual([
        'alice@example.edu',
        'bob@example.edu',
      ]);
    });

    it('should start empty without a seed', () => {
      const empty = new ActivityRegistry();
      expect(empty.size).toBe(0);
      expect(empty.listActivities()).toEqual({});
    });
  });

  describe('listActivities()', () => {
    it('should return every activity with its full record', () => {
      const activities = registry.listActivities();

      expect(Object.keys(activities)).toEqual(['Chess Club', 'Drama Club']);
      expect(activities['Chess Club']).toEqual({
        description: 'Board strategy practice',
        schedule: 'Fridays, 3:30 PM - 5:00 PM',
        maxParticipants: 3,
        participants: ['alice@example.edu', 'bob@example.edu'],
      });
    });

    it('should not expose internal state', () => {
      const activities = registry.listActivities();
      activities['Chess Club'].participants.length = 0;
      delete activities['Drama Club'];

      expect(registry.getActivity('Chess Club').participants).toHaveLength(2);
      expect(Object.keys(registry.listActivities())).toContain('Drama Club');
    });
  });

  describe('getActivity()', () => {
    it('should throw ActivityNotFoundError for unknown names', () => {
      expect(() => registry.getActivity('Underwater Basket Weaving')).toThrow(
        ActivityNotFoundError
      );
    });

    it('should treat names as case-sensitive keys', () => {
      expect(() => registry.getActivity('chess club')).toThrow(ActivityNotFoundError);
    });
  });

  describe('signup()', () => {
    it('should append the email and return a confirmation message', () => {
      const result = registry.signup('Drama Club', 'carol@example.edu');

      expect(result).toEqual({ message: 'Signed up carol@example.edu for Drama Club' });
      expect(registry.getActivity('Drama Club').participants).toEqual(['carol@example.edu']);
    });

    it('should preserve signup order', () => {
      registry.signup('Drama Club', 'first@example.edu');
      registry.signup('Drama Club', 'second@example.edu');
      registry.signup('Drama Club', 'third@example.edu');

      expect(registry.getActivity('Drama Club').participants).toEqual([
        'first@example.edu',
        'second@example.edu',
        'third@example.edu',
      ]);
    });

    it('should reject unknown activities', () => {
      expect(() => registry.signup('Nonexistent Activity', 'carol@example.edu')).toThrow(
        'Activity not found'
      );
    });

    it('should reject duplicates and leave the list unchanged', () => {
      expect(() => registry.signup('Chess Club', 'alice@example.edu')).toThrow(
        AlreadySignedUpError
      );
      expect(registry.getActivity('Chess Club').participants).toEqual([
        'alice@example.edu',
        'bob@example.edu',
      ]);
    });

    it('should allow the same email in different activities', () => {
      registry.signup('Drama Club', 'alice@example.edu');

      expect(registry.getActivity('Drama Club').participants).toContain('alice@example.edu');
      expect(registry.getActivity('Chess Club').participants).toContain('alice@example.edu');
    });

    it('should not check capacity under the advisory policy', () => {
      registry.signup('Chess Club', 'carol@example.edu');
      registry.signup('Chess Club', 'dave@example.edu');

      const chess = registry.getActivity('Chess Club');
      expect(chess.participants).toHaveLength(4);
      expect(chess.maxParticipants).toBe(3);
    });

    it('should reject signups past capacity under the enforce policy', () => {
      const strict = new ActivityRegistry(buildSeed(), { capacityPolicy: 'enforce' });
      strict.signup('Chess Club', 'carol@example.edu');

      expect(() => strict.signup('Chess Club', 'dave@example.edu')).toThrow(ActivityFullError);
      expect(strict.getActivity('Chess Club').participants).toHaveLength(3);
    });

    it('should report a duplicate before a full activity', () => {
      const strict = new ActivityRegistry(buildSeed(), { capacityPolicy: 'enforce' });
      strict.signup('Chess Club', 'carol@example.edu');

      expect(() => strict.signup('Chess Club', 'carol@example.edu')).toThrow(
        AlreadySignedUpError
      );
    });
  });

  describe('unregister()', () => {
    it('should remove the email and return a confirmation message', () => {
      const result = registry.unregister('Chess Club', 'alice@example.edu');

      expect(result).toEqual({ message: 'Unregistered alice@example.edu from Chess Club' });
      expect(registry.getActivity('Chess Club').participants).toEqual(['bob@example.edu']);
    });

    it('should reject emails that are not signed up', () => {
      expect(() => registry.unregister('Drama Club', 'alice@example.edu')).toThrow(
        NotSignedUpError
      );
    });

    it('should reject unknown activities', () => {
      expect(() => registry.unregister('Nonexistent Activity', 'alice@example.edu')).toThrow(
        ActivityNotFoundError
      );
    });

    it('should allow signing up again after unregistering', () => {
      registry.unregister('Chess Club', 'bob@example.edu');
      registry.signup('Chess Club', 'bob@example.edu');

      expect(registry.getActivity('Chess Club').participants).toEqual([
        'alice@example.edu',
        'bob@example.edu',
      ]);
    });

    it('should fail a second unregister of the same email', () => {
      registry.unregister('Chess Club', 'bob@example.edu');

      expect(() => registry.unregister('Chess Club', 'bob@example.edu')).toThrow(
        'Student is not signed up for this activity'
      );
    });
  });
});
