/**
 * Type definitions for the Activities API
 */

import type { ActivityCatalog, ActivityRecord } from '@mergington/activities-core';

// ============================================================================
// Activity API Types
// ============================================================================

/**
 * API representation of an activity
 */
export interface ApiActivity {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

/**
 * Response for GET /activities, keyed by activity name
 */
export type ListActivitiesResponse = Record<string, ApiActivity>;

/**
 * Response for signup and unregister
 */
export interface MessageResponse {
  message: string;
}

/**
 * Response for GET /health
 */
export interface HealthResponse {
  status: 'ok';
  timestamp: number;
  activities: number;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * API error codes
 */
export type ApiErrorCode =
  | 'BAD_REQUEST'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'ALREADY_SIGNED_UP'
  | 'NOT_SIGNED_UP'
  | 'ACTIVITY_FULL'
  | 'INTERNAL_ERROR';

/**
 * API error response
 */
export interface ApiErrorResponse {
  /** Human-readable message */
  detail: string;
  code?: ApiErrorCode;
}

/**
 * Custom API error class
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: ApiErrorCode = 'INTERNAL_ERROR'
  ) {
    super(message);
    this.name = 'ApiError';
  }

  toResponse(): ApiErrorResponse {
    return {
      detail: this.message,
      code: this.code,
    };
  }
}

// ============================================================================
// Conversion Utilities
// ============================================================================

/**
 * Convert internal ActivityRecord to API format
 */
export function toApiActivity(record: ActivityRecord): ApiActivity {
  return {
    description: record.description,
    schedule: record.schedule,
    max_participants: record.maxParticipants,
    participants: record.participants,
  };
}

export function toListActivitiesResponse(catalog: ActivityCatalog): ListActivitiesResponse {
  return Object.fromEntries(
    Object.entries(catalog).map(([name, record]): [string, ApiActivity] => [name, toApiActivity(record)])
  );
}
