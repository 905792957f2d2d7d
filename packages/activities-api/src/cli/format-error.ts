/**
 * Exit message for a failed CLI command
 */

import { isRegistryError } from '@mergington/activities-core';

/**
 * Registry and config errors carry a user-facing message; anything else is
 * returned as-is so console.error prints its stack
 */
export function formatCliError(error: unknown): unknown {
  return isRegistryError(error) ? `Error: ${error.message}` : error;
}
