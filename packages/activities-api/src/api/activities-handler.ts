/**
 * Activities API router for /activities endpoints
 */

import { Router } from 'express';
import type { ActivityRegistry } from '@mergington/activities-core';
import { requireQueryParam } from './error-handler.js';
import {
  toApiActivity,
  toListActivitiesResponse,
  type ApiActivity,
  type ListActivitiesResponse,
  type MessageResponse,
} from './types.js';

/**
 * Create activities API router
 *
 * Route params arrive URL-decoded, so `/activities/Chess%20Club/signup`
 * addresses "Chess Club".
 */
export function createActivitiesRouter(registry: ActivityRegistry): Router {
  const router = Router();

  // GET /activities - Full mapping of activity name to record
  router.get('/', (_req, res) => {
    const response: ListActivitiesResponse = toListActivitiesResponse(registry.listActivities());
    res.json(response);
  });

  // GET /activities/:name - Single activity
  router.get('/:name', (req, res) => {
    const response: ApiActivity = toApiActivity(registry.getActivity(req.params.name));
    res.json(response);
  });

  // POST /activities/:name/signup?email=...
  router.post('/:name/signup', (req, res) => {
    const email = requireQueryParam(req, 'email');
    const response: MessageResponse = registry.signup(req.params.name, email);
    res.json(response);
  });

  // POST /activities/:name/unregister?email=...
  router.post('/:name/unregister', (req, res) => {
    const email = requireQueryParam(req, 'email');
    const response: MessageResponse = registry.unregister(req.params.name, email);
    res.json(response);
  });

  return router;
}
