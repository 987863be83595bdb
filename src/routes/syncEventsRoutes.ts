import type { FastifyInstance } from 'fastify';
import type { SyncRouteDeps } from './helpers.js';
import { MAX_EVENTS_LIMIT, MAX_SYNC_EVENT_ID, parseNonNegativeIntWithCap, parsePositiveIntWithCap } from './helpers.js';

type EventsQuery = { Querystring: { since?: string; limit?: string; accountId?: string } };

export const registerSyncEventsRoutes = async (app: FastifyInstance, deps: SyncRouteDeps) => {
  app.get<EventsQuery>('/api/events', async (req) => {
    const since = parseNonNegativeIntWithCap(req.query.since, 0, MAX_SYNC_EVENT_ID);
    const limit = parsePositiveIntWithCap(req.query.limit, 100, MAX_EVENTS_LIMIT);
    const accountId = req.query.accountId?.trim() || undefined;
    return deps.storage.events.list(since, limit, accountId);
  });
};
