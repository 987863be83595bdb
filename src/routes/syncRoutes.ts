import type { FastifyInstance } from 'fastify';
import type { SyncRouteDeps } from './helpers.js';
import { registerActionRoutes } from './actionRoutes.js';
import { registerSyncControlRoutes } from './syncControlRoutes.js';
import { registerSyncEventsRoutes } from './syncEventsRoutes.js';
import { registerSyncStateRoutes } from './syncStateRoutes.js';

export const registerSyncRoutes = async (app: FastifyInstance, deps: SyncRouteDeps) => {
  await registerSyncStateRoutes(app, deps);
  await registerActionRoutes(app, deps);
  await registerSyncControlRoutes(app, deps);
  await registerSyncEventsRoutes(app, deps);
};
