import type { FastifyInstance } from 'fastify';
import type { SyncRouteDeps } from './helpers.js';
import { statusForError } from './helpers.js';
import { registerSyncRoutes } from './syncRoutes.js';

export const registerRoutes = async (app: FastifyInstance, deps: SyncRouteDeps) => {
  app.setErrorHandler((error, request, reply) => {
    const mapped = statusForError(error);
    const status = mapped === 500 && typeof error.statusCode === 'number' ? error.statusCode : mapped;
    if (status >= 500) {
      request.log.error(error);
    }
    const message = status < 500 ? error.message : 'internal server error';
    return reply.code(status).send({ error: message });
  });

  app.get('/api/health', async () => ({ ok: true }));

  await registerSyncRoutes(app, deps);
};
