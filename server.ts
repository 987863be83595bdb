import Fastify from 'fastify';
import type { FastifyRequest } from 'fastify';
import { env } from './src/config/env.js';
import { pool } from './src/db/pool.js';
import { registerRoutes } from './src/routes/index.js';
import { ChangeLog } from './src/services/changeLog.js';
import { LocalActions } from './src/services/localActions.js';
import { QueueSyncControl, releaseQueue } from './src/services/queue.js';
import { PgSyncStorage } from './src/storage/pgSyncStorage.js';

const server = Fastify({
  logger: env.nodeEnv === 'development',
});

const getRequestPathname = (url: string) => {
  try {
    return new URL(url, 'http://localhost').pathname;
  } catch {
    return String(url || '/').split('?')[0] || '/';
  }
};

if (env.nodeEnv === 'production' && !env.apiAdminToken) {
  throw new Error('API_ADMIN_TOKEN is required in production');
}

const isPublicRoute = (path: string) => path.replace(/\/+$/, '') === '/api/health';

const extractToken = (request: FastifyRequest) => {
  const authHeader = request.headers.authorization;
  if (typeof authHeader === 'string' && authHeader.toLowerCase().startsWith('bearer ')) {
    return authHeader.slice(7).trim();
  }

  const headerValue = request.headers['x-api-key'];
  return Array.isArray(headerValue) ? headerValue[0] : headerValue;
};

server.addHook('onRequest', async (request, reply) => {
  if (isPublicRoute(getRequestPathname(request.url)) || !env.apiAdminToken) {
    return;
  }
  if (extractToken(request) !== env.apiAdminToken) {
    return reply.code(401).send({ error: 'unauthorized' });
  }
});

server.addHook('onSend', async (_request, reply, payload) => {
  reply.header('Referrer-Policy', 'no-referrer');
  reply.header('X-Content-Type-Options', 'nosniff');
  reply.header('X-Frame-Options', 'DENY');
  reply.header('Cross-Origin-Resource-Policy', 'same-origin');
  if (env.nodeEnv === 'production') {
    reply.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
  }
  return payload;
});

const storage = new PgSyncStorage();
await registerRoutes(server, {
  storage,
  changeLog: new ChangeLog(storage.changeLog),
  actions: new LocalActions(storage),
  control: new QueueSyncControl(storage.syncState),
});

const stop = async () => {
  await server.close();
  await releaseQueue();
  await pool.end();
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    stop().catch((error: unknown) => {
      console.error('API shutdown failed', error);
      process.exitCode = 1;
    });
  });
}

await server.listen({ port: env.port, host: '0.0.0.0' });
console.log(`Mail sync API listening on ${env.port}`);
