import type { FastifyInstance } from 'fastify';
import { SyncError } from '../services/syncErrors.js';
import type { SyncRouteDeps } from './helpers.js';
import { parseBooleanParam, parseStatusFilter, readBody, requireAccount } from './helpers.js';

type AccountParams = { Params: { accountId: string } };
type ChangeParams = { Params: { id: string } };

export const registerSyncStateRoutes = async (app: FastifyInstance, deps: SyncRouteDeps) => {
  const { storage, changeLog, control } = deps;

  app.get<AccountParams>('/api/accounts/:accountId/sync-state', async (req) => {
    const account = await requireAccount(storage, req.params.accountId);
    const state = await storage.syncState.load(account);
    const outstanding = await changeLog.list(account.id, ['queued', 'in_flight', 'failed']);
    return {
      ...state,
      pending: {
        queued: outstanding.filter((change) => change.status === 'queued').length,
        inFlight: outstanding.filter((change) => change.status === 'in_flight').length,
        failed: outstanding.filter((change) => change.status === 'failed').length,
      },
    };
  });

  app.get<AccountParams>('/api/accounts/:accountId/items', async (req) => {
    const account = await requireAccount(storage, req.params.accountId);
    const entries = await storage.replica.load(account.id);
    return entries.sort((left, right) =>
      (right.fields.receivedAt ?? '').localeCompare(left.fields.receivedAt ?? '')
      || left.localId.localeCompare(right.localId));
  });

  app.get<AccountParams & { Querystring: { status?: string } }>(
    '/api/accounts/:accountId/pending-changes',
    async (req) => {
      const account = await requireAccount(storage, req.params.accountId);
      return changeLog.list(account.id, parseStatusFilter(req.query.status));
    },
  );

  app.post<ChangeParams>('/api/pending-changes/:id/retry', async (req, reply) => {
    const existing = await changeLog.get(req.params.id);
    if (!existing) {
      throw new SyncError('NotFound', `pending change ${req.params.id} not found`);
    }
    const change = await changeLog.retry(existing.id);
    if (!change) {
      return reply.code(409).send({ error: `pending change is ${existing.status}, only failed changes can be retried` });
    }
    const syncNow = parseBooleanParam(readBody(req.body).syncNow) ?? true;
    const sync = syncNow ? await control.trigger(change.accountId) : null;
    return { change, sync };
  });

  app.delete<ChangeParams>('/api/pending-changes/:id', async (req, reply) => {
    const existing = await changeLog.get(req.params.id);
    if (!existing) {
      throw new SyncError('NotFound', `pending change ${req.params.id} not found`);
    }
    const discarded = await changeLog.discard(existing.id);
    if (!discarded) {
      return reply.code(409).send({ error: `pending change is ${existing.status}, only failed changes can be discarded` });
    }
    return { discarded: true };
  });
};
