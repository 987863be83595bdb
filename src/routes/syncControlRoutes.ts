import type { FastifyInstance } from 'fastify';
import type { SyncRouteDeps } from './helpers.js';
import { parseCredentialInput, readBody, requireAccount } from './helpers.js';

type AccountParams = { Params: { accountId: string } };

export const registerSyncControlRoutes = async (app: FastifyInstance, deps: SyncRouteDeps) => {
  const { storage, control } = deps;

  app.post<AccountParams>('/api/accounts/:accountId/sync', async (req) => {
    const account = await requireAccount(storage, req.params.accountId);
    if (!account.syncEnabled) {
      return { accountId: account.id, outcome: 'ignored' as const };
    }
    return { accountId: account.id, outcome: await control.trigger(account.id) };
  });

  // Clears an auth pause; a replacement credential is saved before the scheduler resumes.
  app.post<AccountParams>('/api/accounts/:accountId/resume', async (req) => {
    const account = await requireAccount(storage, req.params.accountId);
    const body = readBody(req.body);
    const credentialUpdated = body.credential !== undefined;
    if (credentialUpdated) {
      await storage.accounts.saveCredential(account.id, parseCredentialInput(body.credential));
    }
    return { accountId: account.id, credentialUpdated, outcome: await control.resume(account.id) };
  });

  app.post<AccountParams>('/api/accounts/:accountId/full-resync', async (req) => {
    const account = await requireAccount(storage, req.params.accountId);
    return { accountId: account.id, outcome: await control.requestFullResync(account.id) };
  });
};
