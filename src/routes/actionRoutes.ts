import type { FastifyInstance } from 'fastify';
import type { LocalActionResult, LocalActions } from '../services/localActions.js';
import type { SyncRouteDeps } from './helpers.js';
import {
  MAX_LABEL_CHARS,
  MAX_LABEL_MUTATION_ITEMS,
  RequestValidationError,
  parseBooleanParam,
  parseDraftInput,
  parseTrimmedStringArrayWithCap,
  readBody,
  required,
  requireAccount,
} from './helpers.js';

export const LOCAL_ACTION_NAMES = [
  'markRead',
  'markUnread',
  'star',
  'unstar',
  'addLabels',
  'removeLabels',
  'archive',
  'trash',
  'saveDraft',
  'send',
] as const;

export type LocalActionName = (typeof LOCAL_ACTION_NAMES)[number];

const parseActionName = (value: unknown): LocalActionName => {
  const action = LOCAL_ACTION_NAMES.find((name) => name === value);
  if (!action) {
    throw new RequestValidationError(`action must be one of ${LOCAL_ACTION_NAMES.join(', ')}`);
  }
  return action;
};

const parseLabels = (value: unknown) => {
  const labels = parseTrimmedStringArrayWithCap(value, 'labels', MAX_LABEL_MUTATION_ITEMS, MAX_LABEL_CHARS);
  if (labels.length === 0) {
    throw new RequestValidationError('labels must not be empty');
  }
  return labels;
};

const runLocalAction = (
  actions: LocalActions,
  accountId: string,
  action: LocalActionName,
  body: Record<string, unknown>,
): Promise<LocalActionResult> => {
  if (action === 'saveDraft') {
    const localId = body.localId === undefined || body.localId === null ? null : required(body.localId, 'localId');
    return actions.saveDraft(accountId, localId, parseDraftInput(body.draft));
  }

  const localId = required(body.localId, 'localId');
  switch (action) {
    case 'markRead':
      return actions.setRead(accountId, localId, true);
    case 'markUnread':
      return actions.setRead(accountId, localId, false);
    case 'star':
      return actions.setStarred(accountId, localId, true);
    case 'unstar':
      return actions.setStarred(accountId, localId, false);
    case 'addLabels':
      return actions.modifyLabels(accountId, localId, parseLabels(body.labels), []);
    case 'removeLabels':
      return actions.modifyLabels(accountId, localId, [], parseLabels(body.labels));
    case 'archive':
      return actions.archive(accountId, localId);
    case 'trash':
      return actions.trash(accountId, localId);
    case 'send':
      return actions.send(accountId, localId);
  }
};

export const registerActionRoutes = async (app: FastifyInstance, deps: SyncRouteDeps) => {
  const { storage, actions, control } = deps;

  app.post<{ Params: { accountId: string } }>('/api/accounts/:accountId/actions', async (req) => {
    const account = await requireAccount(storage, req.params.accountId);
    const body = readBody(req.body);
    const action = parseActionName(body.action);
    const result = await runLocalAction(actions, account.id, action, body);

    // Nothing to push when the action was already reflected locally.
    const syncNow = parseBooleanParam(body.syncNow) ?? false;
    const sync = syncNow && result.change ? await control.trigger(account.id) : null;
    return { ...result, sync };
  });
};
