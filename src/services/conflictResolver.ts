import type {
  FlagField,
  PendingChange,
  PendingChangePayload,
  PolicyField,
  RemoteItem,
  RemoteState,
} from '../shared/types.js';

export type Verdict = 'KeepLocal' | 'KeepRemote' | 'Reapply';

export interface ConflictResolution {
  verdict: Verdict;
  reason: string;
  ambiguous: boolean;
}

/**
 * Which fields count as externally visible mailbox state. A remote edit to one of these
 * since the pending change was recorded wins over the local intent.
 */
export interface ConflictPolicy {
  remoteAuthoritativeFields: PolicyField[];
  preserveLocalDrafts: boolean;
}

export const DEFAULT_CONFLICT_POLICY: ConflictPolicy = {
  remoteAuthoritativeFields: ['isRead', 'isStarred', 'labels'],
  preserveLocalDrafts: true,
};

const FLAG_FIELDS: FlagField[] = ['isRead', 'isStarred'];

const verdict = (value: Verdict, reason: string, ambiguous = false): ConflictResolution => ({
  verdict: value,
  reason,
  ambiguous,
});

const resolveFlags = (
  payload: Extract<PendingChangePayload, { op: 'setFlags' }>,
  remote: RemoteItem,
  policy: ConflictPolicy,
): ConflictResolution => {
  const touched = FLAG_FIELDS.filter((field) => payload[field] !== undefined);
  if (touched.length === 0) {
    return verdict('KeepRemote', 'flag change touches no field', true);
  }

  let satisfied = true;
  for (const field of touched) {
    const base = payload.base[field];
    if (base === undefined) {
      return verdict('KeepRemote', `no base value recorded for ${field}`, true);
    }
    if (remote[field] !== base && policy.remoteAuthoritativeFields.includes(field)) {
      return verdict('KeepRemote', `${field} changed remotely`);
    }
    if (remote[field] !== payload[field]) {
      satisfied = false;
    }
  }

  if (satisfied) {
    return verdict('KeepRemote', 'remote already reflects the change');
  }
  return verdict('KeepLocal', 'flags unchanged remotely');
};

const resolveLabels = (
  payload: Extract<PendingChangePayload, { op: 'modifyLabels' }>,
  remote: RemoteItem,
  policy: ConflictPolicy,
): ConflictResolution => {
  const remoteLabels = new Set(remote.labels);
  const baseLabels = new Set(payload.base.labels);
  const touched = [...payload.add, ...payload.remove];
  if (touched.length === 0) {
    return verdict('KeepRemote', 'label change touches no label', true);
  }

  if (policy.remoteAuthoritativeFields.includes('labels')) {
    const contested = touched.find((label) => remoteLabels.has(label) !== baseLabels.has(label));
    if (contested) {
      return verdict('KeepRemote', `label ${contested} changed remotely`);
    }
  }

  const satisfied = payload.add.every((label) => remoteLabels.has(label))
    && payload.remove.every((label) => !remoteLabels.has(label));
  if (satisfied) {
    return verdict('KeepRemote', 'remote already reflects the change');
  }
  return verdict('Reapply', 'other labels changed remotely');
};

/**
 * Decides a push conflict. Pure: the verdict depends only on the arguments.
 */
export const resolveConflict = (
  pending: PendingChange,
  remote: RemoteState,
  policy: ConflictPolicy = DEFAULT_CONFLICT_POLICY,
): ConflictResolution => {
  if (remote.deleted) {
    return verdict('KeepRemote', 'target deleted remotely');
  }

  const { payload } = pending;
  switch (payload.op) {
    case 'saveDraft':
      return policy.preserveLocalDrafts
        ? verdict('KeepLocal', 'local draft content is preserved')
        : verdict('KeepRemote', 'remote draft content wins');
    case 'send':
      return verdict('KeepLocal', 'local send stands');
    case 'delete':
      return verdict('KeepLocal', 'local delete stands');
    case 'setFlags':
      return resolveFlags(payload, remote.item, policy);
    case 'modifyLabels':
      return resolveLabels(payload, remote.item, policy);
  }
};

const rebasePayload = (payload: PendingChangePayload, remote: RemoteItem): PendingChangePayload => {
  switch (payload.op) {
    case 'setFlags':
      return {
        ...payload,
        base: {
          isRead: payload.isRead === undefined ? undefined : remote.isRead,
          isStarred: payload.isStarred === undefined ? undefined : remote.isStarred,
        },
        baseVersion: remote.versionToken,
      };
    case 'modifyLabels':
      return { ...payload, base: { labels: [...remote.labels] }, baseVersion: remote.versionToken };
    case 'saveDraft':
    case 'send':
    case 'delete':
      return { ...payload, baseVersion: remote.versionToken };
  }
};

/** The same intent re-based on the current remote state, for a rewrite or an immediate retry. */
export const rebasePendingChange = (pending: PendingChange, remote: RemoteItem): PendingChange => ({
  ...pending,
  target: remote.remoteId,
  payload: rebasePayload(pending.payload, remote),
});
