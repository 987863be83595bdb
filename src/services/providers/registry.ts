import type { SyncConfig } from '../../config/env.js';
import type { AccountCredential, AccountRecord } from '../../shared/types.js';
import { createGmailClient } from '../gmailApi.js';
import { GoogleTokenSource } from '../googleOAuth.js';
import type { GoogleTokenRefresher } from '../googleOAuth.js';
import type { AdapterSource } from '../reconciler.js';
import { sendWithSmtp } from '../smtp.js';
import type { MailSender, OutgoingEnvelope, SmtpSettings } from '../smtp.js';
import { SyncError } from '../syncErrors.js';
import { HistoryProvider } from './historyProvider.js';
import type { HistoryProviderConfig } from './historyProvider.js';
import { createImapFlowSession } from './imapSession.js';
import type { ImapConnectionSettings, ImapSession } from './imapSession.js';
import { SequenceProvider } from './sequenceProvider.js';
import type { SequenceProviderConfig } from './sequenceProvider.js';
import type { ProviderAdapter } from './types.js';

export interface ProviderDeps {
  config: HistoryProviderConfig & SequenceProviderConfig & Pick<SyncConfig, 'defaultMailbox'>;
  saveCredential: (accountId: string, credential: AccountCredential) => Promise<void>;
  fetchImpl?: typeof fetch;
  refreshToken?: GoogleTokenRefresher;
  connectImap?: (settings: ImapConnectionSettings) => ImapSession;
  sendSmtp?: (settings: SmtpSettings, raw: Buffer, envelope: OutgoingEnvelope) => Promise<void>;
}

export const createProviderAdapter = (account: AccountRecord, deps: ProviderDeps): ProviderAdapter => {
  const tokenSource = () => new GoogleTokenSource(account.credential, {
    save: (credential) => deps.saveCredential(account.id, credential),
    refresh: deps.refreshToken,
  });

  switch (account.kind) {
    case 'history': {
      const tokens = tokenSource();
      return new HistoryProvider({
        accountId: account.id,
        fromAddress: account.emailAddress,
        client: createGmailClient({ tokens, fetchImpl: deps.fetchImpl }),
        tokens,
        config: deps.config,
      });
    }
    case 'sequence': {
      const { credential, serverConfig } = account;
      const tokens = credential.authType === 'oauth2' ? tokenSource() : null;
      const connect = deps.connectImap ?? createImapFlowSession;
      const send = deps.sendSmtp ?? sendWithSmtp;
      const smtpHost = serverConfig.smtpHost;
      const sendMail: MailSender | undefined = smtpHost
        ? async (raw, envelope) => {
          const secure = serverConfig.smtpSecure ?? false;
          await send({
            host: smtpHost,
            port: serverConfig.smtpPort ?? (secure ? 465 : 587),
            secure,
            user: credential.username ?? account.emailAddress,
            pass: credential.password,
            accessToken: tokens ? await tokens.getAccessToken() : undefined,
          }, raw, envelope);
        }
        : undefined;
      return new SequenceProvider({
        accountId: account.id,
        fromAddress: account.emailAddress,
        mailbox: serverConfig.mailbox ?? deps.config.defaultMailbox,
        config: deps.config,
        sendMail,
        openSession: async () => {
          if (!serverConfig.host) {
            throw new SyncError('AuthExpired', `account ${account.id} has no IMAP host configured`);
          }
          const secure = serverConfig.tls ?? true;
          return connect({
            host: serverConfig.host,
            port: serverConfig.port ?? (secure ? 993 : 143),
            secure,
            user: credential.username ?? account.emailAddress,
            pass: credential.password,
            accessToken: tokens ? await tokens.getAccessToken() : undefined,
          });
        },
      });
    }
  }
};

const fingerprint = (account: AccountRecord) => JSON.stringify([
  account.kind,
  account.emailAddress,
  account.serverConfig,
  account.credential.username ?? null,
  account.credential.password ?? null,
  account.credential.refreshToken ?? null,
]);

/**
 * Adapters keyed by account id. An adapter is rebuilt when the account's connection
 * settings change; refreshed access tokens alone do not count as a change.
 */
export class ProviderRegistry implements AdapterSource {
  private adapters = new Map<string, { adapter: ProviderAdapter; fingerprint: string }>();

  constructor(private readonly factory: (account: AccountRecord) => ProviderAdapter) {}

  register(account: AccountRecord) {
    const adapter = this.factory(account);
    this.adapters.set(account.id, { adapter, fingerprint: fingerprint(account) });
    return adapter;
  }

  adapterFor(account: AccountRecord) {
    const existing = this.adapters.get(account.id);
    if (existing && existing.fingerprint === fingerprint(account)) {
      return existing.adapter;
    }
    return this.register(account);
  }

  remove(accountId: string) {
    return this.adapters.delete(accountId);
  }

  has(accountId: string) {
    return this.adapters.has(accountId);
  }
}
