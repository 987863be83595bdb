import { OAuth2Client } from 'google-auth-library';
import { env } from '../config/env.js';
import type { AccountCredential } from '../shared/types.js';
import type { CredentialSaver } from './providers/types.js';
import type { GmailAccessTokenSource } from './gmailApi.js';
import { SyncError, toSyncError } from './syncErrors.js';

const INVALID_GRANT_REGEX = /invalid[_\s-]grant|unauthorized|disabled|permission.?denied|rejected/i;
const EXPIRY_WINDOW_MS = 5 * 60 * 1000;

export interface RefreshedToken {
  accessToken: string;
  refreshToken: string | null;
  expiresAt: string | null;
}

export type GoogleTokenRefresher = (credential: AccountCredential) => Promise<RefreshedToken>;

const toTimestamp = (value?: string | null): number | undefined => {
  if (!value) {
    return undefined;
  }
  const parsed = Date.parse(value);
  if (!Number.isFinite(parsed)) {
    return undefined;
  }
  return parsed;
};

export const isGoogleTokenExpiringSoon = (
  credential: AccountCredential,
  now = Date.now(),
  windowMs = EXPIRY_WINDOW_MS,
): boolean => {
  if (!credential.tokenExpiresAt) {
    return false;
  }
  const expiry = toTimestamp(credential.tokenExpiresAt);
  if (!expiry) {
    return true;
  }
  return expiry - now <= windowMs;
};

export const refreshWithGoogle: GoogleTokenRefresher = async (credential) => {
  const client = new OAuth2Client({
    clientId: credential.oauthClientId ?? env.googleClientId,
    clientSecret: credential.oauthClientSecret ?? env.googleClientSecret,
  });
  client.setCredentials({
    refresh_token: credential.refreshToken,
    access_token: credential.accessToken ?? undefined,
    expiry_date: toTimestamp(credential.tokenExpiresAt),
  });

  const { credentials } = await client.refreshAccessToken();
  if (!credentials.access_token) {
    throw new Error('Google OAuth returned no access token');
  }
  return {
    accessToken: credentials.access_token,
    refreshToken: credentials.refresh_token ?? null,
    expiresAt: credentials.expiry_date ? new Date(credentials.expiry_date).toISOString() : null,
  };
};

export interface GoogleTokenSourceOptions {
  save: CredentialSaver;
  refresh?: GoogleTokenRefresher;
  clock?: () => number;
}

/**
 * Hands out access tokens for one account, refreshing when the stored token is close to
 * expiry. Every refresh, including a revoked grant, is written back through `save`.
 */
export class GoogleTokenSource implements GmailAccessTokenSource {
  private credential: AccountCredential;

  constructor(credential: AccountCredential, private readonly options: GoogleTokenSourceOptions) {
    this.credential = { ...credential };
  }

  current(): AccountCredential {
    return { ...this.credential };
  }

  async getAccessToken(forceRefresh = false) {
    const now = (this.options.clock ?? Date.now)();
    const { accessToken } = this.credential;
    if (!forceRefresh && accessToken && !isGoogleTokenExpiringSoon(this.credential, now)) {
      return accessToken;
    }

    if (!this.credential.refreshToken) {
      throw new SyncError('AuthExpired', 'OAuth refresh token is missing; account must be reconnected');
    }

    let refreshed: RefreshedToken;
    try {
      refreshed = await (this.options.refresh ?? refreshWithGoogle)(this.credential);
    } catch (error) {
      if (INVALID_GRANT_REGEX.test(String(error))) {
        this.credential = { ...this.credential, accessToken: null, tokenExpiresAt: null };
        await this.options.save(this.current());
        throw new SyncError('AuthExpired', 'OAuth refresh token is invalid; account must be reconnected', {
          cause: error,
        });
      }
      throw toSyncError(error);
    }

    this.credential = {
      ...this.credential,
      authType: 'oauth2',
      accessToken: refreshed.accessToken,
      refreshToken: refreshed.refreshToken ?? this.credential.refreshToken,
      tokenExpiresAt: refreshed.expiresAt ?? this.credential.tokenExpiresAt ?? null,
    };
    await this.options.save(this.current());
    return refreshed.accessToken;
  }
}
