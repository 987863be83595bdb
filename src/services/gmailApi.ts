import { nextBackoffMs, sleep as defaultSleep } from './retry.js';
import { isRecoverableNetworkError, isSyncError } from './syncErrors.js';

const GMAIL_API_BASE = 'https://gmail.googleapis.com/gmail/v1/users/me';

export interface GmailAccessTokenSource {
  getAccessToken(forceRefresh?: boolean): Promise<string>;
}

export class GmailApiError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    readonly retryAfterMs: number | null,
  ) {
    super(`Gmail API ${status}: ${body.slice(0, 500)}`);
    this.name = 'GmailApiError';
  }
}

const isRetryableStatus = (status: number) => status === 429 || status === 408 || (status >= 500 && status <= 599);

const isTokenInvalidStatus = (status: number) => status === 401;

export const parseRetryAfter = (value: string | null, now = Date.now()): number | null => {
  if (!value) {
    return null;
  }
  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }
  const at = Date.parse(value);
  return Number.isFinite(at) ? Math.max(0, at - now) : null;
};

export interface GmailClientOptions {
  tokens: GmailAccessTokenSource;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  maxAttempts?: number;
  baseUrl?: string;
}

export interface GmailClient {
  request(path: string, init?: RequestInit): Promise<unknown>;
  listAllPages<T>(
    pathBuilder: (pageToken?: string) => string,
    pageExtractor: (payload: unknown) => T[],
    limit?: number,
  ): Promise<T[]>;
}

export const asRecord = (value: unknown): Record<string, unknown> => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
};

export const readString = (value: unknown, key: string): string | null => {
  const prop = asRecord(value)[key];
  if (typeof prop === 'string') {
    return prop;
  }
  return typeof prop === 'number' ? String(prop) : null;
};

export const readArray = (value: unknown, key: string): unknown[] => {
  const prop = asRecord(value)[key];
  return Array.isArray(prop) ? prop : [];
};

export const readStringArray = (value: unknown, key: string): string[] =>
  readArray(value, key).filter((entry): entry is string => typeof entry === 'string');

export const createGmailClient = (options: GmailClientOptions): GmailClient => {
  const fetchImpl = options.fetchImpl ?? fetch;
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = options.maxAttempts ?? 4;
  const baseUrl = options.baseUrl ?? GMAIL_API_BASE;

  const request = async (path: string, init: RequestInit = {}): Promise<unknown> => {
    let forceRefresh = false;
    let lastError: unknown;

    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      try {
        const accessToken = await options.tokens.getAccessToken(forceRefresh);
        forceRefresh = false;
        const response = await fetchImpl(`${baseUrl}${path}`, {
          ...init,
          headers: {
            Authorization: `Bearer ${accessToken}`,
            Accept: 'application/json',
            ...(init.body ? { 'Content-Type': 'application/json' } : {}),
            ...(init.headers ?? {}),
          },
        });

        if (!response.ok) {
          const text = await response.text().catch(() => '');
          const error = new GmailApiError(response.status, text, parseRetryAfter(response.headers.get('retry-after')));
          if (isTokenInvalidStatus(response.status) && attempt < maxAttempts - 1) {
            forceRefresh = true;
            continue;
          }
          if (isRetryableStatus(response.status) && attempt < maxAttempts - 1) {
            await sleep(nextBackoffMs(attempt));
            continue;
          }
          throw error;
        }

        if (response.status === 204) {
          return undefined;
        }
        const text = await response.text();
        return text ? JSON.parse(text) : undefined;
      } catch (error) {
        if (error instanceof GmailApiError || isSyncError(error)) {
          throw error;
        }
        lastError = error;
        if (attempt >= maxAttempts - 1 || !isRecoverableNetworkError(error)) {
          throw error;
        }
        await sleep(nextBackoffMs(attempt));
      }
    }

    throw lastError;
  };

  const listAllPages = async <T>(
    pathBuilder: (pageToken?: string) => string,
    pageExtractor: (payload: unknown) => T[],
    limit = Number.POSITIVE_INFINITY,
  ) => {
    const items: T[] = [];
    let pageToken: string | undefined;
    do {
      const payload = await request(pathBuilder(pageToken));
      items.push(...pageExtractor(payload));
      pageToken = readString(payload, 'nextPageToken') || undefined;
    } while (pageToken && items.length < limit);
    return items.slice(0, limit);
  };

  return { request, listAllPages };
};
