import nodemailer from 'nodemailer';
import type SMTPTransport from 'nodemailer/lib/smtp-transport/index.js';
import { SyncError, isSyncError, toSyncError } from './syncErrors.js';

export interface OutgoingEnvelope {
  from: string;
  to: string[];
}

export type MailSender = (raw: Buffer, envelope: OutgoingEnvelope) => Promise<void>;

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass?: string;
  accessToken?: string;
}

const TRANSIENT_SMTP_CODES = new Set([421, 422, 450, 451, 452, 454]);
const AUTH_SMTP_CODES = new Set([530, 534, 535]);

const readProp = (value: unknown, key: string): unknown =>
  typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;

export const smtpTransportOptions = (settings: SmtpSettings): SMTPTransport.Options => ({
  host: settings.host,
  port: settings.port,
  secure: settings.secure,
  requireTLS: !settings.secure,
  auth: settings.accessToken
    ? { type: 'OAuth2', user: settings.user, accessToken: settings.accessToken }
    : { user: settings.user, pass: settings.pass },
});

export const smtpErrorToSyncError = (error: unknown): SyncError => {
  if (isSyncError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const responseCode = readProp(error, 'responseCode');
  const code = typeof responseCode === 'number' ? responseCode : null;
  if (readProp(error, 'code') === 'EAUTH' || (code !== null && AUTH_SMTP_CODES.has(code))) {
    return new SyncError('AuthExpired', message, { cause: error });
  }
  if (code !== null && TRANSIENT_SMTP_CODES.has(code)) {
    return new SyncError('NetworkError', message, { cause: error });
  }
  if (code !== null && code >= 500) {
    return new SyncError('PushRejected', message, { cause: error });
  }
  return toSyncError(error);
};

/** Hands an already composed message to the submission server; the envelope decides who receives it. */
export const sendWithSmtp = async (settings: SmtpSettings, raw: Buffer, envelope: OutgoingEnvelope) => {
  const transport = nodemailer.createTransport(smtpTransportOptions(settings));
  try {
    await transport.sendMail({ envelope, raw });
  } catch (error) {
    throw smtpErrorToSyncError(error);
  } finally {
    transport.close();
  }
};
