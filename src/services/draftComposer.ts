import MailComposer from 'nodemailer/lib/mail-composer/index.js';
import PostalMime from 'postal-mime';
import type { DraftContent } from '../shared/types.js';

export interface ComposeDraftOptions {
  from: string;
  messageId: string;
  date?: Date;
}

/** Message-ID used for the remote copy of a draft push; searching for it makes a retried push idempotent. */
export const draftMessageId = (changeId: string, domain: string) => `<${changeId}@${domain}>`;

export const composeDraft = async (draft: DraftContent, options: ComposeDraftOptions): Promise<Buffer> => {
  const mail = new MailComposer({
    from: options.from,
    to: draft.to.join(', '),
    cc: draft.cc.length > 0 ? draft.cc.join(', ') : undefined,
    subject: draft.subject,
    text: draft.bodyText,
    inReplyTo: draft.inReplyTo ?? undefined,
    references: draft.inReplyTo ?? undefined,
    messageId: options.messageId,
    date: options.date,
  });

  return new Promise<Buffer>((resolve, reject) => {
    mail.compile().build((err, msg) => {
      if (err || !msg) {
        reject(err ?? new Error('draft composer produced no output'));
        return;
      }
      resolve(Buffer.from(msg));
    });
  });
};

type ParsedAddress = { address?: string; group?: Array<{ address?: string }> };

const flattenAddresses = (entries: ParsedAddress[] | undefined) => {
  const addresses: string[] = [];
  for (const entry of entries ?? []) {
    if (entry.group) {
      addresses.push(...entry.group.map((member) => member.address ?? '').filter(Boolean));
    } else if (entry.address) {
      addresses.push(entry.address);
    }
  }
  return addresses;
};

export const parseDraftSource = async (source: Buffer | string): Promise<DraftContent> => {
  const parsed = await new PostalMime().parse(source);
  return {
    to: flattenAddresses(parsed.to),
    cc: flattenAddresses(parsed.cc),
    subject: parsed.subject ?? '',
    bodyText: parsed.text?.trimEnd() ?? '',
    inReplyTo: parsed.inReplyTo ?? null,
  };
};
