import type { Env } from '../utils/env';
import { GraphMailSender } from './graphMailSender';
import { SmtpMailSender } from './smtpMailSender';

export type MailAttachment = {
  name: string;
  contentType: string;
  contentBase64: string;
};

export type OutgoingMail = {
  senderEmail: string;
  to: string[];
  subject: string;
  htmlBody: string;
  attachments: MailAttachment[];
  cc: string[];
};

export type MailOutcome = {
  success: true;
  statusCode: number;
};

/**
 * Anything that can deliver an email. Implementations throw `MailAuthError` when the
 * transport rejects the credentials and `MailDeliveryError` for every other failure.
 */
export interface MailSender {
  send(mail: OutgoingMail): Promise<MailOutcome>;
}

/** Returns null when the selected transport has no credentials. */
export function createMailSender(env: Env): MailSender | null {
  if (env.MAIL_TRANSPORT === 'graph') {
    if (!env.GRAPH_ACCESS_TOKEN) return null;
    return new GraphMailSender({ accessToken: env.GRAPH_ACCESS_TOKEN, baseUrl: env.GRAPH_BASE_URL });
  }

  if (!(env.SMTP_HOST && env.SMTP_USER && env.SMTP_PASS)) return null;
  return SmtpMailSender.fromConfig({
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    secure: env.SMTP_SECURE,
    user: env.SMTP_USER,
    pass: env.SMTP_PASS
  });
}
