import nodemailer, { type SendMailOptions } from 'nodemailer';
import type { MailOutcome, MailSender, OutgoingMail } from './mailSender';
import { MailAuthError, MailDeliveryError } from '../utils/errors';

export type MailTransport = {
  sendMail(options: SendMailOptions): Promise<{ response?: string; messageId?: string }>;
};

export type SmtpConfig = {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
};

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function responseCode(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'responseCode' in err && typeof err.responseCode === 'number') {
    return err.responseCode;
  }
  return undefined;
}

export class SmtpMailSender implements MailSender {
  constructor(private readonly transport: MailTransport) {}

  static fromConfig(config: SmtpConfig) {
    const transporter = nodemailer.createTransport({
      host: config.host,
      port: config.port,
      secure: config.secure,
      auth: {
        user: config.user,
        pass: config.pass
      }
    });
    return new SmtpMailSender(transporter);
  }

  async send(mail: OutgoingMail): Promise<MailOutcome> {
    try {
      const info = await this.transport.sendMail({
        from: mail.senderEmail,
        to: mail.to,
        cc: mail.cc.length > 0 ? mail.cc : undefined,
        subject: mail.subject,
        html: mail.htmlBody,
        attachments: mail.attachments.map((a) => ({
          filename: a.name,
          content: a.contentBase64,
          encoding: 'base64',
          contentType: a.contentType
        }))
      });
      const match = /^(\d{3})/.exec(info.response ?? '');
      return { success: true, statusCode: match ? parseInt(match[1], 10) : 250 };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      const code = responseCode(err);
      if (errorCode(err) === 'EAUTH') {
        throw new MailAuthError(`SMTP auth error: ${message}`, code);
      }
      throw new MailDeliveryError(`SMTP send failed: ${message}`, code);
    }
  }
}
