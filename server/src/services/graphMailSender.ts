import axios, { type AxiosInstance } from 'axios';
import type { MailOutcome, MailSender, OutgoingMail } from './mailSender';
import { MailAuthError, MailDeliveryError } from '../utils/errors';

const ACCEPTED_STATUSES = [200, 201, 202];

type AccessTokenSource = string | (() => Promise<string>);

export type GraphMailSenderOptions = {
  accessToken: AccessTokenSource;
  baseUrl?: string;
  http?: Pick<AxiosInstance, 'post'>;
};

function graphErrorDetail(data: unknown): string | undefined {
  if (typeof data === 'string') return data || undefined;
  if (typeof data !== 'object' || data === null || !('error' in data)) return undefined;
  const inner = data.error;
  if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
    return inner.message;
  }
  return undefined;
}

/** Sends mail through the Microsoft Graph `sendMail` endpoint of the sender's mailbox. */
export class GraphMailSender implements MailSender {
  private readonly accessToken: AccessTokenSource;
  private readonly baseUrl: string;
  private readonly http: Pick<AxiosInstance, 'post'>;

  constructor(options: GraphMailSenderOptions) {
    this.accessToken = options.accessToken;
    this.baseUrl = (options.baseUrl ?? 'https://graph.microsoft.com/v1.0').replace(/\/$/, '');
    this.http = options.http ?? axios.create();
  }

  private async resolveToken() {
    return typeof this.accessToken === 'string' ? this.accessToken : this.accessToken();
  }

  buildPayload(mail: OutgoingMail) {
    return {
      message: {
        subject: mail.subject,
        body: {
          contentType: 'HTML',
          content: mail.htmlBody
        },
        toRecipients: mail.to.map((address) => ({ emailAddress: { address } })),
        ccRecipients: mail.cc.map((address) => ({ emailAddress: { address } })),
        attachments: mail.attachments.map((a) => ({
          '@odata.type': '#microsoft.graph.fileAttachment',
          name: a.name,
          contentType: a.contentType,
          contentBytes: a.contentBase64
        }))
      },
      saveToSentItems: true
    };
  }

  async send(mail: OutgoingMail): Promise<MailOutcome> {
    const url = `${this.baseUrl}/users/${encodeURIComponent(mail.senderEmail)}/sendMail`;
    const token = await this.resolveToken();

    let status: number;
    try {
      const resp = await this.http.post(url, this.buildPayload(mail), {
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json'
        }
      });
      status = resp.status;
    } catch (error: unknown) {
      const responseStatus = axios.isAxiosError(error) ? error.response?.status : undefined;
      const detail = axios.isAxiosError(error) ? graphErrorDetail(error.response?.data) : undefined;
      if (responseStatus === 401 || responseStatus === 403) {
        throw new MailAuthError(`Graph auth error (${responseStatus})${detail ? `: ${detail}` : ''}`, responseStatus);
      }
      const reason = detail || (error instanceof Error ? error.message : 'no response');
      throw new MailDeliveryError(
        `Graph sendMail failed${responseStatus ? ` (${responseStatus})` : ''}: ${reason}`,
        responseStatus
      );
    }

    if (!ACCEPTED_STATUSES.includes(status)) {
      throw new MailDeliveryError(`Graph sendMail failed (${status}): unexpected status`, status);
    }
    return { success: true, statusCode: status };
  }
}
