import { addMinutes } from 'date-fns';
import env from '../utils/env';
import { logger } from '../middleware/logger';
import { ValidationError } from '../utils/errors';
import { deriveUid, formatUidInstant } from '../utils/stableUid';
import { renderIcs, toIcsAttachment } from '../utils/icsGenerator';
import { formatSlotReadable } from '../utils/formatDate';
import {
  createMeetingRequest,
  parseInstant,
  type AttendeeInput,
  type InstantInput,
  type MeetingRequest
} from '../models/meetingRequest';
import { createMailSender, type MailOutcome, type MailSender } from './mailSender';

export type InterviewInviteInput = {
  subject: string;
  agenda?: string;
  location?: string;
  organizerEmail: string;
  organizerName?: string;
  attendees: ReadonlyArray<AttendeeInput>;
  start: InstantInput;
  durationMinutes: number;
  /** Explicit uid for one-off invites; derived from subject, organizer and start when absent. */
  uid?: string;
  reminderMinutesBefore?: number;
};

export type SendOptions = {
  senderEmail?: string;
  cc?: string[];
  now?: Date;
};

export type SendResult =
  | { sent: true; uid: string; meeting: MeetingRequest; outcome: MailOutcome }
  | { sent: false; uid: string; meeting: MeetingRequest; reason: 'mail_not_configured' };

export type InviteServiceOptions = {
  defaultSender?: string;
  timeZone?: string;
};

export function buildInterviewMeeting(input: InterviewInviteInput): MeetingRequest {
  const start = parseInstant(input.start);
  if (!start) throw new ValidationError('start', 'is not a valid instant');
  if (!Number.isInteger(input.durationMinutes) || input.durationMinutes <= 0) {
    throw new ValidationError('durationMinutes', 'must be a positive whole number of minutes');
  }

  const uid = input.uid?.trim() || deriveUid([input.subject, input.organizerEmail, formatUidInstant(start)]);

  return createMeetingRequest({
    uid,
    summary: input.subject,
    description: input.agenda ?? '',
    location: input.location ?? '',
    organizer: { email: input.organizerEmail, displayName: input.organizerName },
    attendees: input.attendees,
    startUtc: start,
    endUtc: addMinutes(start, input.durationMinutes),
    reminderMinutesBefore: input.reminderMinutesBefore
  });
}

function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function buildInviteHtml(meeting: MeetingRequest, timeZone = 'UTC'): string {
  const rows = [
    `<p>You are invited to <strong>${escapeHtml(meeting.summary)}</strong>.</p>`,
    `<p>When: ${escapeHtml(formatSlotReadable(meeting.startUtc, meeting.endUtc, 'en-US', timeZone))}</p>`,
    meeting.location ? `<p>Where: ${escapeHtml(meeting.location)}</p>` : undefined,
    meeting.description ? `<p>${escapeHtml(meeting.description).replace(/\r?\n/g, '<br>')}</p>` : undefined,
    `<p>Organizer: ${escapeHtml(meeting.organizer.displayName)} &lt;${escapeHtml(meeting.organizer.email)}&gt;</p>`,
    '<p>Please respond using the attached calendar invitation.</p>'
  ].filter(Boolean);
  return rows.join('\n');
}

export class InviteService {
  constructor(
    private readonly sender: MailSender | null,
    private readonly options: InviteServiceOptions = {}
  ) {}

  preview(input: InterviewInviteInput, now?: Date) {
    const meeting = buildInterviewMeeting(input);
    const ics = renderIcs(meeting, { now }).toString('utf8');
    return { meeting, ics };
  }

  async sendInterviewInvite(input: InterviewInviteInput, opts: SendOptions = {}): Promise<SendResult> {
    const meeting = buildInterviewMeeting(input);
    if (meeting.attendees.length === 0) {
      throw new ValidationError('attendees', 'at least one attendee with an email is required to send');
    }

    if (!this.sender) {
      logger.warn('mail_not_configured_skip_send', { uid: meeting.uid });
      return { sent: false, uid: meeting.uid, meeting, reason: 'mail_not_configured' };
    }

    const bytes = renderIcs(meeting, { now: opts.now });
    const to = meeting.attendees.map((a) => a.email);
    const senderEmail = opts.senderEmail || this.options.defaultSender || meeting.organizer.email;

    logger.info('invite_sending', { uid: meeting.uid, to, from: senderEmail });
    try {
      const outcome = await this.sender.send({
        senderEmail,
        to,
        subject: `Interview invitation: ${meeting.summary}`,
        htmlBody: buildInviteHtml(meeting, this.options.timeZone),
        attachments: [toIcsAttachment(bytes)],
        cc: opts.cc ?? []
      });
      logger.info('invite_sent', { uid: meeting.uid, statusCode: outcome.statusCode });
      return { sent: true, uid: meeting.uid, meeting, outcome };
    } catch (err: unknown) {
      logger.error('invite_send_failed', {
        uid: meeting.uid,
        to,
        message: err instanceof Error ? err.message : String(err)
      });
      throw err;
    }
  }
}

export default new InviteService(createMailSender(env), {
  defaultSender: env.MAIL_SENDER,
  timeZone: env.CALENDAR_TIMEZONE
});
