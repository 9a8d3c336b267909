/**
 * Generate .ics (iCalendar) meeting requests.
 * Mail clients show Accept/Tentative/Decline for METHOD:REQUEST attachments and use UID to
 * recognise a resend of an event they already hold.
 */
import { createMeetingRequest, type Attendee, type MeetingRequest, type MeetingRequestInput } from '../models/meetingRequest';

export const ICS_PRODUCT_ID = '-//PowerDash HR//Interview Scheduler//EN';
export const ICS_CONTENT_TYPE = 'text/calendar; method=REQUEST';

const CRLF = '\r\n';

const ROLE_PARAM: Record<Attendee['role'], string> = {
  REQUIRED: 'REQ-PARTICIPANT',
  OPTIONAL: 'OPT-PARTICIPANT'
};

export type RenderOptions = {
  /** DTSTAMP value; the current instant when omitted. */
  now?: Date;
};

export type IcsAttachment = {
  name: string;
  contentType: string;
  contentBase64: string;
};

/** UTC basic format: 20240305T093000Z */
export function formatIcsDateTime(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d+/, '');
}

function attendeeLines(attendees: readonly Attendee[]): string[] {
  const ordered = [
    ...attendees.filter((a) => a.role === 'REQUIRED'),
    ...attendees.filter((a) => a.role === 'OPTIONAL')
  ];
  return ordered.map(
    (a) => `ATTENDEE;CN=${a.displayName};ROLE=${ROLE_PARAM[a.role]};PARTSTAT=NEEDS-ACTION;RSVP=TRUE:MAILTO:${a.email}`
  );
}

function alarmLines(minutesBefore: number | undefined): string[] {
  if (minutesBefore === undefined) return [];
  return ['BEGIN:VALARM', `TRIGGER:-PT${minutesBefore}M`, 'ACTION:DISPLAY', 'DESCRIPTION:Reminder', 'END:VALARM'];
}

/**
 * Render the meeting as iCalendar text with CRLF after every line.
 * The input is validated first; nothing is produced for an invalid meeting.
 * Text values are written as given, without RFC 5545 escaping.
 */
export function generateIcs(meeting: MeetingRequest | MeetingRequestInput, options: RenderOptions = {}): string {
  const m = createMeetingRequest(meeting);
  const dtStamp = formatIcsDateTime(options.now ?? new Date());

  const lines = [
    'BEGIN:VCALENDAR',
    `PRODID:${ICS_PRODUCT_ID}`,
    'VERSION:2.0',
    `METHOD:${m.method}`,
    'CALSCALE:GREGORIAN',
    'BEGIN:VEVENT',
    `UID:${m.uid}`,
    `DTSTAMP:${dtStamp}`,
    `DTSTART:${formatIcsDateTime(m.startUtc)}`,
    `DTEND:${formatIcsDateTime(m.endUtc)}`,
    `SUMMARY:${m.summary}`,
    `DESCRIPTION:${m.description}`,
    `LOCATION:${m.location}`,
    `ORGANIZER;CN=${m.organizer.displayName}:MAILTO:${m.organizer.email}`,
    ...attendeeLines(m.attendees),
    // Creation only; an update or cancel must bump this.
    'SEQUENCE:0',
    'STATUS:CONFIRMED',
    'TRANSP:OPAQUE',
    ...alarmLines(m.reminderMinutesBefore),
    'END:VEVENT',
    'END:VCALENDAR'
  ];

  return lines.join(CRLF) + CRLF;
}

export function renderIcs(meeting: MeetingRequest | MeetingRequestInput, options: RenderOptions = {}): Buffer {
  return Buffer.from(generateIcs(meeting, options), 'utf8');
}

export function toIcsAttachment(bytes: Buffer, name = 'invite.ics'): IcsAttachment {
  return { name, contentType: ICS_CONTENT_TYPE, contentBase64: bytes.toString('base64') };
}
