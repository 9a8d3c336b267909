import { z } from 'zod';
import { toDate } from 'date-fns-tz';
import { ValidationError } from '../utils/errors';

export type AttendeeRole = 'REQUIRED' | 'OPTIONAL';

export type Organizer = {
  readonly email: string;
  readonly displayName: string;
};

export type Attendee = {
  readonly email: string;
  readonly displayName: string;
  readonly role: AttendeeRole;
};

/** A validated, frozen meeting invitation. Build one with `createMeetingRequest`. */
export type MeetingRequest = {
  readonly uid: string;
  readonly summary: string;
  readonly description: string;
  readonly location: string;
  readonly organizer: Organizer;
  readonly attendees: readonly Attendee[];
  readonly startUtc: Date;
  readonly endUtc: Date;
  readonly method: 'REQUEST';
  readonly reminderMinutesBefore?: number;
};

export type InstantInput = Date | string;

export type AttendeeInput = {
  email?: string;
  displayName?: string;
  role?: AttendeeRole;
};

export type MeetingRequestInput = {
  uid: string;
  summary: string;
  description?: string;
  location?: string;
  organizer: { email: string; displayName?: string };
  attendees?: ReadonlyArray<AttendeeInput>;
  startUtc: InstantInput;
  endUtc: InstantInput;
  method?: 'REQUEST';
  reminderMinutesBefore?: number;
};

/**
 * Read an instant. Strings carrying an offset (`Z`, `+02:00`) keep it; strings without one,
 * such as `2024-03-05 09:30:00`, are read as UTC. Returns null when the value is not a date.
 */
export function parseInstant(value: InstantInput): Date | null {
  if (typeof value === 'string' && !value.trim()) return null;
  const date = value instanceof Date ? new Date(value.getTime()) : toDate(value.trim(), { timeZone: 'UTC' });
  return Number.isNaN(date.getTime()) ? null : date;
}

const requiredText = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .refine((s) => s.trim().length > 0, { message: 'must not be empty' });

const optionalText = z.string({ invalid_type_error: 'must be a string' }).default('');

const instantSchema = z
  .custom<InstantInput>((v) => v instanceof Date || typeof v === 'string', {
    message: 'must be a Date or an ISO-8601 string'
  })
  .transform((v, ctx) => {
    const parsed = parseInstant(v);
    if (!parsed) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is not a valid instant', fatal: true });
      return z.NEVER;
    }
    // DTSTART/DTEND only have room for a four-digit year.
    const year = parsed.getUTCFullYear();
    if (year < 0 || year > 9999) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must fall between the years 0000 and 9999', fatal: true });
      return z.NEVER;
    }
    return parsed;
  });

const attendeeSchema = z.object({
  email: optionalText,
  displayName: z.string({ invalid_type_error: 'must be a string' }).optional(),
  role: z.enum(['REQUIRED', 'OPTIONAL']).default('REQUIRED')
});

const meetingRequestSchema = z
  .object({
    uid: requiredText,
    summary: requiredText,
    description: optionalText,
    location: optionalText,
    organizer: z.object(
      {
        email: requiredText,
        displayName: z.string({ invalid_type_error: 'must be a string' }).optional()
      },
      { required_error: 'is required' }
    ),
    attendees: z.array(attendeeSchema).default([]),
    startUtc: instantSchema,
    endUtc: instantSchema,
    method: z.literal('REQUEST').default('REQUEST'),
    reminderMinutesBefore: z
      .number({ invalid_type_error: 'must be a number' })
      .int('must be a whole number of minutes')
      .nonnegative('must not be negative')
      .optional()
  })
  .superRefine((m, ctx) => {
    if (!(m.startUtc instanceof Date) || !(m.endUtc instanceof Date)) return;
    if (m.endUtc.getTime() <= m.startUtc.getTime()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['endUtc'], message: 'must be after startUtc' });
    }
  });

/**
 * Validate caller input and return an immutable meeting request.
 * Attendees without an email are dropped; missing display names fall back to the email.
 * Throws `ValidationError` naming the first field that fails.
 */
export function createMeetingRequest(input: MeetingRequestInput): MeetingRequest {
  const parsed = meetingRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue.path.join('.') || 'meeting', issue.message);
  }
  const data = parsed.data;

  const organizerEmail = data.organizer.email.trim();
  const organizer: Organizer = Object.freeze({
    email: organizerEmail,
    displayName: (data.organizer.displayName ?? '').trim() || organizerEmail
  });

  const attendees: Attendee[] = [];
  for (const a of data.attendees) {
    const email = a.email.trim();
    if (!email) continue;
    attendees.push(Object.freeze({ email, displayName: (a.displayName ?? '').trim() || email, role: a.role }));
  }

  return Object.freeze({
    uid: data.uid.trim(),
    summary: data.summary,
    description: data.description,
    location: data.location,
    organizer,
    attendees: Object.freeze(attendees),
    startUtc: data.startUtc,
    endUtc: data.endUtc,
    method: data.method,
    ...(data.reminderMinutesBefore !== undefined && { reminderMinutesBefore: data.reminderMinutesBefore })
  });
}
