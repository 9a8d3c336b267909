import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import env from '../utils/env';
import { logger } from '../middleware/logger';
import { formatIsoRange } from '../utils/formatDate';
import type { InviteService, InterviewInviteInput } from '../services/inviteService';
import type { AttendeeInput } from '../models/meetingRequest';

const attendeeSchema = z.object({
  email: z.string(),
  name: z.string().optional(),
  optional: z.boolean().default(false)
});

const inviteSchema = z.object({
  subject: z.string().min(1),
  agenda: z.string().optional(),
  location: z.string().optional(),
  organizer: z.object({
    email: z.string().email(),
    name: z.string().optional()
  }),
  attendees: z.array(attendeeSchema).min(1),
  // offset-less values are read as UTC further down
  start: z.string().min(1),
  durationMinutes: z.number().int().positive().default(30),
  uid: z.string().optional(),
  reminderMinutesBefore: z.number().int().nonnegative().optional()
});

const sendInviteSchema = inviteSchema.extend({
  senderEmail: z.string().email().optional(),
  cc: z.array(z.string().email()).default([])
});

function toInviteInput(body: z.infer<typeof inviteSchema>): InterviewInviteInput {
  return {
    subject: body.subject,
    agenda: body.agenda,
    location: body.location,
    organizerEmail: body.organizer.email,
    organizerName: body.organizer.name,
    attendees: body.attendees.map((a): AttendeeInput => ({
      email: a.email,
      displayName: a.name,
      role: a.optional ? 'OPTIONAL' : 'REQUIRED'
    })),
    start: body.start,
    durationMinutes: body.durationMinutes,
    uid: body.uid,
    reminderMinutesBefore: body.reminderMinutesBefore
  };
}

export function createInviteController(service: InviteService) {
  async function handlePreviewInvite(req: Request, res: Response, next: NextFunction) {
    try {
      const parsed = inviteSchema.safeParse(req.body || {});
      if (!parsed.success) {
        return res.status(400).json({ error: 'Invalid invite payload', details: parsed.error.flatten() });
      }

      const { meeting, ics } = service.preview(toInviteInput(parsed.data));
      logger.info('invite_preview_rendered', { uid: meeting.uid, attendees: meeting.attendees.length });

      res
        .status(200)
        .type('text/calendar; charset=utf-8')
        .set('X-Invite-Uid', meeting.uid)
        .set('Content-Disposition', 'attachment; filename="invite.ics"')
        .send(ics);
    } catch (err) {
      next(err);
    }
  }

  async function handleSendInvite(req: Request, res: Response, next: NextFunction) {
    try {
      const parsed = sendInviteSchema.safeParse(req.body || {});
      if (!parsed.success) {
        return res.status(400).json({ error: 'Invalid invite payload', details: parsed.error.flatten() });
      }

      const { senderEmail, cc } = parsed.data;
      logger.info('invite_send_requested', { subject: parsed.data.subject, attendees: parsed.data.attendees.length });

      const { meeting, ...result } = await service.sendInterviewInvite(toInviteInput(parsed.data), { senderEmail, cc });

      res.json({
        ok: true,
        ...result,
        when: formatIsoRange(meeting.startUtc, meeting.endUtc, 'en-US', env.CALENDAR_TIMEZONE)
      });
    } catch (err) {
      next(err);
    }
  }

  return { handlePreviewInvite, handleSendInvite };
}
