import { describe, expect, it, vi } from 'vitest';
import request from 'supertest';
import { createServer } from './app';
import { InviteService } from './services/inviteService';
import type { MailSender } from './services/mailSender';
import { MailAuthError } from './utils/errors';

const PHONE_SCREEN_UID = '748ddb56e7850eef3fedde3de41cfe47@powerdashhr.com';

const body = {
  subject: 'Phone Screen',
  organizer: { email: 'hr@powerdashhr.com', name: 'HR Team' },
  attendees: [
    { email: 'cand@example.com', name: 'Jane Doe' },
    { email: 'lead@example.com', optional: true }
  ],
  start: '2024-06-01T15:00:00Z'
};

function appWith(sender: MailSender | null) {
  return createServer({ inviteService: new InviteService(sender) });
}

describe('app', () => {
  it('reports health', async () => {
    const res = await request(appWith(null)).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it('renders an invite preview as text/calendar', async () => {
    const res = await request(appWith(null)).post('/api/invites/preview').send(body);

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toBe('text/calendar; charset=utf-8');
    expect(res.headers['x-invite-uid']).toBe(PHONE_SCREEN_UID);
    expect(res.headers['content-disposition']).toBe('attachment; filename="invite.ics"');

    const lines = res.text.split('\r\n');
    expect(lines).toContain(`UID:${PHONE_SCREEN_UID}`);
    expect(lines).toContain('DTSTART:20240601T150000Z');
    expect(lines).toContain('DTEND:20240601T153000Z');
    expect(lines.filter((l) => l.startsWith('ATTENDEE'))).toEqual([
      'ATTENDEE;CN=Jane Doe;ROLE=REQ-PARTICIPANT;PARTSTAT=NEEDS-ACTION;RSVP=TRUE:MAILTO:cand@example.com',
      'ATTENDEE;CN=lead@example.com;ROLE=OPT-PARTICIPANT;PARTSTAT=NEEDS-ACTION;RSVP=TRUE:MAILTO:lead@example.com'
    ]);
  });

  it('rejects a malformed payload', async () => {
    const res = await request(appWith(null))
      .post('/api/invites/preview')
      .send({ ...body, organizer: { email: 'not-an-email' } });

    expect(res.status).toBe(400);
    expect(res.body.error).toBe('Invalid invite payload');
    expect(res.body.details.fieldErrors.organizer).toBeDefined();
  });

  it('reports the field of a meeting validation failure', async () => {
    const res = await request(appWith(null))
      .post('/api/invites/preview')
      .send({ ...body, start: 'tomorrow-ish' });

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: 'start: is not a valid instant', code: 'validation_failed', field: 'start' });
  });

  it('rejects invalid JSON', async () => {
    const res = await request(appWith(null)).post('/api/invites').set('Content-Type', 'application/json').send('{"subject"');
    expect(res.status).toBe(400);
  });

  it('sends the invite', async () => {
    const sender: MailSender = { send: vi.fn().mockResolvedValue({ success: true, statusCode: 202 }) };

    const res = await request(appWith(sender))
      .post('/api/invites')
      .send({ ...body, cc: ['panel@example.com'] });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      ok: true,
      sent: true,
      uid: PHONE_SCREEN_UID,
      outcome: { success: true, statusCode: 202 },
      when: { start: '2024-06-01T15:00:00.000Z', end: '2024-06-01T15:30:00.000Z' }
    });
    expect(sender.send).toHaveBeenCalledWith(
      expect.objectContaining({ to: ['cand@example.com', 'lead@example.com'], cc: ['panel@example.com'] })
    );
  });

  it('maps transport auth failures to a bad gateway', async () => {
    const sender: MailSender = { send: vi.fn().mockRejectedValue(new MailAuthError('Graph auth error (401)', 401)) };

    const res = await request(appWith(sender)).post('/api/invites').send(body);

    expect(res.status).toBe(502);
    expect(res.body).toEqual({ error: 'Graph auth error (401)', code: 'mail_auth_failed' });
  });
});
