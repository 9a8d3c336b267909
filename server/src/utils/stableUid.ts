import { createHash, randomUUID } from 'crypto';
import { formatInTimeZone } from 'date-fns-tz';

export const UID_DOMAIN = 'powerdashhr.com';

const PART_DELIMITER = '|';
const DIGEST_LENGTH = 32;

/**
 * Derive a calendar UID from the parts that identify one interview slot.
 * Resending the same slot must produce the same UID so calendar clients update the
 * existing event instead of adding a second one.
 *
 * Part order is part of the contract: `[subject, organizerEmail, formatUidInstant(startUtc)]`.
 * Blank parts are dropped, so an all-blank input hashes the empty string.
 */
export function deriveUid(parts: readonly string[]): string {
  const base = parts
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .join(PART_DELIMITER);
  const digest = createHash('sha256').update(base, 'utf8').digest('hex');
  return `${digest.slice(0, DIGEST_LENGTH)}@${UID_DOMAIN}`;
}

/** One-off uid for invites that should never collapse into an earlier event. */
export function randomUid(): string {
  return `${randomUUID()}@${UID_DOMAIN}`;
}

/**
 * The start instant as it appears in uid parts: UTC with a `+00:00` offset and a six-digit
 * fraction only when there is one, e.g. `2024-06-01T15:00:00+00:00`.
 * Uids already sent to calendars were derived from this form.
 */
export function formatUidInstant(date: Date): string {
  const pattern = date.getUTCMilliseconds() === 0 ? "yyyy-MM-dd'T'HH:mm:ssxxx" : "yyyy-MM-dd'T'HH:mm:ss.SSS'000'xxx";
  return formatInTimeZone(date, 'UTC', pattern);
}
