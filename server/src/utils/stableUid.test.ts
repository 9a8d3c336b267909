import { describe, expect, it } from 'vitest';
import { deriveUid, formatUidInstant, randomUid } from './stableUid';

describe('deriveUid', () => {
  const parts = ['Interview', 'a@x.com', '2024-01-01T10:00:00Z'];

  it('is deterministic', () => {
    expect(deriveUid(parts)).toBe(deriveUid([...parts]));
  });

  it('is the sha-256 prefix of the pipe-joined parts with the product domain', () => {
    expect(deriveUid(parts)).toBe('09f373ac1d383cd5dbf54b49e5db36e1@powerdashhr.com');
  });

  it('changes when any identifying part changes', () => {
    const base = deriveUid(parts);
    expect(deriveUid(['Final Round', 'a@x.com', '2024-01-01T10:00:00Z'])).not.toBe(base);
    expect(deriveUid(['Interview', 'b@x.com', '2024-01-01T10:00:00Z'])).not.toBe(base);
    expect(deriveUid(['Interview', 'a@x.com', '2024-01-01T10:30:00Z'])).not.toBe(base);
  });

  it('trims parts and drops blank ones before hashing', () => {
    expect(deriveUid(['  Interview ', '', '   ', 'a@x.com\n', '2024-01-01T10:00:00Z'])).toBe(deriveUid(parts));
  });

  it('hashes the empty string when every part is blank', () => {
    expect(deriveUid([])).toBe('e3b0c44298fc1c149afbf4c8996fb924@powerdashhr.com');
    expect(deriveUid(['', '  '])).toBe('e3b0c44298fc1c149afbf4c8996fb924@powerdashhr.com');
  });
});

describe('randomUid', () => {
  it('produces distinct tokens on the product domain', () => {
    const a = randomUid();
    expect(a).toMatch(/^[0-9a-f-]{36}@powerdashhr\.com$/);
    expect(randomUid()).not.toBe(a);
  });
});

describe('formatUidInstant', () => {
  it('writes whole seconds in UTC with a +00:00 offset', () => {
    expect(formatUidInstant(new Date('2024-06-01T15:00:00Z'))).toBe('2024-06-01T15:00:00+00:00');
    expect(formatUidInstant(new Date('2024-06-01T17:00:00+02:00'))).toBe('2024-06-01T15:00:00+00:00');
  });

  it('adds a six-digit fraction only when the instant has one', () => {
    expect(formatUidInstant(new Date('2024-06-01T15:00:00.250Z'))).toBe('2024-06-01T15:00:00.250000+00:00');
  });

  it('feeds the uid of a known slot', () => {
    expect(deriveUid(['Phone Screen', 'hr@powerdashhr.com', formatUidInstant(new Date('2024-06-01T15:00:00Z'))])).toBe(
      '748ddb56e7850eef3fedde3de41cfe47@powerdashhr.com'
    );
  });
});
