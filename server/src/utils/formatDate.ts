/** "9 AM" for whole hours, "11:30 AM" otherwise */
function formatTime(d: Date, locale: string, timeZone?: string): string {
  const parts = new Intl.DateTimeFormat(locale, {
    hour: 'numeric',
    minute: 'numeric',
    hour12: true,
    timeZone
  }).formatToParts(d);
  const hour = parts.find((p) => p.type === 'hour')?.value ?? '';
  const minute = parts.find((p) => p.type === 'minute')?.value ?? '0';
  const dayPeriod = parts.find((p) => p.type === 'dayPeriod')?.value ?? '';
  const minNum = parseInt(minute, 10) || 0;
  if (minNum === 0) return `${hour} ${dayPeriod}`;
  return `${hour}:${minute} ${dayPeriod}`;
}

export function formatSlotReadable(start: Date, end: Date, locale = 'en-US', timeZone = 'UTC') {
  const dayFormatter = new Intl.DateTimeFormat(locale, { weekday: 'long', month: 'short', day: 'numeric', year: 'numeric', timeZone });
  const day = dayFormatter.format(start);
  const startTime = formatTime(start, locale, timeZone);
  const endTime = formatTime(end, locale, timeZone);

  return `${day}, ${startTime} - ${endTime} (${timeZone})`;
}

export function formatIsoRange(start: Date, end: Date, locale = 'en-US', timeZone = 'UTC') {
  return {
    start: start.toISOString(),
    end: end.toISOString(),
    readable: formatSlotReadable(start, end, locale, timeZone)
  };
}
