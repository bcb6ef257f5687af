const MS_PER_DAY = 86_400_000;

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

function normalizeZone(zone: string | undefined): string {
  if (!zone) {
    return "";
  }
  if (zone.toUpperCase() === "Z") {
    return "Z";
  }
  return zone.includes(":") ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function isValidWallClock(year: number, month: number, day: number, hour: number, minute: number, second: number): boolean {
  if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return false;
  }
  return hour <= 23 && minute <= 59 && second <= 59;
}

/**
 * Parses the ISO-8601 shapes collectors emit. A value without an offset is
 * read as local time. Returns undefined for anything else, including
 * calendar-invalid dates such as 2026-02-30, with or without an offset.
 */
export function parseTimestamp(raw: string | null | undefined): Date | undefined {
  const value = raw?.trim() ?? "";
  const match = ISO_TIMESTAMP.exec(value);
  if (!match) {
    return undefined;
  }

  const [, year, month, day, hour = "00", minute = "00", second = "00", fraction = "", zone] = match;
  if (!isValidWallClock(Number(year), Number(month), Number(day), Number(hour), Number(minute), Number(second))) {
    return undefined;
  }

  const millis = fraction.padEnd(3, "0").slice(0, 3);
  const date = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${normalizeZone(zone)}`);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

export function daysSince(then: Date, now: Date): number {
  return (now.getTime() - then.getTime()) / MS_PER_DAY;
}

export function formatDays(days: number): string {
  return days.toFixed(1);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

// UTC so directory names do not depend on the host time zone.
export function formatRunStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}
