export type OpeningHours = Record<string, { open?: string; close?: string }>;

const WEEKDAY_INDEX: Record<string, number> = {
  Mon: 0,
  Tue: 1,
  Wed: 2,
  Thu: 3,
  Fri: 4,
  Sat: 5,
  Sun: 6,
};

const HH_MM = /^([01]\d|2[0-3]):([0-5]\d)$/;

/** Weekday (Monday = 0) and minutes since midnight of `now` on the wall clock of `timeZone`. */
export function localClock(now: Date, timeZone: string): { weekday: number; minutes: number } {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    weekday: 'short',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? '';
  const weekday = WEEKDAY_INDEX[part('weekday')];
  if (weekday === undefined) {
    throw new Error(`Unexpected weekday from Intl for ${timeZone}`);
  }
  return { weekday, minutes: Number(part('hour')) * 60 + Number(part('minute')) };
}

export function parseClockTime(value: string | undefined): number | null {
  if (!value) return null;
  const match = HH_MM.exec(value);
  if (!match) return null;
  return Number(match[1]) * 60 + Number(match[2]);
}

/**
 * True once the local time has reached today's closing time. Days without an
 * entry, or without a valid `close`, never close automatically.
 */
export function isPastClosingTime(
  hours: OpeningHours | null,
  timeZone: string,
  now: Date,
): boolean {
  if (!hours) return false;
  const { weekday, minutes } = localClock(now, timeZone);
  const closeAt = parseClockTime(hours[String(weekday)]?.close);
  if (closeAt === null) return false;
  return minutes >= closeAt;
}
