// pattern: Functional Core

/**
 * Deterministic date/time handling for reminders.
 * All calendar arithmetic happens in the process's local time zone; stored
 * timestamps carry their UTC offset so they compare correctly later.
 */

export type ClockTime = {
  hour: number;
  minute: number;
};

const WEEKDAYS = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'] as const;
const WEEKDAY_LABELS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;

const TIME_PATTERN = /(\d{1,2}):(\d{2})\s*(am|pm)?/;
const ISO_PATTERN = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Parse "9:15", "9:15 AM", "3:45pm" or "14:30" into a 24-hour clock time.
 * The first H:MM group in the text wins; anything else around it is ignored.
 */
export function parseTimeString(text: string): ClockTime | null {
  const match = TIME_PATTERN.exec(text.trim().toLowerCase());
  if (!match) {
    return null;
  }

  let hour = Number(match[1]);
  const minute = Number(match[2]);
  const meridiem = match[3];

  if (minute > 59) {
    return null;
  }

  if (meridiem) {
    if (hour < 1 || hour > 12) {
      return null;
    }
    if (meridiem === 'pm' && hour !== 12) hour += 12;
    if (meridiem === 'am' && hour === 12) hour = 0;
  } else if (hour > 23) {
    return null;
  }

  return { hour, minute };
}

function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/**
 * Resolve "today", "tomorrow" or a weekday name to a local calendar day.
 * A weekday equal to today's means the same day next week.
 */
export function resolveDateExpression(expression: string, now: Date = new Date()): Date | null {
  const text = expression.trim().toLowerCase();
  const today = startOfDay(now);

  if (text === 'today') {
    return today;
  }
  if (text === 'tomorrow') {
    return addDays(today, 1);
  }

  const target = WEEKDAYS.findIndex((name) => name === text);
  if (target === -1) {
    return null;
  }

  const daysAhead = (target - today.getDay() + 7) % 7;
  return addDays(today, daysAhead === 0 ? 7 : daysAhead);
}

/**
 * ISO-8601 with seconds and the local UTC offset, e.g. 2026-02-18T09:15:00+01:00.
 */
export function toLocalIsoString(date: Date): string {
  const offsetMinutes = -date.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const absolute = Math.abs(offsetMinutes);
  const offset = `${sign}${pad(Math.floor(absolute / 60))}:${pad(absolute % 60)}`;

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}${offset}`
  );
}

export function combineDateAndTime(day: Date, time: ClockTime): string {
  return toLocalIsoString(
    new Date(day.getFullYear(), day.getMonth(), day.getDate(), time.hour, time.minute),
  );
}

/**
 * Parse an ISO-8601 timestamp. Values without an offset are taken as UTC.
 */
export function parseIsoDatetime(value: string): Date | null {
  const trimmed = value.trim();
  const match = ISO_PATTERN.exec(trimmed);
  if (!match) {
    return null;
  }

  let normalized = trimmed.replace(' ', 'T');
  if (!match[1] && normalized.includes('T')) {
    normalized += 'Z';
  }

  const parsed = new Date(normalized);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * True when the timestamp is at or before `now`. Unparsable input is never past.
 */
export function isDatetimePast(value: string, now: Date = new Date()): boolean {
  const parsed = parseIsoDatetime(value);
  return parsed !== null && parsed.getTime() <= now.getTime();
}

export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function formatDottedDate(date: Date): string {
  return `${pad(date.getDate())}.${pad(date.getMonth() + 1)}.${date.getFullYear()}`;
}

function sameDay(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() &&
    a.getMonth() === b.getMonth() &&
    a.getDate() === b.getDate()
  );
}

/**
 * "Today at 09:15", "Tomorrow at 18:30" or "Friday at 07:00" in local time.
 * Returns the input unchanged when it cannot be parsed.
 */
export function formatReminderWhen(value: string, now: Date = new Date()): string {
  const parsed = parseIsoDatetime(value);
  if (!parsed) {
    return value;
  }

  let dayLabel: string;
  if (sameDay(parsed, now)) {
    dayLabel = 'Today';
  } else if (sameDay(parsed, addDays(now, 1))) {
    dayLabel = 'Tomorrow';
  } else {
    dayLabel = WEEKDAY_LABELS[parsed.getDay()] ?? '';
  }

  return `${dayLabel} at ${formatClock(parsed)}`;
}

/**
 * Current local time for prompts, e.g. "2026-02-18 09:15:00 Europe/Berlin".
 */
export function formatLocalContext(now: Date = new Date()): string {
  const zone = Intl.DateTimeFormat().resolvedOptions().timeZone;
  const day = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
  return `${day} ${time} ${zone}`;
}
