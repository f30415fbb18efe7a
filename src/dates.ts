/**
 * Calendar-day arithmetic on `YYYY-MM-DD` keys.
 *
 * Instants are mapped to wall-clock fields in the configured time zone once;
 * everything after that works on day keys, so layout never depends on the
 * host's local zone.
 */

export type DayKey = string;
export type WeekStart = 'monday' | 'sunday';
export type TimeFormat = '24h' | '12h';

export const DAY_NAMES = ['SUNDAY', 'MONDAY', 'TUESDAY', 'WEDNESDAY', 'THURSDAY', 'FRIDAY', 'SATURDAY'];
export const SHORT_DAY_NAMES = ['SUN', 'MON', 'TUE', 'WED', 'THU', 'FRI', 'SAT'];
export const MONTH_NAMES = [
  'JANUARY', 'FEBRUARY', 'MARCH', 'APRIL', 'MAY', 'JUNE',
  'JULY', 'AUGUST', 'SEPTEMBER', 'OCTOBER', 'NOVEMBER', 'DECEMBER',
];
export const SHORT_MONTH_NAMES = ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'];

const MS_PER_DAY = 86_400_000;

export interface ZonedFields {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number; // 0-23
  minute: number;
}

export function zonedFields(date: Date, timeZone: string): ZonedFields {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    hourCycle: 'h23',
  }).formatToParts(date);

  const field = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? Number(part.value) : 0;
  };

  return {
    year: field('year'),
    month: field('month'),
    day: field('day'),
    hour: field('hour') % 24,
    minute: field('minute'),
  };
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

function toKey(utcMs: number): DayKey {
  return new Date(utcMs).toISOString().slice(0, 10);
}

function keyToUtc(key: DayKey): number {
  const [year, month, day] = key.split('-').map(Number);
  return Date.UTC(year, month - 1, day);
}

export function isDayKey(value: string): value is DayKey {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && toKey(keyToUtc(value)) === value;
}

/** Calendar day an instant falls on in `timeZone`. */
export function dayKeyOf(date: Date, timeZone: string): DayKey {
  const { year, month, day } = zonedFields(date, timeZone);
  return `${year}-${pad2(month)}-${pad2(day)}`;
}

/** The instant `day` begins in `timeZone`. */
export function startOfDayIn(day: DayKey, timeZone: string): Date {
  const target = keyToUtc(day);
  let instant = target;
  // second pass settles offsets that change across the day boundary
  for (let i = 0; i < 2; i++) {
    const f = zonedFields(new Date(instant), timeZone);
    instant += target - Date.UTC(f.year, f.month - 1, f.day, f.hour, f.minute);
  }
  return new Date(instant);
}

export function addDays(key: DayKey, days: number): DayKey {
  return toKey(keyToUtc(key) + days * MS_PER_DAY);
}

export function compareDayKeys(a: DayKey, b: DayKey): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** 0 = Sunday ... 6 = Saturday */
export function weekdayOf(key: DayKey): number {
  return new Date(keyToUtc(key)).getUTCDay();
}

export function dayOfMonth(key: DayKey): number {
  return Number(key.slice(8, 10));
}

export function monthOf(key: DayKey): number {
  return Number(key.slice(5, 7));
}

export function yearOf(key: DayKey): number {
  return Number(key.slice(0, 4));
}

export function startOfWeek(key: DayKey, weekStart: WeekStart): DayKey {
  const firstDay = weekStart === 'monday' ? 1 : 0;
  const offset = (weekdayOf(key) - firstDay + 7) % 7;
  return addDays(key, -offset);
}

export function startOfMonth(key: DayKey): DayKey {
  return `${key.slice(0, 7)}-01`;
}

export function daysInMonth(key: DayKey): number {
  return new Date(Date.UTC(yearOf(key), monthOf(key), 0)).getUTCDate();
}

/** `count` consecutive days starting at `start`. */
export function dayRange(start: DayKey, count: number): DayKey[] {
  return Array.from({ length: Math.max(0, count) }, (_, i) => addDays(start, i));
}

/** Weekday names in display order for the given week start. */
export function weekdayNames(weekStart: WeekStart, names: readonly string[] = SHORT_DAY_NAMES): string[] {
  const first = weekStart === 'monday' ? 1 : 0;
  return Array.from({ length: 7 }, (_, i) => names[(first + i) % 7]);
}

export function formatTime(date: Date, timeZone: string, timeFormat: TimeFormat): string {
  const { hour, minute } = zonedFields(date, timeZone);
  if (timeFormat === '24h') {
    return `${pad2(hour)}:${pad2(minute)}`;
  }
  const hour12 = hour % 12 === 0 ? 12 : hour % 12;
  return `${hour12}:${pad2(minute)} ${hour < 12 ? 'AM' : 'PM'}`;
}

/** e.g. `OCT 19` */
export function formatShortDate(key: DayKey): string {
  return `${SHORT_MONTH_NAMES[monthOf(key) - 1]} ${dayOfMonth(key)}`;
}

/** e.g. `MONDAY, OCT 19` */
export function formatLongDay(key: DayKey): string {
  return `${DAY_NAMES[weekdayOf(key)]}, ${formatShortDate(key)}`;
}

/** e.g. `OCTOBER 2026` */
export function formatMonthLabel(key: DayKey): string {
  return `${MONTH_NAMES[monthOf(key) - 1]} ${yearOf(key)}`;
}

/** e.g. `OCT 19 - NOV 1, 2026`, or with both years when they differ. */
export function formatRangeLabel(first: DayKey, last: DayKey): string {
  if (yearOf(first) === yearOf(last)) {
    return `${formatShortDate(first)} - ${formatShortDate(last)}, ${yearOf(last)}`;
  }
  return `${formatShortDate(first)}, ${yearOf(first)} - ${formatShortDate(last)}, ${yearOf(last)}`;
}
