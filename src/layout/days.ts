import type { CalendarConfig } from '../config.js';
import { addDays, compareDayKeys, dayKeyOf, type DayKey } from '../dates.js';
import { DataShapeError } from '../errors.js';
import type { CalendarEvent } from '../types.js';

/** Display names and priority of configured calendars. */
export interface CalendarDirectory {
  displayName(calendarId: string): string;
  /** Lower sorts first; unknown calendars sort after configured ones. */
  priority(calendarId: string): number;
  entries(): ReadonlyArray<{ id: string; displayName: string }>;
}

export function createCalendarDirectory(calendars: readonly CalendarConfig[]): CalendarDirectory {
  const byId = new Map(calendars.map((calendar, index) => [calendar.id, { index, calendar }]));
  return {
    displayName(calendarId) {
      return byId.get(calendarId)?.calendar.displayName ?? calendarId;
    },
    priority(calendarId) {
      return byId.get(calendarId)?.index ?? calendars.length;
    },
    entries() {
      return calendars.map((calendar) => ({ id: calendar.id, displayName: calendar.displayName ?? calendar.id }));
    },
  };
}

export interface NormalizedEvents {
  events: CalendarEvent[];
  issues: DataShapeError[];
}

/**
 * Clamp events whose end precedes their start so that `end === start`.
 * Each clamp is reported; the event itself is kept.
 */
export function normalizeEvents(events: readonly CalendarEvent[]): NormalizedEvents {
  const issues: DataShapeError[] = [];
  const normalized = events.map((event) => {
    if (event.end.getTime() >= event.start.getTime()) return event;
    issues.push(
      new DataShapeError(
        `Event ends before it starts (${event.start.toISOString()} > ${event.end.toISOString()}); clamped to its start`,
        event.title,
        event.sourceCalendarId,
      ),
    );
    return { ...event, end: new Date(event.start.getTime()) };
  });
  return { events: normalized, issues };
}

/**
 * Calendar days an event touches, in order.
 *
 * All-day events end on an exclusive day. A timed event ending exactly at
 * midnight does not touch the next day. Zero-length events touch only their
 * start day.
 */
export function daysTouched(event: CalendarEvent, timeZone: string): DayKey[] {
  const first = dayKeyOf(event.start, timeZone);
  const duration = event.end.getTime() - event.start.getTime();
  if (duration <= 0) return [first];

  const last = event.isAllDay
    ? addDays(dayKeyOf(event.end, timeZone), -1)
    : dayKeyOf(new Date(event.end.getTime() - 1), timeZone);

  if (compareDayKeys(last, first) <= 0) return [first];

  const days: DayKey[] = [];
  for (let day = first; compareDayKeys(day, last) <= 0; day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
}

export type EventPriority = (calendarId: string) => number;

/**
 * All-day events first, then by start time, then by calendar priority,
 * then by title.
 */
export function compareEvents(a: CalendarEvent, b: CalendarEvent, priority?: EventPriority): number {
  if (a.isAllDay !== b.isAllDay) return a.isAllDay ? -1 : 1;
  const byStart = a.start.getTime() - b.start.getTime();
  if (byStart !== 0) return byStart;
  if (priority) {
    const byCalendar = priority(a.sourceCalendarId) - priority(b.sourceCalendarId);
    if (byCalendar !== 0) return byCalendar;
  }
  return a.title < b.title ? -1 : a.title > b.title ? 1 : 0;
}

export function sortEvents(events: readonly CalendarEvent[], priority?: EventPriority): CalendarEvent[] {
  return [...events].sort((a, b) => compareEvents(a, b, priority));
}

/**
 * Bucket events into the given days. Every requested day gets an entry, empty
 * when nothing touches it, and each bucket is sorted.
 */
export function groupEventsByDay(
  events: readonly CalendarEvent[],
  days: readonly DayKey[],
  timeZone: string,
  priority?: EventPriority,
): Map<DayKey, CalendarEvent[]> {
  const buckets = new Map<DayKey, CalendarEvent[]>(days.map((day) => [day, []]));
  for (const event of events) {
    for (const day of daysTouched(event, timeZone)) {
      buckets.get(day)?.push(event);
    }
  }
  for (const [day, bucket] of buckets) {
    buckets.set(day, sortEvents(bucket, priority));
  }
  return buckets;
}
