import { truncateToWidth } from '../typography/typography.js';
import type { CalendarEvent } from '../types.js';
import { sortEvents, type EventPriority } from './days.js';

export interface EventLine {
  kind: 'event';
  event: CalendarEvent;
  text: string;
}

export interface OverflowLine {
  kind: 'overflow';
  count: number;
  text: string;
}

export type RenderedLine = EventLine | OverflowLine;

export interface EventLayout {
  shown: RenderedLine[];
  overflowCount: number;
}

export interface LayoutOptions {
  /** Lines available for this cell, overflow indicator included. */
  capacity: number;
  showTime: boolean;
  /** Pixel width a line may occupy. */
  maxWidth: number;
  measure: (text: string) => number;
  formatTime: (date: Date) => string;
  /** `range` prefixes timed events with `start-end` instead of `start`. */
  timeStyle?: 'start' | 'range';
  /** Replaces the default title text, e.g. to append a calendar name. */
  describe?: (event: CalendarEvent) => string;
  priority?: EventPriority;
}

export function overflowText(count: number): string {
  return `+${count} more`;
}

/**
 * Pixel-free part of cell capacity: an explicit per-day maximum wins,
 * otherwise as many minimum-height lines as fit.
 */
export function resolveCapacity(maxEventsPerDay: number, cellHeight: number, minLineHeight: number): number {
  if (maxEventsPerDay > 0) return maxEventsPerDay;
  if (minLineHeight <= 0) return 0;
  return Math.max(0, Math.floor(cellHeight / minLineHeight));
}

function lineText(event: CalendarEvent, options: LayoutOptions): string {
  const title = options.describe ? options.describe(event) : event.title;
  if (!options.showTime || event.isAllDay) return title;

  const start = options.formatTime(event.start);
  const instant = event.end.getTime() <= event.start.getTime();
  if (options.timeStyle === 'range' && !instant) {
    return `${start}-${options.formatTime(event.end)} ${title}`;
  }
  return `${start} ${title}`;
}

/**
 * Decide which events a cell shows.
 *
 * With more events than capacity, the first `capacity - 1` are shown and the
 * last slot becomes a `+N more` line, so the cell never overflows silently.
 * A capacity of zero shows nothing and counts every event as overflow.
 */
export function layoutEvents(events: readonly CalendarEvent[], options: LayoutOptions): EventLayout {
  const sorted = sortEvents(events, options.priority);
  const capacity = Math.max(0, Math.floor(options.capacity));

  const toLine = (event: CalendarEvent): EventLine => ({
    kind: 'event',
    event,
    text: truncateToWidth(lineText(event, options), options.maxWidth, options.measure),
  });

  if (sorted.length <= capacity) {
    return { shown: sorted.map(toLine), overflowCount: 0 };
  }
  if (capacity === 0) {
    return { shown: [], overflowCount: sorted.length };
  }

  const visible = sorted.slice(0, capacity - 1);
  const overflowCount = sorted.length - visible.length;
  const indicator: OverflowLine = {
    kind: 'overflow',
    count: overflowCount,
    text: truncateToWidth(overflowText(overflowCount), options.maxWidth, options.measure),
  };
  return { shown: [...visible.map(toLine), indicator], overflowCount };
}
