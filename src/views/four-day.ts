import { compareDayKeys, dayKeyOf, dayRange, formatRangeLabel, formatTime, zonedFields, type DayKey } from '../dates.js';
import { groupEventsByDay } from '../layout/days.js';
import { layoutEvents, overflowText, resolveCapacity, type EventLayout } from '../layout/event-layout.js';
import { ColorIndex, contrastingInk, resolveCalendarColor } from '../palette.js';
import { createImage, drawDashedHLine, fillRect, strokeRect, type IndexedImage, type Rect } from '../raster.js';
import type { CalendarEvent, LayoutCell } from '../types.js';
import { drawText, measureText, truncateToWidth, type FontHandle } from '../typography/typography.js';
import { CELL_PADDING, dayLabel, drawCellFrame, drawEventLine, gridRects, isInstant, labelFontFor, lineTextWidth } from './grid.js';
import type { ViewComposer, ViewInput } from './types.js';

// ============================================================================
// Four-day timeline
// ============================================================================

export const TIMELINE_START_HOUR = 6;
export const TIMELINE_END_HOUR = 22;
/** Shortest bar drawn for a timed event, in pixels. */
export const MIN_BAR_HEIGHT = 22;
/** Slot taken by a zero-length event, drawn as a marker line. */
export const INSTANT_HEIGHT = 12;
export const ALL_DAY_LINES = 2;
/** Horizontal shift per overlapping bar. */
export const NUDGE = 6;
export const MAX_NUDGE_LEVEL = 3;

const START_MINUTE = TIMELINE_START_HOUR * 60;
const END_MINUTE = TIMELINE_END_HOUR * 60;

export interface TimelineBar {
  event: CalendarEvent;
  top: number;
  bottom: number;
  /** Overlapping bars already placed above this one. */
  level: number;
  /** Zero-length event; drawn as a marker rather than a bar. */
  instant: boolean;
}

export interface FourDayColumn extends LayoutCell {
  label: string;
  allDay: EventLayout;
  allDayArea: Rect;
  timeline: Rect;
  bars: TimelineBar[];
  /** Timed events left out, shown as `+N more`. */
  hidden: number;
}

export interface FourDayPlan {
  gutter: Rect;
  columns: FourDayColumn[];
}

/** Minutes since midnight of `day`, pinned to 0 or 1440 outside it. */
export function minuteOnDay(date: Date, day: DayKey, timeZone: string): number {
  const order = compareDayKeys(dayKeyOf(date, timeZone), day);
  if (order < 0) return 0;
  if (order > 0) return 24 * 60;
  const { hour, minute } = zonedFields(date, timeZone);
  return hour * 60 + minute;
}

function clampMinute(minute: number): number {
  return Math.min(END_MINUTE, Math.max(START_MINUTE, minute));
}

/**
 * Place timed events on a vertical 06:00-22:00 scale. Bars are at least
 * {@link MIN_BAR_HEIGHT} tall and kept inside the timeline; instants take a
 * single {@link INSTANT_HEIGHT} slot at their time. A bar that
 * overlaps earlier ones is nudged right, and beyond {@link MAX_NUDGE_LEVEL}
 * it is hidden instead.
 */
export function placeTimedEvents(
  events: readonly CalendarEvent[],
  day: DayKey,
  timeZone: string,
  timeline: Rect,
  capacity: number,
): { bars: TimelineBar[]; hidden: number } {
  const limit = Math.max(0, Math.floor(capacity));
  const candidates = events.length > limit ? events.slice(0, Math.max(0, limit - 1)) : [...events];
  let hidden = events.length - candidates.length;

  const span = END_MINUTE - START_MINUTE;
  const floor = timeline.y + timeline.height;
  const bars: TimelineBar[] = [];

  for (const event of candidates) {
    const instant = isInstant(event);
    const minBar = Math.min(instant ? INSTANT_HEIGHT : MIN_BAR_HEIGHT, timeline.height);
    const startMinute = clampMinute(minuteOnDay(event.start, day, timeZone));
    const endMinute = clampMinute(minuteOnDay(event.end, day, timeZone));
    let top = timeline.y + Math.round(((startMinute - START_MINUTE) / span) * timeline.height);
    let bottom = Math.max(timeline.y + Math.round(((endMinute - START_MINUTE) / span) * timeline.height), top + minBar);
    if (bottom > floor) {
      bottom = floor;
      top = Math.min(top, bottom - minBar);
    }

    const level = bars.filter((bar) => bar.top < bottom && top < bar.bottom).length;
    if (level > MAX_NUDGE_LEVEL) {
      hidden++;
      continue;
    }
    bars.push({ event, top, bottom, level, instant });
  }
  return { bars, hidden };
}

export function fourDayDays(today: DayKey): DayKey[] {
  return dayRange(today, 4);
}

export function planFourDay(input: ViewInput): FourDayPlan {
  const { config, typography } = input;
  const days = fourDayDays(input.today);
  const buckets = groupEventsByDay(input.events, days, config.timeZone, input.calendars.priority);
  const font = typography.smallest('body');

  const gutterWidth = measureText(font, '00') + 2 * CELL_PADDING;
  const gutter: Rect = { x: 0, y: 0, width: gutterWidth, height: input.height };
  const [row] = gridRects(gutterWidth, 0, input.width - gutterWidth, input.height, 1, 4);

  // one label size for every column keeps the timelines aligned
  const widest = days.map(dayLabel).reduce((a, b) => (b.length > a.length ? b : a));
  const labelFont = labelFontFor(typography, widest, row[0]);

  const columns = days.map((day, i): FourDayColumn => {
    const rect = row[i];
    const events = buckets.get(day) ?? [];
    const inner = rect.width - 2 * CELL_PADDING;

    const allDayArea: Rect = {
      x: rect.x + CELL_PADDING,
      y: rect.y + CELL_PADDING + labelFont.lineHeight,
      width: inner,
      height: ALL_DAY_LINES * font.lineHeight,
    };
    const timelineTop = allDayArea.y + allDayArea.height + CELL_PADDING;
    const timeline: Rect = {
      x: rect.x + CELL_PADDING,
      y: timelineTop,
      width: inner,
      height: Math.max(0, rect.y + rect.height - CELL_PADDING - timelineTop),
    };

    const allDay = layoutEvents(
      events.filter((event) => event.isAllDay),
      {
        capacity: ALL_DAY_LINES,
        showTime: false,
        maxWidth: lineTextWidth(inner, font),
        measure: (text) => measureText(font, text),
        formatTime: (date) => formatTime(date, config.timeZone, config.timeFormat),
        priority: input.calendars.priority,
      },
    );

    const capacity = resolveCapacity(config.fourDay.maxEventsPerDay, timeline.height, MIN_BAR_HEIGHT);
    const { bars, hidden } = placeTimedEvents(
      events.filter((event) => !event.isAllDay),
      day,
      config.timeZone,
      timeline,
      capacity,
    );

    return {
      rect,
      day,
      events,
      isToday: day === input.today,
      isAdjacent: false,
      labelFont,
      font,
      label: dayLabel(day),
      allDay,
      allDayArea,
      timeline,
      bars,
      hidden,
    };
  });

  return { gutter, columns };
}

function drawHourScale(image: IndexedImage, plan: FourDayPlan, font: FontHandle): void {
  const first = plan.columns[0];
  const last = plan.columns[plan.columns.length - 1];
  if (!first || !last) return;
  const { timeline } = first;
  const span = END_MINUTE - START_MINUTE;

  for (let hour = TIMELINE_START_HOUR; hour <= TIMELINE_END_HOUR; hour += 2) {
    const y = timeline.y + Math.round(((hour * 60 - START_MINUTE) / span) * timeline.height);
    const label = String(hour).padStart(2, '0');
    drawText(image, font, plan.gutter.x + CELL_PADDING, Math.max(0, y - Math.floor(font.glyphHeight / 2)), label, ColorIndex.BLACK);
    drawDashedHLine(image, y, first.rect.x, last.rect.x + last.rect.width, ColorIndex.BLACK, 2, 6);
  }
}

function drawBar(image: IndexedImage, bar: TimelineBar, timeline: Rect, font: FontHandle, input: ViewInput): void {
  const x = timeline.x + bar.level * NUDGE;
  const width = timeline.width - bar.level * NUDGE;
  const { config } = input;
  const prefix = config.fourDay.showTime ? `${formatTime(bar.event.start, config.timeZone, config.timeFormat)} ` : '';

  if (bar.instant) {
    const text = truncateToWidth(`${prefix}${bar.event.title}`, lineTextWidth(width, font), (value) => measureText(font, value));
    drawEventLine(image, { kind: 'event', event: bar.event, text }, x, bar.top, width, font, 'marker');
    return;
  }

  const height = bar.bottom - bar.top;
  const color = resolveCalendarColor(bar.event.colorKey);
  fillRect(image, x, bar.top, width, height, color);
  strokeRect(image, { x, y: bar.top, width, height }, ColorIndex.BLACK, 1);

  if (height < font.glyphHeight + 4) return;
  const text = truncateToWidth(`${prefix}${bar.event.title}`, width - 6, (value) => measureText(font, value));
  drawText(image, font, x + 3, bar.top + 3, text, contrastingInk(color));
}

export const fourDayView: ViewComposer = {
  mode: 'four_day',
  context: 'grid',
  label(today) {
    const days = fourDayDays(today);
    return formatRangeLabel(days[0], days[days.length - 1]);
  },
  compose(input) {
    const image = createImage(input.width, input.height);
    const plan = planFourDay(input);
    const font = input.typography.smallest('body');

    drawHourScale(image, plan, font);
    for (const column of plan.columns) {
      drawCellFrame(image, column, column.label);

      let y = column.allDayArea.y;
      for (const line of column.allDay.shown) {
        drawEventLine(image, line, column.allDayArea.x, y, column.allDayArea.width, font, 'bar');
        y += font.lineHeight;
      }

      for (const bar of column.bars) {
        drawBar(image, bar, column.timeline, font, input);
      }

      if (column.hidden > 0) {
        const { timeline } = column;
        const lineY = timeline.y + timeline.height - font.lineHeight;
        fillRect(image, timeline.x, lineY, timeline.width, font.lineHeight, ColorIndex.WHITE);
        drawText(image, font, timeline.x, lineY + Math.floor((font.lineHeight - font.glyphHeight) / 2), overflowText(column.hidden), ColorIndex.BLACK);
      }
    }
    return image;
  },
};
