import { SHORT_DAY_NAMES, dayOfMonth, formatTime, weekdayOf, type DayKey } from '../dates.js';
import { layoutEvents, resolveCapacity, type EventLayout, type RenderedLine } from '../layout/event-layout.js';
import { ColorIndex, contrastingInk, resolveCalendarColor } from '../palette.js';
import { fillRect, strokeRect, type IndexedImage, type Rect } from '../raster.js';
import type { CalendarEvent, LayoutCell } from '../types.js';
import { drawText, measureText, type FontHandle, type TypographySelector } from '../typography/typography.js';
import type { ViewInput } from './types.js';

// ============================================================================
// Shared day-cell grid
// ============================================================================

export const CELL_PADDING = 4;
export const TODAY_OUTLINE = 3;
export const MARKER_GAP = 3;

// Narrower lines than this drop the body font to its smallest size
const MIN_CHARS_PER_LINE = 12;

/** `bar` fills the line with the calendar color; `marker` draws a color square before black text. */
export type EventStyle = 'bar' | 'marker';

export interface DayCellOptions {
  style: EventStyle;
  showTime: boolean;
  maxEventsPerDay: number;
  timeStyle?: 'start' | 'range';
}

export interface PlannedDayCell extends LayoutCell {
  label: string;
  /** Region below the label that holds event lines. */
  area: Rect;
  layout: EventLayout;
}

/**
 * Split a region into rows x cols cells. Neighbouring cells share their
 * border pixel so 1px outlines do not double up.
 */
export function gridRects(x: number, y: number, width: number, height: number, rows: number, cols: number): Rect[][] {
  const xs = Array.from({ length: cols + 1 }, (_, i) => x + Math.round((i * width) / cols));
  const ys = Array.from({ length: rows + 1 }, (_, i) => y + Math.round((i * height) / rows));
  return Array.from({ length: rows }, (_, r) =>
    Array.from({ length: cols }, (_, c) => ({
      x: xs[c],
      y: ys[r],
      width: xs[c + 1] - xs[c] + (c < cols - 1 ? 1 : 0),
      height: ys[r + 1] - ys[r] + (r < rows - 1 ? 1 : 0),
    })),
  );
}

/** e.g. `MON 19` */
export function dayLabel(day: DayKey): string {
  return `${SHORT_DAY_NAMES[weekdayOf(day)]} ${dayOfMonth(day)}`;
}

export function labelFontFor(typography: TypographySelector, text: string, rect: Rect): FontHandle {
  const handle = typography.select('label', Math.floor(rect.height / 4), 1);
  if (measureText(handle, text) <= rect.width - 2 * CELL_PADDING) return handle;
  return typography.smallest('label');
}

export function bodyFontFor(typography: TypographySelector, area: Rect, lineCount: number): FontHandle {
  const handle = typography.select('body', area.height, lineCount);
  if (area.width / handle.advance < MIN_CHARS_PER_LINE) return typography.smallest('body');
  return handle;
}

/**
 * Lines a cell offers. A configured maximum is honoured only as far as
 * minimum-height lines physically fit, so nothing is clipped unannounced.
 */
export function cellCapacity(typography: TypographySelector, maxEventsPerDay: number, areaHeight: number): number {
  const minLine = typography.minLineHeight('body');
  return Math.min(resolveCapacity(maxEventsPerDay, areaHeight, minLine), resolveCapacity(0, areaHeight, minLine));
}

/** Pixels left for line text once the color marker is placed. */
export function lineTextWidth(width: number, font: FontHandle): number {
  return Math.max(0, width - font.glyphHeight - MARKER_GAP);
}

export function isInstant(event: CalendarEvent): boolean {
  return !event.isAllDay && event.end.getTime() <= event.start.getTime();
}

export function planDayCell(
  input: ViewInput,
  rect: Rect,
  day: DayKey,
  events: readonly CalendarEvent[],
  options: DayCellOptions,
): PlannedDayCell {
  const { typography, config } = input;
  const label = dayLabel(day);
  const labelFont = labelFontFor(typography, label, rect);
  const area: Rect = {
    x: rect.x + CELL_PADDING,
    y: rect.y + CELL_PADDING + labelFont.lineHeight,
    width: Math.max(0, rect.width - 2 * CELL_PADDING),
    height: Math.max(0, rect.height - 2 * CELL_PADDING - labelFont.lineHeight),
  };

  const capacity = cellCapacity(typography, options.maxEventsPerDay, area.height);
  const font = bodyFontFor(typography, area, Math.min(events.length, capacity));
  const layout = layoutEvents(events, {
    capacity,
    showTime: options.showTime,
    maxWidth: lineTextWidth(area.width, font),
    measure: (text) => measureText(font, text),
    formatTime: (date) => formatTime(date, config.timeZone, config.timeFormat),
    timeStyle: options.timeStyle,
    priority: input.calendars.priority,
  });

  return {
    rect,
    day,
    events,
    isToday: day === input.today,
    isAdjacent: false,
    labelFont,
    font,
    label,
    area,
    layout,
  };
}

/**
 * One event or overflow line, `font.lineHeight` tall. Instants are always
 * drawn as markers, whatever the style.
 */
export function drawEventLine(
  image: IndexedImage,
  line: RenderedLine,
  x: number,
  y: number,
  width: number,
  font: FontHandle,
  style: EventStyle,
): void {
  const textY = y + Math.floor((font.lineHeight - font.glyphHeight) / 2);
  if (line.kind === 'overflow') {
    drawText(image, font, x, textY, line.text, ColorIndex.BLACK);
    return;
  }

  const color = resolveCalendarColor(line.event.colorKey);
  if (style === 'bar' && !isInstant(line.event)) {
    fillRect(image, x, y, width, font.lineHeight - 1, color);
    drawText(image, font, x + MARKER_GAP, textY, line.text, contrastingInk(color));
    return;
  }

  const size = font.glyphHeight;
  fillRect(image, x, textY, size, size, color);
  drawText(image, font, x + size + MARKER_GAP, textY, line.text, ColorIndex.BLACK);
}

/** Border, today emphasis and the cell's label. Empty cells still get all three. */
export function drawCellFrame(image: IndexedImage, cell: LayoutCell, label: string, muted: boolean = false): void {
  strokeRect(image, cell.rect, ColorIndex.BLACK, 1);
  if (cell.isToday) {
    strokeRect(image, cell.rect, ColorIndex.BLACK, TODAY_OUTLINE);
  }
  if (label) {
    drawText(image, cell.labelFont, cell.rect.x + CELL_PADDING, cell.rect.y + CELL_PADDING, label, ColorIndex.BLACK, {
      bold: cell.isToday,
      muted,
    });
  }
}

export function drawDayCell(image: IndexedImage, cell: PlannedDayCell, style: EventStyle): void {
  drawCellFrame(image, cell, cell.label);
  let y = cell.area.y;
  for (const line of cell.layout.shown) {
    drawEventLine(image, line, cell.area.x, y, cell.area.width, cell.font, style);
    y += cell.font.lineHeight;
  }
}
