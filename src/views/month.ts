import {
  dayOfMonth,
  dayRange,
  daysInMonth,
  formatMonthLabel,
  monthOf,
  startOfMonth,
  startOfWeek,
  weekdayNames,
  weekdayOf,
  type DayKey,
  type WeekStart,
} from '../dates.js';
import { groupEventsByDay, sortEvents, type EventPriority } from '../layout/days.js';
import { ASSIGNABLE_COLORS, ColorIndex, resolveCalendarColor, type AssignableColor } from '../palette.js';
import { createImage, fillCircle, type IndexedImage, type Rect } from '../raster.js';
import type { CalendarEvent, LayoutCell } from '../types.js';
import { drawText, measureText, type FontHandle } from '../typography/typography.js';
import { CELL_PADDING, drawCellFrame, gridRects, labelFontFor } from './grid.js';
import type { ViewComposer, ViewInput } from './types.js';

export interface MonthGrid {
  days: DayKey[];
  /** 4 to 6 week rows. */
  rows: number;
}

export interface MonthCell extends LayoutCell {
  /** Day number, or '' when adjacent days are hidden. */
  label: string;
  dots: AssignableColor[];
}

export function monthGridDays(today: DayKey, weekStart: WeekStart): MonthGrid {
  const first = startOfMonth(today);
  const leading = (weekdayOf(first) - (weekStart === 'monday' ? 1 : 0) + 7) % 7;
  const rows = Math.ceil((leading + daysInMonth(today)) / 7);
  return { days: dayRange(startOfWeek(first, weekStart), rows * 7), rows };
}

/**
 * One color per calendar color with events that day, in the order the
 * events sort. At most one dot per assignable color.
 */
export function dotColorsForDay(events: readonly CalendarEvent[], priority?: EventPriority): AssignableColor[] {
  const colors: AssignableColor[] = [];
  for (const event of sortEvents(events, priority)) {
    if (!colors.includes(event.colorKey)) colors.push(event.colorKey);
    if (colors.length === ASSIGNABLE_COLORS.length) break;
  }
  return colors;
}

export interface MonthPlan {
  headerFont: FontHandle;
  /** Band holding the weekday names above the grid. */
  weekdayHeader: Rect;
  cells: MonthCell[];
}

export function planMonth(input: ViewInput): MonthPlan {
  const { config, typography } = input;
  const { days, rows } = monthGridDays(input.today, config.weekStart);
  const buckets = groupEventsByDay(input.events, days, config.timeZone, input.calendars.priority);
  const month = monthOf(input.today);

  const headerFont = typography.select('label', Math.floor(input.height / 10), 1);
  const weekdayHeader: Rect = { x: 0, y: 0, width: input.width, height: headerFont.lineHeight + 2 * CELL_PADDING };
  const rects = gridRects(0, weekdayHeader.height, input.width, input.height - weekdayHeader.height, rows, 7);

  const cells = days.map((day, i): MonthCell => {
    const rect = rects[Math.floor(i / 7)][i % 7];
    const isAdjacent = monthOf(day) !== month;
    const hidden = isAdjacent && !config.month.showAdjacentDays;
    const label = hidden ? '' : String(dayOfMonth(day));
    const labelFont = labelFontFor(typography, '30', rect);
    const events = buckets.get(day) ?? [];
    return {
      rect,
      day,
      events,
      isToday: day === input.today,
      isAdjacent,
      labelFont,
      font: labelFont,
      label,
      dots: isAdjacent ? [] : dotColorsForDay(events, input.calendars.priority),
    };
  });

  return { headerFont, weekdayHeader, cells };
}

function drawDots(image: IndexedImage, cell: MonthCell): void {
  if (cell.dots.length === 0) return;
  const { rect } = cell;
  const r = Math.max(2, Math.floor(Math.min(rect.width, rect.height) / 10));
  const total = cell.dots.length * 2 * r + (cell.dots.length - 1) * r;
  const cy = rect.y + rect.height - CELL_PADDING - r - 1;
  let cx = rect.x + Math.floor((rect.width - total) / 2) + r;
  for (const color of cell.dots) {
    // dark rim keeps yellow visible on white
    fillCircle(image, cx, cy, r + 1, ColorIndex.BLACK);
    fillCircle(image, cx, cy, r, resolveCalendarColor(color));
    cx += 3 * r;
  }
}

export const monthView: ViewComposer = {
  mode: 'month',
  context: 'grid',
  label: (today) => formatMonthLabel(today),
  compose(input) {
    const image = createImage(input.width, input.height);
    const { headerFont, weekdayHeader, cells } = planMonth(input);

    const names = weekdayNames(input.config.weekStart);
    const columns = gridRects(0, 0, input.width, weekdayHeader.height, 1, 7)[0];
    names.forEach((name, i) => {
      const column = columns[i];
      const x = column.x + Math.floor((column.width - measureText(headerFont, name)) / 2);
      drawText(image, headerFont, x, weekdayHeader.y + CELL_PADDING, name, ColorIndex.BLACK);
    });

    for (const cell of cells) {
      drawCellFrame(image, cell, cell.label, cell.isAdjacent);
      drawDots(image, cell);
    }
    return image;
  },
};
