import { addDays, dayRange, formatLongDay, formatTime, yearOf, type DayKey } from '../dates.js';
import { groupEventsByDay } from '../layout/days.js';
import { layoutEvents, overflowText, type EventLine, type RenderedLine } from '../layout/event-layout.js';
import { ColorIndex, resolveCalendarColor } from '../palette.js';
import { createImage, drawDashedHLine, drawHLine, fillRect, type IndexedImage } from '../raster.js';
import type { CalendarEvent } from '../types.js';
import { drawText, fontHandle, measureText, type FontHandle } from '../typography/typography.js';
import { MARKER_GAP } from './grid.js';
import type { ViewComposer, ViewInput } from './types.js';

// ============================================================================
// Agenda list
// ============================================================================

export const AGENDA_PADDING = 12;
/** Extra space around the dashed line between day groups. */
export const SEPARATOR_GAP = 6;
export const ALL_DAY_TEXT = 'All day';
export const EMPTY_DAY_TEXT = 'No events';

export interface AgendaGroup {
  day: DayKey;
  header: string;
  /** Event and overflow lines; empty only for today. */
  lines: RenderedLine[];
}

export interface AgendaPlan {
  font: FontHandle;
  headerFont: FontHandle;
  /** Width of the time column. */
  timeWidth: number;
  groups: AgendaGroup[];
}

export type AgendaRow =
  | { kind: 'header'; text: string; first: boolean }
  | { kind: 'event'; line: EventLine }
  | { kind: 'overflow'; count: number }
  | { kind: 'empty' };

export interface PlacedRow {
  row: AgendaRow;
  /** Top of the row's line. */
  y: number;
  /** Dashed line above a day header. */
  separatorY?: number;
}

export function agendaDayHeader(day: DayKey, today: DayKey): string {
  if (day === today) return `TODAY - ${formatLongDay(day)}`;
  if (day === addDays(today, 1)) return `TOMORROW - ${formatLongDay(day)}`;
  return formatLongDay(day);
}

function perDayCapacity(input: ViewInput): number {
  const { showAllEvents, maxEventsPerDay } = input.config.agenda;
  return showAllEvents || maxEventsPerDay === 0 ? Number.POSITIVE_INFINITY : maxEventsPerDay;
}

/**
 * Group events by day for `daysAhead` days from today. Days without events
 * are skipped, except today, which always gets a group.
 */
export function planAgenda(input: ViewInput): AgendaPlan {
  const { config, typography, calendars } = input;
  const days = dayRange(input.today, config.agenda.daysAhead);
  const buckets = groupEventsByDay(input.events, days, config.timeZone, calendars.priority);
  const visible = days.filter((day) => day === input.today || (buckets.get(day) ?? []).length > 0);
  const capacity = perDayCapacity(input);

  const rowCount = visible.reduce((sum, day) => sum + 1 + Math.max(1, Math.min(buckets.get(day)?.length ?? 0, capacity)), 0);
  const available = input.height - 2 * AGENDA_PADDING - Math.max(0, visible.length - 1) * SEPARATOR_GAP;
  const font = typography.select('body', available, rowCount);
  const headerFont = fontHandle(font.font, 'label', font.scale);

  const timeSample = config.timeFormat === '12h' ? '12:00 PM' : '00:00';
  const timeWidth = Math.max(measureText(font, timeSample), measureText(font, ALL_DAY_TEXT));
  const textWidth = Math.max(0, input.width - 2 * AGENDA_PADDING - font.glyphHeight - MARKER_GAP - timeWidth - MARKER_GAP);

  const groups = visible.map((day): AgendaGroup => {
    const layout = layoutEvents(buckets.get(day) ?? [], {
      capacity,
      showTime: false,
      maxWidth: textWidth,
      measure: (text) => measureText(font, text),
      formatTime: (date) => formatTime(date, config.timeZone, config.timeFormat),
      describe: (event) => `${event.title} (${calendars.displayName(event.sourceCalendarId)})`,
      priority: calendars.priority,
    });
    return { day, header: agendaDayHeader(day, input.today), lines: layout.shown };
  });

  return { font, headerFont, timeWidth, groups };
}

function toRows(groups: readonly AgendaGroup[]): AgendaRow[] {
  const rows: AgendaRow[] = [];
  groups.forEach((group, index) => {
    rows.push({ kind: 'header', text: group.header, first: index === 0 });
    if (group.lines.length === 0) rows.push({ kind: 'empty' });
    for (const line of group.lines) {
      rows.push(line.kind === 'event' ? { kind: 'event', line } : { kind: 'overflow', count: line.count });
    }
  });
  return rows;
}

function eventsIn(rows: readonly AgendaRow[]): number {
  return rows.reduce((sum, row) => sum + (row.kind === 'event' ? 1 : row.kind === 'overflow' ? row.count : 0), 0);
}

function timeColumnText(event: CalendarEvent, input: ViewInput): string {
  if (event.isAllDay) return ALL_DAY_TEXT;
  return formatTime(event.start, input.config.timeZone, input.config.timeFormat);
}

/**
 * Lay rows out top to bottom on a page `height` tall. When the page runs
 * out, the last line that fits becomes `+N more` counting every event not
 * placed.
 */
export function paginateAgenda(plan: AgendaPlan, height: number): PlacedRow[] {
  const { font } = plan;
  const rows = toRows(plan.groups);
  const bottom = height - AGENDA_PADDING;
  const placed: PlacedRow[] = [];
  let y = AGENDA_PADDING;

  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    let separatorY: number | undefined;
    if (row.kind === 'header' && !row.first) {
      separatorY = y + Math.floor(SEPARATOR_GAP / 2);
      y += SEPARATOR_GAP;
    }

    const rest = rows.slice(i);
    const isLast = i === rows.length - 1;
    if (y + font.lineHeight > bottom || (!isLast && y + 2 * font.lineHeight > bottom && eventsIn(rest) > 0)) {
      const remaining = eventsIn(rest);
      if (remaining > 0 && y + font.lineHeight <= bottom) {
        placed.push({ row: { kind: 'overflow', count: remaining }, y });
      }
      return placed;
    }

    placed.push({ row, y, separatorY });
    y += font.lineHeight;
  }
  return placed;
}

function drawRows(image: IndexedImage, plan: AgendaPlan, input: ViewInput): void {
  const { font, headerFont } = plan;
  const left = AGENDA_PADDING;
  const right = input.width - AGENDA_PADDING;
  const textOffset = Math.floor((font.lineHeight - font.glyphHeight) / 2);

  for (const { row, y, separatorY } of paginateAgenda(plan, input.height)) {
    if (separatorY !== undefined) {
      drawDashedHLine(image, separatorY, left, right, ColorIndex.BLACK);
    }

    switch (row.kind) {
      case 'header': {
        const width = drawText(image, headerFont, left, y + textOffset, row.text, ColorIndex.BLACK, { bold: true });
        drawHLine(image, y + textOffset + headerFont.glyphHeight, left, left + width, ColorIndex.BLACK);
        break;
      }
      case 'event': {
        const { event, text } = row.line;
        fillRect(image, left, y + textOffset, font.glyphHeight, font.glyphHeight, resolveCalendarColor(event.colorKey));
        const timeX = left + font.glyphHeight + MARKER_GAP;
        drawText(image, font, timeX, y + textOffset, timeColumnText(event, input), ColorIndex.BLACK);
        drawText(image, font, timeX + plan.timeWidth + MARKER_GAP, y + textOffset, text, ColorIndex.BLACK);
        break;
      }
      case 'overflow':
        drawText(image, font, left, y + textOffset, overflowText(row.count), ColorIndex.BLACK);
        break;
      case 'empty':
        drawText(image, font, left, y + textOffset, EMPTY_DAY_TEXT, ColorIndex.BLACK, { muted: true });
        break;
    }
  }
}

export const agendaView: ViewComposer = {
  mode: 'agenda',
  context: 'agenda',
  label: (today) => `${formatLongDay(today)}, ${yearOf(today)}`,
  compose(input) {
    const image = createImage(input.width, input.height);
    drawRows(image, planAgenda(input), input);
    return image;
  },
};
