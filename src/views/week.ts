import { dayRange, formatRangeLabel, startOfWeek, type DayKey, type WeekStart } from '../dates.js';
import { groupEventsByDay } from '../layout/days.js';
import { createImage } from '../raster.js';
import { drawDayCell, gridRects, planDayCell, type PlannedDayCell } from './grid.js';
import type { ViewComposer, ViewInput } from './types.js';

export function weekDays(today: DayKey, weekStart: WeekStart): DayKey[] {
  return dayRange(startOfWeek(today, weekStart), 7);
}

// Single row of tall cells; lines carry a time range and a color marker
export function planWeek(input: ViewInput): PlannedDayCell[] {
  const { config } = input;
  const days = weekDays(input.today, config.weekStart);
  const buckets = groupEventsByDay(input.events, days, config.timeZone, input.calendars.priority);
  const [row] = gridRects(0, 0, input.width, input.height, 1, 7);

  return days.map((day, i) =>
    planDayCell(input, row[i], day, buckets.get(day) ?? [], {
      style: 'marker',
      showTime: config.week.showTime,
      maxEventsPerDay: config.week.maxEventsPerDay,
      timeStyle: 'range',
    }),
  );
}

export const weekView: ViewComposer = {
  mode: 'week',
  context: 'grid',
  label(today, config) {
    const days = weekDays(today, config.weekStart);
    return formatRangeLabel(days[0], days[days.length - 1]);
  },
  compose(input) {
    const image = createImage(input.width, input.height);
    for (const cell of planWeek(input)) {
      drawDayCell(image, cell, 'marker');
    }
    return image;
  },
};
