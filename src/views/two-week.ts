import { dayRange, formatRangeLabel, startOfWeek, type DayKey, type WeekStart } from '../dates.js';
import { groupEventsByDay } from '../layout/days.js';
import { createImage } from '../raster.js';
import { drawDayCell, gridRects, planDayCell, type PlannedDayCell } from './grid.js';
import type { ViewComposer, ViewInput } from './types.js';

/** The current week and the next, from the configured week start. */
export function twoWeekDays(today: DayKey, weekStart: WeekStart): DayKey[] {
  return dayRange(startOfWeek(today, weekStart), 14);
}

export function planTwoWeek(input: ViewInput): PlannedDayCell[] {
  const { config } = input;
  const days = twoWeekDays(input.today, config.weekStart);
  const buckets = groupEventsByDay(input.events, days, config.timeZone, input.calendars.priority);
  const rects = gridRects(0, 0, input.width, input.height, 2, 7);

  return days.map((day, i) =>
    planDayCell(input, rects[Math.floor(i / 7)][i % 7], day, buckets.get(day) ?? [], {
      style: 'bar',
      showTime: config.twoWeek.showTime,
      maxEventsPerDay: config.twoWeek.maxEventsPerDay,
    }),
  );
}

export const twoWeekView: ViewComposer = {
  mode: 'two_week',
  context: 'grid',
  label(today, config) {
    const days = twoWeekDays(today, config.weekStart);
    return formatRangeLabel(days[0], days[days.length - 1]);
  },
  compose(input) {
    const image = createImage(input.width, input.height);
    for (const cell of planTwoWeek(input)) {
      drawDayCell(image, cell, 'bar');
    }
    return image;
  },
};
