import { parseViewConfig, type RawViewConfig } from '../src/config.js';
import { createCalendarDirectory } from '../src/layout/days.js';
import { ColorIndex } from '../src/palette.js';
import type { IndexedImage, Rect } from '../src/raster.js';
import type { CalendarEvent } from '../src/types.js';
import { FontCache } from '../src/typography/font-cache.js';
import { TypographySelector } from '../src/typography/typography.js';
import type { ViewInput } from '../src/views/types.js';

/** Monday. */
export const TODAY = '2026-10-19';

export const fonts = new FontCache();

export function timed(title: string, start: string, end: string, overrides: Partial<CalendarEvent> = {}): CalendarEvent {
  return {
    sourceCalendarId: 'family',
    title,
    start: new Date(start),
    end: new Date(end),
    isAllDay: false,
    colorKey: 'red',
    ...overrides,
  };
}

/** All-day event in UTC; `endDay` is exclusive. */
export function allDay(title: string, startDay: string, endDay: string, overrides: Partial<CalendarEvent> = {}): CalendarEvent {
  return timed(title, `${startDay}T00:00:00Z`, `${endDay}T00:00:00Z`, { isAllDay: true, ...overrides });
}

export function viewInput(
  raw: RawViewConfig,
  events: readonly CalendarEvent[],
  size: { width: number; height: number } = { width: 800, height: 430 },
  today: string = TODAY,
): ViewInput {
  const config = parseViewConfig(raw);
  return {
    events,
    today,
    config,
    width: size.width,
    height: size.height,
    typography: new TypographySelector(fonts, config.fontFamilies),
    calendars: createCalendarDirectory(config.calendars),
  };
}

export function countColor(image: IndexedImage, color: ColorIndex, region?: Rect): number {
  const { x, y, width, height } = region ?? { x: 0, y: 0, width: image.width, height: image.height };
  let count = 0;
  for (let py = y; py < y + height; py++) {
    for (let px = x; px < x + width; px++) {
      if (image.pixels[py * image.width + px] === color) count++;
    }
  }
  return count;
}
