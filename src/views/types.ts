import type { ViewConfig, ViewMode } from '../config.js';
import type { DayKey } from '../dates.js';
import type { CalendarDirectory } from '../layout/days.js';
import type { IndexedImage } from '../raster.js';
import type { CalendarEvent } from '../types.js';
import type { TypographySelector } from '../typography/typography.js';
import type { BadgeContext } from '../weather/badge.js';

/** Everything a composer needs to draw the body region of a frame. */
export interface ViewInput {
  /** Normalized events (end >= start). */
  events: readonly CalendarEvent[];
  /** Reference day, in the configured time zone. */
  today: DayKey;
  config: ViewConfig;
  width: number;
  height: number;
  typography: TypographySelector;
  calendars: CalendarDirectory;
}

export interface ViewComposer {
  mode: ViewMode;
  /** How the header band and weather badge are styled for this view. */
  context: BadgeContext;
  /** Header text describing the period shown. */
  label(today: DayKey, config: ViewConfig): string;
  compose(input: ViewInput): IndexedImage;
}
