import type { AssignableColor } from './palette.js';
import type { DayKey } from './dates.js';
import type { Rect } from './raster.js';
import type { FontHandle } from './typography/typography.js';

// Calendar event, already time-zone normalized and deduplicated upstream
export interface CalendarEvent {
  id?: string;
  sourceCalendarId: string;
  title: string;
  start: Date;
  end: Date;
  isAllDay: boolean;
  colorKey: AssignableColor;
}

export const WEATHER_CONDITIONS = [
  'sunny',
  'partlycloudy',
  'lightning',
  'lightning-rainy',
  'clear-night',
  'rainy',
  'pouring',
  'snowy',
  'snowy-rainy',
  'hail',
  'exceptional',
  'cloudy',
  'fog',
  'windy',
  'windy-variant',
] as const;

export type WeatherCondition = (typeof WEATHER_CONDITIONS)[number];

// Weather for the header badge; isValid=false when the weather source failed
export interface WeatherSnapshot {
  condition: string;
  temperature: number;
  isValid: boolean;
}

export const INVALID_WEATHER: WeatherSnapshot = { condition: 'exceptional', temperature: 0, isValid: false };

export function isWeatherCondition(value: string): value is WeatherCondition {
  return (WEATHER_CONDITIONS as readonly string[]).includes(value);
}

/** A grid cell planned for one day, discarded after the render. */
export interface LayoutCell {
  rect: Rect;
  day: DayKey;
  events: readonly CalendarEvent[];
  isToday: boolean;
  /** Day belongs to a neighbouring month (month view only). */
  isAdjacent: boolean;
  labelFont: FontHandle;
  /** Font for the cell's event lines. */
  font: FontHandle;
}
