/**
 * Scene file schema using Zod.
 *
 * A scene bundles everything one render needs so it can be kept as a JSON
 * file and rendered from the command line.
 *
 * Scene Property Names:
 * - config: View configuration (see config.ts)
 * - now: ISO timestamp used as the reference instant (defaults to the caller's clock)
 * - footerText: Status line for the footer
 * - weather: { condition, temperature, isValid }; omitted means no weather
 * - events: [{ id?, calendar, title, start, end, allDay?, color? }]
 *   start/end are ISO timestamps with offset, or YYYY-MM-DD for all-day events
 */

import { z } from 'zod';
import { ViewConfigSchema, formatIssues, type ViewConfig } from './config.js';
import { isDayKey, startOfDayIn } from './dates.js';
import { ConfigError } from './errors.js';
import { ASSIGNABLE_COLORS, assignCalendarColors, isAssignableColor, type AssignableColor } from './palette.js';
import { INVALID_WEATHER, type CalendarEvent, type WeatherSnapshot } from './types.js';

const Timestamp = z.union([z.string().datetime({ offset: true }), z.string().date()]);

export const SceneEventSchema = z
  .object({
    id: z.string().optional(),
    calendar: z.string().min(1),
    title: z.string(),
    start: Timestamp,
    end: Timestamp,
    allDay: z.boolean().default(false),
    color: z.string().optional(),
  })
  .strict();

export const WeatherSchema = z
  .object({
    condition: z.string(),
    temperature: z.number(),
    isValid: z.boolean().default(true),
  })
  .strict();

export const SceneSchema = z
  .object({
    config: ViewConfigSchema.default({}),
    now: z.string().datetime({ offset: true }).optional(),
    footerText: z.string().optional(),
    weather: WeatherSchema.optional(),
    events: z.array(SceneEventSchema).default([]),
  })
  .strict();

export type RawScene = z.input<typeof SceneSchema>;

export interface Scene {
  config: ViewConfig;
  now: Date;
  footerText?: string;
  weather: WeatherSnapshot;
  events: CalendarEvent[];
}

function toInstant(value: string, timeZone: string): Date {
  return isDayKey(value) ? startOfDayIn(value, timeZone) : new Date(value);
}

/**
 * Validate a scene and resolve each event's color: an explicit event color
 * wins, otherwise the calendar's configured or cycled color. Calendars the
 * config does not list are colored after the listed ones, in order of first use.
 * @throws {ConfigError} on any schema violation or unassignable event color
 */
export function parseScene(raw: unknown, fallbackNow: Date = new Date()): Scene {
  const result = SceneSchema.safeParse(raw ?? {});
  if (!result.success) {
    const first = result.error.issues[0];
    throw new ConfigError(`Invalid scene: ${formatIssues(result.error)}`, 'INVALID_SCENE', first ? first.path.join('.') : undefined);
  }
  const scene = result.data;
  const { config } = scene;

  // Configured calendars keep the colors the legend shows; the rest continue the cycle
  const colors = assignCalendarColors(config.calendars, config.colorCycle);
  let next = config.calendars.length;
  for (const event of scene.events) {
    if (!colors.has(event.calendar)) {
      colors.set(event.calendar, ASSIGNABLE_COLORS[next % ASSIGNABLE_COLORS.length]);
      next++;
    }
  }

  const events = scene.events.map((event, index): CalendarEvent => {
    let colorKey: AssignableColor | undefined = colors.get(event.calendar);
    if (event.color !== undefined) {
      const explicit = event.color.trim().toLowerCase();
      if (!isAssignableColor(explicit)) {
        throw new ConfigError(`Event "${event.title}" uses color "${event.color}"`, 'INVALID_CALENDAR_COLOR', `events.${index}.color`);
      }
      colorKey = explicit;
    }
    if (colorKey === undefined) {
      throw new ConfigError(`No color for calendar "${event.calendar}"`, 'INVALID_CALENDAR_COLOR', `events.${index}.calendar`);
    }
    return {
      id: event.id,
      sourceCalendarId: event.calendar,
      title: event.title,
      start: toInstant(event.start, config.timeZone),
      end: toInstant(event.end, config.timeZone),
      isAllDay: event.allDay,
      colorKey,
    };
  });

  return {
    config,
    now: scene.now ? new Date(scene.now) : fallbackNow,
    footerText: scene.footerText,
    weather: scene.weather ?? INVALID_WEATHER,
    events,
  };
}
