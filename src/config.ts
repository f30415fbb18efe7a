/**
 * Render configuration schema using Zod.
 *
 * The configuration is validated once at the boundary and treated as
 * immutable for the rest of a render. Every recognized option and its
 * default is listed here; unknown properties are rejected.
 *
 * Configuration Property Names:
 * - viewMode: Layout to render ('two_week' | 'month' | 'week' | 'four_day' | 'agenda')
 * - width, height: Output canvas size in pixels, after rotation
 * - rotation: Clockwise rotation applied last (0, 90, 180, 270)
 * - weekStart: First column of week-based grids ('monday' | 'sunday')
 * - timeZone: IANA zone used to place events on calendar days
 * - timeFormat: Event time prefix style ('24h' | '12h')
 * - temperatureUnit: Unit letter shown after the temperature ('F' | 'C')
 * - calendars: Calendar display names and colors, in priority order
 * - colorCycle: Order used when calendars beyond four share colors
 * - fontFamilies: Bitmap font families, most preferred first
 * - twoWeek, week, fourDay: showTime, maxEventsPerDay (0 = derive from cell height)
 * - month: showAdjacentDays
 * - agenda: daysAhead, showAllEvents, maxEventsPerDay, showLegend
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { ASSIGNABLE_COLORS } from './palette.js';
import { DEFAULT_FONT_FAMILIES } from './typography/typography.js';

export const ViewModeSchema = z.enum(['two_week', 'month', 'week', 'four_day', 'agenda']);
export type ViewMode = z.infer<typeof ViewModeSchema>;

const maxEventsPerDay = z
  .number()
  .int()
  .min(0, 'maxEventsPerDay must be 0 (derive) or more')
  .max(50, 'maxEventsPerDay must be at most 50');

function gridViewSchema(defaults: { showTime: boolean; maxEventsPerDay: number }) {
  return z
    .object({
      showTime: z.boolean().default(defaults.showTime),
      maxEventsPerDay: maxEventsPerDay.default(defaults.maxEventsPerDay),
    })
    .strict()
    .default({});
}

function isTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

export const CalendarConfigSchema = z
  .object({
    id: z.string().min(1),
    displayName: z.string().min(1).optional(),
    color: z.enum(ASSIGNABLE_COLORS).optional(),
  })
  .strict();

export type CalendarConfig = z.infer<typeof CalendarConfigSchema>;

export const ViewConfigSchema = z
  .object({
    viewMode: ViewModeSchema.default('two_week'),
    width: z.number().int().min(64).max(4096).default(800),
    height: z.number().int().min(64).max(4096).default(480),
    rotation: z.union([z.literal(0), z.literal(90), z.literal(180), z.literal(270)]).default(0),
    weekStart: z.enum(['monday', 'sunday']).default('monday'),
    timeZone: z.string().refine(isTimeZone, { message: 'timeZone must be an IANA time zone' }).default('UTC'),
    timeFormat: z.enum(['24h', '12h']).default('24h'),
    temperatureUnit: z.enum(['F', 'C']).default('F'),
    calendars: z
      .array(CalendarConfigSchema)
      .default([])
      .refine((calendars) => new Set(calendars.map((c) => c.id)).size === calendars.length, {
        message: 'calendar ids must be unique',
      }),
    colorCycle: z.enum(['declaration_order', 'calendar_id']).default('declaration_order'),
    fontFamilies: z.array(z.string().min(1)).default([...DEFAULT_FONT_FAMILIES]),

    twoWeek: gridViewSchema({ showTime: true, maxEventsPerDay: 3 }),
    week: gridViewSchema({ showTime: true, maxEventsPerDay: 0 }),
    fourDay: gridViewSchema({ showTime: true, maxEventsPerDay: 10 }),
    month: z
      .object({
        showAdjacentDays: z.boolean().default(true),
      })
      .strict()
      .default({}),
    agenda: z
      .object({
        daysAhead: z.number().int().min(1).max(60).default(14),
        showAllEvents: z.boolean().default(true),
        maxEventsPerDay: maxEventsPerDay.default(0),
        showLegend: z.boolean().default(true),
      })
      .strict()
      .default({}),
  })
  .strict();

export type ViewConfig = z.infer<typeof ViewConfigSchema>;
export type RawViewConfig = z.input<typeof ViewConfigSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Validates raw configuration and fills in defaults.
 * @throws {ConfigError} listing every invalid or unknown property
 */
export function parseViewConfig(raw: unknown): ViewConfig {
  const result = ViewConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const first = result.error.issues[0];
    throw new ConfigError(
      `Invalid view configuration: ${formatIssues(result.error)}`,
      'INVALID_CONFIG',
      first ? first.path.join('.') : undefined,
    );
  }
  return result.data;
}

/** Layout canvas size before rotation. */
export function layoutSize(config: Pick<ViewConfig, 'width' | 'height' | 'rotation'>): { width: number; height: number } {
  const swap = config.rotation === 90 || config.rotation === 270;
  return swap ? { width: config.height, height: config.width } : { width: config.width, height: config.height };
}
