import { ConfigError } from './errors.js';

// Palette indices in the panel's native order
export const ColorIndex = {
  BLACK: 0,
  WHITE: 1,
  GREEN: 2,
  BLUE: 3,
  RED: 4,
  YELLOW: 5,
} as const;

export type ColorIndex = (typeof ColorIndex)[keyof typeof ColorIndex];

export const COLOR_NAMES = ['black', 'white', 'red', 'yellow', 'green', 'blue'] as const;
export type ColorName = (typeof COLOR_NAMES)[number];

/** Colors a calendar may be drawn in, in assignment priority order. */
export const ASSIGNABLE_COLORS = ['red', 'yellow', 'green', 'blue'] as const;
export type AssignableColor = (typeof ASSIGNABLE_COLORS)[number];

export type ColorCyclePolicy = 'declaration_order' | 'calendar_id';

const INDEX_BY_NAME: Record<ColorName, ColorIndex> = {
  black: ColorIndex.BLACK,
  white: ColorIndex.WHITE,
  red: ColorIndex.RED,
  yellow: ColorIndex.YELLOW,
  green: ColorIndex.GREEN,
  blue: ColorIndex.BLUE,
};

/** RGB value of each palette index, used when encoding to a regular image file. */
export const PALETTE_RGB: ReadonlyArray<readonly [number, number, number]> = [
  [0, 0, 0],
  [255, 255, 255],
  [0, 255, 0],
  [0, 0, 255],
  [255, 0, 0],
  [255, 255, 0],
];

export function isAssignableColor(value: string): value is AssignableColor {
  return (ASSIGNABLE_COLORS as readonly string[]).includes(value);
}

export function paletteIndex(name: ColorName): ColorIndex {
  return INDEX_BY_NAME[name];
}

/**
 * Resolve a calendar's color key to a palette index.
 * Black and white are reserved for text, outlines and background.
 */
export function resolveCalendarColor(key: string): ColorIndex {
  const normalized = key.trim().toLowerCase();
  if (!isAssignableColor(normalized)) {
    throw new ConfigError(
      `Calendar color "${key}" is not one of ${ASSIGNABLE_COLORS.join(', ')}`,
      'INVALID_CALENDAR_COLOR',
    );
  }
  return INDEX_BY_NAME[normalized];
}

/** Ink that stays legible on top of a filled background. */
export function contrastingInk(background: ColorIndex): ColorIndex {
  switch (background) {
    case ColorIndex.WHITE:
    case ColorIndex.YELLOW:
    case ColorIndex.GREEN:
      return ColorIndex.BLACK;
    default:
      return ColorIndex.WHITE;
  }
}

export interface CalendarColorSource {
  id: string;
  color?: string;
}

/**
 * Assign a color to every calendar. An explicit color must be assignable;
 * the rest take RED, YELLOW, GREEN, BLUE in turn, wrapping after four.
 * The position used for wrapping follows `policy`.
 */
export function assignCalendarColors(
  calendars: readonly CalendarColorSource[],
  policy: ColorCyclePolicy = 'declaration_order',
): Map<string, AssignableColor> {
  const ordered = policy === 'calendar_id' ? [...calendars].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)) : calendars;

  const assigned = new Map<string, AssignableColor>();
  ordered.forEach((calendar, position) => {
    if (calendar.color !== undefined) {
      const color = calendar.color.trim().toLowerCase();
      if (!isAssignableColor(color)) {
        throw new ConfigError(
          `Calendar "${calendar.id}" uses color "${calendar.color}", expected one of ${ASSIGNABLE_COLORS.join(', ')}`,
          'INVALID_CALENDAR_COLOR',
          `calendars.${calendar.id}.color`,
        );
      }
      assigned.set(calendar.id, color);
      return;
    }
    assigned.set(calendar.id, ASSIGNABLE_COLORS[position % ASSIGNABLE_COLORS.length]);
  });
  return assigned;
}
