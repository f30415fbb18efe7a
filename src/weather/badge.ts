import { resourceDegraded, type ResourceDegraded } from '../errors.js';
import type { Logger } from '../logger.js';
import { ColorIndex, contrastingInk } from '../palette.js';
import type { IndexedImage, Rect } from '../raster.js';
import { isWeatherCondition, type WeatherCondition, type WeatherSnapshot } from '../types.js';
import { drawText, fontHandle, measureText, type FontHandle } from '../typography/typography.js';
import { drawWeatherIcon, type IconShape } from './icons.js';

export type BadgeContext = 'agenda' | 'grid';
export type WeatherTone = 'gold' | 'blue' | 'red' | 'black';

export const WEATHER_STYLES: Record<WeatherCondition, { icon: IconShape; tone: WeatherTone }> = {
  sunny: { icon: 'sun', tone: 'gold' },
  partlycloudy: { icon: 'partly', tone: 'gold' },
  lightning: { icon: 'lightning', tone: 'gold' },
  'lightning-rainy': { icon: 'storm', tone: 'gold' },
  'clear-night': { icon: 'moon', tone: 'blue' },
  rainy: { icon: 'rain', tone: 'blue' },
  pouring: { icon: 'pour', tone: 'blue' },
  snowy: { icon: 'snow', tone: 'blue' },
  'snowy-rainy': { icon: 'sleet', tone: 'blue' },
  hail: { icon: 'hail', tone: 'blue' },
  exceptional: { icon: 'alert', tone: 'red' },
  cloudy: { icon: 'cloud', tone: 'black' },
  fog: { icon: 'fog', tone: 'black' },
  windy: { icon: 'wind', tone: 'black' },
  'windy-variant': { icon: 'wind', tone: 'black' },
};

// The panel has no gold; yellow is the closest ink
const TONE_INK: Record<WeatherTone, ColorIndex> = {
  gold: ColorIndex.YELLOW,
  blue: ColorIndex.BLUE,
  red: ColorIndex.RED,
  black: ColorIndex.BLACK,
};

const ICON_GAP = 6;
const MAX_ICON_SIZE = 48;
const ICON_PADDING = 4;

export interface BadgeOptions {
  context: BadgeContext;
  font: FontHandle;
  temperatureUnit: 'F' | 'C';
  /** Fill behind the badge; grid icons take the ink that contrasts with it. */
  background: ColorIndex;
  logger?: Logger;
}

export interface BadgeResult {
  /** Horizontal space used; 0 when nothing was drawn. */
  width: number;
  diagnostics: ResourceDegraded[];
}

export function temperatureText(temperature: number, unit: 'F' | 'C'): string {
  return `${Math.round(temperature)}°${unit}`;
}

export function iconSizeFor(regionHeight: number): number {
  return Math.max(8, Math.min(regionHeight, MAX_ICON_SIZE) - 2 * ICON_PADDING);
}

/** Width the badge occupies in a region of this height; 0 for invalid weather. */
export function measureWeatherBadge(snapshot: WeatherSnapshot, regionHeight: number, options: Pick<BadgeOptions, 'font' | 'temperatureUnit'>): number {
  if (!snapshot.isValid) return 0;
  return iconSizeFor(regionHeight) + ICON_GAP + measureText(options.font, temperatureText(snapshot.temperature, options.temperatureUnit));
}

/** Ink for the icon, and the outline drawn beneath it if any. */
export function iconInks(condition: WeatherCondition, context: BadgeContext, background: ColorIndex): { ink: ColorIndex; outline?: ColorIndex } {
  if (context === 'grid') {
    return { ink: contrastingInk(background) };
  }
  const { tone } = WEATHER_STYLES[condition];
  if (tone === 'gold') {
    return { ink: TONE_INK.gold, outline: ColorIndex.BLACK };
  }
  return { ink: TONE_INK[tone] };
}

/**
 * Draw icon and temperature right-aligned in `region`.
 * Invalid weather draws nothing and takes no space. A condition without an
 * icon degrades to a question mark.
 */
export function renderWeatherBadge(image: IndexedImage, snapshot: WeatherSnapshot, region: Rect, options: BadgeOptions): BadgeResult {
  if (!snapshot.isValid) {
    return { width: 0, diagnostics: [] };
  }

  const diagnostics: ResourceDegraded[] = [];
  const neutral = contrastingInk(options.background);
  const textInk = options.context === 'grid' ? neutral : ColorIndex.BLACK;
  const iconSize = iconSizeFor(region.height);
  const text = temperatureText(snapshot.temperature, options.temperatureUnit);
  const width = measureWeatherBadge(snapshot, region.height, options);

  const left = region.x + region.width - width;
  const iconY = region.y + Math.floor((region.height - iconSize) / 2);
  const textY = region.y + Math.floor((region.height - options.font.glyphHeight) / 2);

  const condition = snapshot.condition.trim().toLowerCase();
  if (isWeatherCondition(condition)) {
    const { ink, outline } = iconInks(condition, options.context, options.background);
    drawWeatherIcon(image, WEATHER_STYLES[condition].icon, left, iconY, iconSize, ink, outline);
  } else {
    const warning = resourceDegraded('weather_icon', snapshot.condition, 'no icon for this condition');
    diagnostics.push(warning);
    options.logger?.warn('Weather icon unavailable, drawing placeholder', { condition: snapshot.condition });
    const scale = Math.max(1, Math.floor(iconSize / options.font.font.glyphHeight));
    const mark = fontHandle(options.font.font, options.font.role, scale);
    const markX = left + Math.floor((iconSize - mark.advance) / 2);
    drawText(image, mark, markX, iconY + Math.floor((iconSize - mark.glyphHeight) / 2), '?', options.context === 'grid' ? neutral : ColorIndex.BLACK);
  }

  drawText(image, options.font, left + iconSize + ICON_GAP, textY, text, textInk);
  return { width, diagnostics };
}
