/**
 * Frame Assembler: header band, view body, footer, then rotation.
 *
 * A render either returns a complete image or throws a ConfigError before
 * anything is drawn. Malformed events and missing resources only degrade the
 * element they affect and come back as diagnostics.
 */

import { layoutSize, type ViewConfig } from './config.js';
import { dayKeyOf, type DayKey } from './dates.js';
import type { RenderDiagnostic } from './errors.js';
import { createCalendarDirectory, normalizeEvents } from './layout/days.js';
import type { Logger } from './logger.js';
import { ColorIndex, assignCalendarColors, contrastingInk, resolveCalendarColor } from './palette.js';
import { blit, createImage, drawHLine, fillRect, rotate, type IndexedImage, type Rect, type Rotation } from './raster.js';
import type { CalendarEvent, WeatherSnapshot } from './types.js';
import type { FontCache } from './typography/font-cache.js';
import { TypographySelector, drawText, measureText, truncateToWidth, type FontHandle } from './typography/typography.js';
import { VIEW_COMPOSERS, type ViewComposer } from './views/index.js';
import { measureWeatherBadge, renderWeatherBadge } from './weather/badge.js';

export const GRID_HEADER_HEIGHT = 50;
export const AGENDA_HEADER_HEIGHT = 80;
export const HEADER_MARGIN = 16;
export const HEADER_RULE = 2;
export const FOOTER_PADDING = 4;
const LEGEND_GAP = 12;
const BADGE_GAP = 12;

export interface RenderRequest {
  events: readonly CalendarEvent[];
  weather: WeatherSnapshot;
  config: ViewConfig;
  now: Date;
  /** Status line for the footer, e.g. a last-updated stamp. Never computed here. */
  footerText?: string;
  fonts: FontCache;
  logger?: Logger;
}

export interface RenderResult {
  /** `config.width` x `config.height`, already rotated. */
  image: IndexedImage;
  rotation: Rotation;
  diagnostics: RenderDiagnostic[];
}

export interface HeaderLayout {
  band: Rect;
  background: ColorIndex;
  ink: ColorIndex;
  font: FontHandle;
  badgeFont: FontHandle;
  /** Truncated to the space the badge leaves. */
  label: string;
  /** Region the badge is right-aligned in. */
  badgeRegion: Rect;
  /** 0 when the weather is invalid. */
  badgeWidth: number;
}

export function planHeader(
  composer: ViewComposer,
  config: ViewConfig,
  today: DayKey,
  weather: WeatherSnapshot,
  typography: TypographySelector,
  width: number,
  height: number,
): HeaderLayout {
  const nominal = composer.context === 'agenda' ? AGENDA_HEADER_HEIGHT : GRID_HEADER_HEIGHT;
  const band: Rect = { x: 0, y: 0, width, height: Math.min(nominal, Math.floor(height / 4)) };
  const background = composer.context === 'agenda' ? ColorIndex.WHITE : ColorIndex.BLUE;
  const inner = band.height - HEADER_RULE;

  const font = typography.select('header', inner - HEADER_MARGIN, 1);
  const badgeFont = typography.select('label', Math.floor(inner / 2), 1);
  const badgeRegion: Rect = { x: HEADER_MARGIN, y: 0, width: width - 2 * HEADER_MARGIN, height: inner };
  const badgeWidth = measureWeatherBadge(weather, inner, { font: badgeFont, temperatureUnit: config.temperatureUnit });

  const labelRoom = badgeRegion.width - (badgeWidth > 0 ? badgeWidth + BADGE_GAP : 0);
  const label = truncateToWidth(composer.label(today, config), labelRoom, (text) => measureText(font, text));

  return { band, background, ink: contrastingInk(background), font, badgeFont, label, badgeRegion, badgeWidth };
}

function drawFooter(
  image: IndexedImage,
  region: Rect,
  font: FontHandle,
  footerText: string | undefined,
  legend: ReadonlyArray<{ name: string; color: ColorIndex }>,
): void {
  drawHLine(image, region.y, 0, region.width, ColorIndex.BLACK);
  const textY = region.y + FOOTER_PADDING + Math.floor((font.lineHeight - font.glyphHeight) / 2) + 1;

  const statusWidth = footerText ? measureText(font, footerText) : 0;
  if (footerText) {
    drawText(image, font, region.width - HEADER_MARGIN - statusWidth, textY, footerText, ColorIndex.BLACK);
  }

  let x = HEADER_MARGIN;
  const limit = region.width - HEADER_MARGIN - statusWidth - LEGEND_GAP;
  for (const entry of legend) {
    const entryWidth = font.glyphHeight + 4 + measureText(font, entry.name);
    if (x + entryWidth > limit) break;
    fillRect(image, x, textY, font.glyphHeight, font.glyphHeight, entry.color);
    drawText(image, font, x + font.glyphHeight + 4, textY, entry.name, ColorIndex.BLACK);
    x += entryWidth + LEGEND_GAP;
  }
}

/**
 * Render one frame.
 * @throws {ConfigError} when an event carries a color that is not assignable
 */
export function renderFrame(request: RenderRequest): RenderResult {
  const { config, weather, logger } = request;

  // Validate before touching any pixels so failures leave nothing half drawn
  for (const event of request.events) {
    resolveCalendarColor(event.colorKey);
  }

  const { events, issues } = normalizeEvents(request.events);
  for (const issue of issues) {
    logger?.warn('Malformed event clamped', { title: issue.eventTitle, calendar: issue.sourceCalendarId, reason: issue.message });
  }

  const composer = VIEW_COMPOSERS[config.viewMode];
  const { width, height } = layoutSize(config);
  const image = createImage(width, height);
  const typography = new TypographySelector(request.fonts, config.fontFamilies, logger);
  const today = dayKeyOf(request.now, config.timeZone);
  const calendars = createCalendarDirectory(config.calendars);

  const header = planHeader(composer, config, today, weather, typography, width, height);
  fillRect(image, header.band.x, header.band.y, header.band.width, header.band.height, header.background);
  drawHLine(image, header.band.height - HEADER_RULE, 0, width, ColorIndex.BLACK, HEADER_RULE);
  const labelY = Math.floor((header.badgeRegion.height - header.font.glyphHeight) / 2);
  drawText(image, header.font, HEADER_MARGIN, labelY, header.label, header.ink);

  const badge = renderWeatherBadge(image, weather, header.badgeRegion, {
    context: composer.context,
    font: header.badgeFont,
    temperatureUnit: config.temperatureUnit,
    background: header.background,
    logger,
  });

  const legend =
    composer.context === 'agenda' && config.agenda.showLegend
      ? [...assignCalendarColors(config.calendars, config.colorCycle)].map(([id, color]) => ({
          name: calendars.displayName(id),
          color: resolveCalendarColor(color),
        }))
      : [];
  const footerFont = typography.smallest('body');
  const hasFooter = request.footerText !== undefined || legend.length > 0;
  const footerHeight = hasFooter ? footerFont.lineHeight + 2 * FOOTER_PADDING : 0;

  const bodyTop = header.band.height;
  const bodyHeight = Math.max(1, height - bodyTop - footerHeight);
  const body = composer.compose({ events, today, config, width, height: bodyHeight, typography, calendars });
  blit(image, body, 0, bodyTop);

  if (hasFooter) {
    drawFooter(image, { x: 0, y: height - footerHeight, width, height: footerHeight }, footerFont, request.footerText, legend);
  }

  const diagnostics: RenderDiagnostic[] = [...issues, ...typography.diagnostics, ...badge.diagnostics];
  logger?.debug('Frame rendered', { viewMode: config.viewMode, width: config.width, height: config.height, diagnostics: diagnostics.length });

  return { image: rotate(image, config.rotation), rotation: config.rotation, diagnostics };
}
