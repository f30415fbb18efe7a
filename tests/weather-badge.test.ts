import { describe, expect, it } from 'vitest';
import { ColorIndex } from '../src/palette.js';
import { createImage, getPixel } from '../src/raster.js';
import { INVALID_WEATHER, WEATHER_CONDITIONS, type WeatherSnapshot } from '../src/types.js';
import { TypographySelector, fontHandle } from '../src/typography/typography.js';
import { WEATHER_STYLES, iconInks, iconSizeFor, measureWeatherBadge, renderWeatherBadge, temperatureText } from '../src/weather/badge.js';
import { drawWeatherIcon } from '../src/weather/icons.js';
import { countColor, fonts } from './helpers.js';

const font = fontHandle(new TypographySelector(fonts).font, 'label', 2);
const region = { x: 0, y: 0, width: 200, height: 48 };
const sunny: WeatherSnapshot = { condition: 'sunny', temperature: 71.6, isValid: true };

describe('Weather badge', () => {
  describe('invalid weather', () => {
    it('should reserve no space', () => {
      expect(measureWeatherBadge(INVALID_WEATHER, 48, { font, temperatureUnit: 'F' })).toBe(0);
    });

    it('should draw nothing and report nothing', () => {
      const image = createImage(200, 48);
      const result = renderWeatherBadge(image, INVALID_WEATHER, region, { context: 'grid', font, temperatureUnit: 'F', background: ColorIndex.WHITE });
      expect(result).toEqual({ width: 0, diagnostics: [] });
      expect(countColor(image, ColorIndex.WHITE)).toBe(200 * 48);
    });
  });

  it('should measure icon, gap and temperature', () => {
    // 40px icon + 6px gap + '72°F' at 16px per character
    expect(iconSizeFor(48)).toBe(40);
    expect(measureWeatherBadge(sunny, 48, { font, temperatureUnit: 'F' })).toBe(110);
  });

  it('should round the temperature and append the unit', () => {
    expect(temperatureText(71.6, 'F')).toBe('72°F');
    expect(temperatureText(-0.4, 'C')).toBe('0°C');
    expect(temperatureText(-3.5, 'C')).toBe('-3°C');
  });

  it('should style every known condition', () => {
    for (const condition of WEATHER_CONDITIONS) {
      expect(WEATHER_STYLES[condition]).toBeDefined();
    }
  });

  describe('agenda colors', () => {
    it('should follow the condition table', () => {
      expect(iconInks('rainy', 'agenda', ColorIndex.WHITE)).toEqual({ ink: ColorIndex.BLUE });
      expect(iconInks('exceptional', 'agenda', ColorIndex.WHITE)).toEqual({ ink: ColorIndex.RED });
      expect(iconInks('fog', 'agenda', ColorIndex.WHITE)).toEqual({ ink: ColorIndex.BLACK });
    });

    it('should outline gold icons in black', () => {
      expect(iconInks('sunny', 'agenda', ColorIndex.WHITE)).toEqual({ ink: ColorIndex.YELLOW, outline: ColorIndex.BLACK });
      expect(iconInks('lightning', 'agenda', ColorIndex.WHITE)).toEqual({ ink: ColorIndex.YELLOW, outline: ColorIndex.BLACK });
    });

    it('should draw the black outline beneath the gold fill', () => {
      const image = createImage(200, 48);
      const result = renderWeatherBadge(image, sunny, region, { context: 'agenda', font, temperatureUnit: 'F', background: ColorIndex.WHITE });
      expect(result.width).toBe(110);
      // icon square starts at x = 200 - 110, y = (48 - 40) / 2; the sun disc has radius 8
      const cx = 90 + 20;
      const cy = 4 + 20;
      expect(getPixel(image, cx, cy)).toBe(ColorIndex.YELLOW);
      expect(getPixel(image, cx + 9, cy)).toBe(ColorIndex.BLACK);
      expect(getPixel(image, cx - 9, cy)).toBe(ColorIndex.BLACK);
    });
  });

  describe('grid colors', () => {
    it('should ignore the table and contrast with the band', () => {
      expect(iconInks('sunny', 'grid', ColorIndex.BLUE)).toEqual({ ink: ColorIndex.WHITE });
      expect(iconInks('rainy', 'grid', ColorIndex.BLUE)).toEqual({ ink: ColorIndex.WHITE });
      expect(iconInks('rainy', 'grid', ColorIndex.WHITE)).toEqual({ ink: ColorIndex.BLACK });
    });

    it('should draw a gold condition without yellow on a blue band', () => {
      const image = createImage(200, 48, ColorIndex.BLUE);
      renderWeatherBadge(image, sunny, region, { context: 'grid', font, temperatureUnit: 'F', background: ColorIndex.BLUE });
      expect(countColor(image, ColorIndex.YELLOW)).toBe(0);
      expect(countColor(image, ColorIndex.BLACK)).toBe(0);
      expect(countColor(image, ColorIndex.WHITE)).toBeGreaterThan(0);
    });
  });

  it('should match conditions regardless of case', () => {
    const image = createImage(200, 48);
    const result = renderWeatherBadge(image, { condition: ' Sunny', temperature: 70, isValid: true }, region, {
      context: 'agenda',
      font,
      temperatureUnit: 'F',
      background: ColorIndex.WHITE,
    });
    expect(result.diagnostics).toEqual([]);
  });

  it('should fall back to a question mark for an unknown condition', () => {
    const image = createImage(200, 48);
    const result = renderWeatherBadge(image, { condition: 'tornado', temperature: 70, isValid: true }, region, {
      context: 'agenda',
      font,
      temperatureUnit: 'F',
      background: ColorIndex.WHITE,
    });
    expect(result.width).toBe(110);
    expect(result.diagnostics).toEqual([
      { kind: 'resource_degraded', resource: 'weather_icon', name: 'tornado', reason: 'no icon for this condition' },
    ]);
    expect(countColor(image, ColorIndex.BLACK, { x: 90, y: 0, width: 40, height: 48 })).toBeGreaterThan(0);
  });
});

describe('drawWeatherIcon', () => {
  it('should stamp only the fill color without an outline', () => {
    const image = createImage(40, 40);
    drawWeatherIcon(image, 'sun', 0, 0, 40, ColorIndex.YELLOW);
    expect(countColor(image, ColorIndex.BLACK)).toBe(0);
    expect(getPixel(image, 20, 20)).toBe(ColorIndex.YELLOW);
  });

  it('should leave a ring of outline color around the fill', () => {
    const image = createImage(40, 40);
    drawWeatherIcon(image, 'cloud', 0, 0, 40, ColorIndex.YELLOW, ColorIndex.BLACK);
    expect(countColor(image, ColorIndex.BLACK)).toBeGreaterThan(0);
    expect(countColor(image, ColorIndex.YELLOW)).toBeGreaterThan(0);
  });
});
