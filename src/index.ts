export { renderFrame, planHeader, type RenderRequest, type RenderResult, type HeaderLayout } from './frame.js';
export { parseViewConfig, layoutSize, ViewConfigSchema, type ViewConfig, type RawViewConfig, type ViewMode } from './config.js';
export { parseScene, SceneSchema, type Scene, type RawScene } from './scene.js';
export { encodeBMP } from './bmp.js';
export { ConfigError, DataShapeError, type ResourceDegraded, type RenderDiagnostic } from './errors.js';
export { createLogger, type Logger, type LogLevel } from './logger.js';
export {
  ColorIndex,
  ASSIGNABLE_COLORS,
  assignCalendarColors,
  contrastingInk,
  paletteIndex,
  resolveCalendarColor,
  type AssignableColor,
  type ColorName,
} from './palette.js';
export { rotate, inverseRotation, type IndexedImage, type Rotation } from './raster.js';
export { FontCache } from './typography/font-cache.js';
export { TypographySelector, type FontHandle, type FontRole } from './typography/typography.js';
export { layoutEvents, resolveCapacity, type EventLayout, type RenderedLine } from './layout/event-layout.js';
export { renderWeatherBadge, measureWeatherBadge, WEATHER_STYLES } from './weather/badge.js';
export { VIEW_COMPOSERS, type ViewComposer, type ViewInput } from './views/index.js';
export { INVALID_WEATHER, WEATHER_CONDITIONS, type CalendarEvent, type WeatherSnapshot, type WeatherCondition } from './types.js';
