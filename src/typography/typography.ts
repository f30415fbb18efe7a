import { resourceDegraded, type ResourceDegraded } from '../errors.js';
import type { Logger } from '../logger.js';
import type { ColorIndex } from '../palette.js';
import { setPixel, type IndexedImage } from '../raster.js';
import { FALLBACK_FAMILY, type BitmapFont, type FontCache } from './font-cache.js';

export type FontRole = 'header' | 'label' | 'body';

/** Candidate integer scales per role, largest first. */
export const ROLE_SCALES: Record<FontRole, readonly number[]> = {
  header: [3, 2, 1],
  label: [2, 1],
  body: [2, 1],
};

/** Ranked families, most legible on e-paper first. */
export const DEFAULT_FONT_FAMILIES: readonly string[] = [FALLBACK_FAMILY];

export const ELLIPSIS = '...';

export interface FontHandle {
  font: BitmapFont;
  role: FontRole;
  scale: number;
  /** Horizontal pixels per grapheme cluster. */
  advance: number;
  /** Vertical pixels per text line, spacing included. */
  lineHeight: number;
  /** Inked height of a glyph. */
  glyphHeight: number;
}

export interface TextStyle {
  bold?: boolean;
  /** Checkerboard ink, the panel's stand-in for gray. */
  muted?: boolean;
}

const segmenter = new Intl.Segmenter('en', { granularity: 'grapheme' });

export function graphemes(text: string): string[] {
  return Array.from(segmenter.segment(text), (segment) => segment.segment);
}

export function fontHandle(font: BitmapFont, role: FontRole, scale: number): FontHandle {
  return {
    font,
    role,
    scale,
    advance: font.advance * scale,
    lineHeight: font.lineHeight * scale,
    glyphHeight: font.glyphHeight * scale,
  };
}

export function measureText(handle: FontHandle, text: string): number {
  return graphemes(text).length * handle.advance;
}

/**
 * Shorten `text` by whole grapheme clusters until it fits, marking the cut
 * with an ellipsis. Returns '' when not even the ellipsis fits.
 */
export function truncateToWidth(text: string, maxWidth: number, measure: (text: string) => number): string {
  if (measure(text) <= maxWidth) return text;
  const clusters = graphemes(text);
  for (let keep = clusters.length - 1; keep > 0; keep--) {
    const candidate = clusters.slice(0, keep).join('').trimEnd() + ELLIPSIS;
    if (measure(candidate) <= maxWidth) return candidate;
  }
  return measure(ELLIPSIS) <= maxWidth ? ELLIPSIS : '';
}

function glyphFor(font: BitmapFont, cluster: string): readonly number[] | undefined {
  return font.glyphs.get(cluster) ?? font.glyphs.get(String.fromCodePoint(cluster.codePointAt(0) ?? 0x3f));
}

/** Draw `text` with its top-left corner at (x, y). Returns the advance width. */
export function drawText(
  image: IndexedImage,
  handle: FontHandle,
  x: number,
  y: number,
  text: string,
  color: ColorIndex,
  style: TextStyle = {},
): number {
  const { font, scale } = handle;
  let cx = x;
  for (const cluster of graphemes(text)) {
    const rows = glyphFor(font, cluster);
    if (rows) {
      for (let row = 0; row < font.glyphHeight; row++) {
        const rowData = rows[row];
        for (let col = 0; col < font.glyphWidth; col++) {
          if (!(rowData & (0x80 >> col))) continue;
          for (let sy = 0; sy < scale; sy++) {
            for (let sx = 0; sx < scale; sx++) {
              const px = cx + col * scale + sx;
              const py = y + row * scale + sy;
              if (style.muted && (px + py) % 2 !== 0) continue;
              setPixel(image, px, py, color);
              if (style.bold) setPixel(image, px + 1, py, color);
            }
          }
        }
      }
    }
    cx += handle.advance;
  }
  return cx - x;
}

/**
 * Picks font sizes for a layout role and resolves which bitmap family to use.
 *
 * Families are tried in rank order through the shared {@link FontCache}; each
 * one that is missing produces a ResourceDegraded warning and the bundled
 * family is the last resort, so text always renders.
 */
export class TypographySelector {
  private resolved: BitmapFont | undefined;
  private readonly warnings: ResourceDegraded[] = [];

  constructor(
    private readonly cache: FontCache,
    private readonly families: readonly string[] = DEFAULT_FONT_FAMILIES,
    private readonly logger?: Logger,
  ) {}

  /** Fallbacks taken while resolving the family. */
  get diagnostics(): readonly ResourceDegraded[] {
    return this.warnings;
  }

  get font(): BitmapFont {
    if (!this.resolved) this.resolved = this.resolveFamily();
    return this.resolved;
  }

  /**
   * Largest candidate size whose `lineCount` lines fit `availableHeight`.
   * When none fits the smallest candidate is returned and the caller truncates.
   */
  select(role: FontRole, availableHeight: number, lineCount: number): FontHandle {
    const scales = ROLE_SCALES[role];
    const lines = Math.max(1, lineCount);
    for (const scale of scales) {
      if (this.font.lineHeight * scale * lines <= availableHeight) {
        return fontHandle(this.font, role, scale);
      }
    }
    return this.smallest(role);
  }

  smallest(role: FontRole): FontHandle {
    const scales = ROLE_SCALES[role];
    return fontHandle(this.font, role, scales[scales.length - 1]);
  }

  minLineHeight(role: FontRole): number {
    return this.smallest(role).lineHeight;
  }

  private resolveFamily(): BitmapFont {
    for (const family of this.families) {
      const lookup = this.cache.get(family);
      if (lookup.ok) return lookup.font;
      this.degrade(family, lookup.reason);
    }
    const fallback = this.cache.fallback();
    if (this.families.length > 0) {
      this.logger?.info('Using bundled font', { family: fallback.family });
    }
    return fallback;
  }

  private degrade(family: string, reason: string): void {
    const warning = resourceDegraded('font', family, reason);
    this.warnings.push(warning);
    this.logger?.warn('Preferred font unavailable, trying next', { family, reason });
  }
}
