import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

/** Directory holding the fonts shipped with the package. */
export const BUNDLED_FONT_DIR = fileURLToPath(new URL('../../fonts/', import.meta.url));

/** Family that ships with the package and is always available. */
export const FALLBACK_FAMILY = 'block';

const FAMILY_NAME = /^[a-z0-9][a-z0-9_-]*$/;

/**
 * Bitmap font file. Each glyph is `glyphHeight` rows of 8 bits, written as
 * two hex digits per row, most significant bit on the left.
 */
export const BitmapFontSchema = z
  .object({
    family: z.string().regex(FAMILY_NAME),
    glyphWidth: z.number().int().min(1).max(8),
    glyphHeight: z.number().int().min(1).max(32),
    advance: z.number().int().min(1),
    lineHeight: z.number().int().min(1),
    glyphs: z.record(z.string().regex(/^(?:[0-9A-Fa-f]{2})+$/)),
  })
  .strict()
  .superRefine((font, ctx) => {
    for (const [char, rows] of Object.entries(font.glyphs)) {
      if (rows.length !== font.glyphHeight * 2) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `glyph "${char}" has ${rows.length / 2} rows, expected ${font.glyphHeight}`,
          path: ['glyphs', char],
        });
      }
    }
  });

export interface BitmapFont {
  family: string;
  glyphWidth: number;
  glyphHeight: number;
  advance: number;
  lineHeight: number;
  /** Row bitmaps per character. */
  glyphs: ReadonlyMap<string, readonly number[]>;
}

export type FontLookup = { ok: true; font: BitmapFont } | { ok: false; reason: string };

function decodeRows(hex: string): number[] {
  const rows: number[] = [];
  for (let i = 0; i < hex.length; i += 2) {
    rows.push(parseInt(hex.slice(i, i + 2), 16));
  }
  return rows;
}

function describe(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Lazily populated cache of bitmap fonts, owned by the caller and shared
 * across renders. A family is read and validated in one synchronous step and
 * stored only once complete, so readers never see a half-loaded font.
 * Failed lookups are remembered as well.
 */
export class FontCache {
  private readonly entries = new Map<string, FontLookup>();

  constructor(private readonly fontDir: string = BUNDLED_FONT_DIR) {}

  get(family: string): FontLookup {
    const cached = this.entries.get(family);
    if (cached) return cached;

    const lookup = this.load(family);
    this.entries.set(family, lookup);
    return lookup;
  }

  /** The bundled font. Its absence means a broken installation. */
  fallback(): BitmapFont {
    const key = `${BUNDLED_FONT_DIR}::${FALLBACK_FAMILY}`;
    let lookup = this.entries.get(key);
    if (!lookup) {
      lookup = this.loadFile(path.join(BUNDLED_FONT_DIR, `${FALLBACK_FAMILY}.json`));
      this.entries.set(key, lookup);
    }
    if (!lookup.ok) {
      throw new Error(`Bundled font "${FALLBACK_FAMILY}" could not be loaded: ${lookup.reason}`);
    }
    return lookup.font;
  }

  get size(): number {
    return this.entries.size;
  }

  private load(family: string): FontLookup {
    if (!FAMILY_NAME.test(family)) {
      return { ok: false, reason: `invalid family name "${family}"` };
    }
    return this.loadFile(path.join(this.fontDir, `${family}.json`));
  }

  private loadFile(file: string): FontLookup {
    try {
      const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
      const parsed = BitmapFontSchema.parse(raw);
      const glyphs = new Map<string, readonly number[]>();
      for (const [char, rows] of Object.entries(parsed.glyphs)) {
        glyphs.set(char, decodeRows(rows));
      }
      return {
        ok: true,
        font: {
          family: parsed.family,
          glyphWidth: parsed.glyphWidth,
          glyphHeight: parsed.glyphHeight,
          advance: parsed.advance,
          lineHeight: parsed.lineHeight,
          glyphs,
        },
      };
    } catch (error) {
      return { ok: false, reason: describe(error) };
    }
  }
}
