/**
 * @file glyphs.ts
 * @description Bitmap glyph sheet backed by a JSON font file.
 *
 * The font file holds one row-major mask per character at scale 1:
 *
 *   {
 *     "cellWidth": 3, "cellHeight": 5, "fallback": "?",
 *     "glyphs": { "A": [".#.", "#.#", "###", "#.#", "#.#"], ... }
 *   }
 *
 * A sheet scales every glyph by its own factor, so the score digits and the
 * menu text come from the same file.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { Glyph, GlyphSheet } from './types.js';
import { GLYPH_WIDTH } from './constants.js';
import { ConfigError, InvariantViolation } from './errors.js';

const fontSchema = z
  .object({
    cellWidth:  z.number().int().min(1).max(GLYPH_WIDTH),
    cellHeight: z.number().int().min(1),
    fallback:   z.string().length(1),
    glyphs:     z.record(z.string().length(1), z.array(z.string().regex(/^[.#]*$/))),
  })
  .superRefine((font, ctx) =>
  {
    for (const [key, rows] of Object.entries(font.glyphs))
    {
      if (rows.length !== font.cellHeight || rows.some((row) => row.length !== font.cellWidth))
      {
        ctx.addIssue({
          code:    z.ZodIssueCode.custom,
          path:    ['glyphs', key],
          message: `expected ${font.cellHeight} rows of ${font.cellWidth} cells`,
        });
      }
    }
    if (!(font.fallback in font.glyphs))
    {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['fallback'], message: 'fallback glyph is missing' });
    }
  });

export type FontFile = z.infer<typeof fontSchema>;

/**
 * @function parseFont
 * @throws {ConfigError} if `data` is not a valid font.
 */
export function parseFont(data: unknown): FontFile
{
  const parsed = fontSchema.safeParse(data);
  if (!parsed.success)
  {
    throw new ConfigError(
      'Invalid font file',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function loadFontFile(path: string): FontFile
{
  let data: unknown;
  try
  {
    data = JSON.parse(readFileSync(path, 'utf8'));
  }
  catch (err)
  {
    throw new ConfigError('Unreadable font file', [`${path}: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return parseFont(data);
}

/**
 * @class BitmapGlyphSheet
 * @description GlyphSheet over a parsed font.  get() is only valid after
 *              generate(); unknown characters map to the font's fallback.
 */
export class BitmapGlyphSheet implements GlyphSheet
{
  private glyphs = new Map<string, Glyph>();
  private ready = false;

  constructor(private readonly font: FontFile, readonly scale: number) {}

  get generated(): boolean
  {
    return this.ready;
  }

  generate(): void
  {
    if (this.ready) return;

    for (const [key, rows] of Object.entries(this.font.glyphs))
    {
      this.glyphs.set(key, {
        key,
        width:  GLYPH_WIDTH * this.scale,
        height: this.font.cellHeight * this.scale,
        rows,
      });
    }
    this.ready = true;
  }

  get(key: string): Glyph
  {
    if (!this.ready)
    {
      throw new InvariantViolation('Glyph requested before the sheet was generated', { key });
    }

    const glyph = this.glyphs.get(key) ?? this.glyphs.get(this.font.fallback);
    if (glyph === undefined)
    {
      throw new InvariantViolation('Font has no fallback glyph', { key, fallback: this.font.fallback });
    }
    return glyph;
  }
}
