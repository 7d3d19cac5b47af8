/**
 * Table-driven proportional metrics.
 *
 * A glyph table lists advance widths in font units; widths scale linearly with
 * the requested size. Tables are plain JSON so a face's numbers can be dumped
 * once by whatever tooling has access to the font and shipped alongside the
 * code. A sample table lives in `data/textflow-sans.json`.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { TextLayoutError, type FontMetricsProvider, type TextStyle } from '@textflow/contracts';

const styleAdjustmentSchema = z.object({
  advanceScale: z.number().positive().default(1),
});

export const glyphTableSchema = z.object({
  id: z.string().min(1),
  unitsPerEm: z.number().int().positive(),
  ascender: z.number(),
  descender: z.number().max(0),
  lineGap: z.number().nonnegative().default(0),
  defaultAdvance: z.number().nonnegative(),
  advances: z.record(z.string(), z.number().nonnegative()),
  kerning: z.record(z.string(), z.number()).default({}),
  styles: z
    .object({
      main: styleAdjustmentSchema,
      bold: styleAdjustmentSchema,
      ital: styleAdjustmentSchema,
      boldital: styleAdjustmentSchema,
    })
    .partial()
    .default({}),
});

export type GlyphTable = z.infer<typeof glyphTableSchema>;
export type GlyphTableInput = z.input<typeof glyphTableSchema>;

/**
 * Validates raw table data.
 *
 * @throws TextLayoutError (`INVALID_CONFIG`) listing the schema issues.
 */
export function parseGlyphTable(input: unknown): GlyphTable {
  const result = glyphTableSchema.safeParse(input);
  if (!result.success) {
    throw new TextLayoutError('INVALID_CONFIG', 'Invalid glyph table', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return result.data;
}

export function loadGlyphTable(path: string | URL): GlyphTable {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return parseGlyphTable(raw);
}

const SAMPLE_GLYPH_TABLE_PATH = fileURLToPath(new URL('../data/textflow-sans.json', import.meta.url));

export function loadSampleGlyphTable(): GlyphTable {
  return loadGlyphTable(SAMPLE_GLYPH_TABLE_PATH);
}

export function createGlyphTableMetrics(table: GlyphTable): FontMetricsProvider {
  const { unitsPerEm, ascender, descender, lineGap, defaultAdvance, advances, kerning, styles } = table;
  const scale = (units: number, size: number): number => (units * size) / unitsPerEm;

  const widthInUnits = (text: string, style: TextStyle): number => {
    const chars = Array.from(text);
    let units = 0;
    for (let i = 0; i < chars.length; i += 1) {
      const char = chars[i] ?? '';
      units += advances[char] ?? defaultAdvance;
      const next = chars[i + 1];
      if (next !== undefined) units += kerning[char + next] ?? 0;
    }
    return units * (styles[style]?.advanceScale ?? 1);
  };

  return {
    id: table.id,
    width(text: string, style: TextStyle, size: number): number {
      return scale(widthInUnits(text, style), size);
    },
    lineHeight(_style: TextStyle, size: number): number {
      return scale(ascender - descender + lineGap, size);
    },
    ascent(_style: TextStyle, size: number): number {
      return scale(ascender, size);
    },
  };
}
