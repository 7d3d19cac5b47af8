import { DEFAULT_ASCENT_RATIO, DEFAULT_FIXED_PITCH_ADVANCE, SINGLE_LINE_SPACING_MULTIPLIER } from '@textflow/common';
import type { FontMetricsProvider, TextStyle } from '@textflow/contracts';

export type FixedPitchOptions = {
  id?: string;
  /** Advance of every character, as a fraction of the font size. */
  advance?: number;
  /** Per-style advance overrides, for faces whose bold runs wider. */
  styleAdvance?: Partial<Record<TextStyle, number>>;
  /** Line height as a multiple of the font size. */
  lineHeight?: number;
  /** Ascent as a fraction of the font size. */
  ascent?: number;
};

/**
 * Deterministic metrics where every code point has the same advance.
 *
 * Typography approximations follow the usual heuristics when not overridden:
 * - advance ≈ fontSize * 0.6
 * - ascent ≈ fontSize * 0.8
 * - lineHeight = fontSize * 1.15
 */
export function createFixedPitchMetrics(options: FixedPitchOptions = {}): FontMetricsProvider {
  const advance = options.advance ?? DEFAULT_FIXED_PITCH_ADVANCE;
  const lineHeight = options.lineHeight ?? SINGLE_LINE_SPACING_MULTIPLIER;
  const ascent = options.ascent ?? DEFAULT_ASCENT_RATIO;
  const styleAdvance = options.styleAdvance ?? {};
  const id = options.id ?? `fixed-pitch:${advance}:${lineHeight}:${ascent}`;

  return {
    id,
    width(text: string, style: TextStyle, size: number): number {
      return Array.from(text).length * (styleAdvance[style] ?? advance) * size;
    },
    lineHeight(_style: TextStyle, size: number): number {
      return lineHeight * size;
    },
    ascent(_style: TextStyle, size: number): number {
      return ascent * size;
    },
  };
}
