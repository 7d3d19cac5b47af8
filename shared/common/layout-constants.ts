/**
 * Shared layout defaults.
 *
 * Used by option validation in the layout engine and by the metrics providers,
 * so a box built with no explicit settings and a provider built with no explicit
 * settings agree on the same numbers.
 */

/** Font size used when a box is created without one. */
export const DEFAULT_FONT_SIZE = 12;

/** Distance between consecutive lines, on top of the line height. */
export const DEFAULT_LINE_SPACING = 4;

/** Word 2007+ "single" line spacing: lineHeight = fontSize * 1.15. */
export const SINGLE_LINE_SPACING_MULTIPLIER = 1.15;

/** ascent ≈ fontSize * 0.8 (baseline to top). */
export const DEFAULT_ASCENT_RATIO = 0.8;

/** Advance width of one character in a fixed-pitch face, as a fraction of the size. */
export const DEFAULT_FIXED_PITCH_ADVANCE = 0.6;

/** Entries kept by a measurement cache before the oldest is evicted. */
export const DEFAULT_MEASUREMENT_CACHE_SIZE = 5000;

/** Smallest amount of extra space handed to a single gap when justifying. */
export const JUSTIFY_SPACING_UNIT = 1;

export type Rgba = readonly [number, number, number, number];

export const DEFAULT_TEXT_COLOR: Rgba = [0, 0, 0, 255];

export const DEFAULT_BACKGROUND_COLOR: Rgba = [255, 255, 255, 255];
