/**
 * @textflow/contracts
 *
 * Types shared by every stage of the pipeline:
 *   format parser → tokenizer → line breaker → justifier → page state → canvas
 *
 * Collaborators outside the engine (font metrics, drawing surfaces) are only ever
 * seen through the interfaces declared here.
 */

import type { Rgba } from '@textflow/common';
import type { TextStyle } from './styles.js';

export {
  TEXT_STYLES,
  StyleFlag,
  styleFromBits,
  bitsFromStyle,
  isBold,
  isItalic,
  isTextStyle,
  type TextStyle,
  type StyleBits,
  type StyleFlagValue,
} from './styles.js';

export {
  TextLayoutError,
  FormatSyntaxError,
  ConfigurationMismatchError,
  MetricsUnavailableError,
  TextBoxConfigError,
  type TextLayoutErrorCode,
  type FormatSyntaxDetails,
} from './errors.js';

export {
  shouldApplyJustify,
  distributeSlack,
  type ShouldApplyJustifyParams,
  type DistributeSlackParams,
} from './justify-utils.js';

export type { Rgba };

// ---------------------------------------------------------------------------
// Geometry
// ---------------------------------------------------------------------------

export type Size = {
  width: number;
  height: number;
};

export type Margins = {
  left: number;
  top: number;
  right: number;
  bottom: number;
};

export type Point = {
  x: number;
  y: number;
};

// ---------------------------------------------------------------------------
// Parsed text
// ---------------------------------------------------------------------------

/** Maximal span of input sharing one style. Whitespace and newlines are kept verbatim. */
export type StyleRun = {
  readonly text: string;
  readonly style: TextStyle;
};

export type WordToken = {
  readonly kind: 'word';
  readonly text: string;
  readonly style: TextStyle;
  /** Rendered width in the box that measured it. */
  readonly width: number;
};

/** An explicit line break from the source text. */
export type BreakToken = {
  readonly kind: 'break';
};

export type Token = WordToken | BreakToken;

// ---------------------------------------------------------------------------
// Lines
// ---------------------------------------------------------------------------

/** Words assigned to one row by the line breaker, before justification. */
export type Line = {
  readonly words: readonly WordToken[];
  /** Distance reserved before the first word. */
  readonly indent: number;
  /** Width available to the words when the line was broken. */
  readonly maxWidth: number;
  /** Sum of word widths plus one space per gap. */
  readonly naturalWidth: number;
  /** Width of one unjustified gap. */
  readonly spaceWidth: number;
  /** Uses the paragraph indent. */
  readonly isParagraphFirst: boolean;
  readonly endsWithExplicitBreak: boolean;
  readonly isLastLineOfInput: boolean;
};

/** A line with its gap widths settled, ready to draw. */
export type JustifiedLine = {
  readonly line: Line;
  /** Width of each of the `words.length - 1` gaps, left to right. */
  readonly gaps: readonly number[];
  /** Words plus gaps. Equals the budget when `justified` is true. */
  readonly width: number;
  readonly justified: boolean;
};

// ---------------------------------------------------------------------------
// Continuation
// ---------------------------------------------------------------------------

export type FontFingerprint = {
  readonly metricsId: string;
  readonly size: number;
};

/** The parts of a box's configuration that wrapping and placement depend on. */
export type ConfigFingerprint = {
  readonly writableWidth: number;
  readonly margins: Margins;
  readonly paragraphIndent: number;
  readonly newLineIndent: number;
  readonly spacing: number;
  /** Resolved per style, after fallback to main. `null` when nothing is configured. */
  readonly fonts: Readonly<Record<TextStyle, FontFingerprint | null>>;
};

type UnwrittenBase = {
  /** Already wrapped, not yet justified. Written first, in order. */
  readonly lines: readonly Line[];
  /** Tokens that were never line-broken. Written after `lines`. */
  readonly tail: readonly Token[];
  /** Justification requested when the content was captured. */
  readonly justify: boolean;
  /** Nothing from this input has been written yet, so its first line is still the paragraph's first. */
  readonly startsParagraph: boolean;
  readonly fingerprint: ConfigFingerprint;
};

export type PlainUnwritten = UnwrittenBase & {
  readonly kind: 'plain';
};

export type FormattedUnwritten = UnwrittenBase & {
  readonly kind: 'formatted';
  /** Style in effect at the point of truncation. */
  readonly activeStyle: TextStyle;
};

/** Content a write call could not place. Hand it to `continueParagraph` on an identically configured box. */
export type UnwrittenContent = PlainUnwritten | FormattedUnwritten;

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/**
 * Source of text measurements for one style.
 *
 * Must be deterministic for fixed inputs. `id` identifies the underlying face so
 * that two boxes can tell whether they measure alike.
 */
export interface FontMetricsProvider {
  readonly id: string;
  width(text: string, style: TextStyle, size: number): number;
  lineHeight(style: TextStyle, size: number): number;
  ascent(style: TextStyle, size: number): number;
}

export type RunPosition = {
  /** Left edge of the run. */
  x: number;
  /** Top of the line box. */
  y: number;
  /** `y` plus the style's ascent. */
  baseline: number;
};

export type RunPaint = {
  color: Rgba;
};

/** Drawing surface. The engine never reads anything back from it. */
export interface Canvas {
  drawRun(text: string, style: TextStyle, size: number, position: RunPosition, paint: RunPaint): void;
}

// ---------------------------------------------------------------------------
// Fingerprint comparison
// ---------------------------------------------------------------------------

const sameFont = (a: FontFingerprint | null, b: FontFingerprint | null): boolean => {
  if (a === null || b === null) return a === b;
  return a.metricsId === b.metricsId && a.size === b.size;
};

/**
 * Lists the fields in which two fingerprints differ, as dotted paths
 * (`margins.left`, `fonts.bold`). Empty when they match.
 */
export function diffFingerprints(a: ConfigFingerprint, b: ConfigFingerprint): string[] {
  const fields: string[] = [];
  if (a.writableWidth !== b.writableWidth) fields.push('writableWidth');
  for (const side of ['left', 'top', 'right', 'bottom'] as const) {
    if (a.margins[side] !== b.margins[side]) fields.push(`margins.${side}`);
  }
  if (a.paragraphIndent !== b.paragraphIndent) fields.push('paragraphIndent');
  if (a.newLineIndent !== b.newLineIndent) fields.push('newLineIndent');
  if (a.spacing !== b.spacing) fields.push('spacing');
  for (const style of ['main', 'bold', 'ital', 'boldital'] as const) {
    if (!sameFont(a.fonts[style], b.fonts[style])) fields.push(`fonts.${style}`);
  }
  return fields;
}

export const isWordToken = (token: Token): token is WordToken => token.kind === 'word';
