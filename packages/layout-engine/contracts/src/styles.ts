/**
 * Text styles as a two-bit set.
 *
 * Bold and italic are independent toggle families; the active combination is the
 * bitwise OR of every family currently open. The four resulting keys double as the
 * slots a box registers fonts under.
 */

export type TextStyle = 'main' | 'bold' | 'ital' | 'boldital';

export const TEXT_STYLES: readonly TextStyle[] = ['main', 'bold', 'ital', 'boldital'];

export const StyleFlag = {
  Bold: 1,
  Italic: 2,
} as const;

export type StyleFlagValue = (typeof StyleFlag)[keyof typeof StyleFlag];

/** Bitset of {@link StyleFlag} values, 0..3. */
export type StyleBits = number;

const STYLE_BY_BITS: readonly TextStyle[] = ['main', 'bold', 'ital', 'boldital'];

export function styleFromBits(bits: StyleBits): TextStyle {
  return STYLE_BY_BITS[bits & (StyleFlag.Bold | StyleFlag.Italic)] ?? 'main';
}

export function bitsFromStyle(style: TextStyle): StyleBits {
  return STYLE_BY_BITS.indexOf(style);
}

export const isBold = (style: TextStyle): boolean => (bitsFromStyle(style) & StyleFlag.Bold) !== 0;

export const isItalic = (style: TextStyle): boolean => (bitsFromStyle(style) & StyleFlag.Italic) !== 0;

export const isTextStyle = (value: unknown): value is TextStyle =>
  typeof value === 'string' && (TEXT_STYLES as readonly string[]).includes(value);
