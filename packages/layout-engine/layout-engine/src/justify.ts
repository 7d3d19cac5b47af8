import { distributeSlack, shouldApplyJustify, type JustifiedLine, type Line } from '@textflow/contracts';
import { WIDTH_EPSILON } from './layout-paragraph.js';

export type JustifyOptions = {
  justify: boolean;
  /** Width to stretch to. Defaults to the budget the line was broken against. */
  budget?: number;
};

/**
 * Settles the gap widths of a line.
 *
 * A justified line's gaps absorb the slack between its natural width and the
 * budget, so its right edge lands exactly on the budget. Other lines keep one
 * plain space per gap. A line already wider than the budget is never squeezed.
 */
export function justifyLine(line: Line, options: JustifyOptions): JustifiedLine {
  const budget = options.budget ?? line.maxWidth;
  const gapCount = Math.max(0, line.words.length - 1);
  const natural = new Array<number>(gapCount).fill(line.spaceWidth);

  const eligible = shouldApplyJustify({
    requested: options.justify,
    wordCount: line.words.length,
    endsWithExplicitBreak: line.endsWithExplicitBreak,
    isLastLineOfInput: line.isLastLineOfInput,
  });
  if (!eligible || line.naturalWidth > budget + WIDTH_EPSILON) {
    return { line, gaps: natural, width: line.naturalWidth, justified: false };
  }

  const extras = distributeSlack({ slack: budget - line.naturalWidth, gapCount });
  return {
    line,
    gaps: natural.map((gap, index) => gap + extras[index]),
    width: budget,
    justified: true,
  };
}
