import { JUSTIFY_SPACING_UNIT } from '@textflow/common';

export type ShouldApplyJustifyParams = {
  /** Whether the caller asked for justified output. */
  requested: boolean;
  wordCount: number;
  endsWithExplicitBreak: boolean;
  isLastLineOfInput: boolean;
};

/**
 * Final lines and lines closed by an explicit break keep their natural width,
 * as do lines without a gap to stretch.
 */
export function shouldApplyJustify(params: ShouldApplyJustifyParams): boolean {
  const { requested, wordCount, endsWithExplicitBreak, isLastLineOfInput } = params;
  if (!requested) return false;
  if (wordCount < 2) return false;
  return !endsWithExplicitBreak && !isLastLineOfInput;
}

export type DistributeSlackParams = {
  /** Budget width minus the line's natural width. */
  slack: number;
  gapCount: number;
  /** Smallest indivisible spacing step. Defaults to one distance unit. */
  unit?: number;
};

/**
 * Splits `slack` across `gapCount` gaps.
 *
 * Every gap receives the same whole number of units; the remaining units go one
 * each to the leftmost gaps. Any fraction of a unit left after that is added to
 * the first gap, so the returned extras always sum to `slack`.
 *
 * @returns Extra space per gap, left to right. Empty when there are no gaps,
 * all zeros when the slack is not positive.
 *
 * @example
 * ```typescript
 * distributeSlack({ slack: 7, gapCount: 3 }); // [3, 2, 2]
 * ```
 */
export function distributeSlack(params: DistributeSlackParams): number[] {
  const { slack, gapCount } = params;
  const unit = params.unit != null && params.unit > 0 ? params.unit : JUSTIFY_SPACING_UNIT;
  if (gapCount <= 0) return [];
  if (!(slack > 0)) return new Array<number>(gapCount).fill(0);

  const perGap = Math.floor(slack / unit / gapCount) * unit;
  let remainder = slack - perGap * gapCount;
  const extras = new Array<number>(gapCount).fill(perGap);

  for (let i = 0; i < gapCount && remainder >= unit; i += 1) {
    extras[i] = perGap + unit;
    remainder -= unit;
  }
  if (remainder > 0) {
    extras[0] = (extras[0] ?? 0) + remainder;
  }
  return extras;
}
