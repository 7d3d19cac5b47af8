import { describe, expect, it } from 'vitest';
import { distributeSlack, shouldApplyJustify } from './justify-utils.js';

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

describe('shouldApplyJustify', () => {
  const base = { requested: true, wordCount: 3, endsWithExplicitBreak: false, isLastLineOfInput: false };

  it('applies to a requested line with gaps that is neither final nor broken', () => {
    expect(shouldApplyJustify(base)).toBe(true);
  });

  it('skips when not requested', () => {
    expect(shouldApplyJustify({ ...base, requested: false })).toBe(false);
  });

  it('skips lines with a single word or none', () => {
    expect(shouldApplyJustify({ ...base, wordCount: 1 })).toBe(false);
    expect(shouldApplyJustify({ ...base, wordCount: 0 })).toBe(false);
  });

  it('skips lines closed by an explicit break', () => {
    expect(shouldApplyJustify({ ...base, endsWithExplicitBreak: true })).toBe(false);
  });

  it('skips the last line of the input', () => {
    expect(shouldApplyJustify({ ...base, isLastLineOfInput: true })).toBe(false);
  });
});

describe('distributeSlack', () => {
  it('gives the remainder to the leftmost gaps one unit at a time', () => {
    expect(distributeSlack({ slack: 7, gapCount: 3 })).toEqual([3, 2, 2]);
    expect(distributeSlack({ slack: 11, gapCount: 4 })).toEqual([3, 3, 3, 2]);
  });

  it('divides evenly when possible', () => {
    expect(distributeSlack({ slack: 90, gapCount: 1 })).toEqual([90]);
    expect(distributeSlack({ slack: 12, gapCount: 4 })).toEqual([3, 3, 3, 3]);
  });

  it('hands slack smaller than the gap count to the leftmost gaps', () => {
    expect(distributeSlack({ slack: 2, gapCount: 5 })).toEqual([1, 1, 0, 0, 0]);
  });

  it('puts a fractional leftover on the first gap', () => {
    expect(distributeSlack({ slack: 5.5, gapCount: 2 })).toEqual([3.5, 2]);
  });

  it('honours a custom unit', () => {
    expect(distributeSlack({ slack: 10, gapCount: 3, unit: 2 })).toEqual([4, 4, 2]);
  });

  it('returns no extras without gaps', () => {
    expect(distributeSlack({ slack: 40, gapCount: 0 })).toEqual([]);
  });

  it('never compresses', () => {
    expect(distributeSlack({ slack: -6, gapCount: 2 })).toEqual([0, 0]);
  });

  it('always sums to the slack', () => {
    for (const gapCount of [1, 2, 3, 7, 13]) {
      for (const slack of [0, 1, 6, 29, 101]) {
        expect(sum(distributeSlack({ slack, gapCount }))).toBe(slack);
      }
    }
  });
});
