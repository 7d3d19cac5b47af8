import { describe, expect, it } from 'vitest';
import { createFixedPitchMetrics } from './fixed-pitch.js';

describe('createFixedPitchMetrics', () => {
  it('advances every character by the same amount', () => {
    const metrics = createFixedPitchMetrics({ advance: 1 });
    expect(metrics.width('Hello', 'main', 10)).toBe(50);
    expect(metrics.width(' ', 'main', 10)).toBe(10);
    expect(metrics.width('', 'main', 10)).toBe(0);
  });

  it('counts code points rather than UTF-16 units', () => {
    const metrics = createFixedPitchMetrics({ advance: 1 });
    expect(metrics.width('a😀b', 'main', 10)).toBe(30);
  });

  it('applies per-style advances', () => {
    const metrics = createFixedPitchMetrics({ advance: 1, styleAdvance: { bold: 1.5 } });
    expect(metrics.width('ab', 'bold', 10)).toBe(30);
    expect(metrics.width('ab', 'ital', 10)).toBe(20);
  });

  it('uses the default typography ratios', () => {
    const metrics = createFixedPitchMetrics();
    expect(metrics.width('ab', 'main', 10)).toBe(12);
    expect(metrics.lineHeight('main', 20)).toBeCloseTo(23, 10);
    expect(metrics.ascent('main', 10)).toBe(8);
  });

  it('derives an id from its parameters unless one is given', () => {
    expect(createFixedPitchMetrics({ advance: 1, lineHeight: 2, ascent: 1 }).id).toBe('fixed-pitch:1:2:1');
    expect(createFixedPitchMetrics({ id: 'mono' }).id).toBe('mono');
  });
});
