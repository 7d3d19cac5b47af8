import { describe, expect, it } from 'vitest';
import { StyleFlag } from '@textflow/contracts';
import { StyleStack } from './style-stack.js';

describe('StyleStack', () => {
  it('starts in the main style', () => {
    const stack = new StyleStack();
    expect(stack.style).toBe('main');
    expect(stack.depth).toBe(0);
  });

  it('combines nested toggles', () => {
    const stack = new StyleStack();
    stack.push(StyleFlag.Bold);
    stack.push(StyleFlag.Italic);
    expect(stack.style).toBe('boldital');
  });

  it('restores the previous combination when the inner toggle closes', () => {
    const stack = new StyleStack();
    stack.push(StyleFlag.Bold);
    stack.push(StyleFlag.Italic);
    expect(stack.close(StyleFlag.Italic)).toBe(true);
    expect(stack.style).toBe('bold');
  });

  it('closes an outer toggle while an inner one stays active', () => {
    const stack = new StyleStack();
    stack.push(StyleFlag.Bold);
    stack.push(StyleFlag.Italic);
    expect(stack.close(StyleFlag.Bold)).toBe(true);
    expect(stack.style).toBe('ital');
  });

  it('keeps a family active until every open of it is closed', () => {
    const stack = new StyleStack();
    stack.push(StyleFlag.Bold);
    stack.push(StyleFlag.Bold);
    stack.close(StyleFlag.Bold);
    expect(stack.style).toBe('bold');
    stack.close(StyleFlag.Bold);
    expect(stack.style).toBe('main');
  });

  it('refuses to close a family that is not open', () => {
    const stack = new StyleStack();
    stack.push(StyleFlag.Italic);
    expect(stack.close(StyleFlag.Bold)).toBe(false);
    expect(stack.depth).toBe(1);
  });

  it('lists unmatched opening markers outermost first', () => {
    const stack = new StyleStack();
    stack.push(StyleFlag.Italic);
    stack.push(StyleFlag.Bold);
    expect(stack.openMarkers()).toEqual(['<i>', '<b>']);
  });
});
