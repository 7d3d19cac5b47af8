import { describe, expect, it, vi } from 'vitest';
import type { Token, WordToken } from '@textflow/contracts';
import { breakLines, lineText, type LineFrameFn } from './layout-paragraph.js';

const word = (text: string): WordToken => ({ kind: 'word', text, style: 'main', width: text.length * 10 });
const words = (text: string): Token[] => text.split(' ').map(word);
const BR: Token = { kind: 'break' };

const fixedFrame =
  (maxWidth: number): LineFrameFn =>
  () => ({ indent: 0, maxWidth });

describe('breakLines', () => {
  it('packs words greedily with one space between them', () => {
    const { lines } = breakLines(words('aa bb cc dd'), {
      frame: fixedFrame(50),
      spaceWidth: 10,
      startsParagraph: true,
    });

    expect(lines.map(lineText)).toEqual(['aa bb', 'cc dd']);
    expect(lines.map((line) => line.naturalWidth)).toEqual([50, 50]);
    expect(lines.map((line) => line.isParagraphFirst)).toEqual([true, false]);
    expect(lines.map((line) => line.isLastLineOfInput)).toEqual([false, true]);
  });

  it('asks the frame function for each line and records the indent it returns', () => {
    const frame = vi.fn<LineFrameFn>((_index, first) => (first ? { indent: 20, maxWidth: 80 } : { indent: 0, maxWidth: 100 }));
    const { lines } = breakLines(words('abc abc abc abc abc abc'), { frame, spaceWidth: 10, startsParagraph: true });

    expect(lines.map((line) => line.words.length)).toEqual([2, 2, 2]);
    expect(lines.map((line) => line.indent)).toEqual([20, 0, 0]);
    expect(frame.mock.calls).toEqual([
      [0, true],
      [1, false],
      [2, false],
    ]);
  });

  it('uses the new-line frame for the first line of a continued paragraph', () => {
    const { lines } = breakLines(words('abc'), {
      frame: (_index, first) => (first ? { indent: 20, maxWidth: 80 } : { indent: 5, maxWidth: 95 }),
      spaceWidth: 10,
      startsParagraph: false,
    });
    expect(lines[0].indent).toBe(5);
    expect(lines[0].isParagraphFirst).toBe(false);
  });

  it('closes a line at an explicit break and skips empty segments', () => {
    const { lines } = breakLines([word('a'), BR, BR, word('b')], {
      frame: fixedFrame(100),
      spaceWidth: 10,
      startsParagraph: true,
    });

    expect(lines.map(lineText)).toEqual(['a', 'b']);
    expect(lines.map((line) => line.endsWithExplicitBreak)).toEqual([true, false]);
  });

  it('gives an overlong word a line of its own and reports it', () => {
    const onOverlongWord = vi.fn();
    const { lines } = breakLines(words('aa abcdefgh bb'), {
      frame: fixedFrame(50),
      spaceWidth: 10,
      startsParagraph: true,
      onOverlongWord,
    });

    expect(lines.map(lineText)).toEqual(['aa', 'abcdefgh', 'bb']);
    expect(onOverlongWord).toHaveBeenCalledTimes(1);
    expect(onOverlongWord).toHaveBeenCalledWith(expect.objectContaining({ text: 'abcdefgh' }), 50);
  });

  it('produces no lines for input without words', () => {
    expect(breakLines([BR], { frame: fixedFrame(50), spaceWidth: 10, startsParagraph: true })).toEqual({
      lines: [],
    });
  });
});
