import { describe, expect, it } from 'vitest';
import { isWordToken } from '@textflow/contracts';
import { tokenizeRuns, trimBreaks } from './tokenize.js';

const byLength = (text: string): number => text.length * 10;

describe('tokenizeRuns', () => {
  it('measures each word in its run style', () => {
    const tokens = tokenizeRuns(
      [
        { text: 'The ', style: 'main' },
        { text: 'quick ', style: 'bold' },
        { text: 'fox', style: 'main' },
      ],
      (text, style) => (style === 'bold' ? text.length * 12 : text.length * 10),
    );

    expect(tokens).toEqual([
      { kind: 'word', text: 'The', style: 'main', width: 30 },
      { kind: 'word', text: 'quick', style: 'bold', width: 60 },
      { kind: 'word', text: 'fox', style: 'main', width: 30 },
    ]);
  });

  it('treats every newline convention as one break', () => {
    const tokens = tokenizeRuns([{ text: 'a\r\nb\rc\nd', style: 'main' }], byLength);
    expect(tokens.map((token) => (token.kind === 'word' ? token.text : '|'))).toEqual(['a', '|', 'b', '|', 'c', '|', 'd']);
  });

  it('collapses runs of spaces and tabs', () => {
    const tokens = tokenizeRuns([{ text: '  one \t two   ', style: 'main' }], byLength);
    expect(tokens.filter(isWordToken).map((word) => word.text)).toEqual(['one', 'two']);
  });

  it('drops breaks at either end of the input', () => {
    const tokens = tokenizeRuns([{ text: '\n\nword\n \n', style: 'main' }], byLength);
    expect(tokens).toEqual([{ kind: 'word', text: 'word', style: 'main', width: 40 }]);
  });

  it('returns nothing for empty input', () => {
    expect(tokenizeRuns([], byLength)).toEqual([]);
    expect(tokenizeRuns([{ text: ' \n ', style: 'main' }], byLength)).toEqual([]);
  });
});

describe('trimBreaks', () => {
  it('keeps breaks between words', () => {
    const word = { kind: 'word', text: 'x', style: 'main', width: 10 } as const;
    const br = { kind: 'break' } as const;
    expect(trimBreaks([br, word, br, word, br])).toEqual([word, br, word]);
    expect(trimBreaks([br, br])).toEqual([]);
  });
});
