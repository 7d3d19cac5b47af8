import type { StyleRun, TextStyle, Token } from '@textflow/contracts';

/** Measures one word in one style, in the box's units. */
export type MeasureWord = (text: string, style: TextStyle) => number;

// `\r\n` and a lone `\r` count as one break each.
const TOKEN_PATTERN = /\r\n|\r|\n|[^\s]+/g;

/**
 * Splits style runs into measured words and explicit breaks.
 *
 * Whitespace other than line breaks only separates words. Leading and trailing
 * breaks are dropped so a paragraph never opens or closes on an empty line.
 */
export function tokenizeRuns(runs: readonly StyleRun[], measure: MeasureWord): Token[] {
  const tokens: Token[] = [];
  for (const run of runs) {
    for (const match of run.text.matchAll(TOKEN_PATTERN)) {
      const piece = match[0];
      if (piece === '\n' || piece === '\r' || piece === '\r\n') {
        tokens.push({ kind: 'break' });
      } else {
        tokens.push({ kind: 'word', text: piece, style: run.style, width: measure(piece, run.style) });
      }
    }
  }
  return trimBreaks(tokens);
}

export function trimBreaks(tokens: readonly Token[]): Token[] {
  let start = 0;
  let end = tokens.length;
  while (start < end && tokens[start].kind === 'break') start += 1;
  while (end > start && tokens[end - 1].kind === 'break') end -= 1;
  return tokens.slice(start, end);
}
