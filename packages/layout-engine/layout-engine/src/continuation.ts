import {
  StyleFlag,
  bitsFromStyle,
  isWordToken,
  type ConfigFingerprint,
  type Line,
  type StyleBits,
  type TextStyle,
  type Token,
  type UnwrittenContent,
  type WordToken,
} from '@textflow/contracts';
import { lineText } from './layout-paragraph.js';

export type CaptureParams = {
  lines: readonly Line[];
  tail: readonly Token[];
  /** Whether the input was parsed for format markers. */
  formatted: boolean;
  justify: boolean;
  startsParagraph: boolean;
  fingerprint: ConfigFingerprint;
};

/** Packages what a write call could not place. `undefined` when everything was placed. */
export function captureUnwritten(params: CaptureParams): UnwrittenContent | undefined {
  const { lines, tail, formatted, justify, startsParagraph, fingerprint } = params;
  const firstWord = lines[0]?.words[0] ?? tail.find(isWordToken);
  if (firstWord === undefined) return undefined;

  const base = { lines: [...lines], tail: [...tail], justify, startsParagraph, fingerprint };
  return formatted ? { ...base, kind: 'formatted', activeStyle: firstWord.style } : { ...base, kind: 'plain' };
}

export function unwrittenWordCount(content: UnwrittenContent): number {
  const inLines = content.lines.reduce((sum, line) => sum + line.words.length, 0);
  return inLines + content.tail.filter(isWordToken).length;
}

/**
 * The unwritten words as plain text, one entry per pending line.
 *
 * Tail tokens were never wrapped, so each break-delimited segment of the tail
 * becomes one entry.
 */
export function unwrittenToLines(content: UnwrittenContent): string[] {
  const result = content.lines.map(lineText);
  let segment: string[] = [];
  for (const token of content.tail) {
    if (token.kind === 'word') {
      segment.push(token.text);
    } else if (segment.length > 0) {
      result.push(segment.join(' '));
      segment = [];
    }
  }
  if (segment.length > 0) result.push(segment.join(' '));
  return result;
}

type MarkupItem = { kind: 'word'; word: WordToken } | { kind: 'break' };

const markupItems = (content: UnwrittenContent): MarkupItem[] => {
  const items: MarkupItem[] = [];
  for (const line of content.lines) {
    for (const word of line.words) items.push({ kind: 'word', word });
    if (line.endsWithExplicitBreak) items.push({ kind: 'break' });
  }
  for (const token of content.tail) {
    items.push(token.kind === 'word' ? { kind: 'word', word: token } : { kind: 'break' });
  }
  return items;
};

const OPEN_TAGS: ReadonlyArray<[number, string]> = [
  [StyleFlag.Bold, '<b>'],
  [StyleFlag.Italic, '<i>'],
];
const CLOSE_TAGS: ReadonlyArray<[number, string]> = [
  [StyleFlag.Italic, '</i>'],
  [StyleFlag.Bold, '</b>'],
];

const tagsFor = (table: ReadonlyArray<[number, string]>, bits: StyleBits): string =>
  table
    .filter(([flag]) => (bits & flag) !== 0)
    .map(([, tag]) => tag)
    .join('');

/**
 * Rebuilds source text for the unwritten words.
 *
 * Formatted content gets markers wherever the style changes, opening with the
 * style active at the truncation point, so the result parses back to the same
 * styled words. Pending line boundaries become spaces; explicit breaks stay
 * newlines.
 */
export function unwrittenToMarkup(content: UnwrittenContent): string {
  const items = markupItems(content);
  const parts: string[] = [];
  let previous: StyleBits = 0;
  let separator = '';

  for (const item of items) {
    if (item.kind === 'break') {
      if (parts.length > 0) separator = '\n';
      continue;
    }
    const style: TextStyle = content.kind === 'formatted' ? item.word.style : 'main';
    const bits = bitsFromStyle(style);
    if (parts.length > 0) {
      parts[parts.length - 1] += tagsFor(CLOSE_TAGS, previous & ~bits);
    }
    parts.push(separator + tagsFor(OPEN_TAGS, bits & ~previous) + item.word.text);
    previous = bits;
    separator = ' ';
  }
  if (parts.length > 0) parts[parts.length - 1] += tagsFor(CLOSE_TAGS, previous);
  return parts.join('');
}
