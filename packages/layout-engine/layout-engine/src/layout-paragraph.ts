import type { Line, Token, WordToken } from '@textflow/contracts';

/** Tolerance when comparing accumulated widths against a budget. */
export const WIDTH_EPSILON = 1e-6;

/** Where a line starts and how much room its words get. */
export type LineFrame = {
  indent: number;
  maxWidth: number;
};

/**
 * Width budget for a line, given its position in this call and whether it opens
 * the paragraph.
 */
export type LineFrameFn = (lineIndex: number, isParagraphFirst: boolean) => LineFrame;

export type BreakLinesOptions = {
  frame: LineFrameFn;
  /** Width of the gap between two words on an unjustified line. */
  spaceWidth: number;
  /** Whether the first line produced opens the paragraph. */
  startsParagraph: boolean;
  /** Called for a word wider than its line's budget. It still gets a line of its own. */
  onOverlongWord?: (word: WordToken, maxWidth: number) => void;
};

export type BreakLinesResult = {
  lines: Line[];
};

type OpenLine = {
  words: WordToken[];
  width: number;
  frame: LineFrame;
  isParagraphFirst: boolean;
};

type ClosedLine = Omit<Line, 'isLastLineOfInput'>;

const closeLine = (open: OpenLine, spaceWidth: number, endsWithExplicitBreak: boolean): ClosedLine => ({
  words: open.words,
  indent: open.frame.indent,
  maxWidth: open.frame.maxWidth,
  naturalWidth: open.width,
  spaceWidth,
  isParagraphFirst: open.isParagraphFirst,
  endsWithExplicitBreak,
});

/**
 * Greedy line breaking.
 *
 * Words are appended to the current line while the line's width, with one
 * space between words, stays within its budget. A word that fits nowhere gets a
 * line to itself. Explicit breaks close the current line; an empty segment
 * between two breaks produces no line.
 */
export function breakLines(tokens: readonly Token[], options: BreakLinesOptions): BreakLinesResult {
  const { frame, spaceWidth, onOverlongWord } = options;
  const closed: ClosedLine[] = [];
  let open: OpenLine | null = null;
  let paragraphFirst = options.startsParagraph;

  for (const token of tokens) {
    if (token.kind === 'break') {
      if (open !== null) {
        closed.push(closeLine(open, spaceWidth, true));
        open = null;
        paragraphFirst = false;
      }
      continue;
    }

    if (open !== null) {
      const candidate = open.width + spaceWidth + token.width;
      if (candidate <= open.frame.maxWidth + WIDTH_EPSILON) {
        open.words.push(token);
        open.width = candidate;
        continue;
      }
      closed.push(closeLine(open, spaceWidth, false));
      open = null;
      paragraphFirst = false;
    }

    const lineFrame = frame(closed.length, paragraphFirst);
    if (token.width > lineFrame.maxWidth + WIDTH_EPSILON) onOverlongWord?.(token, lineFrame.maxWidth);
    open = { words: [token], width: token.width, frame: lineFrame, isParagraphFirst: paragraphFirst };
  }
  if (open !== null) closed.push(closeLine(open, spaceWidth, false));

  const lines: Line[] = closed.map((line, index) => ({
    ...line,
    isLastLineOfInput: index === closed.length - 1,
  }));
  return { lines };
}

/** Text of a line's words separated by single spaces. */
export const lineText = (line: Line): string => line.words.map((word) => word.text).join(' ');
