/**
 * Inline format-code parser.
 *
 * Recognises `<b>`, `</b>`, `<i>` and `</i>`. Markers may only sit at the edges of
 * a whitespace-delimited chunk, outside any punctuation:
 *
 *   `<b>one,</b>`   valid
 *   `<b>one</b>,`   FormatSyntaxError (marker between the word and its comma)
 *   `"<i>two"`      FormatSyntaxError (marker inside the chunk)
 *
 * Leading markers take effect before the chunk's text, trailing markers after it.
 */

import { FormatSyntaxError, StyleFlag, type StyleFlagValue, type StyleRun, type TextStyle } from '@textflow/contracts';
import { StyleStack } from './style-stack.js';

type MarkerAction = {
  flag: StyleFlagValue;
  opens: boolean;
};

export const FORMAT_MARKERS: Readonly<Record<string, MarkerAction>> = {
  '<b>': { flag: StyleFlag.Bold, opens: true },
  '</b>': { flag: StyleFlag.Bold, opens: false },
  '<i>': { flag: StyleFlag.Italic, opens: true },
  '</i>': { flag: StyleFlag.Italic, opens: false },
};

const MARKERS = Object.keys(FORMAT_MARKERS);

export type ParseOptions = {
  /** Parse format markers. When false the text is taken literally. */
  formatting: boolean;
  /** Validate and strip markers, but emit everything in the main style. */
  discardFormatting?: boolean;
};

const leadingMarker = (chunk: string): string | undefined => MARKERS.find((marker) => chunk.startsWith(marker));

const trailingMarker = (chunk: string): string | undefined => MARKERS.find((marker) => chunk.endsWith(marker));

const embeddedMarker = (chunk: string): string | undefined => MARKERS.find((marker) => chunk.includes(marker));

class RunBuilder {
  readonly runs: StyleRun[] = [];
  private text = '';
  private style: TextStyle | null = null;

  appendWord(text: string, style: TextStyle): void {
    if (this.style !== null && this.style !== style) this.flush();
    this.style = style;
    this.text += text;
  }

  /** Whitespace joins whatever run is open; it carries no style of its own. */
  appendSpace(text: string, style: TextStyle): void {
    if (this.style === null) this.style = style;
    this.text += text;
  }

  flush(): StyleRun[] {
    if (this.style !== null && this.text.length > 0) {
      this.runs.push({ text: this.text, style: this.style });
    }
    this.text = '';
    this.style = null;
    return this.runs;
  }
}

function applyMarker(stack: StyleStack, marker: string, word: string, position: number): void {
  const action = FORMAT_MARKERS[marker];
  if (!action) return;
  if (action.opens) {
    stack.push(action.flag);
    return;
  }
  if (!stack.close(action.flag)) {
    throw new FormatSyntaxError(`Closing marker "${marker}" has no matching opening marker`, {
      marker,
      word,
      position,
    });
  }
}

/**
 * Splits raw text into style runs.
 *
 * @throws FormatSyntaxError for a marker inside a chunk, a close with nothing open,
 * or opens left unmatched at the end of input.
 *
 * @example
 * ```typescript
 * parseStyleRuns('The <b>quick</b> fox', { formatting: true });
 * // [{ text: 'The ', style: 'main' }, { text: 'quick ', style: 'bold' }, { text: 'fox', style: 'main' }]
 * ```
 */
export function parseStyleRuns(text: string, options: ParseOptions): StyleRun[] {
  if (text.length === 0) return [];
  if (!options.formatting) return [{ text, style: 'main' }];

  const stack = new StyleStack();
  const builder = new RunBuilder();
  const pieces = /(\s+)|(\S+)/g;

  for (let match = pieces.exec(text); match !== null; match = pieces.exec(text)) {
    const [, space, chunk] = match;
    if (space !== undefined) {
      builder.appendSpace(space, stack.style);
      continue;
    }
    if (chunk === undefined) continue;

    let body = chunk;
    for (let marker = leadingMarker(body); marker !== undefined; marker = leadingMarker(body)) {
      applyMarker(stack, marker, chunk, match.index);
      body = body.slice(marker.length);
    }

    const trailing: string[] = [];
    for (let marker = trailingMarker(body); marker !== undefined; marker = trailingMarker(body)) {
      trailing.unshift(marker);
      body = body.slice(0, body.length - marker.length);
    }

    const misplaced = embeddedMarker(body);
    if (misplaced !== undefined) {
      throw new FormatSyntaxError(`Format marker "${misplaced}" must sit at a word boundary, outside punctuation`, {
        marker: misplaced,
        word: chunk,
        position: match.index,
      });
    }

    if (body.length > 0) builder.appendWord(body, stack.style);
    for (const marker of trailing) applyMarker(stack, marker, chunk, match.index);
  }

  if (stack.depth > 0) {
    const open = stack.openMarkers();
    throw new FormatSyntaxError(`Unclosed format marker(s) at end of input: ${open.join(' ')}`, {
      marker: open.join(''),
      word: '',
      position: text.length,
    });
  }

  const runs = builder.flush();
  if (options.discardFormatting) {
    const plain = runs.map((run) => run.text).join('');
    return plain.length > 0 ? [{ text: plain, style: 'main' }] : [];
  }
  return runs;
}

/** Removes valid markers, keeping the text. Throws like {@link parseStyleRuns}. */
export function stripFormatting(text: string): string {
  return parseStyleRuns(text, { formatting: true, discardFormatting: true })
    .map((run) => run.text)
    .join('');
}
