import { Logger, type Rgba } from '@textflow/common';
import {
  ConfigurationMismatchError,
  diffFingerprints,
  type Canvas,
  type ConfigFingerprint,
  type FontMetricsProvider,
  type Line,
  type Margins,
  type Point,
  type Size,
  type TextStyle,
  type Token,
  type UnwrittenContent,
  type WordToken,
  isWordToken,
} from '@textflow/contracts';
import { DisplayListPainter, type RenderedSurface } from '@textflow/painter-display-list';
import { parseStyleRuns } from '@textflow/style-engine';
import { resolveTextBoxOptions, writableArea, type ResolvedTextBoxOptions, type TextBoxOptions } from './config.js';
import { captureUnwritten, unwrittenWordCount, type CaptureParams } from './continuation.js';
import { FontRegistry } from './font-registry.js';
import { justifyLine } from './justify.js';
import { WIDTH_EPSILON, breakLines } from './layout-paragraph.js';
import { PageState } from './paginator.js';
import { tokenizeRuns } from './tokenize.js';

export type WriteOptions = {
  /** Parse `<b>`/`<i>` markers. Off by default, so markers are literal text. */
  formatting?: boolean;
  /** Parse and remove markers, writing everything in the main style. */
  discardFormatting?: boolean;
  /** Leave the final line of the box empty, returning what would have gone there. */
  reserveLastLine?: boolean;
  /** Overrides the box's text color for this call. */
  color?: Rgba;
};

export type WriteLineOptions = WriteOptions & {
  justify?: boolean;
  indent?: number;
};

export type WriteParagraphOptions = WriteOptions & {
  justify?: boolean;
  paragraphIndent?: number;
  newLineIndent?: number;
};

export type ContinueOptions = {
  /** Defaults to the justification requested when the content was captured. */
  justify?: boolean;
  reserveLastLine?: boolean;
  color?: Rgba;
};

type Indents = {
  paragraphIndent: number;
  newLineIndent: number;
};

type CommitContext = {
  operation: string;
  justify: boolean;
  reserveLastLine: boolean;
  color: Rgba;
  formatted: boolean;
  startsParagraph: boolean;
  indents: Indents;
};

const ESTIMATE_SAMPLE = 'The Quick Brown Fox Jumps Over The Lazy Dog';
const MAX_ESTIMATE = 100_000;

/**
 * A rectangular writing area that lays text out line by line.
 *
 * The box owns its cursor, its fonts and a display list of everything it drew.
 * Write calls either place all of their input or return the part they could
 * not place as {@link UnwrittenContent}, which a box with the same
 * configuration can pick up through {@link TextBox.continueParagraph}.
 *
 * Cursor coordinates are relative to the top-left corner of the writable area,
 * inside the margins.
 *
 * @example
 * ```typescript
 * const box = new TextBox({ size: { width: 300, height: 120 }, font: createFixedPitchMetrics() });
 * let rest = box.writeParagraph(text, { justify: true });
 * while (rest) {
 *   const next = TextBox.newInstanceWithSameConfig(box);
 *   rest = next.continueParagraph(rest);
 * }
 * ```
 */
export class TextBox {
  readonly size: Size;
  readonly margins: Margins;
  /** Size of the area inside the margins. */
  readonly writable: Size;

  private readonly options: ResolvedTextBoxOptions;
  private readonly logger: Logger;
  private readonly fonts: FontRegistry;
  private readonly page: PageState;
  private readonly painter: DisplayListPainter;
  private readonly finishedRows: string[] = [];
  private rowWords: string[] = [];

  /**
   * @throws TextBoxConfigError for invalid options or margins that leave no writable area
   */
  constructor(options: TextBoxOptions) {
    this.options = resolveTextBoxOptions(options);
    const { size, margins, font, fontSize, spacing, cacheSize, canvas, logger, enableLogging } = this.options;

    this.size = { ...size };
    this.margins = { ...margins };
    this.writable = writableArea(size, margins);
    this.logger = logger ?? new Logger(enableLogging);
    this.fonts = new FontRegistry({ defaultSize: fontSize, cacheSize, logger: this.logger });
    if (font !== undefined) this.fonts.set('main', font, fontSize);
    this.page = new PageState({ area: this.writable, spacing, lineHeight: () => this.fonts.lineHeight() });
    this.painter = new DisplayListPainter(canvas);
  }

  /**
   * A fresh, empty box configured like `other`: same size, margins, indents,
   * spacing, colors and fonts. The canvas is not shared.
   */
  static newInstanceWithSameConfig(other: TextBox, overrides: { canvas?: Canvas } = {}): TextBox {
    const box = new TextBox({ ...other.options, font: undefined, canvas: overrides.canvas, logger: other.logger });
    for (const [style, slot] of other.fonts.explicitSlots()) {
      box.fonts.set(style, slot.metrics, slot.size);
    }
    return box;
  }

  // ---------------------------------------------------------------------------
  // Fonts
  // ---------------------------------------------------------------------------

  /**
   * Registers the font for one style and clears the measurement cache.
   *
   * Without `metrics` the main font is used; without `size`, the main style's
   * current size. Capacity queries reflect the change immediately.
   */
  setFont(style: TextStyle, metrics?: FontMetricsProvider, size?: number): void {
    this.fonts.set(style, metrics, size);
  }

  /** Line height of the main style. */
  get lineHeight(): number {
    return this.fonts.lineHeight();
  }

  // ---------------------------------------------------------------------------
  // Cursor and capacity
  // ---------------------------------------------------------------------------

  linesLeft(): number {
    return this.page.linesLeft();
  }

  onLastLine(): boolean {
    return this.page.onLastLine();
  }

  isExhausted(): boolean {
    return this.page.isExhausted();
  }

  /** True while nothing has been written on the current line. */
  atNewLine(): boolean {
    return this.page.atLineStart();
  }

  getCursor(): Point {
    return this.page.cursor();
  }

  setCursor(point: Point): void {
    this.finishRow();
    this.page.moveTo(point);
  }

  resetCursor(): void {
    this.setCursor({ x: 0, y: 0 });
  }

  /** Moves to the next line, `newLineIndent` in from the left edge. Writes nothing. */
  nextLineCursor(): void {
    this.finishRow();
    this.page.advanceLine(this.options.newLineIndent);
  }

  // ---------------------------------------------------------------------------
  // Writing
  // ---------------------------------------------------------------------------

  /**
   * Writes the text as a single line starting at the cursor, or at the start
   * of the next line when its first word does not fit after the cursor.
   *
   * Input with an interior line break, input too wide for one line, and input
   * arriving when the box is full all come back whole as unwritten content. A
   * lone word wider than the line is written anyway.
   *
   * @throws FormatSyntaxError before anything is drawn
   */
  writeLine(text: string, options: WriteLineOptions = {}): UnwrittenContent | undefined {
    const tokens = this.tokenize(text, options);
    if (tokens.length === 0) return undefined;

    const justify = options.justify ?? false;
    const indent = options.indent ?? 0;
    const freshLine = !this.fitsAfterCursor(indent + firstWordWidth(tokens));
    const startX = freshLine ? 0 : this.page.x;
    const { lines } = breakLines(tokens, {
      frame: () => ({ indent, maxWidth: this.writable.width - startX - indent }),
      spaceWidth: this.fonts.spaceWidth(),
      startsParagraph: false,
      onOverlongWord: (word, maxWidth) => this.reportOverlong(word, maxWidth),
    });

    const giveBack = (): UnwrittenContent | undefined =>
      this.leaveUnwritten('writeLine', {
        lines: [],
        tail: tokens,
        formatted: isFormatted(options),
        justify,
        startsParagraph: true,
      });

    if (lines.length !== 1) return giveBack();
    if (freshLine) this.moveToFreshLine();
    if (options.reserveLastLine && this.page.onLastLine()) return giveBack();
    // A standalone line is never the tail of a paragraph, so it may be stretched.
    const line: Line = { ...lines[0], isLastLineOfInput: false };
    if (!this.commitLine(line, startX, justify, options.color ?? this.options.color)) return giveBack();
    return undefined;
  }

  /**
   * Wraps the text into lines and writes them until the input or the box runs
   * out. The first line uses the paragraph indent and starts at the cursor,
   * unless its first word only fits on a line of its own.
   *
   * @throws FormatSyntaxError before anything is drawn
   */
  writeParagraph(text: string, options: WriteParagraphOptions = {}): UnwrittenContent | undefined {
    const tokens = this.tokenize(text, options);
    if (tokens.length === 0) return undefined;

    const indents: Indents = {
      paragraphIndent: options.paragraphIndent ?? this.options.paragraphIndent,
      newLineIndent: options.newLineIndent ?? this.options.newLineIndent,
    };
    const lines = this.wrap(tokens, true, indents);
    return this.commitLines(lines, [], {
      operation: 'writeParagraph',
      justify: options.justify ?? false,
      reserveLastLine: options.reserveLastLine ?? false,
      color: options.color ?? this.options.color,
      formatted: isFormatted(options),
      startsParagraph: true,
      indents,
    });
  }

  /**
   * Resumes content another box could not place. Pending lines are written as
   * they were wrapped; the raw tail is wrapped here.
   *
   * @throws ConfigurationMismatchError when this box is configured differently
   * from the one that captured the content
   */
  continueParagraph(unwritten: UnwrittenContent, options: ContinueOptions = {}): UnwrittenContent | undefined {
    const fields = diffFingerprints(unwritten.fingerprint, this.configFingerprint());
    if (fields.length > 0) {
      this.logger.warn(`continueParagraph rejected: configuration differs in ${fields.join(', ')}`);
      throw new ConfigurationMismatchError(fields);
    }

    return this.commitLines(unwritten.lines, unwritten.tail, {
      operation: 'continueParagraph',
      justify: options.justify ?? unwritten.justify,
      reserveLastLine: options.reserveLastLine ?? false,
      color: options.color ?? this.options.color,
      formatted: unwritten.kind === 'formatted',
      startsParagraph: unwritten.startsParagraph,
      indents: { paragraphIndent: this.options.paragraphIndent, newLineIndent: this.options.newLineIndent },
    });
  }

  /**
   * Writes word by word from the cursor, moving to the next line when a word
   * does not fit. Never justifies. Consecutive line breaks count as one, as in
   * paragraph mode. The cursor is left after the last word, one space on, so a
   * later call continues the same line.
   *
   * @throws FormatSyntaxError before anything is drawn
   */
  write(text: string, options: WriteOptions = {}): UnwrittenContent | undefined {
    const tokens = this.tokenize(text, options);
    if (tokens.length === 0) return undefined;

    const color = options.color ?? this.options.color;
    const spaceWidth = this.fonts.spaceWidth();
    for (let index = 0; index < tokens.length; index += 1) {
      const token = tokens[index];
      if (token.kind === 'break') {
        if (tokens[index - 1]?.kind !== 'break') this.nextLineCursor();
        continue;
      }

      const fits = (): boolean => this.page.x + token.width <= this.writable.width + WIDTH_EPSILON;
      if (!fits() && !this.page.atLineStart()) this.nextLineCursor();

      if (this.page.isExhausted() || (options.reserveLastLine && this.page.onLastLine())) {
        return this.leaveUnwritten('write', {
          lines: [],
          tail: tokens.slice(index),
          formatted: isFormatted(options),
          justify: false,
          startsParagraph: false,
        });
      }
      if (!fits()) this.reportOverlong(token, this.writable.width - this.page.x);

      this.drawWord(token, this.page.x, color);
      this.page.advanceX(token.width + spaceWidth);
    }
    return undefined;
  }

  // ---------------------------------------------------------------------------
  // Output and introspection
  // ---------------------------------------------------------------------------

  /** The whole box, margins included, with every run drawn so far. */
  render(): RenderedSurface {
    return this.painter.snapshot({
      size: this.size,
      offset: { x: this.margins.left, y: this.margins.top },
      background: this.options.background,
    });
  }

  /** Text of every line written so far, words joined by single spaces. */
  writtenLines(): string[] {
    return this.rowWords.length > 0 ? [...this.finishedRows, this.rowWords.join(' ')] : [...this.finishedRows];
  }

  /** The settings a continuation must match. */
  configFingerprint(): ConfigFingerprint {
    return {
      writableWidth: this.writable.width,
      margins: { ...this.margins },
      paragraphIndent: this.options.paragraphIndent,
      newLineIndent: this.options.newLineIndent,
      spacing: this.options.spacing,
      fonts: this.fonts.fingerprint(),
    };
  }

  /** How many characters of mixed-case sample text fit across the writable width in the main font. */
  estimateCharsPerLine(): number {
    const { metrics, size } = this.fonts.resolve('main');
    let sample = ESTIMATE_SAMPLE[0];
    let count = 1;
    while (count < MAX_ESTIMATE) {
      sample += ESTIMATE_SAMPLE[count % ESTIMATE_SAMPLE.length];
      if (metrics.width(sample, 'main', size) > this.writable.width) break;
      count += 1;
    }
    return count;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private tokenize(text: string, options: WriteOptions): Token[] {
    const runs = parseStyleRuns(text, {
      formatting: (options.formatting ?? false) || (options.discardFormatting ?? false),
      discardFormatting: options.discardFormatting,
    });
    return tokenizeRuns(runs, (word, style) => this.fonts.width(word, style));
  }

  /** Breaks tokens into lines from the cursor, first moving to a fresh line if the opening word needs one. */
  private wrap(tokens: readonly Token[], startsParagraph: boolean, indents: Indents): Line[] {
    const firstIndent = startsParagraph ? indents.paragraphIndent : indents.newLineIndent;
    if (!this.fitsAfterCursor(firstIndent + firstWordWidth(tokens))) this.moveToFreshLine();
    const startX = this.page.x;
    const { lines } = breakLines(tokens, {
      frame: (lineIndex, isParagraphFirst) => {
        const indent = isParagraphFirst ? indents.paragraphIndent : indents.newLineIndent;
        return { indent, maxWidth: this.writable.width - indent - (lineIndex === 0 ? startX : 0) };
      },
      spaceWidth: this.fonts.spaceWidth(),
      startsParagraph,
      onOverlongWord: (word, maxWidth) => this.reportOverlong(word, maxWidth),
    });
    return lines;
  }

  private commitLines(lines: readonly Line[], tail: readonly Token[], ctx: CommitContext): UnwrittenContent | undefined {
    // Lines resumed from another box may not fit after this box's cursor.
    if (lines.length > 0 && !this.fitsAfterCursor(lines[0].indent + lines[0].naturalWidth)) this.moveToFreshLine();
    let startX = this.page.x;
    for (let index = 0; index < lines.length; index += 1) {
      const blocked = ctx.reserveLastLine && this.page.onLastLine();
      if (blocked || !this.commitLine(lines[index], startX, ctx.justify, ctx.color)) {
        return this.leaveUnwritten(ctx.operation, {
          lines: lines.slice(index),
          tail,
          formatted: ctx.formatted,
          justify: ctx.justify,
          startsParagraph: ctx.startsParagraph && index === 0,
        });
      }
      startX = 0;
    }

    if (!tail.some(isWordToken)) return undefined;
    const startsParagraph = ctx.startsParagraph && lines.length === 0;
    return this.commitLines(this.wrap(tail, startsParagraph, ctx.indents), [], { ...ctx, startsParagraph });
  }

  /** Draws one line and moves to the next. False when the box is full or the line no longer fits. */
  private commitLine(line: Line, startX: number, justify: boolean, color: Rgba): boolean {
    if (this.page.isExhausted()) return false;

    const left = startX + line.indent;
    const budget = this.writable.width - left;
    if (line.words.length > 1 && line.naturalWidth > budget + WIDTH_EPSILON) return false;

    const laid = justifyLine(line, { justify, budget });
    let x = left;
    laid.line.words.forEach((word, index) => {
      this.drawWord(word, x, color);
      x += word.width + (index < laid.gaps.length ? laid.gaps[index] : 0);
    });

    this.moveToFreshLine();
    return true;
  }

  /** Whether `width` fits between the cursor and the right edge. Always true at `x = 0`. */
  private fitsAfterCursor(width: number): boolean {
    return this.page.x <= 0 || this.page.x + width <= this.writable.width + WIDTH_EPSILON;
  }

  private moveToFreshLine(): void {
    this.finishRow();
    this.page.advanceLine(0);
  }

  private drawWord(word: WordToken, x: number, color: Rgba): void {
    const { size } = this.fonts.resolve(word.style);
    const y = this.page.y;
    this.painter.drawRun(word.text, word.style, size, { x, y, baseline: y + this.fonts.ascent(word.style) }, { color });
    this.rowWords.push(word.text);
  }

  private finishRow(): void {
    if (this.rowWords.length === 0) return;
    this.finishedRows.push(this.rowWords.join(' '));
    this.rowWords = [];
  }

  private leaveUnwritten(operation: string, params: Omit<CaptureParams, 'fingerprint'>): UnwrittenContent | undefined {
    const content = captureUnwritten({ ...params, fingerprint: this.configFingerprint() });
    if (content !== undefined) {
      this.logger.debug(`${operation}: ${unwrittenWordCount(content)} word(s) left unwritten`);
    }
    return content;
  }

  private reportOverlong(word: WordToken, maxWidth: number): void {
    this.logger.debug(`Word "${word.text}" (${word.width}) is wider than its line (${maxWidth}); placing it alone`);
  }
}

const firstWordWidth = (tokens: readonly Token[]): number => tokens.find(isWordToken)?.width ?? 0;

const isFormatted = (options: WriteOptions): boolean =>
  (options.formatting ?? false) && !(options.discardFormatting ?? false);
