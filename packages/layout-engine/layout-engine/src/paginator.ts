import { TextBoxConfigError, type Point, type Size } from '@textflow/contracts';

// Absorbs float drift from summing fractional line steps.
const LINE_COUNT_EPSILON = 1e-9;

export type PageStateOptions = {
  /** Writable area, margins already removed. */
  area: Size;
  /** Vertical gap between consecutive lines. */
  spacing: number;
  /** Height of one line in the main style. Read on every call, since fonts can change. */
  lineHeight: () => number;
};

/**
 * Cursor and remaining capacity of one writable area.
 *
 * Coordinates are relative to the top-left of the writable area. `y` is the top
 * of the line the cursor is on.
 */
export class PageState {
  x = 0;
  y = 0;
  /** Where the current line began. Word mode treats the cursor as at a fresh line when `x` is here. */
  lineStartX = 0;

  constructor(private readonly options: PageStateOptions) {}

  get area(): Size {
    return this.options.area;
  }

  get lineStep(): number {
    const step = this.options.lineHeight() + this.options.spacing;
    if (!(step > 0)) {
      throw new TextBoxConfigError('Line height plus spacing must be positive', { step });
    }
    return step;
  }

  linesLeft(): number {
    const remaining = this.options.area.height - this.y;
    if (remaining <= 0) return 0;
    return Math.floor(remaining / this.lineStep + LINE_COUNT_EPSILON);
  }

  onLastLine(): boolean {
    return this.linesLeft() === 1;
  }

  isExhausted(): boolean {
    return this.linesLeft() < 1;
  }

  atLineStart(): boolean {
    return this.x === this.lineStartX;
  }

  /** Moves to the start of the next line, `indent` in from the left edge. */
  advanceLine(indent = 0): void {
    this.y += this.lineStep;
    this.x = indent;
    this.lineStartX = indent;
  }

  advanceX(dx: number): void {
    this.x += dx;
  }

  cursor(): Point {
    return { x: this.x, y: this.y };
  }

  moveTo(point: Point): void {
    this.x = point.x;
    this.y = point.y;
    this.lineStartX = point.x;
  }
}
