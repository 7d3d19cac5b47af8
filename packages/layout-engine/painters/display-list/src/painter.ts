import type { Rgba } from '@textflow/common';
import type { Canvas, Point, RunPaint, RunPosition, Size, TextStyle } from '@textflow/contracts';

/** One recorded draw call. */
export type PaintedRun = {
  readonly text: string;
  readonly style: TextStyle;
  readonly size: number;
  readonly x: number;
  readonly y: number;
  readonly baseline: number;
  readonly color: Rgba;
};

/** A flattened, self-contained copy of everything painted, in paint order. */
export type RenderedSurface = {
  readonly width: number;
  readonly height: number;
  readonly background: Rgba;
  readonly runs: readonly PaintedRun[];
};

export type SnapshotOptions = {
  /** Full surface size. */
  size: Size;
  /** Added to every run's coordinates. */
  offset?: Point;
  background: Rgba;
};

/**
 * Canvas that records draw calls instead of rasterizing them.
 *
 * Optionally forwards every call to another canvas, so a box can keep its own
 * record while a caller-supplied surface does the real drawing.
 */
export class DisplayListPainter implements Canvas {
  private readonly runs: PaintedRun[] = [];
  private readonly forwardTo?: Canvas;

  constructor(forwardTo?: Canvas) {
    this.forwardTo = forwardTo;
  }

  drawRun(text: string, style: TextStyle, size: number, position: RunPosition, paint: RunPaint): void {
    this.runs.push({
      text,
      style,
      size,
      x: position.x,
      y: position.y,
      baseline: position.baseline,
      color: paint.color,
    });
    this.forwardTo?.drawRun(text, style, size, position, paint);
  }

  /** Everything recorded so far, shifted by `offset`. Shares no arrays with the painter or the options. */
  snapshot(options: SnapshotOptions): RenderedSurface {
    const dx = options.offset?.x ?? 0;
    const dy = options.offset?.y ?? 0;
    return {
      width: options.size.width,
      height: options.size.height,
      background: copyRgba(options.background),
      runs: this.runs.map((run) => ({
        ...run,
        x: run.x + dx,
        y: run.y + dy,
        baseline: run.baseline + dy,
        color: copyRgba(run.color),
      })),
    };
  }
}

const copyRgba = ([r, g, b, a]: Rgba): Rgba => [r, g, b, a];
