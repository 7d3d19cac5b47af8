export {
  DisplayListPainter,
  type PaintedRun,
  type RenderedSurface,
  type SnapshotOptions,
} from './painter.js';
