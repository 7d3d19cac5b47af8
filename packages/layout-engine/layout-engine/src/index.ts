/**
 * @textflow/layout-engine
 *
 * Lays text out into fixed-width lines inside a rectangular box:
 *   parse markers → tokenize → break lines → justify → place on the page → draw
 *
 * `TextBox` is the entry point. The stages are exported for callers that want
 * to lay out without drawing.
 */

export {
  TextBox,
  type WriteOptions,
  type WriteLineOptions,
  type WriteParagraphOptions,
  type ContinueOptions,
} from './text-box.js';
export {
  resolveTextBoxOptions,
  textBoxOptionsSchema,
  writableArea,
  isFontMetricsProvider,
  isCanvas,
  type TextBoxOptions,
  type ResolvedTextBoxOptions,
} from './config.js';
export { captureUnwritten, unwrittenToLines, unwrittenToMarkup, unwrittenWordCount, type CaptureParams } from './continuation.js';
export { FontRegistry, type FontSlot, type FontRegistryOptions } from './font-registry.js';
export { justifyLine, type JustifyOptions } from './justify.js';
export {
  breakLines,
  lineText,
  WIDTH_EPSILON,
  type BreakLinesOptions,
  type BreakLinesResult,
  type LineFrame,
  type LineFrameFn,
} from './layout-paragraph.js';
export { PageState, type PageStateOptions } from './paginator.js';
export { tokenizeRuns, trimBreaks, type MeasureWord } from './tokenize.js';
