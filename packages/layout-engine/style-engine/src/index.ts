/**
 * @textflow/style-engine
 *
 * Turns raw text with inline format markers into style runs the tokenizer consumes.
 */

export { parseStyleRuns, stripFormatting, FORMAT_MARKERS, type ParseOptions } from './format-parser.js';
export { StyleStack } from './style-stack.js';
