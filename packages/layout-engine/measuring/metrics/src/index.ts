/**
 * @textflow/measuring
 *
 * Font-metrics providers for the layout engine, and the cache a box keeps in
 * front of whichever provider it uses.
 */

export { MeasurementCache } from './measurementCache.js';
export { createFixedPitchMetrics, type FixedPitchOptions } from './fixed-pitch.js';
export {
  createGlyphTableMetrics,
  parseGlyphTable,
  loadGlyphTable,
  loadSampleGlyphTable,
  glyphTableSchema,
  type GlyphTable,
  type GlyphTableInput,
} from './glyph-table.js';
