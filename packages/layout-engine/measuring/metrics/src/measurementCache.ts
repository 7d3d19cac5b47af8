import { DEFAULT_MEASUREMENT_CACHE_SIZE } from '@textflow/common';
import type { TextStyle } from '@textflow/contracts';

/**
 * Bounded LRU of measured widths, keyed by style, size and text.
 *
 * One cache belongs to one box. Providers are assumed pure for a given key, so
 * entries only go stale when the box swaps a font, which clears the cache.
 */
export class MeasurementCache {
  private readonly entries = new Map<string, number>();
  private readonly capacity: number;

  /** A non-positive or non-finite capacity falls back to the default. */
  constructor(capacity = DEFAULT_MEASUREMENT_CACHE_SIZE) {
    this.capacity = Number.isFinite(capacity) && capacity > 0 ? Math.floor(capacity) : DEFAULT_MEASUREMENT_CACHE_SIZE;
  }

  /** Returns the cached width, or measures, stores and returns it. */
  measure(style: TextStyle, size: number, text: string, compute: () => number): number {
    const key = `${style}|${size}|${text}`;
    const cached = this.entries.get(key);
    if (cached !== undefined) {
      // Re-insert to mark as most recently used.
      this.entries.delete(key);
      this.entries.set(key, cached);
      return cached;
    }
    const width = compute();
    this.entries.set(key, width);
    this.evict();
    return width;
  }

  clear(): void {
    this.entries.clear();
  }

  private evict(): void {
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}
