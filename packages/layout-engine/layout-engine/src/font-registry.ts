import type { Logger } from '@textflow/common';
import {
  MetricsUnavailableError,
  TEXT_STYLES,
  TextBoxConfigError,
  type FontFingerprint,
  type FontMetricsProvider,
  type TextStyle,
} from '@textflow/contracts';
import { MeasurementCache } from '@textflow/measuring';

export type FontSlot = {
  readonly metrics: FontMetricsProvider;
  readonly size: number;
};

export type FontRegistryOptions = {
  /** Size used for the main style until one is set explicitly. */
  defaultSize: number;
  cacheSize: number;
  logger: Logger;
};

/**
 * Per-style fonts of one box, with the measurement cache in front of them.
 *
 * A style without a font of its own resolves to the main style's font, looked
 * up at call time, so it follows later changes to main.
 */
export class FontRegistry {
  private readonly slots = new Map<TextStyle, FontSlot>();
  private readonly cache: MeasurementCache;
  private readonly logger: Logger;
  private readonly defaultSize: number;

  constructor(options: FontRegistryOptions) {
    this.cache = new MeasurementCache(options.cacheSize);
    this.logger = options.logger;
    this.defaultSize = options.defaultSize;
  }

  /**
   * Assigns a font to a style and clears the measurement cache.
   *
   * Without `metrics` the main style's font is used; without `size`, the main
   * style's current size.
   *
   * @throws MetricsUnavailableError when `metrics` is omitted and main has none
   */
  set(style: TextStyle, metrics?: FontMetricsProvider, size?: number): void {
    const resolvedSize = size ?? this.mainSize;
    if (!Number.isFinite(resolvedSize) || resolvedSize <= 0) {
      throw new TextBoxConfigError(`Font size must be a positive number, got ${resolvedSize}`, { style, size });
    }

    let provider = metrics;
    if (provider === undefined) {
      provider = this.slots.get('main')?.metrics;
      if (provider === undefined) throw new MetricsUnavailableError(style);
      this.logger.debug(`setFont(${style}): no metrics given, using main font "${provider.id}"`);
    }

    this.slots.set(style, { metrics: provider, size: resolvedSize });
    this.cache.clear();
  }

  /** @throws MetricsUnavailableError when neither the style nor main has a font */
  resolve(style: TextStyle): FontSlot {
    const slot = this.slots.get(style) ?? this.slots.get('main');
    if (slot === undefined) throw new MetricsUnavailableError(style);
    return slot;
  }

  get mainSize(): number {
    return this.slots.get('main')?.size ?? this.defaultSize;
  }

  width(text: string, style: TextStyle): number {
    const { metrics, size } = this.resolve(style);
    return this.cache.measure(style, size, text, () => metrics.width(text, style, size));
  }

  /** Inter-word space, always measured in the main style. */
  spaceWidth(): number {
    return this.width(' ', 'main');
  }

  /** Line height of the main style. Every line advances by this much. */
  lineHeight(): number {
    const { metrics, size } = this.resolve('main');
    return metrics.lineHeight('main', size);
  }

  ascent(style: TextStyle): number {
    const { metrics, size } = this.resolve(style);
    return metrics.ascent(style, size);
  }

  fingerprint(): Record<TextStyle, FontFingerprint | null> {
    const entry = (style: TextStyle): FontFingerprint | null => {
      const slot = this.slots.get(style) ?? this.slots.get('main');
      return slot === undefined ? null : { metricsId: slot.metrics.id, size: slot.size };
    };
    return { main: entry('main'), bold: entry('bold'), ital: entry('ital'), boldital: entry('boldital') };
  }

  /** Styles with a font of their own, in style order. */
  explicitSlots(): Array<[TextStyle, FontSlot]> {
    return TEXT_STYLES.flatMap((style): Array<[TextStyle, FontSlot]> => {
      const slot = this.slots.get(style);
      return slot === undefined ? [] : [[style, slot]];
    });
  }
}
