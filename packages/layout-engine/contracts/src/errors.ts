import type { TextStyle } from './styles.js';

export type TextLayoutErrorCode = 'FORMAT_SYNTAX' | 'CONFIGURATION_MISMATCH' | 'METRICS_UNAVAILABLE' | 'INVALID_CONFIG';

/**
 * Base class for every error the layout engine throws.
 *
 * Consumers should prefer checking `error.code` over `instanceof` for resilience
 * across package boundaries and bundling scenarios.
 */
export class TextLayoutError extends Error {
  readonly code: TextLayoutErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: TextLayoutErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'TextLayoutError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, TextLayoutError.prototype);
  }
}

export type FormatSyntaxDetails = {
  /** The offending marker, or the markers left open at end of input. */
  marker: string;
  /** The whitespace-delimited chunk the marker was found in. */
  word: string;
  /** Character offset of that chunk in the input. */
  position: number;
};

/** Malformed, misplaced or unmatched format marker. The whole write call fails. */
export class FormatSyntaxError extends TextLayoutError {
  declare readonly details: FormatSyntaxDetails;

  constructor(message: string, details: FormatSyntaxDetails) {
    super('FORMAT_SYNTAX', message, details);
    this.name = 'FormatSyntaxError';
    Object.setPrototypeOf(this, FormatSyntaxError.prototype);
  }
}

/** Continuation attempted on a box configured differently from the one that produced the content. */
export class ConfigurationMismatchError extends TextLayoutError {
  declare readonly details: { fields: string[] };

  constructor(fields: string[]) {
    super(
      'CONFIGURATION_MISMATCH',
      `Cannot continue content produced by a differently configured box (differs in: ${fields.join(', ')})`,
      { fields },
    );
    this.name = 'ConfigurationMismatchError';
    Object.setPrototypeOf(this, ConfigurationMismatchError.prototype);
  }
}

/** A style was requested but neither it nor the main style has metrics. */
export class MetricsUnavailableError extends TextLayoutError {
  declare readonly details: { style: TextStyle };

  constructor(style: TextStyle) {
    super('METRICS_UNAVAILABLE', `No font metrics configured for style "${style}" and no main font to fall back on`, {
      style,
    });
    this.name = 'MetricsUnavailableError';
    Object.setPrototypeOf(this, MetricsUnavailableError.prototype);
  }
}

/** Invalid constructor options, or margins that leave no writable area. */
export class TextBoxConfigError extends TextLayoutError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_CONFIG', message, details);
    this.name = 'TextBoxConfigError';
    Object.setPrototypeOf(this, TextBoxConfigError.prototype);
  }
}
