import { z } from 'zod';
import {
  DEFAULT_BACKGROUND_COLOR,
  DEFAULT_FONT_SIZE,
  DEFAULT_LINE_SPACING,
  DEFAULT_MEASUREMENT_CACHE_SIZE,
  DEFAULT_TEXT_COLOR,
  Logger,
  type Rgba,
} from '@textflow/common';
import { TextBoxConfigError, type Canvas, type FontMetricsProvider, type Margins, type Size } from '@textflow/contracts';

/** Options accepted by the `TextBox` constructor. Everything but `size` is optional. */
export type TextBoxOptions = {
  /** Outer size of the box, margins included. */
  size: Size;
  /** Font of the main style. Other styles fall back to it until set. */
  font?: FontMetricsProvider;
  fontSize?: number;
  /** Indent of the first line of a paragraph. */
  paragraphIndent?: number;
  /** Indent of every later line of a paragraph. */
  newLineIndent?: number;
  /** Gap between consecutive lines. */
  spacing?: number;
  margins?: Partial<Margins>;
  color?: Rgba;
  background?: Rgba;
  /** Surface to draw on, in addition to the box's own display list. */
  canvas?: Canvas;
  logger?: Logger;
  /** Ignored when `logger` is given. */
  enableLogging?: boolean;
  /** Capacity of the box's measurement cache. */
  cacheSize?: number;
};

const isFunctionProperty = (value: object, key: string): boolean =>
  key in value && typeof Reflect.get(value, key) === 'function';

export const isFontMetricsProvider = (value: unknown): value is FontMetricsProvider =>
  typeof value === 'object' &&
  value !== null &&
  typeof Reflect.get(value, 'id') === 'string' &&
  ['width', 'lineHeight', 'ascent'].every((key) => isFunctionProperty(value, key));

export const isCanvas = (value: unknown): value is Canvas =>
  typeof value === 'object' && value !== null && isFunctionProperty(value, 'drawRun');

const distance = z.number().finite().nonnegative();
const channel = z.number().int().min(0).max(255);
const rgbaSchema = z.tuple([channel, channel, channel, channel]);

const toTuple = (color: Rgba): [number, number, number, number] => [color[0], color[1], color[2], color[3]];

export const textBoxOptionsSchema = z.object({
  size: z.object({
    width: z.number().finite().positive(),
    height: z.number().finite().positive(),
  }),
  font: z.custom<FontMetricsProvider>(isFontMetricsProvider, { message: 'Expected a font metrics provider' }).optional(),
  fontSize: z.number().finite().positive().default(DEFAULT_FONT_SIZE),
  paragraphIndent: distance.default(0),
  newLineIndent: distance.default(0),
  spacing: distance.default(DEFAULT_LINE_SPACING),
  margins: z
    .object({
      left: distance.default(0),
      top: distance.default(0),
      right: distance.default(0),
      bottom: distance.default(0),
    })
    .default({}),
  color: rgbaSchema.default(() => toTuple(DEFAULT_TEXT_COLOR)),
  background: rgbaSchema.default(() => toTuple(DEFAULT_BACKGROUND_COLOR)),
  canvas: z.custom<Canvas>(isCanvas, { message: 'Expected an object with a drawRun method' }).optional(),
  logger: z.instanceof(Logger).optional(),
  enableLogging: z.boolean().default(false),
  cacheSize: z.number().int().positive().default(DEFAULT_MEASUREMENT_CACHE_SIZE),
});

export type ResolvedTextBoxOptions = z.output<typeof textBoxOptionsSchema>;

/**
 * Validates constructor options and fills in defaults.
 *
 * @throws TextBoxConfigError listing schema issues, or when the margins leave no
 * writable area
 */
export function resolveTextBoxOptions(input: TextBoxOptions): ResolvedTextBoxOptions {
  const result = textBoxOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new TextBoxConfigError('Invalid text box options', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }

  const options = result.data;
  const area = writableArea(options.size, options.margins);
  if (area.width <= 0 || area.height <= 0) {
    throw new TextBoxConfigError('Margins leave no writable area', { size: options.size, margins: options.margins });
  }
  return options;
}

export const writableArea = (size: Size, margins: Margins): Size => ({
  width: size.width - margins.left - margins.right,
  height: size.height - margins.top - margins.bottom,
});
