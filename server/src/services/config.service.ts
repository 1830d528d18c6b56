import { z } from 'zod';
import { InvalidConfigurationError } from '../errors/circle-art.errors';
import { CircleArtConfig, SamplingMode } from '../models/circle-art.interface';
import { parseColor } from './color.service';

export const DEFAULT_CIRCLE_DIAMETER = 10;
export const DEFAULT_CIRCLE_SPACING = 2;

const NO_BACKGROUND = new Set(['', 'none', 'transparent']);

export const samplingModeSchema = z.enum(['grid', 'hexagonal', 'hex']);
export const renderModeSchema = z.enum(['color', 'halftone-black', 'halftone-white']);

const backgroundSchema = z
  .string()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || NO_BACKGROUND.has(value.trim().toLowerCase())) {
      return null;
    }
    try {
      return parseColor(value);
    } catch (error) {
      if (error instanceof InvalidConfigurationError) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.issues.join('; ') });
        return z.NEVER;
      }
      throw error;
    }
  });

export const circleArtConfigSchema = z
  .object({
    circleDiameter: z
      .number()
      .finite()
      .positive('Circle diameter must be positive')
      .default(DEFAULT_CIRCLE_DIAMETER),
    circleSpacing: z
      .number()
      .finite()
      .min(0, 'Circle spacing cannot be negative')
      .default(DEFAULT_CIRCLE_SPACING),
    outputWidthMm: z.number().finite().positive('Output width must be positive').optional(),
    outputHeightMm: z.number().finite().positive('Output height must be positive').optional(),
    backgroundColor: backgroundSchema,
    samplingMode: samplingModeSchema.default('grid'),
    renderMode: renderModeSchema.default('color'),
    minDotSize: z.number().finite().min(0, 'Minimum dot size cannot be negative').optional(),
    maxDotSize: z.number().finite().optional()
  })
  .superRefine((data, ctx) => {
    if ((data.outputWidthMm === undefined) !== (data.outputHeightMm === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Output width and height must be given together'
      });
    }

    const { minDotSize, maxDotSize } = data;
    if ((minDotSize === undefined) !== (maxDotSize === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Minimum and maximum dot sizes must be given together'
      });
    } else if (minDotSize !== undefined && maxDotSize !== undefined) {
      if (minDotSize >= maxDotSize) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'Minimum dot size must be smaller than maximum dot size'
        });
      }
      if (maxDotSize > data.circleDiameter) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'Maximum dot size cannot exceed the circle diameter'
        });
      }
    } else if (data.renderMode !== 'color') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'Halftone modes require minimum and maximum dot sizes'
      });
    }
  });

export type CircleArtConfigInput = z.input<typeof circleArtConfigSchema>;

/**
 * Validate loose input into the immutable configuration every stage shares.
 * All problems are reported at once.
 */
export function createConfig(input: CircleArtConfigInput = {}): CircleArtConfig {
  const parsed = circleArtConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError(parsed.error.issues.map(issue => issue.message));
  }

  const data = parsed.data;
  const samplingMode: SamplingMode = data.samplingMode === 'hex' ? 'hexagonal' : data.samplingMode;

  const outputSize =
    data.outputWidthMm !== undefined && data.outputHeightMm !== undefined
      ? Object.freeze({ widthMm: data.outputWidthMm, heightMm: data.outputHeightMm })
      : null;

  const dotSize =
    data.minDotSize !== undefined && data.maxDotSize !== undefined
      ? Object.freeze({ min: data.minDotSize, max: data.maxDotSize })
      : null;

  return Object.freeze({
    circleDiameter: data.circleDiameter,
    circleSpacing: data.circleSpacing,
    outputSize,
    background: data.backgroundColor ? Object.freeze({ ...data.backgroundColor }) : null,
    samplingMode,
    renderMode: data.renderMode,
    dotSize
  });
}

/**
 * Centre-to-centre distance between neighbouring sample points
 */
export function getPitch(config: CircleArtConfig): number {
  return config.circleDiameter + config.circleSpacing;
}

export function getSamplingRadius(config: CircleArtConfig): number {
  return config.circleDiameter / 2;
}
