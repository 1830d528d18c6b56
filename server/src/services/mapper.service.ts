import {
  AveragedSample,
  CircleArtConfig,
  CircleDescriptor,
  RGB,
  SamplePoint
} from '../models/circle-art.interface';
import { BLACK, WHITE, toLuminance } from './color.service';
import { getSamplingRadius } from './config.service';

/**
 * Halftone dot radius for a luminance in [0, 1], clamped to the lattice cell.
 * Black-on-white grows dots as the image darkens; white-on-black the reverse.
 */
export function computeHalftoneRadius(luminance: number, config: CircleArtConfig): number {
  const { dotSize } = config;
  if (!dotSize) {
    throw new Error(`Render mode ${config.renderMode} needs a dot size range`);
  }

  const span = dotSize.max - dotSize.min;
  const radius = config.renderMode === 'halftone-white'
    ? dotSize.min + luminance * span
    : dotSize.max - luminance * span;

  return Math.min(getSamplingRadius(config), Math.max(0, radius));
}

/**
 * Turn an averaged sample into the circle drawn for its lattice point,
 * or null when the mode leaves that spot bare.
 */
export function mapSample(
  sample: AveragedSample,
  point: SamplePoint,
  config: CircleArtConfig
): CircleDescriptor | null {
  switch (config.renderMode) {
    case 'color':
      return {
        index: point.index,
        x: point.x,
        y: point.y,
        radius: getSamplingRadius(config),
        fill: {
          r: Math.round(sample.r),
          g: Math.round(sample.g),
          b: Math.round(sample.b)
        },
        opacity: sample.a / 255
      };

    case 'halftone-black':
    case 'halftone-white': {
      const radius = computeHalftoneRadius(toLuminance(sample), config);
      if (radius <= 0) {
        return null;
      }
      return {
        index: point.index,
        x: point.x,
        y: point.y,
        radius,
        fill: config.renderMode === 'halftone-black' ? { ...BLACK } : { ...WHITE },
        opacity: 1
      };
    }
  }
}

/**
 * Canvas colour behind the circles: fixed for halftone, configurable for color
 */
export function getModeBackground(config: CircleArtConfig): RGB | null {
  switch (config.renderMode) {
    case 'halftone-black':
      return { ...WHITE };
    case 'halftone-white':
      return { ...BLACK };
    case 'color':
      return config.background ? { ...config.background } : null;
  }
}
