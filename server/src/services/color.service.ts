import namedColors from '../config/named-colors.json';
import { InvalidConfigurationError } from '../errors/circle-art.errors';
import { RGB } from '../models/circle-art.interface';

const NAMED_COLORS: Record<string, string> = namedColors;

const HEX_PATTERN = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i;
const RGB_PATTERN = /^rgb\(\s*(\d{1,3})\s*,\s*(\d{1,3})\s*,\s*(\d{1,3})\s*\)$/i;

// ITU-R BT.601 luma weights
const LUMA_R = 0.299;
const LUMA_G = 0.587;
const LUMA_B = 0.114;

export const BLACK: Readonly<RGB> = Object.freeze({ r: 0, g: 0, b: 0 });
export const WHITE: Readonly<RGB> = Object.freeze({ r: 255, g: 255, b: 255 });

/**
 * Resolve a colour written as #rgb, #rrggbb, rgb(r, g, b) or a CSS name
 */
export function parseColor(text: string): RGB {
  const value = text.trim().toLowerCase();

  const named = NAMED_COLORS[value];
  if (named !== undefined) {
    return parseHex(named);
  }

  if (HEX_PATTERN.test(value)) {
    return parseHex(value);
  }

  const match = RGB_PATTERN.exec(value);
  if (match) {
    const [r, g, b] = [match[1], match[2], match[3]].map(Number);
    if ([r, g, b].every(channel => channel <= 255)) {
      return { r, g, b };
    }
  }

  throw new InvalidConfigurationError([`Unrecognized color "${text}"`]);
}

function parseHex(value: string): RGB {
  let hex = value.replace('#', '');
  if (hex.length === 3) {
    hex = hex.split('').map(c => c + c).join('');
  }
  return {
    r: parseInt(hex.slice(0, 2), 16),
    g: parseInt(hex.slice(2, 4), 16),
    b: parseInt(hex.slice(4, 6), 16)
  };
}

/**
 * Perceptual luminance normalized to [0, 1]
 */
export function toLuminance(color: RGB): number {
  const luma = LUMA_R * color.r + LUMA_G * color.g + LUMA_B * color.b;
  return Math.min(1, Math.max(0, luma / 255));
}

export function formatRgb(color: RGB): string {
  const channel = (value: number) => Math.max(0, Math.min(255, Math.round(value)));
  return `rgb(${channel(color.r)},${channel(color.g)},${channel(color.b)})`;
}
