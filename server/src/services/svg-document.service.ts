import {
  CircleArtConfig,
  CircleDescriptor,
  DocumentCircle,
  VectorDocument
} from '../models/circle-art.interface';
import { formatRgb } from './color.service';
import { getModeBackground } from './mapper.service';

export interface OutputScale {
  x: number;
  y: number;
}

/**
 * Pixel to output-unit factors. With a physical size each axis is scaled on
 * its own, so a size whose aspect ratio differs from the image stretches it.
 */
export function computeOutputScale(imageWidth: number, imageHeight: number, config: CircleArtConfig): OutputScale {
  if (!config.outputSize) {
    return { x: 1, y: 1 };
  }
  return {
    x: config.outputSize.widthMm / imageWidth,
    y: config.outputSize.heightMm / imageHeight
  };
}

export function buildDocument(
  circles: CircleDescriptor[],
  imageWidth: number,
  imageHeight: number,
  config: CircleArtConfig
): VectorDocument {
  const scale = computeOutputScale(imageWidth, imageHeight, config);
  // Circles stay round under non-uniform scaling
  const radiusScale = Math.min(scale.x, scale.y);

  const documentCircles: DocumentCircle[] = circles.map(circle => ({
    cx: circle.x * scale.x,
    cy: circle.y * scale.y,
    r: circle.radius * radiusScale,
    fill: circle.fill,
    opacity: circle.opacity
  }));

  return {
    width: config.outputSize ? config.outputSize.widthMm : imageWidth,
    height: config.outputSize ? config.outputSize.heightMm : imageHeight,
    unit: config.outputSize ? 'mm' : 'px',
    background: getModeBackground(config),
    circles: documentCircles
  };
}

/**
 * At most three decimals, no trailing zeros
 */
export function formatNumber(value: number): string {
  const rounded = Number(value.toFixed(3));
  return Object.is(rounded, -0) ? '0' : String(rounded);
}

export function serializeDocument(doc: VectorDocument): string {
  const width = formatNumber(doc.width);
  const height = formatNumber(doc.height);
  const suffix = doc.unit === 'mm' ? 'mm' : '';

  const lines: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<svg xmlns="http://www.w3.org/2000/svg" version="1.1" width="${width}${suffix}" height="${height}${suffix}" viewBox="0 0 ${width} ${height}">`
  ];

  if (doc.background) {
    lines.push(`  <rect x="0" y="0" width="${width}" height="${height}" fill="${formatRgb(doc.background)}"/>`);
  }

  for (const circle of doc.circles) {
    const opacity = circle.opacity < 1 ? ` fill-opacity="${formatNumber(circle.opacity)}"` : '';
    lines.push(
      `  <circle cx="${formatNumber(circle.cx)}" cy="${formatNumber(circle.cy)}" r="${formatNumber(circle.r)}" fill="${formatRgb(circle.fill)}"${opacity}/>`
    );
  }

  lines.push('</svg>');
  return lines.join('\n') + '\n';
}
