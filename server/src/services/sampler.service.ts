import { AveragedSample } from '../models/circle-art.interface';
import { RasterImage } from './raster-image';

/**
 * Channel-wise mean of every pixel whose centre lies within `radius` of
 * (x, y). Returns null when the disc covers no pixel centre.
 */
export function sampleArea(image: RasterImage, x: number, y: number, radius: number): AveragedSample | null {
  if (!Number.isFinite(x) || !Number.isFinite(y) || !(radius >= 0)) {
    return null;
  }

  const xStart = Math.max(0, Math.floor(x - radius));
  const xEnd = Math.min(image.width - 1, Math.ceil(x + radius));
  const yStart = Math.max(0, Math.floor(y - radius));
  const yEnd = Math.min(image.height - 1, Math.ceil(y + radius));
  const radiusSquared = radius * radius;

  let rSum = 0;
  let gSum = 0;
  let bSum = 0;
  let aSum = 0;
  let coverage = 0;

  for (let py = yStart; py <= yEnd; py++) {
    const dy = py + 0.5 - y;
    for (let px = xStart; px <= xEnd; px++) {
      const dx = px + 0.5 - x;
      if (dx * dx + dy * dy > radiusSquared) continue;

      const pixel = image.getPixel(px, py);
      rSum += pixel.r;
      gSum += pixel.g;
      bSum += pixel.b;
      aSum += pixel.a;
      coverage++;
    }
  }

  if (coverage === 0) {
    return null;
  }

  return {
    r: rSum / coverage,
    g: gSum / coverage,
    b: bSum / coverage,
    a: aSum / coverage,
    coverage
  };
}
