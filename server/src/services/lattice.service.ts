import { CircleArtConfig, SamplePoint } from '../models/circle-art.interface';
import { getPitch, getSamplingRadius } from './config.service';

/** sin(60°): vertical distance between hexagonal rows, in pitches */
export const HEXAGONAL_ROW_HEIGHT_FACTOR = Math.sqrt(3) / 2;

/**
 * Sample points covering a width x height image, in row-major order.
 *
 * Points start half a pitch in from the top-left corner. A point is only kept
 * when its whole sampling disc lies inside the image; discs that would poke
 * past the right or bottom edge are dropped, not clipped.
 */
export function generateLattice(width: number, height: number, config: CircleArtConfig): SamplePoint[] {
  const pitch = getPitch(config);
  const radius = getSamplingRadius(config);
  const hexagonal = config.samplingMode === 'hexagonal';
  const rowHeight = hexagonal ? pitch * HEXAGONAL_ROW_HEIGHT_FACTOR : pitch;
  const origin = pitch / 2;

  const points: SamplePoint[] = [];

  for (let row = 0; ; row++) {
    const y = origin + row * rowHeight;
    if (y + radius > height) break;

    const rowOffset = hexagonal && row % 2 === 1 ? pitch / 2 : 0;
    let column = 0;
    for (;;) {
      const x = origin + rowOffset + column * pitch;
      if (x + radius > width) break;
      if (x - radius >= 0 && y - radius >= 0) {
        points.push({ index: points.length, row, column, x, y });
      }
      column++;
    }
  }

  return points;
}

export interface LatticeSummary {
  rows: number;
  points: number;
  /** Widest row */
  columns: number;
}

export function describeLattice(points: SamplePoint[]): LatticeSummary {
  const perRow = new Map<number, number>();
  for (const point of points) {
    perRow.set(point.row, (perRow.get(point.row) ?? 0) + 1);
  }
  return {
    rows: perRow.size,
    points: points.length,
    columns: Math.max(0, ...perRow.values())
  };
}
