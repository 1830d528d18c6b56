import { CircleArtError, SampleOutOfBoundsError } from '../errors/circle-art.errors';
import { CircleArtConfig, CircleDescriptor, SamplePoint } from '../models/circle-art.interface';
import { getSamplingRadius } from './config.service';
import { mapSample } from './mapper.service';
import { RasterImage } from './raster-image';
import { sampleArea } from './sampler.service';

export type ChunkOutcome =
  | { index: number; circle: CircleDescriptor }
  | { index: number; circle: null; reason: string };

/**
 * Sample and map one lattice point. Null means the mode draws nothing there.
 */
export function renderPoint(
  image: RasterImage,
  point: SamplePoint,
  config: CircleArtConfig
): CircleDescriptor | null {
  const sample = sampleArea(image, point.x, point.y, getSamplingRadius(config));
  if (!sample) {
    throw new SampleOutOfBoundsError(point.x, point.y);
  }
  return mapSample(sample, point, config);
}

/**
 * Render a run of lattice points. A failing point becomes a skipped outcome;
 * the rest of the chunk carries on.
 */
export function renderChunk(
  points: SamplePoint[],
  image: RasterImage,
  config: CircleArtConfig,
  onPointDone?: (processed: number) => void
): ChunkOutcome[] {
  const outcomes: ChunkOutcome[] = [];

  points.forEach((point, i) => {
    try {
      const circle = renderPoint(image, point, config);
      outcomes.push(
        circle
          ? { index: point.index, circle }
          : { index: point.index, circle: null, reason: 'empty' }
      );
    } catch (error) {
      const reason = error instanceof CircleArtError
        ? error.code
        : error instanceof Error ? error.message : String(error);
      outcomes.push({ index: point.index, circle: null, reason });
    }
    onPointDone?.(i + 1);
  });

  return outcomes;
}
