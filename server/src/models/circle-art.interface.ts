export type SamplingMode = 'grid' | 'hexagonal';

export type RenderMode = 'color' | 'halftone-black' | 'halftone-white';

export interface RGB {
  r: number;
  g: number;
  b: number;
}

export interface RGBA extends RGB {
  a: number;
}

export interface PhysicalSize {
  widthMm: number;
  heightMm: number;
}

export interface DotSizeRange {
  min: number;
  max: number;
}

/**
 * Validated, read-only parameter bundle shared by every pipeline stage.
 * Plain data only, so it survives the structured clone into worker threads.
 */
export interface CircleArtConfig {
  readonly circleDiameter: number;
  readonly circleSpacing: number;
  readonly outputSize: Readonly<PhysicalSize> | null;
  readonly background: Readonly<RGB> | null;
  readonly samplingMode: SamplingMode;
  readonly renderMode: RenderMode;
  readonly dotSize: Readonly<DotSizeRange> | null;
}

export interface SamplePoint {
  index: number;
  row: number;
  column: number;
  x: number;
  y: number;
}

export interface AveragedSample {
  r: number;
  g: number;
  b: number;
  a: number;
  coverage: number;
}

/**
 * One circle in image pixel space, keyed by the sample index it came from
 */
export interface CircleDescriptor {
  index: number;
  x: number;
  y: number;
  radius: number;
  fill: RGB;
  opacity: number;
}

export interface DocumentCircle {
  cx: number;
  cy: number;
  r: number;
  fill: RGB;
  opacity: number;
}

export interface VectorDocument {
  width: number;
  height: number;
  unit: 'mm' | 'px';
  background: RGB | null;
  circles: DocumentCircle[];
}

export interface RenderStats {
  samplePoints: number;
  circles: number;
  skipped: number;
  durationMs: number;
}

export interface SamplingProgress {
  processed: number;
  total: number;
  percentComplete: number;
}
