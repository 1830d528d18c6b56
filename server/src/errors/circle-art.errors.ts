export type CircleArtErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'EMPTY_SAMPLE_SET'
  | 'SAMPLE_OUT_OF_BOUNDS'
  | 'IMAGE_DECODE_FAILED'
  | 'UNSUPPORTED_MEDIA_TYPE'
  | 'PROCESSING_FAILED';

/**
 * Base class for every failure the rendering pipeline reports.
 * `status` is the HTTP status the API answers with.
 */
export class CircleArtError extends Error {
  constructor(
    readonly code: CircleArtErrorCode,
    readonly status: number,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidConfigurationError extends CircleArtError {
  constructor(readonly issues: string[]) {
    super('INVALID_CONFIGURATION', 400, `Invalid configuration: ${issues.join('; ')}`);
  }
}

export class EmptySampleSetError extends CircleArtError {
  constructor(imageWidth: number, imageHeight: number, pitch: number) {
    super(
      'EMPTY_SAMPLE_SET',
      422,
      `No sample points fit a ${imageWidth}x${imageHeight} image with a pitch of ${pitch}px`
    );
  }
}

// Raised per point and handled by skipping it; never leaves the sampler stage
export class SampleOutOfBoundsError extends CircleArtError {
  constructor(x: number, y: number) {
    super('SAMPLE_OUT_OF_BOUNDS', 500, `Sampling disc at (${x}, ${y}) covers no pixels`);
  }
}

export class ImageDecodeError extends CircleArtError {
  constructor(message: string) {
    super('IMAGE_DECODE_FAILED', 415, message);
  }
}

export class UnsupportedMediaTypeError extends CircleArtError {
  constructor(readonly mimeType: string) {
    super('UNSUPPORTED_MEDIA_TYPE', 415, `Unsupported upload type ${mimeType}; expected an image`);
  }
}

export class ProcessingError extends CircleArtError {
  constructor(message: string) {
    super('PROCESSING_FAILED', 500, message);
  }
}
