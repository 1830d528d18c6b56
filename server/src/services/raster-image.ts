import { ImageDecodeError } from '../errors/circle-art.errors';
import { RGBA } from '../models/circle-art.interface';

export type ChannelCount = 3 | 4;

/**
 * Structured-clone friendly form of a RasterImage. The buffer is shared,
 * so posting it to a worker does not copy the pixels.
 */
export interface SharedRasterData {
  buffer: SharedArrayBuffer;
  width: number;
  height: number;
  channels: ChannelCount;
}

/**
 * Decoded pixel buffer, row-major, 8 bits per channel.
 * Three-channel images read back with full alpha.
 */
export class RasterImage {
  private readonly pixels: Uint8Array;

  private constructor(
    private readonly shared: SharedArrayBuffer,
    readonly width: number,
    readonly height: number,
    readonly channels: ChannelCount
  ) {
    this.pixels = new Uint8Array(shared);
  }

  static fromPixels(
    data: Uint8Array,
    width: number,
    height: number,
    channels: ChannelCount
  ): RasterImage {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new ImageDecodeError(`Invalid image dimensions ${width}x${height}`);
    }
    const expected = width * height * channels;
    if (data.length !== expected) {
      throw new ImageDecodeError(
        `Pixel buffer holds ${data.length} bytes, expected ${expected} for ${width}x${height}x${channels}`
      );
    }

    const shared = new SharedArrayBuffer(expected);
    new Uint8Array(shared).set(data);
    return new RasterImage(shared, width, height, channels);
  }

  static fromShared(data: SharedRasterData): RasterImage {
    const expected = data.width * data.height * data.channels;
    if (data.buffer.byteLength !== expected) {
      throw new ImageDecodeError(
        `Shared pixel buffer holds ${data.buffer.byteLength} bytes, expected ${expected}`
      );
    }
    return new RasterImage(data.buffer, data.width, data.height, data.channels);
  }

  toShared(): SharedRasterData {
    return {
      buffer: this.shared,
      width: this.width,
      height: this.height,
      channels: this.channels
    };
  }

  getPixel(x: number, y: number): RGBA {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`Pixel (${x}, ${y}) is outside the ${this.width}x${this.height} image`);
    }
    const offset = (y * this.width + x) * this.channels;
    return {
      r: this.pixels[offset],
      g: this.pixels[offset + 1],
      b: this.pixels[offset + 2],
      a: this.channels === 4 ? this.pixels[offset + 3] : 255
    };
  }
}
