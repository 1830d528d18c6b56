import sharp from 'sharp';
import { ImageDecodeError } from '../errors/circle-art.errors';
import { RasterImage } from './raster-image';

export class ImageService {
  /**
   * Decode an uploaded image (PNG, JPEG, WebP, ...) into an RGBA pixel buffer.
   * EXIF orientation is applied so the lattice matches what viewers display.
   */
  async decode(buffer: Buffer): Promise<RasterImage> {
    let decoded: { data: Buffer; info: sharp.OutputInfo };
    try {
      decoded = await sharp(buffer)
        .rotate()
        .toColorspace('srgb')
        .ensureAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ImageDecodeError(`Unable to decode image: ${reason}`);
    }

    const { data, info } = decoded;
    if (info.channels !== 4) {
      throw new ImageDecodeError(`Expected 4 channels after decoding, got ${info.channels}`);
    }

    return RasterImage.fromPixels(data, info.width, info.height, 4);
  }
}
