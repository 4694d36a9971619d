import sharp from 'sharp';
import { DecodedImage, ImageDecoder } from '../types';

/**
 * Decodes image bytes and downsamples them so the longest edge is at most
 * `maxDimension` pixels. Smaller images keep their size.
 */
export class SharpImageDecoder implements ImageDecoder {
  constructor(private readonly quality = 80) {}

  async decode(bytes: Buffer, maxDimension: number): Promise<DecodedImage> {
    const { data, info } = await sharp(bytes, { failOn: 'error' })
      .rotate()
      .resize({
        width: maxDimension,
        height: maxDimension,
        fit: 'inside',
        withoutEnlargement: true,
      })
      .webp({ quality: this.quality })
      .toBuffer({ resolveWithObject: true });

    return {
      data,
      width: info.width,
      height: info.height,
      format: info.format,
    };
  }
}
