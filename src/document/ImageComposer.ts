import sharp from 'sharp';
import type { DocumentImage } from './types';

/**
 * Stacks two images vertically.
 */
export interface ImageComposer {
  stack(top: DocumentImage, bottom: DocumentImage): Promise<DocumentImage>;
}

/**
 * Top-aligned vertical concatenation on an RGB canvas whose width is the wider
 * of the two images and whose height is their sum.
 */
export class SharpImageComposer implements ImageComposer {
  public async stack(top: DocumentImage, bottom: DocumentImage): Promise<DocumentImage> {
    const [upper, lower] = await Promise.all([
      sharp(top.data).metadata(),
      sharp(bottom.data).metadata(),
    ]);
    if (!upper.width || !upper.height || !lower.width || !lower.height) {
      throw new Error('Cannot read image dimensions');
    }

    const data = await sharp({
      create: {
        width: Math.max(upper.width, lower.width),
        height: upper.height + lower.height,
        channels: 3,
        background: { r: 0, g: 0, b: 0 },
      },
    })
      .composite([
        { input: top.data, top: 0, left: 0 },
        { input: bottom.data, top: upper.height, left: 0 },
      ])
      .png()
      .toBuffer();

    return { data, mimeType: 'image/png' };
  }
}
