/**
 * SharpImageComposer 单元测试
 */

import sharp from 'sharp';
import { describe, expect, it } from 'vitest';
import { SharpImageComposer } from '../../src/document/ImageComposer';
import type { DocumentImage } from '../../src/document/types';

async function solid(width: number, height: number): Promise<DocumentImage> {
  const data = await sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 10, b: 10 } },
  }).png().toBuffer();
  return { data, mimeType: 'image/png' };
}

describe('SharpImageComposer', () => {
  const composer = new SharpImageComposer();

  describe('stack()', () => {
    it('should stack images top to bottom on the wider canvas', async () => {
      const result = await composer.stack(await solid(4, 2), await solid(6, 3));

      const metadata = await sharp(result.data).metadata();
      expect(result.mimeType).toBe('image/png');
      expect(metadata.width).toBe(6);
      expect(metadata.height).toBe(5);
    });

    it('should reject data that is not an image', async () => {
      const broken: DocumentImage = { data: Buffer.from('not an image'), mimeType: 'image/png' };

      await expect(composer.stack(broken, await solid(2, 2))).rejects.toThrow();
    });
  });
});
