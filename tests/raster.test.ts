import { describe, expect, it } from 'vitest';
import { ColorIndex } from '../src/palette.js';
import { createImage, fillRect, getPixel, inverseRotation, rotate, strokeRect, type IndexedImage, type Rotation } from '../src/raster.js';

function numbered(width: number, height: number): IndexedImage {
  const image = createImage(width, height);
  image.pixels.forEach((_, i) => {
    image.pixels[i] = i % 6;
  });
  return image;
}

describe('Raster', () => {
  describe('rotate', () => {
    it('should treat 0 degrees as the identity on a fresh buffer', () => {
      const image = numbered(5, 3);
      const rotated = rotate(image, 0);
      expect(rotated.width).toBe(5);
      expect(rotated.height).toBe(3);
      expect(Array.from(rotated.pixels)).toEqual(Array.from(image.pixels));
      expect(rotated.pixels).not.toBe(image.pixels);
    });

    it('should rotate 90 degrees clockwise', () => {
      // [0 1 2]      [3 0]
      // [3 4 5]  ->  [4 1]
      //              [5 2]
      const rotated = rotate(numbered(3, 2), 90);
      expect(rotated.width).toBe(2);
      expect(rotated.height).toBe(3);
      expect(Array.from(rotated.pixels)).toEqual([3, 0, 4, 1, 5, 2]);
    });

    it('should rotate 180 degrees', () => {
      expect(Array.from(rotate(numbered(3, 2), 180).pixels)).toEqual([5, 4, 3, 2, 1, 0]);
    });

    it.each([90, 180, 270] as const)('should restore the original after %i and its inverse', (rotation: Rotation) => {
      const image = numbered(7, 4);
      const restored = rotate(rotate(image, rotation), inverseRotation(rotation));
      expect(restored.width).toBe(7);
      expect(restored.height).toBe(4);
      expect(Array.from(restored.pixels)).toEqual(Array.from(image.pixels));
    });
  });

  describe('drawing', () => {
    it('should clip rectangles to the image', () => {
      const image = createImage(4, 4);
      fillRect(image, -2, -2, 4, 4, ColorIndex.RED);
      expect(getPixel(image, 0, 0)).toBe(ColorIndex.RED);
      expect(getPixel(image, 1, 1)).toBe(ColorIndex.RED);
      expect(getPixel(image, 2, 2)).toBe(ColorIndex.WHITE);
      expect(getPixel(image, 2, 0)).toBe(ColorIndex.WHITE);
    });

    it('should stroke inside the rectangle bounds', () => {
      const image = createImage(6, 6);
      strokeRect(image, { x: 1, y: 1, width: 4, height: 4 }, ColorIndex.BLACK, 1);
      expect(getPixel(image, 1, 1)).toBe(ColorIndex.BLACK);
      expect(getPixel(image, 4, 4)).toBe(ColorIndex.BLACK);
      expect(getPixel(image, 2, 2)).toBe(ColorIndex.WHITE);
      expect(getPixel(image, 0, 0)).toBe(ColorIndex.WHITE);
      expect(getPixel(image, 5, 5)).toBe(ColorIndex.WHITE);
    });
  });
});
