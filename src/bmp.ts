import { PALETTE_RGB } from './palette.js';
import type { IndexedImage } from './raster.js';

// ============================================================================
// BMP Generation
// ============================================================================

const FILE_HEADER_SIZE = 14;
const DIB_HEADER_SIZE = 40;

/**
 * Encode an indexed image as an 8-bit palettized, top-down BMP.
 * The color table holds the panel palette, so pixel bytes are the palette
 * indices unchanged.
 */
export function encodeBMP(image: IndexedImage): Uint8Array {
  const { width, height, pixels } = image;
  const paddedRowSize = Math.ceil(width / 4) * 4;
  const pixelDataSize = paddedRowSize * height;
  const paletteSize = PALETTE_RGB.length * 4;
  const pixelOffset = FILE_HEADER_SIZE + DIB_HEADER_SIZE + paletteSize;
  const fileSize = pixelOffset + pixelDataSize;

  const buffer = new Uint8Array(fileSize);
  const view = new DataView(buffer.buffer);

  // BMP Header
  buffer[0] = 0x42; buffer[1] = 0x4D;
  view.setUint32(2, fileSize, true);
  view.setUint32(6, 0, true);
  view.setUint32(10, pixelOffset, true);

  // DIB Header
  view.setUint32(14, DIB_HEADER_SIZE, true);
  view.setInt32(18, width, true);
  view.setInt32(22, -height, true); // negative = top-down
  view.setUint16(26, 1, true);
  view.setUint16(28, 8, true); // 8-bit
  view.setUint32(30, 0, true);
  view.setUint32(34, pixelDataSize, true);
  view.setInt32(38, 2835, true);
  view.setInt32(42, 2835, true);
  view.setUint32(46, PALETTE_RGB.length, true);
  view.setUint32(50, PALETTE_RGB.length, true);

  // Color table is stored as BGRA
  const paletteOffset = FILE_HEADER_SIZE + DIB_HEADER_SIZE;
  PALETTE_RGB.forEach(([r, g, b], i) => {
    buffer[paletteOffset + i * 4 + 0] = b;
    buffer[paletteOffset + i * 4 + 1] = g;
    buffer[paletteOffset + i * 4 + 2] = r;
    buffer[paletteOffset + i * 4 + 3] = 0;
  });

  for (let y = 0; y < height; y++) {
    buffer.set(pixels.subarray(y * width, (y + 1) * width), pixelOffset + y * paddedRowSize);
  }

  return buffer;
}
