import { ColorIndex } from './palette.js';

// ============================================================================
// Indexed raster
// ============================================================================

/** One palette index per pixel, row-major, top-down. */
export interface IndexedImage {
  width: number;
  height: number;
  pixels: Uint8Array;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type Rotation = 0 | 90 | 180 | 270;

export function createImage(width: number, height: number, fill: ColorIndex = ColorIndex.WHITE): IndexedImage {
  const pixels = new Uint8Array(width * height);
  pixels.fill(fill);
  return { width, height, pixels };
}

export function setPixel(image: IndexedImage, x: number, y: number, color: ColorIndex): void {
  if (x < 0 || y < 0 || x >= image.width || y >= image.height) return;
  image.pixels[y * image.width + x] = color;
}

export function getPixel(image: IndexedImage, x: number, y: number): number {
  return image.pixels[y * image.width + x];
}

// ============================================================================
// Drawing Primitives
// ============================================================================

export function fillRect(image: IndexedImage, x: number, y: number, w: number, h: number, color: ColorIndex): void {
  const x0 = Math.max(0, Math.floor(x));
  const y0 = Math.max(0, Math.floor(y));
  const x1 = Math.min(image.width, Math.floor(x + w));
  const y1 = Math.min(image.height, Math.floor(y + h));
  for (let py = y0; py < y1; py++) {
    image.pixels.fill(color, py * image.width + x0, py * image.width + Math.max(x0, x1));
  }
}

export function drawHLine(image: IndexedImage, y: number, x1: number, x2: number, color: ColorIndex, thickness: number = 1): void {
  fillRect(image, x1, y, x2 - x1, thickness, color);
}

export function drawDashedHLine(
  image: IndexedImage,
  y: number,
  x1: number,
  x2: number,
  color: ColorIndex,
  dashLen: number = 8,
  gapLen: number = 4,
): void {
  let x = x1;
  let drawing = true;
  while (x < x2) {
    if (drawing) {
      fillRect(image, x, y, Math.min(dashLen, x2 - x), 1, color);
      x += dashLen;
    } else {
      x += gapLen;
    }
    drawing = !drawing;
  }
}

/** Border drawn inside the rectangle's bounds. */
export function strokeRect(image: IndexedImage, rect: Rect, color: ColorIndex, thickness: number = 1): void {
  const { x, y, width, height } = rect;
  fillRect(image, x, y, width, thickness, color);
  fillRect(image, x, y + height - thickness, width, thickness, color);
  fillRect(image, x, y, thickness, height, color);
  fillRect(image, x + width - thickness, y, thickness, height, color);
}

export function fillCircle(image: IndexedImage, cx: number, cy: number, r: number, color: ColorIndex): void {
  if (r <= 0) return;
  const r2 = r * r;
  for (let py = Math.floor(cy - r); py <= Math.ceil(cy + r); py++) {
    for (let px = Math.floor(cx - r); px <= Math.ceil(cx + r); px++) {
      const dx = px - cx;
      const dy = py - cy;
      if (dx * dx + dy * dy <= r2) setPixel(image, px, py, color);
    }
  }
}

/** Pixels inside the outer circle but outside the cut circle. */
export function fillCrescent(
  image: IndexedImage,
  cx: number,
  cy: number,
  r: number,
  cutX: number,
  cutY: number,
  cutR: number,
  color: ColorIndex,
): void {
  const r2 = r * r;
  const cut2 = cutR * cutR;
  for (let py = Math.floor(cy - r); py <= Math.ceil(cy + r); py++) {
    for (let px = Math.floor(cx - r); px <= Math.ceil(cx + r); px++) {
      const inside = (px - cx) ** 2 + (py - cy) ** 2 <= r2;
      const cut = (px - cutX) ** 2 + (py - cutY) ** 2 <= cut2;
      if (inside && !cut) setPixel(image, px, py, color);
    }
  }
}

/** Thick line made of square stamps along the segment. */
export function drawLine(
  image: IndexedImage,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  color: ColorIndex,
  width: number = 1,
): void {
  const steps = Math.max(1, Math.ceil(Math.max(Math.abs(x2 - x1), Math.abs(y2 - y1))));
  const half = Math.floor(width / 2);
  for (let t = 0; t <= steps; t++) {
    const px = Math.round(x1 + ((x2 - x1) * t) / steps);
    const py = Math.round(y1 + ((y2 - y1) * t) / steps);
    fillRect(image, px - half, py - half, width, width, color);
  }
}

/** Copy `source` into `target` with its top-left corner at (x, y), clipped. */
export function blit(target: IndexedImage, source: IndexedImage, x: number, y: number): void {
  for (let sy = 0; sy < source.height; sy++) {
    const ty = y + sy;
    if (ty < 0 || ty >= target.height) continue;
    const sx0 = Math.max(0, -x);
    const sx1 = Math.min(source.width, target.width - x);
    if (sx1 <= sx0) continue;
    const row = source.pixels.subarray(sy * source.width + sx0, sy * source.width + sx1);
    target.pixels.set(row, ty * target.width + x + sx0);
  }
}

// ============================================================================
// Rotation
// ============================================================================

/**
 * Rotate clockwise by `rotation` degrees. Always returns a new image;
 * 90 and 270 swap width and height.
 */
export function rotate(image: IndexedImage, rotation: Rotation): IndexedImage {
  const { width: w, height: h, pixels } = image;
  if (rotation === 0) {
    return { width: w, height: h, pixels: pixels.slice() };
  }

  const swap = rotation === 90 || rotation === 270;
  const out = createImage(swap ? h : w, swap ? w : h);

  for (let ny = 0; ny < out.height; ny++) {
    for (let nx = 0; nx < out.width; nx++) {
      let sx: number;
      let sy: number;
      if (rotation === 90) {
        sx = ny;
        sy = h - 1 - nx;
      } else if (rotation === 180) {
        sx = w - 1 - nx;
        sy = h - 1 - ny;
      } else {
        sx = w - 1 - ny;
        sy = nx;
      }
      out.pixels[ny * out.width + nx] = pixels[sy * w + sx];
    }
  }
  return out;
}

export function inverseRotation(rotation: Rotation): Rotation {
  switch (rotation) {
    case 90:
      return 270;
    case 270:
      return 90;
    default:
      return rotation;
  }
}
