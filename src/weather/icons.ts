import type { ColorIndex } from '../palette.js';
import { drawLine, fillCircle, fillCrescent, fillRect, type IndexedImage } from '../raster.js';

// Weather icons (solid line art scaled to a square box)

export type IconShape =
  | 'sun'
  | 'moon'
  | 'partly'
  | 'cloud'
  | 'rain'
  | 'pour'
  | 'snow'
  | 'sleet'
  | 'hail'
  | 'lightning'
  | 'storm'
  | 'fog'
  | 'wind'
  | 'alert';

/** Pixels by which the outline pass grows every stroke and disc. */
export const OUTLINE_GROW = 2;

interface Pen {
  disc(cx: number, cy: number, r: number): void;
  stroke(x1: number, y1: number, x2: number, y2: number, width: number): void;
  block(x: number, y: number, w: number, h: number): void;
  crescent(cx: number, cy: number, r: number, cutX: number, cutY: number, cutR: number): void;
}

function createPen(image: IndexedImage, color: ColorIndex, grow: number): Pen {
  const r = Math.round;
  return {
    disc: (cx, cy, radius) => fillCircle(image, r(cx), r(cy), r(radius) + grow, color),
    stroke: (x1, y1, x2, y2, width) => drawLine(image, r(x1), r(y1), r(x2), r(y2), color, Math.max(1, r(width)) + 2 * grow),
    block: (x, y, w, h) => fillRect(image, r(x) - grow, r(y) - grow, r(w) + 2 * grow, r(h) + 2 * grow, color),
    crescent: (cx, cy, radius, cutX, cutY, cutR) =>
      fillCrescent(image, r(cx), r(cy), r(radius) + grow, r(cutX), r(cutY), Math.max(0, r(cutR) - grow), color),
  };
}

function sun(p: Pen, cx: number, cy: number, s: number): void {
  const radius = Math.round(s * 0.2);
  p.disc(cx, cy, radius);
  for (let i = 0; i < 8; i++) {
    const angle = (i * 45 * Math.PI) / 180;
    const r1 = radius + s * 0.08;
    const r2 = radius + s * 0.2;
    p.stroke(cx + r1 * Math.cos(angle), cy + r1 * Math.sin(angle), cx + r2 * Math.cos(angle), cy + r2 * Math.sin(angle), s / 24);
  }
}

function cloud(p: Pen, cx: number, cy: number, s: number): void {
  p.disc(cx - s * 0.18, cy + s * 0.04, s * 0.15);
  p.disc(cx, cy - s * 0.06, s * 0.2);
  p.disc(cx + s * 0.2, cy + s * 0.06, s * 0.13);
  p.block(cx - s * 0.33, cy + s * 0.06, s * 0.66, s * 0.13);
}

function drops(p: Pen, cx: number, cy: number, s: number, count: number): void {
  const spacing = (s * 0.48) / Math.max(1, count - 1);
  for (let i = 0; i < count; i++) {
    const dx = cx - s * 0.24 + i * spacing;
    p.stroke(dx, cy + s * 0.2, dx - s * 0.06, cy + s * 0.36, s / 20);
  }
}

function flakes(p: Pen, cx: number, cy: number, s: number, offset: number = 0): void {
  const arm = s * 0.06;
  for (let i = 0; i < 3; i++) {
    const fx = cx - s * 0.18 + offset + i * s * 0.18;
    const fy = cy + s * 0.32;
    p.stroke(fx - arm, fy, fx + arm, fy, 1);
    p.stroke(fx, fy - arm, fx, fy + arm, 1);
    p.stroke(fx - arm * 0.7, fy - arm * 0.7, fx + arm * 0.7, fy + arm * 0.7, 1);
    p.stroke(fx - arm * 0.7, fy + arm * 0.7, fx + arm * 0.7, fy - arm * 0.7, 1);
  }
}

function bolt(p: Pen, cx: number, cy: number, s: number): void {
  const w = s / 16;
  p.stroke(cx + s * 0.04, cy + s * 0.1, cx - s * 0.06, cy + s * 0.28, w);
  p.stroke(cx - s * 0.06, cy + s * 0.28, cx + s * 0.04, cy + s * 0.28, w);
  p.stroke(cx + s * 0.04, cy + s * 0.28, cx - s * 0.06, cy + s * 0.46, w);
}

function drawShape(p: Pen, shape: IconShape, x: number, y: number, s: number): void {
  const cx = x + s / 2;
  const cy = y + s / 2;
  // precipitation icons lift the cloud to leave room underneath
  const high = cy - s * 0.12;

  switch (shape) {
    case 'sun':
      sun(p, cx, cy, s);
      break;
    case 'moon':
      p.crescent(cx, cy, s * 0.3, cx + s * 0.14, cy - s * 0.1, s * 0.26);
      break;
    case 'partly':
      sun(p, cx - s * 0.15, cy - s * 0.15, s * 0.7);
      cloud(p, cx + s * 0.06, cy + s * 0.1, s * 0.8);
      break;
    case 'cloud':
      cloud(p, cx, cy, s);
      break;
    case 'rain':
      cloud(p, cx, high, s);
      drops(p, cx, high, s, 3);
      break;
    case 'pour':
      cloud(p, cx, high, s);
      drops(p, cx, high, s, 5);
      break;
    case 'snow':
      cloud(p, cx, high, s);
      flakes(p, cx, high, s);
      break;
    case 'sleet':
      cloud(p, cx, high, s);
      drops(p, cx, high, s, 2);
      flakes(p, cx, high, s, s * 0.09);
      break;
    case 'hail':
      cloud(p, cx, high, s);
      for (let i = 0; i < 3; i++) {
        p.disc(cx - s * 0.18 + i * s * 0.18, high + s * 0.32, s * 0.045);
      }
      break;
    case 'lightning':
      cloud(p, cx, high, s);
      bolt(p, cx, high, s);
      break;
    case 'storm':
      cloud(p, cx, high, s);
      bolt(p, cx, high, s);
      drops(p, cx + s * 0.12, high, s * 0.6, 2);
      break;
    case 'fog':
      for (let i = 0; i < 4; i++) {
        const ly = y + s * 0.27 + i * s * 0.15;
        p.stroke(x + s * 0.1, ly, x + s * 0.9, ly, s / 16);
      }
      break;
    case 'wind':
      p.stroke(x + s * 0.1, y + s * 0.35, x + s * 0.75, y + s * 0.35, s / 16);
      p.stroke(x + s * 0.1, y + s * 0.5, x + s * 0.9, y + s * 0.5, s / 16);
      p.stroke(x + s * 0.2, y + s * 0.65, x + s * 0.65, y + s * 0.65, s / 16);
      break;
    case 'alert': {
      const w = s / 16;
      const top = y + s * 0.12;
      const base = y + s * 0.85;
      p.stroke(cx, top, x + s * 0.12, base, w);
      p.stroke(x + s * 0.12, base, x + s * 0.88, base, w);
      p.stroke(x + s * 0.88, base, cx, top, w);
      p.stroke(cx, y + s * 0.38, cx, y + s * 0.62, w);
      p.disc(cx, y + s * 0.74, s * 0.035);
      break;
    }
  }
}

/**
 * Draw an icon into the `size`-pixel square at (x, y).
 * With `outline`, the shape is first stamped grown by {@link OUTLINE_GROW}
 * in the outline color and then filled in `color` on top.
 */
export function drawWeatherIcon(
  image: IndexedImage,
  shape: IconShape,
  x: number,
  y: number,
  size: number,
  color: ColorIndex,
  outline?: ColorIndex,
): void {
  if (outline !== undefined) {
    drawShape(createPen(image, outline, OUTLINE_GROW), shape, x, y, size);
  }
  drawShape(createPen(image, color, 0), shape, x, y, size);
}
