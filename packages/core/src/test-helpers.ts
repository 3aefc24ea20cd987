/**
 * Shared helpers for unit tests.
 */

import type { Bitmap } from '@raster-effects/types';
import { createBitmap } from './bitmap';

/** A pixel as [r, g, b, a] with alpha 0 (opaque) - 127 (transparent). */
export type Px = [number, number, number, number];

/**
 * Build a bitmap from row-major pixels.
 * @throws {RangeError} If `pixels` does not hold `width * height` entries.
 */
export function bitmapFrom(width: number, height: number, pixels: Px[]): Bitmap {
  if (pixels.length !== width * height) {
    throw new RangeError(`expected ${width * height} pixels, got ${pixels.length}`);
  }
  const bitmap = createBitmap(width, height);
  pixels.forEach((px, i) => bitmap.data.set(px, i * 4));
  return bitmap;
}

/** A bitmap whose pixel (x, y) is (x * 10, y * 10, x + y, (x * y) % 128). */
export function gradientBitmap(width: number, height: number): Bitmap {
  const pixels: Px[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      pixels.push([x * 10, y * 10, x + y, (x * y) % 128]);
    }
  }
  return bitmapFrom(width, height, pixels);
}

/** Pixel (x, y) as a tuple. */
export function px(bitmap: Bitmap, x: number, y: number): Px {
  const i = (y * bitmap.width + x) * 4;
  const d = bitmap.data;
  return [d[i], d[i + 1], d[i + 2], d[i + 3]];
}

/** All pixels, row-major. */
export function pixelsOf(bitmap: Bitmap): Px[] {
  const out: Px[] = [];
  for (let y = 0; y < bitmap.height; y++) {
    for (let x = 0; x < bitmap.width; x++) {
      out.push(px(bitmap, x, y));
    }
  }
  return out;
}
