/**
 * @module filters/adjustments
 * Per-pixel primitives: grayscale, invert, brightness, contrast, colorize, pixelate.
 * All functions modify the bitmap in place. Alpha is preserved except by
 * colorize and average pixelate.
 */

import type { Bitmap } from '@raster-effects/types';
import { ALPHA_TRANSPARENT } from '../params';

/** Clamp and truncate to a 0-255 channel. */
function channel(v: number): number {
  return v < 0 ? 0 : v > 255 ? 255 : Math.trunc(v);
}

/**
 * Convert to grayscale with luminance weights .299/.587/.114, truncated.
 */
export function applyGrayscale(bitmap: Bitmap): void {
  const d = bitmap.data;
  for (let i = 0; i < d.length; i += 4) {
    const gray = Math.trunc(0.299 * d[i] + 0.587 * d[i + 1] + 0.114 * d[i + 2]);
    d[i] = gray; d[i + 1] = gray; d[i + 2] = gray;
  }
}

/**
 * Invert all color channels.
 */
export function applyInvert(bitmap: Bitmap): void {
  const d = bitmap.data;
  for (let i = 0; i < d.length; i += 4) {
    d[i] = 255 - d[i];
    d[i + 1] = 255 - d[i + 1];
    d[i + 2] = 255 - d[i + 2];
  }
}

/**
 * Add `level` to every color channel.
 * @param level - -255 to 255.
 */
export function applyBrightness(bitmap: Bitmap, level: number): void {
  const d = bitmap.data;
  for (let i = 0; i < d.length; i += 4) {
    d[i] = channel(d[i] + level);
    d[i + 1] = channel(d[i + 1] + level);
    d[i + 2] = channel(d[i + 2] + level);
  }
}

/**
 * Scale channels around mid-gray by `((100 - level) / 100)^2`.
 * Negative levels increase contrast, positive levels reduce it; 100 yields flat gray.
 * @param level - -100 to 100.
 */
export function applyContrast(bitmap: Bitmap, level: number): void {
  const factor = ((100 - level) / 100) ** 2;
  const adjust = (v: number): number => channel(((v / 255 - 0.5) * factor + 0.5) * 255);
  const d = bitmap.data;
  for (let i = 0; i < d.length; i += 4) {
    d[i] = adjust(d[i]);
    d[i + 1] = adjust(d[i + 1]);
    d[i + 2] = adjust(d[i + 2]);
  }
}

/**
 * Add a color (and alpha) to every pixel, clamping each channel.
 * @param a - Added alpha, pushes pixels toward transparent (0-127).
 */
export function applyColorize(bitmap: Bitmap, r: number, g: number, b: number, a: number): void {
  const d = bitmap.data;
  for (let i = 0; i < d.length; i += 4) {
    d[i] = channel(d[i] + r);
    d[i + 1] = channel(d[i + 1] + g);
    d[i + 2] = channel(d[i + 2] + b);
    d[i + 3] = Math.min(ALPHA_TRANSPARENT, Math.max(0, d[i + 3] + a));
  }
}

/**
 * Replace each `blockSize` square with a single color.
 *
 * @param average - Use the integer mean of the block's in-bounds pixels
 *   (alpha included); otherwise the block's top-left pixel.
 */
export function applyPixelate(bitmap: Bitmap, blockSize: number, average: boolean): void {
  if (blockSize < 2) return;
  const { width, height, data: d } = bitmap;

  for (let by = 0; by < height; by += blockSize) {
    for (let bx = 0; bx < width; bx += blockSize) {
      const endX = Math.min(bx + blockSize, width);
      const endY = Math.min(by + blockSize, height);
      const origin = (by * width + bx) * 4;
      let r = d[origin], g = d[origin + 1], b = d[origin + 2], a = d[origin + 3];

      if (average) {
        let sumR = 0, sumG = 0, sumB = 0, sumA = 0;
        for (let y = by; y < endY; y++) {
          for (let x = bx; x < endX; x++) {
            const idx = (y * width + x) * 4;
            sumR += d[idx]; sumG += d[idx + 1]; sumB += d[idx + 2]; sumA += d[idx + 3];
          }
        }
        const total = (endX - bx) * (endY - by);
        r = Math.trunc(sumR / total);
        g = Math.trunc(sumG / total);
        b = Math.trunc(sumB / total);
        a = Math.trunc(sumA / total);
      }

      for (let y = by; y < endY; y++) {
        for (let x = bx; x < endX; x++) {
          const idx = (y * width + x) * 4;
          d[idx] = r; d[idx + 1] = g; d[idx + 2] = b; d[idx + 3] = a;
        }
      }
    }
  }
}
