/**
 * @module blend
 * Operations built on the alpha compositor: opacity and desaturation.
 *
 * Both may return a bitmap other than the one passed in; see each function
 * for which handle is current afterwards.
 */

import type { Bitmap, FilterBackend } from '@raster-effects/types';
import { copyRegion, createBitmap, enableAlpha } from './bitmap';
import { mergeAlpha } from './compositor';
import { applyFilter } from './filters/dispatcher';
import { ALPHA_TRANSPARENT, opacity as clampOpacity, percent as clampPercent } from './params';

const ORIGIN = { x: 0, y: 0 };

/**
 * Fade the image.
 *
 * @param value - 0-1 fraction or 0-100 percentage.
 * @returns A new alpha-enabled bitmap holding the image merged onto
 *   transparent black. The input is not modified; disposing it is up to the caller.
 */
export function opacity(image: Bitmap, value: number): Bitmap {
  const level = clampOpacity(value);
  const { width, height } = image;
  const canvas = createBitmap(width, height, { r: 0, g: 0, b: 0, a: ALPHA_TRANSPARENT });
  enableAlpha(canvas);
  mergeAlpha(canvas, image, ORIGIN, ORIGIN, { width, height }, level);
  return canvas;
}

/**
 * Desaturate the image by `percent`.
 *
 * The returned handle depends on the amount:
 * - `percent === 100` (after clamping): grayscale is applied in place and
 *   **the same bitmap** is returned.
 * - otherwise: a grayscale copy is made, merged onto the **original** at
 *   `percent` opacity, and **the grayscale copy** (a new bitmap) is returned.
 *   The original then holds the partially desaturated pixels.
 *
 * @param percent - 0-100, clamped (default 100).
 */
export function desaturate(image: Bitmap, percent: number = 100, backend?: FilterBackend): Bitmap {
  const level = clampPercent(percent);
  if (level === 100) {
    applyFilter(image, { kind: 'grayscale' }, backend);
    return image;
  }

  const { width, height } = image;
  const copy = createBitmap(width, height);
  copy.alphaBlending = false;
  copyRegion(copy, image, ORIGIN, ORIGIN, { width, height });
  applyFilter(copy, { kind: 'grayscale' }, backend);

  mergeAlpha(image, copy, ORIGIN, ORIGIN, { width, height }, level);
  return copy;
}
