/**
 * @module filters/named
 * One function per public filter operation, each a thin request to
 * {@link applyFilter}. All mutate `image` in place and return nothing.
 */

import type { Bitmap, BlurType, FilterBackend } from '@raster-effects/types';
import { DEFAULT_PIXELATE_BLOCK_SIZE, applyFilter } from './dispatcher';

/** Convert to grayscale. */
export function grayscale(image: Bitmap, backend?: FilterBackend): void {
  applyFilter(image, { kind: 'grayscale' }, backend);
}

/** Grayscale with a warm tint. */
export function sepia(image: Bitmap, backend?: FilterBackend): void {
  applyFilter(image, { kind: 'sepia' }, backend);
}

/**
 * Pixelate using the average color of each block.
 * @param blockSize - Block edge in pixels; below 2 the image is unchanged.
 */
export function pixelate(
  image: Bitmap,
  blockSize: number = DEFAULT_PIXELATE_BLOCK_SIZE,
  backend?: FilterBackend,
): void {
  applyFilter(image, { kind: 'pixelate', blockSize }, backend);
}

/** Edge detection. */
export function edges(image: Bitmap, backend?: FilterBackend): void {
  applyFilter(image, { kind: 'edge-detect' }, backend);
}

export function emboss(image: Bitmap, backend?: FilterBackend): void {
  applyFilter(image, { kind: 'emboss' }, backend);
}

/** Negative. */
export function invert(image: Bitmap, backend?: FilterBackend): void {
  applyFilter(image, { kind: 'invert' }, backend);
}

/** Sketch-like sharpening. */
export function meanRemove(image: Bitmap, backend?: FilterBackend): void {
  applyFilter(image, { kind: 'mean-removal' }, backend);
}

/**
 * Blur the image `passes` times; each pass is an independent full-image convolution.
 * @param type - `selective` (edge-preserving, default) or `gaussian`.
 */
export function blur(
  image: Bitmap,
  passes: number = 1,
  type: BlurType = 'selective',
  backend?: FilterBackend,
): void {
  applyFilter(image, { kind: 'blur', passes, type }, backend);
}

/**
 * Smooth the image.
 * @param passes - Smoothing level, clamped to 1-2048; higher is weaker.
 */
export function smooth(image: Bitmap, passes: number = 1, backend?: FilterBackend): void {
  applyFilter(image, { kind: 'smooth', passes }, backend);
}

/**
 * Change brightness.
 * @param level - Darkest = -255, lightest = 255.
 */
export function brightness(image: Bitmap, level: number, backend?: FilterBackend): void {
  applyFilter(image, { kind: 'brightness', level }, backend);
}

/**
 * Change contrast.
 * @param level - -100 (maximum) to 100 (flat gray).
 */
export function contrast(image: Bitmap, level: number, backend?: FilterBackend): void {
  applyFilter(image, { kind: 'contrast', level }, backend);
}
