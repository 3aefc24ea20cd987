/**
 * @module fill
 * Solid fill and colorize. Both operate in place.
 */

import type { Bitmap, ColorInput, FilterBackend } from '@raster-effects/types';
import { drawPixel, enableAlpha } from './bitmap';
import { normalizeColor } from './color';
import { applyFilter } from './filters/dispatcher';

/**
 * Fill the whole canvas with one color.
 *
 * Alpha blending is switched off first, so every pixel ends up exactly equal
 * to the normalized color (its alpha included) whatever was there before.
 * The bitmap keeps blending disabled afterwards.
 *
 * @throws {InvalidColorFormatError | InvalidColorComponentError} Before any pixel changes.
 */
export function fill(image: Bitmap, color: ColorInput = '#000000'): void {
  const rgba = normalizeColor(color);
  enableAlpha(image, false);
  for (let y = 0; y < image.height; y++) {
    for (let x = 0; x < image.width; x++) {
      drawPixel(image, x, y, rgba);
    }
  }
}

/**
 * Tint the image by adding a color to every pixel.
 *
 * @param opacity - 0-1 fraction or 0-100 percentage; converted to the added
 *   alpha `round((100 - opacity) / 100 * 127)`.
 * @throws {InvalidColorFormatError | InvalidColorComponentError} Before any pixel changes.
 */
export function colorize(
  image: Bitmap,
  color: ColorInput,
  opacity: number,
  backend?: FilterBackend,
): void {
  applyFilter(image, { kind: 'colorize', color, opacity }, backend);
}
