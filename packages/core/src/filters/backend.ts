/**
 * @module filters/backend
 * Default {@link FilterBackend}: executes every primitive filter in pure TypeScript.
 */

import type { Bitmap, FilterBackend, PrimitiveFilter } from '@raster-effects/types';
import { UnsupportedFilterKindError } from '../errors';
import {
  applyBrightness,
  applyColorize,
  applyContrast,
  applyGrayscale,
  applyInvert,
  applyPixelate,
} from './adjustments';
import {
  EDGE_DETECT,
  EMBOSS,
  GAUSSIAN_BLUR,
  MEAN_REMOVAL,
  convolve,
  selectiveBlur,
  smoothKernel,
} from './convolution';

/**
 * Apply one primitive filter in place.
 * @throws {UnsupportedFilterKindError} For a kind this backend does not know.
 */
function applyPrimitive(bitmap: Bitmap, filter: PrimitiveFilter): void {
  const { kind } = filter;
  switch (kind) {
    case 'grayscale':
      return applyGrayscale(bitmap);
    case 'invert':
      return applyInvert(bitmap);
    case 'edge-detect':
      return convolve(bitmap, EDGE_DETECT);
    case 'emboss':
      return convolve(bitmap, EMBOSS);
    case 'mean-removal':
      return convolve(bitmap, MEAN_REMOVAL);
    case 'gaussian-blur':
      return convolve(bitmap, GAUSSIAN_BLUR);
    case 'selective-blur':
      return selectiveBlur(bitmap);
    case 'smooth':
      return convolve(bitmap, smoothKernel(filter.weight));
    case 'brightness':
      return applyBrightness(bitmap, filter.level);
    case 'contrast':
      return applyContrast(bitmap, filter.level);
    case 'colorize':
      return applyColorize(bitmap, filter.r, filter.g, filter.b, filter.a);
    case 'pixelate':
      return applyPixelate(bitmap, filter.blockSize, filter.average);
    default:
      throw new UnsupportedFilterKindError(kind);
  }
}

/** The built-in backend used when no other is injected. */
export const builtinFilterBackend: FilterBackend = {
  apply: applyPrimitive,
};
