/**
 * @module compositor
 * Alpha-aware merge of one bitmap onto another.
 *
 * Shared by {@link opacity} and {@link desaturate}; both depend on its exact
 * rounding, so results are pinned pixel-for-pixel by tests.
 *
 * Per pixel, with `o = (127 - a) / 127` the opacity of each side:
 * ```
 * o_eff = o_src * opacityPercent / 100
 * c     = round(c_src * o_eff + c_dst * (1 - o_eff))
 * a     = round(127 * (1 - (o_eff + o_dst * (1 - o_eff))))
 * ```
 * Rounding is `Math.round` on non-negative values, i.e. halves round up.
 */

import type { Bitmap, Point, Size } from '@raster-effects/types';
import { assertRegion } from './bitmap';
import { ALPHA_TRANSPARENT } from './params';

function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}

/**
 * Merge the `size` rectangle of `src` at `srcOffset` onto `dst` at `dstOffset`.
 *
 * @param dst - Destination, modified in place.
 * @param src - Source, never modified.
 * @param opacityPercent - Source opacity multiplier, 0-100 (clamped).
 * @throws {RegionOutOfBoundsError} If the rectangle exceeds either bitmap;
 *   nothing is written in that case.
 */
export function mergeAlpha(
  dst: Bitmap,
  src: Bitmap,
  dstOffset: Point,
  srcOffset: Point,
  size: Size,
  opacityPercent: number,
): void {
  assertRegion(src, srcOffset, size, 'Source');
  assertRegion(dst, dstOffset, size, 'Destination');

  const factor = clamp(Number.isFinite(opacityPercent) ? opacityPercent : 0, 0, 100) / 100;
  const s = src.data;
  const d = dst.data;

  for (let y = 0; y < size.height; y++) {
    for (let x = 0; x < size.width; x++) {
      const si = ((srcOffset.y + y) * src.width + srcOffset.x + x) * 4;
      const di = ((dstOffset.y + y) * dst.width + dstOffset.x + x) * 4;

      const srcOpacity = (ALPHA_TRANSPARENT - s[si + 3]) / ALPHA_TRANSPARENT;
      const dstOpacity = (ALPHA_TRANSPARENT - d[di + 3]) / ALPHA_TRANSPARENT;
      const eff = srcOpacity * factor;
      const keep = 1 - eff;

      d[di] = clamp(Math.round(s[si] * eff + d[di] * keep), 0, 255);
      d[di + 1] = clamp(Math.round(s[si + 1] * eff + d[di + 1] * keep), 0, 255);
      d[di + 2] = clamp(Math.round(s[si + 2] * eff + d[di + 2] * keep), 0, 255);
      d[di + 3] = clamp(
        Math.round(ALPHA_TRANSPARENT * (1 - (eff + dstOpacity * keep))),
        0,
        ALPHA_TRANSPARENT,
      );
    }
  }
}
