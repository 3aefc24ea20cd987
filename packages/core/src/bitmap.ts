/**
 * @module bitmap
 * Bitmap primitive: allocation, pixel access, the alpha-blending draw path,
 * region copy and conversion from/to straight 0-255 RGBA buffers.
 *
 * Inside a {@link Bitmap}, alpha is 0 (opaque) to 127 (transparent).
 */

import type { Bitmap, ColorSpec, Point, Size } from '@raster-effects/types';
import { RegionOutOfBoundsError } from './errors';
import { ALPHA_OPAQUE, ALPHA_TRANSPARENT } from './params';

/** Opaque black, the colour of a freshly allocated canvas. */
const OPAQUE_BLACK: ColorSpec = { r: 0, g: 0, b: 0, a: ALPHA_OPAQUE };

// ---------------------------------------------------------------------------
// Allocation
// ---------------------------------------------------------------------------

/**
 * Allocate a bitmap.
 * @param width - Positive integer width.
 * @param height - Positive integer height.
 * @param fill - Initial colour of every pixel (default opaque black).
 * @throws {RangeError} If a dimension is not a positive integer.
 */
export function createBitmap(width: number, height: number, fill: ColorSpec = OPAQUE_BLACK): Bitmap {
  assertDimensions(width, height);
  const data = new Uint8ClampedArray(width * height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = fill.r;
    data[i + 1] = fill.g;
    data[i + 2] = fill.b;
    data[i + 3] = fill.a;
  }
  return { width, height, data, alphaBlending: true, saveAlpha: false };
}

/** Deep copy of pixels and flags. */
export function cloneBitmap(src: Bitmap): Bitmap {
  return {
    width: src.width,
    height: src.height,
    data: new Uint8ClampedArray(src.data),
    alphaBlending: src.alphaBlending,
    saveAlpha: src.saveAlpha,
  };
}

/**
 * Overwrite `target`'s pixels and flags with those of `snapshot`, keeping
 * the `target` handle.
 * @throws {RangeError} If the dimensions differ.
 */
export function restoreBitmap(target: Bitmap, snapshot: Bitmap): void {
  if (target.width !== snapshot.width || target.height !== snapshot.height) {
    throw new RangeError(
      `Cannot restore a ${target.width}x${target.height} bitmap from a ${snapshot.width}x${snapshot.height} snapshot`,
    );
  }
  target.data.set(snapshot.data);
  target.alphaBlending = snapshot.alphaBlending;
  target.saveAlpha = snapshot.saveAlpha;
}

/**
 * Enable the alpha channel: per-pixel alpha is kept on export.
 * @param blending - Whether subsequent drawing blends (true) or overwrites (false).
 */
export function enableAlpha(bitmap: Bitmap, blending: boolean = true): void {
  bitmap.saveAlpha = true;
  bitmap.alphaBlending = blending;
}

function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new RangeError(`Bitmap dimensions must be positive integers, got ${width}x${height}`);
  }
}

// ---------------------------------------------------------------------------
// Pixel access
// ---------------------------------------------------------------------------

/** Whether (x, y) addresses a pixel of `bitmap`. */
export function inBounds(bitmap: Size, x: number, y: number): boolean {
  return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < bitmap.width && y < bitmap.height;
}

function assertInBounds(bitmap: Bitmap, x: number, y: number): void {
  if (!inBounds(bitmap, x, y)) {
    throw new RegionOutOfBoundsError(
      `Pixel (${x}, ${y}) is outside the ${bitmap.width}x${bitmap.height} bitmap`,
    );
  }
}

/**
 * Read a pixel.
 * @throws {RegionOutOfBoundsError} If (x, y) is outside the bitmap.
 */
export function getPixel(bitmap: Bitmap, x: number, y: number): ColorSpec {
  assertInBounds(bitmap, x, y);
  const idx = (y * bitmap.width + x) * 4;
  const d = bitmap.data;
  return { r: d[idx], g: d[idx + 1], b: d[idx + 2], a: d[idx + 3] };
}

/**
 * Overwrite a pixel verbatim, ignoring the blending flag.
 * @throws {RegionOutOfBoundsError} If (x, y) is outside the bitmap.
 */
export function setPixel(bitmap: Bitmap, x: number, y: number, color: ColorSpec): void {
  assertInBounds(bitmap, x, y);
  const idx = (y * bitmap.width + x) * 4;
  const d = bitmap.data;
  d[idx] = color.r;
  d[idx + 1] = color.g;
  d[idx + 2] = color.b;
  d[idx + 3] = color.a;
}

/**
 * Blend `src` over `dst` with integer weights.
 *
 * An opaque source replaces the destination, a transparent source keeps it
 * and a transparent destination takes the source. Otherwise channels are
 * weighted by source opacity and the destination opacity left uncovered, and
 * the resulting alpha is `a_s * a_d / 127`.
 */
export function blendPixel(dst: ColorSpec, src: ColorSpec): ColorSpec {
  if (src.a === ALPHA_OPAQUE) return { ...src };
  if (src.a === ALPHA_TRANSPARENT) return { ...dst };
  if (dst.a === ALPHA_TRANSPARENT) return { ...src };

  const srcWeight = ALPHA_TRANSPARENT - src.a;
  const dstWeight = Math.trunc(((ALPHA_TRANSPARENT - dst.a) * src.a) / ALPHA_TRANSPARENT);
  const total = srcWeight + dstWeight;
  const mix = (s: number, d: number): number => Math.trunc((s * srcWeight + d * dstWeight) / total);

  return {
    r: mix(src.r, dst.r),
    g: mix(src.g, dst.g),
    b: mix(src.b, dst.b),
    a: Math.trunc((src.a * dst.a) / ALPHA_TRANSPARENT),
  };
}

/**
 * Draw a pixel honouring the bitmap's `alphaBlending` flag.
 * Coordinates outside the bitmap are clipped silently.
 */
export function drawPixel(bitmap: Bitmap, x: number, y: number, color: ColorSpec): void {
  if (!inBounds(bitmap, x, y)) return;
  setPixel(bitmap, x, y, bitmap.alphaBlending ? blendPixel(getPixel(bitmap, x, y), color) : color);
}

// ---------------------------------------------------------------------------
// Regions
// ---------------------------------------------------------------------------

/**
 * Validate that a `size` rectangle at `offset` lies within `bitmap`.
 * @throws {RegionOutOfBoundsError}
 */
export function assertRegion(bitmap: Size, offset: Point, size: Size, label: string): void {
  const values = [offset.x, offset.y, size.width, size.height];
  if (values.some((v) => !Number.isInteger(v) || v < 0)) {
    throw new RegionOutOfBoundsError(
      `${label} region must use non-negative integers, got ${size.width}x${size.height} at (${offset.x}, ${offset.y})`,
    );
  }
  if (offset.x + size.width > bitmap.width || offset.y + size.height > bitmap.height) {
    throw new RegionOutOfBoundsError(
      `${label} region ${size.width}x${size.height} at (${offset.x}, ${offset.y}) exceeds the ${bitmap.width}x${bitmap.height} bitmap`,
    );
  }
}

/**
 * Copy a rectangle of `src` into `dst` through {@link drawPixel}, so the
 * destination's blending flag decides between blend and overwrite.
 * @throws {RegionOutOfBoundsError} If the rectangle exceeds either bitmap.
 */
export function copyRegion(dst: Bitmap, src: Bitmap, dstOffset: Point, srcOffset: Point, size: Size): void {
  assertRegion(src, srcOffset, size, 'Source');
  assertRegion(dst, dstOffset, size, 'Destination');

  for (let y = 0; y < size.height; y++) {
    for (let x = 0; x < size.width; x++) {
      drawPixel(dst, dstOffset.x + x, dstOffset.y + y, getPixel(src, srcOffset.x + x, srcOffset.y + y));
    }
  }
}

// ---------------------------------------------------------------------------
// Boundary conversion
// ---------------------------------------------------------------------------

/**
 * Build a bitmap from straight-alpha RGBA bytes (alpha 255 = opaque), such
 * as canvas `ImageData` or decoder output. The result has its alpha channel enabled.
 * @throws {RangeError} If `data` does not hold exactly `width * height` pixels.
 */
export function fromRgba(data: Uint8Array | Uint8ClampedArray, width: number, height: number): Bitmap {
  assertDimensions(width, height);
  if (data.length !== width * height * 4) {
    throw new RangeError(
      `RGBA buffer length ${data.length} does not match ${width}x${height} (expected ${width * height * 4})`,
    );
  }
  const bitmap = createBitmap(width, height);
  const d = bitmap.data;
  for (let i = 0; i < d.length; i += 4) {
    d[i] = data[i];
    d[i + 1] = data[i + 1];
    d[i + 2] = data[i + 2];
    d[i + 3] = ALPHA_TRANSPARENT - (data[i + 3] >> 1);
  }
  enableAlpha(bitmap);
  return bitmap;
}

/**
 * Export to straight-alpha RGBA bytes. Without `saveAlpha` every pixel is
 * written fully opaque.
 */
export function toRgba(bitmap: Bitmap): Uint8ClampedArray {
  const src = bitmap.data;
  const out = new Uint8ClampedArray(src.length);
  for (let i = 0; i < src.length; i += 4) {
    const a = src[i + 3];
    out[i] = src[i];
    out[i + 1] = src[i + 1];
    out[i + 2] = src[i + 2];
    if (!bitmap.saveAlpha) {
      out[i + 3] = 255;
    } else {
      out[i + 3] = a === ALPHA_TRANSPARENT ? 0 : 255 - ((a << 1) + (a >> 6));
    }
  }
  return out;
}
