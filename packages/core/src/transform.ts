/**
 * @module transform
 * Geometric transforms: flip and rotate with background fill.
 * All functions allocate a new bitmap and do NOT modify the input.
 */

import type { Bitmap, ColorInput, ColorSpec, FlipDirection } from '@raster-effects/types';
import { createBitmap, enableAlpha } from './bitmap';
import { normalizeColor } from './color';
import { ALPHA_TRANSPARENT, flipDirection, rotationAngle } from './params';

/** Fully transparent black, the background of flip canvases. */
const TRANSPARENT: ColorSpec = { r: 0, g: 0, b: 0, a: ALPHA_TRANSPARENT };

/** Tolerance absorbing floating-point noise in bounding-box sizes. */
const SIZE_EPSILON = 1e-9;

/** Allocate a transparent, alpha-enabled canvas of the given size. */
function createAlphaCanvas(width: number, height: number, fill: ColorSpec = TRANSPARENT): Bitmap {
  const canvas = createBitmap(width, height, fill);
  enableAlpha(canvas);
  return canvas;
}

// ---------------------------------------------------------------------------
// Exact permutations
// ---------------------------------------------------------------------------

/** Destination pixel (column, row) of source pixel (x, y) in a `width`×`height` image. */
type PixelTarget = (x: number, y: number, width: number, height: number) => [number, number];

/**
 * Move every pixel of `image` to `target(x, y)` on a new transparent canvas.
 * `target` must be a bijection onto the `outWidth`×`outHeight` grid.
 */
function permutePixels(image: Bitmap, outWidth: number, outHeight: number, target: PixelTarget): Bitmap {
  const { width, height, data: src } = image;
  const out = createAlphaCanvas(outWidth, outHeight);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const [tx, ty] = target(x, y, width, height);
      const from = (y * width + x) * 4;
      out.data.set(src.subarray(from, from + 4), (ty * outWidth + tx) * 4);
    }
  }
  return out;
}

const mirrorColumns: PixelTarget = (x, y, w) => [w - 1 - x, y];
const mirrorRows: PixelTarget = (x, y, _w, h) => [x, h - 1 - y];
const mirrorBoth: PixelTarget = (x, y, w, h) => [w - 1 - x, h - 1 - y];
const quarterClockwise: PixelTarget = (x, y, _w, h) => [h - 1 - y, x];
const quarterCounterClockwise: PixelTarget = (x, y, w) => [y, w - 1 - x];

/** Mirror left-right. */
export function flipHorizontal(image: Bitmap): Bitmap {
  return permutePixels(image, image.width, image.height, mirrorColumns);
}

/** Mirror top-bottom. */
export function flipVertical(image: Bitmap): Bitmap {
  return permutePixels(image, image.width, image.height, mirrorRows);
}

/**
 * Flip an image.
 *
 * @param direction - `x` (horizontal), `y` (vertical), `xy`/`yx` (both; case-insensitive).
 * @returns New alpha-enabled bitmap.
 * @throws {InvalidDirectionError} For any other direction.
 */
export function flip(image: Bitmap, direction: FlipDirection | string): Bitmap {
  switch (flipDirection(direction)) {
    case 'x':
      return flipHorizontal(image);
    case 'y':
      return flipVertical(image);
    case 'xy':
    case 'yx':
      return permutePixels(image, image.width, image.height, mirrorBoth);
  }
}

// ---------------------------------------------------------------------------
// Rotate
// ---------------------------------------------------------------------------

/** Quarter turn clockwise; width and height swap. */
export function rotate90CW(image: Bitmap): Bitmap {
  return permutePixels(image, image.height, image.width, quarterClockwise);
}

/** Quarter turn counter-clockwise; width and height swap. */
export function rotate90CCW(image: Bitmap): Bitmap {
  return permutePixels(image, image.height, image.width, quarterCounterClockwise);
}

/** Half turn, identical to flipping both axes. */
export function rotate180(image: Bitmap): Bitmap {
  return permutePixels(image, image.width, image.height, mirrorBoth);
}

/**
 * Sample with bilinear interpolation at sub-pixel coordinates, where integer
 * coordinates address pixel centres. Neighbours are clamped to the edges.
 * @returns [r, g, b, a] pixel values.
 */
export function bilinearSample(image: Bitmap, x: number, y: number): [number, number, number, number] {
  const { width, height, data } = image;
  const x0 = Math.max(0, Math.min(Math.floor(x), width - 1));
  const y0 = Math.max(0, Math.min(Math.floor(y), height - 1));
  const x1 = Math.min(x0 + 1, width - 1);
  const y1 = Math.min(y0 + 1, height - 1);
  const fx = Math.max(0, Math.min(x - x0, 1));
  const fy = Math.max(0, Math.min(y - y0, 1));

  const i00 = (y0 * width + x0) * 4;
  const i10 = (y0 * width + x1) * 4;
  const i01 = (y1 * width + x0) * 4;
  const i11 = (y1 * width + x1) * 4;

  const result: [number, number, number, number] = [0, 0, 0, 0];
  for (let c = 0; c < 4; c++) {
    const top = data[i00 + c] + (data[i10 + c] - data[i00 + c]) * fx;
    const bottom = data[i01 + c] + (data[i11 + c] - data[i01 + c]) * fx;
    result[c] = Math.round(top + (bottom - top) * fy);
  }
  return result;
}

/**
 * Rotate clockwise by an arbitrary angle with bilinear interpolation.
 * The canvas grows to the rotated bounding box; exposed area takes `background`.
 */
export function rotateArbitrary(image: Bitmap, angle: number, background: ColorSpec): Bitmap {
  const { width, height } = image;
  const rad = (angle * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  const cx = width / 2;
  const cy = height / 2;

  const corners = [
    [0, 0], [width, 0], [width, height], [0, height],
  ];
  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;
  for (const [px, py] of corners) {
    const dx = px - cx;
    const dy = py - cy;
    const rx = cos * dx - sin * dy;
    const ry = sin * dx + cos * dy;
    minX = Math.min(minX, rx);
    minY = Math.min(minY, ry);
    maxX = Math.max(maxX, rx);
    maxY = Math.max(maxY, ry);
  }

  const spanX = maxX - minX;
  const spanY = maxY - minY;
  const newW = Math.max(1, Math.ceil(spanX - SIZE_EPSILON));
  const newH = Math.max(1, Math.ceil(spanY - SIZE_EPSILON));
  // Centre the exact bounding box inside the integer canvas.
  const originX = minX - (newW - spanX) / 2;
  const originY = minY - (newH - spanY) / 2;

  const out = createAlphaCanvas(newW, newH, background);
  const dst = out.data;

  for (let y = 0; y < newH; y++) {
    for (let x = 0; x < newW; x++) {
      const dx = originX + x + 0.5;
      const dy = originY + y + 0.5;
      const srcX = cos * dx + sin * dy + cx;
      const srcY = -sin * dx + cos * dy + cy;
      if (srcX >= 0 && srcX < width && srcY >= 0 && srcY < height) {
        const [r, g, b, a] = bilinearSample(image, srcX - 0.5, srcY - 0.5);
        const idx = (y * newW + x) * 4;
        dst[idx] = r; dst[idx + 1] = g; dst[idx + 2] = b; dst[idx + 3] = a;
      }
    }
  }
  return out;
}

/**
 * Rotate an image.
 *
 * A positive angle turns the content clockwise on screen. Multiples of 90°
 * are exact pixel permutations; other angles are interpolated into a larger
 * canvas whose exposed corners take `bgColor`.
 *
 * @param angle - Degrees, strictly between -360 and 360.
 * @param bgColor - Background of the exposed area (default opaque black).
 * @returns New alpha-enabled bitmap.
 * @throws {InvalidAngleError} If the angle is out of range.
 * @throws {InvalidColorFormatError | InvalidColorComponentError} If the colour is invalid.
 */
export function rotate(image: Bitmap, angle: number, bgColor: ColorInput = '#000000'): Bitmap {
  const validAngle = rotationAngle(angle);
  const background = normalizeColor(bgColor);
  const clockwise = ((validAngle % 360) + 360) % 360;

  if (clockwise === 0) {
    const copy = createAlphaCanvas(image.width, image.height);
    copy.data.set(image.data);
    return copy;
  }
  if (clockwise === 90) return rotate90CW(image);
  if (clockwise === 180) return rotate180(image);
  if (clockwise === 270) return rotate90CCW(image);
  return rotateArbitrary(image, clockwise, background);
}
