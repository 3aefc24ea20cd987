import { describe, expect, it } from 'vitest';
import { cloneBitmap, createBitmap } from './bitmap';
import { InvalidAngleError, InvalidColorFormatError, InvalidDirectionError } from './errors';
import { bitmapFrom, gradientBitmap, pixelsOf, px } from './test-helpers';
import { flip, flipHorizontal, flipVertical, rotate, rotate90CCW, rotate90CW } from './transform';

describe('flip', () => {
  const source = () => bitmapFrom(3, 2, [
    [1, 0, 0, 0], [2, 0, 0, 0], [3, 0, 0, 0],
    [4, 0, 0, 0], [5, 0, 0, 0], [6, 0, 0, 0],
  ]);

  it('mirrors columns for x', () => {
    expect(pixelsOf(flip(source(), 'x')).map((p) => p[0])).toEqual([3, 2, 1, 6, 5, 4]);
  });

  it('mirrors rows for y', () => {
    expect(pixelsOf(flip(source(), 'y')).map((p) => p[0])).toEqual([4, 5, 6, 1, 2, 3]);
  });

  it('xy and yx both flip both axes', () => {
    const img = source();
    const expected = pixelsOf(flipVertical(flipHorizontal(img)));
    expect(pixelsOf(flip(img, 'xy'))).toEqual(expected);
    expect(pixelsOf(flip(img, 'YX'))).toEqual(expected);
    expect(expected.map((p) => p[0])).toEqual([6, 5, 4, 3, 2, 1]);
  });

  it('flipping twice restores the image', () => {
    const img = gradientBitmap(5, 4);
    for (const dir of ['x', 'y', 'xy']) {
      expect(pixelsOf(flip(flip(img, dir), dir))).toEqual(pixelsOf(img));
    }
  });

  it('returns a new alpha-enabled bitmap and leaves the input untouched', () => {
    const img = gradientBitmap(3, 3);
    const before = cloneBitmap(img);
    const out = flip(img, 'x');
    expect(out).not.toBe(img);
    expect(out.saveAlpha).toBe(true);
    expect(img.data).toEqual(before.data);
  });

  it('handles a single pixel', () => {
    const img = bitmapFrom(1, 1, [[1, 2, 3, 4]]);
    expect(pixelsOf(flip(img, 'xy'))).toEqual([[1, 2, 3, 4]]);
  });

  it('rejects unknown directions', () => {
    expect(() => flip(createBitmap(2, 2), 'z')).toThrow(InvalidDirectionError);
  });
});

describe('rotate', () => {
  it('rejects angles of 360 or more in magnitude', () => {
    const img = createBitmap(2, 2);
    expect(() => rotate(img, 360)).toThrow(InvalidAngleError);
    expect(() => rotate(img, -360)).toThrow(InvalidAngleError);
  });

  it('rejects an invalid background color', () => {
    expect(() => rotate(createBitmap(2, 2), 45, '#12')).toThrow(InvalidColorFormatError);
  });

  it('returns a copy for 0 degrees', () => {
    const img = gradientBitmap(3, 2);
    const out = rotate(img, 0);
    expect(out).not.toBe(img);
    expect(pixelsOf(out)).toEqual(pixelsOf(img));
    expect(out.saveAlpha).toBe(true);
  });

  it('turns clockwise for positive quarter turns', () => {
    const img = bitmapFrom(3, 2, [
      [1, 0, 0, 0], [2, 0, 0, 0], [3, 0, 0, 0],
      [4, 0, 0, 0], [5, 0, 0, 0], [6, 0, 0, 0],
    ]);
    const out = rotate(img, 90);
    expect(out.width).toBe(2);
    expect(out.height).toBe(3);
    expect(pixelsOf(out).map((p) => p[0])).toEqual([4, 1, 5, 2, 6, 3]);
  });

  it('turns counter-clockwise for negative quarter turns', () => {
    const img = bitmapFrom(3, 2, [
      [1, 0, 0, 0], [2, 0, 0, 0], [3, 0, 0, 0],
      [4, 0, 0, 0], [5, 0, 0, 0], [6, 0, 0, 0],
    ]);
    const out = rotate(img, -90);
    expect([out.width, out.height]).toEqual([2, 3]);
    expect(pixelsOf(out).map((p) => p[0])).toEqual([3, 6, 2, 5, 1, 4]);
  });

  it('moves whole pixels, alpha included, in quarter turns', () => {
    const img = bitmapFrom(2, 1, [[1, 2, 3, 40], [5, 6, 7, 127]]);
    expect(pixelsOf(rotate(img, 90))).toEqual([[1, 2, 3, 40], [5, 6, 7, 127]]);
    expect(pixelsOf(rotate(img, 180))).toEqual([[5, 6, 7, 127], [1, 2, 3, 40]]);
  });

  it('treats -90 and 270 as a counter-clockwise quarter turn', () => {
    const img = gradientBitmap(4, 3);
    const ccw = pixelsOf(rotate90CCW(img));
    expect(pixelsOf(rotate(img, -90))).toEqual(ccw);
    expect(pixelsOf(rotate(img, 270))).toEqual(ccw);
    expect(pixelsOf(rotate(img, -270))).toEqual(pixelsOf(rotate90CW(img)));
  });

  it('180 degrees equals flipping both axes', () => {
    const img = gradientBitmap(4, 3);
    expect(pixelsOf(rotate(img, 180))).toEqual(pixelsOf(flip(img, 'xy')));
  });

  it('grows the canvas for arbitrary angles and fills corners with the background', () => {
    const img = createBitmap(10, 10, { r: 10, g: 20, b: 30, a: 0 });
    const out = rotate(img, 45, '#ff0000');
    expect(out.width).toBe(15);
    expect(out.height).toBe(15);
    expect(px(out, 0, 0)).toEqual([255, 0, 0, 0]);
    expect(px(out, 14, 14)).toEqual([255, 0, 0, 0]);
    expect(px(out, 7, 7)).toEqual([10, 20, 30, 0]);
  });

  it('sizes the canvas to the rotated bounding box', () => {
    const out = rotate(createBitmap(4, 2), 30);
    expect(out.width).toBe(5);
    expect(out.height).toBe(4);
  });

  it('does not modify the input', () => {
    const img = gradientBitmap(5, 5);
    const before = cloneBitmap(img);
    rotate(img, 33, [0, 0, 0, 127]);
    expect(img.data).toEqual(before.data);
  });
});
