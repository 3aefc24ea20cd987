import { describe, expect, it, vi } from 'vitest';
import type { Bitmap, PrimitiveFilter } from '@raster-effects/types';
import { cloneBitmap, createBitmap } from './bitmap';
import { desaturate, opacity } from './blend';
import { bitmapFrom, pixelsOf, px } from './test-helpers';

describe('desaturate', () => {
  it('grays the image in place at 100% and returns the same bitmap', () => {
    const bmp = bitmapFrom(1, 1, [[100, 150, 200, 0]]);
    const out = desaturate(bmp);
    expect(out).toBe(bmp);
    expect(px(bmp, 0, 0)).toEqual([140, 140, 140, 0]);
  });

  it('clamps percentages above 100 to the in-place path', () => {
    const bmp = bitmapFrom(1, 1, [[100, 150, 200, 0]]);
    expect(desaturate(bmp, 250)).toBe(bmp);
  });

  it('merges a grayscale copy onto the original for partial amounts', () => {
    const bmp = bitmapFrom(1, 1, [[100, 150, 200, 0]]);
    const out = desaturate(bmp, 50);
    expect(out).not.toBe(bmp);
    expect(px(out, 0, 0)).toEqual([140, 140, 140, 0]);
    expect(px(bmp, 0, 0)).toEqual([120, 145, 170, 0]);
  });

  it('copies alpha into the grayscale copy', () => {
    const bmp = bitmapFrom(1, 1, [[100, 150, 200, 40]]);
    const out = desaturate(bmp, 30);
    expect(px(out, 0, 0)).toEqual([140, 140, 140, 40]);
  });

  it('leaves the original unchanged at 0%', () => {
    const bmp = bitmapFrom(2, 1, [[100, 150, 200, 0], [1, 2, 3, 0]]);
    const before = pixelsOf(bmp);
    desaturate(bmp, 0);
    expect(pixelsOf(bmp)).toEqual(before);
  });

  it('filters the copy, not the original, through the backend', () => {
    const apply = vi.fn((_bitmap: Bitmap, _filter: PrimitiveFilter) => undefined);
    const bmp = createBitmap(1, 1);
    const out = desaturate(bmp, 40, { apply });
    expect(apply).toHaveBeenCalledOnce();
    expect(apply).toHaveBeenCalledWith(out, { kind: 'grayscale' });
  });
});

describe('opacity', () => {
  it('fades onto transparent black', () => {
    const bmp = bitmapFrom(1, 1, [[200, 100, 50, 0]]);
    const out = opacity(bmp, 0.5);
    expect(px(out, 0, 0)).toEqual([100, 50, 25, 64]);
    expect(out.saveAlpha).toBe(true);
  });

  it('accepts percentages', () => {
    const bmp = bitmapFrom(1, 1, [[200, 100, 50, 0]]);
    expect(px(opacity(bmp, 100), 0, 0)).toEqual([200, 100, 50, 0]);
    expect(px(opacity(bmp, 0), 0, 0)).toEqual([0, 0, 0, 127]);
  });

  it('returns a new bitmap and leaves the input untouched', () => {
    const bmp = bitmapFrom(2, 1, [[200, 100, 50, 0], [10, 20, 30, 60]]);
    const before = cloneBitmap(bmp);
    const out = opacity(bmp, 0.3);
    expect(out).not.toBe(bmp);
    expect(out.width).toBe(2);
    expect(bmp.data).toEqual(before.data);
  });
});
