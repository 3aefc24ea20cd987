import { describe, expect, it } from 'vitest';
import { createBitmap } from '../bitmap';
import { bitmapFrom, pixelsOf } from '../test-helpers';
import {
  EDGE_DETECT,
  EMBOSS,
  GAUSSIAN_BLUR,
  MEAN_REMOVAL,
  convolve,
  selectiveBlur,
  smoothKernel,
} from './convolution';

const uniform = () => createBitmap(3, 3, { r: 80, g: 120, b: 160, a: 7 });

describe('convolve', () => {
  it('edge detection maps flat areas to the offset', () => {
    const bmp = uniform();
    convolve(bmp, EDGE_DETECT);
    expect(pixelsOf(bmp).every((p) => p.join() === '127,127,127,7')).toBe(true);
  });

  it('emboss maps flat areas to the offset', () => {
    const bmp = uniform();
    convolve(bmp, EMBOSS);
    expect(pixelsOf(bmp).every((p) => p.join() === '127,127,127,7')).toBe(true);
  });

  it('mean removal, gaussian and smooth keep flat areas', () => {
    for (const spec of [MEAN_REMOVAL, GAUSSIAN_BLUR, smoothKernel(1), smoothKernel(10)]) {
      const bmp = uniform();
      convolve(bmp, spec);
      expect(pixelsOf(bmp).every((p) => p.join() === '80,120,160,7')).toBe(true);
    }
  });

  it('gaussian blur spreads a bright pixel with clamped edges', () => {
    const bmp = bitmapFrom(3, 1, [[0, 0, 0, 0], [160, 0, 0, 0], [0, 0, 0, 0]]);
    convolve(bmp, GAUSSIAN_BLUR);
    expect(pixelsOf(bmp).map((p) => p[0])).toEqual([40, 80, 40]);
  });

  it('reads from a snapshot, not from already written pixels', () => {
    const bmp = bitmapFrom(3, 1, [[0, 0, 0, 0], [90, 0, 0, 0], [0, 0, 0, 0]]);
    convolve(bmp, smoothKernel(1));
    // each pixel sees 3 columns x 3 clamped rows: (left + self + right) * 3 / 9
    expect(pixelsOf(bmp).map((p) => p[0])).toEqual([30, 30, 30]);
  });

  it('takes alpha from the centre pixel', () => {
    const bmp = bitmapFrom(2, 1, [[10, 10, 10, 5], [10, 10, 10, 100]]);
    convolve(bmp, GAUSSIAN_BLUR);
    expect(pixelsOf(bmp).map((p) => p[3])).toEqual([5, 100]);
  });
});

describe('selectiveBlur', () => {
  it('keeps flat areas', () => {
    const bmp = uniform();
    selectiveBlur(bmp);
    expect(pixelsOf(bmp).every((p) => p.join() === '80,120,160,7')).toBe(true);
  });

  it('keeps a strong edge that gaussian blur spreads', () => {
    const selective = bitmapFrom(3, 1, [[0, 0, 0, 0], [200, 0, 0, 0], [0, 0, 0, 0]]);
    const gaussian = bitmapFrom(3, 1, [[0, 0, 0, 0], [200, 0, 0, 0], [0, 0, 0, 0]]);
    selectiveBlur(selective);
    convolve(gaussian, GAUSSIAN_BLUR);
    expect(pixelsOf(selective).map((p) => p[0])).toEqual([0, 197, 0]);
    expect(pixelsOf(gaussian).map((p) => p[0])).toEqual([50, 100, 50]);
  });
});
