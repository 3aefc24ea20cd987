/**
 * @module filters/convolution
 * 3×3 convolution primitives: edge detect, emboss, mean removal, smooth,
 * gaussian blur, and an edge-preserving selective blur.
 *
 * Every pass reads from a snapshot of the input and writes the bitmap in
 * place. Samples beyond the border are clamped to the nearest edge pixel.
 * Results are clamped to 0-255 and truncated; alpha is taken from the centre pixel.
 */

import type { Bitmap } from '@raster-effects/types';

/** Row-major 3×3 kernel. */
export type Kernel3x3 = readonly [
  number, number, number,
  number, number, number,
  number, number, number,
];

/** A kernel with its divisor and offset. */
export interface ConvolutionSpec {
  kernel: Kernel3x3;
  divisor: number;
  offset: number;
}

export const EDGE_DETECT: ConvolutionSpec = {
  kernel: [-1, 0, -1, 0, 4, 0, -1, 0, -1],
  divisor: 1,
  offset: 127,
};

export const EMBOSS: ConvolutionSpec = {
  kernel: [1.5, 0, 0, 0, 0, 0, 0, 0, -1.5],
  divisor: 1,
  offset: 127,
};

export const MEAN_REMOVAL: ConvolutionSpec = {
  kernel: [-1, -1, -1, -1, 9, -1, -1, -1, -1],
  divisor: 1,
  offset: 0,
};

export const GAUSSIAN_BLUR: ConvolutionSpec = {
  kernel: [1, 2, 1, 2, 4, 2, 1, 2, 1],
  divisor: 16,
  offset: 0,
};

/** Smoothing kernel with a weighted centre. */
export function smoothKernel(weight: number): ConvolutionSpec {
  return {
    kernel: [1, 1, 1, 1, weight, 1, 1, 1, 1],
    divisor: weight + 8,
    offset: 0,
  };
}

function channel(v: number): number {
  return v < 0 ? 0 : v > 255 ? 255 : Math.trunc(v);
}

/** Byte offset of the edge-clamped neighbour (x + dx, y + dy). */
function neighbourIndex(width: number, height: number, x: number, y: number, dx: number, dy: number): number {
  const nx = Math.min(Math.max(x + dx, 0), width - 1);
  const ny = Math.min(Math.max(y + dy, 0), height - 1);
  return (ny * width + nx) * 4;
}

/**
 * Apply a 3×3 convolution in place.
 */
export function convolve(bitmap: Bitmap, spec: ConvolutionSpec): void {
  const { width, height, data } = bitmap;
  const src = new Uint8ClampedArray(data);
  const { kernel, divisor, offset } = spec;

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      let r = 0, g = 0, b = 0;
      for (let ky = 0; ky < 3; ky++) {
        for (let kx = 0; kx < 3; kx++) {
          const weight = kernel[ky * 3 + kx];
          if (weight === 0) continue;
          const idx = neighbourIndex(width, height, x, y, kx - 1, ky - 1);
          r += src[idx] * weight;
          g += src[idx + 1] * weight;
          b += src[idx + 2] * weight;
        }
      }
      const out = (y * width + x) * 4;
      data[out] = channel(r / divisor + offset);
      data[out + 1] = channel(g / divisor + offset);
      data[out + 2] = channel(b / divisor + offset);
      data[out + 3] = src[out + 3];
    }
  }
}

/**
 * Edge-preserving blur. Per channel, each neighbour weighs
 * `1 / |centre - neighbour|` (1 when equal) and the centre weighs 0.5;
 * the weighted sum is divided by the total weight, so pixels across a strong edge
 * contribute little.
 */
export function selectiveBlur(bitmap: Bitmap): void {
  const { width, height, data } = bitmap;
  const src = new Uint8ClampedArray(data);
  const weights = new Float64Array(9);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const centre = (y * width + x) * 4;
      for (let c = 0; c < 3; c++) {
        let sum = 0;
        for (let k = 0; k < 9; k++) {
          if (k === 4) {
            weights[k] = 0.5;
          } else {
            const idx = neighbourIndex(width, height, x, y, (k % 3) - 1, Math.trunc(k / 3) - 1);
            const diff = Math.abs(src[centre + c] - src[idx + c]);
            weights[k] = diff === 0 ? 1 : 1 / diff;
          }
          sum += weights[k];
        }
        let value = 0;
        for (let k = 0; k < 9; k++) {
          const idx = neighbourIndex(width, height, x, y, (k % 3) - 1, Math.trunc(k / 3) - 1);
          value += src[idx + c] * weights[k];
        }
        data[centre + c] = channel(value / sum);
      }
      data[centre + 3] = src[centre + 3];
    }
  }
}
