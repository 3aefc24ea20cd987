/**
 * @module filter
 * Filter request and backend contracts.
 *
 * Two levels exist:
 * - {@link FilterRequest}: what callers ask for (sepia, multi-pass blur, ...).
 * - {@link PrimitiveFilter}: the single-pass effects a {@link FilterBackend} executes.
 * The dispatcher in `@raster-effects/core` translates the former into the latter.
 */

import type { Bitmap } from './bitmap';
import type { ColorInput } from './color';

/** Blur kernel selection. */
export type BlurType = 'selective' | 'gaussian';

/** Flip direction. `xy` and `yx` are equivalent (both axes). */
export type FlipDirection = 'x' | 'y' | 'xy' | 'yx';

// ---------------------------------------------------------------------------
// Requests
// ---------------------------------------------------------------------------

/** Discriminator for filter requests. */
export type FilterKind =
  | 'grayscale'
  | 'sepia'
  | 'pixelate'
  | 'edge-detect'
  | 'emboss'
  | 'invert'
  | 'mean-removal'
  | 'smooth'
  | 'blur'
  | 'brightness'
  | 'contrast'
  | 'colorize';

export interface GrayscaleRequest {
  kind: 'grayscale';
}

/** Grayscale followed by a fixed warm tint. */
export interface SepiaRequest {
  kind: 'sepia';
}

export interface PixelateRequest {
  kind: 'pixelate';
  /** Block size in pixels (default 10). */
  blockSize?: number;
}

export interface EdgeDetectRequest {
  kind: 'edge-detect';
}

export interface EmbossRequest {
  kind: 'emboss';
}

export interface InvertRequest {
  kind: 'invert';
}

export interface MeanRemovalRequest {
  kind: 'mean-removal';
}

export interface SmoothRequest {
  kind: 'smooth';
  /** Smoothing level, clamped to 1-2048 (default 1). */
  passes?: number;
}

export interface BlurRequest {
  kind: 'blur';
  /** Number of full-image passes, at least 1 (default 1). */
  passes?: number;
  /** Kernel (default `selective`). */
  type?: BlurType;
}

export interface BrightnessRequest {
  kind: 'brightness';
  /** Darkest = -255, lightest = 255. */
  level: number;
}

export interface ContrastRequest {
  kind: 'contrast';
  /** -100 to 100. */
  level: number;
}

export interface ColorizeRequest {
  kind: 'colorize';
  color: ColorInput;
  /** 0-1 fraction or 0-100 percentage. */
  opacity: number;
}

/** A filter applied in place by the dispatcher. */
export type FilterRequest =
  | GrayscaleRequest
  | SepiaRequest
  | PixelateRequest
  | EdgeDetectRequest
  | EmbossRequest
  | InvertRequest
  | MeanRemovalRequest
  | SmoothRequest
  | BlurRequest
  | BrightnessRequest
  | ContrastRequest
  | ColorizeRequest;

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

/** A single-pass effect executed by a backend. Parameters are already clamped. */
export type PrimitiveFilter =
  | { kind: 'grayscale' }
  | { kind: 'invert' }
  | { kind: 'edge-detect' }
  | { kind: 'emboss' }
  | { kind: 'mean-removal' }
  | { kind: 'gaussian-blur' }
  | { kind: 'selective-blur' }
  | { kind: 'smooth'; weight: number }
  | { kind: 'brightness'; level: number }
  | { kind: 'contrast'; level: number }
  | { kind: 'colorize'; r: number; g: number; b: number; a: number }
  | { kind: 'pixelate'; blockSize: number; average: boolean };

/** Discriminator for primitive filters. */
export type PrimitiveFilterKind = PrimitiveFilter['kind'];

/** Executes primitive filters in place. */
export interface FilterBackend {
  /** Apply `filter` to `bitmap`, mutating its pixel data without reallocating. */
  apply(bitmap: Bitmap, filter: PrimitiveFilter): void;
}
