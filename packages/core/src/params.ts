/**
 * @module params
 * Parameter clamps for every effect.
 *
 * Clamping functions are total and monotonic: out-of-range input, infinities
 * included, is pulled to the nearest legal value, and NaN falls to the lower
 * bound. `rotationAngle` and `flipDirection` are the exceptions and reject
 * instead.
 */

import type { FlipDirection } from '@raster-effects/types';
import { InvalidAngleError, InvalidDirectionError } from './errors';

/** Upper bound of the alpha channel (fully transparent). */
export const ALPHA_TRANSPARENT = 127;

/** Alpha of a fully opaque pixel. */
export const ALPHA_OPAQUE = 0;

const FLIP_DIRECTIONS: ReadonlySet<string> = new Set<FlipDirection>(['x', 'y', 'xy', 'yx']);

function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}

/** Largest blur pass count; `+Infinity` and huge values land here. */
export const MAX_BLUR_PASSES = Number.MAX_SAFE_INTEGER;

/** Truncate toward zero and clamp; NaN becomes `min`. */
function clampInt(v: number, min: number, max: number): number {
  return Number.isNaN(v) ? min : clamp(Math.trunc(v), min, max);
}

/**
 * Number of blur passes.
 * @returns Integer from 1 to {@link MAX_BLUR_PASSES}.
 */
export function blurPasses(passes: number): number {
  return clampInt(passes, 1, MAX_BLUR_PASSES);
}

/** Brightness level, -255 (darkest) to 255 (lightest). */
export function brightnessLevel(level: number): number {
  return clampInt(level, -255, 255);
}

/** Contrast level, -100 to 100. */
export function contrastLevel(level: number): number {
  return clampInt(level, -100, 100);
}

/** Smoothing level, 1 to 2048. */
export function smoothPasses(passes: number): number {
  return clampInt(passes, 1, 2048);
}

/** Integer percentage, 0 to 100. */
export function percent(p: number): number {
  return clampInt(p, 0, 100);
}

/**
 * Opacity as a percentage.
 * Values up to 1 are fractions (0.5 → 50); larger values are percentages.
 * @returns Percentage in [0, 100], possibly fractional.
 */
export function opacity(o: number): number {
  if (Number.isNaN(o)) return 0;
  const scaled = o <= 1 ? o * 100 : o;
  return clamp(scaled, 0, 100);
}

/**
 * Convert an opacity (see {@link opacity}) to the 0 (opaque) - 127 (transparent) alpha scale.
 */
export function opacityToAlpha(o: number): number {
  return Math.round(((100 - opacity(o)) / 100) * ALPHA_TRANSPARENT);
}

/** Pixelate block size, integer ≥ 0. */
export function pixelateBlockSize(size: number): number {
  return clampInt(size, 0, Number.MAX_SAFE_INTEGER);
}

/**
 * Validate a rotation angle.
 * @throws {InvalidAngleError} Unless -360 < angle < 360.
 */
export function rotationAngle(angle: number): number {
  if (!Number.isFinite(angle) || angle <= -360 || angle >= 360) {
    throw new InvalidAngleError(`Rotation angle must be between -360 and 360 (exclusive), got ${angle}`);
  }
  return angle;
}

/**
 * Validate a flip direction (case-insensitive).
 * @throws {InvalidDirectionError} Unless one of x, y, xy, yx.
 */
export function flipDirection(dir: string): FlipDirection {
  const normalized = String(dir).trim().toLowerCase();
  if (!isFlipDirection(normalized)) {
    throw new InvalidDirectionError(`Unknown flip direction: '${dir}' (expected x, y, xy or yx)`);
  }
  return normalized;
}

function isFlipDirection(value: string): value is FlipDirection {
  return FLIP_DIRECTIONS.has(value);
}
