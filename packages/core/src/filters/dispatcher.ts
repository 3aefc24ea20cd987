/**
 * @module filters/dispatcher
 * Translates {@link FilterRequest}s into primitive filters and runs them
 * through a {@link FilterBackend}, mutating the bitmap in place.
 *
 * All parameters are normalized before the first primitive is issued, so an
 * invalid request never leaves a half-filtered bitmap behind.
 */

import type {
  Bitmap,
  BlurType,
  ColorInput,
  FilterBackend,
  FilterKind,
  FilterRequest,
  PrimitiveFilter,
} from '@raster-effects/types';
import { normalizeColor } from '../color';
import { InvalidColorFormatError, UnsupportedFilterKindError } from '../errors';
import {
  blurPasses,
  brightnessLevel,
  contrastLevel,
  opacityToAlpha,
  pixelateBlockSize,
  smoothPasses,
} from '../params';
import { builtinFilterBackend } from './backend';

/** Every request kind the dispatcher understands. */
export const FILTER_KINDS: readonly FilterKind[] = [
  'grayscale',
  'sepia',
  'pixelate',
  'edge-detect',
  'emboss',
  'invert',
  'mean-removal',
  'smooth',
  'blur',
  'brightness',
  'contrast',
  'colorize',
];

const KNOWN_KINDS: ReadonlySet<string> = new Set(FILTER_KINDS);

/** Default pixelate block size in pixels. */
export const DEFAULT_PIXELATE_BLOCK_SIZE = 10;

/** Warm tint added by sepia on top of grayscale. */
const SEPIA_TINT: PrimitiveFilter = { kind: 'colorize', r: 100, g: 50, b: 0, a: 0 };

/** A primitive filter and the number of consecutive times to apply it. */
export interface FilterStep {
  filter: PrimitiveFilter;
  repeat: number;
}

/** Whether `kind` names a dispatcher request. */
export function isFilterKind(kind: string): kind is FilterKind {
  return KNOWN_KINDS.has(kind);
}

/**
 * Expand a request into the steps that implement it. Multi-pass blur is a
 * single step with `repeat` set to the pass count.
 * @throws {UnsupportedFilterKindError} For an unknown kind.
 * @throws {InvalidColorFormatError | InvalidColorComponentError} For a bad colorize color.
 */
export function toSteps(request: FilterRequest): FilterStep[] {
  const once = (filter: PrimitiveFilter): FilterStep => ({ filter, repeat: 1 });
  const { kind } = request;
  switch (kind) {
    case 'grayscale':
      return [once({ kind: 'grayscale' })];
    case 'sepia':
      return [once({ kind: 'grayscale' }), once(SEPIA_TINT)];
    case 'pixelate':
      return [once({
        kind: 'pixelate',
        blockSize: pixelateBlockSize(request.blockSize ?? DEFAULT_PIXELATE_BLOCK_SIZE),
        average: true,
      })];
    case 'edge-detect':
    case 'emboss':
    case 'invert':
    case 'mean-removal':
      return [once({ kind })];
    case 'smooth':
      return [once({ kind: 'smooth', weight: smoothPasses(request.passes ?? 1) })];
    case 'blur':
      return [{
        filter: request.type === 'gaussian' ? { kind: 'gaussian-blur' } : { kind: 'selective-blur' },
        repeat: blurPasses(request.passes ?? 1),
      }];
    case 'brightness':
      return [once({ kind: 'brightness', level: brightnessLevel(request.level) })];
    case 'contrast':
      return [once({ kind: 'contrast', level: contrastLevel(request.level) })];
    case 'colorize': {
      const { r, g, b } = normalizeColor(request.color);
      return [once({ kind: 'colorize', r, g, b, a: opacityToAlpha(request.opacity) })];
    }
    default:
      throw new UnsupportedFilterKindError(kind);
  }
}

/**
 * Apply a filter request to `image` in place.
 *
 * @param backend - Executes the primitives (default: {@link builtinFilterBackend}).
 * @throws {UnsupportedFilterKindError} For an unknown kind.
 *
 * @example
 * ```ts
 * applyFilter(bitmap, { kind: 'blur', passes: 3, type: 'gaussian' });
 * ```
 */
export function applyFilter(
  image: Bitmap,
  request: FilterRequest,
  backend: FilterBackend = builtinFilterBackend,
): void {
  const steps = toSteps(request);
  for (const { filter, repeat } of steps) {
    for (let pass = 0; pass < repeat; pass++) {
      backend.apply(image, filter);
    }
  }
}

// ---------------------------------------------------------------------------
// Untyped requests
// ---------------------------------------------------------------------------

function numberParam(params: Readonly<Record<string, unknown>>, key: string): number | undefined {
  const value = params[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return undefined;
}

function blurTypeParam(params: Readonly<Record<string, unknown>>): BlurType {
  const value = params.type;
  return typeof value === 'string' && value.toLowerCase() === 'gaussian' ? 'gaussian' : 'selective';
}

function isColorInput(value: unknown): value is ColorInput {
  if (typeof value === 'string') return true;
  if (Array.isArray(value)) return value.every((n) => typeof n === 'number');
  return typeof value === 'object' && value !== null && 'r' in value && 'g' in value && 'b' in value;
}

function colorParam(params: Readonly<Record<string, unknown>>): ColorInput {
  const value = params.color;
  if (!isColorInput(value)) {
    throw new InvalidColorFormatError(`Unsupported color value: ${String(value)}`);
  }
  return value;
}

/**
 * Build a typed request from a filter name and a loose parameter record,
 * e.g. values parsed from a command line or a JSON pipeline description.
 *
 * Missing numeric parameters take the request defaults (0 for levels and opacity).
 *
 * @throws {UnsupportedFilterKindError} If `kind` is not a known filter.
 */
export function createFilterRequest(
  kind: string,
  params: Readonly<Record<string, unknown>> = {},
): FilterRequest {
  const normalized = kind.trim().toLowerCase();
  if (!isFilterKind(normalized)) {
    throw new UnsupportedFilterKindError(kind);
  }
  switch (normalized) {
    case 'pixelate':
      return { kind: normalized, blockSize: numberParam(params, 'blockSize') };
    case 'smooth':
      return { kind: normalized, passes: numberParam(params, 'passes') };
    case 'blur':
      return { kind: normalized, passes: numberParam(params, 'passes'), type: blurTypeParam(params) };
    case 'brightness':
    case 'contrast':
      return { kind: normalized, level: numberParam(params, 'level') ?? 0 };
    case 'colorize':
      return { kind: normalized, color: colorParam(params), opacity: numberParam(params, 'opacity') ?? 0 };
    default:
      return { kind: normalized };
  }
}
