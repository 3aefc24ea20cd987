/**
 * @module errors
 * Error taxonomy. Every failure raised by this package is a
 * {@link RasterEffectsError} carrying a string `code`, thrown synchronously
 * before any pixel is written.
 */

/** Programmatic error discriminator. */
export type RasterEffectsErrorCode =
  | 'InvalidColorFormat'
  | 'InvalidColorComponent'
  | 'InvalidAngle'
  | 'InvalidDirection'
  | 'RegionOutOfBounds'
  | 'UnsupportedFilterKind'
  | 'TextRendererUnavailable';

/** Base class of all raster-effects errors. */
export class RasterEffectsError extends Error {
  readonly code: RasterEffectsErrorCode;

  constructor(code: RasterEffectsErrorCode, message: string) {
    super(message);
    this.name = 'RasterEffectsError';
    this.code = code;
  }
}

/** A color string or array has the wrong shape. */
export class InvalidColorFormatError extends RasterEffectsError {
  constructor(message: string) {
    super('InvalidColorFormat', message);
    this.name = 'InvalidColorFormatError';
  }
}

/** A color component lies outside its legal range. */
export class InvalidColorComponentError extends RasterEffectsError {
  constructor(message: string) {
    super('InvalidColorComponent', message);
    this.name = 'InvalidColorComponentError';
  }
}

/** A rotation angle is not strictly between -360 and 360. */
export class InvalidAngleError extends RasterEffectsError {
  constructor(message: string) {
    super('InvalidAngle', message);
    this.name = 'InvalidAngleError';
  }
}

/** A flip direction is not one of x, y, xy, yx. */
export class InvalidDirectionError extends RasterEffectsError {
  constructor(message: string) {
    super('InvalidDirection', message);
    this.name = 'InvalidDirectionError';
  }
}

/** A pixel or rectangle lies outside a bitmap. */
export class RegionOutOfBoundsError extends RasterEffectsError {
  constructor(message: string) {
    super('RegionOutOfBounds', message);
    this.name = 'RegionOutOfBoundsError';
  }
}

/** A filter kind is unknown to the dispatcher or not implemented by a backend. */
export class UnsupportedFilterKindError extends RasterEffectsError {
  constructor(kind: string) {
    super('UnsupportedFilterKind', `Unsupported filter kind: '${kind}'`);
    this.name = 'UnsupportedFilterKindError';
  }
}

/** Text overlay was requested without a configured renderer. */
export class TextRendererUnavailableError extends RasterEffectsError {
  constructor() {
    super('TextRendererUnavailable', 'No text renderer configured');
    this.name = 'TextRendererUnavailableError';
  }
}

/** Narrow an unknown thrown value to a {@link RasterEffectsError}. */
export function isRasterEffectsError(value: unknown): value is RasterEffectsError {
  return value instanceof RasterEffectsError;
}
