/**
 * @raster-effects/core
 *
 * Raster effects over in-memory bitmaps: color normalization, parameter
 * clamps, alpha compositing, flip/rotate, filters, fill, desaturation and
 * opacity, plus a fluent editor.
 *
 * @packageDocumentation
 */

// Errors
export {
  InvalidAngleError,
  InvalidColorComponentError,
  InvalidColorFormatError,
  InvalidDirectionError,
  RasterEffectsError,
  RegionOutOfBoundsError,
  TextRendererUnavailableError,
  UnsupportedFilterKindError,
  isRasterEffectsError,
} from './errors';
export type { RasterEffectsErrorCode } from './errors';

// Bitmap primitive
export {
  assertRegion,
  blendPixel,
  cloneBitmap,
  copyRegion,
  createBitmap,
  drawPixel,
  enableAlpha,
  fromRgba,
  getPixel,
  inBounds,
  restoreBitmap,
  setPixel,
  toRgba,
} from './bitmap';

// Colors and parameters
export { colorToHex, normalizeColor } from './color';
export {
  ALPHA_OPAQUE,
  ALPHA_TRANSPARENT,
  MAX_BLUR_PASSES,
  blurPasses,
  brightnessLevel,
  contrastLevel,
  flipDirection,
  opacity as opacityPercent,
  opacityToAlpha,
  percent,
  pixelateBlockSize,
  rotationAngle,
  smoothPasses,
} from './params';

// Compositing
export { mergeAlpha } from './compositor';
export { desaturate, opacity } from './blend';

// Geometry
export {
  bilinearSample,
  flip,
  flipHorizontal,
  flipVertical,
  rotate,
  rotate180,
  rotate90CCW,
  rotate90CW,
  rotateArbitrary,
} from './transform';

// Filters
export {
  DEFAULT_PIXELATE_BLOCK_SIZE,
  FILTER_KINDS,
  applyFilter,
  blur,
  brightness,
  builtinFilterBackend,
  contrast,
  createFilterRequest,
  edges,
  emboss,
  grayscale,
  invert,
  isFilterKind,
  meanRemove,
  pixelate,
  sepia,
  smooth,
  toSteps,
} from './filters';
export type { FilterStep } from './filters';

// Fill, colorize, text
export { colorize, fill } from './fill';
export { text } from './text';

// Editor and history
export { DEFAULT_HISTORY_DEPTH, ImageEditor } from './editor';
export type { ImageEditorOptions } from './editor';
export { DEFAULT_MAX_DEPTH, EditHistory, SnapshotCommand } from './history';
