/**
 * @module filters
 * Filter dispatcher, named filter operations and the built-in backend.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_PIXELATE_BLOCK_SIZE,
  FILTER_KINDS,
  applyFilter,
  createFilterRequest,
  isFilterKind,
  toSteps,
} from './dispatcher';
export type { FilterStep } from './dispatcher';
export {
  blur,
  brightness,
  contrast,
  edges,
  emboss,
  grayscale,
  invert,
  meanRemove,
  pixelate,
  sepia,
  smooth,
} from './named';
export { builtinFilterBackend } from './backend';
export {
  EDGE_DETECT,
  EMBOSS,
  GAUSSIAN_BLUR,
  MEAN_REMOVAL,
  convolve,
  selectiveBlur,
  smoothKernel,
} from './convolution';
export type { ConvolutionSpec, Kernel3x3 } from './convolution';
export {
  applyBrightness,
  applyColorize,
  applyContrast,
  applyGrayscale,
  applyInvert,
  applyPixelate,
} from './adjustments';
