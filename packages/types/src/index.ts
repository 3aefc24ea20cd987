/**
 * @raster-effects/types
 *
 * Shared type definitions for raster-effects.
 * This package contains zero runtime code: only TypeScript interfaces and
 * types that serve as the contract between packages and collaborators.
 *
 * @packageDocumentation
 */

// Common primitives
export type { Point, Rect, Size } from './common';

// Bitmap model
export type { Bitmap } from './bitmap';

// Colors
export type { ColorInput, ColorObject, ColorSpec } from './color';

// Filters
export type {
  BlurRequest,
  BlurType,
  BrightnessRequest,
  ColorizeRequest,
  ContrastRequest,
  EdgeDetectRequest,
  EmbossRequest,
  FilterBackend,
  FilterKind,
  FilterRequest,
  FlipDirection,
  GrayscaleRequest,
  InvertRequest,
  MeanRemovalRequest,
  PixelateRequest,
  PrimitiveFilter,
  PrimitiveFilterKind,
  SepiaRequest,
  SmoothRequest,
} from './filter';

// Text overlay
export type { TextOptions, TextPosition, TextRenderer } from './text';

// Command (undo/redo)
export type { Command, CommandHistory } from './command';
