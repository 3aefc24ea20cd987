/**
 * @module bitmap
 * In-memory bitmap model.
 *
 * Pixels are stored row-major, four bytes each: red, green, blue (0-255) and
 * alpha in the inverted 0-127 range where 0 is fully opaque and 127 is fully
 * transparent. Conversion from/to straight 0-255 alpha happens only at the
 * boundary (see `fromRgba` / `toRgba` in `@raster-effects/core`).
 */

/** A decoded raster image with an 8-bit-per-channel RGBA grid. */
export interface Bitmap {
  /** Width in pixels (positive integer). */
  readonly width: number;
  /** Height in pixels (positive integer). */
  readonly height: number;
  /** Pixel data, `width * height * 4` bytes. */
  readonly data: Uint8ClampedArray;
  /**
   * Whether drawing blends incoming pixels over existing ones.
   * When false, drawing overwrites pixels verbatim (alpha included).
   */
  alphaBlending: boolean;
  /** Whether per-pixel alpha survives export. When false, export is opaque. */
  saveAlpha: boolean;
}
