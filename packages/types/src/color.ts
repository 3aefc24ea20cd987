/**
 * @module color
 * Color value types.
 */

/** Canonical validated color: r, g, b in 0-255, a in 0-127 (0 = opaque). */
export interface ColorSpec {
  r: number;
  g: number;
  b: number;
  a: number;
}

/** Object form accepted by the color normalizer; alpha defaults to opaque. */
export interface ColorObject {
  r: number;
  g: number;
  b: number;
  a?: number;
}

/**
 * Any color representation accepted by the public API:
 * - `'#RRGGBB'` or `'RRGGBB'`
 * - `[r, g, b]` or `[r, g, b, a]`
 * - `{ r, g, b, a? }`
 */
export type ColorInput = string | readonly number[] | ColorObject;
