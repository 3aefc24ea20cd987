/**
 * @module text
 * Text overlay collaborator contract. Font rasterisation lives outside this
 * project; the core only forwards requests to a {@link TextRenderer}.
 */

import type { Bitmap } from './bitmap';
import type { ColorInput } from './color';

/** Anchor of the text block on the canvas. */
export type TextPosition =
  | 'top-left'
  | 'top'
  | 'top-right'
  | 'left'
  | 'center'
  | 'right'
  | 'bottom-left'
  | 'bottom'
  | 'bottom-right';

/** Text overlay parameters, forwarded to the renderer untouched. */
export interface TextOptions {
  /** Font size in points. */
  fontSize?: number;
  /** Text color. */
  color?: ColorInput;
  /** Horizontal offset from the anchor in pixels. */
  offsetX?: number;
  /** Vertical offset from the anchor in pixels. */
  offsetY?: number;
  position?: TextPosition;
  /** Text angle in degrees. */
  angle?: number;
  /** Outline width in pixels (0 = none). */
  strokeWidth?: number;
  strokeColor?: ColorInput;
}

/** Draws text onto a bitmap. */
export interface TextRenderer {
  /**
   * Render `text` with the given font file.
   * Either draws onto `bitmap` in place and returns null, or returns a replacement bitmap.
   */
  render(bitmap: Bitmap, text: string, fontFile: string, options: TextOptions): Bitmap | null;
}
