/**
 * @module text
 * Text overlay pass-through to an injected {@link TextRenderer}.
 */

import type { Bitmap, TextOptions, TextRenderer } from '@raster-effects/types';
import { TextRendererUnavailableError } from './errors';

/**
 * Draw text onto an image.
 *
 * @returns The bitmap returned by the renderer, or `image` when it draws in place.
 * @throws {TextRendererUnavailableError} If no renderer is given.
 */
export function text(
  image: Bitmap,
  content: string,
  fontFile: string,
  options: TextOptions = {},
  renderer?: TextRenderer,
): Bitmap {
  if (!renderer) {
    throw new TextRendererUnavailableError();
  }
  return renderer.render(image, content, fontFile, options) ?? image;
}
