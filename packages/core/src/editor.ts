/**
 * @module editor
 * Fluent facade over every effect, holding the current bitmap.
 *
 * Operations that allocate (flip, rotate, opacity, partial desaturate, text
 * renderers that return a new canvas) replace {@link ImageEditor.bitmap};
 * in-place operations keep the same handle.
 *
 * Usage:
 * ```ts
 * const editor = new ImageEditor(fromRgba(pixels, 640, 480), { historyDepth: 20 });
 * editor.sepia().rotate(15, '#ffffff').opacity(0.8);
 * const out = toRgba(editor.bitmap);
 * ```
 */

import type {
  Bitmap,
  BlurType,
  ColorInput,
  FilterBackend,
  FlipDirection,
  TextOptions,
  TextRenderer,
} from '@raster-effects/types';
import { cloneBitmap, restoreBitmap } from './bitmap';
import { desaturate, opacity } from './blend';
import { colorize, fill } from './fill';
import { builtinFilterBackend } from './filters/backend';
import { DEFAULT_PIXELATE_BLOCK_SIZE, applyFilter, createFilterRequest } from './filters/dispatcher';
import { EditHistory, SnapshotCommand } from './history';
import { text } from './text';
import { flip, rotate } from './transform';

/** Tag prefixed to debug output. */
const LOG_TAG = '[raster-effects]';

/** History is off unless a depth is configured. */
export const DEFAULT_HISTORY_DEPTH = 0;

/** Editor configuration. */
export interface ImageEditorOptions {
  /** Executes primitive filters (default: built-in backend). */
  backend?: FilterBackend;
  /** Required by {@link ImageEditor.text}. */
  textRenderer?: TextRenderer;
  /** Number of undoable edits to keep; 0 disables history (default 0). */
  historyDepth?: number;
  /** Log each operation's duration and canvas size via `console.debug`. */
  debug?: boolean;
}

/**
 * Chainable image editor.
 *
 * A method that throws leaves the bitmap and the history unchanged: pixels
 * written before the failure are rolled back.
 */
export class ImageEditor {
  private current: Bitmap;
  private readonly backend: FilterBackend;
  private readonly textRenderer: TextRenderer | undefined;
  private readonly history: EditHistory | null;
  private readonly debug: boolean;

  /**
   * @param bitmap - Initial bitmap; edited in place by in-place operations.
   * @throws {RangeError} If `historyDepth` is negative or not an integer.
   */
  constructor(bitmap: Bitmap, options: ImageEditorOptions = {}) {
    const depth = options.historyDepth ?? DEFAULT_HISTORY_DEPTH;
    if (!Number.isInteger(depth) || depth < 0) {
      throw new RangeError(`historyDepth must be a non-negative integer, got ${depth}`);
    }
    this.current = bitmap;
    this.backend = options.backend ?? builtinFilterBackend;
    this.textRenderer = options.textRenderer;
    this.history = depth > 0 ? new EditHistory(depth) : null;
    this.debug = options.debug ?? false;
  }

  /** The current bitmap. */
  get bitmap(): Bitmap {
    return this.current;
  }

  get canUndo(): boolean {
    return this.history?.canUndo ?? false;
  }

  get canRedo(): boolean {
    return this.history?.canRedo ?? false;
  }

  /** Name of the edit {@link undo} would revert, e.g. `'rotate'`. */
  get undoDescription(): string | null {
    return this.history?.undoDescription ?? null;
  }

  /** Name of the edit {@link redo} would re-apply. */
  get redoDescription(): string | null {
    return this.history?.redoDescription ?? null;
  }

  /** Forget all recorded edits; the current bitmap is kept. */
  clearHistory(): this {
    this.history?.clear();
    return this;
  }

  /** Revert the most recent edit (no-op without history). */
  undo(): this {
    this.history?.undo();
    return this;
  }

  /** Re-apply the most recently reverted edit (no-op without history). */
  redo(): this {
    this.history?.redo();
    return this;
  }

  // -------------------------------------------------------------------------
  // Filters (in place)
  // -------------------------------------------------------------------------

  grayscale(): this {
    return this.mutate('grayscale', (b) => applyFilter(b, { kind: 'grayscale' }, this.backend));
  }

  sepia(): this {
    return this.mutate('sepia', (b) => applyFilter(b, { kind: 'sepia' }, this.backend));
  }

  pixelate(blockSize: number = DEFAULT_PIXELATE_BLOCK_SIZE): this {
    return this.mutate('pixelate', (b) => applyFilter(b, { kind: 'pixelate', blockSize }, this.backend));
  }

  edges(): this {
    return this.mutate('edges', (b) => applyFilter(b, { kind: 'edge-detect' }, this.backend));
  }

  emboss(): this {
    return this.mutate('emboss', (b) => applyFilter(b, { kind: 'emboss' }, this.backend));
  }

  invert(): this {
    return this.mutate('invert', (b) => applyFilter(b, { kind: 'invert' }, this.backend));
  }

  meanRemove(): this {
    return this.mutate('meanRemove', (b) => applyFilter(b, { kind: 'mean-removal' }, this.backend));
  }

  blur(passes: number = 1, type: BlurType = 'selective'): this {
    return this.mutate('blur', (b) => applyFilter(b, { kind: 'blur', passes, type }, this.backend));
  }

  smooth(passes: number = 1): this {
    return this.mutate('smooth', (b) => applyFilter(b, { kind: 'smooth', passes }, this.backend));
  }

  brightness(level: number): this {
    return this.mutate('brightness', (b) => applyFilter(b, { kind: 'brightness', level }, this.backend));
  }

  contrast(level: number): this {
    return this.mutate('contrast', (b) => applyFilter(b, { kind: 'contrast', level }, this.backend));
  }

  colorize(color: ColorInput, opacityValue: number): this {
    return this.mutate('colorize', (b) => colorize(b, color, opacityValue, this.backend));
  }

  fill(color: ColorInput = '#000000'): this {
    return this.mutate('fill', (b) => fill(b, color));
  }

  /**
   * Apply a filter by name, e.g. from a pipeline description.
   * @throws {UnsupportedFilterKindError} For an unknown name.
   */
  apply(kind: string, params: Readonly<Record<string, unknown>> = {}): this {
    const request = createFilterRequest(kind, params);
    return this.mutate(request.kind, (b) => applyFilter(b, request, this.backend));
  }

  // -------------------------------------------------------------------------
  // Operations that may replace the bitmap
  // -------------------------------------------------------------------------

  /** See {@link desaturate} for which bitmap becomes current. */
  desaturate(percent: number = 100): this {
    return this.replace('desaturate', (b) => desaturate(b, percent, this.backend));
  }

  opacity(value: number): this {
    return this.replace('opacity', (b) => opacity(b, value));
  }

  rotate(angle: number, bgColor: ColorInput = '#000000'): this {
    return this.replace('rotate', (b) => rotate(b, angle, bgColor));
  }

  flip(direction: FlipDirection | string): this {
    return this.replace('flip', (b) => flip(b, direction));
  }

  /**
   * Draw text through the configured renderer.
   * @throws {TextRendererUnavailableError} If no `textRenderer` was configured.
   */
  text(content: string, fontFile: string, options: TextOptions = {}): this {
    return this.replace('text', (b) => text(b, content, fontFile, options, this.textRenderer));
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private mutate(description: string, operation: (bitmap: Bitmap) => void): this {
    return this.replace(description, (b) => {
      operation(b);
      return b;
    });
  }

  private replace(description: string, operation: (bitmap: Bitmap) => Bitmap): this {
    const start = this.debug ? performance.now() : 0;
    const before = cloneBitmap(this.current);

    let next: Bitmap;
    try {
      next = operation(this.current);
    } catch (error) {
      // A later primitive may fail after earlier ones wrote pixels.
      restoreBitmap(this.current, before);
      throw error;
    }
    this.current = next;

    this.history?.record(
      new SnapshotCommand(description, before, cloneBitmap(next), (b) => {
        this.current = b;
      }),
    );
    if (this.debug) {
      const elapsed = performance.now() - start;
      console.debug(
        `${LOG_TAG} ${description} ${elapsed.toFixed(2)}ms (${next.width}x${next.height})`,
      );
    }
    return this;
  }
}
