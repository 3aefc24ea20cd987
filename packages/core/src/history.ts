/**
 * @module history
 * Undo/redo support for {@link ImageEditor}.
 *
 * Edits are recorded after they have been applied, as whole-bitmap snapshots:
 * the effects either rewrite every pixel or replace the bitmap outright, so a
 * region diff would save nothing.
 *
 * @see {@link @raster-effects/types#CommandHistory} for the interface contract
 */

import type { Bitmap, Command, CommandHistory } from '@raster-effects/types';
import { cloneBitmap } from './bitmap';

/** Default maximum number of edits retained in history. */
export const DEFAULT_MAX_DEPTH = 50;

/**
 * A completed edit, stored as the bitmap before and after it.
 * `execute` re-applies the edit, `undo` reverts it; each hands out a fresh
 * copy so later in-place edits never corrupt the stored snapshots.
 */
export class SnapshotCommand implements Command {
  readonly description: string;
  private readonly before: Bitmap;
  private readonly after: Bitmap;
  private readonly assign: (bitmap: Bitmap) => void;

  /**
   * @param description - Name of the edit.
   * @param before      - Snapshot taken before the edit (owned by the command).
   * @param after       - Snapshot taken after the edit (owned by the command).
   * @param assign      - Installs a bitmap as the editor's current one.
   */
  constructor(description: string, before: Bitmap, after: Bitmap, assign: (bitmap: Bitmap) => void) {
    this.description = description;
    this.before = before;
    this.after = after;
    this.assign = assign;
  }

  /** Install the post-edit bitmap. */
  execute(): void {
    this.assign(cloneBitmap(this.after));
  }

  /** Install the pre-edit bitmap. */
  undo(): void {
    this.assign(cloneBitmap(this.before));
  }
}

/**
 * Concrete implementation of {@link CommandHistory}.
 *
 * Maintains separate undo and redo stacks. Recording a new command clears
 * the redo stack. When the undo stack exceeds `maxDepth`, the
 * oldest command is discarded.
 */
export class EditHistory implements CommandHistory {
  /** @inheritdoc */
  readonly maxDepth: number;

  private undoStack: Command[] = [];
  private redoStack: Command[] = [];

  /**
   * @param maxDepth - Maximum number of commands to keep (default 50).
   * @throws {RangeError} If `maxDepth` is not an integer of at least 1.
   */
  constructor(maxDepth: number = DEFAULT_MAX_DEPTH) {
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError('maxDepth must be an integer of at least 1');
    }
    this.maxDepth = maxDepth;
  }

  /** @inheritdoc */
  get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  /** @inheritdoc */
  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /** @inheritdoc */
  get undoDescription(): string | null {
    const top = this.undoStack[this.undoStack.length - 1];
    return top ? top.description : null;
  }

  /** @inheritdoc */
  get redoDescription(): string | null {
    const top = this.redoStack[this.redoStack.length - 1];
    return top ? top.description : null;
  }

  /** @inheritdoc */
  record(command: Command): void {
    this.undoStack.push(command);
    this.redoStack = [];

    if (this.undoStack.length > this.maxDepth) {
      this.undoStack.shift();
    }
  }

  /** @inheritdoc */
  undo(): void {
    const command = this.undoStack.pop();
    if (!command) {
      return;
    }
    command.undo();
    this.redoStack.push(command);
  }

  /** @inheritdoc */
  redo(): void {
    const command = this.redoStack.pop();
    if (!command) {
      return;
    }
    command.execute();
    this.undoStack.push(command);
  }

  /** @inheritdoc */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
  }
}
