import { describe, it, expect, vi } from 'vitest';
import type { Bitmap, Command } from '@raster-effects/types';
import { createBitmap } from './bitmap';
import { EditHistory, SnapshotCommand } from './history';
import { px } from './test-helpers';

/** Create a command with tracked execute/undo calls. */
function mockCommand(desc = 'test'): Command & { execute: ReturnType<typeof vi.fn>; undo: ReturnType<typeof vi.fn> } {
  return {
    description: desc,
    execute: vi.fn(),
    undo: vi.fn(),
  };
}

describe('EditHistory', () => {
  it('starts with empty stacks', () => {
    const history = new EditHistory();
    expect(history.canUndo).toBe(false);
    expect(history.canRedo).toBe(false);
    expect(history.undoDescription).toBeNull();
    expect(history.redoDescription).toBeNull();
    expect(history.maxDepth).toBe(50);
  });

  it('rejects a depth below 1 or not an integer', () => {
    expect(() => new EditHistory(0)).toThrow(RangeError);
    expect(() => new EditHistory(2.5)).toThrow(RangeError);
  });

  describe('record', () => {
    it('stores an applied command without running it', () => {
      const history = new EditHistory();
      const recorded = mockCommand('recorded');
      history.record(recorded);
      expect(recorded.execute).not.toHaveBeenCalled();
      expect(history.undoDescription).toBe('recorded');
    });

    it('clears the redo stack', () => {
      const history = new EditHistory();
      history.record(mockCommand('A'));
      history.undo();
      expect(history.canRedo).toBe(true);

      history.record(mockCommand('B'));
      expect(history.canRedo).toBe(false);
    });
  });

  describe('undo and redo', () => {
    it('undoes in LIFO order', () => {
      const history = new EditHistory();
      const calls: string[] = [];
      history.record({ description: 'A', execute: vi.fn(), undo: () => { calls.push('undo-A'); } });
      history.record({ description: 'B', execute: vi.fn(), undo: () => { calls.push('undo-B'); } });

      history.undo();
      history.undo();
      expect(calls).toEqual(['undo-B', 'undo-A']);
    });

    it('redo executes again and moves the command back', () => {
      const history = new EditHistory();
      const cmd = mockCommand('fill');
      history.record(cmd);
      history.undo();
      history.redo();
      expect(cmd.undo).toHaveBeenCalledOnce();
      expect(cmd.execute).toHaveBeenCalledOnce();
      expect(history.undoDescription).toBe('fill');
      expect(history.canRedo).toBe(false);
    });

    it('does nothing on empty stacks', () => {
      const history = new EditHistory();
      history.undo();
      history.redo();
      expect(history.canUndo).toBe(false);
      expect(history.canRedo).toBe(false);
    });
  });

  it('evicts the oldest command beyond maxDepth', () => {
    const history = new EditHistory(2);
    const first = mockCommand('first');
    history.record(first);
    history.record(mockCommand('second'));
    history.record(mockCommand('third'));

    history.undo();
    expect(history.undoDescription).toBe('second');
    history.undo();
    expect(history.canUndo).toBe(false);
    expect(first.undo).not.toHaveBeenCalled();
  });

  it('clear empties both stacks', () => {
    const history = new EditHistory();
    history.record(mockCommand());
    history.record(mockCommand());
    history.undo();

    history.clear();
    expect(history.canUndo).toBe(false);
    expect(history.canRedo).toBe(false);
  });
});

describe('SnapshotCommand', () => {
  it('installs fresh copies of the stored snapshots', () => {
    const before = createBitmap(1, 1, { r: 1, g: 1, b: 1, a: 0 });
    const after = createBitmap(1, 1, { r: 2, g: 2, b: 2, a: 0 });
    let current: Bitmap = after;
    const cmd = new SnapshotCommand('edit', before, after, (b) => {
      current = b;
    });

    cmd.undo();
    expect(px(current, 0, 0)).toEqual([1, 1, 1, 0]);
    expect(current).not.toBe(before);

    current.data[0] = 99;
    cmd.undo();
    expect(px(current, 0, 0)).toEqual([1, 1, 1, 0]);

    cmd.execute();
    expect(px(current, 0, 0)).toEqual([2, 2, 2, 0]);
    expect(current).not.toBe(after);
  });
});
