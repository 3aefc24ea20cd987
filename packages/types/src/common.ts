/**
 * @module common
 * Common geometric primitives shared by all packages.
 */

/** Integer pixel position inside a bitmap. */
export interface Point {
  /** X coordinate (column) */
  x: number;
  /** Y coordinate (row) */
  y: number;
}

/** Size in pixels. */
export interface Size {
  /** Width in pixels */
  width: number;
  /** Height in pixels */
  height: number;
}

/** Axis-aligned rectangle. */
export interface Rect extends Point, Size {}
