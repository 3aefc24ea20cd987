// Color normalization for every effect that takes a color argument.
// Canonical form: r, g, b 0-255 and a 0-127 (0 = opaque, 127 = transparent).
// Input is validated, never clamped.

import type { ColorInput, ColorSpec } from '@raster-effects/types';
import { InvalidColorComponentError, InvalidColorFormatError } from './errors';
import { ALPHA_OPAQUE, ALPHA_TRANSPARENT } from './params';

const HEX_PATTERN = /^[0-9a-f]{6}$/i;

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function checkComponent(value: unknown, name: string, max: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > max) {
    throw new InvalidColorComponentError(
      `Color component '${name}' must be an integer in 0-${max}, got ${String(value)}`,
    );
  }
  return value;
}

function fromComponents(r: unknown, g: unknown, b: unknown, a: unknown): ColorSpec {
  return {
    r: checkComponent(r, 'r', 255),
    g: checkComponent(g, 'g', 255),
    b: checkComponent(b, 'b', 255),
    a: a === undefined ? ALPHA_OPAQUE : checkComponent(a, 'a', ALPHA_TRANSPARENT),
  };
}

function isComponentArray(input: ColorInput): input is readonly number[] {
  return Array.isArray(input);
}

function parseHex(input: string): ColorSpec {
  const trimmed = input.trim();
  const cleaned = trimmed.startsWith('#') ? trimmed.slice(1) : trimmed;
  if (!HEX_PATTERN.test(cleaned)) {
    throw new InvalidColorFormatError(`Expected a color like '#RRGGBB', got '${input}'`);
  }
  return {
    r: parseInt(cleaned.slice(0, 2), 16),
    g: parseInt(cleaned.slice(2, 4), 16),
    b: parseInt(cleaned.slice(4, 6), 16),
    a: ALPHA_OPAQUE,
  };
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Normalize any supported color representation to a {@link ColorSpec}.
 *
 * @param input - `'#RRGGBB'`, `'RRGGBB'`, `[r, g, b]`, `[r, g, b, a]` or `{ r, g, b, a? }`.
 * @returns Canonical color; alpha defaults to 0 (opaque).
 * @throws {InvalidColorFormatError} Malformed hex string or wrong array arity.
 * @throws {InvalidColorComponentError} Component out of range or not an integer.
 *
 * @example
 * ```ts
 * normalizeColor('#FF0000');       // { r: 255, g: 0, b: 0, a: 0 }
 * normalizeColor([255, 0, 0, 64]); // { r: 255, g: 0, b: 0, a: 64 }
 * ```
 */
export function normalizeColor(input: ColorInput): ColorSpec {
  if (typeof input === 'string') {
    return parseHex(input);
  }
  if (isComponentArray(input)) {
    if (input.length !== 3 && input.length !== 4) {
      throw new InvalidColorFormatError(
        `Color arrays must have 3 or 4 components, got ${input.length}`,
      );
    }
    return fromComponents(input[0], input[1], input[2], input[3]);
  }
  if (typeof input === 'object' && input !== null) {
    if (!('r' in input && 'g' in input && 'b' in input)) {
      throw new InvalidColorFormatError('Color objects must have r, g and b components');
    }
    return fromComponents(input.r, input.g, input.b, input.a);
  }
  throw new InvalidColorFormatError(`Unsupported color value: ${String(input)}`);
}

/**
 * Format a color as `#rrggbb` (alpha is dropped).
 */
export function colorToHex(color: ColorSpec): string {
  const toHex = (n: number): string => n.toString(16).padStart(2, '0');
  return `#${toHex(color.r)}${toHex(color.g)}${toHex(color.b)}`;
}
