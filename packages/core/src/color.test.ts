import { describe, expect, it } from 'vitest';
import { colorToHex, normalizeColor } from './color';
import { InvalidColorComponentError, InvalidColorFormatError } from './errors';

describe('normalizeColor', () => {
  describe('hex strings', () => {
    it('parses #RRGGBB as opaque', () => {
      expect(normalizeColor('#FF0000')).toEqual({ r: 255, g: 0, b: 0, a: 0 });
    });

    it('accepts a missing # and lowercase digits', () => {
      expect(normalizeColor('ff8000')).toEqual({ r: 255, g: 128, b: 0, a: 0 });
    });

    it('ignores surrounding whitespace', () => {
      expect(normalizeColor('  #112233 ')).toEqual({ r: 17, g: 34, b: 51, a: 0 });
    });

    it('rejects short, long and non-hex strings', () => {
      expect(() => normalizeColor('#abc')).toThrow(InvalidColorFormatError);
      expect(() => normalizeColor('#1122334')).toThrow(InvalidColorFormatError);
      expect(() => normalizeColor('#GG0000')).toThrow(InvalidColorFormatError);
      expect(() => normalizeColor('##112233')).toThrow(InvalidColorFormatError);
      expect(() => normalizeColor('')).toThrow(InvalidColorFormatError);
    });
  });

  describe('arrays', () => {
    it('defaults alpha to opaque for three components', () => {
      expect(normalizeColor([10, 20, 30])).toEqual({ r: 10, g: 20, b: 30, a: 0 });
    });

    it('keeps an explicit alpha', () => {
      expect(normalizeColor([255, 0, 0, 64])).toEqual({ r: 255, g: 0, b: 0, a: 64 });
      expect(normalizeColor([0, 0, 0, 127])).toEqual({ r: 0, g: 0, b: 0, a: 127 });
    });

    it('rejects wrong arity as a format error', () => {
      expect(() => normalizeColor([1, 2])).toThrow(InvalidColorFormatError);
      expect(() => normalizeColor([1, 2, 3, 4, 5])).toThrow(InvalidColorFormatError);
    });

    it('rejects out-of-range or fractional components', () => {
      expect(() => normalizeColor([256, 0, 0])).toThrow(InvalidColorComponentError);
      expect(() => normalizeColor([-1, 0, 0])).toThrow(InvalidColorComponentError);
      expect(() => normalizeColor([0, 0, 0, 128])).toThrow(InvalidColorComponentError);
      expect(() => normalizeColor([1.5, 0, 0])).toThrow(InvalidColorComponentError);
    });

    it('names the offending component', () => {
      expect(() => normalizeColor([0, 300, 0])).toThrow(
        "Color component 'g' must be an integer in 0-255, got 300",
      );
    });
  });

  describe('objects', () => {
    it('accepts { r, g, b } with default alpha', () => {
      expect(normalizeColor({ r: 1, g: 2, b: 3 })).toEqual({ r: 1, g: 2, b: 3, a: 0 });
    });

    it('validates components the same way as arrays', () => {
      expect(() => normalizeColor({ r: 1, g: 2, b: 3, a: 200 })).toThrow(InvalidColorComponentError);
    });
  });

  it('carries a programmatic error code', () => {
    try {
      normalizeColor('nope');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidColorFormatError);
      if (e instanceof InvalidColorFormatError) {
        expect(e.code).toBe('InvalidColorFormat');
      }
    }
  });
});

describe('colorToHex', () => {
  it('formats lowercase two-digit channels', () => {
    expect(colorToHex({ r: 17, g: 34, b: 51, a: 0 })).toBe('#112233');
    expect(colorToHex({ r: 255, g: 0, b: 10, a: 127 })).toBe('#ff000a');
  });

  it('round-trips with normalizeColor', () => {
    expect(colorToHex(normalizeColor('#A0B1C2'))).toBe('#a0b1c2');
  });
});
