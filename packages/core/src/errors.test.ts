import { describe, expect, it } from 'vitest';
import {
  InvalidAngleError,
  InvalidDirectionError,
  RasterEffectsError,
  RegionOutOfBoundsError,
  TextRendererUnavailableError,
  UnsupportedFilterKindError,
  isRasterEffectsError,
} from './errors';

describe('errors', () => {
  it('subclasses share the base class and expose a code', () => {
    const err = new InvalidAngleError('bad angle');
    expect(err).toBeInstanceOf(RasterEffectsError);
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe('InvalidAngle');
    expect(err.name).toBe('InvalidAngleError');
    expect(err.message).toBe('bad angle');
  });

  it('formats the unsupported filter kind', () => {
    const err = new UnsupportedFilterKindError('sharpen');
    expect(err.code).toBe('UnsupportedFilterKind');
    expect(err.message).toBe("Unsupported filter kind: 'sharpen'");
  });

  it('has a fixed message for a missing text renderer', () => {
    expect(new TextRendererUnavailableError().message).toBe('No text renderer configured');
  });

  it('isRasterEffectsError narrows only own errors', () => {
    expect(isRasterEffectsError(new RegionOutOfBoundsError('x'))).toBe(true);
    expect(isRasterEffectsError(new InvalidDirectionError('x'))).toBe(true);
    expect(isRasterEffectsError(new RangeError('x'))).toBe(false);
    expect(isRasterEffectsError('InvalidAngle')).toBe(false);
  });
});
