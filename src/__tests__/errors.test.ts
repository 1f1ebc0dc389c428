import { describe, it, expect } from 'vitest';
import { GeometryError, InvalidArgumentError, StarGeometryError, isStarGeometryError } from '../errors';

describe('star geometry errors', () => {
  it('should carry their kind and name', () => {
    const invalid = new InvalidArgumentError('density must be at least 2');
    const geometry = new GeometryError('no crossing');

    expect(invalid).toBeInstanceOf(StarGeometryError);
    expect(invalid).toBeInstanceOf(Error);
    expect(invalid.kind).toBe('invalid-argument');
    expect(invalid.name).toBe('InvalidArgumentError');
    expect(invalid.message).toBe('density must be at least 2');
    expect(geometry.kind).toBe('geometry');
    expect(geometry.name).toBe('GeometryError');
  });

  it('should recognise only its own errors', () => {
    expect(isStarGeometryError(new GeometryError('no crossing'))).toBe(true);
    expect(isStarGeometryError(new Error('other'))).toBe(false);
    expect(isStarGeometryError('GeometryError')).toBe(false);
  });
});
