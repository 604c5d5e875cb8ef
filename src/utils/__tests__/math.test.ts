import { describe, it, expect } from 'vitest';
import {
  isFiniteNumber,
  isFiniteVec3,
  vec3,
  vec3AddScaledInPlace,
  vec3Clone,
  vec3Distance,
  vec3Equals,
  vec3Length,
  vec3Normalize,
  vec3Scale,
  vec3Set,
  vec3Sub,
  vec3Zero,
} from '../math';

// === Scalar Operations ===

describe('isFiniteNumber', () => {
  it('accepts ordinary numbers', () => {
    expect(isFiniteNumber(0)).toBe(true);
    expect(isFiniteNumber(-2.5)).toBe(true);
  });

  it('rejects NaN and infinities', () => {
    expect(isFiniteNumber(NaN)).toBe(false);
    expect(isFiniteNumber(Infinity)).toBe(false);
    expect(isFiniteNumber(-Infinity)).toBe(false);
  });

  it('rejects non-numbers', () => {
    expect(isFiniteNumber('1')).toBe(false);
    expect(isFiniteNumber(null)).toBe(false);
    expect(isFiniteNumber(undefined)).toBe(false);
  });
});

// === Vector Operations ===

describe('vec3Zero', () => {
  it('returns a new zero vector each time', () => {
    const a = vec3Zero();
    const b = vec3Zero();
    expect(a).toEqual({ x: 0, y: 0, z: 0 });
    expect(a).not.toBe(b);
  });
});

describe('vec3Clone', () => {
  it('copies components into a new object', () => {
    const v = vec3(1, 2, 3);
    const c = vec3Clone(v);
    expect(c).toEqual(v);
    expect(c).not.toBe(v);
  });
});

describe('vec3Sub', () => {
  it('subtracts component-wise', () => {
    expect(vec3Sub(vec3(5, 7, 9), vec3(1, 2, 3))).toEqual({ x: 4, y: 5, z: 6 });
  });
});

describe('vec3Scale', () => {
  it('scales every component', () => {
    expect(vec3Scale(vec3(1, -2, 3), 2)).toEqual({ x: 2, y: -4, z: 6 });
  });
});

describe('vec3Length', () => {
  it('computes the euclidean length', () => {
    expect(vec3Length(vec3(3, 4, 0))).toBe(5);
    expect(vec3Length(vec3(2, 3, 6))).toBe(7);
  });

  it('is zero for the zero vector', () => {
    expect(vec3Length(vec3Zero())).toBe(0);
  });
});

describe('vec3Distance', () => {
  it('is symmetric', () => {
    const a = vec3(1, 1, 1);
    const b = vec3(4, 5, 1);
    expect(vec3Distance(a, b)).toBe(5);
    expect(vec3Distance(b, a)).toBe(5);
  });
});

describe('vec3Normalize', () => {
  it('returns a unit vector', () => {
    expect(vec3Normalize(vec3(0, 0, 5))).toEqual({ x: 0, y: 0, z: 1 });
    expect(vec3Length(vec3Normalize(vec3(1, 2, 3)))).toBeCloseTo(1, 10);
  });

  it('leaves the zero vector at zero', () => {
    expect(vec3Normalize(vec3Zero())).toEqual({ x: 0, y: 0, z: 0 });
  });
});

describe('vec3Equals', () => {
  it('compares all components exactly', () => {
    expect(vec3Equals(vec3(1, 2, 3), vec3(1, 2, 3))).toBe(true);
    expect(vec3Equals(vec3(1, 2, 3), vec3(1, 2, 3.0000001))).toBe(false);
  });
});

describe('isFiniteVec3', () => {
  it('rejects vectors with a non-finite component', () => {
    expect(isFiniteVec3(vec3(0, 1, 2))).toBe(true);
    expect(isFiniteVec3(vec3(0, NaN, 2))).toBe(false);
    expect(isFiniteVec3(vec3(Infinity, 0, 0))).toBe(false);
  });
});

// === In-place Operations ===

describe('vec3Set', () => {
  it('mutates and returns the target', () => {
    const v = vec3Zero();
    const out = vec3Set(v, 1, 2, 3);
    expect(out).toBe(v);
    expect(v).toEqual({ x: 1, y: 2, z: 3 });
  });
});

describe('vec3AddScaledInPlace', () => {
  it('adds a scaled vector to the target', () => {
    const v = vec3(1, 1, 1);
    vec3AddScaledInPlace(v, vec3(1, 0, -1), 2);
    expect(v).toEqual({ x: 3, y: 1, z: -1 });
  });
});
