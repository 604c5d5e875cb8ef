// Core math utilities for the cloth simulation

import type { Vec3 } from '../types';

// === Scalar Operations ===

export const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

// === Vector Operations ===

export const vec3 = (x: number, y: number, z: number): Vec3 => ({ x, y, z });

export const vec3Zero = (): Vec3 => ({ x: 0, y: 0, z: 0 });

export const vec3Clone = (v: Vec3): Vec3 => ({ x: v.x, y: v.y, z: v.z });

export const vec3Sub = (a: Vec3, b: Vec3): Vec3 => ({
  x: a.x - b.x,
  y: a.y - b.y,
  z: a.z - b.z,
});

export const vec3Scale = (v: Vec3, s: number): Vec3 => ({
  x: v.x * s,
  y: v.y * s,
  z: v.z * s,
});

export const vec3Length = (v: Vec3): number =>
  Math.sqrt(v.x * v.x + v.y * v.y + v.z * v.z);

export const vec3Distance = (a: Vec3, b: Vec3): number =>
  vec3Length(vec3Sub(a, b));

// Zero vector stays zero
export const vec3Normalize = (v: Vec3): Vec3 => {
  const len = vec3Length(v) || 1;
  return vec3Scale(v, 1 / len);
};

export const vec3Equals = (a: Vec3, b: Vec3): boolean =>
  a.x === b.x && a.y === b.y && a.z === b.z;

export const isFiniteVec3 = (v: Vec3): boolean =>
  Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);

// === In-place Operations ===
// Used on hot paths to avoid allocating per particle per pass

export const vec3Set = (out: Vec3, x: number, y: number, z: number): Vec3 => {
  out.x = x;
  out.y = y;
  out.z = z;
  return out;
};

export const vec3AddScaledInPlace = (out: Vec3, v: Vec3, s: number): Vec3 => {
  out.x += v.x * s;
  out.y += v.y * s;
  out.z += v.z * s;
  return out;
};
