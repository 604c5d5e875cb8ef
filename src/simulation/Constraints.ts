// Distance constraints and the Gauss-Seidel relaxation solver
// Constraints reference particles by index into the particle array

import type { ClothParticle } from './ClothParticle';

// Distance constraint between two particles
export type ClothConstraint = {
  indexA: number;
  indexB: number;
  restLength: number;
  maxLength: number; // tears once stretched past this
  enabled: boolean;  // only ever goes true -> false until the grid is rebuilt
};

export function createConstraint(
  indexA: number,
  indexB: number,
  restLength: number,
  maxLength: number
): ClothConstraint {
  return { indexA, indexB, restLength, maxLength, enabled: true };
}

// Solve a single distance constraint.
// Returns true when this call tore the constraint.
export function solveConstraint(
  particles: ClothParticle[],
  constraint: ClothConstraint
): boolean {
  if (!constraint.enabled) return false;

  const a = particles[constraint.indexA];
  const b = particles[constraint.indexB];
  if (!a || !b) return false;

  // Vector from b to a
  const dx = a.position.x - b.position.x;
  const dy = a.position.y - b.position.y;
  const dz = a.position.z - b.position.z;

  const dist = Math.sqrt(dx * dx + dy * dy + dz * dz);

  // Torn constraints still get this pass's correction
  let torn = false;
  if (dist > constraint.maxLength) {
    constraint.enabled = false;
    torn = true;
  }

  // Coincident endpoints have no direction to correct along
  if (dist === 0) return torn;

  const difference = (constraint.restLength - dist) / dist;
  const scale = difference * 0.5;

  if (!a.pinned) {
    a.position.x += dx * scale;
    a.position.y += dy * scale;
    a.position.z += dz * scale;
  }

  if (!b.pinned) {
    b.position.x -= dx * scale;
    b.position.y -= dy * scale;
    b.position.z -= dz * scale;
  }

  return torn;
}

// Run `iterations` passes over all enabled constraints in array order.
// Returns the number of constraints torn.
export function relaxConstraints(
  particles: ClothParticle[],
  constraints: ClothConstraint[],
  iterations: number
): number {
  let torn = 0;

  for (let iter = 0; iter < iterations; iter++) {
    for (const constraint of constraints) {
      if (solveConstraint(particles, constraint)) torn++;
    }
  }

  return torn;
}

// Disable every constraint touching the particle at index.
// Returns how many were enabled before the call.
export function disableConstraintsAt(
  constraints: ClothConstraint[],
  index: number
): number {
  let disabled = 0;

  for (const constraint of constraints) {
    if (constraint.indexA !== index && constraint.indexB !== index) continue;
    if (constraint.enabled) disabled++;
    constraint.enabled = false;
  }

  return disabled;
}

export function countEnabled(constraints: ClothConstraint[]): number {
  let count = 0;
  for (const constraint of constraints) {
    if (constraint.enabled) count++;
  }
  return count;
}
