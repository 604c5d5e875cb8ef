// Pointer interaction: drag nudges and constraint cuts
// The host converts screen input to world space before calling in

import type { PointerInput, PointerResult, Vec3 } from '../types';
import type { ClothParticle } from './ClothParticle';
import { type ClothConstraint, disableConstraintsAt } from './Constraints';
import {
  vec3AddScaledInPlace,
  vec3Clone,
  vec3Distance,
  vec3Equals,
  vec3Normalize,
  vec3Sub,
} from '../utils/math';

// Pointer position the drag logic compares against; null before any input
export type PointerTracker = {
  previous: Vec3 | null;
};

type PointerTarget = {
  particles: ClothParticle[];
  constraints: ClothConstraint[];
  pointer: PointerTracker;
  config: { mouseDistance: number; mouseInfluence: number };
};

export const createPointerTracker = (): PointerTracker => ({ previous: null });

// Linear scan; ties go to the earliest index. -1 when there are no particles.
export function findNearestParticle(
  particles: ClothParticle[],
  point: Vec3
): { index: number; distance: number } {
  let index = -1;
  let distance = Infinity;

  for (let i = 0; i < particles.length; i++) {
    const d = vec3Distance(particles[i].position, point);
    if (d < distance) {
      distance = d;
      index = i;
    }
  }

  return { index, distance };
}

// Nudge the nearest particle along the pointer's motion.
// Returns the nudged index or -1.
export function dragParticle(target: PointerTarget, current: Vec3): number {
  const previous = target.pointer.previous;
  if (!previous || vec3Equals(previous, current)) return -1;

  const { index, distance } = findNearestParticle(target.particles, current);
  if (index < 0) return -1;

  const particle = target.particles[index];
  if (particle.pinned) return -1;
  if (distance >= target.config.mouseDistance) return -1;

  const direction = vec3Normalize(vec3Sub(current, previous));
  vec3AddScaledInPlace(particle.position, direction, target.config.mouseInfluence);
  target.pointer.previous = vec3Clone(current);

  return index;
}

// Detach the nearest particle from all its neighbours.
// Returns the number of constraints newly disabled.
export function cutParticle(target: PointerTarget, current: Vec3): number {
  const { index, distance } = findNearestParticle(target.particles, current);
  if (index < 0 || distance >= target.config.mouseDistance) return 0;

  return disableConstraintsAt(target.constraints, index);
}

export function handlePointer(
  target: PointerTarget,
  input: PointerInput
): PointerResult {
  const current = input.position;
  let dragged = -1;

  if (target.pointer.previous === null) {
    // First sighting: nothing to measure motion against yet
    target.pointer.previous = vec3Clone(current);
  } else if (input.primary) {
    dragged = dragParticle(target, current);
  } else {
    target.pointer.previous = vec3Clone(current);
  }

  const cut = input.secondary ? cutParticle(target, current) : 0;

  return { dragged, cut };
}
