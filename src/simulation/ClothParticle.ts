// Cloth particle representation
// Störmer-Verlet integration: next position comes from current and previous

import type { Vec3 } from '../types';
import { vec3Clone, vec3Set, vec3Zero } from '../utils/math';

// Single point mass
export type ClothParticle = {
  // Current position
  position: Vec3;
  // Previous position (for Verlet integration)
  previousPosition: Vec3;
  // Last computed velocity, diagnostic only
  velocity: Vec3;
  // Acceleration from the last integration step
  acceleration: Vec3;
  // Accumulated forces this tick
  force: Vec3;
  mass: number;
  // Downward acceleration magnitude for this particle
  gravity: number;
  // Pinned particles are never moved by integration, relaxation or drag
  pinned: boolean;
};

// Create a particle at rest at position
export function createParticle(
  position: Vec3,
  options: Partial<{
    mass: number;
    gravity: number;
    pinned: boolean;
  }> = {}
): ClothParticle {
  return {
    position: vec3Clone(position),
    previousPosition: vec3Clone(position),
    velocity: vec3Zero(),
    acceleration: vec3Zero(),
    force: vec3Zero(),
    mass: options.mass ?? 1,
    gravity: options.gravity ?? 0,
    pinned: options.pinned ?? false,
  };
}

// Accumulate an external force for the next integration step
export function applyForce(particle: ClothParticle, force: Vec3): void {
  if (particle.pinned) return;

  particle.force.x += force.x;
  particle.force.y += force.y;
  particle.force.z += force.z;
}

// Verlet integration step
export function integrate(particle: ClothParticle, dt: number): void {
  if (particle.pinned) return;

  const { position, previousPosition, force, acceleration, velocity } = particle;

  // Gravity acts along -up, scaled by mass
  force.y += -particle.gravity * particle.mass;

  const invMass = 1 / particle.mass;
  vec3Set(acceleration, force.x * invMass, force.y * invMass, force.z * invMass);

  // Not fed back into the position update
  vec3Set(
    velocity,
    (position.x - previousPosition.x) * dt,
    (position.y - previousPosition.y) * dt,
    (position.z - previousPosition.z) * dt
  );

  // x' = 2x - x_prev + a*dt²
  const dtSq = dt * dt;
  const nx = position.x * 2 - previousPosition.x + acceleration.x * dtSq;
  const ny = position.y * 2 - previousPosition.y + acceleration.y * dtSq;
  const nz = position.z * 2 - previousPosition.z + acceleration.z * dtSq;

  vec3Set(previousPosition, position.x, position.y, position.z);
  vec3Set(position, nx, ny, nz);

  vec3Set(force, 0, 0, 0);
}

export function integrateAll(particles: ClothParticle[], dt: number): void {
  for (const particle of particles) {
    integrate(particle, dt);
  }
}

// Implicit per-step displacement from position history
export function getDisplacement(particle: ClothParticle): Vec3 {
  return {
    x: particle.position.x - particle.previousPosition.x,
    y: particle.position.y - particle.previousPosition.y,
    z: particle.position.z - particle.previousPosition.z,
  };
}

