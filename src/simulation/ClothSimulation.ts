// Cloth simulation session
// Verlet integration + pointer interaction + constraint relaxation per fixed tick

import type { PointerInput, Segment, SyncEvent, Vec3 } from '../types';
import { MAX_STEPS_PER_FRAME } from '../constants';
import { type ClothParticle, getDisplacement, integrateAll } from './ClothParticle';
import { type ClothConstraint, countEnabled, relaxConstraints } from './Constraints';
import { buildClothGrid } from './ClothGrid';
import { type PointerTracker, createPointerTracker, handlePointer } from './Pointer';
import { type ClothConfig, resolveConfig } from './config';
import { vec3Clone, vec3Length } from '../utils/math';

export type SyncListener = (sim: ClothSimulation, event: SyncEvent) => void;

// Main simulation state
export type ClothSimulation = {
  config: ClothConfig;
  particles: ClothParticle[];
  constraints: ClothConstraint[];
  generation: number;   // bumped on every rebuild
  tickCount: number;    // ticks since the last rebuild
  accumulator: number;  // unconsumed seconds for advance()
  pointer: PointerTracker;
  listeners: Set<SyncListener>;
};

function notify(sim: ClothSimulation, event: SyncEvent): void {
  for (const listener of sim.listeners) {
    listener(sim, event);
  }
}

// Create a new simulation; throws ClothConfigError on invalid overrides
export function createSimulation(
  overrides: Partial<ClothConfig> = {}
): ClothSimulation {
  const config = resolveConfig(overrides);
  const { particles, constraints } = buildClothGrid(config);

  return {
    config,
    particles,
    constraints,
    generation: 0,
    tickCount: 0,
    accumulator: 0,
    pointer: createPointerTracker(),
    listeners: new Set(),
  };
}

// Discard all particle and constraint state and rebuild the grid.
// Overrides are validated before anything is touched.
export function reset(
  sim: ClothSimulation,
  overrides: Partial<ClothConfig> = {}
): void {
  const config = resolveConfig(overrides, sim.config);
  const { particles, constraints } = buildClothGrid(config);

  sim.config = config;
  sim.particles = particles;
  sim.constraints = constraints;
  sim.generation++;
  sim.tickCount = 0;
  sim.accumulator = 0;
  sim.pointer = createPointerTracker();

  notify(sim, { type: 'reset', generation: sim.generation });
}

// Advance one fixed step
export function tick(
  sim: ClothSimulation,
  dt: number,
  pointer?: PointerInput
): void {
  if (!Number.isFinite(dt) || dt <= 0) {
    console.warn(`[ClothSimulation] Skipping tick with invalid dt: ${dt}`);
    return;
  }

  const { particles, constraints, config } = sim;

  // 1. Integrate (Verlet)
  integrateAll(particles, dt);

  // 2. Pointer drag / cut
  if (pointer) {
    handlePointer(sim, pointer);
  }

  // 3. Relax constraints, tearing overstretched ones
  const torn = relaxConstraints(particles, constraints, config.iterations);

  sim.tickCount++;
  notify(sim, { type: 'tick', generation: sim.generation, torn });
}

// Feed wall-clock frame time through a fixed-timestep accumulator.
// Returns the number of ticks run.
export function advance(
  sim: ClothSimulation,
  frameSeconds: number,
  pointer?: PointerInput
): number {
  if (Number.isFinite(frameSeconds) && frameSeconds > 0) {
    sim.accumulator += frameSeconds;
  }

  const step = sim.config.timestep;
  let steps = 0;

  while (sim.accumulator >= step) {
    if (steps === MAX_STEPS_PER_FRAME) {
      // Cap to prevent spiral
      console.warn(
        `[ClothSimulation] Dropping ${sim.accumulator.toFixed(3)}s of backlog after ${steps} steps`
      );
      sim.accumulator = 0;
      break;
    }

    tick(sim, step, pointer);
    // A listener may have reset the session mid-loop
    sim.accumulator = Math.max(0, sim.accumulator - step);
    steps++;
  }

  return steps;
}

// Update simulation config.
// Grid-shape fields are stored and used by the next reset.
export function updateConfig(
  sim: ClothSimulation,
  updates: Partial<ClothConfig>
): void {
  const config = resolveConfig(updates, sim.config);
  sim.config = config;

  // Update particle properties that derive from config
  if (updates.mass !== undefined || updates.gravity !== undefined) {
    for (const particle of sim.particles) {
      particle.mass = config.mass;
      particle.gravity = config.gravity;
    }
  }
}

export function subscribe(
  sim: ClothSimulation,
  listener: SyncListener
): () => void {
  sim.listeners.add(listener);
  return () => {
    sim.listeners.delete(listener);
  };
}

// === Render Read-out ===

// Segment for the constraint at index, or null when out of range
export function getSegment(sim: ClothSimulation, index: number): Segment | null {
  const constraint = sim.constraints[index];
  if (!constraint) return null;

  return {
    enabled: constraint.enabled,
    a: vec3Clone(sim.particles[constraint.indexA].position),
    b: vec3Clone(sim.particles[constraint.indexB].position),
  };
}

// Visit every constraint in render order without copying positions
export function forEachSegment(
  sim: ClothSimulation,
  visit: (
    index: number,
    enabled: boolean,
    a: Readonly<Vec3>,
    b: Readonly<Vec3>
  ) => void
): void {
  const { particles, constraints } = sim;

  for (let i = 0; i < constraints.length; i++) {
    const c = constraints[i];
    visit(i, c.enabled, particles[c.indexA].position, particles[c.indexB].position);
  }
}

// Get particle positions as Float32Array for GPU upload
export function getPositions(sim: ClothSimulation): Float32Array {
  const data = new Float32Array(sim.particles.length * 3);

  for (let i = 0; i < sim.particles.length; i++) {
    const p = sim.particles[i].position;
    data[i * 3] = p.x;
    data[i * 3 + 1] = p.y;
    data[i * 3 + 2] = p.z;
  }

  return data;
}

// Get simulation stats for debugging
export function getStats(sim: ClothSimulation): {
  particleCount: number;
  constraintCount: number;
  tornCount: number;
  pinnedCount: number;
  avgSpeed: number;
} {
  let totalSpeed = 0;
  let pinnedCount = 0;

  for (const p of sim.particles) {
    totalSpeed += vec3Length(getDisplacement(p));
    if (p.pinned) pinnedCount++;
  }

  return {
    particleCount: sim.particles.length,
    constraintCount: sim.constraints.length,
    tornCount: sim.constraints.length - countEnabled(sim.constraints),
    pinnedCount,
    avgSpeed: sim.particles.length > 0 ? totalSpeed / sim.particles.length : 0,
  };
}
