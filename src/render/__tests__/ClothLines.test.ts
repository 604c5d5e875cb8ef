import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { createClothLines, writeSegments } from '../ClothLines';
import { createSimulation, reset, tick } from '../../simulation/ClothSimulation';

const small = {
  width: 4,
  height: 3,
  spacing: 1,
  gravity: 0,
  anchor: { x: 0, y: 5, z: 0 },
};

const vertex = (geometry: THREE.BufferGeometry, i: number) => {
  const attr = geometry.getAttribute('position');
  return [attr.getX(i), attr.getY(i), attr.getZ(i)];
};

describe('writeSegments', () => {
  it('writes both endpoints of each enabled constraint', () => {
    const sim = createSimulation(small);
    const positions = new Float32Array(sim.constraints.length * 6);

    writeSegments(sim, positions);

    // Constraint 0 links particle 1 (0, 5) to particle 0 (-1, 5)
    expect(Array.from(positions.slice(0, 6))).toEqual([0, 5, 0, -1, 5, 0]);
    // Constraint 3 links particle 4 (-1, 4) to particle 0 (-1, 5)
    expect(Array.from(positions.slice(18, 24))).toEqual([-1, 4, 0, -1, 5, 0]);
  });

  it('collapses torn constraints onto their first endpoint', () => {
    const sim = createSimulation(small);
    sim.constraints[3].enabled = false;
    const positions = new Float32Array(sim.constraints.length * 6);

    writeSegments(sim, positions);

    expect(Array.from(positions.slice(18, 24))).toEqual([-1, 4, 0, -1, 4, 0]);
  });
});

describe('createClothLines', () => {
  it('allocates two vertices per constraint', () => {
    const sim = createSimulation(small);
    const lines = createClothLines(sim);

    expect(lines.object).toBeInstanceOf(THREE.LineSegments);
    expect(lines.object.geometry.getAttribute('position').count).toBe(34);
    expect(vertex(lines.object.geometry, 1)).toEqual([-1, 5, 0]);
  });

  it('follows the simulation after each tick', () => {
    const sim = createSimulation(small);
    const lines = createClothLines(sim);

    tick(sim, 1 / 60, { position: { x: 0, y: 4, z: 0 }, primary: false, secondary: true });

    // Constraint 4 links particle 5 to particle 4 and was cut
    expect(vertex(lines.object.geometry, 8)).toEqual([0, 4, 0]);
    expect(vertex(lines.object.geometry, 9)).toEqual([0, 4, 0]);
  });

  it('reallocates when a reset changes the constraint count', () => {
    const sim = createSimulation(small);
    const lines = createClothLines(sim);

    reset(sim, { width: 2, height: 2 });

    expect(lines.object.geometry.getAttribute('position').count).toBe(8);
  });

  it('releases the old buffers only when it reallocates', () => {
    const sim = createSimulation(small);
    const lines = createClothLines(sim);
    let disposed = 0;
    lines.object.geometry.addEventListener('dispose', () => {
      disposed++;
    });

    reset(sim);
    expect(disposed).toBe(0);

    reset(sim, { width: 2, height: 2 });
    expect(disposed).toBe(1);
  });

  it('stops syncing once disposed', () => {
    const sim = createSimulation(small);
    const lines = createClothLines(sim);

    lines.dispose();

    expect(sim.listeners.size).toBe(0);
  });

  it('makes the material transparent only below full opacity', () => {
    const sim = createSimulation(small);

    expect(createClothLines(sim).object.material.transparent).toBe(false);
    expect(createClothLines(sim, { opacity: 0.4 }).object.material.transparent).toBe(true);
  });
});
