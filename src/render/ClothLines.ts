// Cloth line segments for three.js
// One 2-vertex segment per constraint, kept in lockstep with the constraint array.
// Torn constraints collapse to a zero-length segment so indices never shift.

import * as THREE from 'three';
import {
  type ClothSimulation,
  forEachSegment,
  subscribe,
} from '../simulation/ClothSimulation';

export type ClothLinesOptions = {
  color?: THREE.ColorRepresentation;
  opacity?: number;
};

export type ClothLines = {
  object: THREE.LineSegments<THREE.BufferGeometry, THREE.LineBasicMaterial>;
  sync: () => void;
  dispose: () => void;
};

function allocatePositions(geometry: THREE.BufferGeometry, segmentCount: number) {
  // 2 vertices × 3 components per segment
  const array = new Float32Array(segmentCount * 6);
  const attribute = new THREE.BufferAttribute(array, 3);
  attribute.setUsage(THREE.DynamicDrawUsage);
  geometry.setAttribute('position', attribute);
  return { array, attribute };
}

export function writeSegments(sim: ClothSimulation, positions: Float32Array): void {
  forEachSegment(sim, (index, enabled, a, b) => {
    const base = index * 6;
    const end = enabled ? b : a;

    positions[base + 0] = a.x;
    positions[base + 1] = a.y;
    positions[base + 2] = a.z;
    positions[base + 3] = end.x;
    positions[base + 4] = end.y;
    positions[base + 5] = end.z;
  });
}

// Build a LineSegments object and keep it synced after every tick and reset
export function createClothLines(
  sim: ClothSimulation,
  { color = 0xd8d8d8, opacity = 1 }: ClothLinesOptions = {}
): ClothLines {
  const geometry = new THREE.BufferGeometry();
  const material = new THREE.LineBasicMaterial({
    color,
    transparent: opacity < 1,
    opacity,
  });
  const object = new THREE.LineSegments(geometry, material);

  let positions = allocatePositions(geometry, sim.constraints.length);

  const sync = () => {
    // Topology changes only on reset; reallocate when the count moves
    if (positions.attribute.count !== sim.constraints.length * 2) {
      // Release the old GPU buffer; three re-uploads on the next render
      geometry.dispose();
      positions = allocatePositions(geometry, sim.constraints.length);
    }

    writeSegments(sim, positions.array);
    positions.attribute.needsUpdate = true;
    geometry.computeBoundingSphere();
  };

  const unsubscribe = subscribe(sim, sync);
  sync();

  return {
    object,
    sync,
    dispose: () => {
      unsubscribe();
      geometry.dispose();
      material.dispose();
    },
  };
}
