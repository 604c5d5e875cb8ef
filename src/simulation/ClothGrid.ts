// Rectangular cloth mesh builder
// Row 0 is pinned; each particle links to its left and upper neighbours

import { type ClothParticle, createParticle } from './ClothParticle';
import { type ClothConstraint, createConstraint } from './Constraints';
import type { ClothConfig } from './config';

export type ClothGrid = {
  particles: ClothParticle[];
  constraints: ClothConstraint[];
};

type GridConfig = Pick<
  ClothConfig,
  'width' | 'height' | 'spacing' | 'mass' | 'gravity' | 'tearDistance' | 'anchor'
>;

// Flat index of the particle at column x, row y
export const gridIndex = (x: number, y: number, width: number): number =>
  x + y * width;

// Horizontal offset of column 0 relative to the anchor
export const gridStartX = (width: number, spacing: number): number =>
  (-(width - 1) / 2) * spacing + spacing / 2;

// Build fresh particle and constraint arrays; nothing is shared between calls
export function buildClothGrid(config: GridConfig): ClothGrid {
  const { width, height, spacing, mass, gravity, tearDistance, anchor } = config;

  const startX = anchor.x + gridStartX(width, spacing);
  const startY = anchor.y;

  const particles: ClothParticle[] = [];
  const constraints: ClothConstraint[] = [];

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const index = particles.length;

      particles.push(
        createParticle(
          { x: startX + x * spacing, y: startY - y * spacing, z: anchor.z },
          { mass, gravity, pinned: y === 0 }
        )
      );

      if (x > 0) {
        constraints.push(
          createConstraint(index, gridIndex(x - 1, y, width), spacing, tearDistance)
        );
      }
      if (y > 0) {
        constraints.push(
          createConstraint(index, gridIndex(x, y - 1, width), spacing, tearDistance)
        );
      }
    }
  }

  return { particles, constraints };
}

// Constraint count for a width × height grid
export const gridConstraintCount = (width: number, height: number): number =>
  (width - 1) * height + width * (height - 1);
