// Cloth simulation module
// Verlet integration + distance constraints with tearing

export * from './ClothParticle';
export * from './Constraints';
export * from './ClothGrid';
export * from './Pointer';
export * from './config';
export * from './ClothSimulation';
