// Shared types for the cloth simulation

// === Vector Types ===

export type Vec3 = {
  x: number;
  y: number;
  z: number;
};

// === Input Types ===

// Pointer state in world space, supplied once per tick by the host
export type PointerInput = {
  position: Vec3;
  primary: boolean;   // drag
  secondary: boolean; // cut
};

export type PointerResult = {
  dragged: number; // particle index nudged this tick, -1 if none
  cut: number;     // constraints disabled by the cut this tick
};

// === Render Types ===

// One render primitive per constraint, same index as the constraint
export type Segment = {
  enabled: boolean;
  a: Vec3;
  b: Vec3;
};

// === Sync Events ===

export type SyncEvent =
  | { type: 'tick'; generation: number; torn: number }
  | { type: 'reset'; generation: number };
