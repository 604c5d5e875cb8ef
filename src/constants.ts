// Shared constants for the cloth simulation

// === Grid ===

/** Columns of particles */
export const DEFAULT_WIDTH = 56;

/** Rows of particles (row 0 is pinned) */
export const DEFAULT_HEIGHT = 32;

/** Rest length of every constraint */
export const DEFAULT_SPACING = 0.2;

/** Horizontal centre and top edge of the cloth */
export const DEFAULT_ANCHOR = { x: 0, y: 5, z: 0 } as const;

// === Physics ===

export const DEFAULT_MASS = 1;

/** Downward acceleration magnitude (m/s²) */
export const DEFAULT_GRAVITY = 9.807;

/** Constraint length beyond which it tears */
export const DEFAULT_TEAR_DISTANCE = 1;

/** Relaxation passes per tick */
export const DEFAULT_ITERATIONS = 5;

/** Fixed simulation step in seconds */
export const DEFAULT_TIMESTEP = 1 / 60;

/** Ticks allowed per advance() call before the backlog is dropped */
export const MAX_STEPS_PER_FRAME = 8;

// === Pointer ===

/** Pointer must be closer than this to grab or cut a particle */
export const DEFAULT_MOUSE_DISTANCE = 0.15;

/** Length of the nudge applied per drag tick */
export const DEFAULT_MOUSE_INFLUENCE = 0.7;

// === Persistence ===

export const CONFIG_STORAGE_KEY = 'tearable-cloth-config';
