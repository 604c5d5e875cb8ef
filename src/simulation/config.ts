// Cloth configuration: defaults, merging and validation

import type { Vec3 } from '../types';
import {
  DEFAULT_ANCHOR,
  DEFAULT_GRAVITY,
  DEFAULT_HEIGHT,
  DEFAULT_ITERATIONS,
  DEFAULT_MASS,
  DEFAULT_MOUSE_DISTANCE,
  DEFAULT_MOUSE_INFLUENCE,
  DEFAULT_SPACING,
  DEFAULT_TEAR_DISTANCE,
  DEFAULT_TIMESTEP,
  DEFAULT_WIDTH,
} from '../constants';
import { isFiniteNumber, isFiniteVec3 } from '../utils/math';

export type ClothConfig = {
  // Grid (applied on build / reset)
  width: number;          // columns, integer >= 2
  height: number;         // rows, integer >= 2
  spacing: number;        // rest length between neighbours
  tearDistance: number;   // constraint length at which it tears
  anchor: Vec3;           // top-centre of the cloth

  // Physics
  mass: number;
  gravity: number;        // downward acceleration magnitude
  iterations: number;     // relaxation passes per tick
  timestep: number;       // fixed step used by advance()

  // Pointer
  mouseDistance: number;  // grab / cut radius
  mouseInfluence: number; // drag nudge length
};

export type ConfigIssue = {
  field: keyof ClothConfig;
  message: string;
};

export type ValidationResult = {
  ok: boolean;
  issues: ConfigIssue[];
};

export const DEFAULT_CONFIG: Readonly<ClothConfig> = Object.freeze({
  width: DEFAULT_WIDTH,
  height: DEFAULT_HEIGHT,
  spacing: DEFAULT_SPACING,
  tearDistance: DEFAULT_TEAR_DISTANCE,
  anchor: Object.freeze({ ...DEFAULT_ANCHOR }),
  mass: DEFAULT_MASS,
  gravity: DEFAULT_GRAVITY,
  iterations: DEFAULT_ITERATIONS,
  timestep: DEFAULT_TIMESTEP,
  mouseDistance: DEFAULT_MOUSE_DISTANCE,
  mouseInfluence: DEFAULT_MOUSE_INFLUENCE,
});

export const CONFIG_KEYS = [
  'width',
  'height',
  'spacing',
  'tearDistance',
  'anchor',
  'mass',
  'gravity',
  'iterations',
  'timestep',
  'mouseDistance',
  'mouseInfluence',
] as const satisfies readonly (keyof ClothConfig)[];

export class ClothConfigError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(
      `Invalid cloth configuration: ${issues
        .map((issue) => `${issue.field} ${issue.message}`)
        .join('; ')}`
    );
    this.name = 'ClothConfigError';
    this.issues = issues;
  }
}

const integerAtLeast = (value: number, min: number): boolean =>
  Number.isInteger(value) && value >= min;

const positive = (value: number): boolean => isFiniteNumber(value) && value > 0;

const nonNegative = (value: number): boolean =>
  isFiniteNumber(value) && value >= 0;

// Collect every problem rather than stopping at the first
export function validateConfig(config: Readonly<ClothConfig>): ValidationResult {
  const issues: ConfigIssue[] = [];
  const check = (ok: boolean, field: keyof ClothConfig, message: string) => {
    if (!ok) issues.push({ field, message });
  };

  check(integerAtLeast(config.width, 2), 'width', 'must be an integer >= 2');
  check(integerAtLeast(config.height, 2), 'height', 'must be an integer >= 2');
  check(positive(config.spacing), 'spacing', 'must be > 0');
  check(positive(config.tearDistance), 'tearDistance', 'must be > 0');
  check(
    typeof config.anchor === 'object' &&
      config.anchor !== null &&
      isFiniteVec3(config.anchor),
    'anchor',
    'must be a finite vector'
  );
  check(positive(config.mass), 'mass', 'must be > 0');
  check(nonNegative(config.gravity), 'gravity', 'must be >= 0');
  check(integerAtLeast(config.iterations, 1), 'iterations', 'must be an integer >= 1');
  check(positive(config.timestep), 'timestep', 'must be > 0');
  check(positive(config.mouseDistance), 'mouseDistance', 'must be > 0');
  check(nonNegative(config.mouseInfluence), 'mouseInfluence', 'must be >= 0');

  return { ok: issues.length === 0, issues };
}

// Keep only the keys that carry a value; an explicit undefined means "not set"
function definedOverrides(overrides: Partial<ClothConfig>): Partial<ClothConfig> {
  const defined: Partial<ClothConfig> = {};

  for (const key of CONFIG_KEYS) {
    if (key === 'anchor') {
      if (overrides.anchor !== undefined) defined.anchor = overrides.anchor;
    } else {
      const value = overrides[key];
      if (value !== undefined) defined[key] = value;
    }
  }

  return defined;
}

// Merge overrides onto a base config; throws ClothConfigError if the result is invalid
export function resolveConfig(
  overrides: Partial<ClothConfig> = {},
  base: Readonly<ClothConfig> = DEFAULT_CONFIG
): ClothConfig {
  const defined = definedOverrides(overrides);
  const merged: ClothConfig = {
    ...base,
    ...defined,
    anchor: { ...(defined.anchor ?? base.anchor) },
  };

  const result = validateConfig(merged);
  if (!result.ok) {
    throw new ClothConfigError(result.issues);
  }

  return merged;
}
