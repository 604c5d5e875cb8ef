// Persist cloth config overrides in a key-value store (localStorage by default)
// Only known keys are kept; anything invalid falls back to defaults

import { CONFIG_STORAGE_KEY } from '../constants';
import {
  CONFIG_KEYS,
  type ClothConfig,
  DEFAULT_CONFIG,
  validateConfig,
} from '../simulation/config';

export type KeyValueStorage = {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
};

// Reading localStorage itself throws when storage is disabled
function defaultStorage(): KeyValueStorage | null {
  try {
    return typeof globalThis.localStorage === 'undefined' ? null : globalThis.localStorage;
  } catch (error) {
    console.warn('[persistedConfig] localStorage is unavailable', error);
    return null;
  }
}

const cloneDefaults = (): ClothConfig => ({
  ...DEFAULT_CONFIG,
  anchor: { ...DEFAULT_CONFIG.anchor },
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Keep only recognised keys with the right primitive shape
function pickOverrides(raw: Record<string, unknown>): Partial<ClothConfig> {
  const overrides: Partial<ClothConfig> = {};

  for (const key of CONFIG_KEYS) {
    const value = raw[key];
    if (key === 'anchor') {
      if (
        isRecord(value) &&
        typeof value.x === 'number' &&
        typeof value.y === 'number' &&
        typeof value.z === 'number'
      ) {
        overrides.anchor = { x: value.x, y: value.y, z: value.z };
      }
    } else if (typeof value === 'number') {
      overrides[key] = value;
    }
  }

  return overrides;
}

function readOverrides(storage: KeyValueStorage): Partial<ClothConfig> | null {
  let raw: string | null;
  try {
    raw = storage.getItem(CONFIG_STORAGE_KEY);
  } catch (error) {
    console.warn('[persistedConfig] Failed to read stored config, ignoring', error);
    return null;
  }
  if (!raw) return null;

  try {
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) {
      console.warn('[persistedConfig] Stored config is not an object, ignoring');
      return null;
    }
    return pickOverrides(parsed);
  } catch (error) {
    console.warn('[persistedConfig] Stored config is not valid JSON, ignoring', error);
    return null;
  }
}

export function loadConfig(
  storage: KeyValueStorage | null = defaultStorage()
): ClothConfig {
  if (!storage) return cloneDefaults();

  const overrides = readOverrides(storage);
  if (!overrides) return cloneDefaults();

  // Merge with defaults so new keys get default values
  const merged: ClothConfig = {
    ...cloneDefaults(),
    ...overrides,
  };

  const result = validateConfig(merged);
  if (!result.ok) {
    console.warn(
      '[persistedConfig] Stored config is invalid, using defaults:',
      result.issues.map((issue) => `${issue.field} ${issue.message}`).join('; ')
    );
    return cloneDefaults();
  }

  return merged;
}

export function saveConfig(
  overrides: Partial<ClothConfig>,
  storage: KeyValueStorage | null = defaultStorage()
): void {
  if (!storage) return;

  try {
    const existing = readOverrides(storage) ?? {};
    const merged = { ...existing, ...pickOverrides(overrides) };
    storage.setItem(CONFIG_STORAGE_KEY, JSON.stringify(merged));
  } catch (error) {
    // Storage may be unavailable (private browsing, quota exceeded)
    console.error('[persistedConfig] Failed to save config', error);
  }
}

export function clearConfig(
  storage: KeyValueStorage | null = defaultStorage()
): void {
  if (!storage) return;

  try {
    storage.removeItem(CONFIG_STORAGE_KEY);
  } catch (error) {
    console.error('[persistedConfig] Failed to clear config', error);
  }
}
