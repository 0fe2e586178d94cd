// ============================================
// Config Access
// GAME_CONFIG with startup-only overrides
// ============================================

import {
  GAME_CONFIG,
  OVERRIDABLE_CONFIGS,
  type GameConfigKey,
  type OverridableConfigKey,
} from '@pong-arena/shared';
import { logger } from './logger';

// Overrides applied on top of GAME_CONFIG
const configOverrides = new Map<GameConfigKey, number>();

// Once locked (before the first tick) constants are fixed for the process
let locked = false;

/**
 * Get a config value, checking overrides first
 */
export function getConfig<K extends GameConfigKey>(key: K): number {
  return configOverrides.get(key) ?? GAME_CONFIG[key];
}

function isOverridableKey(key: string): key is OverridableConfigKey {
  return OVERRIDABLE_CONFIGS.some((k) => k === key);
}

/**
 * Override a constant. Only allowed before lockConfig().
 */
export function setConfigOverride(key: OverridableConfigKey, value: number): void {
  if (locked) {
    throw new Error(`Config is locked; cannot override ${key} after the simulation started`);
  }
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Config override ${key} must be a positive number, got ${value}`);
  }
  configOverrides.set(key, value);
}

/**
 * Parse a JSON object of overrides (PONG_CONFIG_OVERRIDES) and apply it.
 * Unknown keys and non-numeric values throw.
 */
export function applyConfigOverrides(json: string): void {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new Error(`Config overrides are not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Config overrides must be a JSON object');
  }

  for (const [key, value] of Object.entries(parsed)) {
    if (!isOverridableKey(key)) {
      throw new Error(`Unknown or fixed config key: ${key}`);
    }
    if (typeof value !== 'number') {
      throw new Error(`Config override ${key} must be a number`);
    }
    setConfigOverride(key, value);
    logger.info({ event: 'config_override', key, value }, `Config override ${key}=${value}`);
  }
}

/**
 * Freeze config for the rest of the process.
 */
export function lockConfig(): void {
  locked = true;
}

export function isConfigLocked(): boolean {
  return locked;
}

/**
 * Drop overrides and unlock (tests only).
 */
export function resetConfig(): void {
  configOverrides.clear();
  locked = false;
}
