// ============================================
// Input Bindings
// Key -> axis mapping, loaded from JSON
// ============================================

import { readFileSync } from 'fs';
import type { InputState } from './InputState';

/**
 * One axis: `pos` drives it to +1, `neg` to -1.
 */
export interface AxisBinding {
  pos: string;
  neg: string;
}

export interface InputBindings {
  axes: Map<string, AxisBinding>;
}

function isAxisBinding(value: unknown): value is AxisBinding {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pos' in value &&
    'neg' in value &&
    typeof value.pos === 'string' &&
    value.pos.length > 0 &&
    typeof value.neg === 'string' &&
    value.neg.length > 0
  );
}

/**
 * Validate parsed bindings JSON: { "axes": { action: { "pos", "neg" } } }
 */
export function parseBindings(raw: unknown, source = 'bindings'): InputBindings {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`${source}: expected an object`);
  }

  const axesRaw = 'axes' in raw ? raw.axes : undefined;
  if (typeof axesRaw !== 'object' || axesRaw === null || Array.isArray(axesRaw)) {
    throw new Error(`${source}: "axes" must be an object`);
  }

  const axes = new Map<string, AxisBinding>();
  for (const [action, binding] of Object.entries(axesRaw)) {
    if (!isAxisBinding(binding)) {
      throw new Error(`${source}: axis "${action}" needs non-empty "pos" and "neg" keys`);
    }
    axes.set(action, { pos: binding.pos, neg: binding.neg });
  }

  return { axes };
}

/**
 * Read and validate a bindings file. Throws on I/O or shape errors.
 */
export function loadBindings(path: string): InputBindings {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new Error(`Failed to read bindings ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseBindings(raw, path);
}

/**
 * Axis value for every bound action at `now`.
 * Both keys held cancel out to 0.
 */
export function readAxes(state: InputState, bindings: InputBindings, now: number): Map<string, number> {
  const values = new Map<string, number>();
  for (const [action, { pos, neg }] of bindings.axes) {
    const value = (state.isKeyDown(pos, now) ? 1 : 0) - (state.isKeyDown(neg, now) ? 1 : 0);
    values.set(action, value);
  }
  return values;
}
