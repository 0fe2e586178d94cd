// ============================================
// Shared Math Helpers
// Pure geometry used by the simulation systems
// ============================================

import type { Vec2 } from './types';

/**
 * Clamp value into [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Axis-aligned rectangle given by its center and half extents.
 */
export interface Rect {
  center: Vec2;
  halfWidth: number;
  halfHeight: number;
}

/**
 * Circle given by center and radius.
 */
export interface Circle {
  center: Vec2;
  radius: number;
}

/**
 * Point of the rectangle closest to `point` (the point itself when inside).
 */
export function closestPointOnRect(rect: Rect, point: Vec2): Vec2 {
  return {
    x: clamp(point.x, rect.center.x - rect.halfWidth, rect.center.x + rect.halfWidth),
    y: clamp(point.y, rect.center.y - rect.halfHeight, rect.center.y + rect.halfHeight),
  };
}

/**
 * Rectangle vs circle overlap by closest-point clamping.
 * Touching (distance == radius) counts as overlap.
 */
export function rectIntersectsCircle(rect: Rect, circle: Circle): boolean {
  const closest = closestPointOnRect(rect, circle.center);
  const dx = circle.center.x - closest.x;
  const dy = circle.center.y - closest.y;
  return dx * dx + dy * dy <= circle.radius * circle.radius;
}
