// ============================================
// Shared Types
// Game enums and plain value types
// ============================================

// 2D vector in arena units
export interface Vec2 {
  x: number;
  y: number;
}

// Which half of the arena a paddle defends
export type Side = 'left' | 'right';

export const SIDES: readonly Side[] = ['left', 'right'];

/**
 * The side facing the given one across the arena.
 */
export function opposite(side: Side): Side {
  return side === 'left' ? 'right' : 'left';
}

/**
 * Input action name that drives a side's paddle.
 */
export function paddleAction(side: Side): string {
  return side === 'left' ? 'left_paddle' : 'right_paddle';
}
