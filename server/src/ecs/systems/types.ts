// ============================================
// ECS System Types
// ============================================

import type { World } from '@pong-arena/shared';
import type { EventBus } from '../../events/EventBus';

/**
 * Base System interface
 * All simulation systems implement this interface
 */
export interface System {
  /** Unique name, used for scheduling dependencies and logging */
  readonly name: string;

  /**
   * Called every tick
   * @param world The ECS World containing all entities and components
   * @param deltaTime Time since last tick in seconds
   * @param events Bus for notifying collaborators (display, logging)
   */
  update(world: World, deltaTime: number, events: EventBus): void;
}

/**
 * System names, used as nodes of the per-tick schedule graph.
 */
export const SystemName = {
  PADDLE: 'PaddleSystem',
  BALL_MOTION: 'BallMotionSystem',
  BOUNCE: 'BounceSystem',
  WINNER: 'WinnerSystem',
  SERVE: 'ServeSystem',
} as const;

/**
 * Per-tick schedule: each system runs after every system it lists.
 *
 * paddle ─┬─> bounce ─┬─> serve
 * ball  ──┴─> winner ─┘
 *
 * Bounce and winner do not depend on each other. Bounce's velocity
 * change is integrated by BallMotionSystem on the next tick.
 */
export const SystemDependencies: Record<string, readonly string[]> = {
  [SystemName.PADDLE]: [],
  [SystemName.BALL_MOTION]: [],
  [SystemName.BOUNCE]: [SystemName.PADDLE, SystemName.BALL_MOTION],
  [SystemName.WINNER]: [SystemName.PADDLE, SystemName.BALL_MOTION],
  [SystemName.SERVE]: [SystemName.BOUNCE, SystemName.WINNER],
};
