// ============================================
// Ball Motion System
// Integrates ball velocity into its transform
// ============================================

import type { World } from '@pong-arena/shared';
import { SystemName, type System } from './types';
import { getLiveBall } from '../factories';

/**
 * BallMotionSystem - position += velocity * dt
 *
 * No bounds handling here: walls and paddles belong to BounceSystem,
 * leaving the arena belongs to WinnerSystem.
 */
export class BallMotionSystem implements System {
  readonly name = SystemName.BALL_MOTION;

  update(world: World, deltaTime: number): void {
    const live = getLiveBall(world);
    if (!live) return;

    live.transform.x += live.ball.velocity.x * deltaTime;
    live.transform.y += live.ball.velocity.y * deltaTime;
  }
}
