// ============================================
// Paddle System
// Moves paddles from input axes, clamped to the arena
// ============================================

import { Components, Resources, Tags, clamp, paddleAction, type World } from '@pong-arena/shared';
import type { InputAxesResource, PaddleComponent, TransformComponent } from '@pong-arena/shared';
import { SystemName, type System } from './types';
import { getConfig } from '../../config';

/**
 * PaddleSystem - per-side vertical paddle control
 *
 * Reads the axis for each paddle's action (1.0 = toward the top,
 * missing = 0), moves by axis * dt * PADDLE_SPEED and keeps the whole
 * paddle inside [0, ARENA_HEIGHT]. x is never touched.
 */
export class PaddleSystem implements System {
  readonly name = SystemName.PADDLE;

  update(world: World, deltaTime: number): void {
    const axes = world.getResource<InputAxesResource>(Resources.InputAxes);
    const speed = getConfig('PADDLE_SPEED');
    const arenaHeight = getConfig('ARENA_HEIGHT');

    world.forEachWithTag(Tags.Paddle, (entity) => {
      const paddle = world.getComponent<PaddleComponent>(entity, Components.Paddle);
      const transform = world.getComponent<TransformComponent>(entity, Components.Transform);
      if (!paddle || !transform) return;

      const axis = axes?.get(paddleAction(paddle.side)) ?? 0;
      const halfHeight = paddle.height * 0.5;

      transform.y = clamp(
        transform.y + axis * deltaTime * speed,
        halfHeight,
        arenaHeight - halfHeight
      );
    });
  }
}
