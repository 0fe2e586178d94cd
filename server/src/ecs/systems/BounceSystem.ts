// ============================================
// Bounce System
// Ball vs paddle and ball vs wall reflection
// ============================================

import { Components, Tags, rectIntersectsCircle, type World } from '@pong-arena/shared';
import type { BallComponent, PaddleComponent, TransformComponent } from '@pong-arena/shared';
import { SystemName, type System } from './types';
import { getConfig } from '../../config';
import { getLiveBall } from '../factories';

/**
 * Paddle contact: rectangle (center = paddle transform, half extents
 * width/2, height/2) vs ball circle.
 */
export function ballTouchesPaddle(
  ballTransform: TransformComponent,
  ball: BallComponent,
  paddleTransform: TransformComponent,
  paddle: PaddleComponent
): boolean {
  return rectIntersectsCircle(
    {
      center: { x: paddleTransform.x, y: paddleTransform.y },
      halfWidth: paddle.width * 0.5,
      halfHeight: paddle.height * 0.5,
    },
    { center: { x: ballTransform.x, y: ballTransform.y }, radius: ball.radius }
  );
}

/**
 * True when the ball is travelling toward the paddle's side.
 */
export function isMovingToward(ball: BallComponent, paddle: PaddleComponent): boolean {
  return paddle.side === 'left' ? ball.velocity.x < 0 : ball.velocity.x > 0;
}

/**
 * BounceSystem - flips ball velocity components on contact
 *
 * - Paddle contact flips vx, only while the ball moves toward that paddle
 * - Top/bottom wall contact flips vy, only while the ball moves into that wall
 *
 * Both checks are direction-gated so a ball still overlapping after a
 * bounce is not flipped back on the following ticks. Paddle and wall flips
 * touch different components and may both happen in one tick.
 * No depenetration: position is never corrected.
 */
export class BounceSystem implements System {
  readonly name = SystemName.BOUNCE;

  update(world: World): void {
    const live = getLiveBall(world);
    if (!live) return;

    const { ball, transform } = live;
    const arenaHeight = getConfig('ARENA_HEIGHT');

    // Top and bottom walls
    const hitsBottom = transform.y - ball.radius <= 0 && ball.velocity.y < 0;
    const hitsTop = transform.y + ball.radius >= arenaHeight && ball.velocity.y > 0;
    if (hitsBottom || hitsTop) {
      ball.velocity.y = -ball.velocity.y;
    }

    // Paddles
    world.forEachWithTag(Tags.Paddle, (entity) => {
      const paddle = world.getComponent<PaddleComponent>(entity, Components.Paddle);
      const paddleTransform = world.getComponent<TransformComponent>(entity, Components.Transform);
      if (!paddle || !paddleTransform) return;

      if (ballTouchesPaddle(transform, ball, paddleTransform, paddle) && isMovingToward(ball, paddle)) {
        ball.velocity.x = -ball.velocity.x;
      }
    });
  }
}
