// ============================================
// Serve System
// Scene lifecycle: spawn timer and ball serve
// ============================================

import { Resources, opposite, type World, type Side, type Vec2 } from '@pong-arena/shared';
import type { RoundStateResource, ServeTimerResource } from '@pong-arena/shared';
import { SystemName, type System } from './types';
import type { EventBus } from '../../events/EventBus';
import { getConfig } from '../../config';
import { spawnBall } from '../factories';
import { logBallServed } from '../../logger';

/**
 * Serve velocity. The first serve goes right; after a point the ball
 * goes toward the side that conceded it. Vertical direction is always up.
 */
export function serveVelocity(lastScorer: Side | undefined): Vec2 {
  const towardLeft = lastScorer !== undefined && opposite(lastScorer) === 'left';
  const speedX = getConfig('BALL_VELOCITY_X');
  return {
    x: towardLeft ? -speedX : speedX,
    y: getConfig('BALL_VELOCITY_Y'),
  };
}

/**
 * ServeSystem - owns "when" and "which way" for the ball
 *
 * Runs after WinnerSystem. A round in 'scoring' gets the spawn timer
 * (re)armed and moves to 'respawning'; the timer counts down on later
 * ticks and the ball spawns at arena center once it reaches zero.
 */
export class ServeSystem implements System {
  readonly name = SystemName.SERVE;

  update(world: World, deltaTime: number, events: EventBus): void {
    const round = world.requireResource<RoundStateResource>(Resources.RoundState);
    const timer = world.requireResource<ServeTimerResource>(Resources.ServeTimer);

    if (round.phase === 'scoring') {
      timer.remaining = getConfig('BALL_SPAWN_DELAY');
      round.phase = 'respawning';
      return;
    }

    if (round.phase !== 'respawning' || timer.remaining === null) return;

    timer.remaining -= deltaTime;
    if (timer.remaining > 0) return;

    timer.remaining = null;
    const position = { x: getConfig('ARENA_WIDTH') / 2, y: getConfig('ARENA_HEIGHT') / 2 };
    const velocity = serveVelocity(round.lastScorer);
    const entity = spawnBall(world, position, velocity);
    round.phase = 'alive';

    logBallServed(velocity);
    events.emit({ type: 'ballSpawned', entity, position, velocity });
  }
}
