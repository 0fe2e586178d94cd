// ============================================
// Winner System
// Detects the ball leaving the arena and scores the point
// ============================================

import { Resources, opposite, type World, type Side } from '@pong-arena/shared';
import type { RoundStateResource, ScoreBoardResource, ScoreTextResource } from '@pong-arena/shared';
import { SystemName, type System } from './types';
import type { EventBus } from '../../events/EventBus';
import { getConfig } from '../../config';
import { destroyBall, getLiveBall, requireUiText } from '../factories';
import { logPointScored } from '../../logger';

/**
 * Edge the ball has fully passed, if any.
 * Leaving left means the left side missed.
 */
export function exitSide(x: number, radius: number, arenaWidth: number): Side | undefined {
  if (x < -radius) return 'left';
  if (x > arenaWidth + radius) return 'right';
  return undefined;
}

/**
 * WinnerSystem - ends the round when the ball is fully off either
 * vertical edge.
 *
 * The side opposite the exit edge scores. The ball is destroyed, the
 * scorer's label text updated and the round moved to 'scoring' so the
 * ServeSystem can arm the respawn timer. Never creates a ball.
 */
export class WinnerSystem implements System {
  readonly name = SystemName.WINNER;

  update(world: World, _deltaTime: number, events: EventBus): void {
    const live = getLiveBall(world);
    if (!live) return;

    const exit = exitSide(live.transform.x, live.ball.radius, getConfig('ARENA_WIDTH'));
    if (!exit) return;

    const scorer = opposite(exit);
    const board = world.requireResource<ScoreBoardResource>(Resources.ScoreBoard);
    const score = scorer === 'left' ? ++board.scoreLeft : ++board.scoreRight;

    const position = { x: live.transform.x, y: live.transform.y };
    destroyBall(world);
    events.emit({ type: 'ballDestroyed', entity: live.entity, position });

    // Score label for the scoring side
    const labels = world.getResource<ScoreTextResource>(Resources.ScoreText);
    if (labels) {
      requireUiText(world, scorer === 'left' ? labels.left : labels.right).text = String(score);
    }

    const round = world.getResource<RoundStateResource>(Resources.RoundState);
    if (round) {
      round.phase = 'scoring';
      round.lastScorer = scorer;
    }

    logPointScored(scorer, board.scoreLeft, board.scoreRight);
    events.emit({ type: 'roundEnded', scorer, exitSide: exit });
    events.emit({
      type: 'scoreChanged',
      side: scorer,
      score,
      scoreLeft: board.scoreLeft,
      scoreRight: board.scoreRight,
    });
  }
}
