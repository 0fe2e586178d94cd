// ============================================
// ECS Component Interfaces
// All component and resource data shapes
// ============================================

import type { EntityId } from './types';
import type { Side, Vec2 } from '../types';

// ============================================
// Components
// ============================================

/**
 * Transform - where an entity sits in arena coordinates.
 * Used by: Paddles, Ball
 *
 * z is the draw layer only; no system moves along it.
 */
export interface TransformComponent {
  x: number;
  y: number;
  z: number;
}

/**
 * Paddle - one per side, created once at scene start.
 * Side never changes after creation.
 */
export interface PaddleComponent {
  readonly side: Side;
  width: number;
  height: number;
}

/**
 * Ball - velocity in arena units per second.
 * Bounces only flip the sign of a velocity component.
 */
export interface BallComponent {
  velocity: Vec2;
  radius: number;
}

/**
 * UiText - display-owned label. The simulation writes `text`,
 * a renderer decides how it looks.
 */
export interface UiTextComponent {
  id: string;
  text: string;
}

// ============================================
// Resources
// ============================================

/**
 * ScoreBoard - points per side for the current match.
 * Written only by WinnerSystem.
 */
export interface ScoreBoardResource {
  scoreLeft: number;
  scoreRight: number;
}

/**
 * ScoreText - handles to the two score label entities.
 */
export interface ScoreTextResource {
  left: EntityId;
  right: EntityId;
}

/**
 * BallSlot - zero or one live ball.
 */
export type BallSlotResource =
  | { state: 'empty' }
  | { state: 'alive'; entity: EntityId };

/**
 * InputAxes - per-tick axis values in [-1, 1] keyed by action name
 * (e.g. "left_paddle"). Missing actions read as 0.
 */
export type InputAxesResource = Map<string, number>;

/**
 * Round lifecycle around the ball:
 * alive -> scoring (ball left the arena) -> respawning (timer armed) -> alive
 */
export type RoundPhase = 'alive' | 'scoring' | 'respawning';

export interface RoundStateResource {
  phase: RoundPhase;
  lastScorer?: Side;
}

/**
 * ServeTimer - seconds until the next ball spawns, null when unarmed.
 */
export interface ServeTimerResource {
  remaining: number | null;
}
