// ============================================
// Game Events
// Simulation -> collaborator notifications
// ============================================

import type { EntityId } from './ecs/types';
import type { Side, Vec2 } from './types';

export interface BallSpawnedEvent {
  type: 'ballSpawned';
  entity: EntityId;
  position: Vec2;
  velocity: Vec2;
}

export interface BallDestroyedEvent {
  type: 'ballDestroyed';
  entity: EntityId;
  position: Vec2;
}

// Ball left the arena; `exitSide` is the edge it crossed
export interface RoundEndedEvent {
  type: 'roundEnded';
  scorer: Side;
  exitSide: Side;
}

export interface ScoreChangedEvent {
  type: 'scoreChanged';
  side: Side;
  score: number;
  scoreLeft: number;
  scoreRight: number;
}

export type GameEvent =
  | BallSpawnedEvent
  | BallDestroyedEvent
  | RoundEndedEvent
  | ScoreChangedEvent;

export type GameEventType = GameEvent['type'];
