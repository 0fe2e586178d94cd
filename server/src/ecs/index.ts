// ============================================
// ECS - Entity Component System
// ============================================

// Core types, classes, and components from shared package
export { World, ComponentStore, Components, Tags, Resources } from '@pong-arena/shared';
export type {
  EntityId,
  ComponentType,
  TransformComponent,
  PaddleComponent,
  BallComponent,
  UiTextComponent,
  ScoreBoardResource,
  ScoreTextResource,
  BallSlotResource,
  InputAxesResource,
  RoundStateResource,
  ServeTimerResource,
} from '@pong-arena/shared';

// Factories and World Setup
export {
  createWorld,
  createPaddle,
  getPaddleBySide,
  spawnBall,
  destroyBall,
  getLiveBall,
  createScoreLabel,
  requireTransform,
  requirePaddle,
  requireBall,
  requireUiText,
} from './factories';
export type { LiveBall } from './factories';

// Systems
export * from './systems';
