// ============================================
// ECS Package Exports
// ============================================

export { World } from './World';
export { ComponentStore } from './Component';

export { Components, Tags, Resources } from './types';
export type { EntityId, ComponentType, ResourceKey } from './types';

export type {
  // Components
  TransformComponent,
  PaddleComponent,
  BallComponent,
  UiTextComponent,
  // Resources
  ScoreBoardResource,
  ScoreTextResource,
  BallSlotResource,
  InputAxesResource,
  RoundPhase,
  RoundStateResource,
  ServeTimerResource,
} from './components';
