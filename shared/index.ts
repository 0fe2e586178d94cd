// ============================================
// Shared Types & Constants
// Used by the simulation and its collaborators
// ============================================

// ECS Module - entity/component store
export * from './ecs';

// Geometry helpers
export * from './math';

// Game constants (GAME_CONFIG, OVERRIDABLE_CONFIGS)
export * from './constants';

// Plain types (Side, Vec2)
export * from './types';

// Game events (simulation -> collaborators)
export * from './events';
