// ============================================
// ECS Core Types
// ============================================

/**
 * Entity ID - just a number.
 * Entities have no data themselves, they're just IDs that
 * components are attached to.
 */
export type EntityId = number;

/**
 * Component type identifier - string key for component stores.
 */
export type ComponentType = string;

/**
 * Component types used by the simulation.
 * Const object keeps string values while giving literal types.
 */
export const Components = {
  // Position + draw layer (paddles, ball)
  Transform: 'Transform',

  // Gameplay components
  Paddle: 'Paddle',
  Ball: 'Ball',

  // Display-owned text label (score slots)
  UiText: 'UiText',
} as const;

/**
 * Entity tags. Systems find paddles by tag rather than by component query.
 */
export const Tags = {
  Paddle: 'paddle',
} as const;

// ============================================
// Resource Keys
// ============================================

/**
 * Singleton resources stored on the World (not tied to entities).
 */
export const Resources = {
  ScoreBoard: 'ScoreBoard',
  ScoreText: 'ScoreText',
  BallSlot: 'BallSlot',
  InputAxes: 'InputAxes',
  RoundState: 'RoundState',
  ServeTimer: 'ServeTimer',
} as const;

export type ResourceKey = (typeof Resources)[keyof typeof Resources];
