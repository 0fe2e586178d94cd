// ============================================
// Game Constants & Configuration
// ============================================

/**
 * Arena and gameplay constants. Units are arena units (the arena is
 * 100x100) and seconds.
 */
export const GAME_CONFIG = {
  // Arena
  ARENA_WIDTH: 100,
  ARENA_HEIGHT: 100,

  // Paddles
  PADDLE_WIDTH: 4,
  PADDLE_HEIGHT: 16,
  PADDLE_SPEED: 72, // Units per second at full axis deflection

  // Ball
  BALL_VELOCITY_X: 75,
  BALL_VELOCITY_Y: 50,
  BALL_RADIUS: 2,
  BALL_SPAWN_DELAY: 2.0, // Seconds after scene start / after each point

  // Simulation
  TICK_RATE: 60, // Ticks per second

  // Draw layers
  PADDLE_LAYER: 0,
  BALL_LAYER: 0,
} as const;

export type GameConfigKey = keyof typeof GAME_CONFIG;

// Keys that may be overridden once at startup (before the first tick)
export const OVERRIDABLE_CONFIGS = [
  'PADDLE_SPEED',
  'BALL_VELOCITY_X',
  'BALL_VELOCITY_Y',
  'BALL_RADIUS',
  'BALL_SPAWN_DELAY',
  'TICK_RATE',
] as const satisfies readonly GameConfigKey[];

export type OverridableConfigKey = (typeof OVERRIDABLE_CONFIGS)[number];
