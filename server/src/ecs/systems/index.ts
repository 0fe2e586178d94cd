// ============================================
// ECS Systems - Index
// ============================================

// Types
export type { System } from './types';
export { SystemName, SystemDependencies } from './types';

// Runner
export { SystemRunner } from './SystemRunner';

// Movement
export { PaddleSystem } from './PaddleSystem';
export { BallMotionSystem } from './BallMotionSystem';

// Collision
export { BounceSystem } from './BounceSystem';

// Round lifecycle
export { WinnerSystem } from './WinnerSystem';
export { ServeSystem } from './ServeSystem';
