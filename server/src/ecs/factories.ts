// ============================================
// ECS Entity Factories
// Functions to create entities with proper components
// ============================================

import { World, ComponentStore, Components, Tags, Resources } from '@pong-arena/shared';
import type {
  EntityId,
  Side,
  Vec2,
  TransformComponent,
  PaddleComponent,
  BallComponent,
  UiTextComponent,
  BallSlotResource,
} from '@pong-arena/shared';
import { getConfig } from '../config';

// ============================================
// World Setup
// ============================================

/**
 * Create an ECS World with all component stores registered.
 */
export function createWorld(): World {
  const world = new World();

  world.registerStore<TransformComponent>(Components.Transform, new ComponentStore());
  world.registerStore<PaddleComponent>(Components.Paddle, new ComponentStore());
  world.registerStore<BallComponent>(Components.Ball, new ComponentStore());
  world.registerStore<UiTextComponent>(Components.UiText, new ComponentStore());

  world.setResource<BallSlotResource>(Resources.BallSlot, { state: 'empty' });

  return world;
}

// ============================================
// Paddles
// ============================================

/**
 * Create a paddle at its side's fixed x, vertically centered.
 */
export function createPaddle(world: World, side: Side): EntityId {
  const width = getConfig('PADDLE_WIDTH');
  const height = getConfig('PADDLE_HEIGHT');
  const arenaWidth = getConfig('ARENA_WIDTH');

  const entity = world.createEntity();
  world.addComponent<TransformComponent>(entity, Components.Transform, {
    x: side === 'left' ? width * 0.5 : arenaWidth - width * 0.5,
    y: getConfig('ARENA_HEIGHT') / 2,
    z: getConfig('PADDLE_LAYER'),
  });
  world.addComponent<PaddleComponent>(entity, Components.Paddle, { side, width, height });
  world.addTag(entity, Tags.Paddle);

  return entity;
}

/**
 * Find the paddle entity defending a side.
 */
export function getPaddleBySide(world: World, side: Side): EntityId | undefined {
  return world
    .getEntitiesWithTag(Tags.Paddle)
    .find((entity) => world.getComponent<PaddleComponent>(entity, Components.Paddle)?.side === side);
}

// ============================================
// Ball
// ============================================

/**
 * Live ball with its components, resolved from the BallSlot.
 */
export interface LiveBall {
  entity: EntityId;
  ball: BallComponent;
  transform: TransformComponent;
}

/**
 * Spawn the ball. Only one ball may exist at a time.
 */
export function spawnBall(world: World, position: Vec2, velocity: Vec2): EntityId {
  const slot = world.requireResource<BallSlotResource>(Resources.BallSlot);
  if (slot.state === 'alive') {
    throw new Error(`Ball already alive (entity ${slot.entity})`);
  }

  const entity = world.createEntity();
  world.addComponent<TransformComponent>(entity, Components.Transform, {
    x: position.x,
    y: position.y,
    z: getConfig('BALL_LAYER'),
  });
  world.addComponent<BallComponent>(entity, Components.Ball, {
    velocity: { x: velocity.x, y: velocity.y },
    radius: getConfig('BALL_RADIUS'),
  });
  world.setResource<BallSlotResource>(Resources.BallSlot, { state: 'alive', entity });

  return entity;
}

/**
 * Destroy the live ball, if any, and empty the slot.
 * Returns the destroyed entity id.
 */
export function destroyBall(world: World): EntityId | undefined {
  const slot = world.requireResource<BallSlotResource>(Resources.BallSlot);
  if (slot.state === 'empty') return undefined;

  world.destroyEntity(slot.entity);
  world.setResource<BallSlotResource>(Resources.BallSlot, { state: 'empty' });
  return slot.entity;
}

/**
 * The live ball, or undefined when the slot is empty.
 */
export function getLiveBall(world: World): LiveBall | undefined {
  const slot = world.getResource<BallSlotResource>(Resources.BallSlot);
  if (!slot || slot.state === 'empty') return undefined;

  return {
    entity: slot.entity,
    ball: requireBall(world, slot.entity),
    transform: requireTransform(world, slot.entity),
  };
}

// ============================================
// Score labels
// ============================================

/**
 * Create a display-owned score label showing "0".
 */
export function createScoreLabel(world: World, id: string): EntityId {
  const entity = world.createEntity();
  world.addComponent<UiTextComponent>(entity, Components.UiText, { id, text: '0' });
  return entity;
}

// ============================================
// Component accessors
// Throw if a component is missing (invariant violation)
// ============================================

export function requireTransform(world: World, entity: EntityId): TransformComponent {
  const comp = world.getComponent<TransformComponent>(entity, Components.Transform);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Transform missing on entity ${entity}`);
  }
  return comp;
}

export function requirePaddle(world: World, entity: EntityId): PaddleComponent {
  const comp = world.getComponent<PaddleComponent>(entity, Components.Paddle);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Paddle missing on entity ${entity}`);
  }
  return comp;
}

export function requireBall(world: World, entity: EntityId): BallComponent {
  const comp = world.getComponent<BallComponent>(entity, Components.Ball);
  if (!comp) {
    throw new Error(`EntityMissingComponent: Ball missing on entity ${entity}`);
  }
  return comp;
}

export function requireUiText(world: World, entity: EntityId): UiTextComponent {
  const comp = world.getComponent<UiTextComponent>(entity, Components.UiText);
  if (!comp) {
    throw new Error(`EntityMissingComponent: UiText missing on entity ${entity}`);
  }
  return comp;
}
