// ============================================
// ServeSystem Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { Resources } from '@pong-arena/shared';
import type { RoundStateResource, ServeTimerResource } from '@pong-arena/shared';
import { ServeSystem, serveVelocity } from '../ServeSystem';
import { createTestWorld, createTestBall, createRecordingBus } from './testUtils';
import { getLiveBall } from '../../factories';

describe('ServeSystem', () => {
  let world: ReturnType<typeof createTestWorld>;
  let system: ServeSystem;
  let bus: ReturnType<typeof createRecordingBus>;

  const round = () => world.requireResource<RoundStateResource>(Resources.RoundState);
  const timer = () => world.requireResource<ServeTimerResource>(Resources.ServeTimer);

  beforeEach(() => {
    world = createTestWorld();
    system = new ServeSystem();
    bus = createRecordingBus();
  });

  describe('first serve', () => {
    it('waits out the spawn delay armed at scene start', () => {
      system.update(world, 0.5, bus);
      system.update(world, 0.5, bus);
      system.update(world, 0.5, bus);

      expect(timer().remaining).toBe(0.5);
      expect(getLiveBall(world)).toBeUndefined();
    });

    it('spawns the ball at arena center once the delay elapses', () => {
      for (let i = 0; i < 4; i++) {
        system.update(world, 0.5, bus);
      }

      const live = getLiveBall(world);
      expect(live?.transform).toEqual({ x: 50, y: 50, z: 0 });
      expect(live?.ball).toEqual({ velocity: { x: 75, y: 50 }, radius: 2 });
      expect(round().phase).toBe('alive');
      expect(timer().remaining).toBeNull();
    });

    it('announces the spawn', () => {
      system.update(world, 2, bus);

      const live = getLiveBall(world);
      expect(bus.received).toEqual([
        {
          type: 'ballSpawned',
          entity: live?.entity,
          position: { x: 50, y: 50 },
          velocity: { x: 75, y: 50 },
        },
      ]);
    });
  });

  describe('after a point', () => {
    beforeEach(() => {
      round().phase = 'scoring';
      round().lastScorer = 'right';
      timer().remaining = null;
    });

    it('re-arms the timer and moves to respawning without spawning', () => {
      system.update(world, 0.5, bus);

      expect(timer().remaining).toBe(2);
      expect(round().phase).toBe('respawning');
      expect(getLiveBall(world)).toBeUndefined();
    });

    it('serves toward the side that conceded', () => {
      system.update(world, 0.5, bus);
      system.update(world, 2, bus);

      expect(getLiveBall(world)?.ball.velocity).toEqual({ x: -75, y: 50 });
    });
  });

  it('does nothing while a ball is in play', () => {
    const ball = createTestBall(world);

    system.update(world, 5, bus);

    expect(getLiveBall(world)?.entity).toBe(ball);
    expect(bus.received).toEqual([]);
  });

  describe('serveVelocity', () => {
    it('goes right on the first serve', () => {
      expect(serveVelocity(undefined)).toEqual({ x: 75, y: 50 });
    });

    it('goes toward the side that lost the point', () => {
      expect(serveVelocity('left')).toEqual({ x: 75, y: 50 });
      expect(serveVelocity('right')).toEqual({ x: -75, y: 50 });
    });
  });
});
