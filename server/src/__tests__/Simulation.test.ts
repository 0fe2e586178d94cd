// ============================================
// Simulation Integration Tests
// Full ticks through the scheduled systems
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { Resources } from '@pong-arena/shared';
import type { RoundStateResource, ScoreTextResource, ServeTimerResource } from '@pong-arena/shared';
import { Simulation } from '../scene';
import { getLiveBall, getPaddleBySide, requireTransform, requireUiText, spawnBall } from '../ecs';

const DT = 1 / 60;

/**
 * Put a ball in play as if it had just been served.
 */
function serveManually(sim: Simulation, velocity: { x: number; y: number }): void {
  spawnBall(sim.world, { x: 50, y: 50 }, velocity);
  sim.world.requireResource<RoundStateResource>(Resources.RoundState).phase = 'alive';
  sim.world.requireResource<ServeTimerResource>(Resources.ServeTimer).remaining = null;
}

describe('Simulation', () => {
  let sim: Simulation;

  beforeEach(() => {
    sim = new Simulation();
  });

  describe('scene start', () => {
    it('creates two paddles and no ball', () => {
      expect(getPaddleBySide(sim.world, 'left')).toBeDefined();
      expect(getPaddleBySide(sim.world, 'right')).toBeDefined();
      expect(getLiveBall(sim.world)).toBeUndefined();
      expect(sim.score).toEqual({ scoreLeft: 0, scoreRight: 0 });
    });

    it('serves the first ball after about two seconds', () => {
      let steps = 0;
      while (!getLiveBall(sim.world) && steps < 200) {
        sim.step(DT);
        steps++;
      }

      expect(steps).toBeGreaterThanOrEqual(120);
      expect(steps).toBeLessThanOrEqual(121);
      expect(getLiveBall(sim.world)?.ball.velocity).toEqual({ x: 75, y: 50 });
    });
  });

  describe('a missed ball', () => {
    it('scores for the right side once the ball leaves past the left edge', () => {
      serveManually(sim, { x: -75, y: 50 });

      let steps = 0;
      while (getLiveBall(sim.world) && steps < 100) {
        sim.step(DT);
        steps++;
      }

      // x = 50 - 1.25 * steps; first fully off (< -2) at step 42
      expect(steps).toBe(42);
      expect(sim.score).toEqual({ scoreLeft: 0, scoreRight: 1 });
      expect(getLiveBall(sim.world)).toBeUndefined();

      const labels = sim.world.requireResource<ScoreTextResource>(Resources.ScoreText);
      expect(requireUiText(sim.world, labels.right).text).toBe('1');
    });

    it('keeps the arena empty until the serve timer elapses', () => {
      serveManually(sim, { x: -75, y: 50 });
      while (getLiveBall(sim.world)) {
        sim.step(DT);
      }

      for (let i = 0; i < 60; i++) {
        sim.step(DT);
      }
      expect(getLiveBall(sim.world)).toBeUndefined();

      let steps = 0;
      while (!getLiveBall(sim.world) && steps < 100) {
        sim.step(DT);
        steps++;
      }

      const live = getLiveBall(sim.world);
      expect(live?.transform).toEqual({ x: 50, y: 50, z: 0 });
      // Right scored, so the ball goes toward the left side
      expect(live?.ball.velocity).toEqual({ x: -75, y: 50 });
      expect(sim.score.scoreRight).toBe(1);
    });
  });

  describe('rallies', () => {
    it('returns a ball hit by the right paddle', () => {
      const right = getPaddleBySide(sim.world, 'right');
      if (right === undefined) throw new Error('no right paddle');
      serveManually(sim, { x: 75, y: 0 });

      // Ball reaches the paddle face (x >= 94) after 36 ticks
      for (let i = 0; i < 40; i++) {
        sim.step(DT);
      }

      const live = getLiveBall(sim.world);
      expect(live?.ball.velocity.x).toBe(-75);
      expect(live?.transform.x).toBeLessThan(98);
      expect(requireTransform(sim.world, right).y).toBe(50);
      expect(sim.score).toEqual({ scoreLeft: 0, scoreRight: 0 });
    });

    it('bounces off the top wall and keeps the speed', () => {
      serveManually(sim, { x: 0, y: 50 });

      for (let i = 0; i < 70; i++) {
        sim.step(DT);
      }

      const live = getLiveBall(sim.world);
      expect(live?.ball.velocity).toEqual({ x: 0, y: -50 });
      expect(live?.transform.y).toBeLessThan(100);
    });
  });

  describe('input', () => {
    it('clamps axis values into [-1, 1]', () => {
      sim.setAxes([['left_paddle', 5]]);

      sim.step(0.5);

      const left = getPaddleBySide(sim.world, 'left');
      if (left === undefined) throw new Error('no left paddle');
      // 50 + 1 * 0.5 * 72
      expect(requireTransform(sim.world, left).y).toBe(86);
    });

    it('replaces the previous tick axes', () => {
      sim.setAxes([['left_paddle', 1]]);
      sim.setAxes([['right_paddle', -1]]);

      sim.step(0.25);

      const left = getPaddleBySide(sim.world, 'left');
      const right = getPaddleBySide(sim.world, 'right');
      if (left === undefined || right === undefined) throw new Error('missing paddle');
      expect(requireTransform(sim.world, left).y).toBe(50);
      expect(requireTransform(sim.world, right).y).toBe(32);
    });
  });

  it('counts ticks', () => {
    sim.step(DT);
    sim.step(DT);

    expect(sim.ticks).toBe(2);
  });
});
