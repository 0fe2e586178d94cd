// ============================================
// Scene Lifecycle
// Match setup and the per-tick simulation step
// ============================================

import { Resources, SIDES, clamp, type World } from '@pong-arena/shared';
import type {
  InputAxesResource,
  RoundStateResource,
  ScoreBoardResource,
  ScoreTextResource,
  ServeTimerResource,
} from '@pong-arena/shared';
import {
  createWorld,
  createPaddle,
  createScoreLabel,
  SystemRunner,
  SystemDependencies,
  PaddleSystem,
  BallMotionSystem,
  BounceSystem,
  WinnerSystem,
  ServeSystem,
  type System,
} from './ecs';
import { EventBus } from './events/EventBus';
import { getConfig } from './config';
import { logMatchStarted } from './logger';

function defaultSystems(): System[] {
  return [
    new PaddleSystem(),
    new BallMotionSystem(),
    new BounceSystem(),
    new WinnerSystem(),
    new ServeSystem(),
  ];
}

/**
 * Runner with every simulation system wired into the tick graph.
 * The graph is sorted here, so an unknown dependency or a cycle throws
 * before the first tick.
 */
export function createSystemRunner(
  systems: System[] = defaultSystems(),
  dependencies: Readonly<Record<string, readonly string[]>> = SystemDependencies
): SystemRunner {
  const runner = new SystemRunner();
  for (const system of systems) {
    runner.register(system, dependencies[system.name] ?? []);
  }
  runner.getSchedule();
  return runner;
}

/**
 * Scene start: paddles, score labels, zeroed board, empty input and the
 * first serve timer. No ball yet.
 */
export function startMatch(world: World): void {
  for (const side of SIDES) {
    createPaddle(world, side);
  }

  world.setResource<ScoreTextResource>(Resources.ScoreText, {
    left: createScoreLabel(world, 'P1'),
    right: createScoreLabel(world, 'P2'),
  });
  world.setResource<ScoreBoardResource>(Resources.ScoreBoard, { scoreLeft: 0, scoreRight: 0 });
  world.setResource<InputAxesResource>(Resources.InputAxes, new Map());

  const serveDelay = getConfig('BALL_SPAWN_DELAY');
  world.setResource<RoundStateResource>(Resources.RoundState, { phase: 'respawning' });
  world.setResource<ServeTimerResource>(Resources.ServeTimer, { remaining: serveDelay });

  logMatchStarted(serveDelay);
}

/**
 * Everything one match needs, stepped one tick at a time.
 */
export class Simulation {
  readonly world: World;
  readonly events = new EventBus();
  private readonly runner: SystemRunner;
  private tickCount = 0;

  constructor(world: World = createWorld(), runner: SystemRunner = createSystemRunner()) {
    this.world = world;
    this.runner = runner;
    startMatch(this.world);
  }

  /**
   * Replace this tick's input axes. Values are clamped to [-1, 1].
   */
  setAxes(axes: Iterable<[string, number]>): void {
    const current = this.world.requireResource<InputAxesResource>(Resources.InputAxes);
    current.clear();
    for (const [action, value] of axes) {
      current.set(action, clamp(value, -1, 1));
    }
  }

  step(deltaTime: number): void {
    this.runner.update(this.world, deltaTime, this.events);
    this.tickCount++;
  }

  get ticks(): number {
    return this.tickCount;
  }

  get score(): ScoreBoardResource {
    const board = this.world.requireResource<ScoreBoardResource>(Resources.ScoreBoard);
    return { scoreLeft: board.scoreLeft, scoreRight: board.scoreRight };
  }
}
