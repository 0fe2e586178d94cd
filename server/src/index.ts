// ============================================
// Pong Arena - Headless Match Runner
// ============================================

import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { applyConfigOverrides, getConfig, lockConfig } from './config';
import { InputState, attachTerminalInput, loadBindings, readAxes } from './input';
import { Simulation } from './scene';
import { attachScoreDisplay } from './display';
import { logger, perfLogger, logMatchStopped } from './logger';

const __dirname = dirname(fileURLToPath(import.meta.url));

// ============================================
// Configuration (fails fast before the first tick)
// ============================================

if (process.env.PONG_CONFIG_OVERRIDES) {
  applyConfigOverrides(process.env.PONG_CONFIG_OVERRIDES);
}
lockConfig();

const bindingsPath = process.env.PONG_BINDINGS || resolve(__dirname, '../config/bindings.json');
const bindings = loadBindings(bindingsPath);
logger.info(
  { event: 'bindings_loaded', path: bindingsPath, actions: Array.from(bindings.axes.keys()) },
  `Loaded ${bindings.axes.size} input axes`
);

const TICK_RATE = getConfig('TICK_RATE');
const TICK_INTERVAL = 1000 / TICK_RATE;

// ============================================
// Simulation
// ============================================

const simulation = new Simulation();
const inputState = new InputState();

// pino-pretty owns stdout, so the live score goes to stderr
attachScoreDisplay(simulation.events, process.stderr);

// ============================================
// Game Loop
// ============================================

let lastTickTime = performance.now();

const loop = setInterval(() => {
  const now = performance.now();
  const actualDelta = now - lastTickTime;
  lastTickTime = now;

  // Fixed step: simulated time advances the same amount every tick
  const deltaTime = TICK_INTERVAL / 1000;

  simulation.setAxes(readAxes(inputState, bindings, Date.now()));
  simulation.step(deltaTime);

  // Event loop was blocked well past the tick interval
  if (actualDelta > TICK_INTERVAL * 1.5) {
    perfLogger.info(
      {
        event: 'tick_variance',
        tickNum: simulation.ticks,
        actualDeltaMs: actualDelta.toFixed(1),
        expectedMs: TICK_INTERVAL.toFixed(1),
      },
      `Tick ${simulation.ticks} late: ${actualDelta.toFixed(1)}ms`
    );
  }
}, TICK_INTERVAL);

// ============================================
// Graceful Shutdown
// ============================================

let detachInput: () => void = () => {};
let stopping = false;

function shutdown(reason: string) {
  if (stopping) return;
  stopping = true;

  clearInterval(loop);
  detachInput();
  simulation.events.clear();
  const { scoreLeft, scoreRight } = simulation.score;
  logMatchStopped(reason, simulation.ticks);
  logger.info({ event: 'final_score', scoreLeft, scoreRight }, `Final score ${scoreLeft} - ${scoreRight}`);

  // Let pino transports flush, but never hang on them
  setTimeout(() => process.exit(0), 500).unref();
}

detachInput = attachTerminalInput(inputState, () => shutdown('quit'));

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
