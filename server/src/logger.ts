import pino from 'pino';
import type { Side } from '@pong-arena/shared';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'match.log')
 * @param component - Component name for filtering (e.g., 'sim', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Pretty console output in development
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating JSON file (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',
      limit: { count: 5 },
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Match events (serves, points, config, lifecycle)
export const logger = createLogger('match.log', 'sim');

// Tick timing
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Match Events
// ============================================

export function logMatchStarted(serveDelay: number) {
  logger.info({ serveDelay, event: 'match_started' }, `Match started, first serve in ${serveDelay}s`);
}

export function logBallServed(velocity: { x: number; y: number }) {
  const toward: Side = velocity.x < 0 ? 'left' : 'right';
  logger.info({ velocity, toward, event: 'ball_served' }, `Ball served toward ${toward}`);
}

export function logPointScored(scorer: Side, scoreLeft: number, scoreRight: number) {
  logger.info(
    { scorer, scoreLeft, scoreRight, event: 'point_scored' },
    `Point ${scorer}: ${scoreLeft} - ${scoreRight}`
  );
}

export function logMatchStopped(reason: string, ticks: number) {
  logger.info({ reason, ticks, event: 'match_stopped' }, `Match stopped (${reason}) after ${ticks} ticks`);
}
