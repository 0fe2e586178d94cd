// ============================================
// Score Display
// Terminal score line driven by scoreChanged events
// ============================================

import type { ScoreChangedEvent } from '@pong-arena/shared';
import type { EventBus } from './events/EventBus';

export interface ScoreOutput {
  write(chunk: string): unknown;
}

/**
 * One-line score, redrawn in place with a carriage return.
 */
export function formatScoreLine({ scoreLeft, scoreRight }: Pick<ScoreChangedEvent, 'scoreLeft' | 'scoreRight'>): string {
  return `\r  ${scoreLeft}  :  ${scoreRight}  `;
}

/**
 * Redraw the score on every scoreChanged. Returns the unsubscribe function.
 */
export function attachScoreDisplay(events: EventBus, output: ScoreOutput): () => void {
  return events.on('scoreChanged', (event) => {
    output.write(formatScoreLine(event));
  });
}
