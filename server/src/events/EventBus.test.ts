// ============================================
// EventBus Unit Tests
// ============================================

import { describe, it, expect, beforeEach } from 'vitest';
import { EventBus } from './EventBus';
import type { ScoreChangedEvent } from '@pong-arena/shared';

const SCORE: ScoreChangedEvent = {
  type: 'scoreChanged',
  side: 'left',
  score: 1,
  scoreLeft: 1,
  scoreRight: 0,
};

describe('EventBus', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  it('delivers events to handlers of that type only', () => {
    const received: ScoreChangedEvent[] = [];
    let roundEnded = 0;

    bus.on('scoreChanged', (event) => received.push(event));
    bus.on('roundEnded', () => roundEnded++);

    bus.emit(SCORE);

    expect(received).toEqual([SCORE]);
    expect(roundEnded).toBe(0);
  });

  it('calls every handler for the same event', () => {
    let count1 = 0;
    let count2 = 0;

    bus.on('scoreChanged', () => count1++);
    bus.on('scoreChanged', () => count2++);

    bus.emit(SCORE);

    expect(count1).toBe(1);
    expect(count2).toBe(1);
  });

  it('stops delivering after unsubscribe', () => {
    let count = 0;
    const unsubscribe = bus.on('scoreChanged', () => count++);

    bus.emit(SCORE);
    unsubscribe();
    bus.emit(SCORE);

    expect(count).toBe(1);
  });

  it('off removes only the given handler', () => {
    let count1 = 0;
    let count2 = 0;
    const handler1 = () => count1++;
    const handler2 = () => count2++;

    bus.on('scoreChanged', handler1);
    bus.on('scoreChanged', handler2);
    bus.off('scoreChanged', handler1);

    bus.emit(SCORE);

    expect(count1).toBe(0);
    expect(count2).toBe(1);
  });

  it('once fires a single time', () => {
    let count = 0;
    bus.once('ballDestroyed', () => count++);

    bus.emit({ type: 'ballDestroyed', entity: 3, position: { x: -3, y: 40 } });
    bus.emit({ type: 'ballDestroyed', entity: 4, position: { x: 103, y: 40 } });

    expect(count).toBe(1);
  });

  it('clear removes all handlers', () => {
    let count = 0;
    bus.on('scoreChanged', () => count++);

    bus.clear();
    bus.emit(SCORE);

    expect(count).toBe(0);
  });
});
