// ============================================
// ECS System Runner
// Executes systems once per tick in dependency order
// ============================================

import type { World } from '@pong-arena/shared';
import type { EventBus } from '../../events/EventBus';
import type { System } from './types';
import { logger, perfLogger } from '../../logger';

/**
 * Registered system with the systems it must run after
 */
interface RegisteredSystem {
  system: System;
  after: readonly string[];
}

// Log a breakdown when a tick exceeds this
const SLOW_TICK_MS = 10;

/**
 * SystemRunner - schedules systems as a directed acyclic graph.
 *
 * Each system names the systems it runs after. The graph is sorted
 * topologically once (ties keep registration order) and re-sorted only
 * when a system is added.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];
  private schedule: System[] | null = null;

  /**
   * Register a system
   * @param system The system to register (name must be unique)
   * @param after Names of systems that must complete first in the same tick
   */
  register(system: System, after: readonly string[] = []): void {
    if (this.systems.some((s) => s.system.name === system.name)) {
      throw new Error(`System already registered: ${system.name}`);
    }
    this.systems.push({ system, after });
    this.schedule = null;
  }

  /**
   * Run every system once, dependencies first.
   * Tracks per-system timing and logs when the tick is slow.
   */
  update(world: World, deltaTime: number, events: EventBus): void {
    const tickStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    for (const system of this.getSchedule()) {
      const systemStart = performance.now();
      try {
        system.update(world, deltaTime, events);
      } catch (error) {
        logger.error({
          event: 'system_error',
          system: system.name,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        }, `System ${system.name} threw an error`);
        // Keep the tick going with the next system
      }
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    const totalMs = performance.now() - tickStart;
    if (totalMs > SLOW_TICK_MS) {
      const sorted = [...timings].sort((a, b) => b.ms - a.ms);
      const breakdown = sorted.map((t) => `${t.name}:${t.ms.toFixed(1)}`).join(' ');

      perfLogger.info({
        event: 'slow_tick_breakdown',
        totalMs: totalMs.toFixed(1),
        breakdown: sorted.map((t) => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
      }, `Slow tick ${totalMs.toFixed(1)}ms: ${breakdown}`);
    }
  }

  /**
   * Systems in execution order.
   * Throws on an unknown dependency or a cycle.
   */
  getSchedule(): System[] {
    if (!this.schedule) {
      this.schedule = this.sortSystems();
    }
    return this.schedule;
  }

  /**
   * Names in execution order (for debugging)
   */
  getSystemNames(): string[] {
    return this.getSchedule().map((s) => s.name);
  }

  // Kahn's algorithm, picking the earliest-registered ready system each step
  private sortSystems(): System[] {
    const names = new Set(this.systems.map((s) => s.system.name));
    const remaining = new Map<string, number>();

    for (const { system, after } of this.systems) {
      for (const dependency of after) {
        if (!names.has(dependency)) {
          throw new Error(`System ${system.name} depends on unknown system ${dependency}`);
        }
      }
      remaining.set(system.name, new Set(after).size);
    }

    const order: System[] = [];
    const done = new Set<string>();

    while (order.length < this.systems.length) {
      const next = this.systems.find(
        ({ system }) => !done.has(system.name) && remaining.get(system.name) === 0
      );
      if (!next) {
        const stuck = this.systems.filter(({ system }) => !done.has(system.name)).map(({ system }) => system.name);
        throw new Error(`System dependency cycle among: ${stuck.join(', ')}`);
      }

      order.push(next.system);
      done.add(next.system.name);

      for (const { system, after } of this.systems) {
        if (!done.has(system.name) && after.includes(next.system.name)) {
          remaining.set(system.name, (remaining.get(system.name) ?? 0) - 1);
        }
      }
    }

    return order;
  }
}
