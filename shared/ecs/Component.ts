// ============================================
// Component Store
// ============================================

import type { EntityId } from './types';

/**
 * ComponentStore - typed Map<EntityId, T> for one component type.
 */
export class ComponentStore<T> {
  private data = new Map<EntityId, T>();

  /**
   * Overwrites existing data if present.
   */
  set(entity: EntityId, value: T): void {
    this.data.set(entity, value);
  }

  get(entity: EntityId): T | undefined {
    return this.data.get(entity);
  }

  delete(entity: EntityId): void {
    this.data.delete(entity);
  }
}
