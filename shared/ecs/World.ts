// ============================================
// ECS World
// ============================================

import { ComponentStore } from './Component';
import type { EntityId, ComponentType } from './types';

/**
 * World - the entity/component store the simulation reads and writes.
 *
 * Holds:
 * - Entity ids (monotonic, never reused within a world)
 * - One ComponentStore per registered component type
 * - Tags for cheap classification
 * - Resources: singleton data not tied to an entity (ScoreBoard, BallSlot, ...)
 */
export class World {
  private nextEntityId = 1;
  private entities = new Set<EntityId>();
  private stores = new Map<ComponentType, ComponentStore<unknown>>();
  private entityTags = new Map<EntityId, Set<string>>();
  private resources = new Map<string, unknown>();

  // ============================================
  // Entity Lifecycle
  // ============================================

  createEntity(): EntityId {
    const id = this.nextEntityId++;
    this.entities.add(id);
    return id;
  }

  /**
   * Destroy an entity, dropping its components and tags.
   * Unknown ids are ignored.
   */
  destroyEntity(id: EntityId): void {
    if (!this.entities.delete(id)) return;

    for (const store of this.stores.values()) {
      store.delete(id);
    }
    this.entityTags.delete(id);
  }

  hasEntity(id: EntityId): boolean {
    return this.entities.has(id);
  }

  get entityCount(): number {
    return this.entities.size;
  }

  // ============================================
  // Component Management
  // ============================================

  /**
   * Register a component store.
   * Must be called before using a component type.
   */
  registerStore<T>(type: ComponentType, store: ComponentStore<T>): void {
    this.stores.set(type, store as ComponentStore<unknown>);
  }

  getStore<T>(type: ComponentType): ComponentStore<T> | undefined {
    return this.stores.get(type) as ComponentStore<T> | undefined;
  }

  /**
   * Attach component data to an entity.
   * Throws if the component type was never registered.
   */
  addComponent<T>(entity: EntityId, type: ComponentType, data: T): void {
    const store = this.getStore<T>(type);
    if (!store) {
      throw new Error(`Component type not registered: ${type}. Call world.registerStore() first.`);
    }
    store.set(entity, data);
  }

  getComponent<T>(entity: EntityId, type: ComponentType): T | undefined {
    return this.getStore<T>(type)?.get(entity);
  }

  // ============================================
  // Tags
  // ============================================

  addTag(entity: EntityId, tag: string): void {
    let tags = this.entityTags.get(entity);
    if (!tags) {
      tags = new Set();
      this.entityTags.set(entity, tags);
    }
    tags.add(tag);
  }

  getEntitiesWithTag(tag: string): EntityId[] {
    const result: EntityId[] = [];
    this.forEachWithTag(tag, (entity) => result.push(entity));
    return result;
  }

  forEachWithTag(tag: string, callback: (entity: EntityId) => void): void {
    for (const [entity, tags] of this.entityTags) {
      if (tags.has(tag)) {
        callback(entity);
      }
    }
  }

  // ============================================
  // Resources (singleton data)
  // ============================================

  setResource<T>(key: string, value: T): void {
    this.resources.set(key, value);
  }

  getResource<T>(key: string): T | undefined {
    return this.resources.get(key) as T | undefined;
  }

  /**
   * Like getResource, but a missing resource is a setup bug.
   */
  requireResource<T>(key: string): T {
    if (!this.resources.has(key)) {
      throw new Error(`Resource not set: ${key}`);
    }
    return this.resources.get(key) as T;
  }
}
