/**
 * World - entity store with sparse-set component storage
 * World - 使用稀疏集组件存储的实体仓库
 */

import { EntityManager } from './EntityManager';
import { SparseSetStore } from './SparseSetStore';
import type { IComponentStore } from './SparseSetStore';
import { getComponentType, typeIdOfInstance, nameOfTypeId } from './ComponentRegistry';
import { Query } from './Query';
import { CommandBuffer } from './CommandBuffer';
import { EntityNotFoundError } from './Errors';
import type { Entity, ComponentCtor, InstancesOf, ReadonlyInstancesOf } from '../utils/Types';

/**
 * Resource key: any class whose instance is stored as a world singleton
 * 资源键：其实例作为世界单例存储的任意类
 */
export type ResourceKey<T> = abstract new (...args: never[]) => T;

export interface WorldOptions {
  /**
   * Throw EntityNotFoundError on stale handles (default true). When false the
   * world logs a warning and treats the call as a no-op.
   * 对失效句柄抛出EntityNotFoundError（默认true）。为false时仅警告并忽略。
   */
  strict?: boolean;
}

/**
 * World manages all entities, components and resources
 * World管理所有实体、组件和资源
 */
export class World {
  private em = new EntityManager();
  private stores = new Map<number, IComponentStore<object>>();
  private entityTypes = new Map<Entity, number[]>();
  private resources = new Map<Function, unknown>();
  private _iterating = 0;

  /** Whether stale handles raise errors 失效句柄是否抛错 */
  readonly strict: boolean;

  /**
   * Current frame number (starts from 1); incremented by beginFrame()
   * 当前帧号（从1开始）；调用beginFrame()自增
   */
  frame = 1;

  constructor(opts: WorldOptions = {}) {
    this.strict = opts.strict ?? true;
  }

  /**
   * Begin new frame (call at start of main loop)
   * 开始新帧（在主循环开始时调用）
   */
  beginFrame(): void {
    this.frame++;
  }

  // ================== Entities ==================
  // 实体

  /**
   * Create an entity holding the given component bundle
   * 创建持有给定组件包的实体
   */
  spawn(...components: object[]): Entity {
    this.assertNotIterating();

    const typeIds = components.map(typeIdOfInstance);
    const seen = new Set<number>();
    for (const id of typeIds) {
      if (seen.has(id)) {
        throw new Error(`[World] spawn: duplicate component ${nameOfTypeId(id)} in bundle`);
      }
      seen.add(id);
    }

    const entity = this.em.create();
    for (let i = 0; i < components.length; i++) {
      this.storeOf(typeIds[i]).add(entity, components[i]);
    }
    this.entityTypes.set(entity, typeIds);
    return entity;
  }

  /**
   * Destroy entity and remove all its components
   * 销毁实体并移除其所有组件
   */
  despawn(entity: Entity): void {
    this.assertNotIterating();

    if (!this.em.isAlive(entity)) {
      this.notFound(entity, 'despawn');
      return;
    }

    for (const typeId of this.entityTypes.get(entity) ?? []) {
      this.stores.get(typeId)?.remove(entity);
    }
    this.entityTypes.delete(entity);
    this.em.destroy(entity);
  }

  /**
   * Remove every entity; resources are kept
   * 移除所有实体；资源保留
   */
  clear(): void {
    this.assertNotIterating();
    for (const store of this.stores.values()) {
      store.clear();
    }
    this.entityTypes.clear();
    this.em.clear();
  }

  isAlive(entity: Entity): boolean {
    return this.em.isAlive(entity);
  }

  get entityCount(): number {
    return this.em.aliveCount();
  }

  getAllAliveEntities(): Entity[] {
    return this.em.getAllAliveEntities();
  }

  // ================== Components ==================
  // 组件

  /**
   * Get component from entity
   * 从实体获取组件
   */
  get<T extends object>(entity: Entity, ctor: ComponentCtor<T>): T | undefined {
    if (!this.em.isAlive(entity)) {
      this.notFound(entity, `get ${ctor.name}`);
      return undefined;
    }
    const value = this.stores.get(getComponentType(ctor).id)?.get(entity);
    return value instanceof ctor ? value : undefined;
  }

  /**
   * Check if entity has component
   * 检查实体是否拥有组件
   */
  has<T extends object>(entity: Entity, ctor: ComponentCtor<T>): boolean {
    return this.stores.get(getComponentType(ctor).id)?.has(entity) ?? false;
  }

  /**
   * Create query for required components; the component tuple is inferred
   * from the constructors
   * 为必需组件创建查询；组件元组由构造函数推导
   */
  query<Cs extends ComponentCtor<object>[]>(...ctors: Cs): Query<InstancesOf<Cs>> {
    const stores = ctors.map(ctor => this.stores.get(getComponentType(ctor).id));
    return new Query<InstancesOf<Cs>>(this, stores);
  }

  /**
   * Read-only query: same iteration as query(), components typed as
   * deeply read-only. Used by snapshot passes and drawing collaborators.
   * 只读查询：遍历与query()相同，组件类型为深度只读。用于快照阶段和绘制协作方。
   */
  view<Cs extends ComponentCtor<object>[]>(...ctors: Cs): Query<ReadonlyInstancesOf<Cs>> {
    const stores = ctors.map(ctor => this.stores.get(getComponentType(ctor).id));
    return new Query<ReadonlyInstancesOf<Cs>>(this, stores);
  }

  private storeOf(typeId: number): IComponentStore<object> {
    let store = this.stores.get(typeId);
    if (!store) {
      store = new SparseSetStore<object>();
      this.stores.set(typeId, store);
    }
    return store;
  }

  private notFound(entity: Entity, operation: string): void {
    const error = new EntityNotFoundError(entity, operation);
    if (this.strict) {
      throw error;
    }
    console.warn(`${error.message} (ignored)`);
  }

  // ================== Iteration guard ==================
  // 遍历保护

  /**
   * Enter iteration period (called by Query internally)
   * 进入遍历期（Query内部调用）
   */
  _enterIteration(): void {
    this._iterating++;
  }

  /**
   * Leave iteration period (called by Query internally)
   * 离开遍历期（Query内部调用）
   */
  _leaveIteration(): void {
    this._iterating--;
  }

  private assertNotIterating(): void {
    if (this._iterating > 0) {
      throw new Error('[World] Structural changes must go through CommandBuffer during iteration.');
    }
  }

  /**
   * Create command buffer for deferred operations
   * 创建命令缓冲区用于延迟操作
   */
  cmd(): CommandBuffer {
    return new CommandBuffer(this);
  }

  // ================== Resources ==================
  // 资源

  setResource<T>(key: ResourceKey<T>, val: T): void {
    this.resources.set(key, val);
  }

  getResource<T>(key: ResourceKey<T>): T | undefined {
    const val = this.resources.get(key);
    return val instanceof key ? val : undefined;
  }

  /**
   * Get a resource that must exist
   * 获取必须存在的资源
   */
  requireResource<T>(key: ResourceKey<T>): T {
    const val = this.getResource(key);
    if (val === undefined) {
      throw new Error(`[World] missing resource ${key.name}`);
    }
    return val;
  }
}
