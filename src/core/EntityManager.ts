/**
 * Entity lifecycle manager
 * 实体生命周期管理器
 *
 * Hands out numeric handles with generation numbers; a slot freed by destroy()
 * is recycled with a bumped generation, so stale handles never read as alive.
 * 使用带世代号的数字句柄；destroy()释放的槽位会以新的世代号复用，旧句柄不会被视为存活。
 */

import { makeEntity, indexOf, genOf, nextGeneration } from '../utils/Types';
import type { Entity } from '../utils/Types';

export class EntityManager {
  private generations: Uint32Array;
  private alive: Uint8Array;
  private free: number[] = [];
  private nextIndex = 1; // 0 reserved 0被预留
  private _aliveCount = 0;

  constructor(initialCapacity = 256) {
    this.generations = new Uint32Array(initialCapacity);
    this.alive = new Uint8Array(initialCapacity);
  }

  /**
   * Ensure arrays have capacity for the given index
   * 确保数组对给定索引有容量
   */
  private ensure(index: number): void {
    if (index < this.generations.length) return;

    let newSize = this.generations.length || 1;
    while (newSize <= index) {
      newSize <<= 1;
    }

    const newGenerations = new Uint32Array(newSize);
    newGenerations.set(this.generations);
    this.generations = newGenerations;

    const newAlive = new Uint8Array(newSize);
    newAlive.set(this.alive);
    this.alive = newAlive;
  }

  /**
   * Create a new entity
   * 创建新实体
   */
  create(): Entity {
    const index = this.free.pop() ?? this.nextIndex++;
    this.ensure(index);

    this.alive[index] = 1;
    this._aliveCount++;

    return makeEntity(index, this.generations[index]);
  }

  /**
   * Destroy an entity, returns false when the handle is not alive
   * 销毁实体，句柄不存活时返回false
   */
  destroy(entity: Entity): boolean {
    if (!this.isAlive(entity)) return false;

    const index = indexOf(entity);
    this.alive[index] = 0;
    this.generations[index] = nextGeneration(this.generations[index]);
    this.free.push(index);
    this._aliveCount--;

    return true;
  }

  /**
   * Check if entity is alive
   * 检查实体是否存活
   */
  isAlive(entity: Entity): boolean {
    const index = indexOf(entity);
    return index > 0 &&
           index < this.generations.length &&
           this.alive[index] === 1 &&
           this.generations[index] === genOf(entity);
  }

  aliveCount(): number {
    return this._aliveCount;
  }

  /**
   * Get all alive entities in slot order
   * 按槽位顺序获取所有存活实体
   */
  getAllAliveEntities(): Entity[] {
    const entities: Entity[] = [];
    for (let i = 1; i < this.nextIndex; i++) {
      if (this.alive[i] === 1) {
        entities.push(makeEntity(i, this.generations[i]));
      }
    }
    return entities;
  }

  /**
   * Destroy every entity. Generations are kept so handles from before the
   * clear stay dead.
   * 销毁所有实体。保留世代号，清空前的句柄仍视为死亡
   */
  clear(): void {
    for (let i = 1; i < this.nextIndex; i++) {
      if (this.alive[i] === 1) {
        this.alive[i] = 0;
        this.generations[i] = nextGeneration(this.generations[i]);
      }
    }
    this.free.length = 0;
    for (let i = this.nextIndex - 1; i >= 1; i--) {
      this.free.push(i);
    }
    this._aliveCount = 0;
  }
}
