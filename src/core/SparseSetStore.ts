/**
 * Sparse-set component storage
 * 稀疏集组件存储
 */

import { indexOf } from '../utils/Types';
import type { Entity } from '../utils/Types';

/**
 * Interface for component storage implementations
 * 组件存储实现接口
 */
export interface IComponentStore<T> {
  has(entity: Entity): boolean;
  get(entity: Entity): T | undefined;
  add(entity: Entity, value: T): void;
  remove(entity: Entity): void;
  size(): number;
  clear(): void;

  /**
   * Entity handles in insertion order (live view, do not mutate)
   * 按插入顺序排列的实体句柄（实时视图，请勿修改）
   */
  entities(): readonly Entity[];

  forEach(callback: (entity: Entity, value: T) => void): void;
}

/**
 * Sparse-Set component store with O(1) lookup
 * 支持O(1)查找的稀疏集组件存储
 *
 * Removal shifts the dense tail down instead of swapping with the last
 * element, so iteration order always equals insertion order.
 * 移除时整体前移稠密尾部而非与尾元素交换，保证遍历顺序等于插入顺序。
 */
export class SparseSetStore<T> implements IComponentStore<T> {
  // Sparse array: entityIndex -> denseIndex (-1 means none)
  // 稀疏数组：实体索引 -> 稠密索引（-1表示无）
  private sparse = new Int32Array(256).fill(-1);

  private dense: Entity[] = [];
  private values: T[] = [];

  private ensureSparse(entityIndex: number): void {
    if (entityIndex < this.sparse.length) return;
    let newSize = this.sparse.length || 1;
    while (newSize <= entityIndex) {
      newSize <<= 1;
    }
    const newSparse = new Int32Array(newSize).fill(-1);
    newSparse.set(this.sparse);
    this.sparse = newSparse;
  }

  private denseIndexOf(entity: Entity): number {
    const index = indexOf(entity);
    if (index >= this.sparse.length) return -1;
    const denseIndex = this.sparse[index];
    // Slot may be held by another generation 槽位可能属于其他世代
    if (denseIndex === -1 || this.dense[denseIndex] !== entity) return -1;
    return denseIndex;
  }

  has(entity: Entity): boolean {
    return this.denseIndexOf(entity) !== -1;
  }

  get(entity: Entity): T | undefined {
    const denseIndex = this.denseIndexOf(entity);
    return denseIndex === -1 ? undefined : this.values[denseIndex];
  }

  add(entity: Entity, value: T): void {
    const existing = this.denseIndexOf(entity);
    if (existing !== -1) {
      // Overwrite existing component 覆盖现有组件
      this.values[existing] = value;
      return;
    }

    const index = indexOf(entity);
    this.ensureSparse(index);
    this.sparse[index] = this.dense.length;
    this.dense.push(entity);
    this.values.push(value);
  }

  remove(entity: Entity): void {
    const denseIndex = this.denseIndexOf(entity);
    if (denseIndex === -1) return;

    this.dense.splice(denseIndex, 1);
    this.values.splice(denseIndex, 1);
    this.sparse[indexOf(entity)] = -1;

    for (let i = denseIndex; i < this.dense.length; i++) {
      this.sparse[indexOf(this.dense[i])] = i;
    }
  }

  size(): number {
    return this.dense.length;
  }

  clear(): void {
    this.sparse.fill(-1);
    this.dense.length = 0;
    this.values.length = 0;
  }

  entities(): readonly Entity[] {
    return this.dense;
  }

  forEach(callback: (entity: Entity, value: T) => void): void {
    for (let i = 0; i < this.dense.length; i++) {
      callback(this.dense[i], this.values[i]);
    }
  }
}
