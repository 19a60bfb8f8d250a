/**
 * Typed multi-component query over sparse-set stores
 * 基于稀疏集存储的类型化多组件查询
 */

import type { Entity } from '../utils/Types';
import type { IComponentStore } from './SparseSetStore';
import type { World } from './World';

/**
 * Query over every entity holding all requested component types.
 * Components are handed out by reference: a callback may read one and write
 * another on the same entity. Structural changes while iterating throw; use
 * the command buffer instead.
 * 查询同时拥有所有指定组件的实体。组件按引用传递：回调可读取一个组件并修改同一实体的另一个。
 * 遍历期间的结构变更会抛错，请改用命令缓冲。
 */
export class Query<Ts extends unknown[]> {
  constructor(
    private readonly world: World,
    private readonly stores: ReadonlyArray<IComponentStore<object> | undefined>
  ) {}

  /**
   * Drive iteration from the smallest store; every store keeps insertion
   * order, so results come out in creation order.
   * 从最小的存储驱动遍历；所有存储都保持插入顺序，因此结果按创建顺序输出。
   */
  private driver(): IComponentStore<object> | undefined {
    let smallest: IComponentStore<object> | undefined;
    for (const store of this.stores) {
      if (!store || store.size() === 0) return undefined;
      if (!smallest || store.size() < smallest.size()) {
        smallest = store;
      }
    }
    return smallest;
  }

  /**
   * Visit matches until the callback returns true
   * 遍历匹配项，直到回调返回true
   */
  private each(cb: (e: Entity, components: Ts) => boolean | void): void {
    const driver = this.driver();
    if (!driver) return;

    this.world._enterIteration();
    try {
      for (const e of driver.entities()) {
        const args: unknown[] = [];
        for (const store of this.stores) {
          const value = store?.get(e);
          if (value === undefined) break;
          args.push(value);
        }
        if (args.length !== this.stores.length) continue;

        if (cb(e, args as Ts) === true) return;
      }
    } finally {
      this.world._leaveIteration();
    }
  }

  /**
   * Iterate over matching entities with component data
   * 遍历匹配的实体及其组件数据
   */
  forEach(cb: (e: Entity, ...components: Ts) => void): void {
    this.each((e, components) => {
      cb(e, ...components);
    });
  }

  count(): number {
    let total = 0;
    this.each(() => {
      total++;
    });
    return total;
  }

  /**
   * Check if any entity matches predicate
   * 检查是否有实体匹配谓词
   */
  some(predicate?: (e: Entity, ...components: Ts) => boolean): boolean {
    let found = false;
    this.each((e, components) => {
      found = !predicate || predicate(e, ...components);
      return found;
    });
    return found;
  }

  /**
   * Get first matching entity and components
   * 获取第一个匹配的实体和组件
   */
  first(): [Entity, ...Ts] | undefined {
    let result: [Entity, ...Ts] | undefined;
    this.each((e, components) => {
      result = [e, ...components];
      return true;
    });
    return result;
  }

  toArray(): Array<[Entity, ...Ts]> {
    const results: Array<[Entity, ...Ts]> = [];
    this.each((e, components) => {
      results.push([e, ...components]);
    });
    return results;
  }

  map<R>(mapper: (e: Entity, ...components: Ts) => R): R[] {
    const results: R[] = [];
    this.each((e, components) => {
      results.push(mapper(e, ...components));
    });
    return results;
  }
}
