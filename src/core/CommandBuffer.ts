/**
 * Command buffer for deferred structural changes
 * 延迟结构变更的命令缓冲区
 *
 * Key points:
 * - Spawns and despawns queued while a query is open are applied at flush()
 * - Application order: spawn → despawn
 * - Despawning the same entity twice in one buffer collapses to one despawn
 *
 * 要点：
 * - 查询遍历期间排队的生成与销毁在flush()时统一应用
 * - 应用顺序：spawn → despawn
 * - 同一缓冲内对同一实体的重复销毁合并为一次
 */

import type { World } from './World';
import type { Entity } from '../utils/Types';

export class CommandBuffer {
  private spawns: object[][] = [];
  private despawns = new Set<Entity>();

  constructor(private world: World) {}

  /**
   * Queue an entity with the given component bundle
   * 排队生成带有给定组件包的实体
   */
  spawn(...components: object[]): void {
    this.spawns.push(components);
  }

  /**
   * Queue an entity for removal
   * 排队销毁实体
   */
  despawn(entity: Entity): void {
    this.despawns.add(entity);
  }

  isDespawnQueued(entity: Entity): boolean {
    return this.despawns.has(entity);
  }

  get isEmpty(): boolean {
    return this.spawns.length === 0 && this.despawns.size === 0;
  }

  /**
   * Apply all operations to world, returns the spawned handles
   * 应用到世界，返回新生成的实体句柄
   */
  flush(): Entity[] {
    const spawned: Entity[] = [];
    for (const bundle of this.spawns) {
      spawned.push(this.world.spawn(...bundle));
    }
    for (const entity of this.despawns) {
      this.world.despawn(entity);
    }

    this.spawns = [];
    this.despawns.clear();
    return spawned;
  }
}
