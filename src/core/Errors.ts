/**
 * Error types raised by the entity store
 * 实体存储抛出的错误类型
 */

import type { Entity } from '../utils/Types';

/**
 * Raised when an operation targets an entity that is not alive, usually a
 * double despawn inside one pass.
 * 操作的目标实体不存在时抛出，通常是同一轮内重复销毁。
 */
export class EntityNotFoundError extends Error {
  readonly entity: Entity;

  constructor(entity: Entity, operation: string) {
    super(`[World] ${operation}: entity ${entity} does not exist`);
    this.name = 'EntityNotFoundError';
    this.entity = entity;
  }
}
