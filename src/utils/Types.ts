/**
 * Common type definitions for the simulation core
 * 模拟核心通用类型定义
 */

/**
 * Entity handle - pure numeric handle with generation
 * 实体句柄 - 带世代号的纯数字句柄
 *
 * Format: 28 bits index + 20 bits generation = 48 bits (< 2^53 safe).
 * Generations wrap at 2^20.
 * 格式：28位索引 + 20位世代号 = 48位（< 2^53安全）。世代号在2^20处回绕。
 */
export type Entity = number;

const INDEX_BITS = 28;
const INDEX_MASK = (1 << INDEX_BITS) - 1;
const INDEX_BASE = 1 << INDEX_BITS;
export const GENERATION_MASK = 0xFFFFF;

/**
 * Create entity handle from index and generation
 * 从索引和世代号创建实体句柄
 */
export function makeEntity(index: number, generation: number): Entity {
  return (generation & GENERATION_MASK) * INDEX_BASE + index;
}

/**
 * Next generation for a recycled slot, wrapping within 20 bits
 * 复用槽位的下一个世代号，在20位内回绕
 */
export function nextGeneration(generation: number): number {
  return (generation + 1) & GENERATION_MASK;
}

/**
 * Extract index from entity handle
 * 从实体句柄提取索引
 */
export function indexOf(entity: Entity): number {
  return entity & INDEX_MASK;
}

/**
 * Extract generation from entity handle
 * 从实体句柄提取世代号
 */
export function genOf(entity: Entity): number {
  return Math.floor(entity / INDEX_BASE);
}

/**
 * Component constructor type. Components are plain classes; the
 * constructor doubles as the component type key.
 * 组件构造函数类型，构造函数同时作为组件类型键
 */
export type ComponentCtor<T = object> = abstract new (...args: never[]) => T;

/**
 * Map a tuple of component constructors to the tuple of their instances
 * 将组件构造函数元组映射为实例元组
 */
export type InstancesOf<Cs extends readonly ComponentCtor<object>[]> = {
  [K in keyof Cs]: Cs[K] extends ComponentCtor<infer T> ? T : never;
};

/**
 * Recursively read-only view of a component
 * 组件的递归只读视图
 */
export type DeepReadonly<T> = T extends (...args: never[]) => unknown
  ? T
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * Like InstancesOf, with every instance read-only
 * 与InstancesOf相同，但每个实例只读
 */
export type ReadonlyInstancesOf<Cs extends readonly ComponentCtor<object>[]> = {
  [K in keyof Cs]: Cs[K] extends ComponentCtor<infer T> ? DeepReadonly<T> : never;
};
