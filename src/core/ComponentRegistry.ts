/**
 * Component type registration with bidirectional mapping (ctor ↔ id)
 * 组件类型注册，支持双向映射（构造函数 ↔ ID）
 */

import type { ComponentCtor } from '../utils/Types';

/**
 * Component type with stable numeric ID and constructor
 * 具有稳定数字ID和构造函数的组件类型
 */
export interface ComponentType<T> {
  /** Stable numeric type identifier 稳定数字类型ID */
  readonly id: number;
  /** Component constructor 组件构造函数 */
  readonly ctor: ComponentCtor<T>;
}

let _nextTypeId = 1; // 0 reserved 0被预留
const _idByCtor = new Map<Function, number>();
const _nameById = new Map<number, string>();

function assignId(ctor: Function, explicitId?: number): number {
  const known = _idByCtor.get(ctor);
  if (known !== undefined) return known;

  const id = explicitId ?? _nextTypeId++;
  const occupant = _nameById.get(id);
  if (occupant !== undefined) {
    throw new Error(`[ComponentRegistry] id ${id} already occupied by ${occupant}`);
  }

  _idByCtor.set(ctor, id);
  _nameById.set(id, ctor.name);
  return id;
}

/**
 * Register component with optional explicit ID
 * 注册组件，可显式指定ID
 */
export function registerComponent<T extends object>(
  ctor: ComponentCtor<T>,
  explicitId?: number
): ComponentType<T> {
  return { id: assignId(ctor, explicitId), ctor };
}

/**
 * Get component type (auto-register if not registered)
 * 获取组件类型（若未注册则自动注册并分配ID）
 */
export function getComponentType<T extends object>(ctor: ComponentCtor<T>): ComponentType<T> {
  return registerComponent(ctor);
}

/**
 * Resolve the type id of a component instance from its constructor
 * 通过实例的构造函数解析组件类型ID
 */
export function typeIdOfInstance(component: object): number {
  const ctor = component.constructor;
  if (ctor === Object) {
    throw new Error('[ComponentRegistry] components must be class instances, got a plain object');
  }
  return assignId(ctor);
}

/**
 * Get constructor name by type ID, for diagnostics
 * 通过ID获取构造函数名称（用于诊断）
 */
export function nameOfTypeId(id: number): string {
  return _nameById.get(id) ?? `#${id}`;
}
