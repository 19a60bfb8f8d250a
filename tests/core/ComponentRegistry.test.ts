/**
 * Tests for component type registration
 * 组件类型注册测试
 */

import { describe, test, expect } from 'vitest';
import {
  registerComponent,
  getComponentType,
  typeIdOfInstance,
  nameOfTypeId,
} from '../../src/core/ComponentRegistry';

describe('ComponentRegistry', () => {
  test('should assign stable ids per constructor', () => {
    class Health {
      hp = 10;
    }
    class Armor {
      value = 2;
    }

    const h1 = getComponentType(Health);
    const h2 = getComponentType(Health);
    const a = getComponentType(Armor);

    expect(h1.id).toBe(h2.id);
    expect(h1.ctor).toBe(Health);
    expect(a.id).not.toBe(h1.id);
  });

  test('should resolve instance ids from their constructor', () => {
    class Marker {}
    expect(typeIdOfInstance(new Marker())).toBe(getComponentType(Marker).id);
    expect(nameOfTypeId(getComponentType(Marker).id)).toBe('Marker');
  });

  test('should honor explicit ids and reject collisions', () => {
    class Pinned {}
    class Intruder {}

    expect(registerComponent(Pinned, 9001).id).toBe(9001);
    expect(getComponentType(Pinned).id).toBe(9001);
    expect(() => registerComponent(Intruder, 9001)).toThrow(
      '[ComponentRegistry] id 9001 already occupied by Pinned'
    );
  });

  test('should reject plain objects', () => {
    expect(() => typeIdOfInstance({})).toThrow(
      '[ComponentRegistry] components must be class instances, got a plain object'
    );
  });

  test('should describe unknown ids', () => {
    expect(nameOfTypeId(123456)).toBe('#123456');
  });
});
