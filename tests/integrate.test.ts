/**
 * Tests for position integration
 * 位置积分测试
 */

import { describe, test, expect } from 'vitest';
import { IntegrateTransformsSystem } from '../src/systems/IntegrateTransformsSystem';
import { Transform } from '../src/components/Transform';
import { createArena, runSystem } from './setup/arena';

describe('IntegrateTransformsSystem', () => {
  test('should add velocity to position once per run', () => {
    const { world } = createArena();
    const e = world.spawn(new Transform(100, 100, 5, -3));

    runSystem(world, IntegrateTransformsSystem);
    expect(world.get(e, Transform)?.position).toEqual({ x: 105, y: 97 });

    runSystem(world, IntegrateTransformsSystem);
    runSystem(world, IntegrateTransformsSystem);
    expect(world.get(e, Transform)?.position).toEqual({ x: 115, y: 91 });
  });

  test('should clamp to the overscan margin and keep velocity', () => {
    const { world } = createArena({ width: 1280, height: 720 });
    const e = world.spawn(new Transform(1290, -10, 10, -10));

    runSystem(world, IntegrateTransformsSystem);

    const t = world.get(e, Transform);
    expect(t?.position).toEqual({ x: 1296, y: -16 });
    expect(t?.velocity).toEqual({ x: 10, y: -10 });
  });

  test('should use the configured overscan', () => {
    const { world } = createArena({ width: 100, height: 50, overscan: 0 });
    const e = world.spawn(new Transform(95, 45, 10, 10));

    runSystem(world, IntegrateTransformsSystem);
    expect(world.get(e, Transform)?.position).toEqual({ x: 100, y: 50 });
  });
});
