/**
 * Tests for World entity store
 * World实体存储测试
 */

import { describe, test, expect, expectTypeOf, beforeEach, vi, afterEach } from 'vitest';
import { World } from '../../src/core/World';
import { EntityNotFoundError } from '../../src/core/Errors';
import { Transform } from '../../src/components/Transform';
import { Ball } from '../../src/components/Ball';
import { Bounds } from '../../src/components/Bounds';
import { Bullet } from '../../src/components/Bullet';
import { indexOf, genOf } from '../../src/utils/Types';
import type { DeepReadonly } from '../../src/utils/Types';

describe('World', () => {
  let world: World;

  beforeEach(() => {
    world = new World();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('should spawn entities with their component bundle', () => {
    const e = world.spawn(new Transform(1, 2, 3, 4), new Ball(16, 1));

    expect(world.isAlive(e)).toBe(true);
    expect(world.entityCount).toBe(1);
    expect(world.get(e, Transform)?.position).toEqual({ x: 1, y: 2 });
    expect(world.get(e, Ball)?.radius).toBe(16);
    expect(world.has(e, Bounds)).toBe(false);
    expect(world.get(e, Bounds)).toBeUndefined();
  });

  test('should reject two components of the same type in one bundle', () => {
    expect(() => world.spawn(new Transform(), new Transform())).toThrow(
      '[World] spawn: duplicate component Transform in bundle'
    );
    expect(world.entityCount).toBe(0);
  });

  test('should reject plain objects as components', () => {
    expect(() => world.spawn({ x: 1 })).toThrow('[ComponentRegistry]');
  });

  test('should despawn entities and drop their components', () => {
    const a = world.spawn(new Transform(), new Ball());
    const b = world.spawn(new Transform(), new Ball());

    world.despawn(a);

    expect(world.isAlive(a)).toBe(false);
    expect(world.query(Transform, Ball).toArray().map(([e]) => e)).toEqual([b]);
  });

  test('should throw EntityNotFoundError on double despawn in strict mode', () => {
    const e = world.spawn(new Transform());
    world.despawn(e);

    expect(() => world.despawn(e)).toThrow(EntityNotFoundError);
    try {
      world.despawn(e);
    } catch (err) {
      expect(err).toBeInstanceOf(EntityNotFoundError);
      if (err instanceof EntityNotFoundError) {
        expect(err.entity).toBe(e);
        expect(err.message).toBe(`[World] despawn: entity ${e} does not exist`);
      }
    }
  });

  test('should throw on get of a dead entity in strict mode', () => {
    const e = world.spawn(new Transform());
    world.despawn(e);
    expect(() => world.get(e, Transform)).toThrow(EntityNotFoundError);
  });

  test('should warn and ignore stale handles in lenient mode', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const lenient = new World({ strict: false });
    const e = lenient.spawn(new Transform());
    lenient.despawn(e);

    expect(() => lenient.despawn(e)).not.toThrow();
    expect(lenient.get(e, Transform)).toBeUndefined();
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenNthCalledWith(1, `[World] despawn: entity ${e} does not exist (ignored)`);
  });

  test('should recycle slots with a new generation', () => {
    const a = world.spawn(new Transform());
    world.despawn(a);
    const b = world.spawn(new Transform());

    expect(indexOf(b)).toBe(indexOf(a));
    expect(genOf(b)).toBe(genOf(a) + 1);
    expect(world.isAlive(a)).toBe(false);
    expect(world.isAlive(b)).toBe(true);
    expect(world.has(a, Transform)).toBe(false);
  });

  test('should iterate queries in creation order', () => {
    const a = world.spawn(new Transform(), new Ball());
    const b = world.spawn(new Transform(), new Bounds());
    const c = world.spawn(new Transform(), new Ball());
    const d = world.spawn(new Ball());

    expect(world.query(Transform).map(e => e)).toEqual([a, b, c]);
    expect(world.query(Transform, Ball).map(e => e)).toEqual([a, c]);
    expect(world.query(Ball).map(e => e)).toEqual([a, c, d]);
  });

  test('should keep creation order after despawning from the middle', () => {
    const a = world.spawn(new Transform());
    const b = world.spawn(new Transform());
    const c = world.spawn(new Transform());
    world.despawn(b);
    const d = world.spawn(new Transform());

    expect(world.query(Transform).map(e => e)).toEqual([a, c, d]);
  });

  test('should iterate read-only views like queries', () => {
    const a = world.spawn(new Transform(1, 2, 3, 4), new Ball(16, 2));
    world.spawn(new Transform(), new Bounds());
    const c = world.spawn(new Transform(5, 6), new Ball(8, 1));

    const rows = world.view(Transform, Ball).toArray();

    expect(rows.map(([e]) => e)).toEqual([a, c]);
    expect(rows.map(([, t, b]) => [t.position.x, t.velocity.y, b.radius])).toEqual([
      [1, 4, 16],
      [5, 0, 8],
    ]);
    expectTypeOf(rows[0][1]).toEqualTypeOf<DeepReadonly<Transform>>();
    expectTypeOf(rows[0][1].position).toEqualTypeOf<{ readonly x: number; readonly y: number }>();
  });

  test('should guard views against structural changes', () => {
    world.spawn(new Transform());
    expect(() =>
      world.view(Transform).forEach(() => {
        world.spawn(new Bullet());
      })
    ).toThrow('[World] Structural changes must go through CommandBuffer during iteration.');
  });

  test('should allow reading one component while mutating another', () => {
    world.spawn(new Transform(0, 0, 0, 0), new Ball(16, 2));

    world.query(Transform, Ball).forEach((_e, t, b) => {
      t.velocity.x = b.speed;
    });

    const [, t] = world.query(Transform).first() ?? [];
    expect(t?.velocity.x).toBe(2);
  });

  test('should return nothing for queries over unused component types', () => {
    world.spawn(new Transform());
    expect(world.query(Transform, Bullet).count()).toBe(0);
    expect(world.query(Bullet).first()).toBeUndefined();
    expect(world.query(Transform, Bullet).some()).toBe(false);
  });

  test('should forbid structural changes during iteration', () => {
    world.spawn(new Transform());
    world.spawn(new Transform());

    expect(() =>
      world.query(Transform).forEach(() => {
        world.spawn(new Bullet());
      })
    ).toThrow('[World] Structural changes must go through CommandBuffer during iteration.');

    // The guard is released after a throwing callback
    expect(() => world.spawn(new Bullet())).not.toThrow();
  });

  test('should defer structural changes through the command buffer', () => {
    const a = world.spawn(new Transform());
    const cmd = world.cmd();

    world.query(Transform).forEach(e => {
      cmd.despawn(e);
      cmd.spawn(new Bullet(3));
    });

    expect(world.isAlive(a)).toBe(true);
    const spawned = cmd.flush();

    expect(world.isAlive(a)).toBe(false);
    expect(spawned).toHaveLength(1);
    expect(world.get(spawned[0], Bullet)?.radius).toBe(3);
  });

  test('should clear all entities but keep resources', () => {
    class Score {
      value = 7;
    }
    const a = world.spawn(new Transform(), new Ball());
    world.spawn(new Transform(), new Bounds());
    world.setResource(Score, new Score());

    world.clear();

    expect(world.entityCount).toBe(0);
    expect(world.isAlive(a)).toBe(false);
    expect(world.query(Transform).count()).toBe(0);
    expect(world.getResource(Score)?.value).toBe(7);

    const b = world.spawn(new Transform());
    expect(world.isAlive(a)).toBe(false);
    expect(world.isAlive(b)).toBe(true);
    expect(indexOf(b)).toBe(1);
  });

  test('should store resources keyed by class', () => {
    class Clock {
      now = 0;
    }
    expect(world.getResource(Clock)).toBeUndefined();
    expect(() => world.requireResource(Clock)).toThrow('[World] missing resource Clock');

    world.setResource(Clock, new Clock());
    world.requireResource(Clock).now = 5;
    expect(world.getResource(Clock)?.now).toBe(5);
  });

  test('should count frames from 1', () => {
    expect(world.frame).toBe(1);
    world.beginFrame();
    expect(world.frame).toBe(2);
  });
});
