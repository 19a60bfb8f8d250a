/**
 * Tests for system profiler
 * 系统性能分析器测试
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { World } from '../src/core/World';
import { Scheduler } from '../src/core/Scheduler';
import { system } from '../src/core/System';
import { Profiler } from '../src/core/Profiler';

describe('Profiler', () => {
  let profiler: Profiler;

  beforeEach(() => {
    profiler = new Profiler(0.5);
  });

  test('should seed statistics with the first sample', () => {
    profiler.record('physics.integrate', 'update', 4);
    expect(profiler.getStat('physics.integrate', 'update')).toEqual({
      name: 'physics.integrate',
      stage: 'update',
      lastMs: 4,
      avgMs: 4,
      maxMs: 4,
      totalMs: 4,
      calls: 1,
    });
  });

  test('should smooth the average with the EMA factor', () => {
    profiler.record('s', 'update', 4);
    profiler.record('s', 'update', 8);
    profiler.record('s', 'update', 2);

    const stat = profiler.getStat('s', 'update');
    // 4 → 4 + (8-4)*0.5 = 6 → 6 + (2-6)*0.5 = 4
    expect(stat?.avgMs).toBe(4);
    expect(stat?.maxMs).toBe(8);
    expect(stat?.lastMs).toBe(2);
    expect(stat?.totalMs).toBe(14);
    expect(stat?.calls).toBe(3);
  });

  test('should keep the same name in different stages apart', () => {
    profiler.record('s', 'update', 1);
    profiler.record('s', 'postUpdate', 2);
    expect(profiler.getAll()).toHaveLength(2);
  });

  test('should rank systems', () => {
    profiler.record('fast', 'update', 1);
    profiler.record('slow', 'update', 5);
    profiler.record('often', 'update', 2);
    profiler.record('often', 'update', 2);
    profiler.record('often', 'update', 2);

    expect(profiler.topByAvg(2).map(s => s.name)).toEqual(['slow', 'often']);
    expect(profiler.topByTotal(1).map(s => s.name)).toEqual(['often']);
  });

  test('should reset max to the last sample and clear', () => {
    profiler.record('s', 'update', 9);
    profiler.record('s', 'update', 1);
    profiler.resetMax();
    expect(profiler.getStat('s', 'update')?.maxMs).toBe(1);

    profiler.clear();
    expect(profiler.getAll()).toEqual([]);
  });

  test('should reject an out of range smoothing factor', () => {
    expect(() => new Profiler(0)).toThrow('[Profiler] emaAlpha must be in (0, 1], got 0');
  });

  test('should be fed by the scheduler when installed as a resource', () => {
    const world = new World();
    world.setResource(Profiler, profiler);
    const scheduler = new Scheduler().add(system('work', () => {}));

    scheduler.runStage(world, 'update', 0);
    scheduler.runStage(world, 'update', 1);

    expect(profiler.getStat('work', 'update')?.calls).toBe(2);
  });
});
