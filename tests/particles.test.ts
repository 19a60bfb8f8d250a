/**
 * Tests for particle storage
 * 粒子存储测试
 */

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { ParticleStorage } from '../src/particles/ParticleStorage';
import type { ParticleBurst } from '../src/particles/ParticleStorage';
import { WHITE, RED } from '../src/particles/Color';
import { PRNG } from '../src/determinism/PRNG';

function burst(overrides: Partial<ParticleBurst> = {}): ParticleBurst {
  return {
    position: { x: 0, y: 0 },
    velocity: { x: 1, y: -2 },
    size: 4,
    color: WHITE,
    age: 1,
    ...overrides,
  };
}

describe('ParticleStorage', () => {
  let particles: ParticleStorage;

  beforeEach(() => {
    particles = new ParticleStorage(new PRNG(99));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('should prune a whole burst once its age has passed', () => {
    particles.emit(10, burst({ age: 1 }), 5);
    expect(particles.count).toBe(10);

    expect(particles.prune(5.5)).toBe(0);
    expect(particles.count).toBe(10);

    expect(particles.prune(6.01)).toBe(10);
    expect(particles.count).toBe(0);
  });

  test('should prune particles whose death time equals now', () => {
    particles.emit(1, burst({ age: 1 }), 5);
    expect(particles.prune(6)).toBe(1);
  });

  test('should spread death times across the age jitter', () => {
    particles.emit(200, burst({ age: 1, ageJitter: 0.5 }), 10);

    const deaths = particles.all().map(p => p.deathtime);
    for (const d of deaths) {
      expect(d).toBeGreaterThanOrEqual(10.5);
      expect(d).toBeLessThanOrEqual(11.5);
    }
    expect(Math.min(...deaths)).toBeLessThan(10.7);
    expect(Math.max(...deaths)).toBeGreaterThan(11.3);
  });

  test('should apply independent jitter per axis', () => {
    particles.emit(
      100,
      burst({
        position: { x: 50, y: 50 },
        positionJitter: { x: 10, y: 0 },
        velocityJitter: { x: 0, y: 2 },
        sizeJitter: 1,
      }),
      0
    );

    for (const p of particles.all()) {
      expect(Math.abs(p.position.x - 50)).toBeLessThanOrEqual(10);
      expect(p.position.y).toBe(50);
      expect(p.velocity.x).toBe(1);
      expect(Math.abs(p.velocity.y + 2)).toBeLessThanOrEqual(2);
      expect(Math.abs(p.size - 4)).toBeLessThanOrEqual(1);
      expect(p.birthtime).toBe(0);
      expect(p.deathtime).toBe(1);
    }
  });

  test('should ignore non-positive counts and truncate fractional ones', () => {
    particles.emit(0, burst(), 0);
    particles.emit(-3, burst(), 0);
    expect(particles.count).toBe(0);

    particles.emit(2.9, burst(), 0);
    expect(particles.count).toBe(2);
  });

  test('should copy the base position', () => {
    const position = { x: 1, y: 1 };
    particles.emit(1, burst({ position }), 0);
    position.x = 100;
    expect(particles.all()[0].position.x).toBe(1);
  });

  test('should move particles by their velocity on advance', () => {
    particles.emit(1, burst({ position: { x: 10, y: 10 }, velocity: { x: 1, y: -2 } }), 0);
    particles.advance();
    particles.advance();
    expect(particles.all()[0].position).toEqual({ x: 12, y: 6 });
  });

  test('should report remaining life for drawing', () => {
    particles.emit(1, burst({ age: 2, color: RED, size: 3 }), 0);

    expect(particles.view(0)[0].life).toBe(1);
    expect(particles.view(1)[0]).toEqual({ x: 0, y: 0, size: 3, color: RED, life: 0.5 });
    expect(particles.view(5)[0].life).toBe(0);
  });

  test('should evict the oldest particles past the cap', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const capped = new ParticleStorage(new PRNG(1), 5);

    capped.emit(3, burst({ size: 1 }), 0);
    capped.emit(4, burst({ size: 2 }), 0);
    capped.emit(1, burst({ size: 3 }), 0);

    expect(capped.all().map(p => p.size)).toEqual([2, 2, 2, 2, 3]);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('[Particles] cap of 5 reached, evicting oldest particles');
  });

  test('should not cap with an infinite limit', () => {
    const unbounded = new ParticleStorage(new PRNG(1), Infinity);
    unbounded.emit(10000, burst(), 0);
    expect(unbounded.count).toBe(10000);
  });

  test('should clear everything', () => {
    particles.emit(5, burst(), 0);
    particles.clear();
    expect(particles.count).toBe(0);
  });
});
