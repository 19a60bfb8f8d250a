/**
 * Cosmetic particle store: trails, impact bursts and ambient dust
 * 装饰性粒子存储：拖尾、冲击爆发和环境尘埃
 *
 * Key points:
 * - Particles live in emission order, so the front of the list is the oldest
 * - Each emitted particle draws independent uniform jitter per axis
 * - Past maxParticles the oldest particles are evicted first
 *
 * 要点：
 * - 粒子按发射顺序存放，列表头部最旧
 * - 每个粒子在各轴上独立抽取均匀抖动
 * - 超过maxParticles时优先淘汰最旧的粒子
 */

import type { Vec2 } from '../math/vec2';
import { ZERO2 } from '../math/vec2';
import type { PRNG } from '../determinism/PRNG';
import type { Color } from './Color';

export interface Particle {
  position: Vec2;
  velocity: Vec2;
  size: number;
  color: Color;
  /** Absolute simulation time (s) 绝对模拟时间（秒） */
  birthtime: number;
  /** Absolute simulation time (s) 绝对模拟时间（秒） */
  deathtime: number;
}

/**
 * Base values and symmetric jitter for one emission
 * 单次发射的基础值与对称抖动
 */
export interface ParticleBurst {
  position: Readonly<Vec2>;
  velocity: Readonly<Vec2>;
  size: number;
  color: Color;
  /** Lifetime in seconds 寿命（秒） */
  age: number;
  positionJitter?: Readonly<Vec2>;
  velocityJitter?: Readonly<Vec2>;
  sizeJitter?: number;
  /** Offsets the death time around now + age 在now + age附近偏移死亡时间 */
  ageJitter?: number;
}

/**
 * What a renderer needs per particle
 * 渲染器对每个粒子需要的数据
 */
export interface ParticleView {
  x: number;
  y: number;
  size: number;
  color: Color;
  /** Remaining life, 1 at birth and 0 at death 剩余寿命，出生为1，死亡为0 */
  life: number;
}

export class ParticleStorage {
  private items: Particle[] = [];
  private evictionLogged = false;

  constructor(
    private readonly rng: PRNG,
    readonly maxParticles = 8192
  ) {}

  get count(): number {
    return this.items.length;
  }

  /**
   * Emit `count` particles born at `now`
   * 在`now`时刻发射`count`个粒子
   */
  emit(count: number, burst: ParticleBurst, now: number): void {
    const n = Math.trunc(count);
    if (!(n > 0)) return;

    const pj = burst.positionJitter ?? ZERO2;
    const vj = burst.velocityJitter ?? ZERO2;
    const sj = burst.sizeJitter ?? 0;
    const aj = burst.ageJitter ?? 0;
    const rng = this.rng;

    for (let i = 0; i < n; i++) {
      this.items.push({
        position: {
          x: burst.position.x + rng.jitter(pj.x),
          y: burst.position.y + rng.jitter(pj.y),
        },
        velocity: {
          x: burst.velocity.x + rng.jitter(vj.x),
          y: burst.velocity.y + rng.jitter(vj.y),
        },
        size: burst.size + rng.jitter(sj),
        color: burst.color,
        birthtime: now,
        deathtime: now + burst.age + rng.jitter(aj),
      });
    }

    this.enforceCap();
  }

  /**
   * Move every particle by its velocity (once per frame)
   * 按速度移动所有粒子（每帧一次）
   */
  advance(): void {
    for (const p of this.items) {
      p.position.x += p.velocity.x;
      p.position.y += p.velocity.y;
    }
  }

  /**
   * Drop particles whose death time is not after now; returns how many were dropped
   * 移除死亡时间不晚于now的粒子；返回移除数量
   */
  prune(now: number): number {
    const before = this.items.length;
    let w = 0;
    for (const p of this.items) {
      if (p.deathtime > now) {
        this.items[w++] = p;
      }
    }
    this.items.length = w;
    return before - w;
  }

  view(now: number): ParticleView[] {
    return this.items.map(p => {
      const span = p.birthtime - p.deathtime;
      const life = span === 0 ? 0 : Math.min(1, Math.max(0, (now - p.deathtime) / span));
      return { x: p.position.x, y: p.position.y, size: p.size, color: p.color, life };
    });
  }

  all(): readonly Readonly<Particle>[] {
    return this.items;
  }

  clear(): void {
    this.items = [];
  }

  private enforceCap(): void {
    const excess = this.items.length - this.maxParticles;
    if (excess <= 0) return;

    if (!this.evictionLogged) {
      console.warn(`[Particles] cap of ${this.maxParticles} reached, evicting oldest particles`);
      this.evictionLogged = true;
    }
    this.items.splice(0, excess);
  }
}
