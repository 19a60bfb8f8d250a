/**
 * Arena configuration resource
 * 场地配置资源
 */

import type { DirectionBindings } from '../components/Controller';
import { WASD } from '../components/Controller';

/**
 * How a paddle is driven
 * 球拍的驱动方式
 */
export type PaddleSetup = { kind: 'player'; bindings: DirectionBindings } | { kind: 'ai' };

export interface ArenaOptions {
  /** Field width in units, default 1280 场地宽度，默认1280 */
  width?: number;
  /** Field height in units, default 720 场地高度，默认720 */
  height?: number;
  /** Physics substeps per simulated frame, default 3 每个模拟帧的物理子步数，默认3 */
  substeps?: number;
  /** Margin past the field edges that positions are clamped to, default 16 位置夹紧的越界边距，默认16 */
  overscan?: number;
  /** Stale entity handles throw (true) or warn (false), default true 失效句柄抛错(true)或警告(false)，默认true */
  strict?: boolean;
  /** Live particle cap with oldest-first eviction, default 8192 活跃粒子上限（最旧优先淘汰），默认8192 */
  maxParticles?: number;
  /** PRNG seed 随机种子 */
  seed?: number;
  /** Left paddle, default WASD player 左球拍，默认WASD玩家 */
  left?: PaddleSetup;
  /** Right paddle, default AI 右球拍，默认AI */
  right?: PaddleSetup;
  /** Paddle capsule radius, default 16 球拍胶囊半径，默认16 */
  paddleHalfWidth?: number;
  /** Paddle capsule half length at full health, default 64 满血时球拍胶囊半长，默认64 */
  paddleHalfHeight?: number;
  /** Distance of each paddle from its goal line, default 64 球拍与球门线的距离，默认64 */
  paddleInset?: number;
  /** Ball radius, default 16 球半径，默认16 */
  ballRadius?: number;
  /** Seconds between shots, default 0.35 射击间隔（秒），默认0.35 */
  fireCooldown?: number;
}

export const DEFAULT_ARENA_CONFIG: Readonly<Required<ArenaOptions>> = {
  width: 1280,
  height: 720,
  substeps: 3,
  overscan: 16,
  strict: true,
  maxParticles: 8192,
  seed: 0x2F6E2B1,
  left: { kind: 'player', bindings: WASD },
  right: { kind: 'ai' },
  paddleHalfWidth: 16,
  paddleHalfHeight: 64,
  paddleInset: 64,
  ballRadius: 16,
  fireCooldown: 0.35,
};

export class ArenaConfig {
  readonly width: number;
  readonly height: number;
  readonly substeps: number;
  readonly overscan: number;
  readonly strict: boolean;
  readonly maxParticles: number;
  readonly seed: number;
  readonly left: PaddleSetup;
  readonly right: PaddleSetup;
  readonly paddleHalfWidth: number;
  readonly paddleHalfHeight: number;
  readonly paddleInset: number;
  readonly ballRadius: number;
  readonly fireCooldown: number;

  constructor(opts: ArenaOptions = {}) {
    const o: Required<ArenaOptions> = { ...DEFAULT_ARENA_CONFIG, ...opts };

    if (!(o.width > 0) || !(o.height > 0)) {
      throw new Error(`[ArenaConfig] field size must be positive, got ${o.width}x${o.height}`);
    }
    if (!Number.isInteger(o.substeps) || o.substeps < 1) {
      throw new Error(`[ArenaConfig] substeps must be a positive integer, got ${o.substeps}`);
    }
    if (!(o.maxParticles >= 0)) {
      throw new Error(`[ArenaConfig] maxParticles must be >= 0, got ${o.maxParticles}`);
    }

    this.width = o.width;
    this.height = o.height;
    this.substeps = o.substeps;
    this.overscan = o.overscan;
    this.strict = o.strict;
    this.maxParticles = o.maxParticles;
    this.seed = o.seed;
    this.left = o.left;
    this.right = o.right;
    this.paddleHalfWidth = o.paddleHalfWidth;
    this.paddleHalfHeight = o.paddleHalfHeight;
    this.paddleInset = o.paddleInset;
    this.ballRadius = o.ballRadius;
    this.fireCooldown = o.fireCooldown;
  }

  /**
   * Serve speed of a fresh ball, scaled with the field width
   * 新球的发球速度，随场地宽度缩放
   */
  get startSpeed(): number {
    return this.width / 1280;
  }
}
