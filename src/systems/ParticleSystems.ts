/**
 * Particle stage: ambient dust and per-frame advance/prune.
 * Runs every frame, hitstun frames included.
 * 粒子阶段：环境尘埃以及每帧的推进/清理。每帧都运行，包括硬直帧。
 */

import { system } from '../core/System';
import type { SystemContext } from '../core/System';
import { ArenaConfig } from '../resources/ArenaConfig';
import { SimClock } from '../resources/SimClock';
import { ParticleStorage } from '../particles/ParticleStorage';
import type { ParticleBurst } from '../particles/ParticleStorage';
import { WHITE } from '../particles/Color';

/** Frames between two ambient dust particles 两个环境尘埃粒子之间的帧数 */
export const AMBIENT_INTERVAL = 8;
/** Dust particles seeded when a match is created 比赛创建时播撒的尘埃数量 */
export const AMBIENT_SEED_COUNT = 125;

function dust(cfg: ArenaConfig, y: number, spreadY: number): ParticleBurst {
  return {
    position: { x: cfg.width / 2, y },
    velocity: { x: 0, y: 0.4 },
    size: 2,
    color: WHITE,
    age: 60,
    positionJitter: { x: cfg.width / 2, y: spreadY },
    velocityJitter: { x: 0, y: 0.2 },
  };
}

/**
 * Scatter the initial dust over the whole field
 * 在整个场地播撒初始尘埃
 */
export function seedAmbientDust(particles: ParticleStorage, cfg: ArenaConfig, now: number): void {
  particles.emit(AMBIENT_SEED_COUNT, dust(cfg, cfg.height / 2, cfg.height / 2), now);
}

export const AmbientDustSystem = system(
  'particles.ambient',
  (ctx: SystemContext) => {
    // world.frame is 2 on the first tick; count ticks from 1
    if ((ctx.frame - 1) % AMBIENT_INTERVAL !== 0) return;
    const { world } = ctx;
    const cfg = world.requireResource(ArenaConfig);
    world.requireResource(ParticleStorage).emit(1, dust(cfg, -4, 0), world.requireResource(SimClock).now);
  }
)
  .stage('postUpdate')
  .inSet('particles')
  .build();

export const ParticleAdvanceSystem = system(
  'particles.advance',
  (ctx: SystemContext) => {
    const { world } = ctx;
    const particles = world.requireResource(ParticleStorage);
    particles.advance();
    particles.prune(world.requireResource(SimClock).now);
  }
)
  .stage('postUpdate')
  .inSet('particles')
  .after('particles.ambient')
  .build();
