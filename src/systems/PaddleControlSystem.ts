/**
 * Paddle steering and firing
 * 球拍操控与射击
 *
 * Every substep each paddle is damped by 0.95, then steered by its control
 * scheme: a player binding accelerates by ±0.3 and fires on left xor right,
 * the AI chases the nearest ball. Each paddle leaves one trail particle.
 * 每个子步先以0.95阻尼球拍速度，再按控制方式操控：玩家按键加速±0.3并在左右键异或时射击，
 * AI追逐最近的球。每个球拍留下一个拖尾粒子。
 */

import { system } from '../core/System';
import type { SystemContext } from '../core/System';
import type { Entity } from '../utils/Types';
import { Transform } from '../components/Transform';
import { Ball } from '../components/Ball';
import { Bullet } from '../components/Bullet';
import { Controller } from '../components/Controller';
import type { PlayerControl } from '../components/Controller';
import { ArenaConfig } from '../resources/ArenaConfig';
import { SimClock } from '../resources/SimClock';
import { Input, anyHeld } from '../resources/Input';
import type { InputSource } from '../resources/Input';
import { PRNG } from '../determinism/PRNG';
import { ParticleStorage } from '../particles/ParticleStorage';
import { BLACK } from '../particles/Color';
import { GameEvents } from '../events/Types';
import type { Vec2 } from '../math/vec2';
import { ZERO2, clamp } from '../math/vec2';
import { squaredDistance } from '../math/geometry';
import type { CommandBuffer } from '../core/CommandBuffer';

export const PADDLE_DAMPING = 0.95;
export const PLAYER_ACCEL = 0.3;
export const AI_MAX_ACCEL = 0.25;
export const BULLET_OFFSET = 32;
export const BULLET_SPEED = 2;
export const BULLET_SPREAD = 0.1;

interface FireContext {
  cmd: CommandBuffer;
  rng: PRNG;
  events: GameEvents;
  now: number;
  cooldown: number;
}

function steerPlayer(
  e: Entity,
  t: Transform,
  scheme: PlayerControl,
  input: InputSource,
  fire: FireContext
): void {
  const { up, down, left, right } = scheme.bindings;
  const vertical = Number(anyHeld(input, down)) - Number(anyHeld(input, up));
  t.velocity.y += vertical * PLAYER_ACCEL;

  const r = anyHeld(input, right);
  const l = anyHeld(input, left);
  if (r === l || !(fire.now > scheme.nextFireTime)) return;

  scheme.nextFireTime = fire.now + fire.cooldown;
  const direction = r ? 1 : -1;
  const x = t.position.x + direction * BULLET_OFFSET;
  const y = t.position.y;
  fire.cmd.spawn(
    new Transform(x, y, direction * BULLET_SPEED, fire.rng.range(-BULLET_SPREAD, BULLET_SPREAD)),
    new Bullet(2)
  );
  fire.events.emit({ type: 'bulletFired', shooter: e, x, y, direction });
}

/**
 * Accelerate toward the nearest ball; the first ball wins distance ties
 * 向最近的球加速；距离相同时取第一个球
 */
function steerAI(t: Transform, balls: readonly Vec2[], fieldWidth: number): void {
  let target: Vec2 | undefined;
  let best = Infinity;
  for (const b of balls) {
    const d = squaredDistance(t.position, b);
    if (d < best) {
      best = d;
      target = b;
    }
  }
  if (!target) return;

  const sign = Math.sign(target.y - t.position.y);
  const accel = (sign * 60 * Math.sqrt(best)) / fieldWidth;
  t.velocity.y += clamp(accel, -AI_MAX_ACCEL, AI_MAX_ACCEL);
}

export const PaddleControlSystem = system(
  'control.paddles',
  (ctx: SystemContext) => {
    const { world } = ctx;
    const cfg = world.requireResource(ArenaConfig);
    const now = world.requireResource(SimClock).now;
    const input = world.requireResource(Input).source;
    const particles = world.requireResource(ParticleStorage);

    const fire: FireContext = {
      cmd: ctx.commandBuffer,
      rng: world.requireResource(PRNG),
      events: world.requireResource(GameEvents),
      now,
      cooldown: cfg.fireCooldown,
    };

    // Ball positions are copied before any paddle moves
    // 在任何球拍移动之前复制球的位置
    const balls = world.view(Transform, Ball).map((_e, t) => ({ x: t.position.x, y: t.position.y }));

    world.query(Transform, Controller).forEach((e, t, c) => {
      t.velocity.x *= PADDLE_DAMPING;
      t.velocity.y *= PADDLE_DAMPING;

      const scheme = c.scheme;
      switch (scheme.kind) {
        case 'player':
          steerPlayer(e, t, scheme, input, fire);
          break;
        case 'ai':
          steerAI(t, balls, cfg.width);
          break;
      }

      particles.emit(
        1,
        {
          position: t.position,
          velocity: ZERO2,
          size: 16,
          color: BLACK,
          age: 0.5,
          velocityJitter: { x: 0.2, y: 0.2 },
        },
        now
      );
    });
  }
)
  .stage('update')
  .inSet('physics')
  .after('physics.integrate')
  .build();
