/**
 * Collision resolution, run once per substep after integration and control
 * 碰撞结算，每个子步在积分和操控之后运行一次
 *
 * Pass order:
 * 1. Copy balls, paddles and bullets into plain snapshots
 * 2. Bullets vs balls, then bullets vs paddles (every hit resolves)
 * 3. Despawn spent bullets, +1 hitstun per resolved hit
 * 4. Per ball: goal check, wall bounce, paddle hits, intensity and trail
 * 5. intensity *= 4
 *
 * 结算顺序：
 * 1. 将球、球拍和子弹复制为普通快照
 * 2. 子弹对球，再子弹对球拍（每次命中都结算）
 * 3. 移除已命中的子弹，每次命中硬直+1
 * 4. 逐球：进球检测、墙壁反弹、球拍碰撞、强度与拖尾
 * 5. intensity *= 4
 */

import { system } from '../core/System';
import type { SystemContext } from '../core/System';
import type { World } from '../core/World';
import type { Entity, DeepReadonly } from '../utils/Types';
import { Transform } from '../components/Transform';
import { Ball } from '../components/Ball';
import { Bullet } from '../components/Bullet';
import { Bounds } from '../components/Bounds';
import { ArenaConfig } from '../resources/ArenaConfig';
import { MatchState } from '../resources/MatchState';
import { SimClock } from '../resources/SimClock';
import { ParticleStorage } from '../particles/ParticleStorage';
import type { ParticleBurst } from '../particles/ParticleStorage';
import { WHITE, BLACK, RED, BLUE } from '../particles/Color';
import { GameEvents } from '../events/Types';
import type { Side } from '../events/Types';
import type { Vec2 } from '../math/vec2';
import { ZERO2, clamp, scale } from '../math/vec2';
import { squaredDistance, sphereCapsuleOverlap, redirect } from '../math/geometry';

interface BodySnapshot {
  entity: Entity;
  position: Vec2;
  velocity: Vec2;
}

interface BallSnapshot extends BodySnapshot {
  radius: number;
}

interface BulletSnapshot extends BodySnapshot {
  radius: number;
}

interface PaddleSnapshot extends BodySnapshot {
  halfWidth: number;
  halfHeight: number;
}

function body(e: Entity, t: DeepReadonly<Transform>): BodySnapshot {
  return {
    entity: e,
    position: { x: t.position.x, y: t.position.y },
    velocity: { x: t.velocity.x, y: t.velocity.y },
  };
}

/**
 * Three white sparks where a bullet lands, thrown along the struck body
 * 子弹命中处的三个白色火花，沿被击物体的速度方向抛出
 */
function impactBurst(at: Readonly<Vec2>, struckVelocity: Readonly<Vec2>): ParticleBurst {
  return {
    position: at,
    velocity: scale(struckVelocity, 2),
    size: 8,
    color: WHITE,
    age: 0.3,
    positionJitter: { x: 0.1, y: 0.1 },
    velocityJitter: { x: 4, y: 8 },
    sizeJitter: 0.5,
    ageJitter: 0.25,
  };
}

/**
 * Axis offset divided by the paddle extent; a zero extent contributes 0
 * 轴向偏移除以球拍尺寸；尺寸为0时贡献0
 */
function normalizedOffset(delta: number, extent: number): number {
  return extent === 0 ? 0 : delta / extent;
}

function scoreGoal(
  world: World,
  ball: Entity,
  t: Transform,
  scorer: Side,
  state: MatchState,
  events: GameEvents,
  particles: ParticleStorage,
  now: number
): void {
  const from = state.phase;
  if (scorer === 'left') {
    state.phase = 'leftWin';
    state.leftScore += 1;
  } else {
    state.phase = 'rightWin';
    state.rightScore += 1;
  }

  const ax = Math.abs(t.velocity.x);
  const ay = Math.abs(t.velocity.y);
  particles.emit(
    100,
    {
      position: t.position,
      velocity: { x: -t.velocity.x, y: -t.velocity.y },
      size: 4 * (ax + ay),
      color: scorer === 'left' ? RED : BLUE,
      age: 3,
      positionJitter: { x: 0.1, y: 0.1 },
      velocityJitter: { x: 2 + ax, y: 8 + ax },
      sizeJitter: ax,
      ageJitter: 1,
    },
    now
  );

  events.emit({ type: 'goal', scorer, leftScore: state.leftScore, rightScore: state.rightScore });
  events.emit({ type: 'phaseChanged', from, to: state.phase });
  world.despawn(ball);
}

export const CollisionResolveSystem = system(
  'physics.collide',
  (ctx: SystemContext) => {
    const { world } = ctx;
    const cfg = world.requireResource(ArenaConfig);
    const state = world.requireResource(MatchState);
    const now = world.requireResource(SimClock).now;
    const particles = world.requireResource(ParticleStorage);
    const events = world.requireResource(GameEvents);

    const balls: BallSnapshot[] = world
      .view(Transform, Ball)
      .map((e, t, b) => ({ ...body(e, t), radius: b.radius }));
    const paddles: PaddleSnapshot[] = world
      .view(Transform, Bounds)
      .map((e, t, b) => ({ ...body(e, t), halfWidth: b.halfWidth, halfHeight: b.halfHeight }));
    const bullets: BulletSnapshot[] = world
      .view(Transform, Bullet)
      .map((e, t, b) => ({ ...body(e, t), radius: b.radius }));

    // Bullets
    // 子弹
    const spent = new Set<Entity>();
    let bulletHits = 0;

    for (const bullet of bullets) {
      for (const ball of balls) {
        if (squaredDistance(bullet.position, ball.position) >= ball.radius * ball.radius) continue;

        const t = world.get(ball.entity, Transform);
        const b = world.get(ball.entity, Ball);
        if (!t || !b) continue;

        const v = redirect(
          {
            x: (ball.position.x - bullet.position.x) / 2 + bullet.velocity.x * 0.25,
            y: (ball.position.y - bullet.position.y) / 2 + bullet.velocity.y * 0.25,
          },
          b.speed
        );
        if (v) {
          t.velocity.x = v.x;
          t.velocity.y = v.y;
        }

        particles.emit(3, impactBurst(bullet.position, t.velocity), now);
        events.emit({ type: 'bulletBallHit', bullet: bullet.entity, ball: ball.entity });
        spent.add(bullet.entity);
        bulletHits++;
      }

      for (const paddle of paddles) {
        if (
          !sphereCapsuleOverlap(
            bullet.position,
            bullet.radius,
            paddle.position,
            paddle.halfWidth,
            paddle.halfHeight
          )
        ) {
          continue;
        }

        const bounds = world.get(paddle.entity, Bounds);
        if (!bounds) continue;
        bounds.halfHeight = Math.max(0, bounds.halfHeight - 1);

        particles.emit(3, impactBurst(bullet.position, paddle.velocity), now);
        events.emit({
          type: 'bulletPaddleHit',
          bullet: bullet.entity,
          paddle: paddle.entity,
          halfHeight: bounds.halfHeight,
        });
        spent.add(bullet.entity);
        bulletHits++;
      }
    }

    for (const e of spent) {
      world.despawn(e);
    }
    state.hitstun += bulletHits;

    // Balls
    // 球
    state.intensity = 0;

    for (const ball of balls) {
      const t = world.get(ball.entity, Transform);
      const b = world.get(ball.entity, Ball);
      if (!t || !b) continue;

      if (state.phase === 'ongoing') {
        const scorer: Side | undefined =
          t.position.x > cfg.width ? 'left' : t.position.x < 0 ? 'right' : undefined;
        if (scorer) {
          scoreGoal(world, ball.entity, t, scorer, state, events, particles, now);
          continue;
        }
      }

      if (t.position.y < 0 || t.position.y > cfg.height) {
        t.velocity.y = -t.velocity.y;
        t.position.y = clamp(t.position.y, 0, cfg.height);
        events.emit({ type: 'wallBounce', ball: ball.entity });
      }

      for (const paddle of paddles) {
        if (
          !sphereCapsuleOverlap(
            t.position,
            b.radius,
            paddle.position,
            paddle.halfWidth,
            paddle.halfHeight
          )
        ) {
          continue;
        }

        b.speed += 0.5 / b.speed;
        const v = redirect(
          {
            x:
              normalizedOffset(t.position.x - paddle.position.x, paddle.halfWidth) +
              paddle.velocity.x * 0.25,
            y:
              normalizedOffset(t.position.y - paddle.position.y, paddle.halfHeight) +
              paddle.velocity.y * 0.25,
          },
          b.speed
        );
        if (v) {
          t.velocity.x = v.x;
          t.velocity.y = v.y;
        }

        const ax = Math.abs(t.velocity.x);
        particles.emit(
          ax,
          {
            position: t.position,
            velocity: scale(t.velocity, 2),
            size: 4 * ax,
            color: WHITE,
            age: 0.3,
            positionJitter: { x: 0.1, y: 0.1 },
            velocityJitter: { x: 2 + ax, y: 4 + ax },
            sizeJitter: 0.25 * ax,
            ageJitter: 0.25,
          },
          now
        );

        state.hitstun += Math.round(b.speed * 2);
        events.emit({ type: 'ballPaddleHit', ball: ball.entity, paddle: paddle.entity, speed: b.speed });
      }

      state.intensity += b.speed;
      particles.emit(
        1,
        {
          position: t.position,
          velocity: ZERO2,
          size: 16,
          color: BLACK,
          age: state.intensity / 4,
          velocityJitter: { x: 0.2, y: 0.2 },
        },
        now
      );
    }

    state.intensity *= 4;
  }
)
  .stage('update')
  .inSet('physics')
  .after('control.paddles')
  .build();
