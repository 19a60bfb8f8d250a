/**
 * Position integration, run once per substep
 * 位置积分，每个子步运行一次
 *
 * position += velocity, then each axis is clamped to
 * [-overscan, fieldSize + overscan]. No delta time: the substep count
 * alone sets the simulation rate.
 * position += velocity，然后各轴夹紧到[-overscan, fieldSize + overscan]。
 * 不使用dt：模拟速率只由子步数决定。
 */

import { system } from '../core/System';
import type { SystemContext } from '../core/System';
import { Transform } from '../components/Transform';
import { ArenaConfig } from '../resources/ArenaConfig';
import { clamp } from '../math/vec2';

export const IntegrateTransformsSystem = system(
  'physics.integrate',
  (ctx: SystemContext) => {
    const { world } = ctx;
    const cfg = world.requireResource(ArenaConfig);

    const min = -cfg.overscan;
    const maxX = cfg.width + cfg.overscan;
    const maxY = cfg.height + cfg.overscan;

    world.query(Transform).forEach((_e, t) => {
      t.position.x = clamp(t.position.x + t.velocity.x, min, maxX);
      t.position.y = clamp(t.position.y + t.velocity.y, min, maxY);
    });
  }
)
  .stage('update')
  .inSet('physics')
  .build();
