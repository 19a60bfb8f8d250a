/**
 * Serve on the start action: start | leftWin | rightWin → ongoing
 * 按下开始键时发球：start | leftWin | rightWin → ongoing
 *
 * Runs in preUpdate, which is skipped on hitstun frames. The ball serves
 * toward the right unless the right side just won.
 * 在preUpdate阶段运行，硬直帧会跳过。除非右方刚赢，否则球发向右侧。
 */

import { system } from '../core/System';
import type { SystemContext } from '../core/System';
import { Transform } from '../components/Transform';
import { Ball } from '../components/Ball';
import { Bounds } from '../components/Bounds';
import { ArenaConfig } from '../resources/ArenaConfig';
import { MatchState } from '../resources/MatchState';
import { Input } from '../resources/Input';
import { GameEvents } from '../events/Types';

export const MatchPhaseSystem = system(
  'match.phase',
  (ctx: SystemContext) => {
    const { world } = ctx;
    const state = world.requireResource(MatchState);
    if (state.phase === 'ongoing') return;
    if (!world.requireResource(Input).source.justPressed('start')) return;

    const cfg = world.requireResource(ArenaConfig);
    const speed = cfg.startSpeed;
    const direction = state.phase === 'rightWin' ? -1 : 1;

    ctx.commandBuffer.spawn(
      new Transform(cfg.width / 2, cfg.height / 2, speed * direction, 0),
      new Ball(cfg.ballRadius, speed)
    );

    world.query(Transform, Bounds).forEach((_e, _t, bounds) => {
      bounds.halfWidth = cfg.paddleHalfWidth;
      bounds.halfHeight = cfg.paddleHalfHeight;
    });

    world.requireResource(GameEvents).emit({ type: 'phaseChanged', from: state.phase, to: 'ongoing' });
    state.phase = 'ongoing';
  }
)
  .stage('preUpdate')
  .build();
