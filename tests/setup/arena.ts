/**
 * Shared fixtures for system tests
 * 系统测试共用的夹具
 */

import { World } from '../../src/core/World';
import { Scheduler } from '../../src/core/Scheduler';
import type { SystemConfig } from '../../src/core/System';
import { ArenaConfig } from '../../src/resources/ArenaConfig';
import type { ArenaOptions } from '../../src/resources/ArenaConfig';
import { Input, InputState } from '../../src/resources/Input';
import { installMatchResources } from '../../src/game/Match';

export interface Arena {
  world: World;
  config: ArenaConfig;
  input: InputState;
}

/**
 * World with every match resource installed and no entities
 * 安装了所有比赛资源且没有实体的World
 */
export function createArena(opts: ArenaOptions = {}): Arena {
  const config = new ArenaConfig(opts);
  const world = new World({ strict: config.strict });
  installMatchResources(world, config);
  const input = new InputState();
  world.requireResource(Input).source = input;
  return { world, config, input };
}

/**
 * Run a single system through a scheduler so its command buffer is flushed
 * 通过调度器运行单个系统，以便flush其命令缓冲
 */
export function runSystem(world: World, sys: SystemConfig, substep = 0): void {
  new Scheduler().add(sys).runStage(world, sys.stage, substep);
}
