/**
 * Function systems and their builder
 * 函数式系统及其构建器
 *
 * @example
 * ```typescript
 * export const IntegrateTransformsSystem = system('physics.integrate', (ctx) => {
 *   ctx.world.query(Transform).forEach((_e, t) => { ... });
 * })
 *   .stage('update')
 *   .inSet('physics')
 *   .build();
 * ```
 */

import type { World } from './World';
import type { CommandBuffer } from './CommandBuffer';

/**
 * Execution stages of one frame.
 * preUpdate runs once per simulated frame, update runs once per substep,
 * postUpdate runs every frame, including frames frozen by hitstun.
 * 单帧的执行阶段。preUpdate每个模拟帧运行一次，update每个子步运行一次，
 * postUpdate每帧都运行（包括被硬直冻结的帧）。
 */
export type SystemStage = 'preUpdate' | 'update' | 'postUpdate';

export const STAGE_ORDER: readonly SystemStage[] = ['preUpdate', 'update', 'postUpdate'];

/**
 * Per-call context handed to a system
 * 传递给系统的单次调用上下文
 */
export interface SystemContext {
  world: World;
  /** Deferred structural changes, flushed after the system 延迟结构变更，系统运行后flush */
  commandBuffer: CommandBuffer;
  /** Current frame number 当前帧号 */
  frame: number;
  /** Substep index within the frame (0 outside the update stage) 帧内子步序号（update阶段外为0） */
  substep: number;
}

export type SystemFn = (ctx: SystemContext) => void;

export interface SystemConfig {
  name: string;
  fn: SystemFn;
  stage: SystemStage;
  sets: string[];
  before: string[];
  after: string[];
  runIf?: (world: World) => boolean;
}

export class SystemBuilder {
  private cfg: SystemConfig;

  constructor(name: string, fn: SystemFn) {
    this.cfg = { name, fn, stage: 'update', sets: [], before: [], after: [] };
  }

  stage(stage: SystemStage): this {
    this.cfg.stage = stage;
    return this;
  }

  /**
   * Put the system in a named set; other systems may order against `set:<name>`
   * 将系统加入命名集合；其他系统可以相对`set:<name>`排序
   */
  inSet(set: string): this {
    this.cfg.sets.push(set);
    return this;
  }

  before(target: string): this {
    this.cfg.before.push(target);
    return this;
  }

  after(target: string): this {
    this.cfg.after.push(target);
    return this;
  }

  /**
   * Only run while the predicate holds
   * 仅在谓词成立时运行
   */
  runIf(pred: (world: World) => boolean): this {
    this.cfg.runIf = pred;
    return this;
  }

  build(): SystemConfig {
    return {
      ...this.cfg,
      sets: [...this.cfg.sets],
      before: [...this.cfg.before],
      after: [...this.cfg.after],
    };
  }
}

/**
 * Start building a function system
 * 开始构建函数式系统
 */
export function system(name: string, fn: SystemFn): SystemBuilder {
  return new SystemBuilder(name, fn);
}
