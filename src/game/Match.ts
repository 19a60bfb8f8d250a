/**
 * Match - one running session: a World, its resources and the frame schedule
 * Match - 一个运行中的会话：World、其资源以及帧调度
 *
 * @example
 * ```typescript
 * const match = new Match({ seed: 7 });
 * const input = new InputState().press('start');
 * match.tick(input, 0);
 * for (const e of match.drainEvents()) audio.play(e.type);
 * ```
 */

import { World } from '../core/World';
import { Scheduler } from '../core/Scheduler';
import { Profiler } from '../core/Profiler';
import { PRNG } from '../determinism/PRNG';
import { Transform } from '../components/Transform';
import { Bounds } from '../components/Bounds';
import { Controller } from '../components/Controller';
import type { Entity } from '../utils/Types';
import { ArenaConfig } from '../resources/ArenaConfig';
import type { ArenaOptions, PaddleSetup } from '../resources/ArenaConfig';
import { MatchState } from '../resources/MatchState';
import type { MatchSnapshot } from '../resources/MatchState';
import { SimClock } from '../resources/SimClock';
import { Input } from '../resources/Input';
import type { InputSource } from '../resources/Input';
import { ParticleStorage } from '../particles/ParticleStorage';
import type { ParticleView } from '../particles/ParticleStorage';
import { GameEvents } from '../events/Types';
import type { GameEvent } from '../events/Types';
import { MatchPhaseSystem } from '../systems/MatchPhaseSystem';
import { IntegrateTransformsSystem } from '../systems/IntegrateTransformsSystem';
import { PaddleControlSystem } from '../systems/PaddleControlSystem';
import { CollisionResolveSystem } from '../systems/CollisionResolveSystem';
import { AmbientDustSystem, ParticleAdvanceSystem, seedAmbientDust } from '../systems/ParticleSystems';

export interface MatchOptions extends ArenaOptions {
  /** Install a Profiler resource 安装Profiler资源 */
  profile?: boolean;
  /** Simulation time at creation, used for the initial dust 创建时的模拟时间，用于初始尘埃 */
  now?: number;
}

/**
 * Scheduler with the match systems registered
 * 注册了比赛系统的调度器
 */
export function createMatchScheduler(): Scheduler {
  return new Scheduler()
    .add(MatchPhaseSystem)
    .add(IntegrateTransformsSystem)
    .add(PaddleControlSystem)
    .add(CollisionResolveSystem)
    .add(AmbientDustSystem)
    .add(ParticleAdvanceSystem);
}

/**
 * Install the resources the match systems read; returns the particle store
 * 安装比赛系统读取的资源；返回粒子存储
 */
export function installMatchResources(world: World, config: ArenaConfig, now = 0): ParticleStorage {
  const rng = new PRNG(config.seed);
  const particles = new ParticleStorage(rng, config.maxParticles);
  const clock = new SimClock();
  clock.now = now;

  world.setResource(ArenaConfig, config);
  world.setResource(PRNG, rng);
  world.setResource(MatchState, new MatchState());
  world.setResource(SimClock, clock);
  world.setResource(Input, new Input());
  world.setResource(GameEvents, new GameEvents());
  world.setResource(ParticleStorage, particles);
  return particles;
}

export class Match {
  /** Drawing and audio collaborators iterate through world.view() 绘制与音频协作方通过world.view()遍历 */
  readonly world: World;
  readonly config: ArenaConfig;
  private readonly scheduler: Scheduler;

  constructor(opts: MatchOptions = {}) {
    const { profile = false, now = 0, ...arena } = opts;
    this.config = new ArenaConfig(arena);
    this.world = new World({ strict: this.config.strict });
    this.scheduler = createMatchScheduler();

    const particles = installMatchResources(this.world, this.config, now);
    if (profile) {
      this.world.setResource(Profiler, new Profiler());
    }

    seedAmbientDust(particles, this.config, now);
    this.spawnPaddles();
  }

  /**
   * Clear all entities, respawn the paddles and zero the score.
   * Particles keep drifting; queued events are dropped.
   * 清除所有实体，重新生成球拍并清零比分。粒子继续漂移；排队事件被丢弃。
   */
  reset(): void {
    this.world.clear();
    this.world.requireResource(MatchState).reset();
    this.world.requireResource(GameEvents).clear();
    this.spawnPaddles();
  }

  /**
   * Advance one frame. Returns false, without simulating, once quit is pressed.
   * 推进一帧。按下退出键时不模拟并返回false。
   *
   * @param now Simulation time in seconds 模拟时间（秒）
   */
  tick(input: InputSource, now: number): boolean {
    if (input.justPressed('quit')) return false;

    const world = this.world;
    world.beginFrame();
    world.requireResource(SimClock).now = now;
    world.requireResource(Input).source = input;

    const state = world.requireResource(MatchState);
    if (state.hitstun <= 0) {
      this.scheduler.runStage(world, 'preUpdate');
      for (let s = 0; s < this.config.substeps; s++) {
        this.scheduler.runStage(world, 'update', s);
      }
    } else {
      state.hitstun -= 1;
    }

    this.scheduler.runStage(world, 'postUpdate');
    return true;
  }

  snapshot(): MatchSnapshot {
    return this.world.requireResource(MatchState).snapshot();
  }

  /**
   * Take every event emitted since the last drain
   * 取出自上次以来发出的所有事件
   */
  drainEvents(): GameEvent[] {
    return this.world.requireResource(GameEvents).takeAll();
  }

  particles(now: number): ParticleView[] {
    return this.world.requireResource(ParticleStorage).view(now);
  }

  get profiler(): Profiler | undefined {
    return this.world.getResource(Profiler);
  }

  private spawnPaddles(): void {
    const { width, height, paddleInset, paddleHalfWidth, paddleHalfHeight } = this.config;
    this.spawnPaddle(paddleInset, height / 2, this.config.left, paddleHalfWidth, paddleHalfHeight);
    this.spawnPaddle(width - paddleInset, height / 2, this.config.right, paddleHalfWidth, paddleHalfHeight);
  }

  private spawnPaddle(x: number, y: number, setup: PaddleSetup, hw: number, hh: number): Entity {
    const controller = setup.kind === 'player' ? Controller.player(setup.bindings) : Controller.ai();
    return this.world.spawn(new Transform(x, y), new Bounds(hw, hh), controller);
  }
}
