#!/usr/bin/env node

/**
 * Headless match runner
 * 无头比赛运行器
 *
 * Plays a match for a fixed number of frames, pressing start whenever the
 * ball is out of play, and prints phase changes, goals and the final score.
 * 以固定帧数运行比赛，球不在场上时自动按下开始键，并打印阶段变化、进球和最终比分。
 */

import { pathToFileURL } from 'node:url';
import { program, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { Match } from '../src/game/Match';
import { InputState } from '../src/resources/Input';
import type { PaddleSetup } from '../src/resources/ArenaConfig';
import { ARROWS } from '../src/components/Controller';
import type { GameEvent } from '../src/events/Types';
import type { MatchSnapshot } from '../src/resources/MatchState';
import type { SysStat } from '../src/core/Profiler';

export interface SimulateOptions {
  /** Frames to simulate 模拟帧数 */
  frames: number;
  seed: number;
  width: number;
  height: number;
  /** Frames to wait before serving again 再次发球前等待的帧数 */
  serveDelay: number;
  /** Left paddle driver; 'idle' is a player nobody presses 左球拍驱动；'idle'为无人操作的玩家 */
  left: 'ai' | 'idle';
  /** Collect per-system timings 收集各系统耗时 */
  profile: boolean;
}

export const DEFAULT_SIMULATE_OPTIONS: Readonly<SimulateOptions> = {
  frames: 3600,
  seed: 0x2F6E2B1,
  width: 1280,
  height: 720,
  serveDelay: 30,
  left: 'ai',
  profile: false,
};

export interface SimulationSummary {
  frames: number;
  final: MatchSnapshot;
  goals: number;
  paddleHits: number;
  bulletsFired: number;
  events: GameEvent[];
  /** Slowest systems by average time, empty unless profiling 按平均耗时排序的最慢系统，未开启分析时为空 */
  slowest: SysStat[];
}

export const FRAME_RATE = 60;

/**
 * Run a match without any I/O
 * 不进行任何I/O地运行一场比赛
 */
export function runSimulation(
  opts: Partial<SimulateOptions> = {},
  onEvent?: (event: GameEvent, frame: number) => void
): SimulationSummary {
  const o: SimulateOptions = { ...DEFAULT_SIMULATE_OPTIONS, ...opts };
  const left: PaddleSetup = o.left === 'ai' ? { kind: 'ai' } : { kind: 'player', bindings: ARROWS };
  const match = new Match({
    seed: o.seed,
    width: o.width,
    height: o.height,
    left,
    right: { kind: 'ai' },
    strict: false,
    profile: o.profile,
  });

  const input = new InputState();
  const events: GameEvent[] = [];
  let idleFrames = 0;

  for (let frame = 1; frame <= o.frames; frame++) {
    const state = match.snapshot();
    if (state.phase !== 'ongoing' && state.hitstun <= 0) {
      if (idleFrames >= o.serveDelay) {
        input.press('start');
        idleFrames = 0;
      } else {
        idleFrames++;
      }
    }

    match.tick(input, frame / FRAME_RATE);
    input.endFrame();

    for (const event of match.drainEvents()) {
      events.push(event);
      onEvent?.(event, frame);
    }
  }

  return {
    frames: o.frames,
    final: match.snapshot(),
    goals: events.filter(e => e.type === 'goal').length,
    paddleHits: events.filter(e => e.type === 'ballPaddleHit').length,
    bulletsFired: events.filter(e => e.type === 'bulletFired').length,
    events,
    slowest: match.profiler?.topByAvg(5) ?? [],
  };
}

function describeEvent(event: GameEvent): string | undefined {
  switch (event.type) {
    case 'phaseChanged':
      return chalk.blue(`phase ${event.from} → ${event.to}`);
    case 'goal':
      return chalk.green(`goal for ${event.scorer}: ${event.leftScore} - ${event.rightScore}`);
    default:
      return undefined;
  }
}

function parseInteger(value: string): number {
  const n = Number.parseInt(value, 10);
  if (Number.isNaN(n)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return n;
}

function parseDriver(value: string): 'ai' | 'idle' {
  if (value !== 'ai' && value !== 'idle') {
    throw new InvalidArgumentError("Expected 'ai' or 'idle'.");
  }
  return value;
}

/**
 * Main program entry point
 * 主程序入口点
 */
function main(): void {
  program
    .name('simulate')
    .description('Run a headless paddle match and report the result')
    .version('0.1.0')
    .option('-f, --frames <n>', 'Frames to simulate', parseInteger, DEFAULT_SIMULATE_OPTIONS.frames)
    .option('-s, --seed <n>', 'PRNG seed', parseInteger, DEFAULT_SIMULATE_OPTIONS.seed)
    .option('--width <n>', 'Field width', parseInteger, DEFAULT_SIMULATE_OPTIONS.width)
    .option('--height <n>', 'Field height', parseInteger, DEFAULT_SIMULATE_OPTIONS.height)
    .option('--serve-delay <n>', 'Frames before each serve', parseInteger, DEFAULT_SIMULATE_OPTIONS.serveDelay)
    .option('--left <driver>', 'Left paddle driver (ai|idle)', parseDriver, DEFAULT_SIMULATE_OPTIONS.left)
    .option('--profile', 'Print the slowest systems', false);

  program.parse();
  const options = program.opts<SimulateOptions>();

  console.log(chalk.blue(`Simulating ${options.frames} frames (seed ${options.seed})...`));
  const started = performance.now();

  const summary = runSimulation(options, (event, frame) => {
    const line = describeEvent(event);
    if (line) console.log(chalk.gray(`[${String(frame).padStart(6)}] `) + line);
  });

  const elapsed = (performance.now() - started).toFixed(1);
  const { final } = summary;
  console.log('');
  console.log(chalk.blue('Match Summary:'));
  console.log(`   Score:        ${chalk.red(final.leftScore)} - ${chalk.cyan(final.rightScore)}`);
  console.log(`   Phase:        ${final.phase}`);
  console.log(`   Goals:        ${summary.goals}`);
  console.log(`   Paddle hits:  ${summary.paddleHits}`);
  console.log(`   Bullets:      ${summary.bulletsFired}`);
  console.log(chalk.gray(`   Time:         ${elapsed}ms`));

  if (options.profile) {
    console.log('');
    console.log(chalk.blue('Slowest systems (avg ms):'));
    for (const stat of summary.slowest) {
      console.log(`   ${stat.stage.padEnd(10)} ${stat.name.padEnd(20)} ${stat.avgMs.toFixed(4)}  (${stat.calls} calls)`);
    }
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  try {
    main();
  } catch (error) {
    console.error(chalk.red('Fatal error:'), error);
    process.exit(1);
  }
}
