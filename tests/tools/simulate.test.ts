/**
 * Tests for the headless match runner
 * 无头比赛运行器测试
 */

import { describe, test, expect } from 'vitest';
import { runSimulation } from '../../tools/simulate';
import type { GameEvent } from '../../src/events/Types';

describe('runSimulation', () => {
  test('should serve after the idle delay', () => {
    const seen: Array<[GameEvent, number]> = [];
    const summary = runSimulation({ frames: 40, serveDelay: 30 }, (event, frame) => {
      seen.push([event, frame]);
    });

    expect(summary.frames).toBe(40);
    expect(seen[0]).toEqual([{ type: 'phaseChanged', from: 'start', to: 'ongoing' }, 31]);
    expect(summary.final.phase).toBe('ongoing');
  });

  test('should count goals in the final score', () => {
    const summary = runSimulation({ frames: 1200, seed: 42 });

    expect(summary.goals).toBe(summary.final.leftScore + summary.final.rightScore);
    expect(summary.bulletsFired).toBe(0);
    expect(summary.slowest).toEqual([]);
  });

  test('should produce the same match for the same seed', () => {
    const a = runSimulation({ frames: 600, seed: 7, left: 'idle' });
    const b = runSimulation({ frames: 600, seed: 7, left: 'idle' });

    expect(a.final).toEqual(b.final);
    expect(a.events).toEqual(b.events);
  });

  test('should report the slowest systems when profiling', () => {
    const summary = runSimulation({ frames: 10, profile: true });

    expect(summary.slowest).toHaveLength(5);
    for (let i = 1; i < summary.slowest.length; i++) {
      expect(summary.slowest[i - 1].avgMs).toBeGreaterThanOrEqual(summary.slowest[i].avgMs);
    }
  });
});
