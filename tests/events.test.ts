/**
 * Tests for event channels
 * 事件通道测试
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { EventChannel } from '../src/events/EventChannel';
import { GameEvents } from '../src/events/Types';
import type { GameEvent } from '../src/events/Types';
import { World } from '../src/core/World';

describe('EventChannel', () => {
  let channel: EventChannel<number>;

  beforeEach(() => {
    channel = new EventChannel<number>();
  });

  test('should drain events in emission order', () => {
    channel.emit(1);
    channel.emit(2);
    channel.emit(3);

    const seen: number[] = [];
    channel.drain(e => seen.push(e));

    expect(seen).toEqual([1, 2, 3]);
    expect(channel.size).toBe(0);
    expect(channel.hasEvents).toBe(false);
  });

  test('should keep events emitted while draining for the next drain', () => {
    channel.emit(1);
    const seen: number[] = [];
    channel.drain(e => {
      seen.push(e);
      if (e === 1) channel.emit(2);
    });

    expect(seen).toEqual([1]);
    expect(channel.takeAll()).toEqual([2]);
  });

  test('should take all events and detach them from the queue', () => {
    channel.emit(7);
    const taken = channel.takeAll();
    channel.emit(8);

    expect(taken).toEqual([7]);
    expect(channel.peek()).toEqual([8]);
  });

  test('should clear without processing', () => {
    channel.emit(1);
    channel.clear();
    expect(channel.size).toBe(0);
  });
});

describe('GameEvents', () => {
  test('should work as a world resource', () => {
    const world = new World();
    world.setResource(GameEvents, new GameEvents());

    world.requireResource(GameEvents).emit({ type: 'wallBounce', ball: 1 });
    world.requireResource(GameEvents).emit({ type: 'phaseChanged', from: 'start', to: 'ongoing' });

    const events: GameEvent[] = world.requireResource(GameEvents).takeAll();
    expect(events.map(e => e.type)).toEqual(['wallBounce', 'phaseChanged']);
  });
});
