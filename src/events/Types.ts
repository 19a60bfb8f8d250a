/**
 * Gameplay events emitted by the simulation for audio, HUD and logging
 * collaborators. The core never plays sounds itself.
 * 模拟发出的游戏事件，供音频、HUD和日志使用。核心本身不播放声音。
 */

import type { Entity } from '../utils/Types';
import type { Phase } from '../resources/MatchState';
import { EventChannel } from './EventChannel';

export type Side = 'left' | 'right';

export interface BulletFired {
  type: 'bulletFired';
  shooter: Entity;
  x: number;
  y: number;
  /** +1 fired right, -1 fired left 向右为+1，向左为-1 */
  direction: 1 | -1;
}

export interface BallPaddleHit {
  type: 'ballPaddleHit';
  ball: Entity;
  paddle: Entity;
  /** Ball speed after the hit 击中后的球速 */
  speed: number;
}

export interface BulletPaddleHit {
  type: 'bulletPaddleHit';
  bullet: Entity;
  paddle: Entity;
  /** Paddle half height after the damage 受伤后的半高 */
  halfHeight: number;
}

export interface BulletBallHit {
  type: 'bulletBallHit';
  bullet: Entity;
  ball: Entity;
}

export interface Goal {
  type: 'goal';
  /** Side that scored 得分方 */
  scorer: Side;
  leftScore: number;
  rightScore: number;
}

export interface WallBounce {
  type: 'wallBounce';
  ball: Entity;
}

export interface PhaseChanged {
  type: 'phaseChanged';
  from: Phase;
  to: Phase;
}

export type GameEvent =
  | BulletFired
  | BallPaddleHit
  | BulletPaddleHit
  | BulletBallHit
  | Goal
  | WallBounce
  | PhaseChanged;

/**
 * Resource key and channel for gameplay events
 * 游戏事件的资源键与通道
 */
export class GameEvents extends EventChannel<GameEvent> {}
