/**
 * Event system exports
 * 事件系统导出
 */

export { EventChannel } from './EventChannel';
export type {
  Side,
  BulletFired,
  BallPaddleHit,
  BulletPaddleHit,
  BulletBallHit,
  Goal,
  WallBounce,
  PhaseChanged,
  GameEvent,
} from './Types';
export { GameEvents } from './Types';
