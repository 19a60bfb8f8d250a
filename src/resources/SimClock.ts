/**
 * Simulation clock in seconds, supplied by the caller each frame.
 * Fire cooldowns and particle lifetimes are measured against it.
 * 模拟时钟（秒），由调用方每帧提供。射击冷却和粒子寿命以此为准。
 */
export class SimClock {
  now = 0;
}
