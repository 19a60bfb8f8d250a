/**
 * Position and velocity of a body, in field units and units per substep
 * 物体的位置与速度（场地单位、每子步单位）
 */

import type { Vec2 } from '../math/vec2';

export class Transform {
  /** Center position 中心位置 */
  position: Vec2;

  /**
   * Displacement applied each substep; there is no delta-time scaling
   * 每个子步施加的位移；不按帧时间缩放
   */
  velocity: Vec2;

  constructor(x = 0, y = 0, vx = 0, vy = 0) {
    this.position = { x, y };
    this.velocity = { x: vx, y: vy };
  }
}
