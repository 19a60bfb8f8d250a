/**
 * Ball component
 * 球组件
 */
export class Ball {
  /**
   * @param radius Collision radius 碰撞半径
   * @param speed Magnitude re-applied to the velocity after every bounce;
   *              always > 0
   *              每次反弹后重新施加到速度上的大小；始终 > 0
   */
  constructor(public radius = 16, public speed = 1) {
    if (!(speed > 0)) {
      throw new Error(`[Ball] speed must be > 0, got ${speed}`);
    }
  }
}
