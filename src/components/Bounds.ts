/**
 * Paddle shape: a vertical capsule centered on the Transform
 * 球拍形状：以Transform为中心的竖直胶囊体
 */
export class Bounds {
  /**
   * @param halfWidth Capsule radius 胶囊半径
   * @param halfHeight Half length of the capsule core; shrinks on bullet
   *                   damage and never goes below 0
   *                   胶囊核心的半长；被子弹击中时缩短，最小为0
   */
  constructor(public halfWidth = 16, public halfHeight = 64) {}
}
