/**
 * Projectile fired by a paddle; removed on its first resolved collision pass
 * 球拍发射的子弹；在第一次结算碰撞时移除
 */
export class Bullet {
  constructor(public radius = 2) {}
}
