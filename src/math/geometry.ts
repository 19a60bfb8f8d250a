/**
 * Collision geometry for circles and vertical capsules
 * 圆与竖直胶囊体的碰撞几何
 *
 * All tests work on squared distances; no square roots are taken except
 * when a velocity is re-pinned to a speed.
 * 所有检测都基于距离平方；仅在把速度重新定到某一速率时才开方。
 */

import type { Vec2 } from './vec2';
import { sub, dot, lengthSq } from './vec2';

/**
 * Squared Euclidean distance between two points
 * 两点间欧氏距离的平方
 */
export function squaredDistance(p: Readonly<Vec2>, q: Readonly<Vec2>): number {
  const dx = p.x - q.x;
  const dy = p.y - q.y;
  return dx * dx + dy * dy;
}

/**
 * Squared distance from point c to segment a-b.
 * Endpoints win at the boundary: e <= 0 returns |c-a|², e >= |b-a|²
 * returns |c-b|², only the open interior uses the perpendicular distance.
 * A zero-length segment falls into the first branch.
 * 点c到线段a-b的距离平方。边界处端点优先：e <= 0 返回|c-a|²，e >= |b-a|² 返回|c-b|²，
 * 只有开区间内部使用垂直距离。零长度线段落入第一个分支。
 */
export function squaredDistancePointSegment(
  a: Readonly<Vec2>,
  b: Readonly<Vec2>,
  c: Readonly<Vec2>
): number {
  const ab = sub(b, a);
  const ac = sub(c, a);
  const e = dot(ac, ab);
  if (e <= 0) return lengthSq(ac);

  const f = lengthSq(ab);
  if (e >= f) return squaredDistance(c, b);

  return lengthSq(ac) - (e * e) / f;
}

/**
 * Circle vs vertical capsule overlap. The capsule core runs from
 * center - (0, halfHeight) to center + (0, halfHeight) and is inflated by
 * halfWidth; touching counts as overlap.
 * 圆与竖直胶囊体的重叠检测。胶囊核心线段从center - (0, halfHeight)到center + (0, halfHeight)，
 * 以halfWidth为半径膨胀；相切视为重叠。
 */
export function sphereCapsuleOverlap(
  sphereCenter: Readonly<Vec2>,
  sphereRadius: number,
  capsuleCenter: Readonly<Vec2>,
  capsuleHalfWidth: number,
  capsuleHalfHeight: number
): boolean {
  const top = { x: capsuleCenter.x, y: capsuleCenter.y - capsuleHalfHeight };
  const bottom = { x: capsuleCenter.x, y: capsuleCenter.y + capsuleHalfHeight };
  const reach = sphereRadius + capsuleHalfWidth;
  return squaredDistancePointSegment(top, bottom, sphereCenter) <= reach * reach;
}

/**
 * Scale a direction to the given speed.
 * Returns undefined when the direction has zero or non-finite length;
 * callers keep their previous velocity in that case.
 * 把方向缩放到给定速率。方向长度为零或非有限值时返回undefined，调用方应保留原速度。
 */
export function redirect(direction: Readonly<Vec2>, speed: number): Vec2 | undefined {
  const magnitude = Math.sqrt(lengthSq(direction));
  if (magnitude === 0 || !Number.isFinite(magnitude)) return undefined;
  return { x: (direction.x / magnitude) * speed, y: (direction.y / magnitude) * speed };
}
