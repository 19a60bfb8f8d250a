/**
 * Minimal 2D vector helpers over plain `{ x, y }` values
 * 基于`{ x, y }`普通值的最小二维向量工具
 */

export interface Vec2 {
  x: number;
  y: number;
}

export const ZERO2: Readonly<Vec2> = Object.freeze({ x: 0, y: 0 });

export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

export function add(a: Readonly<Vec2>, b: Readonly<Vec2>): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Readonly<Vec2>, b: Readonly<Vec2>): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(a: Readonly<Vec2>, s: number): Vec2 {
  return { x: a.x * s, y: a.y * s };
}

export function dot(a: Readonly<Vec2>, b: Readonly<Vec2>): number {
  return a.x * b.x + a.y * b.y;
}

export function lengthSq(a: Readonly<Vec2>): number {
  return a.x * a.x + a.y * a.y;
}

export function length(a: Readonly<Vec2>): number {
  return Math.sqrt(lengthSq(a));
}

export function clamp(v: number, min: number, max: number): number {
  return v < min ? min : v > max ? max : v;
}
