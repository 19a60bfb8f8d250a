/**
 * RGBA color with channels in [0, 1]
 * RGBA颜色，通道范围[0, 1]
 */
export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

export const WHITE: Color = Object.freeze({ r: 1, g: 1, b: 1, a: 1 });
export const BLACK: Color = Object.freeze({ r: 0, g: 0, b: 0, a: 1 });
export const RED: Color = Object.freeze({ r: 0.9, g: 0.16, b: 0.22, a: 1 });
export const BLUE: Color = Object.freeze({ r: 0, g: 0.47, b: 0.95, a: 1 });
