/**
 * Paddle control scheme: a human binding or the ball-chasing AI
 * 球拍控制方式：人类按键绑定或追球AI
 */

/**
 * Control names per direction; a direction is held when any of its
 * controls is held
 * 每个方向的控制名；任一控制被按住即视为该方向按住
 */
export interface DirectionBindings {
  up: readonly string[];
  left: readonly string[];
  down: readonly string[];
  right: readonly string[];
}

export interface PlayerControl {
  kind: 'player';
  bindings: DirectionBindings;
  /** Simulation time (s) after which the next shot is allowed 下次允许射击的模拟时间（秒） */
  nextFireTime: number;
}

export interface AIControl {
  kind: 'ai';
  /** Reserved timer, not read by the AI 保留计时器，AI不读取 */
  timer: number;
}

export type ControlScheme = PlayerControl | AIControl;

export const WASD: DirectionBindings = {
  up: ['KeyW'],
  left: ['KeyA'],
  down: ['KeyS'],
  right: ['KeyD'],
};

export const ARROWS: DirectionBindings = {
  up: ['ArrowUp'],
  left: ['ArrowLeft'],
  down: ['ArrowDown'],
  right: ['ArrowRight'],
};

export class Controller {
  constructor(public scheme: ControlScheme) {}

  static player(bindings: DirectionBindings = WASD): Controller {
    return new Controller({ kind: 'player', bindings, nextFireTime: 0 });
  }

  static ai(): Controller {
    return new Controller({ kind: 'ai', timer: 0 });
  }
}
