/**
 * Abstract input consumed by the simulation; device polling lives outside
 * 模拟使用的抽象输入；设备轮询位于外部
 */

export type InputAction = 'start' | 'quit';

export interface InputSource {
  /** Whether a control (e.g. 'KeyW') is currently held 控制当前是否按住 */
  isHeld(control: string): boolean;
  /** Whether an action was pressed this frame 本帧是否按下了该动作 */
  justPressed(action: InputAction): boolean;
}

/**
 * In-memory input source for headless runs and tests
 * 用于无头运行和测试的内存输入源
 */
export class InputState implements InputSource {
  private held = new Set<string>();
  private pressed = new Set<InputAction>();

  hold(...controls: string[]): this {
    for (const c of controls) this.held.add(c);
    return this;
  }

  release(...controls: string[]): this {
    for (const c of controls) this.held.delete(c);
    return this;
  }

  /**
   * Mark an action as pressed until endFrame()
   * 标记动作为按下，直到endFrame()
   */
  press(action: InputAction): this {
    this.pressed.add(action);
    return this;
  }

  isHeld(control: string): boolean {
    return this.held.has(control);
  }

  justPressed(action: InputAction): boolean {
    return this.pressed.has(action);
  }

  /**
   * Forget edge-triggered actions; held controls stay held
   * 清除边沿触发的动作；按住的控制保持不变
   */
  endFrame(): void {
    this.pressed.clear();
  }
}

/**
 * World resource pointing at the input of the current frame
 * 指向当前帧输入的World资源
 */
export class Input {
  constructor(public source: InputSource = new InputState()) {}
}

/**
 * Whether any of the given controls is held
 * 任一控制是否按住
 */
export function anyHeld(source: InputSource, controls: readonly string[]): boolean {
  return controls.some(c => source.isHeld(c));
}
