/**
 * Match phase, score and hit feedback
 * 比赛阶段、比分与打击反馈
 */

/**
 * start → ongoing → leftWin | rightWin → ongoing (on restart)
 */
export type Phase = 'start' | 'ongoing' | 'leftWin' | 'rightWin';

/**
 * Read-only copy handed to HUD, audio and screen-shake collaborators
 * 提供给HUD、音频和震屏的只读副本
 */
export interface MatchSnapshot {
  readonly phase: Phase;
  readonly leftScore: number;
  readonly rightScore: number;
  readonly intensity: number;
  readonly hitstun: number;
}

export class MatchState {
  phase: Phase = 'start';
  leftScore = 0;
  rightScore = 0;

  /**
   * Sum of ball speeds × 4, recomputed every collision pass
   * 球速之和×4，每次碰撞结算时重新计算
   */
  intensity = 0;

  /**
   * Frames left in the impact freeze; the simulation is suspended while > 0
   * 冲击冻结剩余帧数；大于0时模拟暂停
   */
  hitstun = 0;

  reset(): void {
    this.phase = 'start';
    this.leftScore = 0;
    this.rightScore = 0;
    this.intensity = 0;
    this.hitstun = 0;
  }

  snapshot(): MatchSnapshot {
    return Object.freeze({
      phase: this.phase,
      leftScore: this.leftScore,
      rightScore: this.rightScore,
      intensity: this.intensity,
      hitstun: this.hitstun,
    });
  }
}
