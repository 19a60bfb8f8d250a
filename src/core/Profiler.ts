/**
 * Per-system timing statistics, recorded by the Scheduler when a Profiler
 * resource is installed on the world
 * 每个系统的耗时统计；World上安装Profiler资源后由Scheduler记录
 */

import type { SystemStage } from './System';

export interface SysStat {
  name: string;
  stage: SystemStage;
  /** Last execution time in ms 最后执行时间（毫秒） */
  lastMs: number;
  /** Average execution time in ms (EMA) 平均执行时间（指数移动平均） */
  avgMs: number;
  /** Maximum execution time in ms 最大执行时间（毫秒） */
  maxMs: number;
  /** Sum of all recorded times in ms 累计执行时间（毫秒） */
  totalMs: number;
  /** Total number of calls 总调用次数 */
  calls: number;
}

/**
 * System profiler with exponential moving average.
 * The update stage runs once per substep, so its systems collect several
 * samples per frame.
 * 使用指数移动平均的系统分析器。update阶段每个子步运行一次，因此其系统每帧会产生多个样本。
 */
export class Profiler {
  private stats = new Map<string, SysStat>();

  /**
   * @param emaAlpha EMA smoothing factor (0-1), higher = more weight to recent values
   *                 EMA平滑因子（0-1），越高越重视最近的值
   */
  constructor(public emaAlpha = 0.15) {
    if (!(emaAlpha > 0 && emaAlpha <= 1)) {
      throw new Error(`[Profiler] emaAlpha must be in (0, 1], got ${emaAlpha}`);
    }
  }

  private key(name: string, stage: SystemStage): string {
    return `${stage}:${name}`;
  }

  /**
   * Record execution time for a system
   * 记录系统执行时间
   */
  record(name: string, stage: SystemStage, ms: number): void {
    const k = this.key(name, stage);
    const s = this.stats.get(k);
    if (!s) {
      this.stats.set(k, { name, stage, lastMs: ms, avgMs: ms, maxMs: ms, totalMs: ms, calls: 1 });
      return;
    }
    s.lastMs = ms;
    s.avgMs += (ms - s.avgMs) * this.emaAlpha;
    s.maxMs = Math.max(s.maxMs, ms);
    s.totalMs += ms;
    s.calls++;
  }

  getAll(): SysStat[] {
    return [...this.stats.values()];
  }

  /**
   * Top N systems by average execution time
   * 按平均执行时间排序的前N个系统
   */
  topByAvg(n = 10): SysStat[] {
    return this.getAll().sort((a, b) => b.avgMs - a.avgMs).slice(0, n);
  }

  /**
   * Top N systems by accumulated execution time
   * 按累计执行时间排序的前N个系统
   */
  topByTotal(n = 10): SysStat[] {
    return this.getAll().sort((a, b) => b.totalMs - a.totalMs).slice(0, n);
  }

  resetMax(): void {
    for (const s of this.stats.values()) {
      s.maxMs = s.lastMs;
    }
  }

  clear(): void {
    this.stats.clear();
  }

  getStat(name: string, stage: SystemStage): SysStat | undefined {
    return this.stats.get(this.key(name, stage));
  }
}
