/**
 * System scheduler with stage management and dependency resolution
 * 具有阶段管理和依赖解析的系统调度器
 *
 * Key points:
 * - Stages: preUpdate, update (may run several times per frame), postUpdate
 * - before/after dependencies (target can be system name or `set:<name>`)
 * - Topological sorting with cycle detection; ties keep registration order
 * - Each system gets its own CommandBuffer, flushed right after it runs
 *
 * 要点：
 * - 阶段：preUpdate、update（每帧可运行多次）、postUpdate
 * - before/after依赖（目标可以是系统名或`set:<name>`）
 * - 拓扑排序（检测环路）；无依赖时保持注册顺序
 * - 每个系统拥有独立的命令缓冲，运行后立即flush
 */

import type { World } from './World';
import { CommandBuffer } from './CommandBuffer';
import type { SystemStage, SystemConfig, SystemContext } from './System';
import { STAGE_ORDER, SystemBuilder } from './System';
import { Profiler } from './Profiler';

type NodeId = string;
const SET_PREFIX = 'set:';

/**
 * Dependency graph node for topological sorting
 * 用于拓扑排序的依赖图节点
 */
interface Node {
  id: NodeId;
  /** System config (absent for virtual set nodes) 系统配置（虚拟集合节点为空） */
  sys?: SystemConfig;
  inEdges: Set<NodeId>;
  outEdges: Set<NodeId>;
}

export class Scheduler {
  private stages: Record<SystemStage, SystemConfig[]> = {
    preUpdate: [],
    update: [],
    postUpdate: [],
  };
  /** Cached topologically sorted system order 缓存的拓扑排序结果 */
  private builtOrder: Record<SystemStage, SystemConfig[]> | null = null;

  /**
   * Add system or system builder to scheduler
   * 添加系统或系统构建器到调度器
   */
  add(sysOrBuilder: SystemConfig | SystemBuilder): this {
    const sys = sysOrBuilder instanceof SystemBuilder ? sysOrBuilder.build() : sysOrBuilder;
    if (this.stages[sys.stage].some(s => s.name === sys.name)) {
      throw new Error(`[Scheduler] system '${sys.name}' already registered in stage ${sys.stage}`);
    }
    this.stages[sys.stage].push(sys);
    this.builtOrder = null;
    return this;
  }

  /**
   * Names of the systems in a stage, in execution order
   * 某阶段的系统名称（按执行顺序）
   */
  order(stage: SystemStage): string[] {
    return this.ensureBuilt()[stage].map(s => s.name);
  }

  /**
   * Run every system of one stage
   * 运行某一阶段的所有系统
   */
  runStage(world: World, stage: SystemStage, substep = 0): void {
    const systems = this.ensureBuilt()[stage];
    const prof = world.getResource(Profiler);

    for (const sys of systems) {
      if (sys.runIf && !sys.runIf(world)) continue;

      const cmd = new CommandBuffer(world);
      const ctx: SystemContext = {
        world,
        commandBuffer: cmd,
        frame: world.frame,
        substep,
      };

      const t0 = performance.now();
      sys.fn(ctx);
      const t1 = performance.now();

      if (prof) {
        prof.record(sys.name, sys.stage, t1 - t0);
      }

      cmd.flush();
    }
  }

  /**
   * Run all stages once, each update stage a single time
   * 依次运行所有阶段各一次
   */
  tick(world: World): void {
    world.beginFrame();
    for (const stage of STAGE_ORDER) {
      this.runStage(world, stage);
    }
  }

  /**
   * Build topological order for all stages
   * 为所有阶段构建拓扑顺序
   */
  private ensureBuilt(): Record<SystemStage, SystemConfig[]> {
    if (this.builtOrder) return this.builtOrder;

    const out: Record<SystemStage, SystemConfig[]> = {
      preUpdate: [],
      update: [],
      postUpdate: [],
    };

    for (const stage of STAGE_ORDER) {
      const sysList = this.stages[stage];
      if (sysList.length === 0) continue;

      const nodes = new Map<NodeId, Node>();
      const getNode = (id: NodeId): Node => {
        let n = nodes.get(id);
        if (!n) {
          n = { id, inEdges: new Set(), outEdges: new Set() };
          nodes.set(id, n);
        }
        return n;
      };

      for (const s of sysList) {
        getNode(s.name).sys = s;
        for (const set of s.sets) {
          getNode(SET_PREFIX + set);
        }
      }

      const link = (from: NodeId, to: NodeId): void => {
        if (from === to) return;
        getNode(from).outEdges.add(to);
        getNode(to).inEdges.add(from);
      };

      for (const s of sysList) {
        for (const set of s.sets) {
          link(SET_PREFIX + set, s.name);
        }
        for (const b of s.before) {
          link(s.name, b);
        }
        for (const a of s.after) {
          // Ordering after a set means after all of its members
          // 排在集合之后意味着排在其所有成员之后
          if (a.startsWith(SET_PREFIX)) {
            const set = a.slice(SET_PREFIX.length);
            for (const member of sysList) {
              if (member.sets.includes(set)) link(member.name, s.name);
            }
          } else {
            link(a, s.name);
          }
        }
      }

      const orderList: Node[] = [];
      const q: Node[] = [];
      for (const n of nodes.values()) {
        if (n.inEdges.size === 0) q.push(n);
      }

      while (q.length) {
        const n = q.shift();
        if (!n) break;
        orderList.push(n);
        for (const to of n.outEdges) {
          const t = nodes.get(to);
          if (!t) continue;
          t.inEdges.delete(n.id);
          if (t.inEdges.size === 0) q.push(t);
        }
      }

      const remains = [...nodes.values()].filter(n => n.inEdges.size > 0);
      if (remains.length > 0) {
        const cycleNames = remains.map(n => n.id).join(', ');
        throw new Error(`[Scheduler] dependency cycle in stage ${stage}: ${cycleNames}`);
      }

      const sorted: SystemConfig[] = [];
      for (const n of orderList) {
        if (n.sys) sorted.push(n.sys);
      }
      out[stage] = sorted;
    }

    this.builtOrder = out;
    return out;
  }
}
