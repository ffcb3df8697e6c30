/**
 * @module effects/effect_closure
 *
 * 能力闭包：每个函数直接或经由被调函数可达的全部效应点。
 *
 * 算法：
 * 1. Tarjan 求强连通分量（按名称排序遍历，输出顺序确定）；
 *    caller→callee 边上 Tarjan 的输出顺序即逆拓扑序（被调方在前）
 * 2. 将分量分层：一层内的分量只依赖更早层的分量，可独立求解
 * 3. 每个分量只读取已冻结的外部被调方结果，在分量内部迭代到局部不动点
 *
 * 效应集只增不减且以单元内效应点总数为上界，因此迭代必然终止；
 * 结果与遍历顺序无关。
 */

import { compareSites, type CallGraph, type EffectSite } from './call_graph.js';
import { ConfigService } from '../config/config-service.js';
import { createLogger } from '../utils/logger.js';

export interface FunctionEffectSet {
  readonly function: string;
  /** 按源位置排序的可达效应点 */
  readonly sites: readonly EffectSite[];
  /** 出现的效应种类（排序去重） */
  readonly kinds: readonly string[];
}

export type EffectSets = ReadonlyMap<string, FunctionEffectSet>;

export interface ComponentPlan {
  /** 每个分量的成员（排序） */
  readonly components: readonly (readonly string[])[];
  /** 分层后的分量下标；同层分量互不依赖 */
  readonly levels: readonly (readonly number[])[];
}

export interface ComputeOptions {
  /**
   * 调整同一层内分量的求解顺序。结果与顺序无关；用于验证确定性。
   */
  readonly scheduleLevel?: (components: readonly number[]) => readonly number[];
}

const logger = createLogger('effects.closure');

function buildAdjacency(graph: CallGraph): Map<string, Set<string>> {
  const adjacency = new Map<string, Set<string>>();
  for (const name of graph.functions) adjacency.set(name, new Set());
  for (const edge of graph.edges) adjacency.get(edge.caller)?.add(edge.callee);
  return adjacency;
}

function sortedNeighbors(adjacency: ReadonlyMap<string, ReadonlySet<string>>, node: string): string[] {
  return [...(adjacency.get(node) ?? [])].sort();
}

interface TarjanFrame {
  readonly node: string;
  readonly index: number;
  low: number;
  readonly neighbors: readonly string[];
  next: number;
}

/** Tarjan 强连通分量，显式栈实现以支持很长的调用链 */
function runTarjan(
  nodes: readonly string[],
  adjacency: ReadonlyMap<string, ReadonlySet<string>>
): { components: string[][]; componentByNode: Map<string, number> } {
  let index = 0;
  const indices = new Map<string, number>();
  const stack: string[] = [];
  const onStack = new Set<string>();
  const components: string[][] = [];
  const componentByNode = new Map<string, number>();

  const open = (node: string): TarjanFrame => {
    const frame: TarjanFrame = { node, index, low: index, neighbors: sortedNeighbors(adjacency, node), next: 0 };
    indices.set(node, index);
    index += 1;
    stack.push(node);
    onStack.add(node);
    return frame;
  };

  for (const root of [...nodes].sort()) {
    if (indices.has(root)) continue;
    const frames: TarjanFrame[] = [open(root)];

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      if (!frame) break;

      const neighbor = frame.neighbors[frame.next];
      if (neighbor !== undefined) {
        frame.next += 1;
        const neighborIndex = indices.get(neighbor);
        if (neighborIndex === undefined) {
          frames.push(open(neighbor));
        } else if (onStack.has(neighbor)) {
          frame.low = Math.min(frame.low, neighborIndex);
        }
        continue;
      }

      frames.pop();
      const parent = frames[frames.length - 1];
      if (parent) parent.low = Math.min(parent.low, frame.low);

      if (frame.low === frame.index) {
        const component: string[] = [];
        for (let member = stack.pop(); member !== undefined; member = stack.pop()) {
          onStack.delete(member);
          component.push(member);
          componentByNode.set(member, components.length);
          if (member === frame.node) break;
        }
        components.push(component.sort());
      }
    }
  }

  return { components, componentByNode };
}

/**
 * 计算分量与分层。分量下标按 Tarjan 输出顺序（被调方在前）。
 */
export function planComponents(graph: CallGraph): ComponentPlan {
  const adjacency = buildAdjacency(graph);
  const { components, componentByNode } = runTarjan(graph.functions, adjacency);

  const levelOf: number[] = [];
  const levels: number[][] = [];
  components.forEach((members, componentIndex) => {
    let level = 0;
    for (const member of members) {
      for (const callee of adjacency.get(member) ?? []) {
        const calleeComponent = componentByNode.get(callee);
        if (calleeComponent === undefined || calleeComponent === componentIndex) continue;
        level = Math.max(level, (levelOf[calleeComponent] ?? 0) + 1);
      }
    }
    levelOf[componentIndex] = level;
    (levels[level] ??= []).push(componentIndex);
  });

  return { components, levels };
}

/**
 * 求解单个分量的局部不动点。
 *
 * @param solved - 已冻结的外部被调方结果；只读
 * @returns 分量内每个成员的可达效应点（以 id 为键）及迭代轮数
 */
export function solveComponent(
  members: readonly string[],
  graph: CallGraph,
  adjacency: ReadonlyMap<string, ReadonlySet<string>>,
  solved: EffectSets
): { sets: Map<string, Map<string, EffectSite>>; rounds: number } {
  const memberSet = new Set(members);
  const sets = new Map<string, Map<string, EffectSite>>();

  for (const member of members) {
    const reachable = new Map<string, EffectSite>();
    for (const site of graph.directSites.get(member) ?? []) reachable.set(site.id, site);
    for (const callee of adjacency.get(member) ?? []) {
      if (memberSet.has(callee)) continue;
      for (const site of solved.get(callee)?.sites ?? []) reachable.set(site.id, site);
    }
    sets.set(member, reachable);
  }

  let rounds = 0;
  let changed = true;
  while (changed) {
    changed = false;
    rounds += 1;
    for (const member of members) {
      const target = sets.get(member);
      if (!target) continue;
      for (const callee of adjacency.get(member) ?? []) {
        if (!memberSet.has(callee)) continue;
        for (const [id, site] of sets.get(callee) ?? []) {
          if (!target.has(id)) {
            target.set(id, site);
            changed = true;
          }
        }
      }
    }
  }

  return { sets, rounds };
}

function freeze(name: string, sites: Iterable<EffectSite>): FunctionEffectSet {
  const sorted = [...sites].sort(compareSites);
  const kinds = [...new Set(sorted.map(site => site.kind))].sort();
  return Object.freeze({
    function: name,
    sites: Object.freeze(sorted),
    kinds: Object.freeze(kinds),
  });
}

/**
 * 计算每个函数的 FunctionEffectSet。返回的 Map 按函数名排序迭代。
 */
export function computeEffectSets(graph: CallGraph, options: ComputeOptions = {}): Map<string, FunctionEffectSet> {
  const adjacency = buildAdjacency(graph);
  const plan = planComponents(graph);
  const solved = new Map<string, FunctionEffectSet>();
  const debug = ConfigService.getInstance().debugGraph;

  plan.levels.forEach((level, levelIndex) => {
    const order = options.scheduleLevel ? options.scheduleLevel(level) : level;
    // 同层分量只读取 solved 中更早层的结果，本层结果在层末统一合并
    const pending: FunctionEffectSet[] = [];
    for (const componentIndex of order) {
      const members = plan.components[componentIndex];
      if (!members) continue;
      const { sets, rounds } = solveComponent(members, graph, adjacency, solved);
      if (debug) {
        logger.info('component converged', { layer: levelIndex, members: [...members], rounds });
      }
      for (const [name, sites] of sets) pending.push(freeze(name, sites.values()));
    }
    for (const set of pending) solved.set(set.function, set);
  });

  const result = new Map<string, FunctionEffectSet>();
  for (const name of [...solved.keys()].sort()) {
    const set = solved.get(name);
    if (set) result.set(name, set);
  }
  return result;
}

/**
 * 从入口集合出发的可达效应点（去重、按源位置排序）。
 */
export function reachableSites(effectSets: EffectSets, entryPoints: Iterable<string>): EffectSite[] {
  const unique = new Map<string, EffectSite>();
  for (const entry of entryPoints) {
    for (const site of effectSets.get(entry)?.sites ?? []) unique.set(site.id, site);
  }
  return [...unique.values()].sort(compareSites);
}
