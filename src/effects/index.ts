/**
 * @module effects
 *
 * 效应系统模块。
 *
 * 包含：
 * - 效应种类注册表 (EffectKindRegistry)
 * - 调用图与效应点 (buildCallGraph, EffectSite)
 * - 能力闭包不动点 (computeEffectSets, FunctionEffectSet)
 */

export {
  BUILTIN_EFFECT_KINDS,
  DEFAULT_EFFECT_KINDS,
  EffectKindError,
  EffectKindRegistry,
  FILESYSTEM,
  NETWORK,
  SYSCALL,
  type EffectKindDescriptor,
  type GlobSyntax,
} from './effect_kind.js';
export {
  CallGraphError,
  buildCallGraph,
  compareSites,
  createCallGraph,
  describeTarget,
  duplicateFunctionDiagnostics,
  type CallEdge,
  type CallGraph,
  type CallGraphInput,
  type CallGraphOptions,
  type EffectSite,
} from './call_graph.js';
export {
  computeEffectSets,
  planComponents,
  reachableSites,
  solveComponent,
  type ComponentPlan,
  type ComputeOptions,
  type EffectSets,
  type FunctionEffectSet,
} from './effect_closure.js';
