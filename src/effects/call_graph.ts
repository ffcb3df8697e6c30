/**
 * @module effects/call_graph
 *
 * 从编译单元推导调用图与直接效应点（EffectSite）。
 *
 * - 调用本地函数：记录为调用边
 * - 带前端效应标注的调用：记录为效应点
 * - 未标注的内建调用：按前缀表归类（见 config/effect_config）
 * - 其余调用（未知外部函数）不贡献任何效应
 *
 * Lambda 体内的调用计入其所在的外层函数。
 */

import type * as A from '../ast/ast.js';
import { DefaultAstVisitor, createVisitorContext, type VisitorContext } from '../ast/visitor.js';
import type { Span } from '../types.js';
import { DiagnosticBuilder, DiagnosticError, comparePositions, type Diagnostic } from '../diagnostics/diagnostics.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import { DEFAULT_EFFECT_KINDS, type EffectKindRegistry } from './effect_kind.js';
import { loadEffectConfig, prefixRules, type PrefixRule } from '../config/effect_config.js';

export interface EffectSite {
  /** `owner@line:col#kind`，单元内唯一 */
  readonly id: string;
  /** 直接执行该效应的函数 */
  readonly owner: string;
  readonly callee: string;
  readonly kind: string;
  /** 约束匹配所用的目标参数，例如 `{ protocol: 'https', domain: 'api.bank.com' }` */
  readonly target: Readonly<Record<string, string>>;
  readonly span: Span;
}

export interface CallEdge {
  readonly caller: string;
  readonly callee: string;
  readonly span: Span;
}

export interface CallGraph {
  /** 按名称排序的函数列表 */
  readonly functions: readonly string[];
  readonly edges: readonly CallEdge[];
  readonly directSites: ReadonlyMap<string, readonly EffectSite[]>;
}

export class CallGraphError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CallGraphError';
  }
}

export interface CallGraphOptions {
  readonly registry?: EffectKindRegistry;
  /** 内建前缀规则；缺省时从 .stract/effects.json（或默认表）加载 */
  readonly prefixes?: readonly PrefixRule[];
}

export function compareSites(a: EffectSite, b: EffectSite): number {
  const byPosition = comparePositions(a.span.start, b.span.start);
  if (byPosition !== 0) return byPosition;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export function describeTarget(target: Readonly<Record<string, string>>): string {
  const keys = Object.keys(target).sort();
  if (keys.length === 0) return '<no target>';
  return keys.map(key => `${key}=${target[key] ?? ''}`).join(' ');
}

function firstStringLiteral(args: readonly A.Expression[]): string | undefined {
  for (const arg of args) {
    if (arg.kind === 'Literal' && typeof arg.value === 'string') return arg.value;
  }
  return undefined;
}

interface SiteDraft {
  readonly callee: string;
  readonly kind: string;
  readonly target: Readonly<Record<string, string>>;
  readonly span: Span;
}

/**
 * 单个函数体的调用收集器。
 */
class CallCollector extends DefaultAstVisitor {
  readonly callees: { name: string; span: Span }[] = [];
  readonly sites: SiteDraft[] = [];

  constructor(
    private readonly localFunctions: ReadonlySet<string>,
    private readonly registry: EffectKindRegistry,
    private readonly prefixes: readonly PrefixRule[]
  ) {
    super();
  }

  override visitExpression(expression: A.Expression, ctx: VisitorContext): void {
    if (expression.kind === 'Call') this.recordCall(expression);
    super.visitExpression(expression, ctx);
  }

  private recordCall(call: A.Call): void {
    if (this.localFunctions.has(call.callee)) {
      this.callees.push({ name: call.callee, span: call.span });
      return;
    }
    if (call.effect) {
      const kind = this.registry.resolve(call.effect.kind)?.name ?? call.effect.kind;
      this.sites.push({ callee: call.callee, kind, target: { ...call.effect.target }, span: call.span });
      return;
    }
    const rule = this.prefixes.find(candidate => call.callee.startsWith(candidate.prefix));
    if (!rule) return;
    const descriptor = this.registry.get(rule.kind);
    if (!descriptor) return;
    const member = call.callee.slice(rule.prefix.length);
    this.sites.push({
      callee: call.callee,
      kind: descriptor.name,
      target: descriptor.deriveTarget(member, firstStringLiteral(call.args)),
      span: call.span,
    });
  }
}

/**
 * 单元内的重名函数：第一个定义之后的每个定义一条 D009 诊断。
 */
export function duplicateFunctionDiagnostics(unit: A.CompilationUnit): Diagnostic[] {
  const builder = new DiagnosticBuilder();
  const first = new Map<string, A.FunctionDecl>();
  for (const func of unit.functions) {
    const original = first.get(func.name);
    if (!original) {
      first.set(func.name, func);
      continue;
    }
    builder.report(
      ErrorCode.DUPLICATE_FUNCTION,
      func.span,
      { name: func.name, unit: unit.name },
      { related: { span: original.span, message: `first definition of '${func.name}'` } }
    );
  }
  return builder.getDiagnostics();
}

/**
 * @throws DiagnosticError 单元内存在重名函数（携带第一条 D009 诊断）
 */
export function buildCallGraph(unit: A.CompilationUnit, options: CallGraphOptions = {}): CallGraph {
  const [duplicate] = duplicateFunctionDiagnostics(unit);
  if (duplicate) throw new DiagnosticError(duplicate);

  const registry = options.registry ?? DEFAULT_EFFECT_KINDS;
  const prefixes = options.prefixes ?? prefixRules(loadEffectConfig(), registry);
  const localFunctions = new Set(unit.functions.map(func => func.name));

  const edges: CallEdge[] = [];
  const directSites = new Map<string, EffectSite[]>();
  const usedIds = new Set<string>();

  for (const func of unit.functions) {
    const collector = new CallCollector(localFunctions, registry, prefixes);
    collector.visitFunction(func, createVisitorContext(func.name));

    for (const callee of collector.callees) {
      edges.push({ caller: func.name, callee: callee.name, span: callee.span });
    }

    const sites: EffectSite[] = [];
    for (const draft of collector.sites) {
      const base = `${func.name}@${draft.span.start.line}:${draft.span.start.col}#${draft.kind}`;
      let id = base;
      for (let n = 2; usedIds.has(id); n += 1) id = `${base}~${n}`;
      usedIds.add(id);
      sites.push({ id, owner: func.name, ...draft });
    }
    directSites.set(func.name, sites.sort(compareSites));
  }

  return { functions: [...localFunctions].sort(), edges, directSites };
}

export interface CallGraphInput {
  readonly functions: readonly string[];
  readonly edges: readonly { readonly caller: string; readonly callee: string; readonly span?: Span }[];
  readonly sites: readonly EffectSite[];
}

const NO_SPAN: Span = { start: { line: 0, col: 0 }, end: { line: 0, col: 0 } };

/**
 * 直接由调用图数据构造 CallGraph（外部前端已给出调用图时使用）。
 *
 * @throws CallGraphError 函数重复、边或效应点引用未知函数、效应点 id 重复
 */
export function createCallGraph(input: CallGraphInput): CallGraph {
  const functions = new Set<string>();
  for (const name of input.functions) {
    if (functions.has(name)) throw new CallGraphError(`Function '${name}' is listed more than once`);
    functions.add(name);
  }

  const edges: CallEdge[] = [];
  for (const edge of input.edges) {
    for (const endpoint of [edge.caller, edge.callee]) {
      if (!functions.has(endpoint)) {
        throw new CallGraphError(`Call edge ${edge.caller} -> ${edge.callee} references unknown function '${endpoint}'`);
      }
    }
    edges.push({ caller: edge.caller, callee: edge.callee, span: edge.span ?? NO_SPAN });
  }

  const directSites = new Map<string, EffectSite[]>();
  for (const name of functions) directSites.set(name, []);
  const ids = new Set<string>();
  for (const site of input.sites) {
    const bucket = directSites.get(site.owner);
    if (!bucket) throw new CallGraphError(`Effect site '${site.id}' belongs to unknown function '${site.owner}'`);
    if (ids.has(site.id)) throw new CallGraphError(`Effect site id '${site.id}' is not unique`);
    ids.add(site.id);
    bucket.push(site);
  }
  for (const bucket of directSites.values()) bucket.sort(compareSites);

  return { functions: [...functions].sort(), edges, directSites };
}
