/**
 * @module capabilities/checker
 *
 * 能力检查：从入口可达的每个效应点都必须被某条已声明授权覆盖。
 *
 * 匹配规则：
 * - 候选授权为与效应点同种类的授权
 * - 任一候选覆盖即通过
 * - 否则报告声明顺序中第一个候选及其不匹配字段
 * - 约束需要的目标字段缺失时视为不覆盖
 */

import type { CompilationUnit } from '../ast/ast.js';
import { syntheticSpan } from '../ast/builders.js';
import type { Span } from '../types.js';
import { DiagnosticBuilder, type Diagnostic } from '../diagnostics/diagnostics.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import { describeTarget, type EffectSite } from '../effects/call_graph.js';
import { reachableSites, type EffectSets } from '../effects/effect_closure.js';
import { grantsOfKind, type CapabilityEnvironment, type CapabilityGrant } from './declarations.js';
import { matchGlob, matchProtocol } from './glob.js';

export type GrantMatch =
  | { readonly ok: true }
  | {
      readonly ok: false;
      readonly reason: 'mismatch' | 'missing';
      readonly field: string;
      readonly value?: string;
      readonly pattern: string;
    };

export type SiteCoverage =
  | { readonly site: EffectSite; readonly covered: true; readonly grant: string }
  | { readonly site: EffectSite; readonly covered: false; readonly code: ErrorCode; readonly grant?: string };

/** 效应点 id → 覆盖结果；vault 分析器据此做交叉检查 */
export type CoverageReport = ReadonlyMap<string, SiteCoverage>;

export interface CheckResult {
  readonly diagnostics: Diagnostic[];
  readonly coverage: CoverageReport;
  /** 从入口可达的效应点（去重、排序） */
  readonly reachable: readonly EffectSite[];
}

export interface CheckContext {
  readonly unitName?: string;
  readonly unitSpan?: Span;
}

/**
 * 判断单条授权是否覆盖效应点。先比对模式字段，再比对协议。
 */
export function matchGrant(grant: CapabilityGrant, site: EffectSite): GrantMatch {
  if (grant.kind !== site.kind) {
    return { ok: false, reason: 'mismatch', field: 'kind', value: site.kind, pattern: grant.kind };
  }
  if (grant.pattern) {
    const field = grant.pattern.field;
    const value = site.target[field];
    if (value === undefined) return { ok: false, reason: 'missing', field, pattern: grant.pattern.source };
    if (!matchGlob(grant.pattern, value)) {
      return { ok: false, reason: 'mismatch', field, value, pattern: grant.pattern.source };
    }
  }
  if (grant.protocol) {
    const value = site.target.protocol;
    if (value === undefined) {
      return { ok: false, reason: 'missing', field: 'protocol', pattern: grant.protocol.source };
    }
    if (!matchProtocol(grant.protocol, value)) {
      return { ok: false, reason: 'mismatch', field: 'protocol', value, pattern: grant.protocol.source };
    }
  }
  return { ok: true };
}

interface Violation {
  readonly coverage: SiteCoverage;
  readonly report: (diagnostics: DiagnosticBuilder) => void;
}

function evaluateSite(environment: CapabilityEnvironment, site: EffectSite): Violation | SiteCoverage {
  const candidates = grantsOfKind(environment, site.kind);
  const base = { kind: site.kind, target: describeTarget(site.target), func: site.owner };

  if (candidates.length === 0) {
    return {
      coverage: { site, covered: false, code: ErrorCode.CAPABILITY_NOT_DECLARED },
      report: diagnostics => diagnostics.report(ErrorCode.CAPABILITY_NOT_DECLARED, site.span, base),
    };
  }

  let firstFailure: { grant: CapabilityGrant; match: Exclude<GrantMatch, { ok: true }> } | null = null;
  for (const grant of candidates) {
    const match = matchGrant(grant, site);
    if (match.ok) return { site, covered: true, grant: grant.name };
    firstFailure ??= { grant, match };
  }
  if (!firstFailure) {
    return { site, covered: false, code: ErrorCode.CAPABILITY_NOT_DECLARED };
  }

  const { grant, match } = firstFailure;
  const relatedGrant = { name: grant.name, span: grant.span };
  const code =
    match.reason === 'missing' ? ErrorCode.CAPABILITY_TARGET_FIELD_MISSING : ErrorCode.CAPABILITY_TARGET_MISMATCH;
  const params =
    match.reason === 'missing'
      ? { ...base, grant: grant.name, field: match.field }
      : { ...base, grant: grant.name, field: match.field, value: match.value, pattern: match.pattern };

  return {
    coverage: { site, covered: false, code, grant: grant.name },
    report: diagnostics => diagnostics.report(code, site.span, params, { relatedGrant }),
  };
}

function isViolation(result: Violation | SiteCoverage): result is Violation {
  return 'report' in result;
}

/**
 * 检查从入口可达的全部效应点。
 *
 * 覆盖报告包含单元内的所有效应点（不论是否可达）；诊断只针对可达效应点，同一效应点只报告一次。
 */
export function checkCapabilities(
  environment: CapabilityEnvironment,
  effectSets: EffectSets,
  entryPoints: readonly string[],
  context: CheckContext = {}
): CheckResult {
  const diagnostics = new DiagnosticBuilder();

  for (const entry of entryPoints) {
    if (!effectSets.has(entry)) {
      diagnostics.report(ErrorCode.UNKNOWN_ENTRY_POINT, context.unitSpan ?? syntheticSpan, {
        name: entry,
        unit: context.unitName ?? '<unit>',
      });
    }
  }

  const allSites = reachableSites(effectSets, effectSets.keys());
  const reachable = reachableSites(effectSets, entryPoints);
  const reachableIds = new Set(reachable.map(site => site.id));

  const coverage = new Map<string, SiteCoverage>();
  for (const site of allSites) {
    const result = evaluateSite(environment, site);
    if (isViolation(result)) {
      coverage.set(site.id, result.coverage);
      if (reachableIds.has(site.id)) result.report(diagnostics);
    } else {
      coverage.set(site.id, result);
    }
  }

  return { diagnostics: diagnostics.getDiagnostics(), coverage, reachable };
}

/**
 * 入口函数：显式声明的 entryPoints；否则 `main`；否则全部函数（库单元）。
 */
export function resolveEntryPoints(unit: CompilationUnit): string[] {
  if (unit.entryPoints && unit.entryPoints.length > 0) return [...unit.entryPoints];
  if (unit.functions.some(func => func.name === 'main')) return ['main'];
  return unit.functions.map(func => func.name).sort();
}

export function isSiteCovered(coverage: CoverageReport, siteId: string): boolean {
  return coverage.get(siteId)?.covered === true;
}
