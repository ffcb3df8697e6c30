/**
 * @module pipeline
 *
 * 安全核心的编排入口：对前端已解析的编译单元依次运行全部检查 pass，合并并排序诊断。
 *
 * 顺序：
 * 1. 能力声明解析
 * 2. 调用图、能力闭包与能力检查（存在 DeclarationError 或重名函数时跳过）
 * 3. vault 作用域分析（能力结果不可用时跳过交叉核对）
 * 4. 可变性校验
 */

import { performance } from 'node:perf_hooks';
import type { CompilationUnit } from './ast/ast.js';
import { sortDiagnostics, type Diagnostic } from './diagnostics/diagnostics.js';
import { DiagnosticKind } from './diagnostics/error_codes.js';
import { DEFAULT_EFFECT_KINDS, type EffectKindRegistry } from './effects/effect_kind.js';
import { buildCallGraph, duplicateFunctionDiagnostics } from './effects/call_graph.js';
import { computeEffectSets, type EffectSets } from './effects/effect_closure.js';
import type { PrefixRule } from './config/effect_config.js';
import { parseCapabilityDeclarations, type CapabilityEnvironment } from './capabilities/declarations.js';
import { checkCapabilities, resolveEntryPoints, type CoverageReport } from './capabilities/checker.js';
import { analyzeVaults } from './vault/analyzer.js';
import type { VaultScopeMetadata } from './vault/metadata.js';
import { validateMutability } from './typecheck/mutability.js';
import { createLogger, logPerformance } from './utils/logger.js';

export interface CheckOptions {
  /** 效应种类注册表；扩展新效应类别时传入 */
  readonly registry?: EffectKindRegistry;
  /** 内建调用前缀规则；缺省时按 .stract/effects.json 加载 */
  readonly prefixes?: readonly PrefixRule[];
}

export interface UnitCheckResult {
  readonly diagnostics: readonly Diagnostic[];
  readonly environment: CapabilityEnvironment;
  /** 存在声明错误或重名函数时为 null */
  readonly effectSets: EffectSets | null;
  readonly coverage: CoverageReport | null;
  readonly vaultMetadata: VaultScopeMetadata;
}

const pipelineLogger = createLogger('pipeline');

export function checkUnit(unit: CompilationUnit, options: CheckOptions = {}): UnitCheckResult {
  const registry = options.registry ?? DEFAULT_EFFECT_KINDS;
  const startTime = performance.now();
  try {
    const meta = { unit: unit.name };
    const declarations = pipelineLogger.time(
      'declarations',
      () => parseCapabilityDeclarations(unit.capabilities, registry),
      meta
    );
    const duplicates = duplicateFunctionDiagnostics(unit);
    const declarationFailed =
      duplicates.length > 0 || declarations.diagnostics.some(d => d.kind === DiagnosticKind.DeclarationError);

    let effectSets: EffectSets | null = null;
    let coverage: CoverageReport | null = null;
    let capabilityDiagnostics: readonly Diagnostic[] = [];
    if (!declarationFailed) {
      const graph = pipelineLogger.time(
        'call graph',
        () => buildCallGraph(unit, { registry, ...(options.prefixes ? { prefixes: options.prefixes } : {}) }),
        meta
      );
      const sets = pipelineLogger.time('effect closure', () => computeEffectSets(graph), meta);
      const checked = pipelineLogger.time(
        'capability check',
        () =>
          checkCapabilities(declarations.environment, sets, resolveEntryPoints(unit), {
            unitName: unit.name,
            ...(unit.span ? { unitSpan: unit.span } : {}),
          }),
        meta
      );
      effectSets = sets;
      coverage = checked.coverage;
      capabilityDiagnostics = checked.diagnostics;
    }

    const vaults = pipelineLogger.time('vault scoping', () => analyzeVaults(unit, { coverage, effectSets }), meta);
    const mutability = pipelineLogger.time('mutability', () => validateMutability(unit), meta);

    const diagnostics = sortDiagnostics([
      ...declarations.diagnostics,
      ...duplicates,
      ...capabilityDiagnostics,
      ...vaults.diagnostics,
      ...mutability,
    ]);

    const duration = performance.now() - startTime;
    const baseMeta = { unit: unit.name, diagnosticCount: diagnostics.length, skippedCapabilities: declarationFailed };
    logPerformance({ component: 'pipeline', operation: 'checkUnit', duration, metadata: baseMeta });

    return {
      diagnostics,
      environment: declarations.environment,
      effectSets,
      coverage,
      vaultMetadata: vaults.metadata,
    };
  } catch (error) {
    pipelineLogger.error('check failed', error instanceof Error ? error : undefined, { unit: unit.name });
    throw error;
  }
}

/**
 * 任何诊断都视为编译失败。
 */
export function hasErrors(result: UnitCheckResult): boolean {
  return result.diagnostics.length > 0;
}
