/**
 * @module stract-core
 *
 * Stract 语言安全核心的主要 API 接口。
 *
 * 前端（词法、语法分析与类型推断）产出 AST 后，由本包完成编译期安全检查：
 *
 * ```
 * AST → 能力声明解析 → 调用图 → 能力闭包不动点 → 能力检查
 *     → vault 作用域分析 → 可变性校验 → 诊断
 * ```
 *
 * 运行时由 VaultGuard 负责 vault 值的加密保存与明文缓冲区清零。
 *
 * @example 基础用法
 * ```typescript
 * import { Ast, checkUnit, formatDiagnostic } from 'stract-core';
 *
 * const unit = Ast.Unit('app', [Ast.Capability('Http', { domain: '*.example.com' })], [
 *   Ast.Func('main', [Ast.Expr(Ast.Call('Http.get', [Ast.Text('https://api.example.com/v1')]))]),
 * ]);
 * for (const diagnostic of checkUnit(unit).diagnostics) {
 *   console.log(formatDiagnostic(diagnostic));
 * }
 * ```
 */

export { checkUnit, hasErrors, type CheckOptions, type UnitCheckResult } from './pipeline.js';

export * from './ast/index.js';
export * from './diagnostics/index.js';
export * from './effects/index.js';
export * from './capabilities/index.js';
export * from './vault/index.js';

export { validateMutability } from './typecheck/mutability.js';
export { BindingScope, type ScopeType } from './typecheck/binding_scope.js';

export {
  DEFAULT_EFFECT_PREFIXES,
  loadEffectConfig,
  prefixRules,
  reloadEffectConfig,
  type EffectPrefixConfig,
  type PrefixRule,
} from './config/effect_config.js';
export { ConfigService, DEFAULT_EFFECT_CONFIG_PATH } from './config/config-service.js';
export { LogLevel, Logger, createLogger, type LogMetadata, type LogSink } from './utils/logger.js';

export type { BindingMode, Origin, Position, Span } from './types.js';
