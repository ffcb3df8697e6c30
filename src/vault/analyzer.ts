/**
 * @module vault/analyzer
 *
 * vault 绑定的静态作用域分析。
 *
 * 每个解密后的 vault 值都是一个污点值，绑定到产生它的 safe 块（owner）：
 * - owner 为引用处最外层的活动 safe 块；嵌套块复用 owner 的明文
 * - 在 owner 内声明并以污点值初始化的绑定同样被污染
 * - 污点值被赋给 owner 之外声明的绑定、被 return、或经由闭包逃出 owner 时报告逃逸
 * - 污点值作为实参传入需要能力的调用时，与能力检查结果交叉核对
 *
 * 循环体与 lambda 体重复分析直到绑定上的污点不再增长。闭包按引用捕获绑定，
 * 其捕获集的污点在函数分析结束时求值，因此捕获之后才被污染的绑定同样会被发现。
 */

import type * as A from '../ast/ast.js';
import type { Span } from '../types.js';
import { DiagnosticBuilder, type Diagnostic } from '../diagnostics/diagnostics.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import type { EffectSite } from '../effects/call_graph.js';
import type { EffectSets } from '../effects/effect_closure.js';
import type { CoverageReport } from '../capabilities/checker.js';
import { BindingScope } from '../typecheck/binding_scope.js';
import { inferValueType, UNKNOWN_TYPE } from '../typecheck/value_types.js';
import type { FunctionVaultMetadata, VaultBindingMetadata, VaultScopeMetadata } from './metadata.js';

interface Taint {
  /** 产生明文的 safe 块 id */
  readonly owner: string;
  /** 明文来源的 vault 绑定名 */
  readonly source: string;
  /** 值为捕获了明文或 vault 绑定的闭包 */
  readonly closure: boolean;
}

interface TrackedBinding {
  readonly name: string;
  readonly vault: boolean;
  /** 声明时活动的 safe 块 id（外层在前） */
  readonly safePath: readonly string[];
  /** 声明处外围的循环层数 */
  readonly depth: number;
  taint: Taint | null;
  /** 绑定持有闭包时，闭包捕获的非 vault 绑定 */
  captures: Set<TrackedBinding>;
}

/** 表达式求值结果 */
interface Value {
  readonly taint: Taint | null;
  readonly captures: ReadonlySet<TrackedBinding>;
}

interface SafeRecord {
  readonly id: string;
  readonly parent: string | null;
  readonly span: Span;
  readonly owned: Set<string>;
  readonly referenced: Set<string>;
}

/** 闭包流入某处时登记，函数结束后按捕获集的最终污点判定 */
interface PendingCapture {
  readonly captures: readonly TrackedBinding[];
  readonly safePath: readonly string[];
  readonly how: (taint: Taint) => string;
  readonly span: Span;
}

export interface VaultAnalysisOptions {
  /** 能力检查的覆盖结果；为 null 时（声明错误导致检查被跳过）不做交叉核对 */
  readonly coverage?: CoverageReport | null;
  readonly effectSets?: EffectSets | null;
}

export interface VaultAnalysisResult {
  readonly diagnostics: Diagnostic[];
  readonly metadata: VaultScopeMetadata;
}

const EMPTY: Value = { taint: null, captures: new Set() };

function sameStart(a: Span, b: Span): boolean {
  return a.start.line === b.start.line && a.start.col === b.start.col;
}

function mergeValues(values: readonly Value[]): Value {
  let taint: Taint | null = null;
  const captures = new Set<TrackedBinding>();
  for (const value of values) {
    taint ??= value.taint;
    for (const binding of value.captures) captures.add(binding);
  }
  return { taint, captures };
}

/** 沿捕获链查找第一个被污染的绑定 */
function capturedTaint(captures: Iterable<TrackedBinding>, seen = new Set<TrackedBinding>()): Taint | null {
  for (const binding of captures) {
    if (seen.has(binding)) continue;
    seen.add(binding);
    if (binding.taint) return { ...binding.taint, closure: true };
    const nested = capturedTaint(binding.captures, seen);
    if (nested) return nested;
  }
  return null;
}

function effectiveTaint(value: Value): Taint | null {
  return value.taint ?? capturedTaint(value.captures);
}

class FunctionVaultAnalyzer {
  private scope: BindingScope<TrackedBinding>;
  private readonly safeStack: SafeRecord[] = [];
  /** 按前序排列 */
  private readonly blocks: SafeRecord[] = [];
  private readonly safeRecords = new Map<A.Safe, SafeRecord>();
  private readonly vaultBindings: VaultBindingMetadata[] = [];
  /** 声明节点（Let、For、lambda 参数）到绑定；重复分析时复用 */
  private readonly declared = new Map<object, TrackedBinding>();
  private readonly lambdaCaptures: Set<TrackedBinding>[] = [];
  /** 每层正在迭代的循环或 lambda 体是否需要再分析一遍 */
  private readonly loopDirty: boolean[] = [];
  private readonly pending: PendingCapture[] = [];
  private readonly reported = new Set<string>();

  constructor(
    private readonly func: A.FunctionDecl,
    private readonly localFunctions: ReadonlySet<string>,
    private readonly diagnostics: DiagnosticBuilder,
    private readonly options: VaultAnalysisOptions
  ) {
    this.scope = BindingScope.root<TrackedBinding>();
    for (const param of func.params) {
      this.scope.define(this.declare(param, param.name, false).binding);
    }
  }

  run(): FunctionVaultMetadata {
    this.visitBlock(this.func.body, 'block');
    for (const check of this.pending) {
      const taint = capturedTaint(check.captures);
      if (taint && !check.safePath.includes(taint.owner)) this.reportEscape(taint, check.how(taint), check.span);
    }
    return {
      function: this.func.name,
      blocks: this.blocks.map(record => ({
        id: record.id,
        parent: record.parent,
        owned: [...record.owned].sort(),
        referenced: [...record.referenced].sort(),
        span: record.span,
      })),
      bindings: this.vaultBindings,
    };
  }

  // ----------------------------------------------------------------
  // 语句
  // ----------------------------------------------------------------

  private visitBlock(block: A.Block, type: 'block' | 'safe'): void {
    const saved = this.scope;
    this.scope = this.scope.enter(type);
    try {
      for (const statement of block.statements) this.visitStatement(statement);
    } finally {
      this.scope = saved;
    }
  }

  private visitStatement(statement: A.Statement): void {
    switch (statement.kind) {
      case 'Let':
        this.visitLet(statement);
        return;
      case 'Assign':
        this.visitAssign(statement);
        return;
      case 'ExprStmt':
        this.visitExpression(statement.expr);
        return;
      case 'Return': {
        const value = statement.expr ? this.visitExpression(statement.expr) : EMPTY;
        // lambda 内的 return 只把值交还给调用处；闭包本身的逃逸由捕获分析负责
        if (this.lambdaCaptures.length === 0) {
          this.checkEscape(value, [], statement.span, taint =>
            taint.closure ? `captured by a closure returned from '${this.func.name}'` : `returned from '${this.func.name}'`
          );
        }
        return;
      }
      case 'If':
        this.visitExpression(statement.cond);
        this.visitBlock(statement.thenBlock, 'block');
        if (statement.elseBlock) this.visitBlock(statement.elseBlock, 'block');
        return;
      case 'While':
        this.iterate(() => {
          this.visitExpression(statement.cond);
          this.visitBlock(statement.body, 'block');
        });
        return;
      case 'For': {
        const bounds = mergeValues([this.visitExpression(statement.start), this.visitExpression(statement.end)]);
        this.iterate(() => {
          const saved = this.scope;
          this.scope = this.scope.enter('block');
          try {
            const { binding } = this.declare(statement, statement.iterator, false);
            binding.taint = bounds.taint;
            binding.captures = new Set(bounds.captures);
            this.scope.define(binding);
            for (const inner of statement.body.statements) this.visitStatement(inner);
          } finally {
            this.scope = saved;
          }
        });
        return;
      }
      case 'Safe':
        this.visitSafe(statement);
        return;
      case 'Block':
        this.visitBlock(statement, 'block');
        return;
    }
  }

  private visitLet(statement: A.Let): void {
    const value = statement.init ? this.visitExpression(statement.init) : EMPTY;
    const { binding, fresh } = this.declare(statement, statement.name, statement.mode === 'vault');
    this.scope.define(binding);
    if (binding.vault) {
      // 初始化表达式即被封存的明文来源，不构成逃逸
      if (fresh) {
        this.vaultBindings.push({
          name: statement.name,
          type: statement.type ?? (statement.init ? inferValueType(statement.init) : UNKNOWN_TYPE),
          declaredIn: binding.safePath[binding.safePath.length - 1] ?? null,
          span: statement.span,
        });
      }
      return;
    }
    // 每次执行声明都重新初始化绑定
    binding.taint = this.checkEscape(value, binding.safePath, statement.span, taint =>
      this.assignmentHow(taint, statement.name)
    );
    binding.captures = new Set(value.captures);
    binding.captures.delete(binding);
  }

  private visitAssign(statement: A.Assign): void {
    const value = this.visitExpression(statement.expr);
    const target = this.scope.lookup(statement.name);
    if (target?.vault) return;
    const taint = this.checkEscape(value, target?.safePath ?? [], statement.span, escaped =>
      this.assignmentHow(escaped, statement.name)
    );
    if (target) this.absorb(target, { taint, captures: value.captures });
  }

  private visitSafe(statement: A.Safe): void {
    let record = this.safeRecords.get(statement);
    if (!record) {
      // 前序编号：首次访问时登记
      const parent = this.safeStack[this.safeStack.length - 1];
      record = {
        id: `${this.func.name}#safe${this.blocks.length + 1}`,
        parent: parent?.id ?? null,
        span: statement.span,
        owned: new Set(),
        referenced: new Set(),
      };
      this.safeRecords.set(statement, record);
      this.blocks.push(record);
    }
    this.safeStack.push(record);
    try {
      this.visitBlock(statement.body, 'safe');
    } finally {
      this.safeStack.pop();
    }
  }

  // ----------------------------------------------------------------
  // 表达式：返回值携带的污点与闭包捕获
  // ----------------------------------------------------------------

  private visitExpression(expr: A.Expression): Value {
    switch (expr.kind) {
      case 'Literal':
        return EMPTY;
      case 'Name':
        return this.readBinding(expr.name, expr.span);
      case 'Binary':
        return mergeValues([this.visitExpression(expr.left), this.visitExpression(expr.right)]);
      case 'Call':
        return this.visitCall(expr);
      case 'Lambda':
        return this.visitLambda(expr);
    }
  }

  private readBinding(name: string, span: Span): Value {
    const resolved = this.scope.resolve(name);
    if (!resolved) return EMPTY;
    const { binding, captured } = resolved;
    if (captured) this.lambdaCaptures[this.lambdaCaptures.length - 1]?.add(binding);

    if (!binding.vault) return { taint: binding.taint, captures: binding.captures };

    const owner = this.safeStack[0];
    if (!owner) {
      this.report(ErrorCode.VAULT_OUTSIDE_SAFE, span, { name });
      return EMPTY;
    }
    owner.owned.add(binding.name);
    for (const active of this.safeStack) active.referenced.add(binding.name);
    return { taint: { owner: owner.id, source: binding.name, closure: false }, captures: EMPTY.captures };
  }

  private visitCall(call: A.Call): Value {
    const args = mergeValues(call.args.map(arg => this.visitExpression(arg)));
    const argTaint = effectiveTaint(args);
    if (argTaint) this.crossCheckCall(call, argTaint);

    // 调用绑定着闭包的名字：返回值可能是闭包读到的明文
    let returned: Taint | null = null;
    if (this.scope.lookup(call.callee)) {
      const callee = this.readBinding(call.callee, call.span);
      const taint = effectiveTaint(callee);
      if (taint) returned = { ...taint, closure: false };
    }
    return { taint: args.taint ?? returned, captures: args.captures };
  }

  private visitLambda(lambda: A.Lambda): Value {
    const saved = this.scope;
    const captures = new Set<TrackedBinding>();
    this.lambdaCaptures.push(captures);
    try {
      // lambda 体可被调用任意多次，按循环处理
      this.iterate(() => {
        this.scope = saved.enter('lambda');
        for (const param of lambda.params) {
          const { binding } = this.declare(param, param.name, false);
          binding.taint = null;
          binding.captures = new Set();
          this.scope.define(binding);
        }
        this.visitBlock(lambda.body, 'block');
      });
    } finally {
      this.lambdaCaptures.pop();
      this.scope = saved;
    }

    // 捕获向外层闭包传递
    const outer = this.lambdaCaptures[this.lambdaCaptures.length - 1];
    const owner = this.safeStack[0];
    let taint: Taint | null = null;
    const plain = new Set<TrackedBinding>();
    for (const binding of captures) {
      const resolved = this.scope.resolve(binding.name);
      if (outer && resolved?.binding === binding && resolved.captured) outer.add(binding);
      if (!binding.vault) {
        plain.add(binding);
      } else if (owner && !taint) {
        taint = { owner: owner.id, source: binding.name, closure: true };
      }
    }
    return { taint, captures: plain };
  }

  // ----------------------------------------------------------------
  // 辅助
  // ----------------------------------------------------------------

  private safePath(): string[] {
    return this.safeStack.map(active => active.id);
  }

  private declare(node: object, name: string, vault: boolean): { binding: TrackedBinding; fresh: boolean } {
    const existing = this.declared.get(node);
    if (existing) return { binding: existing, fresh: false };
    const binding: TrackedBinding = {
      name,
      vault,
      safePath: this.safePath(),
      depth: this.loopDirty.length,
      taint: null,
      captures: new Set(),
    };
    this.declared.set(node, binding);
    return { binding, fresh: true };
  }

  private iterate(pass: () => void): void {
    const level = this.loopDirty.length;
    this.loopDirty.push(true);
    try {
      while (this.loopDirty[level]) {
        this.loopDirty[level] = false;
        pass();
      }
    } finally {
      this.loopDirty.pop();
    }
  }

  /** 合并新值；绑定有增长时，声明处以内的各层循环需要再分析一遍 */
  private absorb(binding: TrackedBinding, value: Value): void {
    let changed = false;
    if (!binding.taint && value.taint) {
      binding.taint = value.taint;
      changed = true;
    }
    for (const captured of value.captures) {
      if (captured === binding || binding.captures.has(captured)) continue;
      binding.captures.add(captured);
      changed = true;
    }
    if (!changed) return;
    for (let level = binding.depth; level < this.loopDirty.length; level++) this.loopDirty[level] = true;
  }

  /**
   * 值流入声明于 safePath 之下的位置。直接携带的污点立即判定；
   * 闭包捕获的绑定登记到函数结束时判定。
   *
   * @returns 未逃逸时保留的污点
   */
  private checkEscape(
    value: Value,
    safePath: readonly string[],
    span: Span,
    how: (taint: Taint) => string
  ): Taint | null {
    const { taint } = value;
    if (taint && !safePath.includes(taint.owner)) {
      this.reportEscape(taint, how(taint), span);
      return null;
    }
    if (value.captures.size > 0) this.pending.push({ captures: [...value.captures], safePath, how, span });
    return taint;
  }

  private assignmentHow(taint: Taint, target: string): string {
    return taint.closure
      ? `captured by a closure assigned to '${target}' outside the safe block`
      : `assigned to '${target}' outside the safe block`;
  }

  private reportEscape(taint: Taint, how: string, span: Span): void {
    this.report(ErrorCode.VAULT_ESCAPES_SAFE, span, { name: taint.source, how });
  }

  /** 重复分析的循环体不重复报告 */
  private report(code: ErrorCode, span: Span, params: Readonly<Record<string, string>>): void {
    const key = `${code}@${span.start.line}:${span.start.col}:${Object.values(params).join('|')}`;
    if (this.reported.has(key)) return;
    this.reported.add(key);
    this.diagnostics.report(code, span, params);
  }

  /**
   * 污点实参传入的调用：本地函数取其能力闭包，其余调用取该调用点自身的效应点。
   */
  private crossCheckCall(call: A.Call, taint: Taint): void {
    const { coverage, effectSets } = this.options;
    if (!coverage || !effectSets) return;

    let required: readonly EffectSite[];
    if (this.localFunctions.has(call.callee)) {
      required = effectSets.get(call.callee)?.sites ?? [];
    } else {
      required = (effectSets.get(this.func.name)?.sites ?? []).filter(
        site => site.owner === this.func.name && site.callee === call.callee && sameStart(site.span, call.span)
      );
    }

    const kinds = new Set<string>();
    for (const site of required) {
      if (coverage.get(site.id)?.covered === true || kinds.has(site.kind)) continue;
      kinds.add(site.kind);
      this.report(ErrorCode.VAULT_UNDECLARED_CAPABILITY, call.span, {
        name: taint.source,
        callee: call.callee,
        kind: site.kind,
      });
    }
  }
}

/**
 * 分析整个编译单元的 vault 作用域。各函数独立分析；元数据按函数名排序。
 */
export function analyzeVaults(unit: A.CompilationUnit, options: VaultAnalysisOptions = {}): VaultAnalysisResult {
  const diagnostics = new DiagnosticBuilder();
  const localFunctions = new Set(unit.functions.map(func => func.name));
  const metadata = new Map<string, FunctionVaultMetadata>();

  const ordered = [...unit.functions].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const func of ordered) {
    metadata.set(func.name, new FunctionVaultAnalyzer(func, localFunctions, diagnostics, options).run());
  }

  return { diagnostics: diagnostics.getDiagnostics(), metadata };
}
