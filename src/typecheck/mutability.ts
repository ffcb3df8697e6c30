/**
 * @module typecheck/mutability
 *
 * 可变性校验：
 * - `lock`：确定赋值分析，任一路径上的第二次赋值报告 "lock reassigned"；
 *   读取处若不是恰好被一次赋值到达，报告 "lock used before assignment"（vault 为 "vault used before assignment"）
 * - `vault`：与 lock 相同的单次赋值规则（"vault reassigned"）
 * - `stract`：可多次赋值，但类型在第一次赋值时固定；已知类型不同的再赋值报告 "stract retyped"
 *
 * 控制流：If 在汇合点合并状态；While/For/Lambda 的循环体可能执行零次或多次，迭代到不动点；
 * Return 之后的路径终止。
 */

import type * as A from '../ast/ast.js';
import type { BindingMode, Span } from '../types.js';
import { DiagnosticBuilder, type Diagnostic } from '../diagnostics/diagnostics.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import { BindingScope } from './binding_scope.js';
import { inferValueType, isKnownType } from './value_types.js';

/** 单个绑定在某程序点的赋值状态 */
type AssignState = 'unassigned' | 'assigned' | 'maybe';

interface MutBinding {
  readonly name: string;
  readonly mode: BindingMode | 'param';
  /** 已固定的类型；stract 在第一次赋值时确定 */
  type: string | undefined;
}

interface FlowState {
  readonly assigned: Map<MutBinding, AssignState>;
  dead: boolean;
}

function cloneState(state: FlowState): FlowState {
  return { assigned: new Map(state.assigned), dead: state.dead };
}

function joinStates(a: FlowState, b: FlowState): FlowState {
  if (a.dead) return cloneState(b);
  if (b.dead) return cloneState(a);
  const assigned = new Map<MutBinding, AssignState>();
  for (const [binding, left] of a.assigned) {
    const right = b.assigned.get(binding);
    // 仅在一侧声明的绑定出了该侧作用域即不可见
    if (right === undefined) continue;
    assigned.set(binding, left === right ? left : 'maybe');
  }
  return { assigned, dead: false };
}

function sameState(a: FlowState, b: FlowState): boolean {
  if (a.dead !== b.dead || a.assigned.size !== b.assigned.size) return false;
  for (const [binding, value] of a.assigned) {
    if (b.assigned.get(binding) !== value) return false;
  }
  return true;
}

const MAX_LOOP_PASSES = 8;

function isSingleAssignment(binding: MutBinding): boolean {
  return binding.mode === 'lock' || binding.mode === 'vault';
}

class FunctionMutabilityValidator {
  private scope: BindingScope<MutBinding>;
  private state: FlowState = { assigned: new Map(), dead: false };
  private readonly reported = new Set<string>();

  constructor(
    private readonly func: A.FunctionDecl,
    private readonly diagnostics: DiagnosticBuilder
  ) {
    this.scope = BindingScope.root<MutBinding>();
    for (const param of func.params) {
      this.scope.define({ name: param.name, mode: 'param', type: param.type });
    }
  }

  run(): void {
    this.visitBlock(this.func.body);
  }

  private withScope(type: 'block' | 'safe' | 'lambda', fn: () => void): void {
    const saved = this.scope;
    this.scope = this.scope.enter(type);
    try {
      fn();
    } finally {
      this.scope = saved;
    }
  }

  private visitBlock(block: A.Block, type: 'block' | 'safe' = 'block'): void {
    this.withScope(type, () => {
      for (const statement of block.statements) {
        if (this.state.dead) return;
        this.visitStatement(statement);
      }
    });
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
      case 'Return':
        if (statement.expr) this.visitExpression(statement.expr);
        this.state.dead = true;
        return;
      case 'If': {
        this.visitExpression(statement.cond);
        const entry = cloneState(this.state);
        this.visitBlock(statement.thenBlock);
        const afterThen = this.state;
        this.state = cloneState(entry);
        if (statement.elseBlock) this.visitBlock(statement.elseBlock);
        this.state = joinStates(afterThen, this.state);
        return;
      }
      case 'While':
        this.visitLoop(() => {
          this.visitExpression(statement.cond);
          this.visitBlock(statement.body);
        });
        return;
      case 'For':
        this.visitExpression(statement.start);
        this.visitExpression(statement.end);
        this.visitLoop(() => {
          this.withScope('block', () => {
            this.scope.define({ name: statement.iterator, mode: 'param', type: undefined });
            this.visitBlock(statement.body);
          });
        });
        return;
      case 'Safe':
        this.visitBlock(statement.body, 'safe');
        return;
      case 'Block':
        this.visitBlock(statement);
        return;
    }
  }

  /**
   * 循环体可能执行零次或多次：入口状态与每轮出口状态合并，直到稳定。
   */
  private visitLoop(body: () => void): void {
    const entry = cloneState(this.state);
    let input = cloneState(entry);
    for (let pass = 0; pass < MAX_LOOP_PASSES; pass += 1) {
      this.state = cloneState(input);
      body();
      const next = joinStates(entry, this.state);
      if (sameState(next, input)) break;
      input = next;
    }
    this.state = joinStates(entry, input);
  }

  private visitLet(statement: A.Let): void {
    if (statement.init) this.visitExpression(statement.init);
    const initType = statement.init ? inferValueType(statement.init, name => this.scope.lookup(name)?.type) : undefined;
    const fixedType = statement.type ?? (isKnownType(initType) ? initType : undefined);

    if (statement.mode === 'stract' && statement.type && statement.init && isKnownType(initType) && initType !== statement.type) {
      this.report(ErrorCode.STRACT_RETYPED, statement.span, {
        name: statement.name,
        expected: statement.type,
        actual: initType,
      });
    }

    const binding: MutBinding = { name: statement.name, mode: statement.mode, type: fixedType };
    this.scope.define(binding);
    this.state.assigned.set(binding, statement.init ? 'assigned' : 'unassigned');
  }

  private visitAssign(statement: A.Assign): void {
    this.visitExpression(statement.expr);
    const binding = this.scope.lookup(statement.name);
    if (!binding) return;

    if (isSingleAssignment(binding)) {
      const current = this.state.assigned.get(binding);
      if (current === 'assigned' || current === 'maybe') {
        const code = binding.mode === 'vault' ? ErrorCode.VAULT_REASSIGNED : ErrorCode.LOCK_REASSIGNED;
        this.report(code, statement.span, { name: binding.name });
      }
      this.state.assigned.set(binding, 'assigned');
      return;
    }

    if (binding.mode === 'stract') {
      const actual = inferValueType(statement.expr, name => this.scope.lookup(name)?.type);
      if (!isKnownType(actual)) return;
      if (binding.type === undefined) {
        binding.type = actual;
      } else if (binding.type !== actual) {
        this.report(ErrorCode.STRACT_RETYPED, statement.span, {
          name: binding.name,
          expected: binding.type,
          actual,
        });
      }
      this.state.assigned.set(binding, 'assigned');
    }
  }

  private visitExpression(expr: A.Expression): void {
    switch (expr.kind) {
      case 'Literal':
        return;
      case 'Name': {
        const binding = this.scope.lookup(expr.name);
        if (binding && isSingleAssignment(binding) && this.state.assigned.get(binding) !== 'assigned') {
          const code =
            binding.mode === 'vault' ? ErrorCode.VAULT_USED_BEFORE_ASSIGNMENT : ErrorCode.LOCK_USED_BEFORE_ASSIGNMENT;
          this.report(code, expr.span, { name: expr.name });
        }
        return;
      }
      case 'Binary':
        this.visitExpression(expr.left);
        this.visitExpression(expr.right);
        return;
      case 'Call':
        for (const arg of expr.args) this.visitExpression(arg);
        return;
      case 'Lambda':
        this.visitLambda(expr);
        return;
    }
  }

  /**
   * Lambda 体可能在之后任意时刻执行任意次：按循环处理，返回语句只终止 lambda 体自身的路径。
   */
  private visitLambda(lambda: A.Lambda): void {
    const outer = this.state;
    this.state = cloneState(outer);
    this.state.dead = false;
    this.visitLoop(() => {
      this.withScope('lambda', () => {
        for (const param of lambda.params) {
          this.scope.define({ name: param.name, mode: 'param', type: param.type });
        }
        this.visitBlock(lambda.body);
      });
      this.state.dead = false;
    });
    this.state = joinStates(outer, this.state);
  }

  private report(code: ErrorCode, span: Span, params: Record<string, string>): void {
    const key = `${code}@${span.start.line}:${span.start.col}:${params.name ?? ''}`;
    if (this.reported.has(key)) return;
    this.reported.add(key);
    this.diagnostics.report(code, span, params);
  }
}

/**
 * 校验编译单元中全部函数的绑定可变性规则。
 */
export function validateMutability(unit: A.CompilationUnit): Diagnostic[] {
  const diagnostics = new DiagnosticBuilder();
  for (const func of unit.functions) {
    new FunctionMutabilityValidator(func, diagnostics).run();
  }
  return diagnostics.getDiagnostics();
}
