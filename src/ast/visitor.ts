import type * as A from './ast.js';

/**
 * 统一的 AST 遍历器接口与默认实现。
 *
 * 设计目标：
 * - 提供统一的入口 `visitUnit/visitFunction/visitBlock/visitStatement/visitExpression`
 * - 默认实现执行深度优先的递归遍历；具体 pass 按需覆写感兴趣的节点方法
 * - 仅依赖 AST 类型，不引入额外运行时依赖
 */

/**
 * Visitor 遍历的上下文对象
 */
export interface VisitorContext {
  /** 当前函数名称（如果在函数内） */
  functionName?: string;
  /** 当前 safe 块嵌套深度 */
  safeDepth: number;
  /** 当前 lambda 嵌套深度 */
  lambdaDepth: number;
}

/**
 * 创建空的 Visitor 上下文
 */
export function createVisitorContext(functionName?: string): VisitorContext {
  return {
    ...(functionName !== undefined ? { functionName } : {}),
    safeDepth: 0,
    lambdaDepth: 0,
  };
}

export interface AstVisitor<Ctx, R = void> {
  visitUnit(unit: A.CompilationUnit, ctx: Ctx): R;
  visitFunction(func: A.FunctionDecl, ctx: Ctx): R;
  visitBlock(block: A.Block, ctx: Ctx): R;
  visitStatement(statement: A.Statement, ctx: Ctx): R;
  visitExpression(expression: A.Expression, ctx: Ctx): R;
}

/**
 * 默认的 AST 递归遍历器。
 *
 * - 覆写某个 `visitXxx` 方法即可插入自定义逻辑；调用 `super.visitXxx` 继续默认递归。
 * - `switch` 与 `ast.ts` 中节点 kind 保持一一对应。
 */
export class DefaultAstVisitor<Ctx extends VisitorContext = VisitorContext> implements AstVisitor<Ctx, void> {
  visitUnit(unit: A.CompilationUnit, ctx: Ctx): void {
    for (const func of unit.functions) this.visitFunction(func, ctx);
  }

  visitFunction(func: A.FunctionDecl, ctx: Ctx): void {
    this.visitBlock(func.body, ctx);
  }

  visitBlock(block: A.Block, ctx: Ctx): void {
    for (const statement of block.statements) this.visitStatement(statement, ctx);
  }

  visitStatement(statement: A.Statement, ctx: Ctx): void {
    switch (statement.kind) {
      case 'Let':
        if (statement.init) this.visitExpression(statement.init, ctx);
        return;
      case 'Assign':
      case 'ExprStmt':
        this.visitExpression(statement.expr, ctx);
        return;
      case 'Return':
        if (statement.expr) this.visitExpression(statement.expr, ctx);
        return;
      case 'If':
        this.visitExpression(statement.cond, ctx);
        this.visitBlock(statement.thenBlock, ctx);
        if (statement.elseBlock) this.visitBlock(statement.elseBlock, ctx);
        return;
      case 'While':
        this.visitExpression(statement.cond, ctx);
        this.visitBlock(statement.body, ctx);
        return;
      case 'For':
        this.visitExpression(statement.start, ctx);
        this.visitExpression(statement.end, ctx);
        this.visitBlock(statement.body, ctx);
        return;
      case 'Safe':
        ctx.safeDepth += 1;
        try {
          this.visitBlock(statement.body, ctx);
        } finally {
          ctx.safeDepth -= 1;
        }
        return;
      case 'Block':
        this.visitBlock(statement, ctx);
        return;
    }
  }

  visitExpression(expression: A.Expression, ctx: Ctx): void {
    switch (expression.kind) {
      case 'Literal':
      case 'Name':
        return;
      case 'Binary':
        this.visitExpression(expression.left, ctx);
        this.visitExpression(expression.right, ctx);
        return;
      case 'Call':
        for (const arg of expression.args) this.visitExpression(arg, ctx);
        return;
      case 'Lambda':
        ctx.lambdaDepth += 1;
        try {
          this.visitBlock(expression.body, ctx);
        } finally {
          ctx.lambdaDepth -= 1;
        }
        return;
    }
  }
}
