/**
 * @module ast
 *
 * 安全核心消费的 AST 定义。
 *
 * 包含：
 * - 节点类型 (CompilationUnit, Statement, Expression)
 * - 构造工具 (Ast, spanAt)
 * - 遍历器 (DefaultAstVisitor)
 */

export type * from './ast.js';
export { Ast, spanAt, syntheticSpan } from './builders.js';
export {
  DefaultAstVisitor,
  createVisitorContext,
  type AstVisitor,
  type VisitorContext,
} from './visitor.js';
