// AST constructors for front ends, tests and the JSON unit loader

import type { BindingMode, Position, Span } from '../types.js';
import type * as A from './ast.js';

const ORIGIN: Position = { line: 1, col: 1 };

export function spanAt(line: number, col: number, endCol = col): Span {
  return { start: { line, col }, end: { line, col: endCol } };
}

export const syntheticSpan: Span = { start: ORIGIN, end: ORIGIN };

export const Ast = {
  Unit: (
    name: string,
    capabilities: readonly A.CapabilityDecl[],
    functions: readonly A.FunctionDecl[],
    entryPoints?: readonly string[]
  ): A.CompilationUnit => ({
    kind: 'Unit',
    name,
    capabilities,
    functions,
    ...(entryPoints ? { entryPoints } : {}),
  }),
  Capability: (
    name: string,
    fields: Readonly<Record<string, string>>,
    span: Span = syntheticSpan
  ): A.CapabilityDecl => ({
    kind: 'CapabilityDecl',
    name,
    fields: Object.entries(fields).map(([key, value]) => ({ key, value, span })),
    span,
  }),
  Func: (
    name: string,
    statements: readonly A.Statement[],
    span: Span = syntheticSpan,
    params: readonly A.Parameter[] = []
  ): A.FunctionDecl => ({
    kind: 'Func',
    name,
    params,
    body: { kind: 'Block', statements, span },
    span,
  }),
  Block: (statements: readonly A.Statement[], span: Span = syntheticSpan): A.Block => ({
    kind: 'Block',
    statements,
    span,
  }),

  // Statements
  Let: (
    mode: BindingMode,
    name: string,
    init: A.Expression | undefined,
    span: Span = syntheticSpan,
    type?: string
  ): A.Let => ({
    kind: 'Let',
    mode,
    name,
    ...(init ? { init } : {}),
    ...(type ? { type } : {}),
    span,
  }),
  Assign: (name: string, expr: A.Expression, span: Span = syntheticSpan): A.Assign => ({
    kind: 'Assign',
    name,
    expr,
    span,
  }),
  Expr: (expr: A.Expression, span: Span = expr.span): A.ExprStmt => ({ kind: 'ExprStmt', expr, span }),
  Return: (expr?: A.Expression, span: Span = syntheticSpan): A.Return => ({
    kind: 'Return',
    ...(expr ? { expr } : {}),
    span,
  }),
  If: (
    cond: A.Expression,
    thenStatements: readonly A.Statement[],
    elseStatements?: readonly A.Statement[],
    span: Span = syntheticSpan
  ): A.If => ({
    kind: 'If',
    cond,
    thenBlock: { kind: 'Block', statements: thenStatements, span },
    ...(elseStatements ? { elseBlock: { kind: 'Block', statements: elseStatements, span } } : {}),
    span,
  }),
  While: (cond: A.Expression, body: readonly A.Statement[], span: Span = syntheticSpan): A.While => ({
    kind: 'While',
    cond,
    body: { kind: 'Block', statements: body, span },
    span,
  }),
  For: (
    iterator: string,
    start: A.Expression,
    end: A.Expression,
    body: readonly A.Statement[],
    span: Span = syntheticSpan
  ): A.For => ({
    kind: 'For',
    iterator,
    start,
    end,
    body: { kind: 'Block', statements: body, span },
    span,
  }),
  Safe: (body: readonly A.Statement[], span: Span = syntheticSpan): A.Safe => ({
    kind: 'Safe',
    body: { kind: 'Block', statements: body, span },
    span,
  }),

  // Expressions
  Text: (value: string, span: Span = syntheticSpan): A.Literal => ({ kind: 'Literal', value, span }),
  Num: (value: number, span: Span = syntheticSpan): A.Literal => ({ kind: 'Literal', value, span }),
  Bool: (value: boolean, span: Span = syntheticSpan): A.Literal => ({ kind: 'Literal', value, span }),
  Name: (name: string, span: Span = syntheticSpan): A.Name => ({ kind: 'Name', name, span }),
  Binary: (op: string, left: A.Expression, right: A.Expression, span: Span = left.span): A.Binary => ({
    kind: 'Binary',
    op,
    left,
    right,
    span,
  }),
  Call: (
    callee: string,
    args: readonly A.Expression[] = [],
    span: Span = syntheticSpan,
    effect?: A.EffectAnnotation
  ): A.Call => ({
    kind: 'Call',
    callee,
    args,
    ...(effect ? { effect } : {}),
    span,
  }),
  Lambda: (body: readonly A.Statement[], span: Span = syntheticSpan, params: readonly A.Parameter[] = []): A.Lambda => ({
    kind: 'Lambda',
    params,
    body: { kind: 'Block', statements: body, span },
    span,
  }),
};
