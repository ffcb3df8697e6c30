// Literal-level type inference for binding checks; defers to front-end annotations

import type { Expression } from '../ast/ast.js';

export const UNKNOWN_TYPE = 'Unknown';

const BOOL_OPS = new Set(['==', '!=', '<', '>', '<=', '>=', '&&', '||', 'and', 'or', 'not']);
const ARITH_OPS = new Set(['+', '-', '*', '/', '%']);

export type TypeLookup = (name: string) => string | undefined;

export function isKnownType(type: string | undefined): type is string {
  return type !== undefined && type !== UNKNOWN_TYPE;
}

/**
 * 推断表达式的值类型。外部类型标注优先；无法确定时返回 Unknown。
 */
export function inferValueType(expr: Expression, lookup: TypeLookup = () => undefined): string {
  if (expr.type) return expr.type;
  switch (expr.kind) {
    case 'Literal':
      if (typeof expr.value === 'string') return 'Text';
      if (typeof expr.value === 'boolean') return 'Bool';
      return Number.isInteger(expr.value) ? 'Int' : 'Float';
    case 'Name':
      return lookup(expr.name) ?? UNKNOWN_TYPE;
    case 'Binary': {
      if (BOOL_OPS.has(expr.op)) return 'Bool';
      const left = inferValueType(expr.left, lookup);
      const right = inferValueType(expr.right, lookup);
      if (!ARITH_OPS.has(expr.op) || !isKnownType(left) || !isKnownType(right)) return UNKNOWN_TYPE;
      if (left === right) return left;
      if (expr.op === '+' && (left === 'Text' || right === 'Text')) return 'Text';
      if ((left === 'Int' && right === 'Float') || (left === 'Float' && right === 'Int')) return 'Float';
      return UNKNOWN_TYPE;
    }
    case 'Call':
      return UNKNOWN_TYPE;
    case 'Lambda':
      return 'Fn';
  }
}
