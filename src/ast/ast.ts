import type { BindingMode, Span } from '../types.js';

/**
 * 安全核心所消费的 AST。
 *
 * 由外部前端（词法/语法分析与类型推断）产出；本模块只描述结构，不做任何解析。
 * 所有节点都带有 `span`，用于诊断定位与排序。
 */

export interface Node {
  readonly span: Span;
}

// ============================================================
// 编译单元与头部声明
// ============================================================

export interface CompilationUnit {
  readonly kind: 'Unit';
  readonly name: string;
  readonly capabilities: readonly CapabilityDecl[];
  readonly functions: readonly FunctionDecl[];
  /** 入口函数；缺省时使用 `main`，若无 `main` 则视所有函数为入口（库单元） */
  readonly entryPoints?: readonly string[];
  readonly span?: Span;
}

/** `use capability <Name> { key: "value", ... }` */
export interface CapabilityDecl extends Node {
  readonly kind: 'CapabilityDecl';
  readonly name: string;
  readonly fields: readonly CapabilityField[];
}

export interface CapabilityField extends Node {
  readonly key: string;
  readonly value: string;
}

export interface Parameter {
  readonly name: string;
  readonly type?: string;
}

export interface FunctionDecl extends Node {
  readonly kind: 'Func';
  readonly name: string;
  readonly params: readonly Parameter[];
  readonly body: Block;
}

// ============================================================
// 语句
// ============================================================

export interface Block extends Node {
  readonly kind: 'Block';
  readonly statements: readonly Statement[];
}

/** `lock|stract|vault <name> = <init>`；init 缺省表示仅声明 */
export interface Let extends Node {
  readonly kind: 'Let';
  readonly mode: BindingMode;
  readonly name: string;
  readonly type?: string;
  readonly init?: Expression;
}

export interface Assign extends Node {
  readonly kind: 'Assign';
  readonly name: string;
  readonly expr: Expression;
}

export interface ExprStmt extends Node {
  readonly kind: 'ExprStmt';
  readonly expr: Expression;
}

export interface Return extends Node {
  readonly kind: 'Return';
  readonly expr?: Expression;
}

export interface If extends Node {
  readonly kind: 'If';
  readonly cond: Expression;
  readonly thenBlock: Block;
  readonly elseBlock?: Block;
}

export interface While extends Node {
  readonly kind: 'While';
  readonly cond: Expression;
  readonly body: Block;
}

/** `for <iterator> in <start>..<end> { ... }` */
export interface For extends Node {
  readonly kind: 'For';
  readonly iterator: string;
  readonly start: Expression;
  readonly end: Expression;
  readonly body: Block;
}

/** `safe { ... }`：唯一允许 vault 明文存在的词法作用域 */
export interface Safe extends Node {
  readonly kind: 'Safe';
  readonly body: Block;
}

export type Statement = Let | Assign | ExprStmt | Return | If | While | For | Safe | Block;

// ============================================================
// 表达式
// ============================================================

interface Typed {
  /** 外部类型推断给出的类型名；缺省时由各 pass 自行做字面量级推断 */
  readonly type?: string;
}

export type LiteralValue = string | number | boolean;

export interface Literal extends Node, Typed {
  readonly kind: 'Literal';
  readonly value: LiteralValue;
}

export interface Name extends Node, Typed {
  readonly kind: 'Name';
  readonly name: string;
}

export interface Binary extends Node, Typed {
  readonly kind: 'Binary';
  readonly op: string;
  readonly left: Expression;
  readonly right: Expression;
}

/** 前端已解析的效应标注：效应种类 + 用于约束匹配的目标参数 */
export interface EffectAnnotation {
  readonly kind: string;
  readonly target: Readonly<Record<string, string>>;
}

export interface Call extends Node, Typed {
  readonly kind: 'Call';
  readonly callee: string;
  readonly args: readonly Expression[];
  readonly effect?: EffectAnnotation;
}

export interface Lambda extends Node, Typed {
  readonly kind: 'Lambda';
  readonly params: readonly Parameter[];
  readonly body: Block;
}

export type Expression = Literal | Name | Binary | Call | Lambda;
