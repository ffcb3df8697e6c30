// Core type definitions shared by every checking pass

export interface Position {
  readonly line: number;
  readonly col: number;
}

export interface Span {
  readonly start: Position;
  readonly end: Position;
}

// Optional file-backed origin info; used by the CLI when printing diagnostics
export interface Origin {
  readonly file?: string;
  readonly start: Position;
  readonly end: Position;
}

/**
 * 绑定的可变性种类。
 *
 * - `lock`：不可变，只能赋值一次
 * - `stract`：可变，但首次赋值后类型固定
 * - `vault`：加密绑定，只在 safe 块内以明文存在；同样只能赋值一次
 */
export type BindingMode = 'lock' | 'stract' | 'vault';
