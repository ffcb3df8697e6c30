/**
 * vault 作用域元数据：由静态分析产出，运行时守卫据此决定每个 safe 块进入时解密哪些绑定。
 */

import type { Span } from '../types.js';

export interface SafeBlockMetadata {
  /** `<function>#safe<n>`，按前序编号 */
  readonly id: string;
  readonly parent: string | null;
  /** 由本块负责解密与清零的 vault 绑定（本块是引用它们的最外层活动块） */
  readonly owned: readonly string[];
  /** 子树内引用到的全部 vault 绑定 */
  readonly referenced: readonly string[];
  readonly span: Span;
}

export interface VaultBindingMetadata {
  readonly name: string;
  readonly type: string;
  /** 声明时所在的最内层 safe 块；在 safe 块之外声明时为 null */
  readonly declaredIn: string | null;
  readonly span: Span;
}

export interface FunctionVaultMetadata {
  readonly function: string;
  readonly blocks: readonly SafeBlockMetadata[];
  readonly bindings: readonly VaultBindingMetadata[];
}

export type VaultScopeMetadata = ReadonlyMap<string, FunctionVaultMetadata>;

export function findBlock(metadata: VaultScopeMetadata, blockId: string): SafeBlockMetadata | undefined {
  const func = metadata.get(blockId.split('#', 1)[0] ?? '');
  return func?.blocks.find(block => block.id === blockId);
}
