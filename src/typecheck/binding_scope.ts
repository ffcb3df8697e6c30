/**
 * 词法作用域链，供 vault 分析与可变性校验共用。
 *
 * 同一作用域内重复声明会覆盖旧绑定；内层作用域可遮蔽外层绑定。
 */

export type ScopeType = 'function' | 'block' | 'safe' | 'lambda';

export interface ResolvedBinding<T> {
  readonly binding: T;
  /** 查找路径是否穿过 lambda 边界（即该引用为闭包捕获） */
  readonly captured: boolean;
}

export class BindingScope<T extends { readonly name: string }> {
  private readonly bindings = new Map<string, T>();

  constructor(
    readonly parent: BindingScope<T> | null,
    readonly type: ScopeType
  ) {}

  static root<T extends { readonly name: string }>(): BindingScope<T> {
    return new BindingScope<T>(null, 'function');
  }

  /**
   * @returns 被遮蔽的外层绑定（若有）
   */
  define(binding: T): T | undefined {
    const shadowed = this.parent?.lookup(binding.name);
    this.bindings.set(binding.name, binding);
    return shadowed;
  }

  lookup(name: string): T | undefined {
    return this.resolve(name)?.binding;
  }

  resolve(name: string): ResolvedBinding<T> | undefined {
    let captured = false;
    for (let scope: BindingScope<T> | null = this; scope !== null; scope = scope.parent) {
      const binding = scope.bindings.get(name);
      if (binding) return { binding, captured };
      if (scope.type === 'lambda') captured = true;
    }
    return undefined;
  }

  enter(type: ScopeType): BindingScope<T> {
    return new BindingScope<T>(this, type);
  }
}
