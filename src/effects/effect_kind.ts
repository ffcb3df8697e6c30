/**
 * @module effects/effect_kind
 *
 * 效应种类：以名称标识的标签联合，并提供注册表作为扩展点。
 *
 * 新的效应类别只需注册一个描述符（目标字段、模式语法、目标推导方式），
 * 声明解析器与能力检查器无需任何修改即可支持。
 */

/** 模式字段的 glob 语法 */
export interface GlobSyntax {
  /** 段分隔符：域名为 '.'，路径为 '/' */
  readonly separator: string;
  /** 是否必须以分隔符开头（绝对路径） */
  readonly leadingSeparator: boolean;
  readonly caseInsensitive: boolean;
  /** 单个段中允许的字符（不含通配符 '*'） */
  readonly segmentChars: RegExp;
}

export interface EffectKindDescriptor {
  readonly name: string;
  /** 授权名称别名，例如 `use capability Net { ... }` 解析为 Network */
  readonly aliases: readonly string[];
  /** 与 protocol 约束比对的目标字段；null 表示该种类不支持 protocol 约束 */
  readonly protocolField: string | null;
  /** glob 约束在声明与目标中使用的字段名（domain / path / name）；null 表示不支持 */
  readonly patternField: string | null;
  readonly patternSyntax: GlobSyntax | null;
  /**
   * 从内建调用推导目标参数（前缀表分类的调用没有前端标注）。
   *
   * @param member - 去掉前缀后的成员名，例如 `Sys.fork` 中的 `fork`
   * @param literal - 第一个字符串字面量实参（若有）
   */
  deriveTarget(member: string, literal: string | undefined): Readonly<Record<string, string>>;
}

const URL_WITH_SCHEME = /^([a-z][a-z0-9+.-]*):\/\//i;

function networkTarget(_member: string, literal: string | undefined): Record<string, string> {
  if (!literal) return {};
  const scheme = URL_WITH_SCHEME.exec(literal)?.[1];
  if (scheme) {
    const protocol = scheme.toLowerCase();
    try {
      return { protocol, domain: new URL(literal).hostname.toLowerCase() };
    } catch {
      return { protocol };
    }
  }
  const host = literal.split(/[/:?#]/, 1)[0] ?? '';
  return host ? { domain: host.toLowerCase() } : {};
}

export const NETWORK: EffectKindDescriptor = {
  name: 'Network',
  aliases: ['Net', 'Http'],
  protocolField: 'protocol',
  patternField: 'domain',
  patternSyntax: {
    separator: '.',
    leadingSeparator: false,
    caseInsensitive: true,
    segmentChars: /^[a-z0-9-]*$/i,
  },
  deriveTarget: networkTarget,
};

export const FILESYSTEM: EffectKindDescriptor = {
  name: 'Filesystem',
  aliases: ['Fs', 'File', 'Files'],
  protocolField: null,
  patternField: 'path',
  patternSyntax: {
    separator: '/',
    leadingSeparator: true,
    caseInsensitive: false,
    segmentChars: /^[^\s/\0]*$/,
  },
  deriveTarget: (_member, literal): Record<string, string> => (literal ? { path: literal } : {}),
};

export const SYSCALL: EffectKindDescriptor = {
  name: 'Syscall',
  aliases: ['Sys'],
  protocolField: null,
  patternField: 'name',
  patternSyntax: {
    separator: '.',
    leadingSeparator: false,
    caseInsensitive: false,
    segmentChars: /^[a-z0-9_]*$/i,
  },
  deriveTarget: (member, literal): Record<string, string> => {
    const name = literal ?? member;
    return name ? { name } : {};
  },
};

export const BUILTIN_EFFECT_KINDS: readonly EffectKindDescriptor[] = [NETWORK, FILESYSTEM, SYSCALL];

export class EffectKindError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EffectKindError';
  }
}

/**
 * 效应种类注册表。构造后只读，作为上下文值显式传入各 pass。
 */
export class EffectKindRegistry {
  private readonly byName = new Map<string, EffectKindDescriptor>();
  private readonly byAlias = new Map<string, EffectKindDescriptor>();

  constructor(descriptors: readonly EffectKindDescriptor[] = BUILTIN_EFFECT_KINDS) {
    for (const descriptor of descriptors) {
      if (this.byName.has(descriptor.name)) {
        throw new EffectKindError(`Effect kind '${descriptor.name}' is registered twice`);
      }
      this.byName.set(descriptor.name, descriptor);
    }
    for (const descriptor of descriptors) {
      for (const key of [descriptor.name, ...descriptor.aliases]) {
        const lowered = key.toLowerCase();
        const existing = this.byAlias.get(lowered);
        if (existing && existing !== descriptor) {
          throw new EffectKindError(
            `Alias '${key}' of '${descriptor.name}' is already used by '${existing.name}'`
          );
        }
        this.byAlias.set(lowered, descriptor);
      }
    }
  }

  /** 按规范名称查找 */
  get(name: string): EffectKindDescriptor | undefined {
    return this.byName.get(name);
  }

  /** 按名称或别名（大小写不敏感）解析 */
  resolve(nameOrAlias: string): EffectKindDescriptor | undefined {
    return this.byAlias.get(nameOrAlias.toLowerCase());
  }

  names(): string[] {
    return [...this.byName.keys()].sort();
  }

  /** 返回追加了新种类的注册表副本 */
  extend(...descriptors: readonly EffectKindDescriptor[]): EffectKindRegistry {
    return new EffectKindRegistry([...this.byName.values(), ...descriptors]);
  }
}

export const DEFAULT_EFFECT_KINDS = new EffectKindRegistry();
