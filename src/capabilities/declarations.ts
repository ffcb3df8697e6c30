/**
 * @module capabilities/declarations
 *
 * 能力声明解析：把头部的 `use capability <Name> { ... }` 语句转换为不可变的授权集合。
 *
 * 所有问题以 DeclarationError 诊断报告（全量模式）；只有格式完全正确的授权进入环境。
 */

import type { CapabilityDecl, CapabilityField } from '../ast/ast.js';
import type { Span } from '../types.js';
import { DiagnosticBuilder, type Diagnostic } from '../diagnostics/diagnostics.js';
import { ErrorCode } from '../diagnostics/error_codes.js';
import { DEFAULT_EFFECT_KINDS, type EffectKindDescriptor, type EffectKindRegistry } from '../effects/effect_kind.js';
import { parseGlob, parseProtocol, type GlobPattern, type ProtocolConstraint } from './glob.js';

export interface CapabilityGrant {
  readonly name: string;
  /** 规范效应种类名 */
  readonly kind: string;
  readonly protocol: ProtocolConstraint | null;
  /** domain / path / name 约束；字段名见 pattern.field */
  readonly pattern: GlobPattern | null;
  readonly span: Span;
}

/**
 * 单个编译单元的授权集合。构造后冻结，作为上下文值显式传入各 pass。
 */
export interface CapabilityEnvironment {
  readonly grants: ReadonlyMap<string, CapabilityGrant>;
  /** 按声明顺序 */
  readonly ordered: readonly CapabilityGrant[];
}

export interface DeclarationResult {
  readonly environment: CapabilityEnvironment;
  readonly diagnostics: Diagnostic[];
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const KIND_FIELD = 'kind';
const PROTOCOL_FIELD = 'protocol';

export const EMPTY_ENVIRONMENT: CapabilityEnvironment = createEnvironment([]);

export function createEnvironment(grants: readonly CapabilityGrant[]): CapabilityEnvironment {
  const ordered = Object.freeze(grants.map(grant => Object.freeze({ ...grant })));
  return Object.freeze({
    grants: new Map(ordered.map(grant => [grant.name, grant] as const)),
    ordered,
  });
}

/** 指定种类的授权，按声明顺序 */
export function grantsOfKind(environment: CapabilityEnvironment, kind: string): CapabilityGrant[] {
  return environment.ordered.filter(grant => grant.kind === kind);
}

function knownFields(registry: EffectKindRegistry): Set<string> {
  const fields = new Set<string>([KIND_FIELD, PROTOCOL_FIELD]);
  for (const name of registry.names()) {
    const descriptor = registry.get(name);
    if (descriptor?.patternField) fields.add(descriptor.patternField);
    if (descriptor?.protocolField) fields.add(PROTOCOL_FIELD);
  }
  return fields;
}

class DeclarationParser {
  private readonly diagnostics = new DiagnosticBuilder();
  private readonly seen = new Map<string, Span>();
  private readonly grants: CapabilityGrant[] = [];
  private readonly fieldNames: Set<string>;

  constructor(private readonly registry: EffectKindRegistry) {
    this.fieldNames = knownFields(registry);
  }

  parse(decls: readonly CapabilityDecl[]): DeclarationResult {
    for (const decl of decls) {
      const grant = this.parseDecl(decl);
      if (grant) this.grants.push(grant);
    }
    return { environment: createEnvironment(this.grants), diagnostics: this.diagnostics.getDiagnostics() };
  }

  private parseDecl(decl: CapabilityDecl): CapabilityGrant | null {
    if (!IDENTIFIER.test(decl.name)) {
      this.diagnostics.report(ErrorCode.INVALID_CAPABILITY_NAME, decl.span, { name: decl.name });
      return null;
    }
    const first = this.seen.get(decl.name);
    if (first) {
      this.diagnostics.report(
        ErrorCode.DUPLICATE_CAPABILITY,
        decl.span,
        { name: decl.name },
        { related: { span: first, message: `first declaration of '${decl.name}'` } }
      );
      return null;
    }
    this.seen.set(decl.name, decl.span);

    const errorsBefore = this.diagnostics.size;
    const fields = this.collectFields(decl);

    const kindField = fields.get(KIND_FIELD);
    const kindName = kindField ? kindField.value.trim() : decl.name;
    const descriptor = this.registry.resolve(kindName);
    if (!descriptor) {
      this.diagnostics.report(ErrorCode.UNKNOWN_CAPABILITY_KIND, kindField?.span ?? decl.span, {
        name: decl.name,
        kind: kindName,
      });
      return null;
    }

    let protocol: ProtocolConstraint | null = null;
    let pattern: GlobPattern | null = null;
    for (const [key, field] of fields) {
      if (key === KIND_FIELD) continue;
      if (key === PROTOCOL_FIELD) {
        protocol = this.parseProtocolField(decl, descriptor, field);
      } else {
        pattern = this.parsePatternField(decl, descriptor, field);
      }
    }

    if (this.diagnostics.size > errorsBefore) return null;
    return { name: decl.name, kind: descriptor.name, protocol, pattern, span: decl.span };
  }

  private collectFields(decl: CapabilityDecl): Map<string, CapabilityField> {
    const fields = new Map<string, CapabilityField>();
    for (const field of decl.fields) {
      if (!this.fieldNames.has(field.key)) {
        this.diagnostics.report(ErrorCode.UNKNOWN_CAPABILITY_FIELD, field.span, {
          name: decl.name,
          field: field.key,
        });
        continue;
      }
      if (fields.has(field.key)) {
        this.diagnostics.report(ErrorCode.DUPLICATE_CAPABILITY_FIELD, field.span, {
          name: decl.name,
          field: field.key,
        });
        continue;
      }
      fields.set(field.key, field);
    }
    return fields;
  }

  private parseProtocolField(
    decl: CapabilityDecl,
    descriptor: EffectKindDescriptor,
    field: CapabilityField
  ): ProtocolConstraint | null {
    if (!descriptor.protocolField) {
      this.reportUnsupported(decl, descriptor, field);
      return null;
    }
    const parsed = parseProtocol(field.value);
    if (!parsed.ok) {
      this.diagnostics.report(ErrorCode.MALFORMED_PROTOCOL, field.span, { name: decl.name, value: field.value });
      return null;
    }
    return parsed.value;
  }

  private parsePatternField(
    decl: CapabilityDecl,
    descriptor: EffectKindDescriptor,
    field: CapabilityField
  ): GlobPattern | null {
    if (descriptor.patternField !== field.key || !descriptor.patternSyntax) {
      this.reportUnsupported(decl, descriptor, field);
      return null;
    }
    const parsed = parseGlob(field.value, field.key, descriptor.patternSyntax);
    if (!parsed.ok) {
      this.diagnostics.report(ErrorCode.MALFORMED_PATTERN, field.span, {
        name: decl.name,
        field: field.key,
        value: field.value,
        reason: parsed.reason,
      });
      return null;
    }
    return parsed.value;
  }

  private reportUnsupported(decl: CapabilityDecl, descriptor: EffectKindDescriptor, field: CapabilityField): void {
    this.diagnostics.report(ErrorCode.UNSUPPORTED_CONSTRAINT, field.span, {
      name: decl.name,
      kind: descriptor.name,
      field: field.key,
    });
  }
}

/**
 * 解析头部能力声明。
 *
 * 授权种类取自显式的 `kind:` 字段；缺省时按授权名解析（`Network`、`Net`、`Fs` 等）。
 */
export function parseCapabilityDeclarations(
  decls: readonly CapabilityDecl[],
  registry: EffectKindRegistry = DEFAULT_EFFECT_KINDS
): DeclarationResult {
  return new DeclarationParser(registry).parse(decls);
}
