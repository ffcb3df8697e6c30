// Structured diagnostics with error codes, spans and related grants

import type { Position, Span } from '../types.js';
import {
  DiagnosticKind,
  ErrorCode,
  formatErrorMessage,
  getErrorMetadata,
} from './error_codes.js';

export enum DiagnosticSeverity {
  Error = 'error',
  Warning = 'warning',
  Info = 'info',
}

/** 与诊断最相关的能力授权（用于提示用户修改哪一条声明） */
export interface RelatedGrant {
  readonly name: string;
  readonly span: Span;
}

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly kind: DiagnosticKind;
  readonly code: ErrorCode;
  readonly message: string;
  readonly span: Span;
  readonly help?: string;
  readonly relatedGrant?: RelatedGrant;
  readonly relatedInformation?: readonly {
    readonly span: Span;
    readonly message: string;
  }[];
  readonly data?: Readonly<Record<string, unknown>>;
}

export class DiagnosticError extends Error {
  public readonly diagnostic: Diagnostic;

  constructor(diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.diagnostic = diagnostic;
    this.name = 'DiagnosticError';
  }

  get pos(): Position {
    return this.diagnostic.span.start;
  }
}

export interface ReportOptions {
  readonly relatedGrant?: RelatedGrant;
  readonly related?: { readonly span: Span; readonly message: string };
}

const SEVERITY_BY_NAME: Record<string, DiagnosticSeverity> = {
  error: DiagnosticSeverity.Error,
  warning: DiagnosticSeverity.Warning,
  info: DiagnosticSeverity.Info,
};

/**
 * 诊断收集器：各 pass 通过错误码上报，消息由错误码表模板生成。
 *
 * 所有 pass 均为全量报告模式，不会在第一个错误处中止。
 */
export class DiagnosticBuilder {
  private readonly diagnostics: Diagnostic[] = [];

  report(
    code: ErrorCode,
    span: Span,
    params: Readonly<Record<string, unknown>> = {},
    options: ReportOptions = {}
  ): this {
    const metadata = getErrorMetadata(code);
    const diagnostic: Diagnostic = {
      severity: SEVERITY_BY_NAME[metadata.severity] ?? DiagnosticSeverity.Error,
      kind: metadata.kind,
      code,
      message: formatErrorMessage(metadata.message, params),
      span,
      help: formatErrorMessage(metadata.help, params),
      ...(options.relatedGrant ? { relatedGrant: options.relatedGrant } : {}),
      ...(options.related ? { relatedInformation: [options.related] } : {}),
      ...(Object.keys(params).length > 0 ? { data: { ...params } } : {}),
    };
    this.diagnostics.push(diagnostic);
    return this;
  }

  getDiagnostics(): Diagnostic[] {
    return sortDiagnostics(this.diagnostics);
  }

  hasErrors(): boolean {
    return this.diagnostics.some(diag => diag.severity === DiagnosticSeverity.Error);
  }

  get size(): number {
    return this.diagnostics.length;
  }
}

const KIND_ORDER: Record<DiagnosticKind, number> = {
  [DiagnosticKind.DeclarationError]: 0,
  [DiagnosticKind.CapabilityViolation]: 1,
  [DiagnosticKind.VaultScopeError]: 2,
  [DiagnosticKind.MutabilityError]: 3,
};

export function comparePositions(a: Position, b: Position): number {
  return a.line - b.line || a.col - b.col;
}

/**
 * 诊断的全序：源位置升序，其次按种类、错误码、消息排序，保证可复现的输出。
 */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  const byPosition = comparePositions(a.span.start, b.span.start);
  if (byPosition !== 0) return byPosition;
  const byKind = KIND_ORDER[a.kind] - KIND_ORDER[b.kind];
  if (byKind !== 0) return byKind;
  if (a.code !== b.code) return a.code < b.code ? -1 : 1;
  if (a.message === b.message) return 0;
  return a.message < b.message ? -1 : 1;
}

export function sortDiagnostics(diagnostics: readonly Diagnostic[]): Diagnostic[] {
  return [...diagnostics].sort(compareDiagnostics);
}

// Utility to format diagnostics for display
export function formatDiagnostic(diagnostic: Diagnostic, source?: string): string {
  const { severity, kind, code, message, span } = diagnostic;
  const pos = `${span.start.line}:${span.start.col}`;

  let result = `${severity} ${code} ${kind}: ${message} at ${pos}`;

  if (diagnostic.relatedGrant) {
    const grantPos = diagnostic.relatedGrant.span.start;
    result += ` (see grant ${diagnostic.relatedGrant.name} at ${grantPos.line}:${grantPos.col})`;
  }

  if (source) {
    const lines = source.split(/\r?\n/);
    const line = lines[span.start.line - 1];
    if (line) {
      result += `\n> ${span.start.line}| ${line}`;
      result += `\n> ${' '.repeat(String(span.start.line).length)}  ${' '.repeat(span.start.col - 1)}^`;
    }
  }

  return result;
}
