/**
 * 授权约束：glob 目标模式与协议枚举。
 *
 * glob 按分隔符切分为段逐段匹配：
 * - 整段 `*` 匹配恰好一个非空段（`*.bank.com` 不匹配 `bank.com`）
 * - 段内 `*` 匹配段内任意字符（`api-*.bank.com` 匹配 `api-eu.bank.com`）
 * - 整段 `**` 匹配一个或多个段（`**.bank.com` 匹配 `a.b.bank.com`）
 */

import type { GlobSyntax } from '../effects/effect_kind.js';

type GlobSegment =
  | { readonly kind: 'literal'; readonly text: string }
  | { readonly kind: 'wildcard'; readonly regex: RegExp }
  | { readonly kind: 'star' }
  | { readonly kind: 'globstar' };

export interface GlobPattern {
  readonly source: string;
  /** 声明中的字段名：domain / path / name */
  readonly field: string;
  readonly syntax: GlobSyntax;
  readonly segments: readonly GlobSegment[];
}

export type ParseResult<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly reason: string };

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function splitSegments(value: string, syntax: GlobSyntax): string[] | null {
  if (syntax.leadingSeparator) {
    if (!value.startsWith(syntax.separator)) return null;
    if (value === syntax.separator) return [];
    return value.slice(syntax.separator.length).split(syntax.separator);
  }
  return value.split(syntax.separator);
}

export function parseGlob(source: string, field: string, syntax: GlobSyntax): ParseResult<GlobPattern> {
  const trimmed = source.trim();
  if (trimmed.length === 0) return { ok: false, reason: 'empty pattern' };
  const rawSegments = splitSegments(trimmed, syntax);
  if (rawSegments === null) {
    return { ok: false, reason: `must start with '${syntax.separator}'` };
  }

  const segments: GlobSegment[] = [];
  for (const raw of rawSegments) {
    if (raw.length === 0) return { ok: false, reason: 'empty segment' };
    if (raw === '**') {
      segments.push({ kind: 'globstar' });
      continue;
    }
    if (raw.includes('**')) return { ok: false, reason: "'**' must be a whole segment" };
    if (raw === '*') {
      segments.push({ kind: 'star' });
      continue;
    }
    const parts = raw.split('*');
    for (const part of parts) {
      if (!syntax.segmentChars.test(part)) {
        return { ok: false, reason: `invalid characters in segment '${raw}'` };
      }
    }
    if (parts.length === 1) {
      segments.push({ kind: 'literal', text: syntax.caseInsensitive ? raw.toLowerCase() : raw });
      continue;
    }
    const body = parts.map(escapeRegex).join(`[^${escapeRegex(syntax.separator)}]*`);
    segments.push({ kind: 'wildcard', regex: new RegExp(`^${body}$`, syntax.caseInsensitive ? 'i' : '') });
  }

  return { ok: true, value: { source: trimmed, field, syntax, segments } };
}

function matchSegment(segment: GlobSegment, value: string, caseInsensitive: boolean): boolean {
  switch (segment.kind) {
    case 'literal':
      return (caseInsensitive ? value.toLowerCase() : value) === segment.text;
    case 'wildcard':
      return segment.regex.test(value);
    case 'star':
      return value.length > 0;
    case 'globstar':
      return value.length > 0;
  }
}

export function matchGlob(pattern: GlobPattern, value: string): boolean {
  const { syntax } = pattern;
  const normalized = syntax.caseInsensitive && syntax.separator === '.' ? value.replace(/\.$/, '') : value;
  const targetSegments = splitSegments(normalized, syntax);
  if (targetSegments === null) return false;

  const patternSegments = pattern.segments;
  const memo = new Map<string, boolean>();

  const matchFrom = (p: number, t: number): boolean => {
    const key = `${p}:${t}`;
    const cached = memo.get(key);
    if (cached !== undefined) return cached;

    let result: boolean;
    const segment = patternSegments[p];
    if (segment === undefined) {
      result = t === targetSegments.length;
    } else if (segment.kind === 'globstar') {
      result = false;
      // 至少吞掉一个段
      for (let end = t + 1; end <= targetSegments.length; end += 1) {
        if (!matchSegment(segment, targetSegments[end - 1] ?? '', syntax.caseInsensitive)) break;
        if (matchFrom(p + 1, end)) {
          result = true;
          break;
        }
      }
    } else {
      const current = targetSegments[t];
      result =
        current !== undefined &&
        matchSegment(segment, current, syntax.caseInsensitive) &&
        matchFrom(p + 1, t + 1);
    }

    memo.set(key, result);
    return result;
  };

  return matchFrom(0, 0);
}

// ============================================================
// protocol 约束
// ============================================================

export interface ProtocolConstraint {
  readonly source: string;
  /** `*` 表示任意协议 */
  readonly any: boolean;
  readonly protocols: readonly string[];
}

const SCHEME_TOKEN = /^[a-z][a-z0-9+.-]*$/i;

export function parseProtocol(source: string): ParseResult<ProtocolConstraint> {
  const trimmed = source.trim();
  if (trimmed === '*') return { ok: true, value: { source: trimmed, any: true, protocols: [] } };
  const protocols: string[] = [];
  for (const item of trimmed.split(',')) {
    const token = item.trim();
    if (!SCHEME_TOKEN.test(token)) {
      return { ok: false, reason: token.length === 0 ? 'empty protocol' : `invalid protocol '${token}'` };
    }
    const lowered = token.toLowerCase();
    if (!protocols.includes(lowered)) protocols.push(lowered);
  }
  return { ok: true, value: { source: trimmed, any: false, protocols } };
}

export function matchProtocol(constraint: ProtocolConstraint, value: string): boolean {
  return constraint.any || constraint.protocols.includes(value.toLowerCase());
}
