import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Ast, spanAt } from '../../../src/ast/builders.js';
import type { CapabilityDecl } from '../../../src/ast/ast.js';
import { parseCapabilityDeclarations } from '../../../src/capabilities/declarations.js';
import {
  checkCapabilities,
  isSiteCovered,
  matchGrant,
  resolveEntryPoints,
  type CheckResult,
} from '../../../src/capabilities/checker.js';
import { computeEffectSets } from '../../../src/effects/effect_closure.js';
import type { EffectSite } from '../../../src/effects/call_graph.js';
import { ErrorCode } from '../../../src/diagnostics/error_codes.js';
import { makeGraph, makeSite } from '../../helpers/test-factories.js';

function check(
  decls: readonly CapabilityDecl[],
  sites: readonly EffectSite[],
  entryPoints: readonly string[] = ['main'],
  functions: readonly string[] = ['main'],
  edges: readonly (readonly [string, string])[] = []
): CheckResult {
  const { environment, diagnostics } = parseCapabilityDeclarations(decls);
  assert.deepEqual(diagnostics, []);
  const effectSets = computeEffectSets(makeGraph(functions, edges, sites));
  return checkCapabilities(environment, effectSets, entryPoints, { unitName: 'app' });
}

function messages(result: CheckResult): string[] {
  return result.diagnostics.map(d => `${d.code} ${d.message}`);
}

describe('checkCapabilities', () => {
  it('域名不匹配时报告 C002 并指向授权', () => {
    const grantSpan = spanAt(1, 1);
    const result = check(
      [Ast.Capability('Network', { protocol: 'https', domain: '*.hawkbank.com' }, grantSpan)],
      [makeSite('main', 'Network', { domain: 'google.com' }, 3, 5)]
    );
    assert.deepEqual(messages(result), [
      'C002 Network effect on domain=google.com in \'main\': grant Network does not cover target google.com (domain does not match "*.hawkbank.com")',
    ]);
    assert.deepEqual(result.diagnostics[0]?.relatedGrant, { name: 'Network', span: grantSpan });
    assert.deepEqual(result.diagnostics[0]?.span, spanAt(3, 5));
  });

  it('协议不匹配时报告 C002', () => {
    const result = check(
      [Ast.Capability('Http', { protocol: 'https', domain: '*.bank.com' })],
      [makeSite('main', 'Network', { protocol: 'http', domain: 'api.bank.com' }, 2)]
    );
    assert.deepEqual(messages(result), [
      'C002 Network effect on domain=api.bank.com protocol=http in \'main\': grant Http does not cover target http (protocol does not match "https")',
    ]);
  });

  it('约束所需的目标字段缺失时报告 C003', () => {
    const result = check(
      [Ast.Capability('Http', { protocol: 'https', domain: '*.bank.com' })],
      [makeSite('main', 'Network', {}, 2), makeSite('main', 'Network', { domain: 'api.bank.com' }, 4)]
    );
    assert.deepEqual(messages(result), [
      "C003 Network effect on <no target> in 'main': grant Http constrains domain but the call site has no domain",
      "C003 Network effect on domain=api.bank.com in 'main': grant Http constrains protocol but the call site has no protocol",
    ]);
  });

  it('没有同种类授权时报告 C001', () => {
    const result = check(
      [Ast.Capability('Http', {})],
      [makeSite('main', 'Filesystem', { path: '/etc/passwd' }, 7)]
    );
    assert.deepEqual(messages(result), [
      "C001 Filesystem effect on path=/etc/passwd in 'main': no grant declared for Filesystem",
    ]);
    assert.equal(result.diagnostics[0]?.relatedGrant, undefined);
  });

  it('任一候选授权覆盖即通过，否则报告声明顺序中的第一个候选', () => {
    const covered = makeSite('main', 'Network', { domain: 'b.com' }, 2);
    const uncovered = makeSite('main', 'Network', { domain: 'c.com' }, 3);
    const result = check(
      [Ast.Capability('Http', { domain: 'a.com' }), Ast.Capability('Net', { domain: 'b.com' })],
      [covered, uncovered]
    );
    assert.deepEqual(result.coverage.get(covered.id), { site: covered, covered: true, grant: 'Net' });
    assert.deepEqual(
      result.diagnostics.map(d => d.relatedGrant?.name),
      ['Http']
    );
    assert.equal(isSiteCovered(result.coverage, covered.id), true);
    assert.equal(isSiteCovered(result.coverage, uncovered.id), false);
  });

  it('只对入口可达的效应点报告诊断，覆盖报告包含全部效应点', () => {
    const reached = makeSite('io', 'Syscall', { name: 'fork' }, 5);
    const unreached = makeSite('helper', 'Syscall', { name: 'kill' }, 9);
    const result = check([], [reached, unreached], ['main'], ['helper', 'io', 'main'], [['main', 'io']]);
    assert.deepEqual(
      result.diagnostics.map(d => d.span.start.line),
      [5]
    );
    assert.deepEqual(result.coverage.get(unreached.id), {
      site: unreached,
      covered: false,
      code: ErrorCode.CAPABILITY_NOT_DECLARED,
    });
    assert.deepEqual(
      result.reachable.map(site => site.id),
      [reached.id]
    );
  });

  it('经多个入口到达的效应点只报告一次', () => {
    const site = makeSite('shared', 'Network', { domain: 'x.com' }, 4);
    const result = check(
      [],
      [site],
      ['a', 'b'],
      ['a', 'b', 'shared'],
      [
        ['a', 'shared'],
        ['b', 'shared'],
      ]
    );
    assert.equal(result.diagnostics.length, 1);
  });

  it('未知入口报告 C004', () => {
    const result = check([], [], ['start']);
    assert.deepEqual(messages(result), ["C004 unknown entry point 'start' in unit 'app'"]);
    const { environment } = parseCapabilityDeclarations([]);
    const anonymous = checkCapabilities(environment, new Map(), ['start']);
    assert.equal(anonymous.diagnostics[0]?.message, "unknown entry point 'start' in unit '<unit>'");
  });

  it('互相递归的函数：缺失授权的效应点归属正确', () => {
    const fileSite = makeSite('A', 'Filesystem', { path: '/data/in.csv' }, 2);
    const netSite = makeSite('B', 'Network', { domain: 'api.example.com' }, 6);
    const result = check(
      [Ast.Capability('Filesystem', { path: '/data/**' })],
      [fileSite, netSite],
      ['A'],
      ['A', 'B'],
      [
        ['A', 'B'],
        ['B', 'A'],
      ]
    );
    assert.deepEqual(messages(result), [
      "C001 Network effect on domain=api.example.com in 'B': no grant declared for Network",
    ]);
  });
});

describe('matchGrant', () => {
  it('先比对模式字段再比对协议', () => {
    const { environment } = parseCapabilityDeclarations([
      Ast.Capability('Http', { protocol: 'https', domain: '*.bank.com' }),
    ]);
    const grant = environment.grants.get('Http');
    assert.ok(grant);
    assert.deepEqual(matchGrant(grant, makeSite('f', 'Network', { protocol: 'ftp', domain: 'evil.com' }, 1)), {
      ok: false,
      reason: 'mismatch',
      field: 'domain',
      value: 'evil.com',
      pattern: '*.bank.com',
    });
    assert.deepEqual(matchGrant(grant, makeSite('f', 'Network', { protocol: 'HTTPS', domain: 'api.bank.com' }, 1)), {
      ok: true,
    });
    assert.deepEqual(matchGrant(grant, makeSite('f', 'Syscall', { name: 'x' }, 1)), {
      ok: false,
      reason: 'mismatch',
      field: 'kind',
      value: 'Syscall',
      pattern: 'Network',
    });
  });
});

describe('resolveEntryPoints', () => {
  it('显式入口优先，其次 main，否则全部函数', () => {
    const funcs = [Ast.Func('zeta', []), Ast.Func('main', []), Ast.Func('alpha', [])];
    assert.deepEqual(resolveEntryPoints(Ast.Unit('app', [], funcs, ['zeta'])), ['zeta']);
    assert.deepEqual(resolveEntryPoints(Ast.Unit('app', [], funcs)), ['main']);
    assert.deepEqual(resolveEntryPoints(Ast.Unit('lib', [], [Ast.Func('zeta', []), Ast.Func('alpha', [])])), [
      'alpha',
      'zeta',
    ]);
  });
});
