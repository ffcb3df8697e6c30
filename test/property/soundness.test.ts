/**
 * 能力检查的可靠性：与暴力预言机（BFS 可达 + 逐条授权匹配）比对。
 *
 * 对随机调用图与随机授权集合，检查器报告的违规效应点集合必须与预言机完全一致：
 * 不漏报（可靠），也不误报（不可达或已覆盖的效应点不报告）。
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';
import { Ast } from '../../src/ast/builders.js';
import { parseCapabilityDeclarations, type CapabilityEnvironment } from '../../src/capabilities/declarations.js';
import { checkCapabilities, matchGrant } from '../../src/capabilities/checker.js';
import { computeEffectSets } from '../../src/effects/effect_closure.js';
import type { EffectSite } from '../../src/effects/call_graph.js';
import { makeGraph, makeSite } from '../helpers/test-factories.js';

const DOMAINS = ['api.bank.com', 'x.api.bank.com', 'cdn.example.org', 'evil.com'] as const;
const GRANT_PATTERNS = ['*.bank.com', 'api.bank.com', 'cdn.example.org', '*.api.bank.com'] as const;

interface SiteSpec {
  readonly owner: number;
  readonly kind: 'Network' | 'Filesystem';
  readonly domain: string | undefined;
}

interface Scenario {
  readonly size: number;
  readonly edges: readonly (readonly [number, number])[];
  readonly sites: readonly SiteSpec[];
  readonly grants: readonly string[];
}

const scenarioArb: fc.Arbitrary<Scenario> = fc.integer({ min: 1, max: 7 }).chain(size =>
  fc.record({
    size: fc.constant(size),
    edges: fc.array(fc.tuple(fc.nat(size - 1), fc.nat(size - 1)), { maxLength: 20 }),
    sites: fc.array(
      fc.record({
        owner: fc.nat(size - 1),
        kind: fc.constantFrom<'Network' | 'Filesystem'>('Network', 'Filesystem'),
        domain: fc.option(fc.constantFrom(...DOMAINS), { nil: undefined }),
      }),
      { maxLength: 12 }
    ),
    grants: fc.subarray([...GRANT_PATTERNS]),
  })
);

const fn = (index: number): string => `f${index}`;

function buildSites(specs: readonly SiteSpec[]): EffectSite[] {
  return specs.map((spec, index) =>
    makeSite(fn(spec.owner), spec.kind, spec.domain === undefined ? {} : { domain: spec.domain }, index + 1)
  );
}

function buildEnvironment(patterns: readonly string[]): CapabilityEnvironment {
  const decls = patterns.map((domain, index) => Ast.Capability(`Net${index}`, { kind: 'Network', domain }));
  const { environment, diagnostics } = parseCapabilityDeclarations(decls);
  assert.deepEqual(diagnostics, []);
  return environment;
}

/** 暴力预言机：从入口 BFS 得到可达函数，再逐条授权判断覆盖 */
function oracleViolations(scenario: Scenario, sites: readonly EffectSite[], environment: CapabilityEnvironment): number[] {
  const reachable = new Set<string>([fn(0)]);
  const queue = [fn(0)];
  for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
    for (const [caller, callee] of scenario.edges) {
      if (fn(caller) !== current || reachable.has(fn(callee))) continue;
      reachable.add(fn(callee));
      queue.push(fn(callee));
    }
  }
  return sites
    .filter(site => reachable.has(site.owner))
    .filter(site => !environment.ordered.some(grant => matchGrant(grant, site).ok))
    .map(site => site.span.start.line)
    .sort((a, b) => a - b);
}

describe('能力检查可靠性', () => {
  it('报告的违规效应点与暴力预言机一致', () => {
    fc.assert(
      fc.property(scenarioArb, scenario => {
        const sites = buildSites(scenario.sites);
        const functions = Array.from({ length: scenario.size }, (_, index) => fn(index));
        const graph = makeGraph(
          functions,
          scenario.edges.map(([caller, callee]) => [fn(caller), fn(callee)] as const),
          sites
        );
        const environment = buildEnvironment(scenario.grants);
        const result = checkCapabilities(environment, computeEffectSets(graph), [fn(0)]);

        const reported = result.diagnostics.map(d => d.span.start.line).sort((a, b) => a - b);
        assert.deepEqual(reported, oracleViolations(scenario, sites, environment));
      }),
      { numRuns: 200 }
    );
  });

  it('覆盖报告包含全部效应点，且与逐条匹配结果一致', () => {
    fc.assert(
      fc.property(scenarioArb, scenario => {
        const sites = buildSites(scenario.sites);
        const functions = Array.from({ length: scenario.size }, (_, index) => fn(index));
        const graph = makeGraph(
          functions,
          scenario.edges.map(([caller, callee]) => [fn(caller), fn(callee)] as const),
          sites
        );
        const environment = buildEnvironment(scenario.grants);
        const { coverage } = checkCapabilities(environment, computeEffectSets(graph), [fn(0)]);

        assert.equal(coverage.size, sites.length);
        for (const site of sites) {
          const expected = environment.ordered.some(grant => matchGrant(grant, site).ok);
          assert.equal(coverage.get(site.id)?.covered, expected, site.id);
        }
      }),
      { numRuns: 100 }
    );
  });

  it('增加授权不会产生新的违规', () => {
    fc.assert(
      fc.property(scenarioArb, fc.constantFrom(...GRANT_PATTERNS), (scenario, extra) => {
        const sites = buildSites(scenario.sites);
        const functions = Array.from({ length: scenario.size }, (_, index) => fn(index));
        const graph = makeGraph(
          functions,
          scenario.edges.map(([caller, callee]) => [fn(caller), fn(callee)] as const),
          sites
        );
        const sets = computeEffectSets(graph);
        const before = checkCapabilities(buildEnvironment(scenario.grants), sets, [fn(0)]);
        const after = checkCapabilities(buildEnvironment([...scenario.grants, extra]), sets, [fn(0)]);

        const beforeLines = new Set(before.diagnostics.map(d => d.span.start.line));
        for (const diagnostic of after.diagnostics) {
          assert.ok(beforeLines.has(diagnostic.span.start.line));
        }
      }),
      { numRuns: 100 }
    );
  });
});
