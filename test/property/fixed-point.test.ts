/**
 * 能力闭包不动点的属性测试：结果与遍历顺序无关、满足单调性、与逐函数 BFS 一致。
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import fc from 'fast-check';
import { computeEffectSets, planComponents, type EffectSets } from '../../src/effects/effect_closure.js';
import type { CallGraph, EffectSite } from '../../src/effects/call_graph.js';
import { makeGraph, makeSite } from '../helpers/test-factories.js';

interface GraphSpec {
  readonly functions: readonly string[];
  readonly edges: readonly (readonly [string, string])[];
  readonly sites: readonly EffectSite[];
}

const fn = (index: number): string => `f${index}`;

const graphArb: fc.Arbitrary<GraphSpec> = fc.integer({ min: 1, max: 8 }).chain(size =>
  fc
    .record({
      edges: fc.array(fc.tuple(fc.nat(size - 1), fc.nat(size - 1)), { maxLength: 24 }),
      owners: fc.array(fc.nat(size - 1), { maxLength: 10 }),
    })
    .map(({ edges, owners }) => ({
      functions: Array.from({ length: size }, (_, index) => fn(index)),
      edges: edges.map(([caller, callee]) => [fn(caller), fn(callee)] as const),
      sites: owners.map((owner, index) => makeSite(fn(owner), 'Network', { domain: `h${index}.test` }, index + 1)),
    }))
);

function toGraph(spec: GraphSpec): CallGraph {
  return makeGraph(spec.functions, spec.edges, spec.sites);
}

function summarize(sets: EffectSets): Record<string, string[]> {
  const summary: Record<string, string[]> = {};
  for (const [name, set] of sets) summary[name] = set.sites.map(site => site.id);
  return summary;
}

/** 由种子确定的 Fisher-Yates 洗牌 */
function seededShuffle<T>(items: readonly T[], seed: number): T[] {
  const result = [...items];
  let state = (seed >>> 0) || 1;
  for (let i = result.length - 1; i > 0; i -= 1) {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    const j = (state >>> 0) % (i + 1);
    const a = result[i];
    const b = result[j];
    if (a === undefined || b === undefined) continue;
    result[i] = b;
    result[j] = a;
  }
  return result;
}

/** 逐函数 BFS 得到的可达效应点 id；spec.sites 已按行号排列 */
function bfsOracle(spec: GraphSpec): Record<string, string[]> {
  const summary: Record<string, string[]> = {};
  for (const start of spec.functions) {
    const seen = new Set<string>([start]);
    const queue = [start];
    for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
      for (const [caller, callee] of spec.edges) {
        if (caller !== current || seen.has(callee)) continue;
        seen.add(callee);
        queue.push(callee);
      }
    }
    summary[start] = spec.sites
      .filter(site => seen.has(site.owner))
      .map(site => site.id);
  }
  return summary;
}

describe('能力闭包不动点', () => {
  it('与逐函数 BFS 的结果一致', () => {
    fc.assert(
      fc.property(graphArb, spec => {
        assert.deepEqual(summarize(computeEffectSets(toGraph(spec))), bfsOracle(spec));
      }),
      { numRuns: 200 }
    );
  });

  it('函数、边与效应点的输入顺序不影响结果', () => {
    fc.assert(
      fc.property(graphArb, fc.integer(), (spec, seed) => {
        const shuffled: GraphSpec = {
          functions: seededShuffle(spec.functions, seed),
          edges: seededShuffle(spec.edges, seed + 1),
          sites: seededShuffle(spec.sites, seed + 2),
        };
        assert.deepEqual(summarize(computeEffectSets(toGraph(shuffled))), summarize(computeEffectSets(toGraph(spec))));
      }),
      { numRuns: 150 }
    );
  });

  it('同层分量的求解顺序不影响结果', () => {
    fc.assert(
      fc.property(graphArb, fc.integer(), (spec, seed) => {
        const graph = toGraph(spec);
        const baseline = summarize(computeEffectSets(graph));
        const reversed = computeEffectSets(graph, { scheduleLevel: level => [...level].reverse() });
        const random = computeEffectSets(graph, { scheduleLevel: level => seededShuffle(level, seed) });
        assert.deepEqual(summarize(reversed), baseline);
        assert.deepEqual(summarize(random), baseline);
      }),
      { numRuns: 150 }
    );
  });

  it('重复计算得到相同结果', () => {
    fc.assert(
      fc.property(graphArb, spec => {
        const graph = toGraph(spec);
        assert.deepEqual(summarize(computeEffectSets(graph)), summarize(computeEffectSets(graph)));
        assert.deepEqual(planComponents(graph), planComponents(graph));
      }),
      { numRuns: 50 }
    );
  });

  it('增加调用边只会扩大效应集', () => {
    fc.assert(
      fc.property(graphArb, fc.nat(), fc.nat(), (spec, from, to) => {
        const caller = spec.functions[from % spec.functions.length];
        const callee = spec.functions[to % spec.functions.length];
        if (caller === undefined || callee === undefined) return;
        const before = summarize(computeEffectSets(toGraph(spec)));
        const after = summarize(computeEffectSets(toGraph({ ...spec, edges: [...spec.edges, [caller, callee]] })));
        for (const [name, ids] of Object.entries(before)) {
          const grown = new Set(after[name] ?? []);
          for (const id of ids) assert.ok(grown.has(id), `${name} lost ${id}`);
        }
      }),
      { numRuns: 150 }
    );
  });

  it('分层满足依赖：被调分量位于更早的层', () => {
    fc.assert(
      fc.property(graphArb, spec => {
        const plan = planComponents(toGraph(spec));
        const levelOf = new Map<string, number>();
        plan.levels.forEach((level, levelIndex) => {
          for (const componentIndex of level) {
            for (const member of plan.components[componentIndex] ?? []) levelOf.set(member, levelIndex);
          }
        });
        const componentOf = new Map<string, number>();
        plan.components.forEach((members, index) => members.forEach(member => componentOf.set(member, index)));

        for (const [caller, callee] of spec.edges) {
          if (componentOf.get(caller) === componentOf.get(callee)) continue;
          assert.ok((levelOf.get(callee) ?? -1) < (levelOf.get(caller) ?? -1), `${caller} -> ${callee}`);
        }
      }),
      { numRuns: 150 }
    );
  });
});

describe('长环', () => {
  it('长度不小于 3 的环内每个成员看到全部效应点', () => {
    fc.assert(
      fc.property(fc.integer({ min: 3, max: 9 }), fc.integer(), (length, seed) => {
        const members = Array.from({ length }, (_, index) => fn(index));
        const ring = members.map((member, index) => [member, members[(index + 1) % length] ?? member] as const);
        const sites = members.map((member, index) => makeSite(member, 'Filesystem', { path: `/tmp/${index}` }, index + 1));
        const graph = makeGraph(seededShuffle(members, seed), seededShuffle(ring, seed + 1), sites);

        const plan = planComponents(graph);
        assert.deepEqual(plan.components, [[...members].sort()]);

        const sets = computeEffectSets(graph, { scheduleLevel: level => seededShuffle(level, seed) });
        const expected = sites.map(site => site.id);
        for (const member of members) {
          assert.deepEqual(
            sets.get(member)?.sites.map(site => site.id),
            expected
          );
        }
      }),
      { numRuns: 50 }
    );
  });

  it('环外调用方经由环继承效应点', () => {
    // entry -> a -> b -> c -> a，c -> leaf
    const graph = makeGraph(
      ['entry', 'a', 'b', 'c', 'leaf'],
      [
        ['entry', 'a'],
        ['a', 'b'],
        ['b', 'c'],
        ['c', 'a'],
        ['c', 'leaf'],
      ],
      [makeSite('leaf', 'Network', { domain: 'api.test' }, 9), makeSite('b', 'Filesystem', { path: '/tmp/b' }, 4)]
    );
    const sets = computeEffectSets(graph);
    assert.deepEqual(sets.get('entry')?.kinds, ['Filesystem', 'Network']);
    assert.deepEqual(
      sets.get('entry')?.sites.map(site => site.id),
      ['b@4:1#Filesystem', 'leaf@9:1#Network']
    );
    assert.deepEqual(sets.get('leaf')?.sites.map(site => site.id), ['leaf@9:1#Network']);
  });
});
