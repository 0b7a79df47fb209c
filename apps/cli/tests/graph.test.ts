import { describe, it, expect } from 'vitest';
import { discover } from '../src/discovery/index.js';
import { buildGraph } from '../src/graph/builder.js';
import { Graph, edgeKey } from '../src/graph/graph.js';
import { mergeGraphs } from '../src/graph/merge.js';
import { toNodeLink } from '../src/graph/nodeLink.js';
import { riverDoc, riverRecord, townDoc, triangleDoc } from './fixtures.js';

describe('Graph', () => {
  it('uses one key for both orientations of an edge', () => {
    expect(edgeKey(1, 2)).toBe(edgeKey(2, 1));
    expect(edgeKey(1, 2)).not.toBe(edgeKey('1', 2));
  });

  it('answers neighbour and position queries', () => {
    const graph = buildGraph(discover(triangleDoc));
    expect(graph.neighbors(0)).toEqual([1, 2]);
    expect(graph.position(2)).toEqual({ x: 1, y: 1 });
    expect(graph.position(42)).toBeUndefined();
    expect(graph.neighbors(42)).toEqual([]);
  });

  it('can be assembled directly from nodes and edges', () => {
    const graph = new Graph(
      [
        { id: 'a', pos: { x: 0, y: 0 } },
        { id: 'b', pos: { x: 0, y: 1 } },
      ],
      [{ source: 'a', target: 'b', attributes: { weight: 3 } }]
    );
    expect(graph.edge('b', 'a')).toEqual({ source: 'a', target: 'b', attributes: { weight: 3 } });
    expect(graph.diagnostics).toEqual([]);
  });
});

describe('mergeGraphs', () => {
  it('namespaces ids so separate builds do not collide', () => {
    const a = buildGraph(discover(triangleDoc));
    const b = buildGraph(discover(triangleDoc));
    const merged = mergeGraphs([
      { namespace: 'a', graph: a },
      { namespace: 'b', graph: b },
    ]);
    expect(merged.order).toBe(6);
    expect(merged.size).toBe(6);
    expect([...merged.nodes.keys()]).toEqual(['a/0', 'a/1', 'a/2', 'b/0', 'b/1', 'b/2']);
    expect(merged.edge('b/0', 'b/2')).toEqual({ source: 'b/2', target: 'b/0' });
  });

  it('carries diagnostics over with namespaced ids', () => {
    const town = buildGraph(
      discover(townDoc({ '0': [{ i: 0, uv: { x: 0, y: 0 } }, null] }, { '0': [{ a: 0, b: 7 }, null] }))
    );
    const merged = mergeGraphs([{ namespace: 't', graph: town }]);
    expect(merged.diagnostics).toEqual([
      { kind: 'dangling-reference', source: 't/0', target: 't/7', missing: 't/7', origin: 'town-edge' },
    ]);
  });

  it('refuses a namespace used twice', () => {
    const g = buildGraph(discover(triangleDoc));
    expect(() =>
      mergeGraphs([
        { namespace: 'x', graph: g },
        { namespace: 'x', graph: g },
      ])
    ).toThrow('Duplicate graph namespace: x');
  });
});

describe('toNodeLink', () => {
  it('flattens positions and edge attributes', () => {
    const graph = buildGraph(
      discover(
        riverDoc(
          riverRecord({ i: 0, strahler: 2 }),
          riverRecord({ i: 1, inlets: [0], strahler: 4, uv: { x: 1, y: 1 } })
        )
      )
    );
    expect(toNodeLink(graph)).toEqual({
      directed: false,
      nodes: [
        { id: 0, x: 0, y: 0 },
        { id: 1, x: 1, y: 1 },
      ],
      links: [{ source: 1, target: 0, color: 'flow', weight: 2 }],
    });
  });

  it('round-trips through JSON without attribute keys on plain edges', () => {
    const doc = toNodeLink(buildGraph(discover(triangleDoc)));
    expect(JSON.parse(JSON.stringify(doc)).links[0]).toEqual({ source: 0, target: 1 });
  });
});
