import { describe, it, expect, beforeEach } from 'vitest';
import { discover } from '../src/discovery/index.js';
import { AlreadyFinalizedError, MalformedRecordError } from '../src/errors.js';
import { GraphBuilder, buildGraph } from '../src/graph/builder.js';
import { FLOW_EDGE } from '../src/types/graph.js';
import { riverDoc, riverRecord, thrownBy, townDoc, triangleDoc } from './fixtures.js';

const square = {
  exterior: [
    { x: 0, y: 0 },
    { x: 2, y: 0 },
    { x: 2, y: 2 },
    { x: 0, y: 2 },
    { x: 0, y: 0 },
  ],
};

describe('GraphBuilder', () => {
  let builder: GraphBuilder;

  beforeEach(() => {
    builder = new GraphBuilder();
  });

  describe('polygons', () => {
    it('builds a triangle from a closed three-point ring', () => {
      const graph = buildGraph(discover(triangleDoc));
      expect(graph.order).toBe(3);
      expect(graph.size).toBe(3);
      expect([...graph.nodeEntries()]).toEqual([
        [0, { x: 0, y: 0 }],
        [1, { x: 1, y: 0 }],
        [2, { x: 1, y: 1 }],
      ]);
      expect([...graph.edgeEntries()]).toEqual([
        [0, 1, undefined],
        [1, 2, undefined],
        [2, 0, undefined],
      ]);
    });

    it('forms a single cycle: every node is a source once and a target once', () => {
      const graph = buildGraph(discover(square));
      expect(graph.order).toBe(4);
      expect(graph.size).toBe(4);
      expect(graph.edges.map((e) => e.source).sort()).toEqual([0, 1, 2, 3]);
      expect(graph.edges.map((e) => e.target).sort()).toEqual([0, 1, 2, 3]);
      for (const id of graph.nodes.keys()) expect(graph.degree(id)).toBe(2);
    });

    it('keeps synthetic ids unique across polygons', () => {
      const graph = buildGraph(discover([triangleDoc, square]));
      expect(graph.order).toBe(7);
      expect(graph.size).toBe(7);
      expect(graph.edge(6, 3)).toEqual({ source: 6, target: 3 });
    });

    it('rejects a polygon entity with nothing left after dropping the closing point', () => {
      const err = thrownBy(
        () => builder.add({ kind: 'polygon', exterior: [{ x: 0, y: 0 }] }),
        MalformedRecordError
      );
      expect(err.field).toBe('exterior');
    });
  });

  describe('points', () => {
    it('adds one node per point and no edges', () => {
      const graph = buildGraph(discover([{ x: 1, y: 2 }, { x: 3, y: 4 }]));
      expect([...graph.nodeEntries()]).toEqual([
        [0, { x: 1, y: 2 }],
        [1, { x: 3, y: 4 }],
      ]);
      expect(graph.size).toBe(0);
    });

    it('skips ids that are already taken', () => {
      builder.add({ kind: 'town-node', i: 0, pos: { x: 5, y: 5 } });
      builder.add({ kind: 'point', x: 1, y: 1 });
      expect([...builder.build().nodes.keys()]).toEqual([0, 1]);
    });
  });

  describe('river nodes', () => {
    it('joins a node to its inlet with the inlet order as weight', () => {
      const doc = riverDoc(
        riverRecord({ i: 0, h: 5, inlets: [], strahler: 2 }),
        riverRecord({ i: 1, h: 5, inlets: [0], strahler: 4, uv: { x: 1, y: 1 } })
      );
      const graph = buildGraph(discover(doc));
      expect(graph.order).toBe(2);
      expect(graph.edges).toEqual([{ source: 1, target: 0, attributes: { color: FLOW_EDGE, weight: 2 } }]);
    });

    it('leaves out nodes below sea level that have no inlets', () => {
      const doc = riverDoc(
        riverRecord({ i: 0, h: 1 }),
        riverRecord({ i: 1, h: -1.0, inlets: [] }),
        riverRecord({ i: 2, h: -1.0, inlets: [0] })
      );
      const graph = buildGraph(discover(doc));
      expect(graph.hasNode(1)).toBe(false);
      expect(graph.hasNode(2)).toBe(true);
      expect([...graph.nodes.keys()]).toEqual([0, 2]);
    });

    it('resolves inlets that appear later in the document', () => {
      const doc = riverDoc(
        riverRecord({ i: 0, inlets: [1], strahler: 5 }),
        riverRecord({ i: 1, strahler: 3 })
      );
      const graph = buildGraph(discover(doc));
      expect(graph.edges).toEqual([{ source: 0, target: 1, attributes: { color: FLOW_EDGE, weight: 3 } }]);
    });

    it('drops an edge to an excluded inlet and reports it', () => {
      const doc = riverDoc(
        riverRecord({ i: 0, h: -3, inlets: [] }),
        riverRecord({ i: 1, h: 2, inlets: [0] })
      );
      const graph = buildGraph(discover(doc));
      expect(graph.order).toBe(1);
      expect(graph.size).toBe(0);
      expect(graph.diagnostics).toEqual([
        { kind: 'dangling-reference', source: 1, target: 0, missing: 0, origin: 'river-inlet' },
      ]);
    });
  });

  describe('town graphs', () => {
    const town = townDoc(
      {
        '0': [{ i: 0, uv: { x: 0, y: 0 } }, null],
        '1': [{ i: 1, uv: { x: 1, y: 0 } }, null],
        '2': [{ i: 2, uv: { x: 1, y: 1 } }, null],
      },
      {
        '0': [{ a: 0, b: 1 }, null],
        '1': [{ a: 1, b: 2 }, null],
        '2': [{ a: 2, b: 1 }, null],
      }
    );

    it('keys nodes by their record index and treats edges as undirected', () => {
      const graph = buildGraph(discover(town));
      expect([...graph.nodes.keys()]).toEqual([0, 1, 2]);
      expect(graph.edges).toEqual([
        { source: 0, target: 1 },
        { source: 1, target: 2 },
      ]);
    });

    it('builds identical graphs from the same document', () => {
      const first = buildGraph(discover(town));
      const second = buildGraph(discover(town));
      expect([...second.nodes.keys()]).toEqual([...first.nodes.keys()]);
      expect(second.edges).toEqual(first.edges);
    });

    it('accepts edges before their nodes', () => {
      builder.add({ kind: 'town-edge', a: 4, b: 5 });
      builder.add({ kind: 'town-node', i: 4, pos: { x: 0, y: 0 } });
      builder.add({ kind: 'town-node', i: 5, pos: { x: 1, y: 0 } });
      expect(builder.build().edges).toEqual([{ source: 4, target: 5 }]);
    });

    it('drops an edge to a missing node and keeps building', () => {
      const doc = townDoc(
        { '0': [{ i: 0, uv: { x: 0, y: 0 } }, null] },
        { '0': [{ a: 0, b: 99 }, null] }
      );
      const graph = buildGraph(discover(doc));
      expect(graph.order).toBe(1);
      expect(graph.size).toBe(0);
      expect(graph.diagnostics).toEqual([
        { kind: 'dangling-reference', source: 0, target: 99, missing: 99, origin: 'town-edge' },
      ]);
    });

    it('lets the last definition of a node win and reports the move', () => {
      builder.add({ kind: 'town-node', i: 3, pos: { x: 0, y: 0 } });
      builder.add({ kind: 'town-node', i: 3, pos: { x: 1, y: 1 } });
      const graph = builder.build();
      expect(graph.position(3)).toEqual({ x: 1, y: 1 });
      expect(graph.diagnostics).toEqual([
        { kind: 'node-redefined', id: 3, previous: { x: 0, y: 0 }, current: { x: 1, y: 1 } },
      ]);
    });
  });

  describe('finalization', () => {
    it('rejects add() after build()', () => {
      builder.add({ kind: 'point', x: 0, y: 0 });
      builder.build();
      expect(builder.finalized).toBe(true);
      expect(() => builder.add({ kind: 'point', x: 1, y: 1 })).toThrow(AlreadyFinalizedError);
    });

    it('returns the same graph from repeated build() calls', () => {
      const graph = builder.add({ kind: 'point', x: 0, y: 0 }).build();
      expect(builder.build()).toBe(graph);
    });

    it('hands out frozen nodes and edges', () => {
      const graph = buildGraph(discover(triangleDoc));
      expect(Object.isFrozen(graph.edges)).toBe(true);
      expect(Object.isFrozen(graph.edges[0])).toBe(true);
      expect(Object.isFrozen(graph.nodes.get(0))).toBe(true);
    });
  });
});
