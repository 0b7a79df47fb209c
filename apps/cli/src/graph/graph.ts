import type { Vec2 } from '../types/geo.js';
import type { NodeId } from '../types/entities.js';
import type { EdgeAttributes, GraphDiagnostic, GraphEdge, GraphNode } from '../types/graph.js';

/**
 * Canonical key for an undirected edge. JSON encoding keeps `1` and `"1"`
 * apart once merged graphs mix integer and namespaced ids.
 */
export const edgeKey = (a: NodeId, b: NodeId): string => {
  const ka = JSON.stringify(a);
  const kb = JSON.stringify(b);
  return ka <= kb ? `${ka}|${kb}` : `${kb}|${ka}`;
};

/**
 * Assembled, read-only graph: positioned nodes, undirected edges with
 * optional attributes, and whatever diagnostics the build produced.
 */
export class Graph {
  readonly nodes: ReadonlyMap<NodeId, GraphNode>;
  readonly edges: readonly GraphEdge[];
  readonly diagnostics: readonly GraphDiagnostic[];
  private readonly adjacency = new Map<NodeId, NodeId[]>();

  constructor(
    nodes: Iterable<GraphNode>,
    edges: Iterable<GraphEdge>,
    diagnostics: Iterable<GraphDiagnostic> = []
  ) {
    const nodeMap = new Map<NodeId, GraphNode>();
    for (const node of nodes) nodeMap.set(node.id, Object.freeze({ ...node }));
    this.nodes = nodeMap;

    const edgeList: GraphEdge[] = [];
    for (const edge of edges) {
      const frozen: GraphEdge = edge.attributes
        ? { source: edge.source, target: edge.target, attributes: Object.freeze({ ...edge.attributes }) }
        : { source: edge.source, target: edge.target };
      edgeList.push(Object.freeze(frozen));
      this.link(edge.source, edge.target);
      if (edge.source !== edge.target) this.link(edge.target, edge.source);
    }
    this.edges = Object.freeze(edgeList);
    this.diagnostics = Object.freeze([...diagnostics]);
  }

  private link(from: NodeId, to: NodeId): void {
    const list = this.adjacency.get(from);
    if (list) list.push(to);
    else this.adjacency.set(from, [to]);
  }

  /** Number of nodes. */
  get order(): number {
    return this.nodes.size;
  }

  /** Number of edges. */
  get size(): number {
    return this.edges.length;
  }

  hasNode(id: NodeId): boolean {
    return this.nodes.has(id);
  }

  position(id: NodeId): Vec2 | undefined {
    return this.nodes.get(id)?.pos;
  }

  neighbors(id: NodeId): readonly NodeId[] {
    return this.adjacency.get(id) ?? [];
  }

  degree(id: NodeId): number {
    return this.neighbors(id).length;
  }

  edge(a: NodeId, b: NodeId): GraphEdge | undefined {
    const key = edgeKey(a, b);
    return this.edges.find((e) => edgeKey(e.source, e.target) === key);
  }

  *nodeEntries(): IterableIterator<[NodeId, Vec2]> {
    for (const [id, node] of this.nodes) yield [id, node.pos];
  }

  *edgeEntries(): IterableIterator<[NodeId, NodeId, EdgeAttributes | undefined]> {
    for (const e of this.edges) yield [e.source, e.target, e.attributes];
  }
}
