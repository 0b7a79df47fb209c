import type { NodeId } from '../types/entities.js';
import type { GraphDiagnostic, GraphEdge, GraphNode } from '../types/graph.js';
import { Graph } from './graph.js';

export interface NamespacedGraph {
  namespace: string;
  graph: Graph;
}

const scoped = (namespace: string, id: NodeId): string => `${namespace}/${id}`;

const scopeDiagnostic = (namespace: string, d: GraphDiagnostic): GraphDiagnostic => {
  switch (d.kind) {
    case 'dangling-reference':
      return {
        ...d,
        source: scoped(namespace, d.source),
        target: scoped(namespace, d.target),
        missing: scoped(namespace, d.missing),
      };
    case 'node-redefined':
      return { ...d, id: scoped(namespace, d.id) };
  }
};

/**
 * Combines independently built graphs. Every id is prefixed with its
 * graph's namespace, so synthetic ids from separate builds cannot collide
 * as long as namespaces are distinct.
 */
export function mergeGraphs(entries: readonly NamespacedGraph[]): Graph {
  const seen = new Set<string>();
  const nodes: GraphNode[] = [];
  const edges: GraphEdge[] = [];
  const diagnostics: GraphDiagnostic[] = [];

  for (const { namespace, graph } of entries) {
    if (seen.has(namespace)) throw new Error(`Duplicate graph namespace: ${namespace}`);
    seen.add(namespace);

    for (const node of graph.nodes.values()) {
      nodes.push({ id: scoped(namespace, node.id), pos: node.pos });
    }
    for (const edge of graph.edges) {
      const source = scoped(namespace, edge.source);
      const target = scoped(namespace, edge.target);
      edges.push(edge.attributes ? { source, target, attributes: edge.attributes } : { source, target });
    }
    for (const d of graph.diagnostics) diagnostics.push(scopeDiagnostic(namespace, d));
  }

  return new Graph(nodes, edges, diagnostics);
}
