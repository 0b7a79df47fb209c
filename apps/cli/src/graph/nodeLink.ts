import type { NodeId } from '../types/entities.js';
import type { EdgeColor } from '../types/graph.js';
import type { Graph } from './graph.js';

export interface NodeLinkNode {
  id: NodeId;
  x: number;
  y: number;
}

export interface NodeLinkEdge {
  source: NodeId;
  target: NodeId;
  color?: EdgeColor;
  weight?: number;
}

export interface NodeLinkDocument {
  directed: false;
  nodes: NodeLinkNode[];
  links: NodeLinkEdge[];
}

/** Node-link JSON, the shape most graph renderers read directly. */
export function toNodeLink(graph: Graph): NodeLinkDocument {
  const nodes: NodeLinkNode[] = [];
  for (const [id, { x, y }] of graph.nodeEntries()) nodes.push({ id, x, y });

  const links: NodeLinkEdge[] = [];
  for (const [source, target, attributes] of graph.edgeEntries()) {
    links.push({ source, target, ...attributes });
  }
  return { directed: false, nodes, links };
}
