export { Graph, edgeKey } from './graph.js';
export { GraphBuilder, buildGraph } from './builder.js';
export { mergeGraphs, type NamespacedGraph } from './merge.js';
export { toNodeLink, type NodeLinkDocument, type NodeLinkEdge, type NodeLinkNode } from './nodeLink.js';
