/**
 * Shape discovery and graph assembly for generator JSON output.
 *
 *   const graph = buildGraph(discover(JSON.parse(text)));
 *   for (const [id, pos] of graph.nodeEntries()) ...
 */

export * from './types/geo.js';
export * from './types/entities.js';
export * from './types/graph.js';
export * from './types/json.js';
export * from './errors.js';
export { SENTINEL_INDEX, isSentinel, withoutSentinels } from './utils/sentinel.js';
export { discover, detectDocument, detectDocumentKind, walkShapes, type DiscoverOptions, type DetectedDocument } from './discovery/index.js';
export { Graph, GraphBuilder, buildGraph, edgeKey, mergeGraphs, toNodeLink } from './graph/index.js';
export type { NamespacedGraph, NodeLinkDocument, NodeLinkEdge, NodeLinkNode } from './graph/index.js';
export { renderSvg, type SvgOptions } from './render/svg.js';
export { loadDocument } from './io/loadDocument.js';
export { loadConfig, ConfigError, type AppConfig } from './config.js';
export { createLogger, LOG_LEVELS, type LogLevel, type Logger } from './utils/logger.js';
export { runGraphCommand, type GraphCommandOptions, type GraphCommandResult, type OutputFormat } from './commands/graphCommand.js';
