import { UnrecognizedDocumentError } from '../errors.js';
import type { Entity } from '../types/entities.js';
import type { DocumentKind } from '../types/graph.js';
import type { JsonArray, JsonObject, JsonValue } from '../types/json.js';
import type { PathSegment } from '../utils/jsonPath.js';
import { detectDocument } from './documentKind.js';
import { walkShapes } from './nested.js';
import { parseRecord } from './parseRecord.js';
import { isSentinel } from '../utils/sentinel.js';
import { RiverNodeSchema, TownEdgeSchema, TownNodeSchema, withAuxiliary } from './schemas.js';

export { detectDocument, detectDocumentKind, type DetectedDocument } from './documentKind.js';
export { walkShapes, EXTERIOR_KEY } from './nested.js';

export interface DiscoverOptions {
  /**
   * The mode the caller wants. `'nested'` walks any mapping or sequence; river
   * and town fail with UnrecognizedDocumentError on another kind of document.
   */
  expect?: DocumentKind;
}

function* riverNodes(graph: JsonArray): Generator<Entity, void, undefined> {
  for (let i = 0; i < graph.length; i++) {
    yield parseRecord(RiverNodeSchema, graph[i], ['graph', i]);
  }
}

const TownNodeElement = withAuxiliary(TownNodeSchema);
const TownEdgeElement = withAuxiliary(TownEdgeSchema);

function* townRecords(nodes: JsonObject, edges: JsonObject): Generator<Entity, void, undefined> {
  for (const [key, element] of Object.entries(nodes)) {
    const path: PathSegment[] = ['nodes', 'elements', key];
    yield parseRecord(TownNodeElement, element, path);
  }
  for (const [key, element] of Object.entries(edges)) {
    const path: PathSegment[] = ['edges', 'elements', key];
    const edge = parseRecord(TownEdgeElement, element, path);
    // an edge to "no node" is no edge
    if (!isSentinel(edge.a) && !isSentinel(edge.b)) yield edge;
  }
}

/**
 * Lazily yields every entity in a parsed document. Records are validated as
 * they are reached, so a malformed record throws from the iteration step
 * that reaches it.
 */
export function* discover(doc: JsonValue, options: DiscoverOptions = {}): Generator<Entity, void, undefined> {
  const detected = detectDocument(doc, options.expect);
  if (options.expect && detected.kind !== options.expect) {
    throw new UnrecognizedDocumentError(`expected a ${options.expect} document, found a ${detected.kind} document`);
  }

  switch (detected.kind) {
    case 'river':
      yield* riverNodes(detected.graph);
      break;
    case 'town':
      yield* townRecords(detected.nodes, detected.edges);
      break;
    case 'nested':
      yield* walkShapes(detected.root);
      break;
  }
}
