import { UnrecognizedDocumentError } from '../errors.js';
import type { DocumentKind } from '../types/graph.js';
import { hasOwn, isJsonObject, type JsonArray, type JsonObject, type JsonValue } from '../types/json.js';

export type DetectedDocument =
  | { kind: 'nested'; root: JsonArray | JsonObject }
  | { kind: 'river'; graph: JsonArray }
  | { kind: 'town'; nodes: JsonObject; edges: JsonObject };

const elementsOf = (doc: JsonObject, key: string): JsonObject | undefined => {
  const collection = doc[key];
  if (!hasOwn(doc, key) || !isJsonObject(collection)) return undefined;
  const elements = collection['elements'];
  return isJsonObject(elements) ? elements : undefined;
};

const typeName = (value: JsonValue): string => (value === null ? 'null' : typeof value);

/**
 * Picks the discovery mode from the top-level shape. River and town documents
 * are recognised by their collections; any other mapping or sequence is
 * searched for nested polygons and points. With `expect: 'nested'` every
 * mapping is walked, whatever collections it carries.
 */
export function detectDocument(doc: JsonValue, expect?: DocumentKind): DetectedDocument {
  if (Array.isArray(doc)) return { kind: 'nested', root: doc };
  if (!isJsonObject(doc)) {
    throw new UnrecognizedDocumentError(`top-level value is a ${typeName(doc)}, expected a mapping or sequence`);
  }
  if (expect === 'nested') return { kind: 'nested', root: doc };

  const graph = doc['graph'];
  if (hasOwn(doc, 'graph') && Array.isArray(graph)) return { kind: 'river', graph };

  const nodes = elementsOf(doc, 'nodes');
  const edges = elementsOf(doc, 'edges');
  if (nodes && edges) return { kind: 'town', nodes, edges };

  return { kind: 'nested', root: doc };
}

export const detectDocumentKind = (doc: JsonValue): DocumentKind => detectDocument(doc).kind;
