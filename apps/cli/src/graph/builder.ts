import { AlreadyFinalizedError, MalformedRecordError } from '../errors.js';
import { vec2, type Vec2 } from '../types/geo.js';
import type {
  Entity,
  NodeId,
  PolygonEntity,
  RiverNodeEntity,
} from '../types/entities.js';
import {
  FLOW_EDGE,
  type EdgeAttributes,
  type GraphDiagnostic,
  type GraphEdge,
} from '../types/graph.js';
import { openRing, ringEdges, samePosition } from '../utils/geometry.js';
import { Graph, edgeKey } from './graph.js';

type BuilderState = 'accumulating' | 'finalized';

interface PendingEdge {
  source: NodeId;
  target: NodeId;
  attributes?: EdgeAttributes;
  origin: 'ring' | 'town-edge';
}

/**
 * Accumulates discovered entities into a Graph.
 *
 * Edges are only resolved in `build()`: town edges may name nodes that
 * arrive later, and river flow edges need every retained node to be known
 * before an inlet's Strahler order can be read. Edges whose endpoints never
 * show up are dropped and reported as `dangling-reference` diagnostics.
 */
export class GraphBuilder {
  private state: BuilderState = 'accumulating';
  private readonly positions = new Map<NodeId, Vec2>();
  private readonly pending: PendingEdge[] = [];
  private readonly riverNodes = new Map<number, RiverNodeEntity>();
  private readonly diagnostics: GraphDiagnostic[] = [];
  private nextSyntheticId = 0;
  private graph?: Graph;

  get finalized(): boolean {
    return this.state === 'finalized';
  }

  add(entity: Entity): this {
    if (this.state === 'finalized') throw new AlreadyFinalizedError();

    switch (entity.kind) {
      case 'polygon':
        this.addPolygon(entity);
        break;
      case 'point':
        this.putNode(this.syntheticId(), vec2(entity.x, entity.y));
        break;
      case 'river-node':
        // below sea level with nothing flowing in: not part of the network
        if (entity.elevation < 0 && entity.inlets.length === 0) break;
        this.putNode(entity.i, entity.pos);
        this.riverNodes.set(entity.i, entity);
        break;
      case 'town-node':
        this.putNode(entity.i, entity.pos);
        break;
      case 'town-edge':
        this.pending.push({ source: entity.a, target: entity.b, origin: 'town-edge' });
        break;
    }
    return this;
  }

  addAll(entities: Iterable<Entity>): this {
    for (const entity of entities) this.add(entity);
    return this;
  }

  build(): Graph {
    if (this.graph) return this.graph;
    this.state = 'finalized';

    const edges = new Map<string, GraphEdge>();
    const insert = (source: NodeId, target: NodeId, attributes?: EdgeAttributes) => {
      const key = edgeKey(source, target);
      const existing = edges.get(key);
      if (!existing) {
        edges.set(key, attributes ? { source, target, attributes } : { source, target });
      } else if (attributes) {
        existing.attributes = { ...existing.attributes, ...attributes };
      }
    };

    for (const edge of this.pending) {
      const missing = this.missingEndpoint(edge.source, edge.target);
      if (missing === undefined) {
        insert(edge.source, edge.target, edge.attributes);
      } else if (edge.origin === 'town-edge') {
        this.diagnostics.push({
          kind: 'dangling-reference',
          source: edge.source,
          target: edge.target,
          missing,
          origin: 'town-edge',
        });
      }
    }

    for (const node of this.riverNodes.values()) {
      for (const inlet of node.inlets) {
        const upstream = this.riverNodes.get(inlet);
        if (!upstream) {
          this.diagnostics.push({
            kind: 'dangling-reference',
            source: node.i,
            target: inlet,
            missing: inlet,
            origin: 'river-inlet',
          });
          continue;
        }
        // width follows the upstream node's order, not this node's
        insert(node.i, inlet, { color: FLOW_EDGE, weight: upstream.strahlerOrder });
      }
    }

    const nodes = Array.from(this.positions, ([id, pos]) => ({ id, pos }));
    this.graph = new Graph(nodes, edges.values(), this.diagnostics);
    return this.graph;
  }

  private addPolygon(polygon: PolygonEntity): void {
    const ring = openRing(polygon.exterior);
    if (ring.length === 0) {
      throw new MalformedRecordError('exterior', 'polygon entity', 'has no points besides the closing one');
    }
    const ids = ring.map((pos) => {
      const id = this.syntheticId();
      this.putNode(id, pos);
      return id;
    });
    for (const [a, b] of ringEdges(ids.length)) {
      this.pending.push({ source: ids[a], target: ids[b], origin: 'ring' });
    }
  }

  private putNode(id: NodeId, pos: Vec2): void {
    const previous = this.positions.get(id);
    if (previous && !samePosition(previous, pos)) {
      this.diagnostics.push({ kind: 'node-redefined', id, previous, current: pos });
    }
    this.positions.set(id, pos);
  }

  private syntheticId(): number {
    while (this.positions.has(this.nextSyntheticId)) this.nextSyntheticId++;
    return this.nextSyntheticId++;
  }

  private missingEndpoint(source: NodeId, target: NodeId): NodeId | undefined {
    if (!this.positions.has(source)) return source;
    if (!this.positions.has(target)) return target;
    return undefined;
  }
}

/** Builds a graph from any entity sequence, typically `buildGraph(discover(doc))`. */
export const buildGraph = (entities: Iterable<Entity>): Graph => new GraphBuilder().addAll(entities).build();
