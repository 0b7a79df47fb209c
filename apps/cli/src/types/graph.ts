import type { Vec2 } from './geo.js';
import type { NodeId } from './entities.js';

/** Colour tag for edges that follow river flow (node to one of its inlets). */
export const FLOW_EDGE = 'flow';

export type EdgeColor = typeof FLOW_EDGE;

export interface EdgeAttributes {
  color?: EdgeColor;
  weight?: number;
}

export interface GraphNode {
  id: NodeId;
  pos: Vec2;
}

export interface GraphEdge {
  source: NodeId;
  target: NodeId;
  attributes?: EdgeAttributes;
}

export type GraphDiagnostic =
  | {
      kind: 'dangling-reference';
      source: NodeId;
      target: NodeId;
      missing: NodeId;
      origin: 'river-inlet' | 'town-edge';
    }
  | {
      kind: 'node-redefined';
      id: NodeId;
      previous: Vec2;
      current: Vec2;
    };

export type DocumentKind = 'nested' | 'river' | 'town';
