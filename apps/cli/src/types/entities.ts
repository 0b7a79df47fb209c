import type { Vec2 } from './geo.js';

/**
 * Graph node key. Integer ids come straight from river/town records or from
 * the builder's synthetic counter; strings only appear after `mergeGraphs`
 * namespaces a graph.
 */
export type NodeId = number | string;

export interface PolygonEntity {
  kind: 'polygon';
  exterior: Vec2[]; // as found in the source, closing duplicate included
}

export interface PointEntity {
  kind: 'point';
  x: number;
  y: number;
}

export interface RiverNodeEntity {
  kind: 'river-node';
  i: number;
  indices: Vec2;
  pos: Vec2;
  elevation: number;
  neighbors: number[]; // sentinel-filtered
  inlets: number[]; // sentinel-filtered
  outlet?: number;
  direction: Vec2;
  forkAngle: number;
  strahlerOrder: number;
}

export interface TownNodeEntity {
  kind: 'town-node';
  i: number;
  pos: Vec2;
}

export interface TownEdgeEntity {
  kind: 'town-edge';
  a: number;
  b: number;
}

export type Entity =
  | PolygonEntity
  | PointEntity
  | RiverNodeEntity
  | TownNodeEntity
  | TownEdgeEntity;
