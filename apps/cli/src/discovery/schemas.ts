import { z } from 'zod';
import { vec2 } from '../types/geo.js';
import type {
  PointEntity,
  RiverNodeEntity,
  TownEdgeEntity,
  TownNodeEntity,
} from '../types/entities.js';
import { isSentinel, withoutSentinels } from '../utils/sentinel.js';

// ─── Shared pieces ──────────────────────────────────────

export const Vec2Schema = z
  .object({ x: z.number(), y: z.number() })
  .transform(({ x, y }) => vec2(x, y));

/** An authoritative node id: never the sentinel, always exact in a double. */
export const NodeIndexSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER);

/** An adjacency reference: a node id or the sentinel. */
const IndexRefSchema = z.number().int().nonnegative();

// ─── Nested-shape records ───────────────────────────────

export const PointSchema = z
  .object({ x: z.number(), y: z.number() })
  .transform(({ x, y }): PointEntity => ({ kind: 'point', x, y }));

// the last point repeats the first, so a usable ring has at least two
export const RingSchema = z.array(Vec2Schema).min(2);

// ─── River graph records ────────────────────────────────

export const RiverNodeSchema = z
  .object({
    i: NodeIndexSchema,
    indices: Vec2Schema,
    uv: Vec2Schema,
    h: z.number(),
    neighbors: z.array(IndexRefSchema),
    inlets: z.array(IndexRefSchema),
    // absent, null and false all mean "river mouth"; 0 is node 0
    outlet: z.union([IndexRefSchema, z.null(), z.literal(false)]).optional(),
    direction: Vec2Schema,
    fork_angle: z.number(),
    strahler: z.number().int().nonnegative(),
  })
  .transform(
    (r): RiverNodeEntity => ({
      kind: 'river-node',
      i: r.i,
      indices: r.indices,
      pos: r.uv,
      elevation: r.h,
      neighbors: withoutSentinels(r.neighbors),
      inlets: withoutSentinels(r.inlets),
      outlet: typeof r.outlet === 'number' && !isSentinel(r.outlet) ? r.outlet : undefined,
      direction: r.direction,
      forkAngle: r.fork_angle,
      strahlerOrder: r.strahler,
    })
  );

// ─── Town graph records ─────────────────────────────────

export const TownNodeSchema = z
  .object({ i: NodeIndexSchema, uv: Vec2Schema })
  .transform((r): TownNodeEntity => ({ kind: 'town-node', i: r.i, pos: r.uv }));

// endpoints may be the sentinel; discovery drops those edges
export const TownEdgeSchema = z
  .object({ a: IndexRefSchema, b: IndexRefSchema })
  .transform((r): TownEdgeEntity => ({ kind: 'town-edge', a: r.a, b: r.b }));

/** Town collections pair every record with a bounding rectangle we discard. */
export const withAuxiliary = <T extends z.ZodTypeAny>(record: T) =>
  z.tuple([record, z.unknown()]).transform(([value]) => value);
