import type { PointEntity, PolygonEntity } from '../types/entities.js';
import { hasOwn, isJsonContainer, isJsonObject, type JsonObject, type JsonValue } from '../types/json.js';
import type { PathSegment } from '../utils/jsonPath.js';
import { parseRecord } from './parseRecord.js';
import { PointSchema, RingSchema } from './schemas.js';

export const EXTERIOR_KEY = 'exterior';

/**
 * A mapping is point-like as soon as it holds a scalar `x` or `y`. Both must
 * then be numbers; `{ x: 1 }` alone is a malformed point, not something to
 * recurse into. Container-valued `x`/`y` are ordinary members.
 */
const isPointLike = (obj: JsonObject): boolean =>
  ['x', 'y'].some((key) => hasOwn(obj, key) && !isJsonContainer(obj[key]));

/**
 * Pre-order walk over mappings and sequences. A mapping with an `exterior`
 * sequence is a polygon and a point-like mapping is a point; neither is
 * searched any further. Everything else is recursed into, sequences included.
 */
export function* walkShapes(
  value: JsonValue,
  path: PathSegment[] = []
): Generator<PolygonEntity | PointEntity, void, undefined> {
  if (Array.isArray(value)) {
    for (let i = 0; i < value.length; i++) {
      yield* walkShapes(value[i], [...path, i]);
    }
    return;
  }
  if (!isJsonObject(value)) return;

  const exterior = value[EXTERIOR_KEY];
  if (hasOwn(value, EXTERIOR_KEY) && Array.isArray(exterior)) {
    yield { kind: 'polygon', exterior: parseRecord(RingSchema, exterior, [...path, EXTERIOR_KEY]) };
    return;
  }

  if (isPointLike(value)) {
    yield parseRecord(PointSchema, value, path);
    return;
  }

  for (const [key, child] of Object.entries(value)) {
    if (isJsonContainer(child)) yield* walkShapes(child, [...path, key]);
  }
}
