import type { z } from 'zod';
import { MalformedRecordError } from '../errors.js';
import type { JsonValue } from '../types/json.js';
import { formatPath, type PathSegment } from '../utils/jsonPath.js';

// Named keys only: `exterior[2].y` reports field "y", `[0].uv.x` reports "uv.x".
const fieldName = (issuePath: readonly PathSegment[], recordPath: readonly PathSegment[]): string => {
  const keys = issuePath.filter((seg): seg is string => typeof seg === 'string');
  if (keys.length > 0) return keys.join('.');
  const last = recordPath[recordPath.length - 1];
  return typeof last === 'string' ? last : '<record>';
};

/**
 * Runs a record schema and turns the first zod issue into a
 * MalformedRecordError pointing at the offending field.
 */
export function parseRecord<S extends z.ZodTypeAny>(
  schema: S,
  value: JsonValue,
  path: readonly PathSegment[]
): z.output<S> {
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;

  const [issue] = parsed.error.issues;
  if (!issue) throw new MalformedRecordError(fieldName([], path), formatPath(path), 'is invalid');

  const field = fieldName(issue.path, path);
  const missing = issue.code === 'invalid_type' && issue.received === 'undefined';
  throw new MalformedRecordError(
    field,
    formatPath([...path, ...issue.path]),
    missing ? 'is missing' : `is invalid: ${issue.message}`
  );
}
