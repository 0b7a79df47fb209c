import type { JsonObject, JsonValue } from '../src/types/json.js';

export const triangleDoc: JsonObject = {
  exterior: [
    { x: 0, y: 0 },
    { x: 1, y: 0 },
    { x: 1, y: 1 },
    { x: 0, y: 0 },
  ],
};

/** River node record with harmless defaults; override what the test is about. */
export const riverRecord = (overrides: JsonObject = {}): JsonObject => ({
  i: 0,
  indices: { x: 0, y: 0 },
  uv: { x: 0, y: 0 },
  h: 5,
  neighbors: [],
  inlets: [],
  outlet: null,
  direction: { x: 0, y: 0 },
  fork_angle: 0,
  strahler: 1,
  ...overrides,
});

export const riverDoc = (...records: JsonObject[]): JsonObject => ({ graph: records });

export const townDoc = (
  nodes: Record<string, [JsonValue, JsonValue]>,
  edges: Record<string, [JsonValue, JsonValue]>
): JsonObject => ({
  nodes: { elements: nodes },
  edges: { elements: edges },
});

/** Runs `fn` and returns the error it threw, which must be a `cls`. */
export function thrownBy<E extends Error>(fn: () => unknown, cls: new (...args: never[]) => E): E {
  try {
    fn();
  } catch (err) {
    if (err instanceof cls) return err;
    throw err;
  }
  throw new Error(`expected function to throw ${cls.name}`);
}
