import type { Bounds, Ring, Vec2 } from '../types/geo.js';

/**
 * Drops the closing duplicate that source rings carry. The last point is
 * removed unconditionally; generator output always repeats the first point.
 */
export const openRing = (points: readonly Vec2[]): Ring => points.slice(0, -1);

/** Index pairs for a closed cycle over `n` ring points: (0,1) … (n-1,0). */
export const ringEdges = (n: number): Array<[number, number]> => {
  const out: Array<[number, number]> = [];
  for (let i = 0; i < n; i++) out.push([i, (i + 1) % n]);
  return out;
};

export const bounds = (points: Iterable<Vec2>): Bounds | null => {
  let b: Bounds | null = null;
  for (const { x, y } of points) {
    if (!b) { b = { minX: x, minY: y, maxX: x, maxY: y }; continue; }
    if (x < b.minX) b.minX = x;
    if (y < b.minY) b.minY = y;
    if (x > b.maxX) b.maxX = x;
    if (y > b.maxY) b.maxY = y;
  }
  return b;
};

export const samePosition = (a: Vec2, b: Vec2): boolean => a.x === b.x && a.y === b.y;
