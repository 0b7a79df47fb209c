export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export type Ring = readonly Vec2[]; // open (closing duplicate already dropped)

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export const vec2 = (x: number, y: number): Vec2 => Object.freeze({ x, y });
