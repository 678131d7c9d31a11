/**
 * Geometry — screen-space points, vectors and axis-aligned rectangles.
 *
 * Coordinate system: (0,0) is the top-left of the viewport, x grows to the
 * right and y grows downward. All values are CSS pixels.
 */

export interface Pos2 {
  x: number;
  y: number;
}

export interface Vec2 {
  x: number;
  y: number;
}

export interface Rect {
  min: Pos2;
  max: Pos2;
}

/** Starting value for a running component-wise minimum. */
export const EVERYTHING: Pos2 = { x: Infinity, y: Infinity };

export function isPos2(value: unknown): value is Pos2 {
  if (typeof value !== 'object' || value === null) return false;
  return 'x' in value && 'y' in value && typeof value.x === 'number' && typeof value.y === 'number';
}

export function rectFromMinSize(min: Pos2, size: Vec2): Rect {
  return { min: { x: min.x, y: min.y }, max: { x: min.x + size.x, y: min.y + size.y } };
}

/**
 * Rectangle spanned by two arbitrary corners. The corners are normalized
 * so that min <= max on both axes.
 */
export function rectFromTwoPos(a: Pos2, b: Pos2): Rect {
  return {
    min: { x: Math.min(a.x, b.x), y: Math.min(a.y, b.y) },
    max: { x: Math.max(a.x, b.x), y: Math.max(a.y, b.y) },
  };
}

export function rectWidth(r: Rect): number {
  return r.max.x - r.min.x;
}

export function rectHeight(r: Rect): number {
  return r.max.y - r.min.y;
}

export function rectSize(r: Rect): Vec2 {
  return { x: rectWidth(r), y: rectHeight(r) };
}

export function rectContains(r: Rect, p: Pos2): boolean {
  return p.x >= r.min.x && p.x <= r.max.x && p.y >= r.min.y && p.y <= r.max.y;
}

export function rectUnion(a: Rect, b: Rect): Rect {
  return {
    min: posMin(a.min, b.min),
    max: { x: Math.max(a.max.x, b.max.x), y: Math.max(a.max.y, b.max.y) },
  };
}

/** Shrink a rect by `margin` on every side. */
export function rectShrink(r: Rect, margin: number): Rect {
  return {
    min: { x: r.min.x + margin, y: r.min.y + margin },
    max: { x: r.max.x - margin, y: r.max.y - margin },
  };
}

export function posMin(a: Pos2, b: Pos2): Pos2 {
  return { x: Math.min(a.x, b.x), y: Math.min(a.y, b.y) };
}
