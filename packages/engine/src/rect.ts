import { assertFinite, assertPositive } from './errors';

export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

export interface Vec2 {
  x: number;
  y: number;
}

export function makeRect(x: number, y: number, w: number, h: number): Rect {
  assertFinite(x, 'rect.x');
  assertFinite(y, 'rect.y');
  assertPositive(w, 'rect.w');
  assertPositive(h, 'rect.h');
  return { x, y, w, h };
}

export function rectRight(rect: Rect): number {
  return rect.x + rect.w;
}

export function rectBottom(rect: Rect): number {
  return rect.y + rect.h;
}

/** Integer centre column, rounded toward the left edge. */
export function rectCenterX(rect: Rect): number {
  return rect.x + Math.floor(rect.w / 2);
}

/** Strict overlap: rectangles that only share an edge do not intersect. */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.w && a.x + a.w > b.x && a.y < b.y + b.h && a.y + a.h > b.y;
}

/**
 * Grow a rectangle by `dx` and `dy` in total while keeping it centred.
 * Odd amounts put the extra unit on the right/bottom side.
 */
export function inflateRect(rect: Rect, dx: number, dy: number): Rect {
  return {
    x: rect.x - Math.floor(dx / 2),
    y: rect.y - Math.floor(dy / 2),
    w: rect.w + dx,
    h: rect.h + dy,
  };
}

/**
 * Pixel projection of a sub-pixel coordinate. Flooring keeps the projected
 * box at or below the exact position on both sides of zero.
 */
export function toPixel(value: number): number {
  return Math.floor(value);
}
