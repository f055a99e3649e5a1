import { assertPositive } from './errors';
import { rectBottom, rectRight, type Rect } from './rect';

/** Index of a rectangle in the owning world's block arena. */
export type RectHandle = number;

export interface CellRange {
  x0: number;
  x1: number;
  y0: number;
  y1: number;
}

/**
 * Uniform grid over static rectangles. Each rectangle is bucketed in every
 * cell it covers, so a lookup in any single cell sees all rectangles
 * overlapping that cell.
 */
export class SpatialIndex {
  readonly cellSize: number;
  private readonly buckets = new Map<string, RectHandle[]>();
  private entries = 0;

  constructor(cellSize: number) {
    assertPositive(cellSize, 'cellSize');
    this.cellSize = cellSize;
  }

  get size(): number {
    return this.entries;
  }

  get cellCount(): number {
    return this.buckets.size;
  }

  cellRange(rect: Rect): CellRange {
    const x0 = this.cellCoord(rect.x);
    const y0 = this.cellCoord(rect.y);
    const x1 = Math.max(x0, this.cellCoord(rectRight(rect) - 1));
    const y1 = Math.max(y0, this.cellCoord(rectBottom(rect) - 1));
    return { x0, x1, y0, y1 };
  }

  insert(handle: RectHandle, rect: Rect): void {
    const { x0, x1, y0, y1 } = this.cellRange(rect);
    for (let cx = x0; cx <= x1; cx++) {
      for (let cy = y0; cy <= y1; cy++) {
        const key = this.keyForCell(cx, cy);
        const bucket = this.buckets.get(key);
        if (bucket) {
          bucket.push(handle);
        } else {
          this.buckets.set(key, [handle]);
        }
      }
    }
    this.entries += 1;
  }

  query(rect: Rect): RectHandle[] {
    const { x0, x1, y0, y1 } = this.cellRange(rect);
    const seen = new Set<RectHandle>();
    const result: RectHandle[] = [];

    for (let cx = x0; cx <= x1; cx++) {
      for (let cy = y0; cy <= y1; cy++) {
        const bucket = this.buckets.get(this.keyForCell(cx, cy));
        if (!bucket) continue;
        for (const handle of bucket) {
          if (seen.has(handle)) continue;
          seen.add(handle);
          result.push(handle);
        }
      }
    }

    return result;
  }

  bucketAt(cx: number, cy: number): readonly RectHandle[] {
    return this.buckets.get(this.keyForCell(cx, cy)) ?? [];
  }

  private cellCoord(v: number): number {
    return Math.floor(v / this.cellSize);
  }

  private keyForCell(cx: number, cy: number): string {
    return `${cx},${cy}`;
  }
}
