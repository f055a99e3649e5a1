import { rectCenterX, type Rect } from './rect';

export const DEFAULT_VIEWPORT_WIDTH = 800;

/** Horizontal scroll that centres `box`, kept inside the level. */
export function followCamera(box: Readonly<Rect>, worldWidth: number, viewportWidth: number): number {
  const maxScroll = Math.max(0, worldWidth - viewportWidth);
  const target = rectCenterX(box) - Math.floor(viewportWidth / 2);
  if (target < 0) {
    return 0;
  }
  if (target > maxScroll) {
    return maxScroll;
  }
  return target;
}
