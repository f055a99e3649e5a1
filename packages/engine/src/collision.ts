import { rectsOverlap, toPixel, type Rect, type Vec2 } from './rect';

export interface ColliderSource {
  getColliders(rect: Rect): readonly Readonly<Rect>[];
}

/** The mutable kinematic state the resolver works on. */
export interface BodyState {
  position: Vec2;
  velocity: Vec2;
  box: Rect;
  onGround: boolean;
}

export interface AxisResult {
  hit: boolean;
  landed: boolean;
}

/** Sub-pixel extent of the body; `box` is its floored projection. */
function exactExtent(body: BodyState): Rect {
  return { x: body.position.x, y: body.position.y, w: body.box.w, h: body.box.h };
}

/**
 * Move along x by the current velocity, then push the body out of every
 * candidate it overlaps, in the order the world returns them. The first
 * correction zeroes the velocity, so later overlaps only resync position.
 */
export function moveAndResolveX(body: BodyState, world: ColliderSource): AxisResult {
  body.position.x += body.velocity.x;
  body.box.x = toPixel(body.position.x);

  let hit = false;
  for (const obstacle of world.getColliders(body.box)) {
    if (!rectsOverlap(exactExtent(body), obstacle)) {
      continue;
    }
    if (body.velocity.x > 0) {
      body.box.x = obstacle.x - body.box.w;
    } else if (body.velocity.x < 0) {
      body.box.x = obstacle.x + obstacle.w;
    }
    body.position.x = body.box.x;
    body.velocity.x = 0;
    hit = true;
  }

  return { hit, landed: false };
}

/** Vertical counterpart of `moveAndResolveX`; recomputes `onGround`. */
export function moveAndResolveY(body: BodyState, world: ColliderSource): AxisResult {
  body.position.y += body.velocity.y;
  body.box.y = toPixel(body.position.y);
  body.onGround = false;

  let hit = false;
  for (const obstacle of world.getColliders(body.box)) {
    if (!rectsOverlap(exactExtent(body), obstacle)) {
      continue;
    }
    if (body.velocity.y > 0) {
      body.box.y = obstacle.y - body.box.h;
      body.onGround = true;
    } else if (body.velocity.y < 0) {
      body.box.y = obstacle.y + obstacle.h;
    }
    body.position.y = body.box.y;
    body.velocity.y = 0;
    hit = true;
  }

  return { hit, landed: body.onGround };
}
