import { DEFAULT_TUNING, type PhysicsTuningT } from '@tilestep/level-spec';

import {
  moveAndResolveX,
  moveAndResolveY,
  type BodyState,
  type ColliderSource,
} from './collision';
import { assertFinite, assertPositive } from './errors';
import { horizontalIntent, type InputSnapshot } from './input';
import { toPixel, type Rect, type Vec2 } from './rect';

export interface StepReport {
  wallHit: boolean;
  ceilingHit: boolean;
  landed: boolean;
}

export interface BodyView {
  position: Vec2;
  velocity: Vec2;
  box: Rect;
  onGround: boolean;
}

/**
 * Friction pulls toward zero but never past it.
 */
export function applyFriction(vx: number, friction: number): number {
  if (vx > 0) {
    return Math.max(0, vx - friction);
  }
  if (vx < 0) {
    return Math.min(0, vx + friction);
  }
  return vx;
}

export function clampSpeed(vx: number, maxSpeed: number): number {
  if (vx > maxSpeed) {
    return maxSpeed;
  }
  if (vx < -maxSpeed) {
    return -maxSpeed;
  }
  return vx;
}

/**
 * The player actor: sub-pixel position and velocity plus the pixel bounding
 * box used for collision and rendering.
 */
export class KinematicBody {
  private readonly state: BodyState;
  private readonly tuning: PhysicsTuningT;

  constructor(spawn: Vec2, tuning: PhysicsTuningT = DEFAULT_TUNING) {
    assertFinite(spawn.x, 'spawn.x');
    assertFinite(spawn.y, 'spawn.y');
    assertPositive(tuning.bodyWidth, 'bodyWidth');
    assertPositive(tuning.bodyHeight, 'bodyHeight');
    this.tuning = tuning;
    this.state = {
      position: { x: spawn.x, y: spawn.y },
      velocity: { x: 0, y: 0 },
      box: { x: toPixel(spawn.x), y: toPixel(spawn.y), w: tuning.bodyWidth, h: tuning.bodyHeight },
      onGround: false,
    };
  }

  get position(): Readonly<Vec2> {
    return this.state.position;
  }

  get velocity(): Readonly<Vec2> {
    return this.state.velocity;
  }

  get box(): Readonly<Rect> {
    return this.state.box;
  }

  get onGround(): boolean {
    return this.state.onGround;
  }

  view(): BodyView {
    return {
      position: { ...this.state.position },
      velocity: { ...this.state.velocity },
      box: { ...this.state.box },
      onGround: this.state.onGround,
    };
  }

  /** Advance one fixed tick against `world`. */
  step(input: InputSnapshot, world: ColliderSource): StepReport {
    this.assertSimulatable();
    const { tuning, state } = this;

    const accel = input.run ? tuning.runAccel : tuning.walkAccel;
    const direction = horizontalIntent(input);
    if (direction === 0) {
      state.velocity.x = applyFriction(state.velocity.x, tuning.friction);
    } else {
      state.velocity.x += direction * accel;
    }
    state.velocity.x = clampSpeed(
      state.velocity.x,
      input.run ? tuning.maxRunSpeed : tuning.maxWalkSpeed,
    );

    if (input.jump && state.onGround) {
      state.velocity.y = tuning.jumpVelocity;
      state.onGround = false;
    }

    state.velocity.y = Math.min(state.velocity.y + tuning.gravity, tuning.terminalFallSpeed);

    const movingUp = state.velocity.y < 0;
    const horizontal = moveAndResolveX(state, world);
    const vertical = moveAndResolveY(state, world);

    return {
      wallHit: horizontal.hit,
      ceilingHit: vertical.hit && movingUp,
      landed: vertical.landed,
    };
  }

  /** Scripted vertical motion used by the clear sequence; no collision. */
  nudgeY(dy: number): void {
    this.state.position.y += dy;
    this.state.box.y = toPixel(this.state.position.y);
  }

  /** Scripted horizontal motion used by the clear sequence; no collision. */
  nudgeX(dx: number): void {
    this.state.position.x += dx;
    this.state.box.x = toPixel(this.state.position.x);
  }

  halt(): void {
    this.state.velocity.x = 0;
    this.state.velocity.y = 0;
  }

  /** Overwrite kinematic state, e.g. to restore a saved tick. */
  restore(view: Pick<BodyView, 'position' | 'velocity' | 'onGround'>): void {
    assertFinite(view.position.x, 'position.x');
    assertFinite(view.position.y, 'position.y');
    assertFinite(view.velocity.x, 'velocity.x');
    assertFinite(view.velocity.y, 'velocity.y');
    this.state.position = { ...view.position };
    this.state.velocity = { ...view.velocity };
    this.state.box.x = toPixel(view.position.x);
    this.state.box.y = toPixel(view.position.y);
    this.state.onGround = view.onGround;
  }

  private assertSimulatable(): void {
    assertFinite(this.state.position.x, 'position.x');
    assertFinite(this.state.position.y, 'position.y');
    assertFinite(this.state.velocity.x, 'velocity.x');
    assertFinite(this.state.velocity.y, 'velocity.y');
  }
}
