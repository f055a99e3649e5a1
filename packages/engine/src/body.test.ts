import { describe, expect, it } from 'vitest';

import { flatLevel } from './__fixtures__/levels';
import { KinematicBody, applyFriction, clampSpeed } from './body';
import { PreconditionError } from './errors';
import { IDLE_INPUT, toInputSnapshot } from './input';
import { StaticWorld } from './static-world';

const world = StaticWorld.fromLevel(flatLevel());

function restingBody(x: number): KinematicBody {
  const body = new KinematicBody({ x, y: 528 });
  body.restore({ position: { x, y: 528 }, velocity: { x: 0, y: 0 }, onGround: true });
  return body;
}

describe('applyFriction / clampSpeed', () => {
  it('never pushes velocity past zero', () => {
    expect(applyFriction(0.1, 0.2)).toBe(0);
    expect(applyFriction(-0.1, 0.2)).toBe(0);
    expect(applyFriction(0, 0.2)).toBe(0);
  });

  it('clamps symmetrically', () => {
    expect(clampSpeed(7, 6)).toBe(6);
    expect(clampSpeed(-7, 6)).toBe(-6);
    expect(clampSpeed(3, 6)).toBe(3);
  });
});

describe('KinematicBody', () => {
  it('projects the spawn point onto an integer box', () => {
    const body = new KinematicBody({ x: 50.7, y: 500.2 });
    expect(body.box).toEqual({ x: 50, y: 500, w: 32, h: 32 });
    expect(body.onGround).toBe(false);
  });

  it('settles back onto the ground tile when idle', () => {
    const body = restingBody(50);
    const report = body.step(IDLE_INPUT, world);

    expect(body.velocity).toEqual({ x: 0, y: 0 });
    expect(body.position).toEqual({ x: 50, y: 528 });
    expect(body.onGround).toBe(true);
    expect(report).toEqual({ wallHit: false, ceilingHit: false, landed: true });
  });

  it('stays grounded while standing still', () => {
    const body = new KinematicBody({ x: 300, y: 528 });
    for (let i = 0; i < 5; i += 1) {
      body.step(IDLE_INPUT, world);
      expect(body.onGround).toBe(true);
      expect(body.box.y).toBe(528);
    }
  });

  it('accelerates to walking speed and stays clamped', () => {
    const body = restingBody(300);
    const left = toInputSnapshot({ left: true });

    for (let i = 0; i < 10; i += 1) body.step(left, world);
    expect(body.velocity.x).toBeCloseTo(-4, 10);

    for (let i = 0; i < 5; i += 1) {
      body.step(left, world);
      expect(body.velocity.x).toBe(-4);
    }
  });

  it('decays horizontal speed by friction without input', () => {
    const body = restingBody(300);
    body.restore({ position: { x: 300, y: 528 }, velocity: { x: 1, y: 0 }, onGround: true });

    body.step(IDLE_INPUT, world);
    expect(body.velocity.x).toBe(0.8);

    for (let i = 0; i < 5; i += 1) body.step(IDLE_INPUT, world);
    expect(body.velocity.x).toBe(0);
  });

  it('caps running speed and drops back to walking speed when run is released', () => {
    const body = restingBody(50);
    const run = toInputSnapshot({ right: true, run: true });

    for (let i = 0; i < 20; i += 1) body.step(run, world);
    expect(body.velocity.x).toBe(6);

    body.step(toInputSnapshot({ right: true }), world);
    expect(body.velocity.x).toBe(4);
  });

  it('jumps only from the ground', () => {
    const body = restingBody(50);
    body.step(toInputSnapshot({ jump: true }), world);

    expect(body.velocity.y).toBeCloseTo(-10.95, 10);
    expect(body.onGround).toBe(false);
    expect(body.box.y).toBe(517);

    const before = body.velocity.y;
    body.step(toInputSnapshot({ jump: true }), world);
    expect(body.velocity.y).toBeCloseTo(before + 0.55, 10);
  });

  it('stops at a ceiling', () => {
    const ceiling = StaticWorld.fromLevel(
      flatLevel({ extra: [{ kind: 'brick', x: 40, y: 480, w: 40, h: 40 }] }),
    );
    const body = restingBody(50);
    const report = body.step(toInputSnapshot({ jump: true }), ceiling);

    expect(report.ceilingHit).toBe(true);
    expect(body.position.y).toBe(520);
    expect(body.velocity.y).toBe(0);
    expect(body.onGround).toBe(false);
  });

  it('stops at a wall', () => {
    const walled = StaticWorld.fromLevel(
      flatLevel({ extra: [{ kind: 'brick', x: 120, y: 520, w: 40, h: 40 }] }),
    );
    const body = restingBody(86.5);
    body.restore({ position: { x: 86.5, y: 528 }, velocity: { x: 4, y: 0 }, onGround: true });
    const report = body.step(toInputSnapshot({ right: true }), walled);

    expect(report.wallHit).toBe(true);
    expect(body.position).toEqual({ x: 88, y: 528 });
    expect(body.velocity.x).toBe(0);
    expect(body.onGround).toBe(true);
  });

  it('does not tunnel through the ground at terminal velocity', () => {
    const body = new KinematicBody({ x: 300, y: 100 });
    body.restore({ position: { x: 300, y: 100 }, velocity: { x: 0, y: 12 }, onGround: false });

    for (let i = 0; i < 100 && !body.onGround; i += 1) {
      body.step(IDLE_INPUT, world);
      expect(body.box.y + body.box.h).toBeLessThanOrEqual(560);
      expect(body.velocity.y).toBeLessThanOrEqual(12);
    }
    expect(body.onGround).toBe(true);
    expect(body.position.y).toBe(528);
  });

  it('floors negative positions when syncing the box', () => {
    const body = new KinematicBody({ x: 0, y: 0 });
    body.restore({ position: { x: -0.5, y: -1.5 }, velocity: { x: 0, y: 0 }, onGround: false });
    expect(body.box.x).toBe(-1);
    expect(body.box.y).toBe(-2);
  });

  it('rejects non-finite state', () => {
    expect(() => new KinematicBody({ x: Number.NaN, y: 0 })).toThrow(PreconditionError);
    const body = new KinematicBody({ x: 0, y: 0 });
    expect(() =>
      body.restore({ position: { x: 0, y: 0 }, velocity: { x: Number.POSITIVE_INFINITY, y: 0 }, onGround: false }),
    ).toThrow(/velocity.x/);
  });
});
