import type { PhysicsTuningT } from '@tilestep/level-spec';

import { rectBottom, rectsOverlap, type Rect } from './rect';

export const SESSION_PHASES = ['running', 'clearing-descent', 'clearing-walk', 'cleared'] as const;

export type SessionPhase = (typeof SESSION_PHASES)[number];

export interface ClearContext {
  box: Readonly<Rect>;
  groundTop: number;
}

/**
 * Movement requested by the clear sequence for one tick, plus the phase the
 * session is in afterwards.
 */
export interface ClearStep {
  phase: SessionPhase;
  dx: number;
  dy: number;
}

export function isClearing(phase: SessionPhase): boolean {
  return phase === 'clearing-descent' || phase === 'clearing-walk';
}

/** `running` becomes `clearing-descent` the tick the box touches the goal. */
export function touchesGoal(box: Readonly<Rect>, goal: Readonly<Rect>): boolean {
  return rectsOverlap(box, goal);
}

/**
 * One tick of the automatic level-clear sequence: slide down to the ground
 * line, then walk toward the far edge until the completion offset is
 * passed. `running` and `cleared` are returned unchanged.
 */
export function nextClearPhase(
  phase: SessionPhase,
  context: ClearContext,
  tuning: Pick<PhysicsTuningT, 'clearDescentSpeed' | 'clearWalkSpeed' | 'clearCompletionOffset'>,
): ClearStep {
  switch (phase) {
    case 'clearing-descent':
      if (rectBottom(context.box) < context.groundTop) {
        return { phase, dx: 0, dy: tuning.clearDescentSpeed };
      }
      return { phase: 'clearing-walk', dx: 0, dy: 0 };
    case 'clearing-walk':
      return { phase, dx: tuning.clearWalkSpeed, dy: 0 };
    case 'running':
    case 'cleared':
      return { phase, dx: 0, dy: 0 };
  }
}

/** Completion is judged on the box after the walk movement is applied. */
export function hasWalkedOff(box: Readonly<Rect>, worldWidth: number, offset: number): boolean {
  return box.x > worldWidth - offset;
}
