import { DEFAULT_TUNING, type PhysicsTuningT } from '@tilestep/level-spec';

import { KinematicBody, type BodyView } from './body';
import { DEFAULT_VIEWPORT_WIDTH, followCamera } from './camera';
import {
  hasWalkedOff,
  isClearing,
  nextClearPhase,
  touchesGoal,
  type SessionPhase,
} from './clear-sequence';
import type { InputSnapshot } from './input';
import { FixedStepScheduler } from './scheduler';
import { StaticWorld } from './static-world';

export interface PhaseChange {
  from: SessionPhase;
  to: SessionPhase;
  tick: number;
}

export interface SessionOptions {
  tuning?: PhysicsTuningT;
  viewportWidth?: number;
  maxFrameMs?: number;
  maxTicksPerFrame?: number;
  onPhaseChange?: (change: PhaseChange) => void;
}

export interface SessionSnapshot {
  tick: number;
  phase: SessionPhase;
  aborted: boolean;
  cameraX: number;
  body: BodyView;
}

/**
 * One play-through of one level. Owns the actor, the scheduler and the
 * lifecycle phase; the world is shared read-only. Nothing here is global,
 * so any number of sessions can coexist (e.g. a replay next to a live run).
 */
export class SimulationSession {
  readonly world: StaticWorld;
  readonly body: KinematicBody;
  private readonly tuning: PhysicsTuningT;
  private readonly scheduler: FixedStepScheduler;
  private readonly viewportWidth: number;
  private readonly onPhaseChange?: (change: PhaseChange) => void;
  private currentPhase: SessionPhase = 'running';
  private aborted = false;
  private ticks = 0;
  private camera = 0;

  constructor(world: StaticWorld, options: SessionOptions = {}) {
    this.world = world;
    this.tuning = options.tuning ?? DEFAULT_TUNING;
    this.viewportWidth = options.viewportWidth ?? DEFAULT_VIEWPORT_WIDTH;
    this.onPhaseChange = options.onPhaseChange;
    this.body = new KinematicBody(world.spawn, this.tuning);
    this.scheduler = new FixedStepScheduler({
      tickRate: this.tuning.tickRate,
      maxFrameMs: options.maxFrameMs,
      maxTicksPerFrame: options.maxTicksPerFrame,
    });
    this.camera = followCamera(this.body.box, world.width, this.viewportWidth);
  }

  static fromLevel(level: unknown, options: SessionOptions = {}): SimulationSession {
    const world = StaticWorld.fromLevel(level, options.tuning);
    return new SimulationSession(world, options);
  }

  get phase(): SessionPhase {
    return this.currentPhase;
  }

  get tick(): number {
    return this.ticks;
  }

  get cameraX(): number {
    return this.camera;
  }

  /** Leftover fraction of a tick after the last frame. */
  get alpha(): number {
    return this.scheduler.alpha;
  }

  isComplete(): boolean {
    return this.currentPhase === 'cleared';
  }

  isAborted(): boolean {
    return this.aborted;
  }

  isFinished(): boolean {
    return this.aborted || this.currentPhase === 'cleared';
  }

  /**
   * Ask the session to stop before its next tick. Ignored once the clear
   * sequence has started; returns whether the request was accepted.
   */
  requestAbort(): boolean {
    if (this.isFinished() || isClearing(this.currentPhase)) {
      return false;
    }
    this.aborted = true;
    return true;
  }

  /** Run exactly one fixed tick with `input`. No-op once finished. */
  stepOnce(input: InputSnapshot): SessionPhase {
    if (this.isFinished()) {
      return this.currentPhase;
    }

    if (this.currentPhase === 'running') {
      this.body.step(input, this.world);
      this.camera = followCamera(this.body.box, this.world.width, this.viewportWidth);
      if (touchesGoal(this.body.box, this.world.goal)) {
        this.body.halt();
        this.transition('clearing-descent');
      }
    } else {
      this.advanceClearSequence();
    }

    this.ticks += 1;
    return this.currentPhase;
  }

  /**
   * Feed one rendered frame's elapsed time. Every tick drained in this
   * frame sees the same input snapshot. Returns the number of ticks run.
   */
  frame(elapsedMs: number, input: InputSnapshot): number {
    if (this.isFinished()) {
      return 0;
    }
    return this.scheduler.advance(elapsedMs, () => {
      this.stepOnce(input);
      return !this.isFinished();
    });
  }

  snapshot(): SessionSnapshot {
    return {
      tick: this.ticks,
      phase: this.currentPhase,
      aborted: this.aborted,
      cameraX: this.camera,
      body: this.body.view(),
    };
  }

  private advanceClearSequence(): void {
    const step = nextClearPhase(
      this.currentPhase,
      { box: this.body.box, groundTop: this.world.groundTop },
      this.tuning,
    );
    if (step.dy !== 0) {
      this.body.nudgeY(step.dy);
    }
    if (step.dx !== 0) {
      this.body.nudgeX(step.dx);
    }

    if (
      step.phase === 'clearing-walk' &&
      this.currentPhase === 'clearing-walk' &&
      hasWalkedOff(this.body.box, this.world.width, this.tuning.clearCompletionOffset)
    ) {
      this.transition('cleared');
      return;
    }
    if (step.phase !== this.currentPhase) {
      this.transition(step.phase);
    }
  }

  private transition(to: SessionPhase): void {
    const from = this.currentPhase;
    this.currentPhase = to;
    this.onPhaseChange?.({ from, to, tick: this.ticks });
  }
}
