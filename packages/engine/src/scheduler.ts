import { tickDurationMs } from '@tilestep/level-spec';

import { PreconditionError, assertFinite, assertPositive } from './errors';

export interface SchedulerOptions {
  tickRate: number;
  /** Upper bound on the elapsed time credited for one frame. */
  maxFrameMs?: number;
  /** Upper bound on ticks drained per frame; the backlog beyond one tick is dropped. */
  maxTicksPerFrame?: number;
}

/**
 * Called once per drained tick with the zero-based tick index. Returning
 * `false` stops draining for this frame.
 */
export type TickCallback = (tick: number) => boolean | void;

/**
 * Fixed-timestep accumulator. Wall-clock time goes in per rendered frame;
 * whole ticks of `1000 / tickRate` ms come out, so the simulation advances
 * in identical quanta regardless of frame pacing.
 */
export class FixedStepScheduler {
  readonly tickMs: number;
  private readonly maxFrameMs: number;
  private readonly maxTicksPerFrame: number;
  private accumulatorMs = 0;
  private ticks = 0;

  constructor(options: SchedulerOptions) {
    assertPositive(options.tickRate, 'tickRate');
    this.tickMs = tickDurationMs(options);
    this.maxFrameMs = options.maxFrameMs ?? Number.POSITIVE_INFINITY;
    this.maxTicksPerFrame = options.maxTicksPerFrame ?? Number.POSITIVE_INFINITY;
    if (!(this.maxFrameMs > 0)) {
      throw new PreconditionError('maxFrameMs must be greater than zero', 'maxFrameMs');
    }
    if (!(this.maxTicksPerFrame >= 1)) {
      throw new PreconditionError('maxTicksPerFrame must be at least 1', 'maxTicksPerFrame');
    }
  }

  get pendingMs(): number {
    return this.accumulatorMs;
  }

  get totalTicks(): number {
    return this.ticks;
  }

  /** Fraction of a tick left in the accumulator, for render interpolation. */
  get alpha(): number {
    return this.accumulatorMs / this.tickMs;
  }

  /**
   * Credit `elapsedMs` of wall-clock time and run every whole tick it pays
   * for. Returns the number of ticks run.
   */
  advance(elapsedMs: number, onTick: TickCallback): number {
    assertFinite(elapsedMs, 'elapsedMs');
    if (elapsedMs < 0) {
      throw new PreconditionError(`elapsedMs must not be negative, got ${elapsedMs}`, 'elapsedMs');
    }

    this.accumulatorMs += Math.min(elapsedMs, this.maxFrameMs);

    let ran = 0;
    while (this.accumulatorMs >= this.tickMs && ran < this.maxTicksPerFrame) {
      const tick = this.ticks;
      this.accumulatorMs -= this.tickMs;
      this.ticks += 1;
      ran += 1;
      if (onTick(tick) === false) {
        return ran;
      }
    }

    if (ran >= this.maxTicksPerFrame && this.accumulatorMs > this.tickMs) {
      this.accumulatorMs = this.tickMs;
    }

    return ran;
  }

  reset(): void {
    this.accumulatorMs = 0;
    this.ticks = 0;
  }
}
