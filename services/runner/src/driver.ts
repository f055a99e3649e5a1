import { performance } from 'node:perf_hooks';
import { setTimeout as delay } from 'node:timers/promises';

import type { InputSnapshot, SessionPhase, SimulationSession } from '@tilestep/engine';

import type { RunOutcome } from './outcome';

export interface FrameReport {
  frame: number;
  elapsedMs: number;
  ticks: number;
  phase: SessionPhase;
}

export interface RealtimeOptions {
  frameIntervalMs: number;
  /** Held keys for the frame starting at `tick`; reused for every tick of that frame. */
  input: (tick: number) => InputSnapshot;
  maxTicks?: number;
  signal?: AbortSignal;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  onFrame?: (report: FrameReport) => void;
}

export interface RealtimeResult {
  outcome: RunOutcome;
  frames: number;
  ticks: number;
}

const defaultSleep = async (ms: number): Promise<void> => {
  await delay(ms);
};

/**
 * Drive a session against the wall clock: sleep, measure the elapsed time,
 * hand it to the session's scheduler, repeat. Abort requests are checked
 * between frames and are refused while the clear sequence plays.
 */
export async function runRealtime(
  session: SimulationSession,
  options: RealtimeOptions,
): Promise<RealtimeResult> {
  const now = options.now ?? (() => performance.now());
  const sleep = options.sleep ?? defaultSleep;
  const maxTicks = options.maxTicks ?? Number.POSITIVE_INFINITY;

  let frames = 0;
  let last = now();

  while (!session.isFinished() && session.tick < maxTicks) {
    if (options.signal?.aborted && session.requestAbort()) {
      break;
    }

    await sleep(options.frameIntervalMs);
    const current = now();
    const elapsedMs = Math.max(0, current - last);
    last = current;

    const ticks = session.frame(elapsedMs, options.input(session.tick));
    options.onFrame?.({ frame: frames, elapsedMs, ticks, phase: session.phase });
    frames += 1;
  }

  return {
    outcome: session.isComplete() ? 'cleared' : session.isAborted() ? 'aborted' : 'timeout',
    frames,
    ticks: session.tick,
  };
}
