import {
  SimulationSession,
  type PhaseChange,
  type SessionOptions,
  type SessionSnapshot,
  type StaticWorld,
} from '@tilestep/engine';

import { fingerprint } from './fingerprint';
import type { RunOutcome } from './outcome';
import { InputTimeline, type InputCommandT } from './script';

export interface ReplayOptions {
  maxTicks: number;
  session?: SessionOptions;
  signal?: AbortSignal;
}

export interface ReplayResult {
  outcome: RunOutcome;
  ticks: number;
  transitions: PhaseChange[];
  snapshot: SessionSnapshot;
  fingerprint: string;
}

/**
 * Run a scripted session tick by tick, without wall-clock pacing. The same
 * world, script and tuning always produce the same fingerprint.
 */
export function replay(
  world: StaticWorld,
  commands: readonly InputCommandT[],
  options: ReplayOptions,
): ReplayResult {
  const transitions: PhaseChange[] = [];
  const forward = options.session?.onPhaseChange;
  const session = new SimulationSession(world, {
    ...options.session,
    onPhaseChange: (change) => {
      transitions.push(change);
      forward?.(change);
    },
  });
  const timeline = new InputTimeline(commands);

  while (!session.isFinished() && session.tick < options.maxTicks) {
    if (options.signal?.aborted && session.requestAbort()) {
      break;
    }
    session.stepOnce(timeline.inputAt(session.tick));
  }

  const snapshot = session.snapshot();
  return {
    outcome: session.isComplete() ? 'cleared' : session.isAborted() ? 'aborted' : 'timeout',
    ticks: session.tick,
    transitions,
    snapshot,
    fingerprint: fingerprint(snapshot),
  };
}
