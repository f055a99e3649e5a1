import {
  SimulationSession,
  StaticWorld,
  type PhaseChange,
  type SessionOptions,
} from '@tilestep/engine';
import { recordClear, resolveTuning } from '@tilestep/level-spec';
import { v4 as uuidv4 } from 'uuid';

import type { RunnerConfig } from './config';
import { runRealtime, type RealtimeOptions } from './driver';
import { fingerprint } from './fingerprint';
import { logger } from './logger';
import { recordFrame, recordSession } from './metrics';
import type { RunOutcome } from './outcome';
import { ProgressStore, assertUnlocked } from './progress';
import { replay } from './replay';
import { DEFAULT_SCRIPT, InputTimeline, loadScript, type InputCommandT } from './script';

export interface RunDependencies {
  signal?: AbortSignal;
  store?: ProgressStore;
  now?: RealtimeOptions['now'];
  sleep?: RealtimeOptions['sleep'];
}

export interface RunSummary {
  sessionId: string;
  levelNumber: number;
  mode: RunnerConfig['mode'];
  outcome: RunOutcome;
  ticks: number;
  fingerprint: string;
  unlocked: number;
}

async function resolveScript(config: RunnerConfig): Promise<readonly InputCommandT[]> {
  if (!config.inputScript) {
    return DEFAULT_SCRIPT;
  }
  return loadScript(config.inputScript);
}

/**
 * Play one campaign level end to end: check it is unlocked, build its world,
 * run the input script (replayed or paced against the clock) and persist the
 * unlock when the level is cleared.
 */
export async function runSession(
  config: RunnerConfig,
  deps: RunDependencies = {},
): Promise<RunSummary> {
  const sessionId = uuidv4();
  const log = logger.child({ sessionId, level: config.level.number, mode: config.mode });
  const store = deps.store ?? new ProgressStore(config.progressPath);

  let progress = await store.load();
  assertUnlocked(progress, config.level.number);

  const tuning = resolveTuning({ tickRate: config.tickRate });
  const world = StaticWorld.build(config.level.number, config.level.width, {
    seed: config.level.seed ?? undefined,
    tuning,
  });
  const commands = await resolveScript(config);

  const sessionOptions: SessionOptions = {
    tuning,
    maxFrameMs: config.realtime.maxFrameMs,
    maxTicksPerFrame: config.realtime.maxTicksPerFrame,
    onPhaseChange: (change: PhaseChange) => log.info(change, 'Phase changed'),
  };

  log.info(
    { world: world.id, blocks: world.blocks.length, commands: commands.length, tickRate: tuning.tickRate },
    'Session starting',
  );

  let outcome: RunOutcome;
  let ticks: number;
  let digest: string;

  if (config.mode === 'replay') {
    const result = replay(world, commands, {
      maxTicks: config.maxTicks,
      session: sessionOptions,
      signal: deps.signal,
    });
    outcome = result.outcome;
    ticks = result.ticks;
    digest = result.fingerprint;
  } else {
    const session = new SimulationSession(world, sessionOptions);
    const timeline = new InputTimeline(commands);
    const result = await runRealtime(session, {
      frameIntervalMs: config.realtime.frameIntervalMs,
      input: (tick) => timeline.inputAt(tick),
      maxTicks: config.maxTicks,
      signal: deps.signal,
      now: deps.now,
      sleep: deps.sleep,
      onFrame: (report) => recordFrame(report.ticks),
    });
    outcome = result.outcome;
    ticks = result.ticks;
    digest = fingerprint(session.snapshot());
  }

  recordSession(outcome, ticks);

  if (outcome === 'cleared') {
    progress = recordClear(progress);
    await store.save(progress);
  }

  const summary: RunSummary = {
    sessionId,
    levelNumber: config.level.number,
    mode: config.mode,
    outcome,
    ticks,
    fingerprint: digest,
    unlocked: progress.unlocked,
  };
  log.info(summary, 'Session finished');
  return summary;
}
