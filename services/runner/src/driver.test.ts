import { SimulationSession, toInputSnapshot } from '@tilestep/engine';
import { describe, expect, it } from 'vitest';

import { TUNING_50HZ, nearGoalWorld } from './__fixtures__/worlds';
import { runRealtime, type FrameReport } from './driver';

const RIGHT = toInputSnapshot({ right: true });

function fakeClock() {
  let time = 0;
  return {
    now: () => time,
    sleep: async (ms: number) => {
      time += ms;
    },
  };
}

describe('runRealtime', () => {
  it('turns frame intervals into fixed ticks until the level is cleared', async () => {
    const session = new SimulationSession(nearGoalWorld(), { tuning: TUNING_50HZ });
    const reports: FrameReport[] = [];

    const result = await runRealtime(session, {
      frameIntervalMs: 20,
      input: () => RIGHT,
      onFrame: (report) => reports.push(report),
      ...fakeClock(),
    });

    expect(result).toEqual({ outcome: 'cleared', frames: 176, ticks: 176 });
    expect(reports.every((report) => report.ticks === 1 && report.elapsedMs === 20)).toBe(true);
    expect(reports[reports.length - 1].phase).toBe('cleared');
  });

  it('drains several ticks from a long frame', async () => {
    const session = new SimulationSession(nearGoalWorld(), { tuning: TUNING_50HZ, maxTicksPerFrame: 3 });
    const reports: FrameReport[] = [];

    await runRealtime(session, {
      frameIntervalMs: 50,
      input: () => RIGHT,
      maxTicks: 4,
      onFrame: (report) => reports.push(report),
      ...fakeClock(),
    });

    expect(reports.map((report) => report.ticks)).toEqual([2, 3]);
  });

  it('aborts between frames while running', async () => {
    const session = new SimulationSession(nearGoalWorld(), { tuning: TUNING_50HZ });
    const controller = new AbortController();

    const result = await runRealtime(session, {
      frameIntervalMs: 20,
      input: () => RIGHT,
      signal: controller.signal,
      onFrame: (report) => {
        if (report.frame === 2) controller.abort();
      },
      ...fakeClock(),
    });

    expect(result).toEqual({ outcome: 'aborted', frames: 3, ticks: 3 });
  });

  it('finishes the clear sequence even when asked to abort', async () => {
    const session = new SimulationSession(nearGoalWorld(), { tuning: TUNING_50HZ });
    const controller = new AbortController();

    const result = await runRealtime(session, {
      frameIntervalMs: 20,
      input: () => RIGHT,
      signal: controller.signal,
      onFrame: (report) => {
        if (report.phase !== 'running') controller.abort();
      },
      ...fakeClock(),
    });

    expect(result.outcome).toBe('cleared');
    expect(session.isAborted()).toBe(false);
  });

  it('stops at the tick limit', async () => {
    const session = new SimulationSession(nearGoalWorld(), { tuning: TUNING_50HZ });
    const result = await runRealtime(session, {
      frameIntervalMs: 20,
      input: () => RIGHT,
      maxTicks: 5,
      ...fakeClock(),
    });
    expect(result).toEqual({ outcome: 'timeout', frames: 5, ticks: 5 });
  });
});
