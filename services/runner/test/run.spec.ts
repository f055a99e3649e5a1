import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, describe, expect, it } from 'vitest';

import { loadConfig, type RunnerConfig } from '../src/config';
import { LevelLockedError, ProgressStore } from '../src/progress';
import { runSession } from '../src/run';

const tempDirs: string[] = [];

function configFor(overrides: NodeJS.ProcessEnv): RunnerConfig {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tilestep-run-'));
  tempDirs.push(dir);
  return loadConfig({ PROGRESS_PATH: path.join(dir, 'progress.json'), ...overrides });
}

function fakeClock() {
  let time = 0;
  return {
    now: () => time,
    sleep: async (ms: number) => {
      time += ms;
    },
  };
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('runSession', () => {
  it('replays the first level and unlocks the next one', async () => {
    const config = configFor({});
    const summary = await runSession(config);

    expect(summary.outcome).toBe('cleared');
    expect(summary.levelNumber).toBe(1);
    expect(summary.unlocked).toBe(2);
    expect(summary.sessionId).toMatch(/^[0-9a-f-]{36}$/);
    await expect(new ProgressStore(config.progressPath).load()).resolves.toEqual({ unlocked: 2 });
  });

  it('produces the same fingerprint for the same level and script', async () => {
    const first = await runSession(configFor({ LEVEL_SEED: 'fixed' }));
    const second = await runSession(configFor({ LEVEL_SEED: 'fixed' }));

    expect(second.fingerprint).toBe(first.fingerprint);
    expect(second.ticks).toBe(first.ticks);
  });

  it('refuses locked levels', async () => {
    await expect(runSession(configFor({ LEVEL_NUMBER: '3' }))).rejects.toBeInstanceOf(LevelLockedError);
  });

  it('keeps progress when the tick budget runs out', async () => {
    const config = configFor({ MAX_TICKS: '30' });
    const summary = await runSession(config);

    expect(summary).toMatchObject({ outcome: 'timeout', ticks: 30, unlocked: 1 });
    expect(fs.existsSync(config.progressPath)).toBe(false);
  });

  it('drives a script against the clock in realtime mode', async () => {
    const script = fileURLToPath(new URL('../scripts/run-and-hop.json', import.meta.url));
    const config = configFor({
      RUN_MODE: 'realtime',
      TICK_RATE: '50',
      FRAME_INTERVAL_MS: '20',
      INPUT_SCRIPT: script,
    });

    const summary = await runSession(config, fakeClock());

    expect(summary.mode).toBe('realtime');
    expect(summary.outcome).toBe('cleared');
    expect(summary.unlocked).toBe(2);
  });
});
