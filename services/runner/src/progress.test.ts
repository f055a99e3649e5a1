import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, describe, expect, it } from 'vitest';

import { LevelLockedError, ProgressStore, assertUnlocked } from './progress';

const tempDirs: string[] = [];

function tempFile(name: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tilestep-progress-'));
  tempDirs.push(dir);
  return path.join(dir, 'nested', name);
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('ProgressStore', () => {
  it('starts a fresh campaign when no file exists', async () => {
    const store = new ProgressStore(tempFile('progress.json'));
    await expect(store.load()).resolves.toEqual({ unlocked: 1 });
  });

  it('round-trips saved progress', async () => {
    const filePath = tempFile('progress.json');
    const store = new ProgressStore(filePath);
    await store.save({ unlocked: 4 });

    expect(fs.readFileSync(filePath, 'utf8')).toBe('{\n  "unlocked": 4\n}\n');
    await expect(store.load()).resolves.toEqual({ unlocked: 4 });
  });

  it('rejects out-of-range progress files', async () => {
    const filePath = tempFile('progress.json');
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, '{"unlocked":0}');
    await expect(new ProgressStore(filePath).load()).rejects.toThrow();
  });
});

describe('assertUnlocked', () => {
  it('passes unlocked levels and names the limit for locked ones', () => {
    expect(() => assertUnlocked({ unlocked: 2 }, 2)).not.toThrow();
    expect(() => assertUnlocked({ unlocked: 2 }, 3)).toThrow(LevelLockedError);
    expect(() => assertUnlocked({ unlocked: 2 }, 3)).toThrow('Level 3 is locked; levels 1-2 are available');
  });
});
