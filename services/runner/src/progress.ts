import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import {
  CampaignProgress,
  createProgress,
  isUnlocked,
  type CampaignProgressT,
} from '@tilestep/level-spec';

export class LevelLockedError extends Error {
  constructor(
    public readonly levelNumber: number,
    public readonly unlocked: number,
  ) {
    super(`Level ${levelNumber} is locked; levels 1-${unlocked} are available`);
    this.name = 'LevelLockedError';
  }
}

export function assertUnlocked(progress: CampaignProgressT, levelNumber: number): void {
  if (!isUnlocked(progress, levelNumber)) {
    throw new LevelLockedError(levelNumber, progress.unlocked);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Campaign progress persisted as a small JSON document. */
export class ProgressStore {
  constructor(readonly filePath: string) {}

  async load(): Promise<CampaignProgressT> {
    let contents: string;
    try {
      contents = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return createProgress();
      }
      throw error;
    }
    return CampaignProgress.parse(JSON.parse(contents));
  }

  async save(progress: CampaignProgressT): Promise<void> {
    const validated = CampaignProgress.parse(progress);
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${JSON.stringify(validated, null, 2)}\n`, 'utf8');
  }
}
