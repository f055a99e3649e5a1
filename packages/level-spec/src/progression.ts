import { z } from 'zod';

export const CAMPAIGN_LEVEL_COUNT = 32;
export const DEFAULT_LEVEL_WIDTH = 2000;

export type LevelPlan = {
  levelNumber: number;
  seed: string;
  width: number;
};

export const CampaignProgress = z.object({
  unlocked: z.number().int().min(1).max(CAMPAIGN_LEVEL_COUNT),
});

export type CampaignProgressT = z.infer<typeof CampaignProgress>;

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function normalizeLevel(level: number): number {
  if (!Number.isFinite(level)) {
    return 1;
  }
  return clamp(Math.round(level), 1, CAMPAIGN_LEVEL_COUNT);
}

export function getLevelPlan(level: number): LevelPlan {
  const levelNumber = normalizeLevel(level);
  return {
    levelNumber,
    seed: `level-${levelNumber}`,
    width: DEFAULT_LEVEL_WIDTH,
  };
}

export function createProgress(): CampaignProgressT {
  return { unlocked: 1 };
}

export function isUnlocked(progress: CampaignProgressT, level: number): boolean {
  return Number.isFinite(level) && level >= 1 && level <= progress.unlocked;
}

/**
 * Any clear opens the next node on the campaign map, including a replay of
 * an earlier level; the count never exceeds the campaign length.
 */
export function recordClear(progress: CampaignProgressT): CampaignProgressT {
  return { unlocked: Math.min(progress.unlocked + 1, CAMPAIGN_LEVEL_COUNT) };
}
