import 'dotenv/config';

import { CAMPAIGN_LEVEL_COUNT, DEFAULT_LEVEL_WIDTH } from '@tilestep/level-spec';
import { z } from 'zod';

const DEFAULT_PROGRESS_PATH = './data/progress.json';

const EnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  RUN_MODE: z.string().optional(),
  LEVEL_NUMBER: z.string().optional(),
  LEVEL_SEED: z.string().optional(),
  LEVEL_WIDTH: z.string().optional(),
  TICK_RATE: z.string().optional(),
  MAX_TICKS: z.string().optional(),
  FRAME_INTERVAL_MS: z.string().optional(),
  MAX_FRAME_MS: z.string().optional(),
  MAX_TICKS_PER_FRAME: z.string().optional(),
  INPUT_SCRIPT: z.string().optional(),
  PROGRESS_PATH: z.string().optional(),
  METRICS_PORT: z.string().optional(),
});

export type RunMode = 'replay' | 'realtime';

export interface RunnerConfig {
  nodeEnv: string;
  mode: RunMode;
  level: {
    number: number;
    seed: string | null;
    width: number;
  };
  tickRate: number;
  maxTicks: number;
  realtime: {
    frameIntervalMs: number;
    maxFrameMs: number;
    maxTicksPerFrame: number;
  };
  inputScript: string | null;
  progressPath: string;
  metricsPort: number | null;
}

function parsePositiveInteger(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parsePositiveNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseOptionalString(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : null;
}

function parsePort(value: string | undefined): number | null {
  if (!value) {
    return null;
  }
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > 65535) {
    return null;
  }
  return parsed;
}

function parseMode(value: string | undefined): RunMode {
  return value?.trim().toLowerCase() === 'realtime' ? 'realtime' : 'replay';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const parsed = EnvSchema.parse(env);

  const levelNumber = Math.min(
    parsePositiveInteger(parsed.LEVEL_NUMBER, 1),
    CAMPAIGN_LEVEL_COUNT,
  );

  return {
    nodeEnv: parsed.NODE_ENV ?? 'development',
    mode: parseMode(parsed.RUN_MODE),
    level: {
      number: levelNumber,
      seed: parseOptionalString(parsed.LEVEL_SEED),
      width: parsePositiveInteger(parsed.LEVEL_WIDTH, DEFAULT_LEVEL_WIDTH),
    },
    tickRate: parsePositiveNumber(parsed.TICK_RATE, 60),
    maxTicks: parsePositiveInteger(parsed.MAX_TICKS, 3600),
    realtime: {
      frameIntervalMs: parsePositiveNumber(parsed.FRAME_INTERVAL_MS, 16),
      maxFrameMs: parsePositiveNumber(parsed.MAX_FRAME_MS, 250),
      maxTicksPerFrame: parsePositiveInteger(parsed.MAX_TICKS_PER_FRAME, 5),
    },
    inputScript: parseOptionalString(parsed.INPUT_SCRIPT),
    progressPath: parseOptionalString(parsed.PROGRESS_PATH) ?? DEFAULT_PROGRESS_PATH,
    metricsPort: parsePort(parsed.METRICS_PORT),
  };
}
