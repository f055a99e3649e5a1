import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

import type { RunOutcome } from './outcome';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const sessionsTotal = new Counter({
  name: 'sessions_total',
  help: 'Total number of finished sessions',
  labelNames: ['outcome'],
  registers: [registry],
});

export const ticksTotal = new Counter({
  name: 'ticks_total',
  help: 'Total number of simulation ticks run',
  registers: [registry],
});

export const framesTotal = new Counter({
  name: 'frames_total',
  help: 'Total number of real-time frames driven',
  registers: [registry],
});

export const ticksPerFrame = new Histogram({
  name: 'ticks_per_frame',
  help: 'Fixed ticks drained per real-time frame',
  buckets: [0, 1, 2, 3, 4, 5, 8],
  registers: [registry],
});

export function recordFrame(ticks: number): void {
  framesTotal.inc();
  ticksPerFrame.observe(ticks);
}

export function recordSession(outcome: RunOutcome, ticks: number): void {
  sessionsTotal.labels(outcome).inc();
  ticksTotal.inc(ticks);
}
