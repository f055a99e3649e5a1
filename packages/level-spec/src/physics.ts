import { z } from 'zod';

const positive = () => z.number().finite().gt(0);

/**
 * Per-tick physics constants. Velocities are in pixels per tick and
 * accelerations in pixels per tick squared, so changing `tickRate` changes
 * the wall-clock speed of the game, not its trajectories.
 */
export const PhysicsTuning = z.object({
  tickRate: positive().default(60),
  gravity: positive().default(0.55),
  jumpVelocity: z.number().finite().lt(0).default(-11.5),
  walkAccel: positive().default(0.4),
  runAccel: positive().default(0.6),
  friction: positive().default(0.2),
  maxWalkSpeed: positive().default(4),
  maxRunSpeed: positive().default(6),
  terminalFallSpeed: positive().default(12),
  queryMargin: z.number().finite().min(0).default(2),
  bodyWidth: positive().default(32),
  bodyHeight: positive().default(32),
  clearDescentSpeed: positive().default(4),
  clearWalkSpeed: positive().default(2),
  clearCompletionOffset: z.number().finite().min(0).default(400),
});

export type PhysicsTuningT = z.infer<typeof PhysicsTuning>;
export type PhysicsTuningInput = z.input<typeof PhysicsTuning>;

export const DEFAULT_TUNING: PhysicsTuningT = PhysicsTuning.parse({});

export function resolveTuning(overrides: PhysicsTuningInput = {}): PhysicsTuningT {
  return PhysicsTuning.parse(overrides);
}

export function tickDurationMs(tuning: Pick<PhysicsTuningT, 'tickRate'>): number {
  return 1000 / tuning.tickRate;
}
