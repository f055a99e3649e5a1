import { describe, expect, it } from 'vitest';

import { DEFAULT_TUNING, resolveTuning, tickDurationMs } from './physics';

describe('physics tuning', () => {
  it('provides the classic platformer constants by default', () => {
    expect(DEFAULT_TUNING).toEqual({
      tickRate: 60,
      gravity: 0.55,
      jumpVelocity: -11.5,
      walkAccel: 0.4,
      runAccel: 0.6,
      friction: 0.2,
      maxWalkSpeed: 4,
      maxRunSpeed: 6,
      terminalFallSpeed: 12,
      queryMargin: 2,
      bodyWidth: 32,
      bodyHeight: 32,
      clearDescentSpeed: 4,
      clearWalkSpeed: 2,
      clearCompletionOffset: 400,
    });
  });

  it('merges overrides over the defaults', () => {
    const tuning = resolveTuning({ gravity: 1, maxRunSpeed: 8 });
    expect(tuning.gravity).toBe(1);
    expect(tuning.maxRunSpeed).toBe(8);
    expect(tuning.walkAccel).toBe(0.4);
  });

  it('rejects non-physical values', () => {
    expect(() => resolveTuning({ gravity: 0 })).toThrow();
    expect(() => resolveTuning({ jumpVelocity: 5 })).toThrow();
    expect(() => resolveTuning({ tickRate: Number.NaN })).toThrow();
  });

  it('derives the tick duration from the tick rate', () => {
    expect(tickDurationMs({ tickRate: 50 })).toBe(20);
    expect(tickDurationMs(DEFAULT_TUNING)).toBeCloseTo(16.6667, 4);
  });
});
