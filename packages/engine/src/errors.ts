export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EngineError';
  }
}

/**
 * Raised when a caller hands the engine state it cannot simulate
 * (non-finite numbers, empty rectangles, a zero cell size).
 */
export class PreconditionError extends EngineError {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = 'PreconditionError';
  }
}

export function assertFinite(value: number, field: string): void {
  if (!Number.isFinite(value)) {
    throw new PreconditionError(`${field} must be a finite number, got ${value}`, field);
  }
}

export function assertPositive(value: number, field: string): void {
  assertFinite(value, field);
  if (value <= 0) {
    throw new PreconditionError(`${field} must be greater than zero, got ${value}`, field);
  }
}
