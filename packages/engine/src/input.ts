/** Held-key state for one tick. The engine never sees raw device events. */
export interface InputSnapshot {
  readonly left: boolean;
  readonly right: boolean;
  readonly run: boolean;
  readonly jump: boolean;
}

export const IDLE_INPUT: InputSnapshot = Object.freeze({
  left: false,
  right: false,
  run: false,
  jump: false,
});

export function toInputSnapshot(partial: Partial<InputSnapshot> = {}): InputSnapshot {
  return {
    left: Boolean(partial.left),
    right: Boolean(partial.right),
    run: Boolean(partial.run),
    jump: Boolean(partial.jump),
  };
}

/** -1 for left only, 1 for right only, 0 for neither or both. */
export function horizontalIntent(input: InputSnapshot): -1 | 0 | 1 {
  if (input.left && !input.right) {
    return -1;
  }
  if (input.right && !input.left) {
    return 1;
  }
  return 0;
}
