import { readFile } from 'node:fs/promises';

import { IDLE_INPUT, type InputSnapshot } from '@tilestep/engine';
import { z } from 'zod';

const INPUT_KEYS = ['left', 'right', 'run', 'jump'] as const;

export const InputCommand = z.object({
  t: z.number().int().min(0),
  left: z.boolean().optional(),
  right: z.boolean().optional(),
  run: z.boolean().optional(),
  jump: z.boolean().optional(),
});

export type InputCommandT = z.infer<typeof InputCommand>;

const InputScript = z.union([
  z.array(InputCommand),
  z.object({ commands: z.array(InputCommand) }).transform((script) => script.commands),
]);

/** Hold right from the first tick. */
export const DEFAULT_SCRIPT: readonly InputCommandT[] = [{ t: 0, right: true }];

export function applyCommand(previous: InputSnapshot, command: InputCommandT): InputSnapshot {
  return {
    left: command.left ?? previous.left,
    right: command.right ?? previous.right,
    run: command.run ?? previous.run,
    jump: command.jump ?? previous.jump,
  };
}

/** Fold commands sharing a tick together (later ones win) and sort by tick. */
export function mergeCommands(commands: readonly InputCommandT[]): InputCommandT[] {
  const byTick = new Map<number, InputCommandT>();
  for (const command of commands) {
    const merged: InputCommandT = { ...(byTick.get(command.t) ?? { t: command.t }) };
    for (const key of INPUT_KEYS) {
      const value = command[key];
      if (value !== undefined) {
        merged[key] = value;
      }
    }
    byTick.set(command.t, merged);
  }
  return Array.from(byTick.values()).sort((a, b) => a.t - b.t);
}

export function parseScript(raw: unknown): InputCommandT[] {
  return mergeCommands(InputScript.parse(raw));
}

export async function loadScript(filePath: string): Promise<InputCommandT[]> {
  const contents = await readFile(filePath, 'utf8');
  return parseScript(JSON.parse(contents));
}

/**
 * Forward-only cursor over a script: each key keeps its state until a later
 * command changes it.
 */
export class InputTimeline {
  private readonly commands: InputCommandT[];
  private index = 0;
  private lastTick = -1;
  private state: InputSnapshot = IDLE_INPUT;

  constructor(commands: readonly InputCommandT[]) {
    this.commands = mergeCommands(commands);
  }

  get length(): number {
    return this.commands.length;
  }

  inputAt(tick: number): InputSnapshot {
    if (tick < this.lastTick) {
      throw new RangeError(`Input timeline cannot rewind from tick ${this.lastTick} to ${tick}`);
    }
    let next = this.commands[this.index];
    while (next && next.t <= tick) {
      this.state = applyCommand(this.state, next);
      this.index += 1;
      next = this.commands[this.index];
    }
    this.lastTick = tick;
    return this.state;
  }
}
