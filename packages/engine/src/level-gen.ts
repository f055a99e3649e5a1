import {
  DEFAULT_LAYOUT,
  Level,
  type BlockT,
  type LayoutRulesT,
  type LevelPlan,
  type LevelT,
} from '@tilestep/level-spec';
import seedrandom from 'seedrandom';

import { PreconditionError } from './errors';

type Rng = () => number;

function randomInt(rng: Rng, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

function pick<T>(rng: Rng, values: readonly T[]): T {
  const index = Math.min(values.length - 1, Math.floor(rng() * values.length));
  return values[index];
}

function groundRow(width: number, rules: LayoutRulesT): BlockT[] {
  const groundY = rules.height - rules.tileSize;
  const tiles: BlockT[] = [];
  for (let x = 0; x < width; x += rules.tileSize) {
    tiles.push({ kind: 'ground', x, y: groundY, w: rules.tileSize, h: rules.tileSize });
  }
  return tiles;
}

function platforms(rng: Rng, width: number, rules: LayoutRulesT): BlockT[] {
  if (rules.platformCount === 0) {
    return [];
  }
  const minX = rules.interiorMargin;
  const maxX = Math.min(width - rules.interiorMargin, width - rules.tileSize);
  if (maxX < minX) {
    throw new PreconditionError(
      `width ${width} leaves no room for platforms between margins of ${rules.interiorMargin}`,
      'width',
    );
  }
  const bands = rules.elevationOffsets.map((offset) => rules.height - offset);
  const tiles: BlockT[] = [];
  for (let i = 0; i < rules.platformCount; i += 1) {
    const x = randomInt(rng, minX, maxX);
    const y = pick(rng, bands);
    tiles.push({ kind: 'brick', x, y, w: rules.tileSize, h: rules.tileSize });
  }
  return tiles;
}

/**
 * Lay out a level: a contiguous ground row followed by single-tile
 * platforms. Placement is driven by `seedrandom(seed|levelNumber)`, so a
 * plan always yields the same level.
 */
export function generateLevel(plan: LevelPlan, rules: LayoutRulesT = DEFAULT_LAYOUT): LevelT {
  const rng = seedrandom(`${plan.seed}|${plan.levelNumber}`);
  const blocks = [...groundRow(plan.width, rules), ...platforms(rng, plan.width, rules)];

  return Level.parse({
    id: `level-${plan.levelNumber}`,
    number: plan.levelNumber,
    seed: plan.seed,
    width: plan.width,
    height: rules.height,
    tileSize: rules.tileSize,
    spawn: { x: rules.spawn.x, y: rules.height - rules.spawn.offsetFromBottom },
    blocks,
    goal: {
      x: plan.width - rules.goal.offsetFromEnd,
      y: rules.height - rules.goal.offsetFromBottom,
      w: rules.goal.w,
      h: rules.goal.h,
    },
  });
}
