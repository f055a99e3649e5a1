import { StaticWorld } from '@tilestep/engine';
import { resolveTuning, type BlockT } from '@tilestep/level-spec';

/** 800px wide flat level whose goal sits 50px right of the spawn. */
export function nearGoalWorld(): StaticWorld {
  const blocks: BlockT[] = [];
  for (let x = 0; x < 800; x += 40) {
    blocks.push({ kind: 'ground', x, y: 560, w: 40, h: 40 });
  }
  return StaticWorld.fromLevel({
    id: 'near-goal',
    number: 1,
    seed: 'test',
    width: 800,
    height: 600,
    tileSize: 40,
    spawn: { x: 50, y: 528 },
    blocks,
    goal: { x: 100, y: 400, w: 20, h: 160 },
  });
}

export const TUNING_50HZ = resolveTuning({ tickRate: 50 });
