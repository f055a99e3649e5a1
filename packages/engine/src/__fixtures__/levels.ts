import type { BlockT, LevelT, RectT } from '@tilestep/level-spec';

export function groundRow(width: number, y = 560, tile = 40): BlockT[] {
  const blocks: BlockT[] = [];
  for (let x = 0; x < width; x += tile) {
    blocks.push({ kind: 'ground', x, y, w: tile, h: tile });
  }
  return blocks;
}

/** 600px tall level with a contiguous ground row at y=560. */
export function flatLevel(
  options: { width?: number; extra?: BlockT[]; goal?: RectT; spawn?: { x: number; y: number } } = {},
): LevelT {
  const width = options.width ?? 800;
  return {
    id: 'flat',
    number: 1,
    seed: 'test',
    width,
    height: 600,
    tileSize: 40,
    spawn: options.spawn ?? { x: 50, y: 528 },
    blocks: [...groundRow(width), ...(options.extra ?? [])],
    goal: options.goal ?? { x: width - 20, y: 400, w: 20, h: 160 },
  };
}
