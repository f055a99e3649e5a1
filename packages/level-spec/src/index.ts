import { z } from 'zod';

export const RectSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  w: z.number().finite().gt(0),
  h: z.number().finite().gt(0),
});

const Point = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
});

export const BLOCK_KINDS = ['ground', 'brick'] as const;

const Block = RectSchema.extend({
  kind: z.enum(BLOCK_KINDS),
});

export const Level = z.object({
  id: z.string(),
  number: z.number().int().gt(0),
  seed: z.string(),
  width: z.number().finite().gt(0),
  height: z.number().finite().gt(0),
  tileSize: z.number().finite().gt(0),
  spawn: Point,
  blocks: z.array(Block),
  goal: RectSchema,
});

export type RectT = z.infer<typeof RectSchema>;
export type BlockKind = (typeof BLOCK_KINDS)[number];
export type BlockT = z.infer<typeof Block>;
export type LevelT = z.infer<typeof Level>;

export * from './physics';
export * from './layout';
export * from './progression';
