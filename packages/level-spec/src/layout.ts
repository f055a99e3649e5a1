import { z } from 'zod';

/**
 * Rules for procedural level layout. Offsets are measured from the bottom
 * (`height`) or the far edge (`width`) of the level so the same rules scale
 * to any level size.
 */
export const LayoutRules = z.object({
  height: z.number().int().gt(0).default(600),
  tileSize: z.number().int().gt(0).default(40),
  viewportWidth: z.number().int().gt(0).default(800),
  platformCount: z.number().int().min(0).default(20),
  interiorMargin: z.number().int().min(0).default(200),
  elevationOffsets: z.array(z.number().int().gt(0)).min(1).default([200, 300]),
  goal: z
    .object({
      offsetFromEnd: z.number().int().gt(0).default(500),
      offsetFromBottom: z.number().int().gt(0).default(200),
      w: z.number().int().gt(0).default(20),
      h: z.number().int().gt(0).default(160),
    })
    .default({}),
  spawn: z
    .object({
      x: z.number().int().default(50),
      offsetFromBottom: z.number().int().gt(0).default(100),
    })
    .default({}),
});

export type LayoutRulesT = z.infer<typeof LayoutRules>;
export type LayoutRulesInput = z.input<typeof LayoutRules>;

export const DEFAULT_LAYOUT: LayoutRulesT = LayoutRules.parse({});

export function resolveLayout(overrides: LayoutRulesInput = {}): LayoutRulesT {
  return LayoutRules.parse(overrides);
}
