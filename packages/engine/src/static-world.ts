import {
  DEFAULT_LAYOUT,
  DEFAULT_TUNING,
  Level,
  getLevelPlan,
  type BlockKind,
  type LayoutRulesT,
  type PhysicsTuningT,
} from '@tilestep/level-spec';

import { generateLevel } from './level-gen';
import { inflateRect, makeRect, rectsOverlap, type Rect, type Vec2 } from './rect';
import { SpatialIndex, type RectHandle } from './spatial-index';

export interface Block {
  readonly kind: BlockKind;
  readonly rect: Readonly<Rect>;
}

export interface WorldBuildOptions {
  seed?: string;
  layout?: LayoutRulesT;
  tuning?: PhysicsTuningT;
}

export const DEFAULT_VIEW_MARGIN = 80;

/**
 * Immutable tile geometry for one level. Blocks live in an arena in
 * insertion order (the render order); the spatial index refers to them by
 * handle.
 */
export class StaticWorld {
  readonly id: string;
  readonly width: number;
  readonly height: number;
  readonly tileSize: number;
  readonly groundTop: number;
  readonly goal: Readonly<Rect>;
  readonly spawn: Readonly<Vec2>;
  private readonly arena: Block[] = [];
  private readonly index: SpatialIndex;
  private readonly queryMargin: number;

  private constructor(
    meta: { id: string; width: number; height: number; tileSize: number; goal: Rect; spawn: Vec2 },
    queryMargin: number,
  ) {
    this.id = meta.id;
    this.width = meta.width;
    this.height = meta.height;
    this.tileSize = meta.tileSize;
    this.groundTop = meta.height - meta.tileSize;
    this.goal = Object.freeze({ ...meta.goal });
    this.spawn = Object.freeze({ ...meta.spawn });
    this.index = new SpatialIndex(meta.tileSize);
    this.queryMargin = queryMargin;
  }

  static fromLevel(level: unknown, tuning: PhysicsTuningT = DEFAULT_TUNING): StaticWorld {
    const parsed = Level.parse(level);
    const world = new StaticWorld(
      {
        id: parsed.id,
        width: parsed.width,
        height: parsed.height,
        tileSize: parsed.tileSize,
        goal: parsed.goal,
        spawn: parsed.spawn,
      },
      tuning.queryMargin,
    );
    for (const block of parsed.blocks) {
      world.addBlock(block.kind, makeRect(block.x, block.y, block.w, block.h));
    }
    Object.freeze(world.arena);
    return world;
  }

  static build(levelNumber: number, width: number, options: WorldBuildOptions = {}): StaticWorld {
    const plan = getLevelPlan(levelNumber);
    const level = generateLevel(
      { ...plan, width, seed: options.seed ?? plan.seed },
      options.layout ?? DEFAULT_LAYOUT,
    );
    return StaticWorld.fromLevel(level, options.tuning);
  }

  get blocks(): readonly Block[] {
    return this.arena;
  }

  get indexedCells(): number {
    return this.index.cellCount;
  }

  block(handle: RectHandle): Block {
    const block = this.arena[handle];
    if (!block) {
      throw new RangeError(`Unknown block handle ${handle}`);
    }
    return block;
  }

  /**
   * Candidate colliders near `rect`. The query box is inflated by the query
   * margin, so results can include rectangles that do not touch `rect`;
   * callers must re-test with `rectsOverlap`.
   */
  getColliders(rect: Rect): Readonly<Rect>[] {
    return this.candidateHandles(rect).map((handle) => this.block(handle).rect);
  }

  candidateHandles(rect: Rect): RectHandle[] {
    const query = inflateRect(rect, this.queryMargin, this.queryMargin);
    return this.index.query(query);
  }

  visibleBlocks(cameraX: number, viewportWidth: number, margin = DEFAULT_VIEW_MARGIN): Block[] {
    const view: Rect = { x: cameraX - margin, y: 0, w: viewportWidth + 2 * margin, h: this.height };
    return this.arena.filter((block) => rectsOverlap(block.rect, view));
  }

  private addBlock(kind: BlockKind, rect: Rect): void {
    const handle = this.arena.length;
    this.arena.push({ kind, rect: Object.freeze(rect) });
    this.index.insert(handle, rect);
  }
}
