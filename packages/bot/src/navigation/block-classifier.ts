import mcData from 'minecraft-data';
import type { BlockCategory } from '@minenav/shared';

/**
 * Maps a stored cell value (a block id, or undefined when unobserved) to a coarse category
 */
export interface BlockClassifier {
  classify(value: number | undefined): BlockCategory;
  /** Value recorded for a cell the agent has just moved through */
  readonly airValue: number;
}

export interface BlockTable {
  air: number[];
  bedrock?: number[];
  liquid?: number[];
  /** Category given to unobserved cells; mining underground, assume rock */
  unknownAs?: BlockCategory;
}

export class TableClassifier implements BlockClassifier {
  readonly airValue: number;
  private readonly categories = new Map<number, BlockCategory>();
  private readonly unknownAs: BlockCategory;

  constructor(table: BlockTable) {
    if (table.air.length === 0) {
      throw new Error('Block table needs at least one air id');
    }
    this.airValue = table.air[0];
    this.unknownAs = table.unknownAs ?? 'solid';
    for (const id of table.bedrock ?? []) this.categories.set(id, 'bedrock');
    for (const id of table.liquid ?? []) this.categories.set(id, 'liquid');
    for (const id of table.air) this.categories.set(id, 'air');
  }

  classify(value: number | undefined): BlockCategory {
    if (value === undefined) return this.unknownAs;
    return this.categories.get(value) ?? 'solid';
  }
}

const AIR_BLOCKS = ['air', 'cave_air', 'void_air'];
const LIQUID_BLOCKS = ['water', 'lava', 'flowing_water', 'flowing_lava'];

/**
 * Classifier keyed by the block ids of a Minecraft version
 */
export function createMinecraftClassifier(version: string, unknownAs: BlockCategory = 'solid'): BlockClassifier {
  const data = mcData(version);
  if (!data) {
    throw new Error(`Unsupported Minecraft version: ${version}`);
  }

  const idsOf = (names: string[]): number[] =>
    names.flatMap((name) => {
      const block = data.blocksByName[name];
      return block === undefined ? [] : [block.id];
    });

  return new TableClassifier({
    air: idsOf(AIR_BLOCKS),
    bedrock: idsOf(['bedrock']),
    liquid: idsOf(LIQUID_BLOCKS),
    unknownAs,
  });
}
