import type { Vec3 } from 'vec3';
import { Logger } from '@minenav/shared';
import type { WorldMap } from '../navigation/world-map.js';

const logger = new Logger('WorldScanner');

/**
 * The parts of a mineflayer bot a scan reads
 */
export interface BlockSource {
  entity: { position: Vec3 };
  blockAt(point: Vec3): { type: number } | null;
}

export interface ScanResult {
  observed: number;
  /** One position per chunk touched, for saving */
  chunks: Vec3[];
}

/**
 * Record every loaded block in a cube of `radius` around the bot into the map
 */
export function scanAround(bot: BlockSource, map: WorldMap, radius: number): ScanResult {
  const center = bot.entity.position.floored();
  const chunks = new Map<string, Vec3>();
  let observed = 0;

  for (let dx = -radius; dx <= radius; dx++) {
    for (let dy = -radius; dy <= radius; dy++) {
      for (let dz = -radius; dz <= radius; dz++) {
        const position = center.offset(dx, dy, dz);
        const block = bot.blockAt(position);
        // unloaded columns stay unknown
        if (!block) continue;

        map.set(position, block.type);
        observed++;

        const key = map.chunkKeyOf(position);
        chunks.set(key.toString(), position);
      }
    }
  }

  logger.debug('Scan complete', { center, radius, observed, chunks: chunks.size });
  return { observed, chunks: [...chunks.values()] };
}
