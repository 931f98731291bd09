import dotenv from 'dotenv';
import { ConfigSchema, Logger, type Config } from '@minenav/shared';

dotenv.config();

const logger = new Logger('Config');

type Env = Record<string, string | undefined>;

function parseIntOr(value: string | undefined, fallback: number): number {
  return value ? parseInt(value, 10) : fallback;
}

function parseFloatOr(value: string | undefined, fallback: number): number {
  return value ? parseFloat(value) : fallback;
}

/**
 * "x,y,z" -> { x, y, z }; anything else is passed through for the schema to reject
 */
function parseTriple(value: string): { x: number; y: number; z: number } | string {
  const parts = value.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 3) return value;
  const [x, y, z] = parts;
  return { x, y, z };
}

/**
 * "x,y,z;x,y,z" -> list of coordinates
 */
function parseTargets(value: string | undefined): unknown[] {
  if (!value) return [];
  return value
    .split(';')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(parseTriple);
}

export function loadConfig(env: Env = process.env): Config {
  try {
    const config = ConfigSchema.parse({
      minecraft: {
        host: env.MINECRAFT_HOST || 'localhost',
        port: parseIntOr(env.MINECRAFT_PORT, 25565),
        username: env.MINECRAFT_USERNAME || 'MineNav',
        version: env.MINECRAFT_VERSION || '1.20.1',
        auth: env.MINECRAFT_AUTH || 'offline',
      },
      store: {
        chunkSize: env.CHUNK_SIZE ? parseTriple(env.CHUNK_SIZE) : undefined,
        storedType: env.CHUNK_TYPE || undefined,
        chunkDir: env.CHUNK_DIR || 'data/chunks',
      },
      costs: {
        move: parseFloatOr(env.COST_MOVE, 1),
        turn: parseFloatOr(env.COST_TURN, 1),
        turnAround: parseFloatOr(env.COST_TURN_AROUND, 2),
        breaking: parseFloatOr(env.COST_BREAK, 1.555),
      },
      search: {
        maxExpansions: parseIntOr(env.SEARCH_MAX_EXPANSIONS, 200000),
        timeoutMs: parseIntOr(env.SEARCH_TIMEOUT_MS, 5000),
      },
      navigation: {
        maxMoveAttempts: parseIntOr(env.MAX_MOVE_ATTEMPTS, 10),
        scanRadius: parseIntOr(env.SCAN_RADIUS, 4),
      },
      targets: parseTargets(env.MINING_TARGETS),
    });

    logger.info('Configuration loaded successfully', {
      server: `${config.minecraft.host}:${config.minecraft.port}`,
      chunkSize: config.store.chunkSize,
      storedType: config.store.storedType,
      targets: config.targets.length,
    });

    return config;
  } catch (error) {
    logger.error('Failed to load configuration', { error });
    throw new Error(`Configuration error: ${error}`, { cause: error });
  }
}
