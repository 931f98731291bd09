import mineflayer, { type Bot } from 'mineflayer';
import * as path from 'path';
import { Logger, formatDuration, type Config } from '@minenav/shared';
import { loadConfig } from './config.js';
import { MineflayerActuator } from './games/mineflayer-actuator.js';
import { scanAround } from './games/world-scanner.js';
import { createMinecraftClassifier } from './navigation/block-classifier.js';
import { Navigator } from './navigation/navigator.js';
import { Pathfinder } from './navigation/pathfinder.js';
import { WorldMap } from './navigation/world-map.js';
import { movementLogger } from './utils/movement-logger.js';

const logger = new Logger('MiningBot');

/**
 * Connects to a server, maps the surroundings and mines the configured targets in tour order
 */
class MiningBot {
  private bot: Bot | null = null;
  private map: WorldMap;

  constructor(private readonly config: Config) {
    this.map = new WorldMap({
      chunkSize: config.store.chunkSize,
      storedType: config.store.storedType,
      chunkDir: path.resolve(config.store.chunkDir),
    });
  }

  async start(): Promise<void> {
    const { minecraft } = this.config;
    logger.info('Connecting to Minecraft server', {
      host: minecraft.host,
      port: minecraft.port,
      username: minecraft.username,
      version: minecraft.version,
    });

    const bot = mineflayer.createBot({
      host: minecraft.host,
      port: minecraft.port,
      username: minecraft.username,
      version: minecraft.version,
      auth: minecraft.auth,
    });
    this.bot = bot;

    bot.on('kicked', (reason) => logger.warn('Kicked from server', { reason }));
    bot.on('error', (error) => logger.error('Bot error', { error }));

    await new Promise<void>((resolve) => bot.once('spawn', () => resolve()));
    logger.info('Spawned', { position: bot.entity.position.floored() });

    await this.run(bot);
  }

  private async run(bot: Bot): Promise<void> {
    const startedAt = Date.now();
    const position = bot.entity.position.floored();

    const loaded = this.map.load(position);
    logger.info('Home chunk', { result: loaded });

    const scan = scanAround(bot, this.map, this.config.navigation.scanRadius);
    logger.info('Surroundings scanned', { observed: scan.observed, chunks: scan.chunks.length });

    const classifier = createMinecraftClassifier(bot.version);
    const pathfinder = new Pathfinder(this.map, classifier, {
      costs: this.config.costs,
      maxExpansions: this.config.search.maxExpansions,
    });
    const navigator = new Navigator(new MineflayerActuator(bot), this.map, pathfinder, classifier, {
      maxMoveAttempts: this.config.navigation.maxMoveAttempts,
      searchTimeoutMs: this.config.search.timeoutMs,
    });

    try {
      if (this.config.targets.length === 0) {
        logger.warn('No MINING_TARGETS configured, nothing to do');
      } else {
        movementLogger.logLegStart(1, position, this.config.targets.length);
        const summary = await navigator.visitAll(this.config.targets);
        movementLogger.logLegEnd(
          1,
          summary.visited[summary.visited.length - 1] ?? position,
          `visited=${summary.visited.length} unreachable=${summary.unreachable.length}`,
          Date.now() - startedAt
        );
      }
    } finally {
      this.saveMap();
    }
    logger.info('Session finished', { duration: formatDuration(Date.now() - startedAt) });
  }

  private saveMap(): void {
    const saved = new Set<string>();
    for (const [position] of this.map) {
      const file = this.map.fileNameFor(position);
      if (saved.has(file)) continue;
      this.map.save(position);
      saved.add(file);
    }
    logger.info('World map saved', { chunks: saved.size, cells: this.map.size() });
  }

  async stop(): Promise<void> {
    if (this.bot) {
      this.bot.quit();
      this.bot = null;
    }
    await movementLogger.close();
  }
}

// Main execution
async function main() {
  logger.info('Starting mining navigator');

  const bot = new MiningBot(loadConfig());

  // Handle graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    bot.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', { error });
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await bot.start();
  await bot.stop();
}

main().catch((error: unknown) => {
  logger.error('Fatal error', { error });
  process.exit(1);
});
