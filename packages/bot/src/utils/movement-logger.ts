import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { MoveDirection, TurnDirection, Vec3Like } from '@minenav/shared';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const fmt = (v: Vec3Like): string => `${v.x},${v.y},${v.z}`;

/**
 * Movement Logger - step-by-step trace of what the actuator did, for replaying a run
 */
export class MovementLogger {
  private writeStream: fs.WriteStream | null = null;

  // Logs folder in the bot package by default
  constructor(private readonly logFile: string = path.join(__dirname, '..', '..', 'logs', 'movement.log')) {}

  private open(): fs.WriteStream {
    if (!this.writeStream) {
      fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
      // Clear log on first use
      fs.writeFileSync(this.logFile, '');
      this.writeStream = fs.createWriteStream(this.logFile, { flags: 'a' });
    }
    return this.writeStream;
  }

  log(event: string, data?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    const dataStr = data ? ` | ${JSON.stringify(data)}` : '';
    this.open().write(`[${timestamp}] ${event}${dataStr}\n`);
  }

  logTurn(direction: TurnDirection, yaw: number): void {
    this.log(`TURN ${direction.toUpperCase()}`, { yawDeg: Number((yaw * 180 / Math.PI).toFixed(1)) });
  }

  logStep(direction: MoveDirection, from: Vec3Like, to: Vec3Like, reached: boolean): void {
    this.log(`STEP ${direction.toUpperCase()} ${fmt(from)} -> ${fmt(to)}${reached ? '' : ' [BLOCKED]'}`);
  }

  logDig(target: Vec3Like, blockName: string): void {
    this.log(`DIG ${blockName} at ${fmt(target)}`);
  }

  logLegStart(legId: number, from: Vec3Like, targetCount: number): void {
    this.log(`\n${'='.repeat(60)}`);
    this.log(`[${legId}] LEG START ${fmt(from)} targets=${targetCount}`);
  }

  /** `end` is where the agent actually stopped, which the tour order decides */
  logLegEnd(legId: number, end: Vec3Like, result: string, duration: number): void {
    this.log(`[${legId}] LEG END at ${fmt(end)}: ${result} (${(duration / 1000).toFixed(1)}s)`);
    this.log(`${'='.repeat(60)}\n`);
  }

  /** Resolves once everything written so far is flushed */
  close(): Promise<void> {
    const stream = this.writeStream;
    this.writeStream = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(resolve));
  }
}

// Singleton
export const movementLogger = new MovementLogger();
