import { z } from 'zod';

// ============================================================================
// Configuration Types
// ============================================================================

const TripleSchema = z.object({
  x: z.number().int().positive(),
  y: z.number().int().positive(),
  z: z.number().int().positive(),
});

const CoordinateSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
  z: z.number().int(),
});

export const CellTypeTagSchema = z.enum(['b', 'h', 'i', 'f', 'd']);

export const ConfigSchema = z.object({
  // Minecraft connection
  minecraft: z.object({
    host: z.string().default('localhost'),
    port: z.number().int().default(25565),
    username: z.string().default('MineNav'),
    version: z.string().default('1.20.1'),
    auth: z.enum(['offline', 'microsoft']).default('offline'),
  }),

  // World map storage
  store: z.object({
    chunkSize: TripleSchema.default({ x: 16, y: 256, z: 16 }),
    storedType: CellTypeTagSchema.default('i'),
    chunkDir: z.string(),
  }),

  // Time-based movement costs
  // move and turn stay at 1 or above: the heuristics count one per step and per needed turn
  costs: z.object({
    move: z.number().min(1).default(1),
    turn: z.number().min(1).default(1),
    turnAround: z.number().min(0).default(2),
    breaking: z.number().min(0).default(1.555),
  }),

  // A* limits
  search: z.object({
    maxExpansions: z.number().int().positive().default(200000),
    timeoutMs: z.number().int().positive().default(5000),
  }),

  // Path execution
  navigation: z.object({
    maxMoveAttempts: z.number().int().positive().default(10),
    scanRadius: z.number().int().min(0).default(4),
  }),

  targets: z.array(CoordinateSchema).default([]),
});

export type Config = z.infer<typeof ConfigSchema>;
export type CostConfig = Config['costs'];

// ============================================================================
// Utility Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
