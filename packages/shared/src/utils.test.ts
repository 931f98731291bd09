import { describe, it, expect, afterEach, vi } from 'vitest';
import { Logger, formatDuration } from './utils.js';

describe('Logger', () => {
  const initialLevel = Logger.getLevel();

  afterEach(() => {
    Logger.setLevel(initialLevel);
    vi.restoreAllMocks();
  });

  it('prints a compact line with key=value metadata', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    Logger.setLevel('info');

    new Logger('Pathfinder').info('Path found', {
      goal: { x: 1, y: -2, z: 3 },
      cost: 0.25,
      steps: 4,
      reached: true,
      reason: undefined,
    });

    expect(info).toHaveBeenCalledTimes(1);
    expect(info.mock.calls[0][0]).toMatch(
      /^\[\d{2}:\d{2}:\d{2}\] \[I\] \[Pathfinder\] Path found goal=\(1, -2, 3\) cost=0\.25 steps=4 reached=Y reason=-$/
    );
  });

  it('summarises errors by name and message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    new Logger('Config').error('Failed', { error: new RangeError('bad size') });

    expect(error.mock.calls[0][0]).toMatch(/\[E\] \[Config\] Failed error=RangeError: bad size$/);
  });

  it('drops messages below the current level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    Logger.setLevel('warn');
    const logger = new Logger('WorldMap');

    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('formatDuration', () => {
  it('picks a unit to match the size', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
    expect(formatDuration(125000)).toBe('2m 5s');
  });
});
