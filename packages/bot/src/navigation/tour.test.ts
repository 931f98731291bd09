import { describe, it, expect, vi } from 'vitest';
import { Vec3 } from 'vec3';
import type { Vec3Like } from '@minenav/shared';
import { TableClassifier } from './block-classifier.js';
import { SearchAbortedError } from './errors.js';
import { Pathfinder } from './pathfinder.js';
import {
  createPathCostDistance,
  nearestBlock,
  shortestTour,
  tourCost,
  tspGreedy,
  tspTwoOpt,
} from './tour.js';
import { WorldMap } from './world-map.js';

const v = (x: number, y: number, z: number) => new Vec3(x, y, z);

describe('tourCost', () => {
  const square = [v(0, 0, 0), v(1, 0, 0), v(1, 0, 1), v(0, 0, 1)];

  it('adds the closing edge only for closed tours', () => {
    expect(tourCost(square, true)).toBe(4);
    expect(tourCost(square, false)).toBe(3);
  });

  it('costs nothing for a single node', () => {
    expect(tourCost([v(3, 3, 3)], true)).toBe(0);
  });
});

describe('tspGreedy', () => {
  it('builds a closed tour from the first node', () => {
    const result = tspGreedy([v(0, 0, 0), v(0, 0, 1), v(1, 0, 1), v(1, 0, 0)]);

    expect(result.tour).toEqual([v(0, 0, 0), v(0, 0, 1), v(1, 0, 1), v(1, 0, 0)]);
    expect(result.cost).toBe(4);
  });

  it('always moves to the nearest unvisited node', () => {
    const result = tspGreedy([v(0, 0, 0), v(3, 0, 0), v(1, 0, 0), v(2, 0, 0)]);

    expect(result.tour).toEqual([v(0, 0, 0), v(1, 0, 0), v(2, 0, 0), v(3, 0, 0)]);
    expect(result.cost).toBe(6);
  });

  it('adds missing anchors to an open tour', () => {
    const result = tspGreedy([v(2, 0, 0), v(1, 0, 0)], { start: v(0, 0, 0), end: v(5, 0, 0) });

    expect(result.tour).toEqual([v(0, 0, 0), v(1, 0, 0), v(2, 0, 0), v(5, 0, 0)]);
    expect(result.cost).toBe(5);
  });

  it('keeps anchors in place when they are also listed as nodes', () => {
    const start = v(0, 0, 0);
    const end = v(1, 0, 1);
    const result = tspGreedy([end, v(1, 0, 0), start], { start, end });

    expect(result.tour).toEqual([start, v(1, 0, 0), end]);
    expect(result.cost).toBe(2);
  });

  it('drops duplicate nodes', () => {
    const result = tspGreedy([v(0, 0, 0), v(2, 0, 0), v(0, 0, 0), v(2, 0, 0)]);

    expect(result.tour).toEqual([v(0, 0, 0), v(2, 0, 0)]);
    expect(result.cost).toBe(4);
  });

  it('returns an empty tour for no nodes', () => {
    expect(tspGreedy([])).toEqual({ tour: [], cost: 0 });
  });
});

describe('tspTwoOpt', () => {
  it('uncrosses a closed tour', () => {
    const crossed = [v(0, 0, 0), v(1, 0, 1), v(1, 0, 0), v(0, 0, 1)];
    expect(tourCost(crossed, true)).toBeCloseTo(2 + 2 * Math.SQRT2, 9);

    const result = tspTwoOpt(crossed);

    expect(result.tour).toEqual([v(0, 0, 0), v(1, 0, 0), v(1, 0, 1), v(0, 0, 1)]);
    expect(result.cost).toBe(4);
    expect(result.passes).toBe(2);
  });

  it('keeps both anchors of an open tour fixed', () => {
    const start = v(0, 0, 0);
    const end = v(3, 0, 0);
    const result = tspTwoOpt([start, v(2, 0, 0), v(1, 0, 0), end], { start, end });

    expect(result.tour).toEqual([start, v(1, 0, 0), v(2, 0, 0), end]);
    expect(result.cost).toBe(3);
    expect(result.passes).toBe(2);
  });

  it('finds the same tour when repricing every candidate', () => {
    const crossed = [v(0, 0, 0), v(1, 0, 1), v(1, 0, 0), v(0, 0, 1)];
    const manhattan = (a: Vec3Like, b: Vec3Like) => Math.abs(a.x - b.x) + Math.abs(a.y - b.y) + Math.abs(a.z - b.z);

    const result = tspTwoOpt(crossed, undefined, { distance: manhattan });

    expect(result.tour).toEqual([v(0, 0, 0), v(1, 0, 0), v(1, 0, 1), v(0, 0, 1)]);
    expect(result.cost).toBe(4);
  });

  it('stops when the signal has fired', () => {
    const controller = new AbortController();
    controller.abort();

    expect(() => tspTwoOpt([v(0, 0, 0), v(1, 0, 1), v(1, 0, 0)], undefined, { signal: controller.signal })).toThrow(
      SearchAbortedError
    );
  });

  it('handles tours too short to reverse', () => {
    expect(tspTwoOpt([])).toEqual({ tour: [], cost: 0, passes: 1 });
    expect(tspTwoOpt([v(1, 2, 3)])).toEqual({ tour: [v(1, 2, 3)], cost: 0, passes: 1 });
  });
});

describe('shortestTour', () => {
  it('never does worse than the greedy tour', () => {
    const nodes = [v(0, 0, 0), v(4, 0, 0), v(1, 0, 3), v(5, 0, 2), v(2, 0, 1), v(3, 0, 4), v(0, 0, 5)];

    const greedy = tspGreedy(nodes);
    const result = shortestTour(nodes);

    expect(result.cost).toBeLessThanOrEqual(greedy.cost + 1e-9);
    expect(result.tour).toHaveLength(nodes.length);
    expect(result.cost).toBeCloseTo(tourCost(result.tour, true), 9);
  });

  it('leaves the wrap-around edge out of open tours', () => {
    const square = [v(0, 0, 0), v(1, 0, 0), v(1, 0, 1), v(0, 0, 1)];

    const closed = shortestTour(square);
    const open = shortestTour(square, { start: v(0, 0, 0), end: v(1, 0, 1) });

    expect(closed.cost).toBe(4);
    expect(open.tour).toEqual([v(0, 0, 0), v(1, 0, 0), v(0, 0, 1), v(1, 0, 1)]);
    expect(open.cost).toBeCloseTo(2 + Math.SQRT2, 9);
    expect(open.cost).toBeLessThan(closed.cost);
  });

  it('orders an open walk between its anchors', () => {
    const result = shortestTour([v(1, 0, 1), v(2, 0, 0)], { start: v(0, 0, 0), end: v(3, 0, 1) });

    expect(result.tour).toEqual([v(0, 0, 0), v(1, 0, 1), v(2, 0, 0), v(3, 0, 1)]);
    expect(result.cost).toBeCloseTo(3 * Math.SQRT2, 9);
  });
});

describe('nearestBlock', () => {
  it('picks the closest node, first one on ties', () => {
    const result = nearestBlock([v(5, 0, 0), v(1, 0, 1), v(0, 0, 3)], v(0, 0, 0));

    expect(result).toEqual({ node: v(1, 0, 1), distance: 3 });
  });

  it('accepts a custom heuristic', () => {
    const result = nearestBlock([v(5, 0, 0), v(2, 0, 2)], v(0, 0, 0), (a, b) => Math.abs(a.x - b.x));

    expect(result).toEqual({ node: v(2, 0, 2), distance: 2 });
  });

  it('searches the observed cells of a world map', () => {
    const map = new WorldMap({ chunkSize: { x: 4, y: 4, z: 4 } });
    map.set(v(10, 0, 0), 3);
    map.set(v(-2, 0, 0), 3);

    expect(nearestBlock(map, v(0, 0, 0))).toEqual({ node: v(-2, 0, 0), distance: 2 });
  });

  it('returns undefined when there is nothing to pick', () => {
    expect(nearestBlock([], v(0, 0, 0))).toBeUndefined();
  });
});

describe('createPathCostDistance', () => {
  const classifier = new TableClassifier({ air: [0], unknownAs: 'air' });

  it('prices legs by search cost, which depends on direction', () => {
    const pathfinder = new Pathfinder(new WorldMap(), classifier);
    const distance = createPathCostDistance(pathfinder, 'east');

    expect(distance(v(0, 10, 0), v(3, 10, 0))).toBe(3);
    expect(distance(v(3, 10, 0), v(0, 10, 0))).toBe(5);
  });

  it('treats unreachable legs as infinitely long', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const pathfinder = new Pathfinder(new WorldMap(), classifier);
    const distance = createPathCostDistance(pathfinder, 'east');

    expect(distance(v(0, 10, 0), v(0, 0, 0))).toBe(Infinity);
    vi.restoreAllMocks();
  });

  it('searches each ordered pair once', () => {
    const pathfinder = new Pathfinder(new WorldMap(), classifier);
    const findPath = vi.spyOn(pathfinder, 'findPath');
    const distance = createPathCostDistance(pathfinder, 'east');

    distance(v(0, 10, 0), v(2, 10, 0));
    distance(v(0, 10, 0), v(2, 10, 0));
    distance(v(2, 10, 0), v(0, 10, 0));

    expect(findPath).toHaveBeenCalledTimes(2);
  });

  it('feeds tour planning', () => {
    const pathfinder = new Pathfinder(new WorldMap(), classifier);
    const distance = createPathCostDistance(pathfinder, 'east');

    const result = shortestTour([v(2, 10, 0), v(1, 10, 0)], { start: v(0, 10, 0), end: v(3, 10, 0) }, {
      distance,
      symmetric: false,
    });

    expect(result.tour).toEqual([v(0, 10, 0), v(1, 10, 0), v(2, 10, 0), v(3, 10, 0)]);
    expect(result.cost).toBe(3);
  });
});
