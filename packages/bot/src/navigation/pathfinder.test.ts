import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Vec3 } from 'vec3';
import { TableClassifier } from './block-classifier.js';
import { calcCostForPath } from './costs.js';
import { GoalUnreachableError, SearchAbortedError } from './errors.js';
import { heuristicEuclidean, heuristicManhattan, heuristicZero, type Heuristic } from './heuristics.js';
import { Pathfinder, createPathHeuristic } from './pathfinder.js';
import { WorldMap } from './world-map.js';

const AIR = 0;
const STONE = 1;
const BEDROCK = 7;

const v = (x: number, y: number, z: number) => new Vec3(x, y, z);

// Unobserved cells count as open air so each scenario only places its obstacles
const openClassifier = new TableClassifier({ air: [AIR], bedrock: [BEDROCK], unknownAs: 'air' });

describe('Pathfinder', () => {
  let map: WorldMap;
  let pathfinder: Pathfinder;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    map = new WorldMap({ chunkSize: { x: 16, y: 16, z: 16 } });
    pathfinder = new Pathfinder(map, openClassifier);
  });

  describe('findPath', () => {
    it('walks straight ahead for one unit per step', () => {
      const result = pathfinder.findPath(v(3, 10, 0), v(0, 10, 0), 'east');

      expect(result.path).toEqual([v(3, 10, 0), v(2, 10, 0), v(1, 10, 0)]);
      expect(result.cost).toBe(3);
    });

    it('pays once for a quarter turn', () => {
      const result = pathfinder.findPath(v(2, 10, 0), v(0, 10, 0), 'north');

      expect(result.path).toEqual([v(2, 10, 0), v(1, 10, 0)]);
      expect(result.cost).toBe(3);
    });

    it('pays the turn-around weight when the goal is behind', () => {
      const result = pathfinder.findPath(v(1, 10, 0), v(0, 10, 0), 'west');

      expect(result.path).toEqual([v(1, 10, 0)]);
      expect(result.cost).toBe(3);
    });

    it('breaks through a solid block when that beats going around', () => {
      map.set(v(1, 10, 0), STONE);
      const result = pathfinder.findPath(v(2, 10, 0), v(0, 10, 0), 'east');

      expect(result.path).toEqual([v(2, 10, 0), v(1, 10, 0)]);
      expect(result.cost).toBeCloseTo(3.555, 9);
    });

    it('goes around a block that is expensive to break', () => {
      map.set(v(1, 10, 0), STONE);
      const costly = new Pathfinder(map, openClassifier, {
        costs: { move: 1, turn: 1, turnAround: 2, breaking: 5 },
      });
      const result = costly.findPath(v(2, 10, 0), v(0, 10, 0), 'east');

      expect(result.cost).toBe(4);
      expect(result.path).toHaveLength(4);
      expect(result.path.some((node) => node.equals(v(1, 10, 0)))).toBe(false);
    });

    it('finds the same cost with every built-in heuristic', () => {
      map.set(v(1, 10, 0), STONE);
      const costly = new Pathfinder(map, openClassifier, {
        costs: { move: 1, turn: 1, turnAround: 2, breaking: 5 },
      });
      const search = (heuristic: Heuristic) =>
        costly.findPath(v(2, 10, 0), v(0, 10, 0), 'east', { heuristic });

      const manhattan = search(heuristicManhattan);
      const euclidean = search(heuristicEuclidean);
      const dijkstra = search(heuristicZero);

      expect(euclidean.cost).toBe(manhattan.cost);
      expect(dijkstra.cost).toBe(manhattan.cost);
      expect(dijkstra.expansions).toBeGreaterThan(manhattan.expansions);
    });

    it('returns an empty path when already at the goal', () => {
      expect(pathfinder.findPath(v(4, 10, 4), v(4, 10, 4), 'south')).toEqual({
        path: [],
        cost: 0,
        expansions: 0,
      });
    });

    it('fails without searching when the goal is outside the world', () => {
      const attempt = () => pathfinder.findPath(v(0, 0, 0), v(0, 10, 0), 'north');

      expect(attempt).toThrow(GoalUnreachableError);
      try {
        attempt();
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(GoalUnreachableError);
        if (error instanceof GoalUnreachableError) {
          expect(error.expansions).toBe(0);
        }
      }
    });

    it('reports an unreachable goal once the open set runs dry', () => {
      const start = v(0, 2, 0);
      for (const wall of [v(1, 2, 0), v(-1, 2, 0), v(0, 2, 1), v(0, 2, -1), v(0, 3, 0), v(0, 1, 0)]) {
        map.set(wall, BEDROCK);
      }

      try {
        pathfinder.findPath(v(5, 2, 0), start, 'north');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(GoalUnreachableError);
        if (error instanceof GoalUnreachableError) {
          expect(error.expansions).toBe(1);
          expect(error.message).toBe('No path from (0, 2, 0) to (5, 2, 0) after 1 expansions');
        }
      }
    });

    it('stops when the expansion budget runs out', () => {
      expect(() => pathfinder.findPath(v(20, 10, 0), v(0, 10, 0), 'east', { maxExpansions: 3 })).toThrow(
        'Search aborted: expansion budget of 3 exhausted'
      );
    });

    it('stops when the signal has fired', () => {
      const controller = new AbortController();
      controller.abort();

      expect(() => pathfinder.findPath(v(20, 10, 0), v(0, 10, 0), 'east', { signal: controller.signal })).toThrow(
        SearchAbortedError
      );
    });

    it('stops once the time limit has passed', () => {
      expect(() => pathfinder.findPath(v(20, 10, 0), v(0, 10, 0), 'east', { timeoutMs: 0 })).toThrow(
        'Search aborted: 0 ms search timeout exceeded after 0 expansions'
      );
    });

    it('keeps to the search bounds', () => {
      map.set(v(1, 10, 0), STONE);
      const costly = new Pathfinder(map, openClassifier, {
        costs: { move: 1, turn: 1, turnAround: 2, breaking: 5 },
      });
      const result = costly.findPath(v(2, 10, 0), v(0, 10, 0), 'east', {
        bounds: { min: v(0, 10, 0), max: v(2, 10, 0) },
      });

      expect(result.path).toEqual([v(2, 10, 0), v(1, 10, 0)]);
      expect(result.cost).toBe(7);
    });
  });

  describe('neighbours', () => {
    it('offers all six directions in open space', () => {
      expect(pathfinder.neighbours(v(0, 10, 0))).toHaveLength(6);
    });

    it('drops the world floor and bedrock near it', () => {
      map.set(v(1, 1, 0), BEDROCK);
      const result = pathfinder.neighbours(v(0, 1, 0));

      expect(result).toHaveLength(4);
      expect(result).toEqual([v(-1, 1, 0), v(0, 2, 0), v(0, 1, 1), v(0, 1, -1)]);
    });

    it('ignores bedrock ids above the bedrock layers', () => {
      map.set(v(1, 10, 0), BEDROCK);
      expect(pathfinder.isEnterable(v(1, 10, 0))).toBe(true);
    });
  });

  describe('path costs', () => {
    it('prices a found path at the cost the search reported', () => {
      const start = v(0, 10, 0);
      const result = pathfinder.findPath(v(2, 10, 0), start, 'north');

      expect(calcCostForPath(result.path, pathfinder.defaultCost, { start, startFacing: 'north' })).toBe(result.cost);
    });

    it('only charges for turning on the last step when stopping short', () => {
      const start = v(0, 10, 0);
      const path = [v(1, 10, 1), v(1, 10, 0)];

      expect(calcCostForPath(path, pathfinder.defaultCost, { start, startFacing: 'east' })).toBe(3);
      expect(calcCostForPath(path, pathfinder.defaultCost, { start, startFacing: 'east', skipGoal: true })).toBe(2);
    });

    it('ignores a solid goal when stopping short of it', () => {
      map.set(v(2, 10, 0), STONE);
      const start = v(0, 10, 0);
      const path = [v(2, 10, 0), v(1, 10, 0)];

      expect(calcCostForPath(path, pathfinder.defaultCost, { start, startFacing: 'east', skipGoal: true })).toBe(1);
    });
  });

  describe('createPathHeuristic', () => {
    it('estimates with the real search cost', () => {
      map.set(v(1, 10, 0), STONE);
      const heuristic = createPathHeuristic(pathfinder, 'east');

      expect(heuristic(v(0, 10, 0), v(2, 10, 0))).toBeCloseTo(3.555, 9);
      expect(heuristic(v(0, 10, 0), v(0, 0, 0))).toBe(Infinity);
    });
  });
});
