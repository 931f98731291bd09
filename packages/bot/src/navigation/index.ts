export * from './errors.js';
export * from './orientation.js';
export * from './priority-queue.js';
export * from './chunk.js';
export * from './chunk-codec.js';
export * from './world-map.js';
export * from './block-classifier.js';
export * from './heuristics.js';
export * from './costs.js';
export * from './pathfinder.js';
export * from './tour.js';
export * from './navigator.js';
