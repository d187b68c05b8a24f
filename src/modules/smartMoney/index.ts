/**
 * Market Structure Module Index
 * Detectors and structure trackers used by the engine
 */

export * from './types.js';
export * from './swingTracker.js';
export * from './orderBlocks.js';
export * from './fairValueGaps.js';
export * from './breakers.js';
export * from './inversions.js';
export * from './balancedRanges.js';
export * from './liquidity.js';
export * from './barAggregator.js';
