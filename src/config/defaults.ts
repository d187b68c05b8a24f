/**
 * Default Engine Settings
 * Tuned for a 1-minute index futures chart (0.25 tick, point-based risk)
 */

import type { EngineConfig } from '../validation/schemas.js';

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  // ═══════════════════════════════════════════════════════════════
  // STRUCTURE
  // ═══════════════════════════════════════════════════════════════
  swingLeftStrength: 2,
  swingRightStrength: 2,

  // ═══════════════════════════════════════════════════════════════
  // ZONE DETECTORS
  // ═══════════════════════════════════════════════════════════════
  obMinCandles: 2,
  obMaxCandles: 5,
  obBounds: 'wick',
  fvgMinGap: 2.0,
  breakerSweepLookback: 20,
  breakerRequireDisplacement: true,
  breakerDisplacementPoints: 5,
  breakerBufferPoints: 3,
  bprMinWidth: 1,
  bprDedupTolerance: 1,

  // ═══════════════════════════════════════════════════════════════
  // ZONE LIFECYCLE
  // ═══════════════════════════════════════════════════════════════
  zoneMaxAge: 50,              // bars
  maxOrderBlocks: 15,
  maxBreakers: 15,
  maxFairValueGaps: 20,
  maxInvertedFvgs: 15,
  maxBalancedRanges: 10,

  // ═══════════════════════════════════════════════════════════════
  // BIAS
  // ═══════════════════════════════════════════════════════════════
  biasMaPeriod: 21,            // EMA
  htfMode: 'loose',
  htfMinutes: 240,
  requireIntradayAlign: true,
  looseCounterTrendModels: ['unicorn'],

  // ═══════════════════════════════════════════════════════════════
  // DRAW ON LIQUIDITY
  // ═══════════════════════════════════════════════════════════════
  useSessionLevels: true,
  useSwingLevels: true,
  useEqualLevels: true,
  equalLevelTolerance: 1,
  requireDrawTarget: true,

  // ═══════════════════════════════════════════════════════════════
  // ENTRY MODELS
  // ═══════════════════════════════════════════════════════════════
  enableUnicorn: true,
  enableBreakerRetap: true,
  enableIfvgFlip: true,
  enableObMeanBounce: true,
  obMeanThreshold: true,
  maxWaitBars: 3,
  confirmOnSignalBar: false,
  allowLong: true,
  allowShort: true,

  // ═══════════════════════════════════════════════════════════════
  // RISK
  // ═══════════════════════════════════════════════════════════════
  contracts: 2,
  tickSize: 0.25,
  stopBufferPoints: 2,
  tightStopThreshold: 10,
  stopOverrideToStructure: true,
  stopDefaultPoints: 12.5,
  stopMinPoints: 10,
  stopMaxPoints: 15,
  targetMode: 'fixed-r',
  targetR: 2,
  hybridMinR: 1.5,

  // ═══════════════════════════════════════════════════════════════
  // TRADE MANAGEMENT
  // ═══════════════════════════════════════════════════════════════
  beEnabled: true,
  beTriggerPoints: 3,
  beOffsetPoints: 0.5,
  partialEnabled: true,
  partialR: 1.0,
  partialPct: 50,
  trailEnabled: true,
  trailMode: 'points',
  trailPoints: 15,
  trailAtrMultiple: 2,
  atrPeriod: 14,
  maxBarsInTrade: 25,
  progressCheckBars: 10,       // 0 disables the progress check
  progressMinR: 0.5,

  // ═══════════════════════════════════════════════════════════════
  // SESSION
  // ═══════════════════════════════════════════════════════════════
  timezone: 'America/New_York',
  tradeStart: '09:30',
  tradeEnd: '16:00',
  forcedFlatEnabled: true,
  forcedFlatTime: '15:55',
  maxTradesPerDay: 3,
  cooldownMinutes: 5,
  oneTradePerDirection: false,
};
