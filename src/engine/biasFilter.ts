/**
 * Bias Filter Engine
 * Directional bias from an EMA and swing structure, plus the HTF permission gate
 *
 * Rules:
 * - BULLISH: Close > EMA AND current swing low > previous swing low
 * - BEARISH: Close < EMA AND current swing high < previous swing high
 * - NEUTRAL: Otherwise
 */

import type { Bias, Direction, SwingState } from '../modules/smartMoney/types.js';
import type { EngineConfig, EntryModel } from '../validation/schemas.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('BiasFilter');

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface BiasAnalysis {
  bias: Bias;
  close: number;
  ema: number | null;

  // Component checks
  priceAboveEma: boolean;
  priceBelowEma: boolean;
  higherLow: boolean;
  lowerHigh: boolean;

  reason: string;
}

export interface BiasPermission {
  allowed: boolean;
  reason: string;
}

export type BiasGateConfig = Pick<EngineConfig, 'htfMode' | 'requireIntradayAlign' | 'looseCounterTrendModels'>;

// ═══════════════════════════════════════════════════════════════
// BIAS ANALYSIS
// ═══════════════════════════════════════════════════════════════

export function analyzeBias(close: number, ema: number | null, swings: SwingState): BiasAnalysis {
  const { currentHigh, previousHigh, currentLow, previousLow } = swings;

  const priceAboveEma = ema !== null && close > ema;
  const priceBelowEma = ema !== null && close < ema;
  const higherLow = currentLow !== null && previousLow !== null && currentLow.price > previousLow.price;
  const lowerHigh = currentHigh !== null && previousHigh !== null && currentHigh.price < previousHigh.price;

  let bias: Bias = 'neutral';
  let reason: string;

  if (ema === null) {
    reason = 'EMA not seeded';
  } else if (priceAboveEma && higherLow) {
    bias = 'bullish';
    reason = `Close above EMA ${ema.toFixed(2)} with higher low`;
  } else if (priceBelowEma && lowerHigh) {
    bias = 'bearish';
    reason = `Close below EMA ${ema.toFixed(2)} with lower high`;
  } else {
    const reasons: string[] = [];
    if (!priceAboveEma && !priceBelowEma) reasons.push('Close at EMA');
    if (priceAboveEma && !higherLow) reasons.push('No higher low');
    if (priceBelowEma && !lowerHigh) reasons.push('No lower high');
    reason = reasons.length > 0 ? reasons.join(', ') : 'No structure';
  }

  return { bias, close, ema, priceAboveEma, priceBelowEma, higherLow, lowerHigh, reason };
}

// ═══════════════════════════════════════════════════════════════
// PERMISSION GATE
// ═══════════════════════════════════════════════════════════════

export function checkBiasPermission(
  direction: Direction,
  model: EntryModel,
  intraday: Bias,
  htf: Bias,
  config: BiasGateConfig
): BiasPermission {
  if (config.htfMode === 'off') {
    return { allowed: true, reason: 'Bias gate off' };
  }

  if (intraday === 'neutral') {
    if (config.requireIntradayAlign) {
      return { allowed: false, reason: 'Intraday bias neutral' };
    }
  } else if (intraday !== direction) {
    return { allowed: false, reason: `Counter to intraday ${intraday} bias` };
  }

  if (config.htfMode === 'strict' && htf !== direction) {
    return { allowed: false, reason: `HTF bias ${htf} (strict)` };
  }

  if (config.htfMode === 'loose' && htf !== 'neutral' && htf !== direction) {
    if (!config.looseCounterTrendModels.includes(model)) {
      logger.debug(`Counter-HTF ${model} blocked`, { direction, htf });
      return { allowed: false, reason: `Counter to HTF ${htf} bias; ${model} not allowed counter-trend` };
    }
    return { allowed: true, reason: `Counter-HTF ${model} allowed (loose)` };
  }

  return { allowed: true, reason: 'Aligned' };
}
