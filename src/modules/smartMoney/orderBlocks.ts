/**
 * Order Block Detection Module
 *
 * Bullish OB: a run of down-close candles followed by a close above the run's high
 * Bearish OB: a run of up-close candles followed by a close below the run's low
 */

import type { IndexedBar, OrderBlockDraft } from './types.js';

export interface OrderBlockConfig {
  minCandles: number;
  maxCandles: number;
  /** Block bounds from candle wicks or candle bodies */
  bounds: 'wick' | 'body';
}

const DEFAULT_CONFIG: OrderBlockConfig = {
  minCandles: 2,
  maxCandles: 5,
  bounds: 'wick',
};

type CloseSide = 'up' | 'down' | 'flat';

function closeSide(bar: IndexedBar): CloseSide {
  if (bar.close > bar.open) return 'up';
  if (bar.close < bar.open) return 'down';
  return 'flat';
}

function blockHigh(bar: IndexedBar, bounds: OrderBlockConfig['bounds']): number {
  return bounds === 'wick' ? bar.high : Math.max(bar.open, bar.close);
}

function blockLow(bar: IndexedBar, bounds: OrderBlockConfig['bounds']): number {
  return bounds === 'wick' ? bar.low : Math.min(bar.open, bar.close);
}

/**
 * Check whether the newest bar breaks the same-direction run that precedes it.
 * Returns null when there is no run of at least `minCandles` or no break.
 */
export function detectOrderBlock(
  bars: readonly IndexedBar[],
  config: Partial<OrderBlockConfig> = {}
): OrderBlockDraft | null {
  const cfg = { ...DEFAULT_CONFIG, ...config };

  if (bars.length < cfg.minCandles + 1) {
    return null;
  }

  const current = bars[bars.length - 1];
  const runSide = closeSide(bars[bars.length - 2]);
  if (runSide === 'flat') return null;

  let count = 0;
  let high = -Infinity;
  let low = Infinity;

  for (let i = bars.length - 2; i >= 0 && count < cfg.maxCandles; i--) {
    const bar = bars[i];
    if (closeSide(bar) !== runSide) break;
    high = Math.max(high, blockHigh(bar, cfg.bounds));
    low = Math.min(low, blockLow(bar, cfg.bounds));
    count++;
  }

  if (count < cfg.minCandles) {
    return null;
  }

  if (runSide === 'down' && current.close > high) {
    return {
      kind: 'order-block',
      direction: 'bullish',
      top: high,
      bottom: low,
      birthIndex: current.index,
      candleCount: count,
      flippedToBreaker: false,
    };
  }

  if (runSide === 'up' && current.close < low) {
    return {
      kind: 'order-block',
      direction: 'bearish',
      top: high,
      bottom: low,
      birthIndex: current.index,
      candleCount: count,
      flippedToBreaker: false,
    };
  }

  return null;
}
