/**
 * Fair Value Gap (FVG) Detection Module
 * Three-bar imbalance between bar i-2 and bar i
 *
 * Bullish FVG: low[i] above high[i-2] (price moved up fast)
 * Bearish FVG: high[i] below low[i-2] (price moved down fast)
 */

import type { FairValueGapDraft, IndexedBar } from './types.js';

export interface FVGConfig {
  /** Minimum gap in price points; a gap of exactly this size qualifies */
  minGap: number;
}

const DEFAULT_CONFIG: FVGConfig = {
  minGap: 2,
};

export function detectFairValueGap(
  bars: readonly IndexedBar[],
  config: Partial<FVGConfig> = {}
): FairValueGapDraft | null {
  const cfg = { ...DEFAULT_CONFIG, ...config };

  if (bars.length < 3) {
    return null;
  }

  const first = bars[bars.length - 3];
  const third = bars[bars.length - 1];

  if (third.low > first.high) {
    const gapSize = third.low - first.high;
    if (gapSize >= cfg.minGap) {
      return {
        kind: 'fair-value-gap',
        direction: 'bullish',
        top: third.low,
        bottom: first.high,
        birthIndex: third.index,
        gapSize,
      };
    }
  }

  if (first.low > third.high) {
    const gapSize = first.low - third.high;
    if (gapSize >= cfg.minGap) {
      return {
        kind: 'fair-value-gap',
        direction: 'bearish',
        top: first.low,
        bottom: third.high,
        birthIndex: third.index,
        gapSize,
      };
    }
  }

  return null;
}
