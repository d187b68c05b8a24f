/**
 * Breaker Detection Module
 *
 * Flip: an order block closed through on its far side becomes a breaker with the opposite role.
 * Structure: a sweep of the latest swing extreme followed by a displacement close beyond the
 * opposite swing extreme.
 */

import type {
  BreakerDraft,
  IndexedBar,
  OrderBlockZone,
  SwingState,
} from './types.js';
import { oppositeDirection } from './types.js';

export interface BreakerFlip {
  source: OrderBlockZone;
  draft: BreakerDraft;
}

/**
 * Order blocks born on an earlier bar that the current close has passed through.
 * Blocks already flipped are ignored.
 */
export function findBreakerFlips(
  orderBlocks: readonly OrderBlockZone[],
  bar: IndexedBar
): BreakerFlip[] {
  const flips: BreakerFlip[] = [];

  for (const ob of orderBlocks) {
    if (ob.validity !== 'active' || ob.flippedToBreaker) continue;
    if (ob.birthIndex >= bar.index) continue;

    const closedThrough = ob.direction === 'bullish'
      ? bar.close < ob.bottom
      : bar.close > ob.top;

    if (!closedThrough) continue;

    flips.push({
      source: ob,
      draft: {
        kind: 'breaker',
        origin: 'ob-flip',
        direction: oppositeDirection(ob.direction),
        top: ob.top,
        bottom: ob.bottom,
        birthIndex: bar.index,
        sweptExtreme: null,
      },
    });
  }

  return flips;
}

export interface StructureBreakerConfig {
  /** Bars back from the current bar in which the sweep must have happened */
  sweepLookback: number;
  requireDisplacement: boolean;
  /** Minimum body of the breaking candle, in points */
  displacementPoints: number;
  /** Distance added beyond the swept swing level */
  bufferPoints: number;
}

const DEFAULT_STRUCTURE_CONFIG: StructureBreakerConfig = {
  sweepLookback: 20,
  requireDisplacement: true,
  displacementPoints: 5,
  bufferPoints: 3,
};

export function detectStructureBreaker(
  bars: readonly IndexedBar[],
  swings: SwingState,
  config: Partial<StructureBreakerConfig> = {}
): BreakerDraft | null {
  const cfg = { ...DEFAULT_STRUCTURE_CONFIG, ...config };

  if (bars.length < 2) return null;

  const current = bars[bars.length - 1];
  const body = Math.abs(current.close - current.open);
  const displaced = !cfg.requireDisplacement || body > cfg.displacementPoints;
  const earliest = current.index - cfg.sweepLookback;
  const prior = bars.slice(0, -1).filter(bar => bar.index >= earliest);

  const { currentLow, currentHigh } = swings;
  if (!currentLow || !currentHigh) return null;

  // Bullish: sell-side swept, then a close above the swing high
  if (current.close > current.open && current.close > currentHigh.price && displaced) {
    let sweptLow = Infinity;
    for (const bar of prior) {
      if (bar.index > currentLow.barIndex && bar.low < currentLow.price) {
        sweptLow = Math.min(sweptLow, bar.low);
      }
    }
    if (Number.isFinite(sweptLow)) {
      return {
        kind: 'breaker',
        origin: 'structure',
        direction: 'bullish',
        top: currentLow.price + cfg.bufferPoints,
        bottom: sweptLow,
        birthIndex: current.index,
        sweptExtreme: sweptLow,
      };
    }
  }

  // Bearish: buy-side swept, then a close below the swing low
  if (current.close < current.open && current.close < currentLow.price && displaced) {
    let sweptHigh = -Infinity;
    for (const bar of prior) {
      if (bar.index > currentHigh.barIndex && bar.high > currentHigh.price) {
        sweptHigh = Math.max(sweptHigh, bar.high);
      }
    }
    if (Number.isFinite(sweptHigh)) {
      return {
        kind: 'breaker',
        origin: 'structure',
        direction: 'bearish',
        top: sweptHigh,
        bottom: currentHigh.price - cfg.bufferPoints,
        birthIndex: current.index,
        sweptExtreme: sweptHigh,
      };
    }
  }

  return null;
}
