/**
 * Swing Point Tracker
 * Confirms fractal highs/lows once `rightStrength` bars have closed after the pivot.
 * Only the current and previous swing of each side are kept.
 */

import type { IndexedBar, SwingPoint, SwingState } from './types.js';

export interface SwingConfig {
  leftStrength: number;
  rightStrength: number;
}

const DEFAULT_CONFIG: SwingConfig = {
  leftStrength: 2,
  rightStrength: 2,
};

export function emptySwingState(): SwingState {
  return {
    currentHigh: null,
    previousHigh: null,
    currentLow: null,
    previousLow: null,
  };
}

export interface SwingUpdate {
  state: SwingState;
  confirmed: SwingPoint[];
}

/**
 * Evaluate the pivot candidate `rightStrength` bars back from the newest bar.
 * Neighbours that tie the candidate disqualify it.
 */
export function updateSwings(
  state: SwingState,
  bars: readonly IndexedBar[],
  config: Partial<SwingConfig> = {}
): SwingUpdate {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const needed = cfg.leftStrength + cfg.rightStrength + 1;

  if (bars.length < needed) {
    return { state, confirmed: [] };
  }

  const pivotPos = bars.length - 1 - cfg.rightStrength;
  const pivot = bars[pivotPos];
  let isHigh = true;
  let isLow = true;

  for (let j = pivotPos - cfg.leftStrength; j <= pivotPos + cfg.rightStrength; j++) {
    if (j === pivotPos) continue;
    if (bars[j].high >= pivot.high) isHigh = false;
    if (bars[j].low <= pivot.low) isLow = false;
  }

  const next: SwingState = { ...state };
  const confirmed: SwingPoint[] = [];

  if (isHigh) {
    const point: SwingPoint = { price: pivot.high, barIndex: pivot.index, kind: 'high' };
    next.previousHigh = state.currentHigh;
    next.currentHigh = point;
    confirmed.push(point);
  }

  if (isLow) {
    const point: SwingPoint = { price: pivot.low, barIndex: pivot.index, kind: 'low' };
    next.previousLow = state.currentLow;
    next.currentLow = point;
    confirmed.push(point);
  }

  return { state: next, confirmed };
}
