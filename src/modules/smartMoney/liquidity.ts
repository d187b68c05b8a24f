/**
 * Draw-on-Liquidity Selection
 * Builds the unfilled liquidity targets around price and picks the nearest one that agrees with bias.
 *
 * Buy-side (above price): session high, swing high, equal highs
 * Sell-side (below price): session low, swing low, equal lows
 */

import type { Bias, LiquidityTarget, SwingState } from './types.js';

export interface LiquidityConfig {
  useSessionLevels: boolean;
  useSwingLevels: boolean;
  useEqualLevels: boolean;
  /** Two swing extremes within this distance form an equal-highs/lows pool */
  equalLevelTolerance: number;
}

const DEFAULT_CONFIG: LiquidityConfig = {
  useSessionLevels: true,
  useSwingLevels: true,
  useEqualLevels: true,
  equalLevelTolerance: 1,
};

export interface LiquidityInput {
  close: number;
  bias: Bias;
  sessionHigh: number | null;
  sessionLow: number | null;
  swings: SwingState;
}

export interface DrawSelection {
  candidates: LiquidityTarget[];
  primary: LiquidityTarget | null;
}

function above(price: number | null, close: number): price is number {
  return price !== null && close < price;
}

function below(price: number | null, close: number): price is number {
  return price !== null && close > price;
}

export function collectLiquidityTargets(
  input: LiquidityInput,
  config: Partial<LiquidityConfig> = {}
): LiquidityTarget[] {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const { close, swings } = input;
  const targets: LiquidityTarget[] = [];

  if (cfg.useSessionLevels) {
    if (above(input.sessionHigh, close)) {
      targets.push({ price: input.sessionHigh, origin: 'session-high', drawDirection: 'up' });
    }
    if (below(input.sessionLow, close)) {
      targets.push({ price: input.sessionLow, origin: 'session-low', drawDirection: 'down' });
    }
  }

  if (cfg.useSwingLevels) {
    const high = swings.currentHigh?.price ?? null;
    const low = swings.currentLow?.price ?? null;
    if (above(high, close)) {
      targets.push({ price: high, origin: 'swing-high', drawDirection: 'up' });
    }
    if (below(low, close)) {
      targets.push({ price: low, origin: 'swing-low', drawDirection: 'down' });
    }
  }

  if (cfg.useEqualLevels) {
    const { currentHigh, previousHigh, currentLow, previousLow } = swings;
    if (currentHigh && previousHigh &&
        Math.abs(currentHigh.price - previousHigh.price) <= cfg.equalLevelTolerance) {
      const pool = Math.max(currentHigh.price, previousHigh.price);
      if (above(pool, close)) {
        targets.push({ price: pool, origin: 'equal-highs', drawDirection: 'up' });
      }
    }
    if (currentLow && previousLow &&
        Math.abs(currentLow.price - previousLow.price) <= cfg.equalLevelTolerance) {
      const pool = Math.min(currentLow.price, previousLow.price);
      if (below(pool, close)) {
        targets.push({ price: pool, origin: 'equal-lows', drawDirection: 'down' });
      }
    }
  }

  return targets;
}

function agreesWithBias(target: LiquidityTarget, bias: Bias): boolean {
  if (bias === 'neutral') return true;
  return bias === 'bullish' ? target.drawDirection === 'up' : target.drawDirection === 'down';
}

/** Nearest aligned target; ties keep the earlier candidate */
export function selectDrawTarget(
  input: LiquidityInput,
  config: Partial<LiquidityConfig> = {}
): DrawSelection {
  const candidates = collectLiquidityTargets(input, config);
  let primary: LiquidityTarget | null = null;

  for (const target of candidates) {
    if (!agreesWithBias(target, input.bias)) continue;
    if (!primary || Math.abs(target.price - input.close) < Math.abs(primary.price - input.close)) {
      primary = target;
    }
  }

  return { candidates, primary };
}
