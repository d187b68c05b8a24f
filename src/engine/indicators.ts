/**
 * Incremental indicators kept in engine state.
 * EMA is seeded with the SMA of its first `period` closes; ATR uses Wilder smoothing.
 */

import type { Bar } from '../modules/smartMoney/types.js';

export interface EmaState {
  period: number;
  value: number | null;
  seedSum: number;
  seedCount: number;
}

export interface AtrState {
  period: number;
  value: number | null;
  prevClose: number | null;
  seedSum: number;
  seedCount: number;
}

export function createEma(period: number): EmaState {
  return { period, value: null, seedSum: 0, seedCount: 0 };
}

export function createAtr(period: number): AtrState {
  return { period, value: null, prevClose: null, seedSum: 0, seedCount: 0 };
}

export function updateEma(state: EmaState, close: number): EmaState {
  if (state.value === null) {
    const seedSum = state.seedSum + close;
    const seedCount = state.seedCount + 1;
    const value = seedCount >= state.period ? seedSum / seedCount : null;
    return { ...state, seedSum, seedCount, value };
  }

  const k = 2 / (state.period + 1);
  return { ...state, value: close * k + state.value * (1 - k) };
}

export function trueRange(bar: Bar, prevClose: number | null): number {
  if (prevClose === null) return bar.high - bar.low;
  return Math.max(
    bar.high - bar.low,
    Math.abs(bar.high - prevClose),
    Math.abs(bar.low - prevClose)
  );
}

export function updateAtr(state: AtrState, bar: Bar): AtrState {
  const tr = trueRange(bar, state.prevClose);

  if (state.value === null) {
    const seedSum = state.seedSum + tr;
    const seedCount = state.seedCount + 1;
    const value = seedCount >= state.period ? seedSum / seedCount : null;
    return { ...state, seedSum, seedCount, value, prevClose: bar.close };
  }

  const value = (state.value * (state.period - 1) + tr) / state.period;
  return { ...state, value, prevClose: bar.close };
}
