/**
 * Daily / Session Controller
 * Calendar-day rollover, per-day trade counters and entry gates.
 */

import type { EngineConfig } from '../validation/schemas.js';
import type { TradeSide } from './events.js';
import { clockToMinutes } from '../utils/timeUtils.js';

export interface DailyState {
  dayKey: string | null;
  tradesToday: number;
  longUsed: boolean;
  shortUsed: boolean;
  lastTradeTime: number | null;
  sessionHigh: number | null;
  sessionLow: number | null;
}

export interface DayRoll {
  state: DailyState;
  reset: boolean;
}

export interface EntryGate {
  open: boolean;
  reason: string;
}

export type SessionConfig = Pick<
  EngineConfig,
  | 'tradeStart'
  | 'tradeEnd'
  | 'forcedFlatEnabled'
  | 'forcedFlatTime'
  | 'maxTradesPerDay'
  | 'cooldownMinutes'
>;

export function emptyDailyState(dayKey: string | null = null): DailyState {
  return {
    dayKey,
    tradesToday: 0,
    longUsed: false,
    shortUsed: false,
    lastTradeTime: null,
    sessionHigh: null,
    sessionLow: null,
  };
}

/** Reset exactly once when the bar's calendar day differs from the stored one */
export function rollDay(state: DailyState, dayKey: string): DayRoll {
  if (state.dayKey === dayKey) {
    return { state, reset: false };
  }
  return { state: emptyDailyState(dayKey), reset: true };
}

export function recordEntry(state: DailyState, side: TradeSide, time: number): DailyState {
  return {
    ...state,
    tradesToday: state.tradesToday + 1,
    longUsed: state.longUsed || side === 'long',
    shortUsed: state.shortUsed || side === 'short',
    lastTradeTime: time,
  };
}

export function extendSession(state: DailyState, high: number, low: number): DailyState {
  return {
    ...state,
    sessionHigh: state.sessionHigh === null ? high : Math.max(state.sessionHigh, high),
    sessionLow: state.sessionLow === null ? low : Math.min(state.sessionLow, low),
  };
}

/** Always false when the end-of-day flatten is switched off */
export function isPastFlatten(
  minuteOfDay: number,
  config: Pick<EngineConfig, 'forcedFlatEnabled' | 'forcedFlatTime'>
): boolean {
  return config.forcedFlatEnabled && minuteOfDay >= clockToMinutes(config.forcedFlatTime);
}

export function checkEntryGate(
  state: DailyState,
  minuteOfDay: number,
  time: number,
  config: SessionConfig
): EntryGate {
  const start = clockToMinutes(config.tradeStart);
  const end = clockToMinutes(config.tradeEnd);

  if (minuteOfDay < start || minuteOfDay >= end) {
    return { open: false, reason: 'Outside trade window' };
  }
  if (isPastFlatten(minuteOfDay, config)) {
    return { open: false, reason: 'Past flatten cutoff' };
  }
  if (state.tradesToday >= config.maxTradesPerDay) {
    return { open: false, reason: `Daily trade cap ${config.maxTradesPerDay} reached` };
  }
  if (state.lastTradeTime !== null && config.cooldownMinutes > 0) {
    const elapsedMin = (time - state.lastTradeTime) / 60_000;
    if (elapsedMin < config.cooldownMinutes) {
      return { open: false, reason: `Cooldown ${config.cooldownMinutes}m active` };
    }
  }
  return { open: true, reason: 'Open' };
}

/** One-trade-per-direction check, applied per setup direction */
export function sideAvailable(
  state: DailyState,
  side: TradeSide,
  config: Pick<EngineConfig, 'oneTradePerDirection'>
): boolean {
  if (!config.oneTradePerDirection) return true;
  return side === 'long' ? !state.longUsed : !state.shortUsed;
}
