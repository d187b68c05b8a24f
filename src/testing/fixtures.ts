/**
 * Bar and config builders shared by the test suites.
 */

import type {
  Bar,
  BalancedRangeZone,
  BreakerZone,
  Direction,
  FairValueGapZone,
  IndexedBar,
  InvertedFvgZone,
  OrderBlockZone,
  SwingPoint,
  SwingState,
  ZoneHandle,
} from '../modules/smartMoney/types.js';
import { loadEngineConfig } from '../config/engineConfig.js';
import type { EngineConfig, EngineConfigOverrides } from '../validation/schemas.js';

export type Ohlc = [open: number, high: number, low: number, close: number];

/** 2024-01-16 10:00 UTC */
export const BASE_TIME = Date.UTC(2024, 0, 16, 10, 0);
export const MINUTE = 60_000;

export function indexed(rows: readonly Ohlc[], firstIndex = 0): IndexedBar[] {
  return rows.map(([open, high, low, close], i) => ({
    open,
    high,
    low,
    close,
    startTime: BASE_TIME + (firstIndex + i) * MINUTE,
    complete: true,
    index: firstIndex + i,
  }));
}

export function barAt(index: number, [open, high, low, close]: Ohlc): IndexedBar {
  return { open, high, low, close, startTime: BASE_TIME + index * MINUTE, complete: true, index };
}

export function minuteBars(rows: readonly Ohlc[], start = BASE_TIME, stepMinutes = 1): Bar[] {
  return rows.map(([open, high, low, close], i) => ({
    open,
    high,
    low,
    close,
    startTime: start + i * stepMinutes * MINUTE,
    complete: true,
  }));
}

export function swing(kind: SwingPoint['kind'], price: number, barIndex = 0): SwingPoint {
  return { kind, price, barIndex };
}

export function swings(partial: Partial<SwingState> = {}): SwingState {
  return {
    currentHigh: null,
    previousHigh: null,
    currentLow: null,
    previousLow: null,
    ...partial,
  };
}

// Zone builders: slot doubles as creation order
interface ZoneSpec {
  direction: Direction;
  top: number;
  bottom: number;
  slot: number;
  birthIndex?: number;
}

function base({ direction, top, bottom, slot, birthIndex = 0 }: ZoneSpec) {
  return {
    id: { slot, generation: 0 },
    sequence: slot,
    top,
    bottom,
    mean: (top + bottom) / 2,
    birthIndex,
    direction,
    validity: 'active' as const,
  };
}

export function obZone(spec: ZoneSpec): OrderBlockZone {
  return { ...base(spec), kind: 'order-block', candleCount: 2, flippedToBreaker: false };
}

export function breakerZone(spec: ZoneSpec, sweptExtreme: number | null = null): BreakerZone {
  return { ...base(spec), kind: 'breaker', origin: 'ob-flip', sweptExtreme };
}

export function fvgZone(spec: ZoneSpec): FairValueGapZone {
  return { ...base(spec), kind: 'fair-value-gap', gapSize: spec.top - spec.bottom };
}

export function ifvgZone(spec: ZoneSpec, sourceGap: ZoneHandle = { slot: 99, generation: 0 }): InvertedFvgZone {
  return { ...base(spec), kind: 'inverted-fvg', sourceGap };
}

export function bprZone(spec: ZoneSpec, legs: [ZoneHandle, ZoneHandle]): BalancedRangeZone {
  return { ...base(spec), kind: 'balanced-range', legs };
}

/** UTC clock, all-day window, no bias or draw gating */
export function testConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  return loadEngineConfig({
    timezone: 'UTC',
    htfMode: 'off',
    requireDrawTarget: false,
    tradeStart: '00:00',
    tradeEnd: '23:59',
    forcedFlatTime: '23:58',
    ...overrides,
  });
}

/**
 * Breaker retap short on 1-minute bars:
 * bullish OB [21850,21860] at bar 3, swing high 21865 confirmed at bar 6,
 * OB closed through at bar 7 (bearish breaker), retap at bar 8, rejection at bar 9.
 */
export const BREAKER_RETAP_ROWS: readonly Ohlc[] = [
  [21852, 21858, 21851, 21857],
  [21858, 21860, 21853, 21854],
  [21854, 21856, 21850, 21851],
  [21852, 21863, 21851, 21862],
  [21862, 21865, 21857, 21863],
  [21863, 21864, 21861, 21861],
  [21861, 21863, 21860, 21862],
  [21862, 21862, 21846, 21848],
  [21849, 21859, 21848, 21855],
  [21858, 21859, 21853, 21855],
];
