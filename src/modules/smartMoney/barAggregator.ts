/**
 * Higher-timeframe bar aggregation.
 * State is plain data so it can live inside the engine state and be cloned with it.
 * Buckets count from midnight on whatever clock `minuteOfDay` reads.
 */

import type { Bar } from './types.js';

export interface AggregatorState {
  bucketMinutes: number;
  bucketStart: number | null;
  current: Bar | null;
}

export interface AggregatorPush {
  state: AggregatorState;
  /** The bucket that closed because this bar opened a new one */
  finished: Bar | null;
}

export function createAggregator(bucketMinutes: number): AggregatorState {
  return { bucketMinutes, bucketStart: null, current: null };
}

const MINUTE_MS = 60 * 1000;

export type MinuteOfDay = (ts: number) => number;

const utcMinuteOfDay: MinuteOfDay = ts => {
  const d = new Date(ts);
  return d.getUTCHours() * 60 + d.getUTCMinutes();
};

export function floorToBucket(
  ts: number,
  bucketMinutes: number,
  minuteOfDay: MinuteOfDay = utcMinuteOfDay
): number {
  const minuteStart = ts - (((ts % MINUTE_MS) + MINUTE_MS) % MINUTE_MS);
  return minuteStart - (minuteOfDay(ts) % bucketMinutes) * MINUTE_MS;
}

/** Push a closed bar; returns the finished bucket once a bar lands in the next one */
export function pushBar(state: AggregatorState, bar: Bar, minuteOfDay: MinuteOfDay = utcMinuteOfDay): AggregatorPush {
  const start = floorToBucket(bar.startTime, state.bucketMinutes, minuteOfDay);
  const opened: Bar = { ...bar, startTime: start, complete: false };

  if (state.bucketStart === null || state.current === null) {
    return { state: { ...state, bucketStart: start, current: opened }, finished: null };
  }

  if (start !== state.bucketStart) {
    const finished: Bar = { ...state.current, complete: true };
    return { state: { ...state, bucketStart: start, current: opened }, finished };
  }

  const cur = state.current;
  const merged: Bar = {
    ...cur,
    high: Math.max(cur.high, bar.high),
    low: Math.min(cur.low, bar.low),
    close: bar.close,
  };
  return { state: { ...state, current: merged }, finished: null };
}
