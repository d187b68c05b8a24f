import { describe, it, expect } from 'vitest';
import { createDecisionEngine, type BarResult, type EngineState } from './decisionEngine.js';
import type { Bar } from '../modules/smartMoney/types.js';
import type { EngineConfigOverrides } from '../validation/schemas.js';
import { activeZones } from './zoneArena.js';
import { BREAKER_RETAP_ROWS, minuteBars, testConfig } from '../testing/fixtures.js';

const NEXT_DAY: Bar = {
  open: 21850,
  high: 21852,
  low: 21849,
  close: 21851,
  startTime: Date.UTC(2024, 0, 17, 10, 0),
  complete: true,
};

function run(bars: readonly Bar[], config = testConfig()): { state: EngineState; results: BarResult[] } {
  const engine = createDecisionEngine(config);
  let state = engine.initialState();
  const results: BarResult[] = [];
  for (const bar of bars) {
    const result = engine.processBar(state, bar);
    results.push(result);
    state = result.state;
  }
  return { state, results };
}

describe('processBar', () => {
  it('should turn a violated order block into a breaker and short its retap', () => {
    const { state, results } = run(minuteBars(BREAKER_RETAP_ROWS));

    const events = results.flatMap(r => r.events).map(e => [e.barIndex, e.kind, e.tag]);
    expect(events).toEqual([
      [3, 'zone-created', 'order-block bullish 21850.00-21860.00'],
      [4, 'swing-confirmed', 'swing-low @2'],
      [6, 'swing-confirmed', 'swing-high @4'],
      [7, 'zone-invalidated', 'order-block bullish 21850.00-21860.00 violated'],
      [7, 'zone-created', 'breaker bearish 21850.00-21860.00'],
      [8, 'pending-set', 'breaker-retap 21850.00-21860.00'],
      [9, 'swing-confirmed', 'swing-low @7'],
      [9, 'entry-short', 'breaker-retap 21850.00-21860.00'],
    ]);

    expect(results[9].commands).toEqual([{ type: 'open', side: 'short', quantity: 2, price: 21855 }]);
    expect(state.trade).toMatchObject({ entryPrice: 21855, stopPrice: 21867, targetPrice: 21831 });
    expect(state.daily.tradesToday).toBe(1);
  });

  it('should stop out the short when price trades back through the stop', () => {
    const bars = minuteBars([...BREAKER_RETAP_ROWS, [21856, 21868, 21855, 21866]]);

    const { state, results } = run(bars);

    expect(results[10].commands).toEqual([{ type: 'close-all', reason: 'stop', price: 21867 }]);
    expect(state.trade).toBeNull();
  });

  it('should flatten and reset on the first bar of a new day', () => {
    const { state, results } = run([...minuteBars(BREAKER_RETAP_ROWS), NEXT_DAY]);

    const last = results[10];
    expect(last.events.map(e => [e.kind, e.tag])).toEqual([
      ['exit', 'end-of-day breaker-retap'],
      ['daily-reset', '2024-01-16 -> 2024-01-17'],
    ]);
    expect(last.commands).toEqual([{ type: 'close-all', reason: 'end-of-day', price: 21850 }]);
    expect(state.daily).toMatchObject({ dayKey: '2024-01-17', tradesToday: 0 });
    expect(activeZones(state.zones)).toEqual([]);
  });

  it('should ignore a bar it has already processed', () => {
    const bars = minuteBars(BREAKER_RETAP_ROWS);
    const engine = createDecisionEngine(testConfig());
    let state = engine.initialState();
    for (const bar of bars) state = engine.processBar(state, bar).state;

    const replayed = engine.processBar(state, bars[9]);

    expect(replayed.state).toBe(state);
    expect(replayed.events).toEqual([]);
    expect(replayed.commands).toEqual([]);
  });

  it('should ignore an incomplete bar', () => {
    const engine = createDecisionEngine(testConfig());
    const state = engine.initialState();
    const [bar] = minuteBars([BREAKER_RETAP_ROWS[0]]);

    const result = engine.processBar(state, { ...bar, complete: false });

    expect(result.state).toBe(state);
    expect(result.state.barIndex).toBe(-1);
  });

  it('should leave the state it was given untouched', () => {
    const bars = minuteBars(BREAKER_RETAP_ROWS);
    const engine = createDecisionEngine(testConfig());
    let state = engine.initialState();
    for (const bar of bars.slice(0, 9)) state = engine.processBar(state, bar).state;
    const before = structuredClone(state);

    engine.processBar(state, bars[9]);

    expect(state).toEqual(before);
  });

  it('should produce identical output on replay', () => {
    const bars = minuteBars(BREAKER_RETAP_ROWS);

    const first = run(bars).results.flatMap(r => r.events);
    const second = run(bars).results.flatMap(r => r.events);

    expect(second).toEqual(first);
  });

  it('should not enter when no draw-on-liquidity target is available', () => {
    // every liquidity source disabled
    const config = testConfig({
      requireDrawTarget: true,
      useSessionLevels: false,
      useSwingLevels: false,
      useEqualLevels: false,
    });

    const { state, results } = run(minuteBars(BREAKER_RETAP_ROWS), config);

    expect(results.flatMap(r => r.events).some(e => e.kind === 'pending-set')).toBe(false);
    expect(state.trade).toBeNull();
  });

  it('should fill a pending retap after the trade window closes', () => {
    const { results } = run(minuteBars(BREAKER_RETAP_ROWS), testConfig({ tradeEnd: '10:09' }));

    const kinds = results.flatMap(r => r.events).map(e => [e.barIndex, e.kind]);
    expect(kinds).toContainEqual([8, 'pending-set']);
    expect(kinds).toContainEqual([9, 'entry-short']);
    expect(kinds.some(([, kind]) => kind === 'pending-cancelled')).toBe(false);
  });

  it('should keep a second entry out while a trade is open', () => {
    const bars = minuteBars([...BREAKER_RETAP_ROWS, [21855, 21859, 21852, 21854], [21854, 21858, 21851, 21853]]);

    const { results } = run(bars);

    const entries = results.flatMap(r => r.events).filter(e => e.kind === 'entry-short' || e.kind === 'entry-long');
    expect(entries).toHaveLength(1);
  });
});

describe('processBar with a higher timeframe', () => {
  // Hourly bars on the previous day: higher lows into a close above the average
  const PRIOR_DAY: Bar[] = minuteBars(
    [
      [21920, 21925, 21915, 21922],
      [21922, 21928, 21910, 21912],
      [21912, 21915, 21900, 21905],
      [21905, 21930, 21904, 21928],
      [21928, 21940, 21920, 21935],
      [21935, 21938, 21918, 21920],
      [21920, 21924, 21912, 21915],
      [21915, 21945, 21914, 21942],
      [21942, 21960, 21938, 21958],
    ],
    Date.UTC(2024, 0, 15, 10, 0),
    60
  );
  const bars = [...PRIOR_DAY, ...minuteBars(BREAKER_RETAP_ROWS)];
  const htf = (overrides: EngineConfigOverrides) =>
    testConfig({ htfMinutes: 60, biasMaPeriod: 3, requireIntradayAlign: false, ...overrides });
  const todaysEntries = (results: BarResult[]) =>
    results
      .flatMap(r => r.events)
      .filter(e => e.barIndex >= 9 && (e.kind === 'entry-long' || e.kind === 'entry-short'))
      .map(e => [e.barIndex, e.kind]);

  it('should turn bullish once the last prior-day hour closes', () => {
    const { state, results } = run(bars, htf({ htfMode: 'strict' }));

    expect(results[8].state.htf.bias).toBe('neutral');
    expect(results[9].state.htf.bias).toBe('bullish');
    expect(state.htf.swings.currentLow).toEqual({ kind: 'low', price: 21912, barIndex: 6 });
  });

  it('should block the counter-trend retap in strict mode', () => {
    const { results } = run(bars, htf({ htfMode: 'strict' }));

    expect(results.slice(9).flatMap(r => r.events).some(e => e.kind === 'pending-set')).toBe(false);
    expect(todaysEntries(results)).toEqual([]);
  });

  it('should allow the retap in loose mode only for listed models', () => {
    expect(todaysEntries(run(bars, htf({ htfMode: 'loose' })).results)).toEqual([]);
    expect(
      todaysEntries(run(bars, htf({ htfMode: 'loose', looseCounterTrendModels: ['breaker-retap'] })).results)
    ).toEqual([[18, 'entry-short']]);
  });

  it('should ignore the higher timeframe when it is off', () => {
    const { state, results } = run(bars, htf({ htfMode: 'off' }));

    expect(state.htf.bias).toBe('neutral');
    expect(todaysEntries(results)).toEqual([[18, 'entry-short']]);
  });
});
