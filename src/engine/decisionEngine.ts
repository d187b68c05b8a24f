/**
 * Decision Engine
 * Runs once per closed bar over an explicit state value:
 *
 *   processBar(state, bar) -> { state, events, commands }
 *
 * The input state is never mutated; the bar is applied to a structured clone.
 * Order per bar: day rollover, context (swings, indicators, bias), detectors, zone lifecycle,
 * draw on liquidity, then trade management when in a position or entry selection when flat,
 * and finally the zone sweep.
 */

import type {
  Bar,
  Bias,
  Direction,
  IndexedBar,
  LiquidityTarget,
  SwingState,
  Zone,
} from '../modules/smartMoney/types.js';
import { emptySwingState, updateSwings } from '../modules/smartMoney/swingTracker.js';
import { detectOrderBlock } from '../modules/smartMoney/orderBlocks.js';
import { detectFairValueGap } from '../modules/smartMoney/fairValueGaps.js';
import { detectStructureBreaker, findBreakerFlips } from '../modules/smartMoney/breakers.js';
import { findInversions } from '../modules/smartMoney/inversions.js';
import { findBalancedRanges } from '../modules/smartMoney/balancedRanges.js';
import { selectDrawTarget } from '../modules/smartMoney/liquidity.js';
import { createAggregator, pushBar, type AggregatorState } from '../modules/smartMoney/barAggregator.js';
import type { EngineConfig, EntryModel } from '../validation/schemas.js';
import { createSessionClock, type SessionClock } from '../utils/timeUtils.js';
import { createLogger } from '../services/logger.js';
import {
  activeOfKind,
  activeZones,
  ageZones,
  clearArena,
  createArena,
  insertZone,
  markFlipped,
  pruneKind,
  setValidity,
  sweepZones,
  type ZoneArena,
  type ZoneRetirement,
} from './zoneArena.js';
import { createAtr, createEma, updateAtr, updateEma, type AtrState, type EmaState } from './indicators.js';
import { analyzeBias, checkBiasPermission } from './biasFilter.js';
import { IDLE, stepEntry, type EntryState } from './entrySelector.js';
import { closeTrade, manageTrade, openTrade, type Trade } from './tradeManager.js';
import {
  checkEntryGate,
  emptyDailyState,
  extendSession,
  isPastFlatten,
  recordEntry,
  rollDay,
  sideAvailable,
  type DailyState,
  type EntryGate,
} from './dailyController.js';
import {
  formatBounds,
  type EngineCommand,
  type EngineEvent,
  type EngineEventKind,
} from './events.js';

const logger = createLogger('DecisionEngine');

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface HtfState {
  aggregator: AggregatorState;
  bars: IndexedBar[];
  nextIndex: number;
  swings: SwingState;
  ema: EmaState;
  bias: Bias;
}

export interface EngineState {
  /** Index of the last processed bar, -1 before the first */
  barIndex: number;
  lastBarTime: number | null;
  /** Recent bars across days, for swings */
  history: IndexedBar[];
  /** First bar index of the current trading day; detectors only see bars from here */
  dayStartIndex: number;
  swings: SwingState;
  ema: EmaState;
  atr: AtrState;
  htf: HtfState;
  zones: ZoneArena;
  daily: DailyState;
  entry: EntryState;
  trade: Trade | null;
  bias: Bias;
  primaryTarget: LiquidityTarget | null;
}

export interface BarResult {
  state: EngineState;
  events: EngineEvent[];
  commands: EngineCommand[];
}

export interface EngineContext {
  config: EngineConfig;
  clock: SessionClock;
}

export interface DecisionEngine extends EngineContext {
  initialState(): EngineState;
  processBar(state: EngineState, bar: Bar): BarResult;
}

const MIN_HISTORY = 64;
const HTF_HISTORY = 64;

type Emit = (kind: EngineEventKind, price: number, tag: string) => void;

// ═══════════════════════════════════════════════════════════════
// STATE
// ═══════════════════════════════════════════════════════════════

export function createEngineState(config: EngineConfig): EngineState {
  return {
    barIndex: -1,
    lastBarTime: null,
    history: [],
    dayStartIndex: 0,
    swings: emptySwingState(),
    ema: createEma(config.biasMaPeriod),
    atr: createAtr(config.atrPeriod),
    htf: {
      aggregator: createAggregator(config.htfMinutes),
      bars: [],
      nextIndex: 0,
      swings: emptySwingState(),
      ema: createEma(config.biasMaPeriod),
      bias: 'neutral',
    },
    zones: createArena(),
    daily: emptyDailyState(),
    entry: IDLE,
    trade: null,
    bias: 'neutral',
    primaryTarget: null,
  };
}

function historyLimit(config: EngineConfig): number {
  return Math.max(
    MIN_HISTORY,
    config.breakerSweepLookback + 2,
    config.swingLeftStrength + config.swingRightStrength + 1,
    config.obMaxCandles + 2
  );
}

function zoneTag(zone: Zone): string {
  return `${zone.kind} ${zone.direction} ${formatBounds(zone.bottom, zone.top)}`;
}

// ═══════════════════════════════════════════════════════════════
// HIGHER TIMEFRAME
// ═══════════════════════════════════════════════════════════════

function advanceHtf(htf: HtfState, bar: Bar, config: EngineConfig, clock: SessionClock): HtfState {
  if (config.htfMode === 'off') return htf;

  const pushed = pushBar(htf.aggregator, bar, ts => clock.minuteOfDay(ts));
  if (!pushed.finished) {
    return { ...htf, aggregator: pushed.state };
  }

  const finished: IndexedBar = { ...pushed.finished, index: htf.nextIndex };
  const bars = [...htf.bars, finished].slice(-HTF_HISTORY);
  const swings = updateSwings(htf.swings, bars, {
    leftStrength: config.swingLeftStrength,
    rightStrength: config.swingRightStrength,
  }).state;
  const ema = updateEma(htf.ema, finished.close);
  const bias = analyzeBias(finished.close, ema.value, swings).bias;

  if (bias !== htf.bias) {
    logger.debug(`HTF bias ${htf.bias} -> ${bias}`, { close: finished.close, ema: ema.value });
  }

  return { aggregator: pushed.state, bars, nextIndex: htf.nextIndex + 1, swings, ema, bias };
}

// ═══════════════════════════════════════════════════════════════
// DETECTORS
// ═══════════════════════════════════════════════════════════════

function hasActiveTwin(arena: ZoneArena, zone: Pick<Zone, 'kind' | 'direction' | 'top' | 'bottom'>): boolean {
  return activeZones(arena).some(z =>
    z.kind === zone.kind && z.direction === zone.direction && z.top === zone.top && z.bottom === zone.bottom
  );
}

function runDetectors(
  state: EngineState,
  bar: IndexedBar,
  dayBars: readonly IndexedBar[],
  config: EngineConfig,
  emit: Emit
): void {
  const arena = state.zones;

  const created = (zone: Zone | null): void => {
    if (!zone) return;
    emit('zone-created', zone.mean, zoneTag(zone));
    logger.debug(`Zone created: ${zoneTag(zone)}`, { birthIndex: zone.birthIndex });
  };

  // Transitions of zones born on earlier bars
  for (const flip of findBreakerFlips(activeOfKind(arena, 'order-block'), bar)) {
    markFlipped(arena, flip.source.id);
    emit('zone-invalidated', bar.close, `${zoneTag(flip.source)} violated`);
    created(insertZone(arena, flip.draft));
  }

  for (const inversion of findInversions(activeOfKind(arena, 'fair-value-gap'), bar)) {
    setValidity(arena, inversion.source.id, 'consumed');
    emit('zone-invalidated', bar.close, `${zoneTag(inversion.source)} consumed`);
    created(insertZone(arena, inversion.draft));
  }

  // New structure from the day's bars
  const ob = detectOrderBlock(dayBars, {
    minCandles: config.obMinCandles,
    maxCandles: config.obMaxCandles,
    bounds: config.obBounds,
  });
  if (ob && !hasActiveTwin(arena, ob)) created(insertZone(arena, ob));

  const fvg = detectFairValueGap(dayBars, { minGap: config.fvgMinGap });
  if (fvg && !hasActiveTwin(arena, fvg)) created(insertZone(arena, fvg));

  const structural = detectStructureBreaker(dayBars, state.swings, {
    sweepLookback: config.breakerSweepLookback,
    requireDisplacement: config.breakerRequireDisplacement,
    displacementPoints: config.breakerDisplacementPoints,
    bufferPoints: config.breakerBufferPoints,
  });
  if (structural) {
    const duplicate = activeOfKind(arena, 'breaker').some(b =>
      b.origin === 'structure' && b.direction === structural.direction && b.sweptExtreme === structural.sweptExtreme
    );
    if (!duplicate) created(insertZone(arena, structural));
  }

  // Confluence
  const ranges = findBalancedRanges(
    {
      gaps: activeOfKind(arena, 'fair-value-gap'),
      partners: [...activeOfKind(arena, 'inverted-fvg'), ...activeOfKind(arena, 'breaker')],
      existing: activeOfKind(arena, 'balanced-range'),
      currentIndex: bar.index,
    },
    { minWidth: config.bprMinWidth, dedupTolerance: config.bprDedupTolerance }
  );
  for (const range of ranges) created(insertZone(arena, range));
}

function runLifecycle(state: EngineState, bar: IndexedBar, config: EngineConfig, emit: Emit): void {
  const arena = state.zones;
  const retired: ZoneRetirement[] = [
    ...ageZones(arena, bar, config.zoneMaxAge),
    ...pruneKind(arena, 'order-block', config.maxOrderBlocks),
    ...pruneKind(arena, 'breaker', config.maxBreakers),
    ...pruneKind(arena, 'fair-value-gap', config.maxFairValueGaps),
    ...pruneKind(arena, 'inverted-fvg', config.maxInvertedFvgs),
    ...pruneKind(arena, 'balanced-range', config.maxBalancedRanges),
  ];

  for (const { zone, reason } of retired) {
    emit('zone-invalidated', bar.close, `${zoneTag(zone)} ${reason}`);
  }
}

// ═══════════════════════════════════════════════════════════════
// PROCESS BAR
// ═══════════════════════════════════════════════════════════════

export function processBar(state: EngineState, bar: Bar, ctx: EngineContext): BarResult {
  const { config, clock } = ctx;

  if (!bar.complete) {
    return { state, events: [], commands: [] };
  }
  if (state.lastBarTime !== null && bar.startTime <= state.lastBarTime) {
    logger.debug('Ignoring bar at or before last processed bar', {
      startTime: bar.startTime,
      lastBarTime: state.lastBarTime,
    });
    return { state, events: [], commands: [] };
  }

  const s = structuredClone(state);
  const index = s.barIndex + 1;
  const current: IndexedBar = { ...bar, index };
  const events: EngineEvent[] = [];
  const commands: EngineCommand[] = [];
  const emit: Emit = (kind, price, tag) => {
    events.push({ kind, barIndex: index, price, tag });
  };

  s.barIndex = index;
  s.lastBarTime = bar.startTime;

  // ── Day rollover ──────────────────────────────────────────────
  const dayKey = clock.dayKey(bar.startTime);
  const minuteOfDay = clock.minuteOfDay(bar.startTime);
  const roll = rollDay(s.daily, dayKey);

  if (roll.reset) {
    const previousDay = s.daily.dayKey;
    if (s.trade) {
      const flat = closeTrade(s.trade, bar.open, index, 'end-of-day');
      events.push(...flat.events);
      commands.push(...flat.commands);
      s.trade = null;
    }
    clearArena(s.zones);
    s.entry = IDLE;
    s.dayStartIndex = index;
    s.daily = roll.state;
    if (previousDay !== null) {
      emit('daily-reset', bar.open, `${previousDay} -> ${dayKey}`);
      logger.info(`Daily reset ${previousDay} -> ${dayKey}`);
    }
  }

  // ── Context ───────────────────────────────────────────────────
  s.history.push(current);
  const limit = historyLimit(config);
  if (s.history.length > limit) {
    s.history = s.history.slice(-limit);
  }
  const dayBars = s.history.filter(b => b.index >= s.dayStartIndex);

  const swingUpdate = updateSwings(s.swings, s.history, {
    leftStrength: config.swingLeftStrength,
    rightStrength: config.swingRightStrength,
  });
  s.swings = swingUpdate.state;
  for (const point of swingUpdate.confirmed) {
    emit('swing-confirmed', point.price, `swing-${point.kind} @${point.barIndex}`);
  }

  s.ema = updateEma(s.ema, bar.close);
  s.atr = updateAtr(s.atr, bar);
  s.htf = advanceHtf(s.htf, bar, config, clock);
  s.bias = analyzeBias(bar.close, s.ema.value, s.swings).bias;

  // ── Zones ─────────────────────────────────────────────────────
  runDetectors(s, current, dayBars, config, emit);
  runLifecycle(s, current, config, emit);

  // ── Draw on liquidity (session extremes exclude this bar) ─────
  const draw = selectDrawTarget(
    {
      close: bar.close,
      bias: s.bias,
      sessionHigh: s.daily.sessionHigh,
      sessionLow: s.daily.sessionLow,
      swings: s.swings,
    },
    {
      useSessionLevels: config.useSessionLevels,
      useSwingLevels: config.useSwingLevels,
      useEqualLevels: config.useEqualLevels,
      equalLevelTolerance: config.equalLevelTolerance,
    }
  );
  s.primaryTarget = draw.primary;
  s.daily = extendSession(s.daily, bar.high, bar.low);

  // ── Trade or entry ────────────────────────────────────────────
  if (s.trade) {
    const step = manageTrade(s.trade, current, {
      config,
      forceFlat: isPastFlatten(minuteOfDay, config),
      atr: s.atr.value,
    });
    s.trade = step.trade;
    events.push(...step.events);
    commands.push(...step.commands);
  } else {
    const sessionGate = checkEntryGate(s.daily, minuteOfDay, bar.startTime, config);
    const gate: EntryGate = sessionGate.open && config.requireDrawTarget && !draw.primary
      ? { open: false, reason: 'No draw-on-liquidity target' }
      : sessionGate;

    const daily = s.daily;
    const arena = s.zones;
    const permits = (direction: Direction, model: EntryModel): boolean => {
      const side = direction === 'bullish' ? 'long' : 'short';
      if (side === 'long' ? !config.allowLong : !config.allowShort) return false;
      if (!sideAvailable(daily, side, config)) return false;
      return checkBiasPermission(direction, model, s.bias, s.htf.bias, config).allowed;
    };

    const transition = stepEntry(
      s.entry,
      {
        bar: current,
        zones: activeZones(arena),
        gate,
        pastFlatten: isPastFlatten(minuteOfDay, config),
        permits,
      },
      config
    );
    s.entry = transition.state;

    const outcome = transition.outcome;
    switch (outcome.kind) {
      case 'pending-set':
        emit('pending-set', bar.close, `${outcome.pending.model} ${formatBounds(outcome.pending.bottom, outcome.pending.top)}`);
        break;
      case 'timeout':
        emit('pending-timeout', bar.close, `${outcome.pending.model} expired after ${config.maxWaitBars} bars`);
        break;
      case 'cancelled':
        emit('pending-cancelled', bar.close, `${outcome.pending.model} ${outcome.reason}`);
        break;
      case 'triggered': {
        const opened = openTrade(outcome.signal, current, {
          config,
          swings: s.swings,
          primaryTarget: s.primaryTarget,
        });
        s.trade = opened.trade;
        s.daily = recordEntry(s.daily, outcome.signal.side, bar.startTime);
        events.push(...opened.events);
        commands.push(...opened.commands);
        break;
      }
      case 'none':
      case 'waiting':
        break;
    }
  }

  sweepZones(s.zones);

  return { state: s, events, commands };
}

export function createDecisionEngine(
  config: EngineConfig,
  clock: SessionClock = createSessionClock(config.timezone)
): DecisionEngine {
  const ctx: EngineContext = { config, clock };
  return {
    config,
    clock,
    initialState: () => createEngineState(config),
    processBar: (state, bar) => processBar(state, bar, ctx),
  };
}
