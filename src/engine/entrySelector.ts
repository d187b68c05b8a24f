/**
 * Entry Model Selector
 *
 * Two-state machine with a single pending slot:
 *   idle    -> pending   first permitted setup in priority order
 *   pending -> idle      rejection candle confirms (triggered), wait window exceeded (timeout),
 *                        flatten cutoff reached (cancelled)
 * Entry gates only hold back new setups; a pending slot runs to confirmation or timeout.
 * While pending nothing else is evaluated.
 *
 * Priority: unicorn > breaker-retap > ifvg-flip > ob-mean-bounce
 */

import type {
  Direction,
  IndexedBar,
  Zone,
  ZoneHandle,
} from '../modules/smartMoney/types.js';
import { overlapOf } from '../modules/smartMoney/balancedRanges.js';
import type { EngineConfig, EntryModel } from '../validation/schemas.js';
import type { TradeSide } from './events.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface PendingEntry {
  model: EntryModel;
  direction: Direction;
  /** Geometry the confirmation is measured against (the overlap for unicorn) */
  top: number;
  bottom: number;
  mean: number;
  source: ZoneHandle;
  sweptExtreme: number | null;
  barIndex: number;
}

export interface EntrySignal extends PendingEntry {
  side: TradeSide;
  confirmedAt: number;
}

export type EntryState =
  | { status: 'idle' }
  | { status: 'pending'; pending: PendingEntry };

export type EntryOutcome =
  | { kind: 'none' }
  | { kind: 'pending-set'; pending: PendingEntry }
  | { kind: 'waiting'; pending: PendingEntry }
  | { kind: 'timeout'; pending: PendingEntry }
  | { kind: 'cancelled'; pending: PendingEntry; reason: string }
  | { kind: 'triggered'; signal: EntrySignal };

export interface EntryTransition {
  state: EntryState;
  outcome: EntryOutcome;
}

export interface EntryInput {
  bar: IndexedBar;
  /** Active zones after this bar's lifecycle pass, oldest first */
  zones: readonly Zone[];
  /** Gates for new setups */
  gate: { open: boolean; reason: string };
  /** At or past the forced-flat time; no entry may fill */
  pastFlatten: boolean;
  permits: (direction: Direction, model: EntryModel) => boolean;
}

export type EntryConfig = Pick<
  EngineConfig,
  | 'enableUnicorn'
  | 'enableBreakerRetap'
  | 'enableIfvgFlip'
  | 'enableObMeanBounce'
  | 'obMeanThreshold'
  | 'maxWaitBars'
  | 'confirmOnSignalBar'
>;

type SetupCandidate = Omit<PendingEntry, 'mean' | 'barIndex'>;

interface SetupMatcher {
  model: EntryModel;
  enabled: (cfg: EntryConfig) => boolean;
  /** Matches newest zone first */
  match: (zones: readonly Zone[], close: number, cfg: EntryConfig) => SetupCandidate[];
}

export const IDLE: EntryState = { status: 'idle' };

// ═══════════════════════════════════════════════════════════════
// SETUP CHAIN
// ═══════════════════════════════════════════════════════════════

function inside(close: number, zone: { top: number; bottom: number }): boolean {
  return close >= zone.bottom && close <= zone.top;
}

function newestFirst(zones: readonly Zone[]): Zone[] {
  return [...zones].reverse();
}

const SETUP_CHAIN: readonly SetupMatcher[] = [
  {
    model: 'unicorn',
    enabled: cfg => cfg.enableUnicorn,
    match: (zones, close) => {
      const ordered = newestFirst(zones);
      const out: SetupCandidate[] = [];
      for (const breaker of ordered) {
        if (breaker.kind !== 'breaker') continue;
        for (const partner of ordered) {
          if (partner.kind !== 'balanced-range' && partner.kind !== 'inverted-fvg') continue;
          if (partner.direction !== breaker.direction) continue;
          const overlap = overlapOf(breaker, partner);
          if (!overlap || !inside(close, overlap)) continue;
          out.push({
            model: 'unicorn',
            direction: breaker.direction,
            top: overlap.top,
            bottom: overlap.bottom,
            source: breaker.id,
            sweptExtreme: breaker.sweptExtreme,
          });
        }
      }
      return out;
    },
  },
  {
    model: 'breaker-retap',
    enabled: cfg => cfg.enableBreakerRetap,
    match: (zones, close) => newestFirst(zones).flatMap(zone =>
      zone.kind === 'breaker' && inside(close, zone)
        ? [{
            model: 'breaker-retap' as const,
            direction: zone.direction,
            top: zone.top,
            bottom: zone.bottom,
            source: zone.id,
            sweptExtreme: zone.sweptExtreme,
          }]
        : []
    ),
  },
  {
    model: 'ifvg-flip',
    enabled: cfg => cfg.enableIfvgFlip,
    match: (zones, close) => newestFirst(zones).flatMap(zone =>
      zone.kind === 'inverted-fvg' && inside(close, zone)
        ? [{
            model: 'ifvg-flip' as const,
            direction: zone.direction,
            top: zone.top,
            bottom: zone.bottom,
            source: zone.id,
            sweptExtreme: null,
          }]
        : []
    ),
  },
  {
    model: 'ob-mean-bounce',
    enabled: cfg => cfg.enableObMeanBounce,
    match: (zones, close, cfg) => newestFirst(zones).flatMap(zone => {
      if (zone.kind !== 'order-block' || zone.flippedToBreaker || !inside(close, zone)) return [];
      if (cfg.obMeanThreshold) {
        const crossedMean = zone.direction === 'bullish' ? close < zone.mean : close > zone.mean;
        if (crossedMean) return [];
      }
      return [{
        model: 'ob-mean-bounce' as const,
        direction: zone.direction,
        top: zone.top,
        bottom: zone.bottom,
        source: zone.id,
        sweptExtreme: null,
      }];
    }),
  },
];

export function findSetup(input: EntryInput, cfg: EntryConfig): PendingEntry | null {
  for (const matcher of SETUP_CHAIN) {
    if (!matcher.enabled(cfg)) continue;
    for (const candidate of matcher.match(input.zones, input.bar.close, cfg)) {
      if (!input.permits(candidate.direction, candidate.model)) continue;
      return {
        ...candidate,
        mean: (candidate.top + candidate.bottom) / 2,
        barIndex: input.bar.index,
      };
    }
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════
// TRANSITIONS
// ═══════════════════════════════════════════════════════════════

/** Close beyond open and at or beyond the mean, in the trade direction */
export function isRejection(pending: PendingEntry, bar: IndexedBar): boolean {
  return pending.direction === 'bullish'
    ? bar.close > bar.open && bar.close >= pending.mean
    : bar.close < bar.open && bar.close <= pending.mean;
}

function trigger(pending: PendingEntry, bar: IndexedBar): EntryTransition {
  return {
    state: IDLE,
    outcome: {
      kind: 'triggered',
      signal: {
        ...pending,
        side: pending.direction === 'bullish' ? 'long' : 'short',
        confirmedAt: bar.index,
      },
    },
  };
}

function fromIdle(input: EntryInput, cfg: EntryConfig): EntryTransition {
  if (!input.gate.open) {
    return { state: IDLE, outcome: { kind: 'none' } };
  }

  const pending = findSetup(input, cfg);
  if (!pending) {
    return { state: IDLE, outcome: { kind: 'none' } };
  }

  if (cfg.confirmOnSignalBar && isRejection(pending, input.bar)) {
    return trigger(pending, input.bar);
  }

  return { state: { status: 'pending', pending }, outcome: { kind: 'pending-set', pending } };
}

function fromPending(pending: PendingEntry, input: EntryInput, cfg: EntryConfig): EntryTransition {
  const { bar } = input;

  if (input.pastFlatten) {
    return { state: IDLE, outcome: { kind: 'cancelled', pending, reason: 'Past flatten cutoff' } };
  }

  if (bar.index - pending.barIndex > cfg.maxWaitBars) {
    return { state: IDLE, outcome: { kind: 'timeout', pending } };
  }

  if (bar.index > pending.barIndex && isRejection(pending, bar)) {
    return trigger(pending, bar);
  }

  return { state: { status: 'pending', pending }, outcome: { kind: 'waiting', pending } };
}

export function stepEntry(state: EntryState, input: EntryInput, cfg: EntryConfig): EntryTransition {
  switch (state.status) {
    case 'idle':
      return fromIdle(input, cfg);
    case 'pending':
      return fromPending(state.pending, input, cfg);
  }
}
