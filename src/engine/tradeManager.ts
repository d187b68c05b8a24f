/**
 * Trade State Machine
 * flat -> open -> flat. Owns the single open trade: stop/target planning at entry, then per-bar
 * management in a fixed order.
 *
 * Exit checks, first hit wins:
 *   1. forced end-of-day flatten
 *   2. trailing stop (if active)
 *   3. breakeven stop (if active) / 4. original stop
 *   5. time stop, progress check
 *   6. target
 * Then breakeven promotion, partial exit, runner trailing.
 */

import type { IndexedBar, LiquidityTarget, SwingState } from '../modules/smartMoney/types.js';
import type { EngineConfig, EntryModel } from '../validation/schemas.js';
import type { EntrySignal } from './entrySelector.js';
import {
  formatBounds,
  formatPrice,
  type EngineCommand,
  type EngineEvent,
  type ExitReason,
  type TradeSide,
} from './events.js';
import { clamp, roundToTick, safeDiv } from '../utils/math.js';
import { createLogger } from '../services/logger.js';

const logger = createLogger('TradeManager');

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export interface Trade {
  side: TradeSide;
  model: EntryModel;
  entryPrice: number;
  /** Working stop; only ever tightens */
  stopPrice: number;
  initialStopPrice: number;
  riskPoints: number;
  targetPrice: number;
  quantity: number;
  remainingQuantity: number;
  partialTaken: boolean;
  breakevenActive: boolean;
  trailingActive: boolean;
  trailingStopPrice: number | null;
  /** Most favourable price seen since entry (high for long, low for short) */
  bestPrice: number;
  /** Best close-based R since entry */
  bestR: number;
  entryBarIndex: number;
}

export interface TradeStep {
  trade: Trade | null;
  events: EngineEvent[];
  commands: EngineCommand[];
}

export interface StopPlan {
  price: number;
  source: 'zone' | 'swing' | 'default';
}

export interface TargetPlan {
  price: number;
  source: 'fixed-r' | 'liquidity';
}

export interface OpenContext {
  config: EngineConfig;
  swings: SwingState;
  primaryTarget: LiquidityTarget | null;
}

export interface ManageContext {
  config: EngineConfig;
  /** Session controller says we are at or past the flatten cutoff */
  forceFlat: boolean;
  atr: number | null;
}

function sideSign(side: TradeSide): 1 | -1 {
  return side === 'long' ? 1 : -1;
}

// ═══════════════════════════════════════════════════════════════
// PLANNING
// ═══════════════════════════════════════════════════════════════

export function planStop(
  signal: Pick<EntrySignal, 'side' | 'top' | 'bottom' | 'sweptExtreme'>,
  entry: number,
  swings: SwingState,
  config: EngineConfig
): StopPlan {
  const long = signal.side === 'long';
  const sign = sideSign(signal.side);
  const buffer = config.stopBufferPoints;

  const anchor = signal.sweptExtreme ?? (long ? signal.bottom : signal.top);
  let stop = anchor - sign * buffer;
  let source: StopPlan['source'] = 'zone';
  let distance = (entry - stop) * sign;

  if (distance < config.tightStopThreshold && config.stopOverrideToStructure) {
    const swing = long ? swings.currentLow : swings.currentHigh;
    const usable = swing !== null && (long ? swing.price < entry : swing.price > entry);
    if (swing && usable) {
      stop = swing.price - sign * buffer;
      source = 'swing';
    } else {
      stop = entry - sign * config.stopDefaultPoints;
      source = 'default';
    }
    distance = (entry - stop) * sign;
  }

  const bounded = clamp(distance, config.stopMinPoints, config.stopMaxPoints);
  return { price: roundToTick(entry - sign * bounded, config.tickSize), source };
}

export function planTarget(
  side: TradeSide,
  entry: number,
  risk: number,
  primary: LiquidityTarget | null,
  config: EngineConfig
): TargetPlan {
  const sign = sideSign(side);
  const fixed: TargetPlan = {
    price: roundToTick(entry + sign * risk * config.targetR, config.tickSize),
    source: 'fixed-r',
  };

  if (config.targetMode === 'fixed-r' || !primary) return fixed;

  const aligned = side === 'long'
    ? primary.drawDirection === 'up' && primary.price > entry
    : primary.drawDirection === 'down' && primary.price < entry;
  if (!aligned) return fixed;

  const liquidity: TargetPlan = { price: roundToTick(primary.price, config.tickSize), source: 'liquidity' };

  if (config.targetMode === 'liquidity') return liquidity;

  const reward = Math.abs(primary.price - entry);
  return safeDiv(reward, risk) >= config.hybridMinR ? liquidity : fixed;
}

// ═══════════════════════════════════════════════════════════════
// ENTRY / EXIT
// ═══════════════════════════════════════════════════════════════

export function openTrade(signal: EntrySignal, bar: IndexedBar, ctx: OpenContext): TradeStep {
  const { config } = ctx;
  const entry = roundToTick(bar.close, config.tickSize);
  const stop = planStop(signal, entry, ctx.swings, config);
  const risk = Math.abs(entry - stop.price);
  const target = planTarget(signal.side, entry, risk, ctx.primaryTarget, config);

  const trade: Trade = {
    side: signal.side,
    model: signal.model,
    entryPrice: entry,
    stopPrice: stop.price,
    initialStopPrice: stop.price,
    riskPoints: risk,
    targetPrice: target.price,
    quantity: config.contracts,
    remainingQuantity: config.contracts,
    partialTaken: false,
    breakevenActive: false,
    trailingActive: false,
    trailingStopPrice: null,
    bestPrice: entry,
    bestR: 0,
    entryBarIndex: bar.index,
  };

  logger.info(`${signal.side.toUpperCase()} ${signal.model} @ ${formatPrice(entry)}`, {
    stop: stop.price,
    stopSource: stop.source,
    target: target.price,
    targetSource: target.source,
    zone: formatBounds(signal.bottom, signal.top),
  });

  return {
    trade,
    events: [{
      kind: signal.side === 'long' ? 'entry-long' : 'entry-short',
      barIndex: bar.index,
      price: entry,
      tag: `${signal.model} ${formatBounds(signal.bottom, signal.top)}`,
    }],
    commands: [{ type: 'open', side: signal.side, quantity: config.contracts, price: entry }],
  };
}

/** Close the whole remaining position */
export function closeTrade(
  trade: Trade,
  price: number,
  barIndex: number,
  reason: ExitReason,
  prior: Pick<TradeStep, 'events' | 'commands'> = { events: [], commands: [] }
): TradeStep {
  logger.info(`Exit ${trade.side} ${trade.model}: ${reason} @ ${formatPrice(price)}`, {
    entry: trade.entryPrice,
    remaining: trade.remainingQuantity,
  });

  return {
    trade: null,
    events: [...prior.events, { kind: 'exit', barIndex, price, tag: `${reason} ${trade.model}` }],
    commands: [...prior.commands, { type: 'close-all', reason, price }],
  };
}

// ═══════════════════════════════════════════════════════════════
// PER-BAR MANAGEMENT
// ═══════════════════════════════════════════════════════════════

export function manageTrade(trade: Trade, bar: IndexedBar, ctx: ManageContext): TradeStep {
  const { config } = ctx;
  const long = trade.side === 'long';
  const sign = sideSign(trade.side);
  const events: EngineEvent[] = [];
  const commands: EngineCommand[] = [];
  const exit = (price: number, reason: ExitReason): TradeStep =>
    closeTrade(trade, price, bar.index, reason, { events, commands });

  // 1. End of day always wins
  if (ctx.forceFlat) {
    return exit(bar.close, 'end-of-day');
  }

  // 2. Trailing stop
  if (trade.trailingActive && trade.trailingStopPrice !== null) {
    const hit = long ? bar.low <= trade.trailingStopPrice : bar.high >= trade.trailingStopPrice;
    if (hit) return exit(trade.trailingStopPrice, 'trailing-stop');
  }

  // 3-4. Breakeven-adjusted or original stop
  const stopHit = long ? bar.low <= trade.stopPrice : bar.high >= trade.stopPrice;
  if (stopHit) {
    return exit(trade.stopPrice, trade.breakevenActive ? 'breakeven-stop' : 'stop');
  }

  const next: Trade = { ...trade };
  const closeR = safeDiv((bar.close - trade.entryPrice) * sign, trade.riskPoints);
  next.bestPrice = long ? Math.max(trade.bestPrice, bar.high) : Math.min(trade.bestPrice, bar.low);
  next.bestR = Math.max(trade.bestR, closeR);

  // 5. Time stop and progress check
  const barsInTrade = bar.index - trade.entryBarIndex;
  if (barsInTrade >= config.maxBarsInTrade) {
    return exit(bar.close, 'time-stop');
  }
  if (config.progressCheckBars > 0 && barsInTrade >= config.progressCheckBars &&
      next.bestR < config.progressMinR) {
    return exit(bar.close, 'no-progress');
  }

  // 6. Target
  const targetHit = long ? bar.high >= trade.targetPrice : bar.low <= trade.targetPrice;
  if (targetHit) {
    return exit(trade.targetPrice, 'target');
  }

  // Breakeven: one-shot, never loosens
  const openPoints = (bar.close - trade.entryPrice) * sign;
  if (config.beEnabled && !next.breakevenActive && openPoints >= config.beTriggerPoints) {
    const beStop = roundToTick(trade.entryPrice + sign * config.beOffsetPoints, config.tickSize);
    if (long ? beStop > next.stopPrice : beStop < next.stopPrice) {
      next.stopPrice = beStop;
    }
    next.breakevenActive = true;
    events.push({ kind: 'breakeven-set', barIndex: bar.index, price: next.stopPrice, tag: `${trade.model} breakeven` });
  }

  // Partial: fires once, degrades to a full close when no unit would remain
  if (config.partialEnabled && !next.partialTaken && closeR >= config.partialR) {
    const qty = Math.ceil(next.remainingQuantity * config.partialPct / 100);
    if (qty >= next.remainingQuantity) {
      return exit(bar.close, 'partial-full-close');
    }
    next.remainingQuantity -= qty;
    next.partialTaken = true;
    events.push({
      kind: 'partial-exit',
      barIndex: bar.index,
      price: bar.close,
      tag: `${trade.model} ${qty} of ${trade.remainingQuantity}`,
    });
    commands.push({ type: 'partial-close', quantity: qty, price: bar.close });
  }

  // Runner trailing: after the partial, or from the start when partials are off
  if (config.trailEnabled && (next.partialTaken || !config.partialEnabled)) {
    const distance = config.trailMode === 'points'
      ? config.trailPoints
      : ctx.atr === null ? null : ctx.atr * config.trailAtrMultiple;

    if (distance !== null) {
      const candidate = roundToTick(next.bestPrice - sign * distance, config.tickSize);
      if (!next.trailingActive || next.trailingStopPrice === null) {
        next.trailingActive = true;
        next.trailingStopPrice = candidate;
        events.push({ kind: 'trailing-activated', barIndex: bar.index, price: candidate, tag: `${trade.model} trail` });
      } else if (long ? candidate > next.trailingStopPrice : candidate < next.trailingStopPrice) {
        next.trailingStopPrice = candidate;
      }
    }
  }

  return { trade: next, events, commands };
}
