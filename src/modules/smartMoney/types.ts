/**
 * Market Structure Type Definitions
 * Bars, swing points, zones and liquidity targets shared by the detectors and the engine
 */

export interface Bar {
  open: number;
  high: number;
  low: number;
  close: number;
  /** Bar open time, epoch milliseconds */
  startTime: number;
  complete: boolean;
}

/** A bar stamped with its position in the processed stream */
export interface IndexedBar extends Bar {
  index: number;
}

export type Direction = 'bullish' | 'bearish';
export type Bias = Direction | 'neutral';

export interface SwingPoint {
  price: number;
  barIndex: number;
  kind: 'high' | 'low';
}

export interface SwingState {
  currentHigh: SwingPoint | null;
  previousHigh: SwingPoint | null;
  currentLow: SwingPoint | null;
  previousLow: SwingPoint | null;
}

// ═══════════════════════════════════════════════════════════════
// ZONES
// ═══════════════════════════════════════════════════════════════

export type ZoneValidity = 'active' | 'violated' | 'expired' | 'consumed';

/** Arena slot plus the generation it was issued under */
export interface ZoneHandle {
  slot: number;
  generation: number;
}

interface ZoneBase {
  id: ZoneHandle;
  /** Monotonic creation order, used for oldest-first pruning */
  sequence: number;
  top: number;
  bottom: number;
  /** Midpoint fixed at creation */
  mean: number;
  birthIndex: number;
  direction: Direction;
  validity: ZoneValidity;
}

export interface OrderBlockZone extends ZoneBase {
  kind: 'order-block';
  candleCount: number;
  flippedToBreaker: boolean;
}

export interface BreakerZone extends ZoneBase {
  kind: 'breaker';
  origin: 'ob-flip' | 'structure';
  /** Swept swing extreme for structural breakers */
  sweptExtreme: number | null;
}

export interface FairValueGapZone extends ZoneBase {
  kind: 'fair-value-gap';
  gapSize: number;
}

export interface InvertedFvgZone extends ZoneBase {
  kind: 'inverted-fvg';
  sourceGap: ZoneHandle;
}

export interface BalancedRangeZone extends ZoneBase {
  kind: 'balanced-range';
  legs: [ZoneHandle, ZoneHandle];
}

export type Zone =
  | OrderBlockZone
  | BreakerZone
  | FairValueGapZone
  | InvertedFvgZone
  | BalancedRangeZone;

export type ZoneKind = Zone['kind'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** What a detector proposes; the arena assigns identity, mean and validity */
export type ZoneDraft = DistributiveOmit<Zone, 'id' | 'sequence' | 'mean' | 'validity'>;

export type OrderBlockDraft = Omit<OrderBlockZone, 'id' | 'sequence' | 'mean' | 'validity'>;
export type BreakerDraft = Omit<BreakerZone, 'id' | 'sequence' | 'mean' | 'validity'>;
export type FairValueGapDraft = Omit<FairValueGapZone, 'id' | 'sequence' | 'mean' | 'validity'>;
export type InvertedFvgDraft = Omit<InvertedFvgZone, 'id' | 'sequence' | 'mean' | 'validity'>;
export type BalancedRangeDraft = Omit<BalancedRangeZone, 'id' | 'sequence' | 'mean' | 'validity'>;

// ═══════════════════════════════════════════════════════════════
// LIQUIDITY
// ═══════════════════════════════════════════════════════════════

export type LiquidityOrigin =
  | 'session-high'
  | 'session-low'
  | 'swing-high'
  | 'swing-low'
  | 'equal-highs'
  | 'equal-lows';

export interface LiquidityTarget {
  price: number;
  origin: LiquidityOrigin;
  drawDirection: 'up' | 'down';
}

export function oppositeDirection(direction: Direction): Direction {
  return direction === 'bullish' ? 'bearish' : 'bullish';
}
