import { describe, it, expect } from 'vitest';
import { findBalancedRanges, overlapOf } from './balancedRanges.js';
import { bprZone, breakerZone, fvgZone, ifvgZone } from '../../testing/fixtures.js';

describe('overlapOf', () => {
  it('should return the shared band', () => {
    expect(overlapOf({ top: 21830, bottom: 21820 }, { top: 21825, bottom: 21815 }))
      .toEqual({ top: 21825, bottom: 21820 });
  });

  it('should return null for touching or disjoint bands', () => {
    expect(overlapOf({ top: 10, bottom: 5 }, { top: 15, bottom: 10 })).toBeNull();
    expect(overlapOf({ top: 10, bottom: 5 }, { top: 20, bottom: 15 })).toBeNull();
  });
});

describe('findBalancedRanges', () => {
  const breaker = breakerZone({ direction: 'bullish', top: 21830, bottom: 21820, slot: 0, birthIndex: 4 });
  const gap = fvgZone({ direction: 'bullish', top: 21825, bottom: 21815, slot: 1, birthIndex: 6 });

  it('should build a range from a gap and a same-direction breaker', () => {
    const drafts = findBalancedRanges({
      gaps: [gap],
      partners: [breaker],
      existing: [],
      currentIndex: 12,
    });

    expect(drafts).toEqual([{
      kind: 'balanced-range',
      direction: 'bullish',
      top: 21825,
      bottom: 21820,
      birthIndex: 12,
      legs: [{ slot: 0, generation: 0 }, { slot: 1, generation: 0 }],
    }]);
  });

  it('should skip partners of the opposite direction', () => {
    const bearish = ifvgZone({ direction: 'bearish', top: 21830, bottom: 21820, slot: 2, birthIndex: 5 });

    expect(findBalancedRanges({ gaps: [gap], partners: [bearish], existing: [], currentIndex: 12 }))
      .toEqual([]);
  });

  it('should skip a partner born on the same bar as the gap', () => {
    const sameBar = breakerZone({ direction: 'bullish', top: 21830, bottom: 21820, slot: 2, birthIndex: 6 });

    expect(findBalancedRanges({ gaps: [gap], partners: [sameBar], existing: [], currentIndex: 12 })).toEqual([]);
  });

  it('should skip overlaps narrower than the minimum width', () => {
    expect(findBalancedRanges(
      { gaps: [gap], partners: [breaker], existing: [], currentIndex: 12 },
      { minWidth: 6 }
    )).toEqual([]);
  });

  it('should not duplicate an active range within tolerance', () => {
    const existing = bprZone(
      { direction: 'bullish', top: 21825.5, bottom: 21820.5, slot: 3 },
      [{ slot: 0, generation: 0 }, { slot: 1, generation: 0 }]
    );

    expect(findBalancedRanges({ gaps: [gap], partners: [breaker], existing: [existing], currentIndex: 12 }))
      .toEqual([]);
  });

  it('should emit a single range when two partners give the same band', () => {
    const twin = ifvgZone({ direction: 'bullish', top: 21830, bottom: 21820, slot: 2, birthIndex: 5 });

    const drafts = findBalancedRanges({ gaps: [gap], partners: [breaker, twin], existing: [], currentIndex: 12 });

    expect(drafts).toHaveLength(1);
  });
});
