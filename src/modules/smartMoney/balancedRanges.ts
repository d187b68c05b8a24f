/**
 * Balanced Price Range (BPR) Detection
 * Overlap of a fair value gap with a same-direction inverted gap or breaker born on another bar.
 */

import type {
  BalancedRangeDraft,
  BalancedRangeZone,
  BreakerZone,
  FairValueGapZone,
  InvertedFvgZone,
} from './types.js';

export interface BalancedRangeConfig {
  minWidth: number;
  /** Bounds within this distance of an existing range count as the same range */
  dedupTolerance: number;
}

const DEFAULT_CONFIG: BalancedRangeConfig = {
  minWidth: 1,
  dedupTolerance: 1,
};

export interface BalancedRangeInput {
  gaps: readonly FairValueGapZone[];
  partners: readonly (InvertedFvgZone | BreakerZone)[];
  existing: readonly BalancedRangeZone[];
  currentIndex: number;
}

interface Bounds {
  top: number;
  bottom: number;
}

export function overlapOf(a: Bounds, b: Bounds): Bounds | null {
  const top = Math.min(a.top, b.top);
  const bottom = Math.max(a.bottom, b.bottom);
  return top > bottom ? { top, bottom } : null;
}

function isDuplicate(candidate: Bounds, ranges: readonly Bounds[], tolerance: number): boolean {
  return ranges.some(range =>
    Math.abs(range.top - candidate.top) <= tolerance &&
    Math.abs(range.bottom - candidate.bottom) <= tolerance
  );
}

export function findBalancedRanges(
  input: BalancedRangeInput,
  config: Partial<BalancedRangeConfig> = {}
): BalancedRangeDraft[] {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const known: Bounds[] = input.existing.filter(r => r.validity === 'active');
  const drafts: BalancedRangeDraft[] = [];

  for (const gap of input.gaps) {
    if (gap.validity !== 'active') continue;

    for (const partner of input.partners) {
      if (partner.validity !== 'active' || partner.direction !== gap.direction) continue;
      if (partner.birthIndex === gap.birthIndex) continue;

      const overlap = overlapOf(gap, partner);
      if (!overlap || overlap.top - overlap.bottom < cfg.minWidth) continue;
      if (isDuplicate(overlap, known, cfg.dedupTolerance)) continue;

      known.push(overlap);
      drafts.push({
        kind: 'balanced-range',
        direction: gap.direction,
        top: overlap.top,
        bottom: overlap.bottom,
        birthIndex: input.currentIndex,
        legs: [partner.id, gap.id],
      });
    }
  }

  return drafts;
}
