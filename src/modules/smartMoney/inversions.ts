/**
 * Inverted FVG Detection
 * A gap whose far edge is closed through flips role: bullish gaps become bearish IFVGs and vice versa.
 */

import type { FairValueGapZone, IndexedBar, InvertedFvgDraft } from './types.js';
import { oppositeDirection } from './types.js';

export interface GapInversion {
  source: FairValueGapZone;
  draft: InvertedFvgDraft;
}

export function findInversions(
  gaps: readonly FairValueGapZone[],
  bar: IndexedBar
): GapInversion[] {
  const inversions: GapInversion[] = [];

  for (const gap of gaps) {
    if (gap.validity !== 'active' || gap.birthIndex >= bar.index) continue;

    const throughFarEdge = gap.direction === 'bullish'
      ? bar.close < gap.bottom
      : bar.close > gap.top;

    if (!throughFarEdge) continue;

    inversions.push({
      source: gap,
      draft: {
        kind: 'inverted-fvg',
        direction: oppositeDirection(gap.direction),
        top: gap.top,
        bottom: gap.bottom,
        birthIndex: bar.index,
        sourceGap: gap.id,
      },
    });
  }

  return inversions;
}
