import { describe, it, expect } from 'vitest';
import {
  activeOfKind,
  ageZones,
  clearArena,
  createArena,
  insertZone,
  isActive,
  liveZones,
  markFlipped,
  pruneKind,
  resolveZone,
  setValidity,
  sweepZones,
} from './zoneArena.js';
import type { ZoneDraft } from '../modules/smartMoney/types.js';
import { barAt } from '../testing/fixtures.js';

function gapDraft(bottom: number, top: number, birthIndex = 0): ZoneDraft {
  return { kind: 'fair-value-gap', direction: 'bullish', top, bottom, birthIndex, gapSize: top - bottom };
}

describe('zone arena', () => {
  it('should assign identity and a fixed mean on insert', () => {
    const arena = createArena();

    const zone = insertZone(arena, gapDraft(100, 104));

    expect(zone?.id).toEqual({ slot: 0, generation: 0 });
    expect(zone?.sequence).toBe(0);
    expect(zone?.mean).toBe(102);
    expect(zone?.validity).toBe('active');
  });

  it('should reject a zone whose top is below its bottom', () => {
    const arena = createArena();

    expect(insertZone(arena, gapDraft(104, 100))).toBeNull();
    expect(arena.slots).toHaveLength(0);
  });

  it('should resolve a stale handle to null after its slot is reused', () => {
    const arena = createArena();
    const first = insertZone(arena, gapDraft(100, 104));
    if (!first) throw new Error('insert failed');

    setValidity(arena, first.id, 'consumed');
    expect(sweepZones(arena)).toBe(1);

    const second = insertZone(arena, gapDraft(110, 114));

    expect(second?.id).toEqual({ slot: 0, generation: 1 });
    expect(resolveZone(arena, first.id)).toBeNull();
    expect(isActive(arena, first.id)).toBe(false);
    expect(second && isActive(arena, second.id)).toBe(true);
  });

  it('should expire zones older than the max age and violate zones closed through', () => {
    const arena = createArena();
    insertZone(arena, gapDraft(100, 104, 0));
    insertZone(arena, gapDraft(95, 98, 8));
    insertZone(arena, gapDraft(90, 92, 10));

    const retired = ageZones(arena, barAt(10, [97, 97.5, 93, 94]), 9);

    expect(retired.map(r => [r.zone.bottom, r.reason])).toEqual([
      [100, 'expired'],
      [95, 'violated'],
    ]);
    expect(activeOfKind(arena, 'fair-value-gap').map(z => z.bottom)).toEqual([90]);
  });

  it('should keep a zone aged exactly the max age', () => {
    const arena = createArena();
    insertZone(arena, gapDraft(100, 104, 0));

    expect(ageZones(arena, barAt(9, [105, 106, 104.5, 105]), 9)).toEqual([]);
  });

  it('should prune the oldest zones of a kind over its cap', () => {
    const arena = createArena();
    insertZone(arena, gapDraft(100, 101));
    insertZone(arena, gapDraft(102, 103));
    insertZone(arena, gapDraft(104, 105));

    const pruned = pruneKind(arena, 'fair-value-gap', 1);

    expect(pruned.map(p => p.zone.bottom)).toEqual([100, 102]);
    expect(liveZones(arena).map(z => z.bottom)).toEqual([104]);
  });

  it('should mark a flipped order block violated', () => {
    const arena = createArena();
    const ob = insertZone(arena, {
      kind: 'order-block',
      direction: 'bullish',
      top: 110,
      bottom: 100,
      birthIndex: 0,
      candleCount: 2,
      flippedToBreaker: false,
    });
    if (!ob) throw new Error('insert failed');

    markFlipped(arena, ob.id);

    expect(resolveZone(arena, ob.id)).toMatchObject({ flippedToBreaker: true, validity: 'violated' });
  });

  it('should release every slot on clear', () => {
    const arena = createArena();
    insertZone(arena, gapDraft(100, 101));
    insertZone(arena, gapDraft(102, 103));

    clearArena(arena);

    expect(liveZones(arena)).toEqual([]);
    expect(arena.slots.map(s => s.generation)).toEqual([1, 1]);
  });
});
