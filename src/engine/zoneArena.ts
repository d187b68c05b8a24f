/**
 * Zone Lifecycle Manager
 *
 * Zones live in an arena of slots. A handle carries the slot's generation at insert time,
 * so a handle to a swept zone resolves to null instead of to whatever reused the slot.
 * These functions mutate the arena they are given; the engine only passes its working copy.
 */

import type {
  IndexedBar,
  Zone,
  ZoneDraft,
  ZoneHandle,
  ZoneKind,
  ZoneValidity,
} from '../modules/smartMoney/types.js';

export interface ArenaSlot {
  generation: number;
  zone: Zone | null;
}

export interface ZoneArena {
  slots: ArenaSlot[];
  free: number[];
  nextSequence: number;
}

export type ZoneOfKind<K extends ZoneKind> = Extract<Zone, { kind: K }>;

export type InvalidationReason = 'violated' | 'expired' | 'consumed' | 'pruned';

export interface ZoneRetirement {
  zone: Zone;
  reason: InvalidationReason;
}

export function createArena(): ZoneArena {
  return { slots: [], free: [], nextSequence: 0 };
}

function isKind<K extends ZoneKind>(zone: Zone, kind: K): zone is ZoneOfKind<K> {
  return zone.kind === kind;
}

/** Returns null for inverted geometry (top below bottom) */
export function insertZone(arena: ZoneArena, draft: ZoneDraft): Zone | null {
  if (!(draft.top >= draft.bottom)) {
    return null;
  }

  const reused = arena.free.pop();
  const slot = reused ?? arena.slots.length;
  if (reused === undefined) {
    arena.slots.push({ generation: 0, zone: null });
  }

  const entry = arena.slots[slot];
  const zone: Zone = {
    ...draft,
    id: { slot, generation: entry.generation },
    sequence: arena.nextSequence++,
    mean: (draft.top + draft.bottom) / 2,
    validity: 'active',
  };
  entry.zone = zone;
  return zone;
}

export function resolveZone(arena: ZoneArena, handle: ZoneHandle): Zone | null {
  const entry = arena.slots[handle.slot];
  if (!entry || entry.generation !== handle.generation) return null;
  return entry.zone;
}

export function isActive(arena: ZoneArena, handle: ZoneHandle): boolean {
  return resolveZone(arena, handle)?.validity === 'active';
}

/** Live zones, oldest first */
export function liveZones(arena: ZoneArena): Zone[] {
  const zones: Zone[] = [];
  for (const entry of arena.slots) {
    if (entry.zone) zones.push(entry.zone);
  }
  return zones.sort((a, b) => a.sequence - b.sequence);
}

export function activeZones(arena: ZoneArena): Zone[] {
  return liveZones(arena).filter(zone => zone.validity === 'active');
}

export function activeOfKind<K extends ZoneKind>(arena: ZoneArena, kind: K): ZoneOfKind<K>[] {
  const out: ZoneOfKind<K>[] = [];
  for (const zone of activeZones(arena)) {
    if (isKind(zone, kind)) out.push(zone);
  }
  return out;
}

export function setValidity(arena: ZoneArena, handle: ZoneHandle, validity: ZoneValidity): Zone | null {
  const zone = resolveZone(arena, handle);
  if (zone) zone.validity = validity;
  return zone;
}

/** Order block closed through: violated and flagged so it never flips twice */
export function markFlipped(arena: ZoneArena, handle: ZoneHandle): void {
  const zone = resolveZone(arena, handle);
  if (zone && zone.kind === 'order-block') {
    zone.flippedToBreaker = true;
    zone.validity = 'violated';
  }
}

function release(arena: ZoneArena, slot: number): void {
  const entry = arena.slots[slot];
  entry.zone = null;
  entry.generation++;
  arena.free.push(slot);
}

/**
 * Age and invalidate every active zone against the closed bar.
 * Zones born on this bar are exempt until the next one.
 */
export function ageZones(arena: ZoneArena, bar: IndexedBar, maxAge: number): ZoneRetirement[] {
  const retired: ZoneRetirement[] = [];

  for (const zone of activeZones(arena)) {
    if (zone.birthIndex >= bar.index) continue;

    if (bar.index - zone.birthIndex > maxAge) {
      zone.validity = 'expired';
      retired.push({ zone, reason: 'expired' });
      continue;
    }

    const closedThrough = zone.direction === 'bullish'
      ? bar.close < zone.bottom
      : bar.close > zone.top;

    if (closedThrough) {
      zone.validity = 'violated';
      retired.push({ zone, reason: 'violated' });
    }
  }

  return retired;
}

/** Drop the oldest active zones of a kind until at most `max` remain */
export function pruneKind(arena: ZoneArena, kind: ZoneKind, max: number): ZoneRetirement[] {
  const zones = activeOfKind(arena, kind);
  const excess = zones.length - max;
  if (excess <= 0) return [];

  const pruned: ZoneRetirement[] = [];
  for (const zone of zones.slice(0, excess)) {
    release(arena, zone.id.slot);
    pruned.push({ zone, reason: 'pruned' });
  }
  return pruned;
}

/** End-of-bar sweep of every zone that is no longer active */
export function sweepZones(arena: ZoneArena): number {
  let removed = 0;
  arena.slots.forEach((entry, slot) => {
    if (entry.zone && entry.zone.validity !== 'active') {
      release(arena, slot);
      removed++;
    }
  });
  return removed;
}

export function clearArena(arena: ZoneArena): void {
  arena.slots.forEach((entry, slot) => {
    if (entry.zone) release(arena, slot);
  });
}
