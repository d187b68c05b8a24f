/**
 * Time Utilities
 * Timezone-aware day keys and clock parsing for the session controller
 */

export interface ClockTime {
  hh: number;
  mm: number;
}

/** Host-supplied session clock: calendar day and minute of day for a bar timestamp */
export interface SessionClock {
  readonly timeZone: string;
  dayKey(tsMs: number): string;
  minuteOfDay(tsMs: number): number;
}

const CLOCK_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;

export function parseClock(clock: string): ClockTime {
  const match = clock.trim().match(CLOCK_PATTERN);
  if (!match) throw new Error(`Invalid clock label: ${clock}`);
  return { hh: Number(match[1]), mm: Number(match[2]) };
}

export function isClockLabel(value: string): boolean {
  return CLOCK_PATTERN.test(value.trim());
}

export function clockToMinutes(clock: string): number {
  const t = parseClock(clock);
  return t.hh * 60 + t.mm;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-CA', { timeZone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

interface ZonedParts {
  y: number;
  m: number;
  d: number;
  hh: number;
  mm: number;
}

export function createSessionClock(timeZone: string): SessionClock {
  const fmt = new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  });

  const partsFor = (tsMs: number): ZonedParts => {
    const parts = fmt.formatToParts(new Date(tsMs));
    const read = (type: Intl.DateTimeFormatPartTypes): number => {
      const raw = parts.find(p => p.type === type)?.value;
      const n = Number(raw);
      return Number.isFinite(n) ? n : 0;
    };
    return { y: read('year'), m: read('month'), d: read('day'), hh: read('hour'), mm: read('minute') };
  };

  return {
    timeZone,
    dayKey(tsMs: number): string {
      const p = partsFor(tsMs);
      return `${p.y}-${String(p.m).padStart(2, '0')}-${String(p.d).padStart(2, '0')}`;
    },
    minuteOfDay(tsMs: number): number {
      const p = partsFor(tsMs);
      return p.hh * 60 + p.mm;
    },
  };
}
