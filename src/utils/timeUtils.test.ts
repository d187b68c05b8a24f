import { describe, it, expect } from 'vitest';
import { clockToMinutes, createSessionClock, isClockLabel, isValidTimeZone, parseClock } from './timeUtils.js';

describe('clock labels', () => {
  it('should parse 24h labels', () => {
    expect(parseClock('09:30')).toEqual({ hh: 9, mm: 30 });
    expect(clockToMinutes('15:55')).toBe(955);
  });

  it('should refuse labels outside the day', () => {
    expect(isClockLabel('24:00')).toBe(false);
    expect(isClockLabel('9:5')).toBe(false);
    expect(() => parseClock('noon')).toThrow('Invalid clock label: noon');
  });
});

describe('createSessionClock', () => {
  it('should place a UTC timestamp on the exchange calendar day', () => {
    const clock = createSessionClock('America/New_York');
    const ts = Date.UTC(2024, 0, 16, 3, 0);

    expect(clock.dayKey(ts)).toBe('2024-01-15');
    expect(clock.minuteOfDay(ts)).toBe(1320);
  });

  it('should follow daylight saving time', () => {
    const clock = createSessionClock('America/New_York');

    expect(clock.minuteOfDay(Date.UTC(2024, 6, 16, 13, 30))).toBe(570);
  });

  it('should report midnight as minute zero', () => {
    expect(createSessionClock('UTC').minuteOfDay(Date.UTC(2024, 0, 16, 0, 0))).toBe(0);
  });
});

describe('isValidTimeZone', () => {
  it('should accept IANA names and reject others', () => {
    expect(isValidTimeZone('Europe/London')).toBe(true);
    expect(isValidTimeZone('Mars/Olympus_Mons')).toBe(false);
  });
});
