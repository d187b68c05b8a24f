import { describe, it, expect } from 'vitest';
import { createAtr, createEma, trueRange, updateAtr, updateEma } from './indicators.js';
import { barAt } from '../testing/fixtures.js';

describe('updateEma', () => {
  it('should seed with the simple average then smooth', () => {
    let ema = createEma(3);
    ema = updateEma(ema, 1);
    ema = updateEma(ema, 2);
    expect(ema.value).toBeNull();

    ema = updateEma(ema, 3);
    expect(ema.value).toBe(2);

    ema = updateEma(ema, 6);
    expect(ema.value).toBe(4);
  });
});

describe('updateAtr', () => {
  it('should use the bar range when there is no previous close', () => {
    expect(trueRange(barAt(0, [9, 10, 8, 9]), null)).toBe(2);
  });

  it('should apply Wilder smoothing after the seed', () => {
    let atr = createAtr(2);
    atr = updateAtr(atr, barAt(0, [9, 10, 8, 9]));
    expect(atr.value).toBeNull();

    atr = updateAtr(atr, barAt(1, [9, 12, 9, 11]));
    expect(atr.value).toBe(2.5);

    atr = updateAtr(atr, barAt(2, [11, 11.5, 10, 10.5]));
    expect(atr.value).toBe(2);
  });
});
