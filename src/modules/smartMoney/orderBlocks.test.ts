import { describe, it, expect } from 'vitest';
import { detectOrderBlock } from './orderBlocks.js';
import { indexed } from '../../testing/fixtures.js';

describe('detectOrderBlock', () => {
  it('should emit a bullish block when down-closes are broken to the upside', () => {
    const bars = indexed([
      [10, 12, 9, 11],
      [11, 11.5, 9.5, 10],
      [10, 10.5, 8, 8.5],
      [8.5, 13, 8.4, 12],
    ]);

    expect(detectOrderBlock(bars)).toEqual({
      kind: 'order-block',
      direction: 'bullish',
      top: 11.5,
      bottom: 8,
      birthIndex: 3,
      candleCount: 2,
      flippedToBreaker: false,
    });
  });

  it('should use candle bodies when configured', () => {
    const bars = indexed([
      [10, 12, 9, 11],
      [11, 11.5, 9.5, 10],
      [10, 10.5, 8, 8.5],
      [8.5, 13, 8.4, 12],
    ]);

    const ob = detectOrderBlock(bars, { bounds: 'body' });

    expect(ob?.top).toBe(11);
    expect(ob?.bottom).toBe(8.5);
  });

  it('should emit a bearish block when up-closes are broken to the downside', () => {
    const bars = indexed([
      [12, 12.5, 10, 10.5],
      [10.5, 12, 10.2, 11.8],
      [11.8, 13, 11.5, 12.8],
      [12.8, 12.9, 9, 9.5],
    ]);

    const ob = detectOrderBlock(bars);

    expect(ob?.direction).toBe('bearish');
    expect(ob?.top).toBe(13);
    expect(ob?.bottom).toBe(10.2);
  });

  it('should ignore a run shorter than the minimum', () => {
    const bars = indexed([
      [10, 12, 9, 11],
      [11, 12.5, 10.5, 12],
      [12, 12.2, 10, 10.5],
      [10.5, 14, 10.4, 13],
    ]);

    expect(detectOrderBlock(bars)).toBeNull();
  });

  it('should not emit without a close beyond the block', () => {
    const bars = indexed([
      [10, 12, 9, 11],
      [11, 11.5, 9.5, 10],
      [10, 10.5, 8, 8.5],
      [8.5, 11.6, 8.4, 11.4],
    ]);

    expect(detectOrderBlock(bars)).toBeNull();
  });

  it('should cap the run at the maximum candle count', () => {
    const bars = indexed([
      [20, 20.5, 18, 19],
      [19, 19.5, 17, 18],
      [18, 18.5, 16, 17],
      [17, 17.5, 15, 16],
      [16, 16.5, 14, 15],
      [15, 15.5, 13, 14],
      [14, 21, 13.5, 20],
    ]);

    const ob = detectOrderBlock(bars, { maxCandles: 5 });

    expect(ob?.candleCount).toBe(5);
    expect(ob?.top).toBe(19.5);
    expect(ob?.bottom).toBe(13);
  });
});
