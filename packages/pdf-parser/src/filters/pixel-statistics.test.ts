import sharp from 'sharp';
import { describe, expect, test, vi } from 'vitest';

import { computePixelStatistics, decodePixels } from './pixel-statistics';

vi.mock('sharp', () => ({
  default: vi.fn(),
}));

const CUTOFFS = { black: 15, white: 240 };

function rgb(...runs: Array<[number, [number, number, number]]>) {
  const values: number[] = [];
  for (const [count, color] of runs) {
    for (let i = 0; i < count; i++) values.push(...color);
  }
  return {
    data: Uint8Array.from(values),
    width: values.length / 3,
    height: 1,
    channels: 3,
  };
}

describe('computePixelStatistics', () => {
  test('reports zero variance for a solid colour', () => {
    const stats = computePixelStatistics(rgb([4, [128, 128, 128]]), CUTOFFS);

    expect(stats).toEqual({ variance: 0, darkFraction: 0, lightFraction: 0 });
  });

  test('computes population variance over channel values', () => {
    // values 0,0,0,255,255,255 -> mean 127.5, variance 127.5^2
    const stats = computePixelStatistics(
      rgb([1, [0, 0, 0]], [1, [255, 255, 255]]),
      CUTOFFS,
    );

    expect(stats.variance).toBeCloseTo(16256.25, 6);
    expect(stats.darkFraction).toBe(0.5);
    expect(stats.lightFraction).toBe(0.5);
  });

  test('uses the channel mean as luminance', () => {
    // mean 10 -> dark; mean 250 -> light; mean 100 -> neither
    const stats = computePixelStatistics(
      rgb([1, [0, 0, 30]], [1, [250, 250, 250]], [2, [100, 100, 100]]),
      CUTOFFS,
    );

    expect(stats.darkFraction).toBe(0.25);
    expect(stats.lightFraction).toBe(0.25);
  });

  test('keeps the cutoffs exclusive', () => {
    const stats = computePixelStatistics(
      rgb([1, [15, 15, 15]], [1, [240, 240, 240]]),
      CUTOFFS,
    );

    expect(stats.darkFraction).toBe(0);
    expect(stats.lightFraction).toBe(0);
  });

  test('handles single-channel images', () => {
    const stats = computePixelStatistics(
      { data: Uint8Array.from([0, 255]), width: 2, height: 1, channels: 1 },
      CUTOFFS,
    );

    expect(stats.darkFraction).toBe(0.5);
    expect(stats.lightFraction).toBe(0.5);
  });

  test('returns zeros for an empty image', () => {
    const stats = computePixelStatistics(
      { data: new Uint8Array(0), width: 0, height: 0, channels: 3 },
      CUTOFFS,
    );

    expect(stats).toEqual({ variance: 0, darkFraction: 0, lightFraction: 0 });
  });
});

describe('decodePixels', () => {
  test('decodes with alpha removed into raw channel values', async () => {
    const data = Buffer.from([1, 2, 3]);
    const chain = {
      removeAlpha: vi.fn().mockReturnThis(),
      raw: vi.fn().mockReturnThis(),
      toBuffer: vi.fn().mockResolvedValue({
        data,
        info: { width: 1, height: 1, channels: 3 },
      }),
    };
    vi.mocked(sharp).mockReturnValue(chain as any);

    const pixels = await decodePixels(Buffer.from('png'));

    expect(sharp).toHaveBeenCalledWith(Buffer.from('png'));
    expect(chain.toBuffer).toHaveBeenCalledWith({ resolveWithObject: true });
    expect(pixels).toEqual({ data, width: 1, height: 1, channels: 3 });
  });
});
