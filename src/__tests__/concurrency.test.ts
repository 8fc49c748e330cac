import { mapWithConcurrency } from '../common/concurrency';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('mapWithConcurrency', () => {
  it('keeps input order and never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (ms, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(ms);
      inFlight -= 1;
      return index * 10;
    });

    expect(peak).toBeLessThanOrEqual(2);
    expect(results).toEqual([
      { ok: true, value: 0 },
      { ok: true, value: 10 },
      { ok: true, value: 20 },
      { ok: true, value: 30 },
      { ok: true, value: 40 },
    ]);
  });

  it('captures rejections without stopping other items', async () => {
    const failure = new Error('boom');
    const results = await mapWithConcurrency(['a', 'b', 'c'], 3, async (item) => {
      if (item === 'b') {
        throw failure;
      }
      return item.toUpperCase();
    });

    expect(results).toEqual([
      { ok: true, value: 'A' },
      { ok: false, error: failure },
      { ok: true, value: 'C' },
    ]);
  });

  it('handles an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});
