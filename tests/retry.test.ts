import { describe, it, expect, vi } from 'vitest';
import { pollUntil } from '../src/util/retry.js';

describe('pollUntil', () => {
  it('returns the first non-null value and the attempt it came on', async () => {
    const sleep = vi.fn(async () => {});
    const probe = vi.fn(async (attempt: number) => (attempt === 3 ? 'ready' : null));

    const result = await pollUntil(probe, { attempts: 5, delayMs: 100 }, { sleep });

    expect(result).toEqual({ ok: true, value: 'ready', attempts: 3 });
    expect(probe).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('gives up after the attempt budget without sleeping after the last try', async () => {
    const sleep = vi.fn(async () => {});
    const onRetry = vi.fn();

    const result = await pollUntil(async () => null, { attempts: 4, delayMs: 2000 }, { sleep, onRetry });

    expect(result).toEqual({ ok: false, attempts: 4 });
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(2000);
    expect(onRetry.mock.calls.map(c => c[0])).toEqual([1, 2, 3]);
  });

  it('applies backoff up to the cap', async () => {
    const delays: number[] = [];
    await pollUntil(async () => null, { attempts: 5, delayMs: 100, backoffFactor: 2, maxDelayMs: 300 }, {
      sleep: async (ms) => { delays.push(ms); },
    });

    expect(delays).toEqual([100, 200, 300, 300]);
  });

  it('treats a falsy but non-null value as success', async () => {
    const result = await pollUntil(async () => 0, { attempts: 3, delayMs: 1 }, { sleep: async () => {} });
    expect(result).toEqual({ ok: true, value: 0, attempts: 1 });
  });
});
