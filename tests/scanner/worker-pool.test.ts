/**
 * Tests for the bounded worker pool
 */

import { describe, it, expect } from 'vitest';
import { runPool } from '../../src/scanner/worker-pool.js';

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 1));

describe('runPool', () => {
  it('should process every item with bounded concurrency', async () => {
    const items = Array.from({ length: 10 }, (_, i) => i);
    const seen: number[] = [];
    let inFlight = 0;
    let peak = 0;

    await runPool(
      items,
      async (item) => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await tick();
        seen.push(item);
        inFlight -= 1;
      },
      { concurrency: 3 }
    );

    expect([...seen].sort((a, b) => a - b)).toEqual(items);
    expect(peak).toBe(3);
  });

  it('should treat an invalid concurrency as one', async () => {
    let peak = 0;
    let inFlight = 0;
    await runPool(
      [1, 2, 3],
      async () => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await tick();
        inFlight -= 1;
      },
      { concurrency: Number.NaN }
    );
    expect(peak).toBe(1);
  });

  it('should stop taking items once asked to', async () => {
    const seen: number[] = [];
    let stop = false;
    await runPool(
      [1, 2, 3, 4],
      async (item) => {
        seen.push(item);
        if (item === 2) stop = true;
      },
      { concurrency: 1, shouldStop: () => stop }
    );
    expect(seen).toEqual([1, 2]);
  });

  it('should hand failures to onError and keep going', async () => {
    const failed: number[] = [];
    const done: number[] = [];
    await runPool(
      [1, 2, 3],
      async (item) => {
        if (item === 2) throw new Error('boom');
        done.push(item);
      },
      {
        concurrency: 1,
        onError: (_error, item) => {
          failed.push(item);
        },
      }
    );
    expect(failed).toEqual([2]);
    expect(done).toEqual([1, 3]);
  });

  it('should reject without an error handler', async () => {
    await expect(
      runPool(
        [1],
        async () => {
          throw new Error('boom');
        },
        { concurrency: 2 }
      )
    ).rejects.toThrow('boom');
  });
});
