import { describe, expect, it } from 'vitest';
import { delay } from '../src/delay.js';

describe('delay', () => {
  it('waits the requested time', async () => {
    const started = Date.now();
    await delay(30);
    expect(Date.now() - started).toBeGreaterThanOrEqual(25);
  });

  it('wakes early when the signal aborts', async () => {
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(), 10);

    await delay(10_000, controller.signal);

    expect(Date.now() - started).toBeLessThan(1_000);
  });

  it('returns at once for an aborted signal', async () => {
    const started = Date.now();
    await delay(10_000, AbortSignal.abort());
    expect(Date.now() - started).toBeLessThan(1_000);
  });
});
