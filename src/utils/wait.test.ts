import { describe, it, expect } from '@jest/globals';
import { settle, waitForCondition } from './wait';

describe('waitForCondition', () => {
  it('resolves as soon as the condition holds', async () => {
    let calls = 0;
    const ready = await waitForCondition(() => {
      calls++;
      return calls >= 3;
    }, { timeoutMs: 1000, pollIntervalMs: 1 });

    expect(ready).toBe(true);
    expect(calls).toBe(3);
  });

  it('gives up after the timeout', async () => {
    const ready = await waitForCondition(() => false, { timeoutMs: 20, pollIntervalMs: 5 });

    expect(ready).toBe(false);
  });

  it('checks once with a zero timeout', async () => {
    let calls = 0;
    const ready = await waitForCondition(async () => {
      calls++;
      return false;
    }, { timeoutMs: 0, pollIntervalMs: 5 });

    expect(ready).toBe(false);
    expect(calls).toBe(1);
  });

  it('treats a throwing condition as not ready', async () => {
    const ready = await waitForCondition(() => {
      throw new Error('element not attached');
    }, { timeoutMs: 0, pollIntervalMs: 5 });

    expect(ready).toBe(false);
  });
});

describe('settle', () => {
  it('falls back to the fixed delay without a condition', async () => {
    const started = Date.now();
    const observed = await settle(undefined, { timeoutMs: 1000, pollIntervalMs: 5, fallbackDelayMs: 10 });

    expect(observed).toBe(false);
    expect(Date.now() - started).toBeGreaterThanOrEqual(9);
  });

  it('re-checks a timed-out condition once after the fallback delay', async () => {
    let calls = 0;
    const started = Date.now();
    const observed = await settle(() => {
      calls++;
      return calls >= 2;
    }, { timeoutMs: 0, pollIntervalMs: 5, fallbackDelayMs: 10 });

    expect(observed).toBe(true);
    expect(calls).toBe(2);
    expect(Date.now() - started).toBeGreaterThanOrEqual(9);
  });

  it('reports a condition that never holds', async () => {
    let calls = 0;
    const observed = await settle(() => {
      calls++;
      return false;
    }, { timeoutMs: 0, pollIntervalMs: 5, fallbackDelayMs: 0 });

    expect(observed).toBe(false);
    expect(calls).toBe(2);
  });

  it('reports an observed condition', async () => {
    await expect(
      settle(() => true, { timeoutMs: 1000, pollIntervalMs: 5, fallbackDelayMs: 1000 }),
    ).resolves.toBe(true);
  });
});
