/**
 * Rate Governor Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { AxiosHeaders } from 'axios';
import type { AxiosResponse } from 'axios';
import { RateGovernor, parseCallLimit, parseRetryAfter } from '../utils/rate-governor.js';
import { createRecordingSleep } from '../__mocks__/http.js';
import { TransportTimeoutError } from '../errors.js';

const context = { operation: 'findBySku', identifier: 'SKU-1' };

function response(status: number, headers: Record<string, string> = {}): AxiosResponse {
  return { status, statusText: String(status), data: {}, headers, config: { headers: new AxiosHeaders() } };
}

function callLimit(value: string): Record<string, string> {
  return { 'x-shopify-shop-api-call-limit': value };
}

describe('parseCallLimit', () => {
  it('should parse a used/allowed pair', () => {
    expect(parseCallLimit('32/40')).toEqual({ used: 32, allowed: 40 });
    expect(parseCallLimit(' 1 / 80 ')).toEqual({ used: 1, allowed: 80 });
  });

  it('should ignore absent or malformed values', () => {
    expect(parseCallLimit(undefined)).toBeNull();
    expect(parseCallLimit('')).toBeNull();
    expect(parseCallLimit('forty')).toBeNull();
    expect(parseCallLimit('3/0')).toBeNull();
  });
});

describe('parseRetryAfter', () => {
  it('should convert seconds to milliseconds', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter('0.5')).toBe(500);
  });

  it('should ignore values that are not a number of seconds', () => {
    expect(parseRetryAfter(undefined)).toBeNull();
    expect(parseRetryAfter('soon')).toBeNull();
    expect(parseRetryAfter('-1')).toBeNull();
  });
});

describe('RateGovernor', () => {
  describe('observe', () => {
    it('should adapt the delay to header usage', async () => {
      const { sleep } = createRecordingSleep();
      const governor = new RateGovernor({}, { sleep, now: () => 0 });

      await governor.observe(callLimit('36/40'));
      expect(governor.getState().delayMs).toBe(750);

      await governor.observe(callLimit('24/40'));
      expect(governor.getState().delayMs).toBe(900);

      await governor.observe(callLimit('12/40'));
      expect(governor.getState().delayMs).toBeCloseTo(720);
      expect(governor.getState()).toMatchObject({ callsUsed: 12, callsAllowed: 40 });
    });

    it('should keep the delay within its bounds', async () => {
      const { sleep } = createRecordingSleep();

      const high = new RateGovernor({ initialDelayMs: 1900 }, { sleep, now: () => 0 });
      await high.observe(callLimit('39/40'));
      expect(high.getState().delayMs).toBe(2000);

      const moderate = new RateGovernor({ initialDelayMs: 900 }, { sleep, now: () => 0 });
      await moderate.observe(callLimit('20/40'));
      expect(moderate.getState().delayMs).toBe(1000);

      const low = new RateGovernor({}, { sleep, now: () => 0 });
      await low.observe(callLimit('1/40'));
      expect(low.getState().delayMs).toBe(500);
    });

    it('should leave the state alone without a call-limit header', async () => {
      const { sleep, delays } = createRecordingSleep();
      const governor = new RateGovernor({}, { sleep, now: () => 0 });

      await governor.observe({});

      expect(governor.getState()).toEqual({ callsUsed: 0, callsAllowed: 0, windowStartedAt: 0, delayMs: 500 });
      expect(delays).toEqual([]);
    });

    it('should cool down and reset counters once the quota is used up', async () => {
      const { sleep, delays } = createRecordingSleep();
      const governor = new RateGovernor({}, { sleep, now: () => 0 });

      await governor.observe(callLimit('40/40'));

      expect(delays).toEqual([1000]);
      expect(governor.getState()).toMatchObject({ callsUsed: 0, callsAllowed: 0, delayMs: 500 });
    });

    it('should reset counters once the window has elapsed', async () => {
      const { sleep } = createRecordingSleep();
      let clock = 0;
      const governor = new RateGovernor({}, { sleep, now: () => clock });

      await governor.observe(callLimit('10/40'));
      expect(governor.getState().callsUsed).toBe(10);

      clock = 1500;
      await governor.observe({});

      expect(governor.getState()).toMatchObject({ callsUsed: 0, callsAllowed: 0, windowStartedAt: 1500 });
    });
  });

  describe('execute', () => {
    it('should wait the current delay before each call', async () => {
      const { sleep, delays } = createRecordingSleep();
      const governor = new RateGovernor({}, { sleep, now: () => 0 });
      const send = vi.fn(async () => response(200));

      const result = await governor.execute(send, context);

      expect(result.status).toBe(200);
      expect(send).toHaveBeenCalledTimes(1);
      expect(delays).toEqual([500]);
    });

    it('should honour Retry-After and return the last 429 once attempts run out', async () => {
      const { sleep, delays } = createRecordingSleep();
      const governor = new RateGovernor({ initialDelayMs: 0 }, { sleep, now: () => 0 });
      const send = vi.fn(async () => response(429, { 'retry-after': '2' }));

      const result = await governor.execute(send, context);

      expect(result.status).toBe(429);
      expect(send).toHaveBeenCalledTimes(5);
      expect(delays).toEqual([2000, 2000, 2000, 2000]);
    });

    it('should back off exponentially without Retry-After', async () => {
      const { sleep, delays } = createRecordingSleep();
      const governor = new RateGovernor({ initialDelayMs: 0 }, { sleep, now: () => 0 });
      const send = vi.fn(async () => response(429));

      await governor.execute(send, context);

      expect(delays).toEqual([1000, 2000, 4000, 8000]);
    });

    it('should cap the backoff', async () => {
      const { sleep, delays } = createRecordingSleep();
      const governor = new RateGovernor({ initialDelayMs: 0, maxAttempts: 7 }, { sleep, now: () => 0 });

      await governor.execute(async () => response(503), context);

      expect(delays).toEqual([1000, 2000, 4000, 8000, 16000, 16000]);
    });

    it('should stop retrying once a call succeeds', async () => {
      const { sleep, delays } = createRecordingSleep();
      const governor = new RateGovernor({ initialDelayMs: 0 }, { sleep, now: () => 0 });
      const send = vi
        .fn<() => Promise<AxiosResponse>>()
        .mockResolvedValueOnce(response(500))
        .mockResolvedValueOnce(response(200));

      const result = await governor.execute(send, context);

      expect(result.status).toBe(200);
      expect(send).toHaveBeenCalledTimes(2);
      expect(delays).toEqual([1000]);
    });

    it('should not retry client errors', async () => {
      const { sleep } = createRecordingSleep();
      const governor = new RateGovernor({ initialDelayMs: 0 }, { sleep, now: () => 0 });
      const send = vi.fn(async () => response(422));

      const result = await governor.execute(send, context);

      expect(result.status).toBe(422);
      expect(send).toHaveBeenCalledTimes(1);
    });

    it('should rethrow a transport failure after the last attempt', async () => {
      const { sleep, delays } = createRecordingSleep();
      const governor = new RateGovernor({ initialDelayMs: 0 }, { sleep, now: () => 0 });
      const failure = new Error('socket hang up');
      const send = vi.fn(async (): Promise<AxiosResponse> => {
        throw failure;
      });

      await expect(governor.execute(send, context)).rejects.toBe(failure);
      expect(send).toHaveBeenCalledTimes(5);
      expect(delays).toEqual([1000, 2000, 4000, 8000]);
    });

    it('should not repeat a call whose connect timeouts were already retried', async () => {
      const { sleep, delays } = createRecordingSleep();
      const governor = new RateGovernor({ initialDelayMs: 0 }, { sleep, now: () => 0 });
      const timeout = new TransportTimeoutError('setInventory', 3);
      const send = vi.fn(async (): Promise<AxiosResponse> => {
        throw timeout;
      });

      await expect(governor.execute(send, context)).rejects.toBe(timeout);
      expect(send).toHaveBeenCalledTimes(1);
      expect(delays).toEqual([]);
    });
  });
});
