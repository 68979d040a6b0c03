/**
 * In-process HTTP transport for tests
 * An axios adapter that answers from a handler instead of the network
 */

import { AxiosError } from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig, RawAxiosHeaders } from 'axios';

export interface MockReply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type MockFailure = { fail: 'timeout' } | { fail: 'network'; code?: string };

export type MockOutcome = MockReply | MockFailure;

export interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  body: string;
  headers: RawAxiosHeaders;
}

export type MockHandler = (request: RecordedRequest) => MockOutcome | Promise<MockOutcome>;

export interface MockTransport {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
}

function isFailure(outcome: MockOutcome): outcome is MockFailure {
  return 'fail' in outcome;
}

function lowercaseKeys(headers: Record<string, string> = {}): Record<string, string> {
  return Object.fromEntries(Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value]));
}

export function createMockTransport(handler: MockHandler): MockTransport {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const request: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: config.params,
      body: typeof config.data === 'string' ? config.data : '',
      headers: config.headers.toJSON(),
    };
    requests.push(request);

    const outcome = await handler(request);
    if (isFailure(outcome)) {
      if (outcome.fail === 'timeout') {
        throw new AxiosError(`timeout of ${config.timeout ?? 0}ms exceeded`, AxiosError.ECONNABORTED, config);
      }
      const code = outcome.code ?? 'ENOTFOUND';
      throw new AxiosError(`connect ${code}`, code, config);
    }

    return {
      data: outcome.data ?? '',
      status: outcome.status,
      statusText: String(outcome.status),
      headers: lowercaseKeys(outcome.headers),
      config,
      request: {},
    };
  };

  return { adapter, requests };
}

/**
 * Replays outcomes in order, repeating the last one once the list runs out
 */
export function sequence(...outcomes: MockOutcome[]): MockHandler {
  let index = 0;
  return () => {
    const outcome = outcomes[Math.min(index, outcomes.length - 1)];
    index++;
    return outcome;
  };
}

/**
 * Sleep stand-in that records requested delays and resolves immediately
 */
export function createRecordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
