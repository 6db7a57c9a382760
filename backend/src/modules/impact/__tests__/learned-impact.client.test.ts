/**
 * Learned impact client tests
 *
 * The model service is replaced by an in-process axios adapter.
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import axios, { AxiosError, type AxiosAdapter, type AxiosResponse } from 'axios';
import { LearnedImpactClient } from '../learned-impact.client.js';
import type { SentimentItem } from '../impact.types.js';

interface RecordedRequest {
  url: string | undefined;
  body: unknown;
}

function stubModel(reply: () => { status: number; data: unknown }) {
  const requests: RecordedRequest[] = [];

  const adapter: AxiosAdapter = async (config) => {
    const body: unknown = typeof config.data === 'string' ? JSON.parse(config.data) : config.data;
    requests.push({ url: config.url, body });

    const { status, data } = reply();
    const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
    }
    return response;
  };

  return { http: axios.create({ baseURL: 'http://learned-model.test', adapter }), requests };
}

function client(http: ReturnType<typeof stubModel>['http'], enabled = true): LearnedImpactClient {
  return new LearnedImpactClient({ enabled, baseURL: 'http://learned-model.test', timeoutMs: 1000, http });
}

const items: SentimentItem[] = [
  { textSourceId: 'a1', label: 'moderately_negative', score: 0.8, text: 'Guidance cut for next quarter' },
  { textSourceId: 'a2', label: 'slightly_positive', score: 0.55 },
];

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('LearnedImpactClient', () => {

  it('should return null without calling the model when disabled', async () => {
    const stub = stubModel(() => ({ status: 200, data: { prediction: 'strongly_positive', confidence: 0.9 } }));

    const result = await client(stub.http, false).score(items);

    expect(result).toBeNull();
    expect(stub.requests).toHaveLength(0);
  });

  it('should return null for an empty batch', async () => {
    const stub = stubModel(() => ({ status: 200, data: { prediction: 'strongly_positive', confidence: 0.9 } }));

    expect(await client(stub.http).score([])).toBeNull();
    expect(stub.requests).toHaveLength(0);
  });

  it('should post the batch and turn the reply into a verdict', async () => {
    const stub = stubModel(() => ({ status: 200, data: { prediction: 'moderately_negative', confidence: 0.72 } }));

    const result = await client(stub.http).score(items);

    expect(result).toEqual({
      classification: 'moderately_negative',
      confidence: 0.72,
      rationale: 'Learned model prediction based on 2 articles. Model confidence: 72.00%',
      numericScore: -2,
    });
    expect(stub.requests).toEqual([
      {
        url: '/predict',
        body: {
          items: [
            { textSourceId: 'a1', label: 'moderately_negative', score: 0.8, text: 'Guidance cut for next quarter' },
            { textSourceId: 'a2', label: 'slightly_positive', score: 0.55, text: '' },
          ],
        },
      },
    ]);
  });

  it('should keep the reasoning sent by the model', async () => {
    const stub = stubModel(() => ({
      status: 200,
      data: { prediction: 'slightly_positive', confidence: 0.51, reasoning: 'Mostly routine coverage.' },
    }));

    const result = await client(stub.http).score(items);

    expect(result?.rationale).toBe('Mostly routine coverage.');
    expect(result?.numericScore).toBe(1);
  });

  it('should return null for a reply outside the six-level set', async () => {
    const stub = stubModel(() => ({ status: 200, data: { prediction: 'bullish', confidence: 0.9 } }));

    expect(await client(stub.http).score(items)).toBeNull();
  });

  it('should return null when the model answers with an error status', async () => {
    const stub = stubModel(() => ({ status: 503, data: { error: 'model loading' } }));

    expect(await client(stub.http).score(items)).toBeNull();
  });

  it('should return null when the model cannot be reached', async () => {
    const http = axios.create({
      adapter: async () => {
        throw new Error('connect ECONNREFUSED 127.0.0.1:8015');
      },
    });

    expect(await client(http).score(items)).toBeNull();
  });
});
