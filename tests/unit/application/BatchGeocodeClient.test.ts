import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BatchGeocodeClient } from '../../../src/application/BatchGeocodeClient.js';
import type { PollTick } from '../../../src/application/BatchGeocodeClient.js';
import {
  BatchFailedError,
  ConfigError,
  MissingContinuationError,
  PollTimeoutError,
  ResultCountMismatchError,
  TransportError,
} from '../../../src/domain/errors/GeocodeErrors.js';
import {
  CONTINUATION,
  ENDPOINT,
  FakeClock,
  accepted,
  clientConfig,
  json,
  matchItem,
  noMatchItem,
  text,
} from '../../helpers/fakes.js';

const mockFetch = vi.fn();

beforeEach(() => {
  mockFetch.mockReset();
  vi.stubGlobal('fetch', mockFetch);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function callAt(index: number): { url: string; init: RequestInit | undefined } {
  const call = mockFetch.mock.calls[index];
  return { url: String(call?.[0]), init: call?.[1] };
}

const requests = [
  { query: '1 Main St', countrySet: 'US' },
  { query: '2 Oak Ave', countrySet: 'US' },
];

describe('BatchGeocodeClient', () => {
  describe('constructor', () => {
    it('should reject a blank credential before any request', () => {
      expect(() => new BatchGeocodeClient(clientConfig({ credential: '  ' }))).toThrow(ConfigError);
      expect(() => new BatchGeocodeClient(clientConfig({ credential: '' }))).toThrow(
        'Batch client credential is not set.',
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });

  describe('submit()', () => {
    it('should POST batchItems with api-version and credential as query parameters', async () => {
      mockFetch.mockResolvedValueOnce(accepted());
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      const continuation = await client.submit(requests);

      expect(continuation).toBe(CONTINUATION);
      const { url, init } = callAt(0);
      expect(url).toBe(`${ENDPOINT}?api-version=1.0&subscription-key=test-secret`);
      expect(init?.method).toBe('POST');
      expect(init?.body).toBe(JSON.stringify({ batchItems: requests }));
      expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
    });

    it('should fall back to the Operation-Location header', async () => {
      mockFetch.mockResolvedValueOnce(accepted({ 'operation-location': 'https://geo.test/ops/9' }));
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      await expect(client.submit(requests)).resolves.toBe('https://geo.test/ops/9');
    });

    it('should resolve a relative continuation URL against the endpoint', async () => {
      mockFetch.mockResolvedValueOnce(accepted({ Location: '/ops/7' }));
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      await expect(client.submit(requests)).resolves.toBe('https://geo.test/ops/7');
    });

    it('should accept a 200 answer that carries a continuation header', async () => {
      mockFetch.mockResolvedValueOnce(json({}, 200, { Location: CONTINUATION }));
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      await expect(client.submit(requests)).resolves.toBe(CONTINUATION);
    });

    it('should still require the continuation header on a 200 answer', async () => {
      mockFetch.mockResolvedValueOnce(json({}, 200));
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      await expect(client.submit(requests)).rejects.toThrow(MissingContinuationError);
    });

    it('should throw MissingContinuationError when neither header is present', async () => {
      mockFetch.mockResolvedValueOnce(accepted({}));
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      await expect(client.submit(requests)).rejects.toThrow(MissingContinuationError);
    });

    it('should throw TransportError on an error status', async () => {
      mockFetch.mockResolvedValueOnce(json({ error: { code: 'Unauthorized' } }, 401));
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      const error = await client.submit(requests).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ status: 401 });
    });

    it('should wrap network failures in TransportError', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      await expect(client.submit(requests)).rejects.toThrow(TransportError);
    });
  });

  describe('poll()', () => {
    it('should sleep on 202 and return the body once batchItems is present', async () => {
      const body = { batchItems: [matchItem(1, 2)] };
      mockFetch
        .mockResolvedValueOnce(accepted({}))
        .mockResolvedValueOnce(accepted({}))
        .mockResolvedValueOnce(json(body));
      const clock = new FakeClock();
      const client = new BatchGeocodeClient(clientConfig(), { clock });

      await expect(client.poll(CONTINUATION)).resolves.toEqual(body);
      expect(clock.sleeps).toEqual([2000, 2000]);
      expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('should merge credential parameters into the continuation URL without duplicates', async () => {
      mockFetch.mockResolvedValueOnce(json({ batchItems: [] }));
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      await client.poll(CONTINUATION);

      const { url, init } = callAt(0);
      expect(url).toBe('https://geo.test/search/address/batch/abc-123?api-version=1.0&subscription-key=test-secret');
      expect(init?.method).toBe('GET');
    });

    it('should honor Retry-After up to the per-tick cap', async () => {
      mockFetch
        .mockResolvedValueOnce(accepted({ 'Retry-After': '5' }))
        .mockResolvedValueOnce(accepted({ 'Retry-After': '120' }))
        .mockResolvedValueOnce(json({ batchItems: [] }));
      const clock = new FakeClock();
      const client = new BatchGeocodeClient(clientConfig(), { clock });

      await client.poll(CONTINUATION);

      expect(clock.sleeps).toEqual([5000, 15000]);
    });

    it('should keep polling while the state is running and stop on Succeeded', async () => {
      const done = { summary: { state: 'Succeeded' }, batchItemsUrl: 'elsewhere' };
      mockFetch
        .mockResolvedValueOnce(json({ summary: { state: 'Running' } }))
        .mockResolvedValueOnce(json({ status: 'Pending' }))
        .mockResolvedValueOnce(json(done));
      const clock = new FakeClock();
      const client = new BatchGeocodeClient(clientConfig(), { clock });

      await expect(client.poll(CONTINUATION)).resolves.toEqual(done);
      expect(clock.sleeps).toEqual([2000, 2000]);
    });

    it('should retry after a short sleep on non-JSON bodies and unknown states', async () => {
      mockFetch
        .mockResolvedValueOnce(text('<html>gateway</html>'))
        .mockResolvedValueOnce(json({ status: 'Queued' }))
        .mockResolvedValueOnce(json({ batchItems: [] }));
      const clock = new FakeClock();
      const client = new BatchGeocodeClient(clientConfig(), { clock });

      await client.poll(CONTINUATION);

      expect(clock.sleeps).toEqual([3000, 3000]);
    });

    it('should report every non-final tick', async () => {
      mockFetch
        .mockResolvedValueOnce(accepted({}))
        .mockResolvedValueOnce(json({ status: 'InProgress' }))
        .mockResolvedValueOnce(json({ batchItems: [] }));
      const ticks: PollTick[] = [];
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      await client.poll(CONTINUATION, (tick) => ticks.push(tick));

      expect(ticks).toEqual([
        { state: 'POLLING', detail: 'HTTP 202', sleepMs: 2000 },
        { state: 'POLLING', detail: 'InProgress', sleepMs: 2000 },
      ]);
    });

    it('should throw BatchFailedError with a truncated snapshot on Failed', async () => {
      const body = { status: 'Failed', error: { message: 'y'.repeat(800) } };
      mockFetch.mockResolvedValueOnce(json(body));
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      const error = await client.poll(CONTINUATION).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BatchFailedError);
      expect(error).toMatchObject({ snapshot: JSON.stringify(body).slice(0, 500) });
    });

    it('should throw TransportError on an error status while polling', async () => {
      mockFetch.mockResolvedValueOnce(accepted({})).mockResolvedValueOnce(text('oops', 500));
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      await expect(client.poll(CONTINUATION)).rejects.toThrow('Batch poll failed with HTTP 500: oops');
    });

    it('should time out once elapsed polling passes the ceiling', async () => {
      mockFetch.mockImplementation(() => Promise.resolve(accepted({})));
      const clock = new FakeClock();
      const client = new BatchGeocodeClient(clientConfig({ pollFloorMs: 2000, pollCeilingMs: 10_000 }), { clock });

      const error = await client.poll(CONTINUATION).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(PollTimeoutError);
      expect(error).toMatchObject({ elapsedMs: 12_000 });
      expect(mockFetch).toHaveBeenCalledTimes(6);
    });

    it('should time out on a steady stream of unknown states', async () => {
      mockFetch.mockImplementation(() => Promise.resolve(json({})));
      const client = new BatchGeocodeClient(clientConfig({ pollCeilingMs: 7000 }), { clock: new FakeClock() });

      await expect(client.poll(CONTINUATION)).rejects.toThrow('Polling timed out for batch job (unknown state (none))');
      expect(mockFetch).toHaveBeenCalledTimes(3);
    });
  });

  describe('geocodeBatch()', () => {
    it('should submit, poll and return one result per request', async () => {
      mockFetch
        .mockResolvedValueOnce(accepted())
        .mockResolvedValueOnce(accepted({}))
        .mockResolvedValueOnce(json({ batchItems: [matchItem(40.7, -74.0, 'Point Address', 0.97), noMatchItem()] }));
      const onSubmitted = vi.fn();
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      const results = await client.geocodeBatch(requests, { onSubmitted });

      expect(results).toEqual([
        { lat: 40.7, lon: -74.0, status: 'Point Address', confidence: 0.97 },
        { lat: null, lon: null, status: 'No Match', confidence: null },
      ]);
      expect(onSubmitted).toHaveBeenCalledWith(CONTINUATION);
    });

    it('should reject a response with fewer results than requests', async () => {
      mockFetch.mockResolvedValueOnce(accepted()).mockResolvedValueOnce(json({ batchItems: [matchItem(1, 1)] }));
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      await expect(client.geocodeBatch(requests)).rejects.toThrow(ResultCountMismatchError);
    });

    it('should reject an empty batchItems for a non-empty batch', async () => {
      mockFetch.mockResolvedValueOnce(accepted()).mockResolvedValueOnce(json({ batchItems: [] }));
      const client = new BatchGeocodeClient(clientConfig(), { clock: new FakeClock() });

      await expect(client.geocodeBatch(requests)).rejects.toThrow('expected 2, got 0');
    });
  });
});
