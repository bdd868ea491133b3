import { describe, it, expect, vi, afterEach } from 'vitest';
import { OracleUnavailableError } from '../errors.js';
import { buildNormalizerOptions } from '../services/normalizer.js';
import { NominatimOracle } from './nominatim.js';

const options = {
  nominatimUrl: 'https://nominatim.test',
  userAgent: 'minesite-geo/test',
  minDelayMs: 0,
  resultLimit: 3,
};

const boddington = {
  lat: '-32.80',
  lon: '116.47',
  display_name: 'Boddington, Shire of Boddington, Western Australia, Australia',
  name: 'Boddington',
  importance: 0.61,
};

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

describe('NominatimOracle', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('queries the search endpoint with the identifying User-Agent', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([]));
    const oracle = new NominatimOracle(options, fetchImpl);

    await oracle.lookup('boddington');

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(String(url)).toBe('https://nominatim.test/search?q=boddington&format=jsonv2&limit=3');
    expect(init?.headers).toEqual({ 'User-Agent': 'minesite-geo/test', Accept: 'application/json' });
  });

  it('maps results to hits and reports exact name matches', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(
      jsonResponse([boddington, { ...boddington, name: 'Boddington Road', importance: 1.4 }])
    );
    const oracle = new NominatimOracle(options, fetchImpl);

    const hits = await oracle.lookup('boddington, Western Australia');

    expect(hits).toEqual([
      {
        latitude: -32.8,
        longitude: 116.47,
        placeName: 'Boddington, Shire of Boddington, Western Australia, Australia',
        confidence: 0.61,
        exactMatch: true,
      },
      {
        latitude: -32.8,
        longitude: 116.47,
        placeName: 'Boddington, Shire of Boddington, Western Australia, Australia',
        confidence: 1,
        exactMatch: false,
      },
    ]);
  });

  it('compares names with the configured normalizer', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockImplementation(async () => jsonResponse([{ ...boddington, name: 'Greenbushes' }]));
    const normalizer = buildNormalizerOptions({ genericSuffixTokens: ['hub'], genericPrefixTokens: [] });

    const [configured] = await new NominatimOracle({ ...options, normalizer }, fetchImpl).lookup('greenbushes hub');
    const [fallback] = await new NominatimOracle(options, fetchImpl).lookup('greenbushes hub');

    expect(configured.exactMatch).toBe(true);
    expect(fallback.exactMatch).toBe(false);
  });

  it('leaves exactness unreported without a name and defaults the importance', async () => {
    const { name: _name, importance: _importance, ...bare } = boddington;
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([bare]));

    const [hit] = await new NominatimOracle(options, fetchImpl).lookup('boddington');

    expect(hit).not.toHaveProperty('exactMatch');
    expect(hit.confidence).toBe(0.5);
  });

  it('rejects on an HTTP error', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockResolvedValue(new Response(null, { status: 503, statusText: 'Service Unavailable' }));

    await expect(new NominatimOracle(options, fetchImpl).lookup('boddington')).rejects.toThrow(
      'Oracle lookup failed for "boddington": HTTP 503: Service Unavailable'
    );
  });

  it('rejects a malformed response body', async () => {
    const fetchImpl = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: 'Unable to geocode' }));

    const lookup = new NominatimOracle(options, fetchImpl).lookup('boddington');

    await expect(lookup).rejects.toBeInstanceOf(OracleUnavailableError);
    await expect(lookup).rejects.toThrow(/malformed response/);
  });

  it('spaces requests by the minimum delay', async () => {
    vi.useFakeTimers();
    const fetchImpl = vi.fn<typeof fetch>().mockImplementation(async () => jsonResponse([]));
    const oracle = new NominatimOracle({ ...options, minDelayMs: 1000 }, fetchImpl, () => 0);

    const first = oracle.lookup('boddington');
    const second = oracle.lookup('tropicana');

    await vi.advanceTimersByTimeAsync(999);
    expect(fetchImpl).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(1);
    expect(fetchImpl).toHaveBeenCalledTimes(2);

    await expect(Promise.all([first, second])).resolves.toEqual([[], []]);
  });
});
