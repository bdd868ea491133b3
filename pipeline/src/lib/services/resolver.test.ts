import { describe, it, expect } from 'vitest';
import { MatchKind, type GeoCandidate, type Mention, type OracleHit } from '@minesite/shared';
import { loadSettings } from '../config.js';
import { OracleUnavailableError, OracleUnreachableError } from '../errors.js';
import { OracleHealthMonitor } from '../oracle/health.js';
import type { GeocodingOracle, LookupOptions } from '../oracle/types.js';
import { aggregate } from './aggregator.js';
import { buildQualifierOptions } from './qualifiers.js';
import { dedupeCandidates, resolve, type ResolverOptions } from './resolver.js';

type Reply = OracleHit[] | Error | 'hang';

class FakeOracle implements GeocodingOracle {
  readonly name = 'fake';
  readonly queries: string[] = [];
  readonly signals: AbortSignal[] = [];

  constructor(private readonly replies: Record<string, Reply>) {}

  async lookup(query: string, { signal }: LookupOptions = {}): Promise<OracleHit[]> {
    this.queries.push(query);
    if (signal) this.signals.push(signal);
    const reply = this.replies[query] ?? [];
    if (reply === 'hang') return new Promise<OracleHit[]>(() => {});
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

const settings = loadSettings({});

function resolverOptions(overrides: Partial<ResolverOptions> = {}): ResolverOptions {
  return {
    timeoutMs: 1000,
    dedupePrecision: 4,
    nullIslandTolerance: 0.0001,
    qualifiers: buildQualifierOptions(settings.regions, 3),
    ...overrides,
  };
}

function project(rawText: string, contexts: string[] = ['']) {
  const mentions: Mention[] = contexts.map((contextWindow) => ({
    rawText,
    documentId: 'report.pdf#p1',
    charSpan: [0, rawText.length],
    nerConfidence: 0.8,
    contextWindow,
  }));
  return aggregate(mentions)[0];
}

function hit(latitude: number, longitude: number, placeName: string, confidence: number, exactMatch?: boolean): OracleHit {
  return { latitude, longitude, placeName, confidence, ...(exactMatch !== undefined && { exactMatch }) };
}

describe('resolver', () => {
  describe('resolve', () => {
    it('takes the match kind from the oracle exact-match report', async () => {
      const oracle = new FakeOracle({
        boddington: [
          hit(-32.8, 116.47, 'Boddington, Western Australia', 0.6, true),
          hit(-31.95, 115.86, 'Boddington Street, Perth', 0.7, false),
        ],
      });

      const candidates = await resolve(project('Boddington Gold Mine'), oracle, resolverOptions());

      expect(oracle.queries).toEqual(['boddington']);
      expect(candidates).toEqual([
        {
          latitude: -32.8,
          longitude: 116.47,
          placeName: 'Boddington, Western Australia',
          sourceConfidence: 0.6,
          matchKind: MatchKind.EXACT,
          query: 'boddington',
        },
        {
          latitude: -31.95,
          longitude: 115.86,
          placeName: 'Boddington Street, Perth',
          sourceConfidence: 0.7,
          matchKind: MatchKind.FUZZY,
          query: 'boddington',
        },
      ]);
    });

    it('compares the place name when the oracle does not report exactness', async () => {
      const oracle = new FakeOracle({
        boddington: [
          hit(-32.8, 116.47, 'Boddington, Western Australia', 0.6),
          hit(-32.1, 116.2, 'Boddington Gold Mine Road, Western Australia', 0.5),
        ],
      });

      const candidates = await resolve(project('Boddington'), oracle, resolverOptions());

      expect(candidates.map((c) => c.matchKind)).toEqual([MatchKind.EXACT, MatchKind.FUZZY]);
    });

    it('adds one contextual lookup per qualifier', async () => {
      const oracle = new FakeOracle({
        'boddington, Western Australia': [hit(-32.79, 116.46, 'Boddington, Western Australia', 0.8)],
      });

      const candidates = await resolve(
        project('Boddington', ['The Boddington project is located in Western Australia.']),
        oracle,
        resolverOptions()
      );

      expect(oracle.queries).toEqual(['boddington', 'boddington, Western Australia']);
      expect(candidates).toHaveLength(1);
      expect(candidates[0].matchKind).toBe(MatchKind.CONTEXTUAL);
      expect(candidates[0].query).toBe('boddington, Western Australia');
    });

    it('drops null-island, out-of-range and malformed hits', async () => {
      const oracle = new FakeOracle({
        boddington: [
          hit(0, 0, 'Null Island', 0.9, true),
          hit(95, 10, 'Nowhere', 0.9, true),
          hit(-32.8, 116.47, 'Boddington', 1.5, true),
          hit(-32.8, 116.47, 'Boddington', 0.6, true),
        ],
      });

      const candidates = await resolve(project('Boddington'), oracle, resolverOptions());

      expect(candidates).toHaveLength(1);
      expect(candidates[0].sourceConfidence).toBe(0.6);
    });

    it('returns no candidates when the oracle finds nothing', async () => {
      const candidates = await resolve(project('Tropicana'), new FakeOracle({}), resolverOptions());
      expect(candidates).toEqual([]);
    });

    it('turns a failed lookup into no candidates and reports it', async () => {
      const failures: OracleUnavailableError[] = [];
      const health = new OracleHealthMonitor(10);
      const oracle = new FakeOracle({ boddington: new Error('socket hang up') });

      const candidates = await resolve(
        project('Boddington'),
        oracle,
        resolverOptions({ health, onLookupFailure: (failure) => failures.push(failure) })
      );

      expect(candidates).toEqual([]);
      expect(failures).toHaveLength(1);
      expect(failures[0].message).toBe('Oracle lookup failed for "boddington": socket hang up');
      expect(health.lookups).toBe(1);
      expect(health.failedLookups).toBe(1);
    });

    it('times out a hanging lookup and aborts it', async () => {
      const failures: OracleUnavailableError[] = [];
      const oracle = new FakeOracle({ boddington: 'hang' });

      const candidates = await resolve(
        project('Boddington'),
        oracle,
        resolverOptions({ timeoutMs: 20, onLookupFailure: (failure) => failures.push(failure) })
      );

      expect(candidates).toEqual([]);
      expect(failures.map((f) => f.message)).toEqual(['Oracle lookup failed for "boddington": timed out after 20ms']);
      expect(oracle.signals[0].aborted).toBe(true);
    });

    it('rethrows when the health monitor trips', async () => {
      const oracle = new FakeOracle({ boddington: new Error('ECONNREFUSED') });

      await expect(
        resolve(project('Boddington'), oracle, resolverOptions({ health: new OracleHealthMonitor(1) }))
      ).rejects.toBeInstanceOf(OracleUnreachableError);
    });
  });

  describe('dedupeCandidates', () => {
    const base: GeoCandidate = {
      latitude: -32.80001,
      longitude: 116.47,
      placeName: 'Boddington, Western Australia',
      sourceConfidence: 0.9,
      matchKind: MatchKind.FUZZY,
      query: 'boddington',
    };

    it('merges candidates at the same rounded coordinate', () => {
      const merged = dedupeCandidates(
        [
          base,
          {
            ...base,
            latitude: -32.80004,
            sourceConfidence: 0.5,
            matchKind: MatchKind.CONTEXTUAL,
            query: 'boddington, Western Australia',
          },
        ],
        4
      );

      expect(merged).toEqual([{ ...base, matchKind: MatchKind.CONTEXTUAL }]);
    });

    it('keeps candidates at different coordinates in first-seen order', () => {
      const other = { ...base, latitude: -31.95, placeName: 'Perth' };
      expect(dedupeCandidates([base, other], 4)).toEqual([base, other]);
    });
  });
});
