import type { OracleHit } from '@minesite/shared';
import { OracleUnavailableError } from '../errors.js';
import { DEFAULT_NORMALIZER_OPTIONS, normalize, type NormalizerOptions } from '../services/normalizer.js';
import { formatIssues, nominatimResponseSchema, type NominatimPlace, type OracleSettings } from '../validation.js';
import type { GeocodingOracle, LookupOptions } from './types.js';

// Nominatim returns no importance for some places
const DEFAULT_IMPORTANCE = 0.5;

type NominatimOptions = Pick<OracleSettings, 'nominatimUrl' | 'userAgent' | 'minDelayMs' | 'resultLimit'> & {
  // Must match the pipeline's normalizer so exactMatch compares like with like
  normalizer?: NormalizerOptions;
};

/**
 * OpenStreetMap Nominatim search client.
 *
 * Requests are spaced at least `minDelayMs` apart across all callers of this
 * instance (the public endpoint allows one request per second).
 */
export class NominatimOracle implements GeocodingOracle {
  readonly name = 'nominatim';
  private nextSlotAt = 0;

  constructor(
    private readonly options: NominatimOptions,
    private readonly fetchImpl: typeof fetch = fetch,
    private readonly now: () => number = Date.now
  ) {}

  async lookup(query: string, { signal }: LookupOptions = {}): Promise<OracleHit[]> {
    await this.waitForSlot();

    const url = new URL('/search', this.options.nominatimUrl);
    url.searchParams.set('q', query);
    url.searchParams.set('format', 'jsonv2');
    url.searchParams.set('limit', String(this.options.resultLimit));

    const response = await this.fetchImpl(url, {
      signal,
      headers: {
        'User-Agent': this.options.userAgent,
        Accept: 'application/json',
      },
    });

    if (!response.ok) {
      throw new OracleUnavailableError(query, `HTTP ${response.status}: ${response.statusText}`);
    }

    const body: unknown = await response.json();
    const parsed = nominatimResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new OracleUnavailableError(query, `malformed response (${formatIssues(parsed.error)})`);
    }

    const normalizer = this.options.normalizer ?? DEFAULT_NORMALIZER_OPTIONS;
    const queryName = normalize(query.split(',')[0], normalizer);
    return parsed.data.map((place) => toHit(place, queryName, normalizer));
  }

  // Reserve the next free slot synchronously so concurrent callers queue up
  private async waitForSlot(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.options.minDelayMs;
    if (slot > now) {
      await new Promise((resolve) => setTimeout(resolve, slot - now));
    }
  }
}

function toHit(place: NominatimPlace, queryName: string, normalizer: NormalizerOptions): OracleHit {
  return {
    latitude: Number(place.lat),
    longitude: Number(place.lon),
    placeName: place.display_name,
    confidence: Math.max(0, Math.min(place.importance ?? DEFAULT_IMPORTANCE, 1)),
    ...(place.name !== undefined && { exactMatch: normalize(place.name, normalizer) === queryName }),
  };
}
