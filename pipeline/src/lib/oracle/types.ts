import type { OracleHit } from '@minesite/shared';

export interface LookupOptions {
  signal?: AbortSignal;
}

/**
 * Geocoding oracle: name in, zero or more coordinate hits out.
 * Implementations may reject on transport errors; callers degrade
 * a rejected lookup to zero hits.
 */
export interface GeocodingOracle {
  readonly name: string;
  lookup(query: string, options?: LookupOptions): Promise<OracleHit[]>;
}
