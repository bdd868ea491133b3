import type { OracleHit } from '@minesite/shared';
import { ValidationError, errorMessage } from '../errors.js';
import { DEFAULT_NORMALIZER_OPTIONS, normalize, type NormalizerOptions } from '../services/normalizer.js';
import { formatIssues, gazetteerFileSchema, type GazetteerEntry } from '../validation.js';
import type { GeocodingOracle, LookupOptions } from './types.js';

// Minimum token overlap (Jaccard) for a partial-name hit
const FUZZY_THRESHOLD = 0.5;

interface IndexedEntry {
  entry: GazetteerEntry;
  keys: string[];
}

/**
 * In-memory gazetteer for offline runs.
 *
 * Queries are `"<name>"` or `"<name>, <qualifier>"`. A name equal to an entry's
 * normalized name or alias is an exact hit; otherwise entries sharing at least
 * half their tokens with the query are returned with confidence scaled by the
 * overlap. A qualifier keeps only entries whose region or place name mentions it.
 */
export class GazetteerOracle implements GeocodingOracle {
  readonly name = 'gazetteer';
  private readonly entries: IndexedEntry[];

  constructor(
    entries: readonly GazetteerEntry[],
    private readonly resultLimit = 3,
    private readonly normalizer: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS
  ) {
    this.entries = entries.map((entry) => ({
      entry,
      keys: [entry.name, ...entry.aliases].map((n) => normalize(n, normalizer)).filter((k) => k.length > 0),
    }));
  }

  static fromJson(text: string, resultLimit?: number, normalizer?: NormalizerOptions): GazetteerOracle {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(`Gazetteer is not valid JSON: ${errorMessage(error)}`);
    }
    const parsed = gazetteerFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Invalid gazetteer: ${formatIssues(parsed.error)}`);
    }
    return new GazetteerOracle(parsed.data.entries, resultLimit, normalizer);
  }

  async lookup(query: string, { signal }: LookupOptions = {}): Promise<OracleHit[]> {
    signal?.throwIfAborted();

    const [namePart, ...rest] = query.split(',');
    const name = normalize(namePart, this.normalizer);
    const qualifier = rest.join(',').trim().toLowerCase();
    if (name.length === 0) {
      return [];
    }

    const hits: OracleHit[] = [];
    for (const { entry, keys } of this.entries) {
      if (qualifier && !mentionsQualifier(entry, qualifier)) continue;

      if (keys.includes(name)) {
        hits.push(toHit(entry, entry.confidence, true));
        continue;
      }
      const overlap = Math.max(0, ...keys.map((key) => tokenOverlap(key, name)));
      if (overlap >= FUZZY_THRESHOLD) {
        hits.push(toHit(entry, entry.confidence * overlap, false));
      }
    }

    return hits
      .sort((a, b) => b.confidence - a.confidence || compareText(a.placeName, b.placeName))
      .slice(0, this.resultLimit);
  }
}

function mentionsQualifier(entry: GazetteerEntry, qualifier: string): boolean {
  return (
    (entry.region?.toLowerCase().includes(qualifier) ?? false) ||
    entry.placeName.toLowerCase().includes(qualifier)
  );
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

function tokenOverlap(a: string, b: string): number {
  const left = new Set(a.split(' '));
  const right = new Set(b.split(' '));
  let shared = 0;
  for (const token of left) {
    if (right.has(token)) shared++;
  }
  const union = left.size + right.size - shared;
  return union === 0 ? 0 : shared / union;
}

function toHit(entry: GazetteerEntry, confidence: number, exactMatch: boolean): OracleHit {
  return {
    latitude: entry.latitude,
    longitude: entry.longitude,
    placeName: entry.placeName,
    confidence,
    exactMatch,
  };
}
