import {
  MATCH_KIND_SPECIFICITY,
  MatchKind,
  type GeoCandidate,
  type OracleHit,
  type ProjectRecord,
} from '@minesite/shared';
import { OracleUnavailableError, errorMessage } from '../errors.js';
import { checkCoordinate, coordinateKey } from '../geo.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { OracleHealthMonitor } from '../oracle/health.js';
import type { GeocodingOracle } from '../oracle/types.js';
import { oracleHitSchema, oracleResponseSchema } from '../validation.js';
import { normalize, DEFAULT_NORMALIZER_OPTIONS, type NormalizerOptions } from './normalizer.js';
import { extractQualifiers, type QualifierOptions } from './qualifiers.js';

export interface ResolverOptions {
  timeoutMs: number;
  dedupePrecision: number;
  nullIslandTolerance: number;
  qualifiers: QualifierOptions;
  normalizer?: NormalizerOptions;
  health?: OracleHealthMonitor;
  logger?: Logger;
  onLookupFailure?: (error: OracleUnavailableError) => void;
}

interface Lookup {
  query: string;
  // null: EXACT or FUZZY depending on the oracle's exact-match report
  kind: typeof MatchKind.CONTEXTUAL | null;
}

// ============================================================
// Public API
// ============================================================

/**
 * Collect geo-candidates for one project.
 *
 * Always looks up the normalized name, then `"<name>, <qualifier>"` for each
 * location qualifier mined from the mention contexts. Failed lookups yield
 * nothing; invalid and null-island hits are dropped; hits at the same rounded
 * coordinate are merged. An empty result is a normal outcome.
 *
 * Rethrows only OracleUnreachableError from the health monitor.
 */
export async function resolve(
  project: ProjectRecord,
  oracle: GeocodingOracle,
  options: ResolverOptions
): Promise<GeoCandidate[]> {
  const log = (options.logger ?? rootLogger).child({ project: project.normalizedName });
  const normalizer = options.normalizer ?? DEFAULT_NORMALIZER_OPTIONS;

  const qualifiers = extractQualifiers(
    project.mentions.map((m) => m.contextWindow),
    options.qualifiers,
    project.normalizedName
  );

  const lookups: Lookup[] = [{ query: project.normalizedName, kind: null }];
  for (const qualifier of qualifiers) {
    lookups.push({ query: `${project.normalizedName}, ${qualifier}`, kind: MatchKind.CONTEXTUAL });
  }

  const candidates: GeoCandidate[] = [];
  for (const lookup of lookups) {
    const hits = await runLookup(oracle, lookup.query, options, log);
    for (const hit of hits) {
      const rejection = checkCoordinate(hit.latitude, hit.longitude, options.nullIslandTolerance);
      if (rejection) {
        log.debug({ query: lookup.query, placeName: hit.placeName }, rejection.message);
        continue;
      }
      candidates.push({
        latitude: hit.latitude,
        longitude: hit.longitude,
        placeName: hit.placeName,
        sourceConfidence: hit.confidence,
        matchKind: lookup.kind ?? nameMatchKind(project.normalizedName, hit, normalizer),
        query: lookup.query,
      });
    }
  }

  const merged = dedupeCandidates(candidates, options.dedupePrecision);
  log.debug(
    { lookups: lookups.length, hits: candidates.length, candidates: merged.length, qualifiers },
    'Resolved geo-candidates'
  );
  return merged;
}

/**
 * Merge candidates whose coordinates round to the same key.
 *
 * The merged candidate carries the highest source confidence and the most
 * specific match kind of the group; coordinates and place name come from the
 * group's best hit (confidence, then specificity, then place name).
 * Groups keep first-seen order.
 */
export function dedupeCandidates(candidates: readonly GeoCandidate[], precision: number): GeoCandidate[] {
  const groups = new Map<string, GeoCandidate[]>();
  for (const candidate of candidates) {
    const key = coordinateKey(candidate.latitude, candidate.longitude, precision);
    const group = groups.get(key);
    if (group) {
      group.push(candidate);
    } else {
      groups.set(key, [candidate]);
    }
  }

  return [...groups.values()].map((group) => {
    const best = [...group].sort(compareHits)[0];
    const matchKind = group.reduce(
      (kind, c) => (MATCH_KIND_SPECIFICITY[c.matchKind] > MATCH_KIND_SPECIFICITY[kind] ? c.matchKind : kind),
      best.matchKind
    );
    return { ...best, matchKind };
  });
}

// ============================================================
// Internal
// ============================================================

function compareHits(a: GeoCandidate, b: GeoCandidate): number {
  if (a.sourceConfidence !== b.sourceConfidence) return b.sourceConfidence - a.sourceConfidence;
  const specificity = MATCH_KIND_SPECIFICITY[b.matchKind] - MATCH_KIND_SPECIFICITY[a.matchKind];
  if (specificity !== 0) return specificity;
  if (a.placeName === b.placeName) return 0;
  return a.placeName < b.placeName ? -1 : 1;
}

function nameMatchKind(projectKey: string, hit: OracleHit, normalizer: NormalizerOptions): MatchKind {
  if (hit.exactMatch !== undefined) {
    return hit.exactMatch ? MatchKind.EXACT : MatchKind.FUZZY;
  }
  // Oracle did not say: compare against the leading segment of the place name
  const leading = hit.placeName.split(',')[0];
  return normalize(leading, normalizer) === projectKey ? MatchKind.EXACT : MatchKind.FUZZY;
}

/**
 * One oracle call under a timeout. Any failure becomes an empty hit list,
 * reported to the health monitor and the failure callback.
 */
async function runLookup(
  oracle: GeocodingOracle,
  query: string,
  options: ResolverOptions,
  log: Logger
): Promise<OracleHit[]> {
  let raw: unknown;
  try {
    raw = await lookupWithTimeout(oracle, query, options.timeoutMs);
  } catch (error) {
    const failure =
      error instanceof OracleUnavailableError ? error : new OracleUnavailableError(query, errorMessage(error));
    return reportFailure(failure, options, log);
  }

  const response = oracleResponseSchema.safeParse(raw);
  if (!response.success) {
    return reportFailure(new OracleUnavailableError(query, 'response is not a list'), options, log);
  }
  options.health?.recordSuccess();

  const hits: OracleHit[] = [];
  for (const item of response.data) {
    const parsed = oracleHitSchema.safeParse(item);
    if (parsed.success) {
      hits.push(parsed.data);
    } else {
      log.debug({ query }, 'Dropping malformed oracle hit');
    }
  }
  return hits;
}

function reportFailure(failure: OracleUnavailableError, options: ResolverOptions, log: Logger): OracleHit[] {
  log.warn({ query: failure.query, error: failure.message }, 'Oracle lookup failed');
  options.onLookupFailure?.(failure);
  // May throw OracleUnreachableError, which aborts the run
  options.health?.recordFailure();
  return [];
}

async function lookupWithTimeout(oracle: GeocodingOracle, query: string, timeoutMs: number): Promise<unknown> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new OracleUnavailableError(query, `timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([oracle.lookup(query, { signal: controller.signal }), timeout]);
  } finally {
    clearTimeout(timeoutId);
  }
}
