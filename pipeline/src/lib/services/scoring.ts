/**
 * Disambiguation & Scoring Engine
 *
 * Fuses four evidence signals into one score per geo-candidate and picks
 * exactly one winner per project.
 *
 *   finalScore = w.source      × sourceConfidence
 *              + w.matchKind   × matchKindWeight(matchKind)       EXACT 1.0 · CONTEXTUAL 0.7 · FUZZY 0.4
 *              + w.occurrence  × log(1 + n) / log(1 + saturation)  capped at 1
 *              + w.recognition × project.meanNerConfidence
 *
 * clamped to [0, 1]. Weights are validated to sum to 1 when settings load.
 *
 * Ranking: the winner is taken from the candidates within `tieEpsilon` of the
 * top score, preferring the more specific match kind, then the smaller place
 * name. Everything else follows by score with the same tie-breaks.
 */

import {
  MATCH_KIND_SPECIFICITY,
  type GeoCandidate,
  type ProjectRecord,
  type ScoreSignals,
  type ScoredCandidate,
} from '@minesite/shared';
import { isPlausibleCoordinate } from '../geo.js';
import type { ScoringSettings } from '../validation.js';

export interface ScoringOptions extends ScoringSettings {
  nullIslandTolerance: number;
}

// ── Public API ─────────────────────────────────────────────────────

/**
 * Best candidate for the project, or null when none survives filtering.
 */
export function score(
  project: ProjectRecord,
  candidates: readonly GeoCandidate[],
  options: ScoringOptions
): ScoredCandidate | null {
  const ranked = rankCandidates(project, candidates, options);
  return ranked.length > 0 ? ranked[0] : null;
}

/**
 * Score and rank every plausible candidate; rank 1 is the winner.
 */
export function rankCandidates(
  project: ProjectRecord,
  candidates: readonly GeoCandidate[],
  options: ScoringOptions
): ScoredCandidate[] {
  const scored = candidates
    .filter((c) => isPlausibleCoordinate(c.latitude, c.longitude, options.nullIslandTolerance))
    .map((c) => {
      const { finalScore, signals } = scoreCandidate(project, c, options);
      return { ...c, finalScore, signals, rank: 0 };
    });

  if (scored.length === 0) {
    return [];
  }

  const topScore = Math.max(...scored.map((c) => c.finalScore));
  const contenders = scored.filter((c) => topScore - c.finalScore <= options.tieEpsilon);
  const winner = [...contenders].sort(compareTieBreak)[0];

  const rest = scored
    .filter((c) => c !== winner)
    .sort((a, b) => b.finalScore - a.finalScore || compareTieBreak(a, b));

  return [winner, ...rest].map((c, index) => ({ ...c, rank: index + 1 }));
}

/**
 * Fused score for one candidate, with the weighted contribution of each signal.
 */
export function scoreCandidate(
  project: ProjectRecord,
  candidate: GeoCandidate,
  options: ScoringSettings
): { finalScore: number; signals: ScoreSignals } {
  const { weights } = options;

  const signals: ScoreSignals = {
    source: weights.source * candidate.sourceConfidence,
    matchKind: weights.matchKind * options.matchKindWeights[candidate.matchKind],
    occurrence: weights.occurrence * occurrenceSignal(project.occurrenceCount, options.occurrenceSaturation),
    recognition: weights.recognition * project.meanNerConfidence,
  };

  const finalScore = clamp01(signals.source + signals.matchKind + signals.occurrence + signals.recognition);
  return { finalScore, signals };
}

/**
 * Log-dampened mention count mapped onto [0, 1]; reaches 1 at `saturation` mentions.
 */
export function occurrenceSignal(occurrenceCount: number, saturation: number): number {
  if (occurrenceCount <= 0) {
    return 0;
  }
  return Math.min(Math.log1p(occurrenceCount) / Math.log1p(saturation), 1);
}

// ── Internal ───────────────────────────────────────────────────────

function compareTieBreak(a: GeoCandidate, b: GeoCandidate): number {
  const specificity = MATCH_KIND_SPECIFICITY[b.matchKind] - MATCH_KIND_SPECIFICITY[a.matchKind];
  if (specificity !== 0) return specificity;
  if (a.placeName !== b.placeName) return a.placeName < b.placeName ? -1 : 1;
  if (a.latitude !== b.latitude) return a.latitude - b.latitude;
  return a.longitude - b.longitude;
}

function clamp01(v: number): number {
  return Math.max(0, Math.min(v, 1));
}
