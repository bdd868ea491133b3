import type { MatchKind } from './enums.js';

// One raw result from a geocoding oracle
export interface OracleHit {
  latitude: number;
  longitude: number;
  placeName: string;
  confidence: number;
  // Set when the oracle itself reports whether the name matched exactly
  exactMatch?: boolean;
}

// One proposed coordinate for a project
export interface GeoCandidate {
  readonly latitude: number;
  readonly longitude: number;
  readonly placeName: string;
  readonly sourceConfidence: number;
  readonly matchKind: MatchKind;
  // Oracle query that produced the candidate
  readonly query: string;
}

// Per-term contributions to a fused score, before clamping
export interface ScoreSignals {
  source: number;
  matchKind: number;
  occurrence: number;
  recognition: number;
}

export interface ScoredCandidate extends GeoCandidate {
  finalScore: number;
  rank: number;
  signals: ScoreSignals;
}
