import type { FinalOutputRecord, ProjectRecord, ScoredCandidate } from '@minesite/shared';

// Confidences are written with four decimals
function round4(v: number): number {
  return Math.round(v * 10000) / 10000;
}

/**
 * Map a project and its winning candidate (if any) to one output record.
 *
 * `overall_confidence` is the geolocation confidence scaled by the best single
 * NER detection of the project.
 */
export function assemble(
  project: ProjectRecord,
  scored: ScoredCandidate | null,
  candidatesConsidered: number
): FinalOutputRecord {
  const nerConfidence = project.maxNerConfidence;
  const geolocationConfidence = scored ? scored.finalScore : 0;

  return {
    project_name: project.displayName,
    latitude: scored ? scored.latitude : null,
    longitude: scored ? scored.longitude : null,
    geolocation_confidence: round4(geolocationConfidence),
    ner_confidence: round4(nerConfidence),
    overall_confidence: round4(geolocationConfidence * nerConfidence),
    evidence: {
      occurrence_count: project.occurrenceCount,
      match_kind: scored ? scored.matchKind : null,
      num_candidates_considered: candidatesConsidered,
    },
  };
}

/**
 * JSONL body: one record per line, trailing newline, '' for no records.
 */
export function toJsonl(records: readonly FinalOutputRecord[]): string {
  return records.map((record) => `${JSON.stringify(record)}\n`).join('');
}
