import type { MatchKind, WarningCode } from './enums.js';

// One JSONL line of pipeline output
export interface FinalOutputRecord {
  project_name: string;
  latitude: number | null;
  longitude: number | null;
  geolocation_confidence: number;
  ner_confidence: number;
  overall_confidence: number;
  evidence: {
    occurrence_count: number;
    match_kind: MatchKind | null;
    num_candidates_considered: number;
  };
}

export interface RunWarning {
  code: WarningCode;
  message: string;
  project?: string;
  line?: number;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  completedAt: string;
  mentionsRead: number;
  mentionsSkipped: number;
  projects: number;
  resolved: number;
  unresolved: number;
  lookups: number;
  failedLookups: number;
  warnings: RunWarning[];
}
