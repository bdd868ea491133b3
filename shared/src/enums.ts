// How a geo-candidate was retrieved from the oracle
export const MatchKind = {
  EXACT: 'EXACT',
  CONTEXTUAL: 'CONTEXTUAL',
  FUZZY: 'FUZZY',
} as const;
export type MatchKind = (typeof MatchKind)[keyof typeof MatchKind];

// Specificity order used for dedupe conflicts and tie-breaks (higher wins)
export const MATCH_KIND_SPECIFICITY: Record<MatchKind, number> = {
  EXACT: 3,
  CONTEXTUAL: 2,
  FUZZY: 1,
};

// Supported geocoding oracle backends
export const OracleProvider = {
  NOMINATIM: 'nominatim',
  GAZETTEER: 'gazetteer',
} as const;
export type OracleProvider = (typeof OracleProvider)[keyof typeof OracleProvider];

// Input record layouts accepted by the mention reader
export const MentionFormat = {
  MENTION: 'MENTION',
  NER_RECORD: 'NER_RECORD',
} as const;
export type MentionFormat = (typeof MentionFormat)[keyof typeof MentionFormat];

// Non-fatal conditions collected into the run summary
export const WarningCode = {
  MALFORMED_MENTION: 'MALFORMED_MENTION',
  ORACLE_UNAVAILABLE: 'ORACLE_UNAVAILABLE',
  NO_CANDIDATE_RESOLVED: 'NO_CANDIDATE_RESOLVED',
} as const;
export type WarningCode = (typeof WarningCode)[keyof typeof WarningCode];
