// Error codes shared by the pipeline and its run reports
export const ErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  MALFORMED_MENTION: 'MALFORMED_MENTION',
  ORACLE_UNAVAILABLE: 'ORACLE_UNAVAILABLE',
  ORACLE_UNREACHABLE: 'ORACLE_UNREACHABLE',
  IMPLAUSIBLE_COORDINATE: 'IMPLAUSIBLE_COORDINATE',
  INPUT_UNREADABLE: 'INPUT_UNREADABLE',
  OUTPUT_UNWRITABLE: 'OUTPUT_UNWRITABLE',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// Error shape written into run summaries
export interface RunError {
  error: {
    code: string;
    message: string;
    runId: string;
    details?: Record<string, unknown>;
  };
}
