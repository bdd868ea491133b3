import { ErrorCode, WarningCode, type RunError, type RunWarning } from '@minesite/shared';

// Process exit statuses used by the CLI
export const ExitCode = {
  OK: 0,
  RUN_FAILED: 1,
  USAGE: 2,
} as const;
export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly exitCode: ExitCode = ExitCode.RUN_FAILED,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  toRunError(runId: string): RunError {
    return {
      error: {
        code: this.code,
        message: this.message,
        runId,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, ExitCode.USAGE, details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.CONFIGURATION_ERROR, `Invalid configuration: ${message}`, ExitCode.USAGE, details);
    this.name = 'ConfigurationError';
  }
}

// Per-line input failure; the line is skipped
export class MalformedMentionError extends AppError {
  constructor(
    public readonly line: number,
    reason: string
  ) {
    super(ErrorCode.MALFORMED_MENTION, `Malformed mention on line ${line}: ${reason}`, ExitCode.RUN_FAILED, {
      line,
    });
    this.name = 'MalformedMentionError';
  }

  toRunWarning(): RunWarning {
    return { code: WarningCode.MALFORMED_MENTION, message: this.message, line: this.line };
  }
}

// Per-lookup oracle failure; the lookup yields no candidates
export class OracleUnavailableError extends AppError {
  constructor(
    public readonly query: string,
    reason: string
  ) {
    super(ErrorCode.ORACLE_UNAVAILABLE, `Oracle lookup failed for "${query}": ${reason}`, ExitCode.RUN_FAILED, {
      query,
    });
    this.name = 'OracleUnavailableError';
  }

  toRunWarning(project: string): RunWarning {
    return { code: WarningCode.ORACLE_UNAVAILABLE, message: this.message, project };
  }
}

// Describes a dropped oracle hit. Never thrown out of the resolver.
export class ImplausibleCoordinateError extends AppError {
  constructor(latitude: number, longitude: number, reason: string) {
    super(
      ErrorCode.IMPLAUSIBLE_COORDINATE,
      `Implausible coordinate (${latitude}, ${longitude}): ${reason}`,
      ExitCode.RUN_FAILED,
      { latitude, longitude }
    );
    this.name = 'ImplausibleCoordinateError';
  }
}

export class OracleUnreachableError extends AppError {
  constructor(
    reason: string,
    public readonly projectsProcessed: number
  ) {
    super(
      ErrorCode.ORACLE_UNREACHABLE,
      `Geocoding oracle unreachable: ${reason} (${projectsProcessed} project(s) processed before failure)`,
      ExitCode.RUN_FAILED,
      { projectsProcessed }
    );
    this.name = 'OracleUnreachableError';
  }
}

export class InputUnreadableError extends AppError {
  constructor(location: string, reason: string) {
    super(ErrorCode.INPUT_UNREADABLE, `Cannot read input ${location}: ${reason}`, ExitCode.RUN_FAILED, {
      location,
      projectsProcessed: 0,
    });
    this.name = 'InputUnreadableError';
  }
}

export class OutputUnwritableError extends AppError {
  constructor(location: string, reason: string, projectsProcessed: number) {
    super(ErrorCode.OUTPUT_UNWRITABLE, `Cannot write output ${location}: ${reason}`, ExitCode.RUN_FAILED, {
      location,
      projectsProcessed,
    });
    this.name = 'OutputUnwritableError';
  }
}

// Informational: the project is still emitted, with null coordinates
export class NoCandidateResolvedWarning {
  readonly code = WarningCode.NO_CANDIDATE_RESOLVED;

  constructor(public readonly project: string) {}

  get message(): string {
    return `No geo-candidate resolved for project "${this.project}"`;
  }

  toRunWarning(): RunWarning {
    return { code: this.code, message: this.message, project: this.project };
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
