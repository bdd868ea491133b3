import geolocationDefaults from '../../config/geolocation.json' with { type: 'json' };
import regionDefaults from '../../config/regions.json' with { type: 'json' };
import { ConfigurationError } from './errors.js';
import {
  formatIssues,
  pipelineSettingsSchema,
  type NormalizerSettings,
  type PipelineSettings,
} from './validation.js';

// Environment configuration
export const config = {
  // AWS Region for s3:// inputs and outputs
  region: process.env.AWS_REGION || 'us-east-1',

  // App version (set during build)
  version: process.env.APP_VERSION || '0.1.0',
} as const;

// Bundled token lists, usable without reading the environment
export const DEFAULT_NORMALIZER_SETTINGS: NormalizerSettings = geolocationDefaults.normalizer;

type Env = Record<string, string | undefined>;

function numberFromEnv(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Parse SCORING_WEIGHTS ("source,matchKind,occurrence,recognition")
 */
export function parseWeightsOverride(raw: string): PipelineSettings['scoring']['weights'] {
  const parts = raw.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 4 || parts.some((part) => !Number.isFinite(part))) {
    throw new ConfigurationError(`SCORING_WEIGHTS must be four comma-separated numbers, got "${raw}"`);
  }
  const [source, matchKind, occurrence, recognition] = parts;
  return { source, matchKind, occurrence, recognition };
}

/**
 * Build the geolocation settings from the bundled defaults plus environment
 * overrides, and validate the result.
 */
export function loadSettings(env: Env = process.env): PipelineSettings {
  const { version: _version, ...defaults } = geolocationDefaults;

  const merged = {
    scoring: {
      ...defaults.scoring,
      weights: env.SCORING_WEIGHTS ? parseWeightsOverride(env.SCORING_WEIGHTS) : defaults.scoring.weights,
      tieEpsilon: numberFromEnv(env, 'TIE_EPSILON') ?? defaults.scoring.tieEpsilon,
    },
    normalizer: defaults.normalizer,
    resolver: {
      ...defaults.resolver,
      concurrency: numberFromEnv(env, 'RESOLVER_CONCURRENCY') ?? defaults.resolver.concurrency,
      maxConsecutiveFailures:
        numberFromEnv(env, 'ORACLE_MAX_CONSECUTIVE_FAILURES') ?? defaults.resolver.maxConsecutiveFailures,
    },
    oracle: {
      provider: env.GEOCODER_PROVIDER || defaults.oracle.provider,
      nominatimUrl: env.NOMINATIM_URL || defaults.oracle.nominatimUrl,
      userAgent: env.GEOCODER_USER_AGENT || defaults.oracle.userAgent,
      timeoutMs: numberFromEnv(env, 'GEOCODER_TIMEOUT_MS') ?? defaults.oracle.timeoutMs,
      minDelayMs: numberFromEnv(env, 'GEOCODER_MIN_DELAY_MS') ?? defaults.oracle.minDelayMs,
      resultLimit: numberFromEnv(env, 'GEOCODER_RESULT_LIMIT') ?? defaults.oracle.resultLimit,
    },
    regions: regionDefaults,
  };

  const result = pipelineSettingsSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigurationError(formatIssues(result.error), { issues: result.error.issues.length });
  }
  return result.data;
}
