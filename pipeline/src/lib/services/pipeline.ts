import { ulid } from 'ulid';
import type { FinalOutputRecord, Mention, RunSummary, RunWarning } from '@minesite/shared';
import { mapWithConcurrency } from '../concurrency.js';
import { NoCandidateResolvedWarning, OutputUnwritableError, errorMessage } from '../errors.js';
import { createRunLogger, type Logger } from '../logger.js';
import { OracleHealthMonitor } from '../oracle/health.js';
import type { GeocodingOracle } from '../oracle/types.js';
import type { Storage } from '../storage.js';
import type { PipelineSettings } from '../validation.js';
import { aggregate } from './aggregator.js';
import { assemble, toJsonl } from './assembler.js';
import { parseMentionsJsonl } from './mentions.js';
import { buildNormalizerOptions } from './normalizer.js';
import { buildQualifierOptions } from './qualifiers.js';
import { resolve } from './resolver.js';
import { rankCandidates, type ScoringOptions } from './scoring.js';

export interface PipelineOptions {
  settings: PipelineSettings;
  oracle: GeocodingOracle;
  runId?: string;
  logger?: Logger;
  // Overrides settings.resolver.concurrency
  concurrency?: number;
  now?: () => Date;
}

export interface PipelineResult {
  records: FinalOutputRecord[];
  summary: RunSummary;
}

// ============================================================
// Geolocation pass
// ============================================================

/**
 * Mentions in, one output record per project out.
 *
 * Aggregate → resolve (bounded pool, all lookups finish before scoring)
 * → score → assemble. Output order is the aggregator's first-seen order.
 *
 * @throws OracleUnreachableError after `maxConsecutiveFailures` lookups fail in a row
 */
export async function runPipeline(mentions: readonly Mention[], options: PipelineOptions): Promise<PipelineResult> {
  const { settings, oracle } = options;
  const now = options.now ?? (() => new Date());
  const runId = options.runId ?? ulid();
  const log = options.logger ?? createRunLogger(runId, 'locate');
  const startedAt = now().toISOString();

  const normalizer = buildNormalizerOptions(settings.normalizer);
  const qualifiers = buildQualifierOptions(settings.regions, settings.resolver.maxQualifiers);
  const health = new OracleHealthMonitor(settings.resolver.maxConsecutiveFailures);
  const scoring: ScoringOptions = {
    ...settings.scoring,
    nullIslandTolerance: settings.resolver.nullIslandTolerance,
  };

  const projects = aggregate(mentions, normalizer);
  log.info({ mentions: mentions.length, projects: projects.length, oracle: oracle.name }, 'Aggregated mentions');

  // Per-project warning slots keep the summary independent of completion order
  const lookupWarnings: RunWarning[][] = projects.map(() => []);

  const candidateLists = await mapWithConcurrency(
    projects,
    options.concurrency ?? settings.resolver.concurrency,
    async (project, index) => {
      const candidates = await resolve(project, oracle, {
        timeoutMs: settings.oracle.timeoutMs,
        dedupePrecision: settings.resolver.dedupePrecision,
        nullIslandTolerance: settings.resolver.nullIslandTolerance,
        qualifiers,
        normalizer,
        health,
        logger: log,
        onLookupFailure: (failure) => lookupWarnings[index].push(failure.toRunWarning(project.displayName)),
      });
      health.recordProjectCompleted();
      return candidates;
    }
  );

  const records: FinalOutputRecord[] = [];
  const warnings: RunWarning[] = [];
  let resolved = 0;

  projects.forEach((project, index) => {
    const ranked = rankCandidates(project, candidateLists[index], scoring);
    const winner = ranked.length > 0 ? ranked[0] : null;
    warnings.push(...lookupWarnings[index]);

    if (winner) {
      resolved++;
      log.debug(
        {
          project: project.normalizedName,
          placeName: winner.placeName,
          finalScore: winner.finalScore,
          signals: winner.signals,
          runnerUp: ranked.length > 1 ? ranked[1].finalScore : null,
        },
        'Selected geo-candidate'
      );
    } else {
      const warning = new NoCandidateResolvedWarning(project.displayName);
      warnings.push(warning.toRunWarning());
      log.info({ project: project.normalizedName }, warning.message);
    }

    records.push(assemble(project, winner, ranked.length));
  });

  const summary: RunSummary = {
    runId,
    startedAt,
    completedAt: now().toISOString(),
    mentionsRead: mentions.length,
    mentionsSkipped: 0,
    projects: projects.length,
    resolved,
    unresolved: projects.length - resolved,
    lookups: health.lookups,
    failedLookups: health.failedLookups,
    warnings,
  };

  log.info(
    { projects: summary.projects, resolved, lookups: summary.lookups, failedLookups: summary.failedLookups },
    'Geolocation pass complete'
  );
  return { records, summary };
}

// ============================================================
// Locate job (read → pipeline → write)
// ============================================================

export interface LocateJob {
  input: string;
  output: string;
  summary?: string;
}

/**
 * Read mentions, geolocate them and write the JSONL output as one file.
 * Nothing is written when the run fails.
 */
export async function runLocateJob(
  job: LocateJob,
  storage: Storage,
  options: PipelineOptions
): Promise<RunSummary> {
  const runId = options.runId ?? ulid();
  const log = options.logger ?? createRunLogger(runId, 'locate');

  const text = await storage.readText(job.input);
  const parsed = parseMentionsJsonl(text, buildNormalizerOptions(options.settings.normalizer));
  for (const skipped of parsed.skipped) {
    log.warn({ line: skipped.line }, skipped.message);
  }
  log.info(
    { input: job.input, lines: parsed.linesRead, mentions: parsed.mentions.length, skipped: parsed.skipped.length },
    'Read mentions'
  );

  const { records, summary } = await runPipeline(parsed.mentions, { ...options, runId, logger: log });

  const runSummary: RunSummary = {
    ...summary,
    mentionsRead: parsed.linesRead,
    mentionsSkipped: parsed.skipped.length,
    warnings: [...parsed.skipped.map((s) => s.toRunWarning()), ...summary.warnings],
  };

  await writeOrFail(storage, job.output, toJsonl(records), 'application/x-ndjson', records.length);
  if (job.summary) {
    await writeOrFail(storage, job.summary, `${JSON.stringify(runSummary, null, 2)}\n`, 'application/json', records.length);
  }

  log.info({ output: job.output, records: records.length }, 'Wrote output');
  return runSummary;
}

async function writeOrFail(
  storage: Storage,
  location: string,
  body: string,
  contentType: string,
  projectsProcessed: number
): Promise<void> {
  try {
    await storage.writeText(location, body, contentType);
  } catch (error) {
    throw new OutputUnwritableError(location, errorMessage(error), projectsProcessed);
  }
}
