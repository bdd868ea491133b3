import { parseArgs } from 'node:util';
import { ulid } from 'ulid';
import { ErrorCode, type RunError } from '@minesite/shared';
import { loadSettings } from '../lib/config.js';
import { AppError, ExitCode, ValidationError, errorMessage } from '../lib/errors.js';
import { createRunLogger } from '../lib/logger.js';
import { createOracle, type GeocodingOracle } from '../lib/oracle/index.js';
import { buildNormalizerOptions, type NormalizerOptions } from '../lib/services/normalizer.js';
import { runLocateJob } from '../lib/services/pipeline.js';
import { createStorage, type Storage } from '../lib/storage.js';
import { formatIssues, locateArgsSchema, type OracleSettings } from '../lib/validation.js';

export const USAGE = `Usage: minesite-geo locate --input <path|s3://uri> --output <path|s3://uri>
                           [--gazetteer <path|s3://uri>] [--summary <path|s3://uri>]
                           [--concurrency <n>]

Reads project-name mentions (JSONL), resolves each project to one coordinate
and writes one JSON record per project (JSONL). The run summary is printed
to stdout.`;

// Seams for tests; production uses the real storage, oracle and streams
export interface CliDeps {
  env?: Record<string, string | undefined>;
  storage?: Storage;
  createOracle?: (settings: OracleSettings, gazetteerText?: string, normalizer?: NormalizerOptions) => GeocodingOracle;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

const cliOptions = {
  input: { type: 'string', short: 'i' },
  output: { type: 'string', short: 'o' },
  summary: { type: 'string' },
  gazetteer: { type: 'string' },
  concurrency: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

// parseArgs rejects unknown flags with a TypeError
function parseCommandLine(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: cliOptions, allowPositionals: true, strict: true });
  } catch (error) {
    throw new ValidationError(errorMessage(error));
  }
}

/**
 * CLI entry point. Resolves to the process exit status.
 */
export async function main(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const runId = ulid();
  const log = createRunLogger(runId, 'locate');

  try {
    const parsed = parseCommandLine(argv);
    if (parsed.values.help) {
      stdout(`${USAGE}\n`);
      return ExitCode.OK;
    }

    const [command, ...extra] = parsed.positionals;
    if (command !== 'locate' || extra.length > 0) {
      throw new ValidationError(command ? `Unknown command "${[command, ...extra].join(' ')}"` : 'Missing command');
    }

    const args = locateArgsSchema.safeParse(parsed.values);
    if (!args.success) {
      throw new ValidationError(formatIssues(args.error));
    }

    const settings = loadSettings(deps.env ?? process.env);
    const storage = deps.storage ?? createStorage();
    const gazetteerText = args.data.gazetteer ? await storage.readText(args.data.gazetteer) : undefined;
    const normalizer = buildNormalizerOptions(settings.normalizer);
    const oracle = (deps.createOracle ?? createOracle)(settings.oracle, gazetteerText, normalizer);

    log.info({ input: args.data.input, output: args.data.output, oracle: oracle.name }, 'Starting locate run');

    const summary = await runLocateJob(
      { input: args.data.input, output: args.data.output, summary: args.data.summary },
      storage,
      { settings, oracle, runId, logger: log, concurrency: args.data.concurrency }
    );

    stdout(`${JSON.stringify(summary, null, 2)}\n`);
    return ExitCode.OK;
  } catch (error) {
    if (error instanceof AppError) {
      log.error({ error: error.message, code: error.code }, 'Run failed');
      stderr(`${JSON.stringify(error.toRunError(runId))}\n`);
      if (error instanceof ValidationError) {
        stderr(`\n${USAGE}\n`);
      }
      return error.exitCode;
    }

    log.error({ error }, 'Unexpected error');
    const body: RunError = {
      error: { code: ErrorCode.INTERNAL_ERROR, message: errorMessage(error), runId },
    };
    stderr(`${JSON.stringify(body)}\n`);
    return ExitCode.RUN_FAILED;
  }
}
