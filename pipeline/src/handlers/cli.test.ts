import { describe, it, expect } from 'vitest';
import { ErrorCode, type OracleHit } from '@minesite/shared';
import { InputUnreadableError } from '../lib/errors.js';
import type { GeocodingOracle } from '../lib/oracle/index.js';
import type { Storage } from '../lib/storage.js';
import { main, type CliDeps } from './cli.js';

class MemoryStorage implements Storage {
  readonly files = new Map<string, string>();

  async readText(location: string): Promise<string> {
    const text = this.files.get(location);
    if (text === undefined) throw new InputUnreadableError(location, 'not found');
    return text;
  }

  async writeText(location: string, body: string): Promise<void> {
    this.files.set(location, body);
  }
}

const failingOracle: GeocodingOracle = {
  name: 'failing',
  lookup: async (): Promise<OracleHit[]> => {
    throw new Error('ECONNREFUSED');
  },
};

const gazetteer = JSON.stringify({
  entries: [
    {
      name: 'Boddington',
      placeName: 'Boddington, Western Australia, Australia',
      latitude: -32.8,
      longitude: 116.47,
      confidence: 0.9,
      region: 'Western Australia',
    },
  ],
});

const input = `${JSON.stringify({
  raw_text: 'Boddington Gold Mine',
  document_id: 'report-2023',
  char_span: [10, 30],
  ner_confidence: 0.9,
  context_window: 'Mining at Boddington continued.',
})}\n`;

function setup(overrides: Partial<CliDeps> = {}) {
  const storage = new MemoryStorage();
  storage.files.set('in.jsonl', input);
  storage.files.set('gazetteer.json', gazetteer);
  const stdout: string[] = [];
  const stderr: string[] = [];
  const deps: CliDeps = {
    env: {},
    storage,
    stdout: (text) => stdout.push(text),
    stderr: (text) => stderr.push(text),
    ...overrides,
  };
  return { storage, stdout, stderr, deps };
}

describe('cli', () => {
  it('geolocates mentions against a gazetteer', async () => {
    const { storage, stdout, deps } = setup();

    const exitCode = await main(
      ['locate', '--input', 'in.jsonl', '--output', 'out.jsonl', '--gazetteer', 'gazetteer.json'],
      deps
    );

    expect(exitCode).toBe(0);
    expect(storage.files.get('out.jsonl')).toBe(
      '{"project_name":"Boddington Gold Mine","latitude":-32.8,"longitude":116.47,' +
        '"geolocation_confidence":0.8434,"ner_confidence":0.9,"overall_confidence":0.759,' +
        '"evidence":{"occurrence_count":1,"match_kind":"EXACT","num_candidates_considered":1}}\n'
    );
    const summary = JSON.parse(stdout.join(''));
    expect(summary).toMatchObject({ mentionsRead: 1, projects: 1, resolved: 1, unresolved: 0, lookups: 1 });
  });

  it('prints usage for --help', async () => {
    const { stdout, deps } = setup();
    expect(await main(['--help'], deps)).toBe(0);
    expect(stdout.join('')).toMatch(/^Usage: minesite-geo locate/);
  });

  it('exits 2 on usage errors', async () => {
    for (const argv of [[], ['status'], ['locate', '--bogus'], ['locate', '--input', 'in.jsonl']]) {
      const { stderr, deps } = setup();
      expect(await main(argv, deps)).toBe(2);
      expect(JSON.parse(stderr[0]).error.code).toBe(ErrorCode.VALIDATION_ERROR);
    }
  });

  it('exits 2 on invalid configuration', async () => {
    const { stderr, deps } = setup({ env: { SCORING_WEIGHTS: '1,1,1,1' } });
    expect(await main(['locate', '-i', 'in.jsonl', '-o', 'out.jsonl'], deps)).toBe(2);
    expect(JSON.parse(stderr[0]).error.code).toBe(ErrorCode.CONFIGURATION_ERROR);
  });

  it('exits 2 when the gazetteer provider has no file', async () => {
    const { deps } = setup({ env: { GEOCODER_PROVIDER: 'gazetteer' } });
    expect(await main(['locate', '-i', 'in.jsonl', '-o', 'out.jsonl'], deps)).toBe(2);
  });

  it('exits 1 on unreadable input', async () => {
    const { stderr, deps } = setup();
    expect(await main(['locate', '-i', 'missing.jsonl', '-o', 'out.jsonl', '--gazetteer', 'gazetteer.json'], deps)).toBe(1);
    expect(JSON.parse(stderr[0]).error.code).toBe(ErrorCode.INPUT_UNREADABLE);
  });

  it('writes a null record when a single lookup fails', async () => {
    const { storage, stdout, deps } = setup({ createOracle: () => failingOracle });

    expect(await main(['locate', '-i', 'in.jsonl', '-o', 'out.jsonl'], deps)).toBe(0);

    const record = JSON.parse((storage.files.get('out.jsonl') ?? '').trim());
    expect(record.project_name).toBe('Boddington Gold Mine');
    expect(record.latitude).toBeNull();
    expect(JSON.parse(stdout[0]).failedLookups).toBe(1);
  });

  it('exits 1 with the processed count when the oracle is unreachable', async () => {
    const { storage, stderr, deps } = setup({
      env: { ORACLE_MAX_CONSECUTIVE_FAILURES: '1' },
      createOracle: () => failingOracle,
    });

    expect(await main(['locate', '-i', 'in.jsonl', '-o', 'out.jsonl'], deps)).toBe(1);

    const { error } = JSON.parse(stderr[0]);
    expect(error.code).toBe(ErrorCode.ORACLE_UNREACHABLE);
    expect(error.details).toEqual({ projectsProcessed: 0 });
    expect(storage.files.has('out.jsonl')).toBe(false);
  });

  it('exits 1 on unexpected errors', async () => {
    const { stderr, deps } = setup({
      createOracle: () => {
        throw new Error('boom');
      },
    });

    expect(await main(['locate', '-i', 'in.jsonl', '-o', 'out.jsonl'], deps)).toBe(1);
    expect(JSON.parse(stderr[0]).error).toMatchObject({ code: ErrorCode.INTERNAL_ERROR, message: 'boom' });
  });
});
