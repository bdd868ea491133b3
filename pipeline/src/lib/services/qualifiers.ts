import type { RegionSettings } from '../validation.js';

/**
 * Location qualifiers mined from mention contexts.
 *
 * Word lists come from config/regions.json:
 *   known regions:      "Queensland", "Western Australia" anywhere in a capitalized run
 *   geographic suffix:  "<Capitalized> <GeoWord>", e.g. "Bowen Basin"
 *   abbreviations:      standalone "WA", "QLD" expanded to the region name
 *
 * Output is ordered by descending frequency, then first appearance.
 */

export interface QualifierOptions {
  geographicWords: ReadonlySet<string>;
  // lower-cased phrase → canonical spelling
  knownRegions: ReadonlyMap<string, string>;
  abbreviations: ReadonlyMap<string, string>;
  leadingStopWords: ReadonlySet<string>;
  maxQualifiers: number;
}

// ── Patterns ───────────────────────────────────────────────────────

const CAPITALIZED_RUN_RE = /(?<![\p{L}\p{N}])\p{Lu}[\p{L}'’-]*(?:[ \t]+\p{Lu}[\p{L}'’-]*)*/gu;
const ABBREVIATION_RE = /(?<![\p{L}\p{N}])[A-Z]{2,4}(?![\p{L}\p{N}])/gu;
const MAX_REGION_TOKENS = 4;

export function buildQualifierOptions(regions: RegionSettings, maxQualifiers: number): QualifierOptions {
  return {
    geographicWords: new Set(regions.geographicWords.map((w) => w.toLowerCase())),
    knownRegions: new Map(regions.knownRegions.map((r) => [r.toLowerCase(), r])),
    abbreviations: new Map(Object.entries(regions.abbreviations)),
    leadingStopWords: new Set(regions.leadingStopWords.map((w) => w.toLowerCase())),
    maxQualifiers,
  };
}

// ── Public API ─────────────────────────────────────────────────────

function toTokens(text: string): string {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}\p{M}]+/u)
    .filter((t) => t.length > 0)
    .join(' ');
}

/**
 * Extract up to `maxQualifiers` location qualifiers from the given contexts.
 *
 * @param projectKey  Normalized project name; qualifiers already contained in it are skipped.
 */
export function extractQualifiers(
  contexts: readonly string[],
  options: QualifierOptions,
  projectKey = ''
): string[] {
  if (options.maxQualifiers === 0) {
    return [];
  }

  const tally = new Map<string, { count: number; first: number }>();
  let position = 0;

  const keyTokens = ` ${projectKey} `;
  const record = (qualifier: string) => {
    // Whole tokens only: "Victoria" is not part of "victoriana"
    if (keyTokens.includes(` ${toTokens(qualifier)} `)) return;
    const entry = tally.get(qualifier);
    if (entry) {
      entry.count++;
    } else {
      tally.set(qualifier, { count: 1, first: position++ });
    }
  };

  for (const context of contexts) {
    for (const match of context.matchAll(CAPITALIZED_RUN_RE)) {
      for (const qualifier of qualifiersInRun(match[0], options)) {
        record(qualifier);
      }
    }
    for (const match of context.matchAll(ABBREVIATION_RE)) {
      const expansion = options.abbreviations.get(match[0]);
      if (expansion) record(expansion);
    }
  }

  return [...tally.entries()]
    .sort(([, a], [, b]) => b.count - a.count || a.first - b.first)
    .slice(0, options.maxQualifiers)
    .map(([qualifier]) => qualifier);
}

// ── Internal ───────────────────────────────────────────────────────

function qualifiersInRun(run: string, options: QualifierOptions): string[] {
  const tokens = run.split(/\s+/);
  while (tokens.length > 0 && options.leadingStopWords.has(tokens[0].toLowerCase())) {
    tokens.shift();
  }

  const found: string[] = [];
  const consumed = new Set<number>();

  // Known regions, longest phrase first
  let start = 0;
  while (start < tokens.length) {
    let matched = 0;
    for (let len = Math.min(MAX_REGION_TOKENS, tokens.length - start); len >= 1; len--) {
      const phrase = tokens.slice(start, start + len).join(' ').toLowerCase();
      const canonical = options.knownRegions.get(phrase);
      if (canonical) {
        found.push(canonical);
        for (let i = start; i < start + len; i++) consumed.add(i);
        matched = len;
        break;
      }
    }
    start += matched > 0 ? matched : 1;
  }

  // "<Name> <GeoWord>" pairs not already covered by a known region
  for (let i = 1; i < tokens.length; i++) {
    const word = tokens[i].toLowerCase();
    const previous = tokens[i - 1].toLowerCase();
    if (!options.geographicWords.has(word)) continue;
    if (consumed.has(i) || consumed.has(i - 1)) continue;
    if (options.geographicWords.has(previous) || options.leadingStopWords.has(previous)) continue;
    found.push(`${tokens[i - 1]} ${tokens[i]}`);
  }

  return found;
}
