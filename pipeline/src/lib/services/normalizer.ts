import { DEFAULT_NORMALIZER_SETTINGS } from '../config.js';
import type { NormalizerSettings } from '../validation.js';

export interface NormalizerOptions {
  genericSuffixTokens: ReadonlySet<string>;
  genericPrefixTokens: ReadonlySet<string>;
}

// Apostrophes join ("O'Callaghans" -> "ocallaghans"); any other
// non-alphanumeric character separates words.
const APOSTROPHE_RE = /['’`]/g;
const SEPARATOR_RE = /[^\p{L}\p{N}\p{M}]+/gu;

// Dropping an apostrophe can leave a base letter next to a combining mark,
// so the text is recomposed after the replacements.
function cleanText(raw: string): string {
  return raw
    .normalize('NFKC')
    .toLowerCase()
    .replace(APOSTROPHE_RE, '')
    .replace(SEPARATOR_RE, ' ')
    .trim()
    .normalize('NFKC');
}

export function buildNormalizerOptions(settings: NormalizerSettings): NormalizerOptions {
  const toSet = (tokens: string[]) => new Set(tokens.map(cleanText).filter((t) => t.length > 0));
  return {
    genericSuffixTokens: toSet(settings.genericSuffixTokens),
    genericPrefixTokens: toSet(settings.genericPrefixTokens),
  };
}

export const DEFAULT_NORMALIZER_OPTIONS = buildNormalizerOptions(DEFAULT_NORMALIZER_SETTINGS);

/**
 * Canonical merge key for a project-name mention.
 *
 * Lower-cases, drops punctuation, collapses whitespace, then strips generic
 * trailing tokens ("mine", "project", "gold", ...) and generic leading tokens
 * ("the") while more than one token remains. Never throws; returns '' for input
 * without letters or digits. normalize(normalize(x)) === normalize(x).
 */
export function normalize(raw: string, options: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS): string {
  const cleaned = cleanText(raw);
  if (cleaned.length === 0) {
    return '';
  }

  const tokens = cleaned.split(' ');

  while (tokens.length > 1 && options.genericSuffixTokens.has(tokens[tokens.length - 1])) {
    tokens.pop();
  }
  while (tokens.length > 1 && options.genericPrefixTokens.has(tokens[0])) {
    tokens.shift();
  }

  return tokens.join(' ');
}
