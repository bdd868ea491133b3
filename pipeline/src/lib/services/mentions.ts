import { MentionFormat, type Mention } from '@minesite/shared';
import { MalformedMentionError, errorMessage } from '../errors.js';
import { formatIssues, mentionInputSchema, nerRecordSchema } from '../validation.js';
import { normalize, DEFAULT_NORMALIZER_OPTIONS, type NormalizerOptions } from './normalizer.js';

export interface MentionParseResult {
  mentions: Mention[];
  skipped: MalformedMentionError[];
  // Non-blank lines seen
  linesRead: number;
}

/**
 * Detect which record layout a parsed line uses
 */
export function detectFormat(value: unknown): MentionFormat | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return null;
  }
  if ('raw_text' in value) return MentionFormat.MENTION;
  if ('project_name' in value) return MentionFormat.NER_RECORD;
  return null;
}

/**
 * Convert one parsed JSONL line into a Mention.
 *
 * @throws MalformedMentionError
 */
export function toMention(
  value: unknown,
  line: number,
  normalizer: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS
): Mention {
  const format = detectFormat(value);
  let mention: Mention;

  if (format === MentionFormat.MENTION) {
    const parsed = mentionInputSchema.safeParse(value);
    if (!parsed.success) {
      throw new MalformedMentionError(line, formatIssues(parsed.error));
    }
    mention = {
      rawText: parsed.data.raw_text,
      documentId: parsed.data.document_id,
      charSpan: parsed.data.char_span,
      nerConfidence: parsed.data.ner_confidence,
      contextWindow: parsed.data.context_window,
    };
  } else if (format === MentionFormat.NER_RECORD) {
    const parsed = nerRecordSchema.safeParse(value);
    if (!parsed.success) {
      throw new MalformedMentionError(line, formatIssues(parsed.error));
    }
    const { pdf_file, page_number, project_name, ner_confidence, context_sentence } = parsed.data;
    const start = locate(project_name, context_sentence);
    if (start < 0) {
      throw new MalformedMentionError(line, 'project_name does not occur in context_sentence');
    }
    mention = {
      rawText: project_name,
      documentId: `${pdf_file}#p${page_number}`,
      charSpan: [start, start + project_name.length],
      nerConfidence: ner_confidence,
      contextWindow: context_sentence,
    };
  } else {
    throw new MalformedMentionError(line, 'expected an object with raw_text or project_name');
  }

  if (normalize(mention.rawText, normalizer).length === 0) {
    throw new MalformedMentionError(line, 'raw text has no letters or digits');
  }
  return Object.freeze(mention);
}

/**
 * Parse a JSONL body into mentions. Malformed lines are collected, not thrown.
 */
export function parseMentionsJsonl(
  text: string,
  normalizer: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS
): MentionParseResult {
  const result: MentionParseResult = { mentions: [], skipped: [], linesRead: 0 };
  const lines = text.split(/\r?\n/);

  lines.forEach((content, index) => {
    if (content.trim().length === 0) return;
    result.linesRead++;
    const line = index + 1;

    let value: unknown;
    try {
      value = JSON.parse(content);
    } catch (error) {
      result.skipped.push(new MalformedMentionError(line, `invalid JSON (${errorMessage(error)})`));
      return;
    }

    try {
      result.mentions.push(toMention(value, line, normalizer));
    } catch (error) {
      if (!(error instanceof MalformedMentionError)) throw error;
      result.skipped.push(error);
    }
  });

  return result;
}

// Offset of the name in the sentence; falls back to a case-insensitive search
function locate(name: string, sentence: string): number {
  const exact = sentence.indexOf(name);
  if (exact >= 0) return exact;
  return sentence.toLowerCase().indexOf(name.toLowerCase());
}
