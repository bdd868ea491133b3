import type { Mention, ProjectRecord } from '@minesite/shared';
import { normalize, DEFAULT_NORMALIZER_OPTIONS, type NormalizerOptions } from './normalizer.js';

// Quotes and sentence punctuation around a mention; brackets are kept
const EDGE_PUNCTUATION_RE = /^[\s"'“”‘’.,;:!?]+|[\s"'“”‘’.,;:!?]+$/g;

interface ProjectGroup {
  normalizedName: string;
  firstSeenIndex: number;
  mentions: Mention[];
}

/**
 * Merge mentions into one ProjectRecord per normalized name.
 *
 * Records come back in first-seen order and carry that position as
 * `firstSeenIndex`. Every input mention lands in exactly one record.
 */
export function aggregate(
  mentions: readonly Mention[],
  options: NormalizerOptions = DEFAULT_NORMALIZER_OPTIONS
): ProjectRecord[] {
  const groups = new Map<string, ProjectGroup>();
  const order: ProjectGroup[] = [];

  for (const mention of mentions) {
    const key = normalize(mention.rawText, options);
    let group = groups.get(key);
    if (!group) {
      group = { normalizedName: key, firstSeenIndex: order.length, mentions: [] };
      groups.set(key, group);
      order.push(group);
    }
    group.mentions.push(mention);
  }

  return order
    .sort((a, b) => a.firstSeenIndex - b.firstSeenIndex)
    .map((group) => toProjectRecord(group));
}

function toProjectRecord(group: ProjectGroup): ProjectRecord {
  let max = 0;
  let sum = 0;
  for (const mention of group.mentions) {
    max = Math.max(max, mention.nerConfidence);
    sum += mention.nerConfidence;
  }

  return {
    normalizedName: group.normalizedName,
    displayName: group.mentions[0].rawText.replace(EDGE_PUNCTUATION_RE, '') || group.normalizedName,
    firstSeenIndex: group.firstSeenIndex,
    mentions: Object.freeze([...group.mentions]),
    occurrenceCount: group.mentions.length,
    maxNerConfidence: max,
    meanNerConfidence: sum / group.mentions.length,
  };
}
