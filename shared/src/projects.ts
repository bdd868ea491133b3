import type { Mention } from './mentions.js';

// All mentions of one normalized project name
export interface ProjectRecord {
  normalizedName: string;
  // First mention's raw text, edge punctuation removed; written as project_name
  displayName: string;
  // Position of this project in first-seen order across the input
  firstSeenIndex: number;
  mentions: readonly Mention[];
  occurrenceCount: number;
  maxNerConfidence: number;
  meanNerConfidence: number;
}
