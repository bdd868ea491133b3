// [start, end) character offsets into the source document
export type CharSpan = readonly [start: number, end: number];

// One NER detection of a project name
export interface Mention {
  readonly rawText: string;
  readonly documentId: string;
  readonly charSpan: CharSpan;
  readonly nerConfidence: number;
  readonly contextWindow: string;
}
