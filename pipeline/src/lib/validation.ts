import { z } from 'zod';
import { MatchKind, OracleProvider } from '@minesite/shared';

// Common validators
export const confidenceSchema = z.number().min(0).max(1);
export const latitudeSchema = z.number().min(-90).max(90);
export const longitudeSchema = z.number().min(-180).max(180);
export const positiveIntSchema = z.number().int().min(1);

const nonBlankSchema = z.string().refine((value) => value.trim().length > 0, {
  message: 'must not be blank',
});

export const charSpanSchema = z
  .tuple([z.number().int().min(0), z.number().int().min(0)])
  .refine(([start, end]) => end > start, {
    message: 'char_span end must be greater than start',
  });

// One line of mention input, as produced by the NER collaborator
export const mentionInputSchema = z.object({
  raw_text: nonBlankSchema,
  document_id: nonBlankSchema,
  char_span: charSpanSchema,
  ner_confidence: confidenceSchema,
  context_window: z.string().optional().default(''),
});

// One line of the upstream NER stage output (per-sentence detections)
export const nerRecordSchema = z.object({
  pdf_file: nonBlankSchema,
  page_number: z.number().int().min(0),
  project_name: nonBlankSchema,
  ner_confidence: confidenceSchema,
  context_sentence: z.string(),
});

// Oracle hits are checked for shape here; coordinate ranges are checked
// separately so out-of-range hits can be reported as implausible.
export const oracleHitSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  placeName: nonBlankSchema,
  confidence: confidenceSchema,
  exactMatch: z.boolean().optional(),
});

export const oracleResponseSchema = z.array(z.unknown());

// Nominatim /search?format=jsonv2 result row
export const nominatimPlaceSchema = z.object({
  lat: z.string(),
  lon: z.string(),
  display_name: z.string(),
  name: z.string().optional(),
  importance: z.number().optional(),
});

export const nominatimResponseSchema = z.array(nominatimPlaceSchema);

// Offline gazetteer file
export const gazetteerEntrySchema = z.object({
  name: nonBlankSchema,
  aliases: z.array(z.string()).optional().default([]),
  placeName: nonBlankSchema,
  latitude: z.number(),
  longitude: z.number(),
  confidence: confidenceSchema,
  region: z.string().optional(),
});

export const gazetteerFileSchema = z.object({
  entries: z.array(gazetteerEntrySchema),
});

// Geolocation settings
const WEIGHT_SUM_TOLERANCE = 1e-6;

export const scoringWeightsSchema = z
  .object({
    source: z.number().min(0),
    matchKind: z.number().min(0),
    occurrence: z.number().min(0),
    recognition: z.number().min(0),
  })
  .refine(
    (w) => Math.abs(w.source + w.matchKind + w.occurrence + w.recognition - 1) <= WEIGHT_SUM_TOLERANCE,
    { message: 'scoring weights must sum to 1' }
  );

export const scoringSettingsSchema = z.object({
  weights: scoringWeightsSchema,
  matchKindWeights: z.object({
    [MatchKind.EXACT]: confidenceSchema,
    [MatchKind.CONTEXTUAL]: confidenceSchema,
    [MatchKind.FUZZY]: confidenceSchema,
  }),
  occurrenceSaturation: positiveIntSchema,
  tieEpsilon: z.number().min(0).max(0.1),
});

export const normalizerSettingsSchema = z.object({
  genericSuffixTokens: z.array(z.string().min(1)),
  genericPrefixTokens: z.array(z.string().min(1)),
});

export const resolverSettingsSchema = z.object({
  dedupePrecision: z.number().int().min(0).max(8),
  maxQualifiers: z.number().int().min(0),
  nullIslandTolerance: z.number().min(0).max(1),
  concurrency: positiveIntSchema.max(64),
  maxConsecutiveFailures: positiveIntSchema,
});

export const oracleSettingsSchema = z.object({
  provider: z.enum([OracleProvider.NOMINATIM, OracleProvider.GAZETTEER]),
  nominatimUrl: z.url(),
  userAgent: nonBlankSchema,
  timeoutMs: positiveIntSchema,
  minDelayMs: z.number().int().min(0),
  resultLimit: positiveIntSchema.max(50),
});

export const regionSettingsSchema = z.object({
  geographicWords: z.array(z.string().min(1)),
  knownRegions: z.array(z.string().min(1)),
  abbreviations: z.record(z.string().regex(/^[A-Z]{2,4}$/), z.string().min(1)),
  leadingStopWords: z.array(z.string().min(1)),
});

export const pipelineSettingsSchema = z.object({
  scoring: scoringSettingsSchema,
  normalizer: normalizerSettingsSchema,
  resolver: resolverSettingsSchema,
  oracle: oracleSettingsSchema,
  regions: regionSettingsSchema,
});

// CLI arguments for the locate command
export const locateArgsSchema = z.object({
  input: nonBlankSchema,
  output: nonBlankSchema,
  summary: z.string().optional(),
  gazetteer: z.string().optional(),
  concurrency: z.coerce.number().int().min(1).max(64).optional(),
});

/**
 * Flatten zod issues into one line: `path: message; path: message`
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

// Export types
export type MentionInput = z.infer<typeof mentionInputSchema>;
export type NerRecordInput = z.infer<typeof nerRecordSchema>;
export type OracleHitInput = z.infer<typeof oracleHitSchema>;
export type NominatimPlace = z.infer<typeof nominatimPlaceSchema>;
export type GazetteerEntry = z.infer<typeof gazetteerEntrySchema>;
export type ScoringWeights = z.infer<typeof scoringWeightsSchema>;
export type ScoringSettings = z.infer<typeof scoringSettingsSchema>;
export type NormalizerSettings = z.infer<typeof normalizerSettingsSchema>;
export type ResolverSettings = z.infer<typeof resolverSettingsSchema>;
export type OracleSettings = z.infer<typeof oracleSettingsSchema>;
export type RegionSettings = z.infer<typeof regionSettingsSchema>;
export type PipelineSettings = z.infer<typeof pipelineSettingsSchema>;
export type LocateArgs = z.infer<typeof locateArgsSchema>;
