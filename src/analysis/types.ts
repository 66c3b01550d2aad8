import { z } from 'zod';
import type { DocPromptErrorCode, OpenAIModel } from '../types.js';
import type { LLMClient } from '../clients/types.js';
import type { LLMSettings } from '../config.js';
import type { Logger } from '../logger/index.js';

// =============================================================================
// Result schemas
// =============================================================================

export const SentimentAnalysisSchema = z.object({
  /** -1 (negative) to 1 (positive) */
  polarity: z.number(),
  /** negative, neutral or positive */
  valence: z.string(),
  /** 0 to 1 */
  confidence: z.number(),
  dominant_emotions: z.array(z.string()),
  analysis: z.string(),
});

export const EntityExtractionSchema = z.object({
  /** Entity type to the entities of that type */
  entities: z.record(z.string(), z.array(z.string())),
});

export const KeyPointsExtractionSchema = z.object({
  main_points: z.array(z.string()),
  /** Main point to its supporting evidence */
  supporting_evidence: z.record(z.string(), z.array(z.string())),
});

export const ContentStructureSchema = z.object({
  sections: z.array(z.record(z.string(), z.union([z.string(), z.array(z.string())]))),
  flow_analysis: z.string(),
  suggestions: z.array(z.string()),
});

export const ActionItemExtractionSchema = z.object({
  action_items: z.array(z.record(z.string(), z.unknown())),
  deadlines: z.array(z.record(z.string(), z.unknown())),
  responsible_parties: z.array(z.string()),
});

export const DocumentMetadataSchema = z.object({
  title: z.string(),
  summary: z.string(),
  keywords: z.array(z.string()),
  topics: z.array(z.string()),
});

export type SentimentAnalysis = z.infer<typeof SentimentAnalysisSchema>;
export type EntityExtraction = z.infer<typeof EntityExtractionSchema>;
export type KeyPointsExtraction = z.infer<typeof KeyPointsExtractionSchema>;
export type ContentStructure = z.infer<typeof ContentStructureSchema>;
export type ActionItemExtraction = z.infer<typeof ActionItemExtractionSchema>;
export type DocumentMetadata = z.infer<typeof DocumentMetadataSchema>;

// =============================================================================
// Analysis kinds
// =============================================================================

export const ANALYSIS_KINDS = [
  'sentiment',
  'entities',
  'key_points',
  'structure',
  'action_items',
  'metadata',
] as const;

export type AnalysisKind = (typeof ANALYSIS_KINDS)[number];

/**
 * Result shape per analysis kind.
 */
export interface AnalysisResultMap {
  sentiment: SentimentAnalysis;
  entities: EntityExtraction;
  key_points: KeyPointsExtraction;
  structure: ContentStructure;
  action_items: ActionItemExtraction;
  metadata: DocumentMetadata;
}

export type AnalysisResult = AnalysisResultMap[AnalysisKind];

/**
 * Everything the dispatcher needs to run one kind of analysis.
 */
export interface AnalysisConfig<K extends AnalysisKind> {
  description: string;
  systemPrompt: string;
  schema: z.ZodType<AnalysisResultMap[K], z.ZodTypeDef, unknown>;
  /** Max completion tokens */
  maxTokens: number;
}

export type AnalysisCatalog = { readonly [K in AnalysisKind]: AnalysisConfig<K> };

// =============================================================================
// Dispatch
// =============================================================================

export type AnalysisErrorCode = Extract<
  DocPromptErrorCode,
  | 'INVALID_KIND'
  | 'MALFORMED_RESPONSE'
  | 'SCHEMA_VIOLATION'
  | 'EXTERNAL_API_ERROR'
  | 'NOT_FOUND'
  | 'ANALYSIS_FAILED'
>;

/**
 * Returned instead of a result when anything goes wrong.
 * Callers check for the `error` key rather than catching.
 */
export interface AnalysisFailure {
  error: string;
  code: AnalysisErrorCode;
  /** Offending field path, for SCHEMA_VIOLATION */
  field?: string;
}

export type AnalysisOutcome<K extends AnalysisKind = AnalysisKind> =
  | AnalysisResultMap[K]
  | AnalysisFailure;

export interface AnalyzeOptions {
  /** Client to call; built from `model` and `settings` when absent */
  client?: LLMClient;
  model?: OpenAIModel;
  settings?: LLMSettings;
  logger?: Logger;
  /** Input budget in approximate tokens (default: 4000) */
  maxInputTokens?: number;
  /** Request timeout in ms for a client built here */
  timeout?: number;
}
