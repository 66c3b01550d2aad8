/**
 * Document Analysis Module
 *
 * Fixed analysis kinds, each bound to a system prompt and a result schema.
 */

export type {
  AnalysisKind,
  AnalysisResult,
  AnalysisResultMap,
  AnalysisConfig,
  AnalysisCatalog,
  AnalysisFailure,
  AnalysisErrorCode,
  AnalysisOutcome,
  AnalyzeOptions,
  SentimentAnalysis,
  EntityExtraction,
  KeyPointsExtraction,
  ContentStructure,
  ActionItemExtraction,
  DocumentMetadata,
} from './types.js';
export {
  ANALYSIS_KINDS,
  SentimentAnalysisSchema,
  EntityExtractionSchema,
  KeyPointsExtractionSchema,
  ContentStructureSchema,
  ActionItemExtractionSchema,
  DocumentMetadataSchema,
} from './types.js';
export {
  ANALYSIS_CATALOG,
  ANALYSIS_MAX_TOKENS,
  METADATA_MAX_TOKENS,
  ANALYSIS_TEMPERATURE,
  isAnalysisKind,
  getAnalysisHelp,
} from './catalog.js';
export { analyze, analyzeFile, generateMetadata, isAnalysisFailure } from './dispatcher.js';
export { formatAnalysis } from './format.js';
