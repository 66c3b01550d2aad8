/**
 * System prompts and result schemas for each analysis kind.
 */

import {
  ActionItemExtractionSchema,
  ANALYSIS_KINDS,
  ContentStructureSchema,
  DocumentMetadataSchema,
  EntityExtractionSchema,
  KeyPointsExtractionSchema,
  SentimentAnalysisSchema,
  type AnalysisCatalog,
  type AnalysisKind,
} from './types.js';

/** Completion budget for the specialized analyses. */
export const ANALYSIS_MAX_TOKENS = 800;

/** Completion budget for generic document metadata. */
export const METADATA_MAX_TOKENS = 512;

/** Low temperature keeps structured output stable. */
export const ANALYSIS_TEMPERATURE = 0.3;

const SENTIMENT_PROMPT = `You are an expert sentiment analyzer. Given the content of a document, analyze its sentiment in detail.
Provide:
1. A polarity score between -1.0 (extremely negative) and 1.0 (extremely positive)
2. The sentiment valence ("negative", "neutral", or "positive")
3. A confidence score between 0.0 and 1.0 for your analysis
4. A list of dominant emotions detected in the text
5. A brief qualitative analysis of the sentiment

Return your analysis as a valid JSON object with these keys:
polarity, valence, confidence, dominant_emotions, analysis`;

const ENTITIES_PROMPT = `You are an expert entity extraction system. Given the content of a document, extract all named entities.
Categorize entities into types such as:
- people
- organizations
- locations
- dates
- products
- technologies
- concepts
- other relevant entity types you identify

Return your analysis as a valid JSON object with an "entities" key mapping to a dictionary
where keys are entity types and values are lists of unique entities of that type.`;

const KEY_POINTS_PROMPT = `You are an expert content analyst. Given the content of a document, extract the key points and supporting evidence.
Provide:
1. A list of the main points or arguments in the content
2. For each main point, a list of supporting evidence, quotes, or details from the text

Return your analysis as a valid JSON object with these keys:
main_points (a list of strings), supporting_evidence (a dictionary mapping each main point to a list of supporting evidence)`;

const STRUCTURE_PROMPT = `You are an expert content structure analyst. Given the content of a document, analyze its structure.
Provide:
1. A breakdown of the content's sections (with titles and key elements in each)
2. An analysis of the logical flow between sections
3. Suggestions for structural improvements

Return your analysis as a valid JSON object with these keys:
sections (a list of section objects with title and key_elements), flow_analysis (a string), suggestions (a list of strings)`;

const ACTION_ITEMS_PROMPT = `You are an expert at extracting action items from text. Given the content of a document, identify all action items, deadlines, and responsible parties.
Provide:
1. A list of action items (with description, priority if mentioned, and context)
2. A list of deadlines mentioned (with the associated action and date)
3. A list of responsible parties (people or teams mentioned as responsible for actions)

Return your analysis as a valid JSON object with these keys:
action_items (a list of action item objects), deadlines (a list of deadline objects), responsible_parties (a list of strings)`;

const METADATA_PROMPT = `You are a metadata generation assistant for documents.

Given the full content of a document, generate structured JSON metadata
with the following keys:

- "title": A short, descriptive title of the document.
- "summary": A concise paragraph summarizing the document content.
- "keywords": A list of 5-10 keywords (single words or short phrases).
- "topics": A list of higher-level topics or domains related to the content.

The output MUST be a valid JSON object with those keys.`;

export const ANALYSIS_CATALOG: AnalysisCatalog = {
  sentiment: {
    description: 'Analyze sentiment and emotional tone',
    systemPrompt: SENTIMENT_PROMPT,
    schema: SentimentAnalysisSchema,
    maxTokens: ANALYSIS_MAX_TOKENS,
  },
  entities: {
    description: 'Extract named entities and key concepts',
    systemPrompt: ENTITIES_PROMPT,
    schema: EntityExtractionSchema,
    maxTokens: ANALYSIS_MAX_TOKENS,
  },
  key_points: {
    description: 'Extract main points and supporting evidence',
    systemPrompt: KEY_POINTS_PROMPT,
    schema: KeyPointsExtractionSchema,
    maxTokens: ANALYSIS_MAX_TOKENS,
  },
  structure: {
    description: 'Analyze document structure and flow',
    systemPrompt: STRUCTURE_PROMPT,
    schema: ContentStructureSchema,
    maxTokens: ANALYSIS_MAX_TOKENS,
  },
  action_items: {
    description: 'Extract action items, deadlines, and responsibilities',
    systemPrompt: ACTION_ITEMS_PROMPT,
    schema: ActionItemExtractionSchema,
    maxTokens: ANALYSIS_MAX_TOKENS,
  },
  metadata: {
    description: 'Generate a title, summary, keywords and topics',
    systemPrompt: METADATA_PROMPT,
    schema: DocumentMetadataSchema,
    maxTokens: METADATA_MAX_TOKENS,
  },
};

/**
 * Narrow an arbitrary string to a known analysis kind.
 */
export function isAnalysisKind(kind: string): kind is AnalysisKind {
  return ANALYSIS_KINDS.some((known) => known === kind);
}

/**
 * Help text listing every analysis kind.
 */
export function getAnalysisHelp(): string {
  const lines = ['Analysis types:'];
  for (const kind of ANALYSIS_KINDS) {
    lines.push(`  ${kind.padEnd(14)} ${ANALYSIS_CATALOG[kind].description}`);
  }
  return lines.join('\n');
}
