import type {
  ActionItemExtraction,
  AnalysisKind,
  AnalysisResultMap,
  ContentStructure,
  DocumentMetadata,
  EntityExtraction,
  KeyPointsExtraction,
  SentimentAnalysis,
} from './types.js';

function formatSentiment(result: SentimentAnalysis): string[] {
  return [
    '===== SENTIMENT ANALYSIS =====',
    `Polarity: ${result.polarity} (${result.valence})`,
    `Confidence: ${result.confidence}`,
    `Dominant emotions: ${result.dominant_emotions.join(', ')}`,
    '',
    'Analysis:',
    result.analysis,
  ];
}

function formatEntities(result: EntityExtraction): string[] {
  const lines = ['===== ENTITY EXTRACTION ====='];
  for (const [type, items] of Object.entries(result.entities)) {
    lines.push('', `${type.toUpperCase()}:`);
    for (const item of items) {
      lines.push(`  - ${item}`);
    }
  }
  return lines;
}

function formatKeyPoints(result: KeyPointsExtraction): string[] {
  const lines = ['===== KEY POINTS ANALYSIS ====='];
  result.main_points.forEach((point, i) => {
    lines.push('', `${i + 1}. ${point}`);
    const evidence = result.supporting_evidence[point];
    if (evidence) {
      lines.push('   Supporting evidence:');
      for (const item of evidence) {
        lines.push(`   - ${item}`);
      }
    }
  });
  return lines;
}

function formatStructure(result: ContentStructure): string[] {
  const lines = ['===== STRUCTURE ANALYSIS =====', 'Document structure:'];

  result.sections.forEach((section, i) => {
    const title = typeof section.title === 'string' ? section.title : `Section ${i + 1}`;
    const elements = section.key_elements ?? [];
    lines.push('', `${i + 1}. ${title}`);
    for (const element of Array.isArray(elements) ? elements : [elements]) {
      lines.push(`   - ${element}`);
    }
  });

  lines.push('', 'Flow analysis:', result.flow_analysis, '', 'Suggestions:');
  for (const suggestion of result.suggestions) {
    lines.push(`- ${suggestion}`);
  }
  return lines;
}

function field(item: Record<string, unknown>, key: string, fallback: string): string {
  const value = item[key];
  return value === undefined || value === null ? fallback : String(value);
}

function formatActionItems(result: ActionItemExtraction): string[] {
  const lines = ['===== ACTION ITEMS EXTRACTION =====', 'Action items:'];

  result.action_items.forEach((item, i) => {
    lines.push('', `${i + 1}. ${field(item, 'description', 'Unnamed action')}`);
    if ('priority' in item) {
      lines.push(`   Priority: ${field(item, 'priority', '')}`);
    }
    if ('context' in item) {
      lines.push(`   Context: ${field(item, 'context', '')}`);
    }
  });

  lines.push('', 'Deadlines:');
  for (const deadline of result.deadlines) {
    lines.push(`- ${field(deadline, 'action', 'Action')}: ${field(deadline, 'date', 'No date')}`);
  }

  lines.push('', 'Responsible parties:');
  for (const party of result.responsible_parties) {
    lines.push(`- ${party}`);
  }
  return lines;
}

function formatMetadata(result: DocumentMetadata): string[] {
  return [
    `Title: ${result.title}`,
    `Summary:\n${result.summary}`,
    `Keywords: ${result.keywords.join(', ')}`,
    `Topics: ${result.topics.join(', ')}`,
  ];
}

type Formatters = { [K in AnalysisKind]: (result: AnalysisResultMap[K]) => string[] };

const FORMATTERS: Formatters = {
  sentiment: formatSentiment,
  entities: formatEntities,
  key_points: formatKeyPoints,
  structure: formatStructure,
  action_items: formatActionItems,
  metadata: formatMetadata,
};

/**
 * Render an analysis result as human-readable text.
 */
export function formatAnalysis<K extends AnalysisKind>(kind: K, result: AnalysisResultMap[K]): string {
  const format: Formatters[K] = FORMATTERS[kind];
  return format(result).join('\n');
}
