import { describe, it, expect } from 'vitest';
import { formatAnalysis } from '../src/analysis/index.js';

describe('formatAnalysis', () => {
  it('formats sentiment', () => {
    const text = formatAnalysis('sentiment', {
      polarity: -0.4,
      valence: 'negative',
      confidence: 0.8,
      dominant_emotions: ['anger', 'frustration'],
      analysis: 'Complaints dominate.',
    });

    expect(text.split('\n')).toEqual([
      '===== SENTIMENT ANALYSIS =====',
      'Polarity: -0.4 (negative)',
      'Confidence: 0.8',
      'Dominant emotions: anger, frustration',
      '',
      'Analysis:',
      'Complaints dominate.',
    ]);
  });

  it('formats entities by type', () => {
    const text = formatAnalysis('entities', { entities: { people: ['Ann', 'Bo'], places: ['Oslo'] } });

    expect(text.split('\n')).toEqual([
      '===== ENTITY EXTRACTION =====',
      '',
      'PEOPLE:',
      '  - Ann',
      '  - Bo',
      '',
      'PLACES:',
      '  - Oslo',
    ]);
  });

  it('formats key points with their evidence', () => {
    const text = formatAnalysis('key_points', {
      main_points: ['Costs rose', 'Sales held'],
      supporting_evidence: { 'Costs rose': ['Fuel up 10%'] },
    });

    expect(text.split('\n')).toEqual([
      '===== KEY POINTS ANALYSIS =====',
      '',
      '1. Costs rose',
      '   Supporting evidence:',
      '   - Fuel up 10%',
      '',
      '2. Sales held',
    ]);
  });

  it('formats structure with a fallback section title', () => {
    const text = formatAnalysis('structure', {
      sections: [{ title: 'Intro', key_elements: ['hook', 'thesis'] }, { key_elements: 'single' }],
      flow_analysis: 'Abrupt ending.',
      suggestions: ['Add a conclusion'],
    });

    expect(text.split('\n')).toEqual([
      '===== STRUCTURE ANALYSIS =====',
      'Document structure:',
      '',
      '1. Intro',
      '   - hook',
      '   - thesis',
      '',
      '2. Section 2',
      '   - single',
      '',
      'Flow analysis:',
      'Abrupt ending.',
      '',
      'Suggestions:',
      '- Add a conclusion',
    ]);
  });

  it('formats action items with defaults for missing fields', () => {
    const text = formatAnalysis('action_items', {
      action_items: [{ description: 'Send report', priority: 'high' }, { context: 'From standup' }],
      deadlines: [{ action: 'Send report', date: 'Monday' }, {}],
      responsible_parties: ['Ann'],
    });

    expect(text.split('\n')).toEqual([
      '===== ACTION ITEMS EXTRACTION =====',
      'Action items:',
      '',
      '1. Send report',
      '   Priority: high',
      '',
      '2. Unnamed action',
      '   Context: From standup',
      '',
      'Deadlines:',
      '- Send report: Monday',
      '- Action: No date',
      '',
      'Responsible parties:',
      '- Ann',
    ]);
  });

  it('formats metadata', () => {
    const text = formatAnalysis('metadata', {
      title: 'Notes',
      summary: 'Short.',
      keywords: ['a', 'b'],
      topics: ['c'],
    });

    expect(text).toBe('Title: Notes\nSummary:\nShort.\nKeywords: a, b\nTopics: c');
  });
});
