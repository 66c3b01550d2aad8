import { describe, it, expect } from 'vitest';
import {
  createTemplate,
  fromRecord,
  slugify,
  toRecord,
  toSummary,
  TemplateRecordSchema,
} from '../src/templates/index.js';
import { DocPromptError } from '../src/types.js';

describe('createTemplate', () => {
  it('fills in defaults', () => {
    const template = createTemplate({ name: 'Minimal', description: 'd', template: 'body' });

    expect(template.parameters).toEqual({});
    expect(template.tags).toEqual([]);
    expect(template.examples).toEqual([]);
    expect(template.version).toBe('1.0');
    expect(template.systemMessage).toBeUndefined();
  });

  it('drops an empty or null system message', () => {
    expect(createTemplate({ name: 'A', description: '', template: '', systemMessage: '' }).systemMessage).toBeUndefined();
    expect(createTemplate({ name: 'A', description: '', template: '', systemMessage: null }).systemMessage).toBeUndefined();
  });

  it('returns a frozen value', () => {
    const template = createTemplate({
      name: 'Frozen',
      description: '',
      template: '',
      parameters: { a: 'first' },
      tags: ['x'],
    });

    expect(Object.isFrozen(template)).toBe(true);
    expect(Object.isFrozen(template.parameters)).toBe(true);
    expect(Object.isFrozen(template.tags)).toBe(true);
  });

  it('does not share state with the input', () => {
    const tags = ['one'];
    const template = createTemplate({ name: 'Copy', description: '', template: '', tags });
    tags.push('two');

    expect(template.tags).toEqual(['one']);
  });

  it('rejects a blank name', () => {
    expect(() => createTemplate({ name: '   ', description: '', template: '' })).toThrow(DocPromptError);
    expect(() => createTemplate({ name: '', description: '', template: '' })).toThrow(
      'Invalid template: name must not be empty'
    );
  });
});

describe('slugify', () => {
  it('lowercases and replaces spaces with underscores', () => {
    expect(slugify('Document Summary')).toBe('document_summary');
    expect(slugify('Chain of Thought Reasoning')).toBe('chain_of_thought_reasoning');
  });

  it('maps names differing only in case to the same slug', () => {
    expect(slugify('Code Review')).toBe(slugify('code review'));
  });
});

describe('records', () => {
  const template = createTemplate({
    name: 'Record Test',
    description: 'Round trip',
    template: 'Use $a',
    parameters: { a: 'A value' },
    systemMessage: 'System',
    tags: ['t1', 't2'],
    examples: [{ parameters: { a: '1' }, output: 'out' }, { parameters: { a: '2' } }],
    version: '2.1',
  });

  it('uses the snake_case record layout', () => {
    expect(toRecord(template)).toEqual({
      name: 'Record Test',
      description: 'Round trip',
      template: 'Use $a',
      parameters: { a: 'A value' },
      system_message: 'System',
      tags: ['t1', 't2'],
      examples: [{ parameters: { a: '1' }, output: 'out' }, { parameters: { a: '2' } }],
      version: '2.1',
    });
  });

  it('stores a missing system message as null', () => {
    const plain = createTemplate({ name: 'Plain', description: '', template: '' });
    expect(toRecord(plain).system_message).toBeNull();
  });

  it('rebuilds an equal template from its record', () => {
    const restored = fromRecord(TemplateRecordSchema.parse(JSON.parse(JSON.stringify(toRecord(template)))));
    expect(restored).toEqual(template);
  });

  it('fills defaults for missing optional record fields', () => {
    const record = TemplateRecordSchema.parse({ name: 'Sparse', description: 'd', template: 't' });

    expect(record).toEqual({
      name: 'Sparse',
      description: 'd',
      template: 't',
      parameters: {},
      system_message: null,
      tags: [],
      examples: [],
      version: '1.0',
    });
  });

  it('rejects records without a name', () => {
    expect(TemplateRecordSchema.safeParse({ description: 'd', template: 't' }).success).toBe(false);
  });
});

describe('toSummary', () => {
  it('lists parameter names instead of descriptions', () => {
    const template = createTemplate({
      name: 'Summary',
      description: 'desc',
      template: '$x $y',
      parameters: { x: 'first', y: 'second' },
      tags: ['a'],
    });

    expect(toSummary(template)).toEqual({
      name: 'Summary',
      description: 'desc',
      parameters: ['x', 'y'],
      tags: ['a'],
      version: '1.0',
    });
  });
});
