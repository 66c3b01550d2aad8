import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_TEMPLATES,
  extractParameters,
  getDefaultTemplate,
  seedDefaultTemplates,
  TemplateManager,
} from '../src/templates/index.js';
import { Logger } from '../src/logger/index.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'docprompt-seed-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('Default templates', () => {
  it('has the six expected templates', () => {
    expect(DEFAULT_TEMPLATES.map((t) => t.name)).toEqual([
      'Document Summary',
      'Code Review',
      'Data Analysis',
      'Content Classification',
      'Product Description',
      'Chain of Thought Reasoning',
    ]);
  });

  it('declares exactly the parameters each body uses', () => {
    for (const template of DEFAULT_TEMPLATES) {
      expect(extractParameters(template.template).sort()).toEqual(Object.keys(template.parameters).sort());
    }
  });

  it('gives every default a system message and tags', () => {
    for (const template of DEFAULT_TEMPLATES) {
      expect(template.systemMessage).toBeTruthy();
      expect(template.tags.length).toBeGreaterThan(0);
    }
  });

  it('looks defaults up by name', () => {
    expect(getDefaultTemplate('Code Review')?.tags).toEqual(['programming', 'code', 'review']);
    expect(getDefaultTemplate('Nope')).toBeUndefined();
  });
});

describe('seedDefaultTemplates', () => {
  it('writes all defaults into an empty directory', async () => {
    const written = await seedDefaultTemplates(dir, new Logger());

    expect(written).toHaveLength(6);
    expect((await readdir(dir)).sort()).toEqual([
      'chain_of_thought_reasoning.json',
      'code_review.json',
      'content_classification.json',
      'data_analysis.json',
      'document_summary.json',
      'product_description.json',
    ]);

    const manager = await TemplateManager.open(dir, { logger: new Logger() });
    expect(manager.size).toBe(6);
    expect(manager.get('Document Summary')).toEqual(getDefaultTemplate('Document Summary'));
  });

  it('creates the directory when it does not exist', async () => {
    const nested = join(dir, 'templates');
    const written = await seedDefaultTemplates(nested, new Logger());
    expect(written).toHaveLength(6);
  });

  it('leaves a directory with existing records alone', async () => {
    const custom = join(dir, 'mine.json');
    const contents = JSON.stringify({ name: 'Mine', description: 'd', template: 't' });
    await writeFile(custom, contents, 'utf-8');

    const written = await seedDefaultTemplates(dir, new Logger());

    expect(written).toEqual([]);
    expect(await readdir(dir)).toEqual(['mine.json']);
    expect(await readFile(custom, 'utf-8')).toBe(contents);
  });

  it('writes nothing the second time', async () => {
    await seedDefaultTemplates(dir, new Logger());
    expect(await seedDefaultTemplates(dir, new Logger())).toEqual([]);
  });

  it('logs each created template', async () => {
    const logger = new Logger();
    await seedDefaultTemplates(dir, logger);

    expect(logger.getEntries('info').map((e) => e.message)).toEqual(
      DEFAULT_TEMPLATES.map((t) => `Created template: ${t.name}`)
    );
  });
});
