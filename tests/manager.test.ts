import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createTemplate, TemplateManager } from '../src/templates/index.js';
import type { PromptTemplate } from '../src/templates/index.js';
import { Logger } from '../src/logger/index.js';

let dir: string;
let logger: Logger;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'docprompt-manager-'));
  logger = new Logger();
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

function make(name: string, tags: string[] = [], template = 'Body'): PromptTemplate {
  return createTemplate({ name, description: `${name} description`, template, tags });
}

describe('TemplateManager', () => {
  it('starts empty on an empty directory', async () => {
    const manager = await TemplateManager.open(dir, { logger });

    expect(manager.size).toBe(0);
    expect(manager.list()).toEqual([]);
    expect(manager.directory).toBe(dir);
  });

  it('saves, then finds the template again after reopening', async () => {
    const manager = await TemplateManager.open(dir, { logger });
    const template = createTemplate({
      name: 'Round Trip',
      description: 'desc',
      template: 'Hi $who',
      parameters: { who: 'Name' },
      systemMessage: 'sys',
      tags: ['a'],
      examples: [{ parameters: { who: 'Bo' }, output: 'Hi Bo' }],
      version: '3.0',
    });

    const path = await manager.save(template);
    expect(path).toBe(join(dir, 'round_trip.json'));
    expect(manager.get('Round Trip')).toBe(template);

    const reopened = await TemplateManager.open(dir, { logger });
    expect(reopened.get('Round Trip')).toEqual(template);
  });

  it('treats saving the same template twice as one entry', async () => {
    const manager = await TemplateManager.open(dir, { logger });
    const template = make('Twice');

    await manager.save(template);
    await manager.save(template);

    expect(manager.size).toBe(1);
    expect(await readdir(dir)).toEqual(['twice.json']);
  });

  it('replaces a template saved under the same name', async () => {
    const manager = await TemplateManager.open(dir, { logger });
    await manager.save(make('Versioned', [], 'old'));
    await manager.save(make('Versioned', [], 'new'));

    expect(manager.get('Versioned')?.template).toBe('new');
    const reopened = await TemplateManager.open(dir, { logger });
    expect(reopened.get('Versioned')?.template).toBe('new');
  });

  it('looks names up exactly', async () => {
    const manager = await TemplateManager.open(dir, { logger });
    await manager.save(make('Exact Name'));

    expect(manager.has('Exact Name')).toBe(true);
    expect(manager.get('exact name')).toBeUndefined();
    expect(manager.has('Missing')).toBe(false);
  });

  it('lists summaries in insertion order', async () => {
    const manager = await TemplateManager.open(dir, { logger });
    await manager.save(make('Second', ['x']));
    await manager.save(make('First', ['y']));

    expect(manager.list().map((s) => s.name)).toEqual(['Second', 'First']);
    expect(manager.list()[0]).toEqual({
      name: 'Second',
      description: 'Second description',
      parameters: [],
      tags: ['x'],
      version: '1.0',
    });
  });

  it('filters by tags with OR semantics', async () => {
    const manager = await TemplateManager.open(dir, { logger });
    await manager.save(make('A', ['x']));
    await manager.save(make('B', ['y']));
    await manager.save(make('C', ['x', 'z']));

    expect(manager.filterByTags(['x', 'y']).map((t) => t.name)).toEqual(['A', 'B', 'C']);
    expect(manager.filterByTags(['z']).map((t) => t.name)).toEqual(['C']);
    expect(manager.filterByTags(['nothing'])).toEqual([]);
    expect(manager.filterByTags([])).toEqual([]);
  });

  it('removes templates from disk and index', async () => {
    const manager = await TemplateManager.open(dir, { logger });
    await manager.save(make('Doomed'));

    expect(await manager.remove('Doomed')).toBe(true);
    expect(manager.has('Doomed')).toBe(false);
    expect(await readdir(dir)).toEqual([]);
  });

  it('returns false when removing an unknown name', async () => {
    const manager = await TemplateManager.open(dir, { logger });
    expect(await manager.remove('Ghost')).toBe(false);
  });

  it('warns when a different name maps to the same file', async () => {
    const manager = await TemplateManager.open(dir, { logger });
    await manager.save(make('Code Review'));
    await manager.save(make('code review'));

    expect(logger.getEntries('warn').map((e) => e.message)).toEqual([
      'Template "code review" shares file code_review.json with "Code Review"; the file will be overwritten',
    ]);
    expect(await readdir(dir)).toEqual(['code_review.json']);
  });

  it('applies concurrent writes in call order', async () => {
    const manager = await TemplateManager.open(dir, { logger });

    await Promise.all([
      manager.save(make('Race', [], 'one')),
      manager.save(make('Race', [], 'two')),
      manager.remove('Race'),
      manager.save(make('Race', [], 'three')),
    ]);

    expect(manager.get('Race')?.template).toBe('three');
    const reopened = await TemplateManager.open(dir, { logger });
    expect(reopened.get('Race')?.template).toBe('three');
  });

  it('keeps processing queued writes after one fails', async () => {
    const blocked = join(dir, 'blocked');
    const manager = await TemplateManager.open(blocked, { logger });
    await rm(blocked, { recursive: true, force: true });
    await writeFile(blocked, 'not a directory', 'utf-8');

    const failing = manager.save(make('Will Fail'));
    const removal = manager.remove('Never Saved');

    await expect(failing).rejects.toMatchObject({ code: 'STORAGE_ERROR' });
    await expect(removal).resolves.toBe(false);
    expect(manager.has('Will Fail')).toBe(false);
  });
});
