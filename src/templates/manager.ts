import type { PromptTemplate, TemplateSummary } from './types.js';
import { TemplateStore } from './store.js';
import { slugify, toSummary } from './template.js';
import { Logger } from '../logger/index.js';

export interface TemplateManagerOptions {
  logger?: Logger;
}

/**
 * In-memory template index backed by a `TemplateStore`.
 *
 * Reads are served from memory. `save` and `remove` are queued so that only one
 * runs at a time, and each finishes its disk write before touching the index.
 */
export class TemplateManager {
  private templates: Map<string, PromptTemplate>;
  private store: TemplateStore;
  private logger: Logger;
  private pendingWrite: Promise<unknown> = Promise.resolve();

  private constructor(store: TemplateStore, templates: Map<string, PromptTemplate>, logger: Logger) {
    this.store = store;
    this.templates = templates;
    this.logger = logger;
  }

  /**
   * Load the templates in `directory` (creating it if missing).
   */
  static async open(directory: string, options: TemplateManagerOptions = {}): Promise<TemplateManager> {
    const logger = options.logger ?? new Logger();
    const store = new TemplateStore(directory, logger);
    const templates = await store.loadAll();

    logger.debug(`Loaded ${templates.size} templates from ${store.directory}`);

    return new TemplateManager(store, templates, logger);
  }

  get directory(): string {
    return this.store.directory;
  }

  get size(): number {
    return this.templates.size;
  }

  /**
   * Get a template by exact name.
   */
  get(name: string): PromptTemplate | undefined {
    return this.templates.get(name);
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  /**
   * Summaries of all templates, in index order.
   */
  list(): TemplateSummary[] {
    return Array.from(this.templates.values(), toSummary);
  }

  /**
   * Templates sharing at least one tag with `tags`.
   */
  filterByTags(tags: readonly string[]): PromptTemplate[] {
    return Array.from(this.templates.values()).filter((t) => t.tags.some((tag) => tags.includes(tag)));
  }

  /**
   * Write a template and add it to the index, replacing any template with the same name.
   * Returns the path of the written file.
   */
  save(template: PromptTemplate): Promise<string> {
    return this.enqueue(async () => {
      const slug = slugify(template.name);
      for (const existing of this.templates.keys()) {
        if (existing !== template.name && slugify(existing) === slug) {
          this.logger.warn(
            `Template "${template.name}" shares file ${slug}.json with "${existing}"; the file will be overwritten`
          );
        }
      }

      const path = await this.store.write(template);
      this.templates.set(template.name, template);
      this.logger.debug(`Saved template "${template.name}" to ${path}`);
      return path;
    });
  }

  /**
   * Remove a template from disk and from the index.
   * Returns false when no template has that name.
   */
  remove(name: string): Promise<boolean> {
    return this.enqueue(async () => {
      if (!this.templates.has(name)) {
        return false;
      }

      await this.store.delete(name);
      this.templates.delete(name);
      this.logger.debug(`Removed template "${name}"`);
      return true;
    });
  }

  /**
   * Run `task` after every previously queued write has settled.
   */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pendingWrite.then(task);
    // the caller sees failures through `run`; the queue itself keeps going
    this.pendingWrite = run.catch(() => undefined);
    return run;
  }
}
