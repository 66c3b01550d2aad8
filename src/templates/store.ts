import { mkdir, readdir, readFile, unlink, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import type { PromptTemplate } from './types.js';
import { TemplateRecordSchema } from './types.js';
import { fromRecord, slugify, toRecord } from './template.js';
import { storageError } from '../utils/errors.js';
import { Logger } from '../logger/index.js';

const RECORD_EXTENSION = '.json';

/**
 * Directory-backed template storage: one `<slug>.json` file per template.
 */
export class TemplateStore {
  readonly directory: string;
  private logger: Logger;

  constructor(directory: string, logger: Logger = new Logger()) {
    this.directory = resolve(directory);
    this.logger = logger;
  }

  /**
   * Get the file path for a template name.
   */
  pathFor(name: string): string {
    return join(this.directory, `${slugify(name)}${RECORD_EXTENSION}`);
  }

  /**
   * Create the directory (and parents) if needed.
   */
  async ensureDirectory(): Promise<void> {
    try {
      await mkdir(this.directory, { recursive: true });
    } catch (error) {
      throw storageError(
        `cannot create ${this.directory}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * Load every record in the directory, keyed by template name.
   * Unreadable or invalid records are skipped with a warning.
   */
  async loadAll(): Promise<Map<string, PromptTemplate>> {
    await this.ensureDirectory();

    const templates = new Map<string, PromptTemplate>();

    for (const file of await this.listRecordFiles()) {
      const path = join(this.directory, file);
      try {
        const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
        const parsed = TemplateRecordSchema.safeParse(raw);

        if (!parsed.success) {
          const issue = parsed.error.issues[0];
          const field = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
          this.logger.warn(`Error loading template ${path}: invalid field "${field}"`, {
            issues: parsed.error.issues.map((i) => i.message),
          });
          continue;
        }

        const template = fromRecord(parsed.data);
        templates.set(template.name, template);
      } catch (error) {
        this.logger.warn(
          `Error loading template ${path}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    return templates;
  }

  /**
   * Write a template to its slug-derived file, replacing any existing file.
   */
  async write(template: PromptTemplate): Promise<string> {
    await this.ensureDirectory();

    const path = this.pathFor(template.name);
    try {
      await writeFile(path, JSON.stringify(toRecord(template), null, 2), 'utf-8');
    } catch (error) {
      throw storageError(`cannot write ${path}`, error instanceof Error ? error : undefined);
    }

    return path;
  }

  /**
   * Delete a template's file. Returns false when there was no file.
   */
  async delete(name: string): Promise<boolean> {
    const path = this.pathFor(name);
    try {
      await unlink(path);
      return true;
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return false;
      }
      throw storageError(`cannot delete ${path}`, error instanceof Error ? error : undefined);
    }
  }

  /**
   * True when the directory holds no template records (or does not exist yet).
   */
  async isEmpty(): Promise<boolean> {
    return (await this.listRecordFiles()).length === 0;
  }

  private async listRecordFiles(): Promise<string[]> {
    try {
      const files = await readdir(this.directory);
      return files.filter((f) => f.endsWith(RECORD_EXTENSION)).sort();
    } catch (error) {
      if (isErrnoCode(error, 'ENOENT')) {
        return [];
      }
      throw storageError(
        `cannot read ${this.directory}`,
        error instanceof Error ? error : undefined
      );
    }
  }
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
