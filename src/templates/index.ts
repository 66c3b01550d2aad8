/**
 * Prompt Templates Module
 *
 * Template values, rendering, directory storage and the in-memory manager.
 */

export type {
  PromptTemplate,
  TemplateInput,
  TemplateExample,
  TemplateSummary,
  TemplateValues,
  TemplateRecord,
  ChatMessage,
} from './types.js';
export { TemplateRecordSchema, TemplateExampleSchema, DEFAULT_TEMPLATE_VERSION } from './types.js';

export { createTemplate, slugify, toRecord, fromRecord, toSummary } from './template.js';
export {
  formatTemplate,
  substitute,
  toChatMessages,
  findMissingParameters,
  extractParameters,
} from './render.js';
export { TemplateStore } from './store.js';
export { TemplateManager } from './manager.js';
export type { TemplateManagerOptions } from './manager.js';
export {
  DEFAULT_TEMPLATES,
  getDefaultTemplate,
  seedDefaultTemplates,
  documentSummaryTemplate,
  codeReviewTemplate,
  dataAnalysisTemplate,
  contentClassificationTemplate,
  productDescriptionTemplate,
  chainOfThoughtTemplate,
} from './builtin.js';
