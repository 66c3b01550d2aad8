/**
 * Default Prompt Templates
 *
 * Written to a template directory the first time it is used.
 */

import type { PromptTemplate } from './types.js';
import { createTemplate } from './template.js';
import { TemplateStore } from './store.js';
import { Logger } from '../logger/index.js';

/**
 * Document summarization template.
 */
export const documentSummaryTemplate: PromptTemplate = createTemplate({
  name: 'Document Summary',
  description: 'Summarize a document with key points and main ideas',
  systemMessage:
    'You are an expert document summarizer. Your task is to create concise, accurate summaries that capture the most important information and main ideas.',
  template:
    'Please summarize the following document, focusing on the key points, main arguments, and important conclusions. Keep the summary clear and concise.\n\n$document',
  parameters: {
    document: 'The full text of the document to summarize',
  },
  tags: ['summarization', 'content', 'general'],
  examples: [
    {
      parameters: { document: 'A short memo announcing that the office moves to the third floor next month...' },
      output: 'The memo announces an office move to the third floor next month...',
    },
  ],
});

/**
 * Code review template.
 */
export const codeReviewTemplate: PromptTemplate = createTemplate({
  name: 'Code Review',
  description: 'Analyze code for bugs, improvements, and best practices',
  systemMessage:
    'You are an expert software engineer conducting a thorough code review. Focus on identifying bugs, security vulnerabilities, performance issues, and opportunities for improvement.',
  template:
    'Please review the following $language code for potential issues, bugs, security vulnerabilities, and areas for improvement. Focus on both functionality and adherence to best practices.\n\n```$language\n$code\n```',
  parameters: {
    language: 'The programming language of the code',
    code: 'The code to review',
  },
  tags: ['programming', 'code', 'review'],
  examples: [
    {
      parameters: {
        language: 'typescript',
        code: 'function average(xs: number[]) {\n  return xs.reduce((a, b) => a + b, 0) / xs.length;\n}',
      },
      output: 'The function returns NaN for an empty array because it divides by zero...',
    },
  ],
});

/**
 * Data analysis template.
 */
export const dataAnalysisTemplate: PromptTemplate = createTemplate({
  name: 'Data Analysis',
  description: 'Analyze and extract insights from structured data',
  systemMessage:
    'You are a data analysis expert skilled at interpreting data and extracting meaningful insights. Focus on patterns, anomalies, and actionable conclusions.',
  template:
    'Below is a dataset in $format format. Please analyze this data and provide insights on:\n1. Key trends and patterns\n2. Notable anomalies or outliers\n3. Meaningful correlations or relationships\n4. Actionable insights for business decisions\n\n$data',
  parameters: {
    format: 'The format of the data (CSV, JSON, etc.)',
    data: 'The structured data to analyze',
  },
  tags: ['data', 'analysis', 'business'],
  examples: [
    {
      parameters: {
        format: 'CSV',
        data: 'week,orders,returns\n1,40,2\n2,44,3\n3,51,9\n...',
      },
      output: 'Orders grow steadily week over week, but returns jump sharply in week 3...',
    },
  ],
});

/**
 * Content classification template.
 */
export const contentClassificationTemplate: PromptTemplate = createTemplate({
  name: 'Content Classification',
  description: 'Classify content into predefined categories',
  systemMessage:
    'You are a content classification expert. Your task is to accurately categorize content based on its characteristics and subject matter.',
  template:
    'Please classify the following content into the most appropriate category from the list provided. Explain your reasoning briefly.\n\nCategories: $categories\n\nContent to classify:\n$content',
  parameters: {
    categories: 'Comma-separated list of classification categories',
    content: 'The content to classify',
  },
  tags: ['classification', 'content', 'categorization'],
  examples: [
    {
      parameters: {
        categories: 'Technology, Business, Health, Sports',
        content: 'The city marathon drew a record number of runners this weekend.',
      },
      output: 'Category: Sports\nReasoning: The content reports on a running event.',
    },
  ],
});

/**
 * Product description template.
 */
export const productDescriptionTemplate: PromptTemplate = createTemplate({
  name: 'Product Description',
  description: 'Generate compelling product descriptions for e-commerce',
  systemMessage:
    'You are a skilled copywriter specializing in e-commerce product descriptions. Create compelling, accurate, and SEO-friendly product descriptions that highlight benefits and features.',
  template:
    'Please write a compelling product description for an e-commerce site based on the following information:\n\nProduct Name: $name\nProduct Category: $category\nKey Features: $features\nTarget Audience: $audience\nPrice Point: $price\nBrand Tone: $tone',
  parameters: {
    name: 'The name of the product',
    category: 'The product category',
    features: 'The key features and specifications',
    audience: 'Description of the target customers',
    price: 'Price point (budget, mid-range, premium)',
    tone: "The brand's tone of voice",
  },
  tags: ['marketing', 'e-commerce', 'copywriting'],
  examples: [
    {
      parameters: {
        name: 'Trailhead Daypack',
        category: 'Outdoor Bags',
        features: '20L capacity, water-resistant shell, padded laptop sleeve',
        audience: 'Weekend hikers and commuters',
        price: 'Mid-range',
        tone: 'Friendly, practical',
      },
      output: 'Meet the Trailhead Daypack, built for the trail on Saturday and the office on Monday...',
    },
  ],
});

/**
 * Step-by-step reasoning template.
 */
export const chainOfThoughtTemplate: PromptTemplate = createTemplate({
  name: 'Chain of Thought Reasoning',
  description: 'Solve complex problems using step-by-step reasoning',
  systemMessage:
    'You are an expert problem solver with a methodical approach. Break down complex problems into step-by-step reasoning to arrive at well-reasoned conclusions.',
  template:
    'Please solve the following $domain problem. Use chain-of-thought reasoning to work through the solution step by step, explaining your thought process clearly.\n\nProblem: $problem',
  parameters: {
    domain: 'The problem domain (e.g., math, logic, business)',
    problem: 'The problem statement to solve',
  },
  tags: ['reasoning', 'problem-solving', 'step-by-step'],
  examples: [
    {
      parameters: {
        domain: 'arithmetic',
        problem: 'A train leaves at 09:40 and the trip takes 2 hours 35 minutes. When does it arrive?',
      },
      output: '1. Add 2 hours: 11:40\n2. Add 35 minutes: 12:15\nThe train arrives at 12:15.',
    },
  ],
});

/**
 * All default templates, in the order they are written.
 */
export const DEFAULT_TEMPLATES: readonly PromptTemplate[] = [
  documentSummaryTemplate,
  codeReviewTemplate,
  dataAnalysisTemplate,
  contentClassificationTemplate,
  productDescriptionTemplate,
  chainOfThoughtTemplate,
];

/**
 * Get a default template by name.
 */
export function getDefaultTemplate(name: string): PromptTemplate | undefined {
  return DEFAULT_TEMPLATES.find((t) => t.name === name);
}

/**
 * Write the default templates into `directory`, but only if it holds no
 * template records yet. Returns the paths written (empty when nothing was written).
 */
export async function seedDefaultTemplates(
  directory: string,
  logger: Logger = new Logger()
): Promise<string[]> {
  const store = new TemplateStore(directory, logger);
  await store.ensureDirectory();

  if (!(await store.isEmpty())) {
    logger.debug(`Template directory ${store.directory} is not empty; skipping defaults`);
    return [];
  }

  const written: string[] = [];
  for (const template of DEFAULT_TEMPLATES) {
    written.push(await store.write(template));
    logger.info(`Created template: ${template.name}`);
  }

  return written;
}
