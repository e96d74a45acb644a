/**
 * Prompt construction for SQL generation and repair.
 * Every function here is pure; identical input gives byte-identical output.
 */

import type { SchemaDescriptor } from '../schema/types.js';
import type { ValidationReason } from '../sql/validator.js';

export type PromptMode = 'generate' | 'repair';

export interface PromptInput {
  question: string;
  schema: SchemaDescriptor;
  table: string;
  mode: PromptMode;
  /** Repair mode: the rejected candidate */
  priorCandidate?: string;
  /** Repair mode: why it was rejected */
  priorReasons?: readonly (ValidationReason | string)[];
}

/** Separates the instruction block from the question in a rendered prompt. */
export const QUESTION_MARKER = '\n\nQuestion: ';

const GENERATION_RULES = [
  'Use only the fields that are necessary to answer the question.',
  'Use proper ClickHouse SQL syntax, not SQLite or MySQL.',
  'Do not use SELECT * except for very simple queries.',
  'Always include appropriate filters to make results meaningful.',
  'If aggregating data, include appropriate GROUP BY clauses.',
  'If sorting or ranking is implied by the question, include ORDER BY clauses.',
  'Always include a LIMIT clause to prevent excessive results.',
  'If the question asks for recent data, filter by a date field.',
  'Format the SQL query for readability with proper indentation.',
  'Respond with ONLY the SQL query: no explanations, no prose.',
];

const COMMON_DEFECTS = [
  'Fields that do not exist in the schema (use the exact column names listed above).',
  'Syntax from another SQL dialect instead of ClickHouse.',
  'A missing or wrong table name in the FROM clause.',
  'Aggregates mixed with plain columns without a GROUP BY clause.',
  'Wrong syntax such as unbalanced parentheses, stray commas or comments.',
];

export function renderSchema(schema: SchemaDescriptor): string {
  const lines: string[] = [];
  for (const [name, meta] of schema) {
    const description = meta.description ? ` - ${meta.description}` : '';
    lines.push(`- ${name} (${meta.type})${description}`);
  }
  return lines.join('\n');
}

function reasonText(reason: ValidationReason | string): string {
  return typeof reason === 'string' ? reason : reason.message;
}

function numbered(items: readonly string[]): string {
  return items.map((item, i) => `${i + 1}. ${item}`).join('\n');
}

/**
 * Render the full prompt for one completion call.
 * The question always comes last, after QUESTION_MARKER.
 */
export function buildPrompt(input: PromptInput): string {
  const sections: string[] = [
    `You are a financial analyst with 15 years of experience writing SQL queries for a ClickHouse database.`,
    `The ${input.table} table has the following schema:\n${renderSchema(input.schema)}`,
    `Write a ClickHouse SQL query against the ${input.table} table to answer the question. Follow these rules:\n${numbered(GENERATION_RULES)}`,
  ];

  if (input.mode === 'repair') {
    const reasons = (input.priorReasons ?? []).map(reasonText);
    sections.push(
      `Your previous query was rejected:\n${input.priorCandidate ?? ''}`,
      `Rejection reasons:\n${reasons.length > 0 ? reasons.map((r) => `- ${r}`).join('\n') : '- (none given)'}`,
      `Common defects to check for:\n${numbered(COMMON_DEFECTS)}`,
      'Return ONLY the corrected SQL query.',
    );
  }

  return sections.join('\n\n') + QUESTION_MARKER + input.question;
}

/**
 * Split a prompt built by buildPrompt into its instruction block and question,
 * for chat models that take them as separate messages. When the question is
 * known, the split is made exactly in front of it; otherwise at the last marker.
 */
export function splitPrompt(prompt: string, question?: string): { system: string; user: string } {
  if (question !== undefined && prompt.endsWith(QUESTION_MARKER + question)) {
    const idx = prompt.length - question.length - QUESTION_MARKER.length;
    return { system: prompt.slice(0, idx), user: question };
  }
  const idx = prompt.lastIndexOf(QUESTION_MARKER);
  if (idx === -1) {
    return { system: '', user: prompt };
  }
  return { system: prompt.slice(0, idx), user: prompt.slice(idx + QUESTION_MARKER.length) };
}

/**
 * Llama-3 instruct template, for raw-completion endpoints.
 */
export function formatLlama3Prompt(user: string, system = ''): string {
  const systemPart = system ? `<|start_header_id|>system<|end_header_id|>\n\n${system}<|eot_id|>` : '';
  return (
    `<|begin_of_text|>${systemPart}<|start_header_id|>user<|end_header_id|>\n\n` +
    `${user}<|eot_id|><|start_header_id|>assistant<|end_header_id|>\n\n`
  );
}
