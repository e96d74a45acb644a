/**
 * LLM module barrel export.
 */

export type {
  CompletionClient,
  CompletionRequest,
  CompletionResult,
  OutputShape,
  PromptFormat,
  ShapeFieldType,
} from './types.js';
export { OpenAICompletionClient, DEFAULT_MODEL } from './openai.js';
export type { OpenAICompletionClientOptions } from './openai.js';
export { buildPrompt, splitPrompt, formatLlama3Prompt, renderSchema, QUESTION_MARKER } from './prompt.js';
export type { PromptInput, PromptMode } from './prompt.js';
export { checkShape, shapeToJsonSchema, extractJson } from './shape.js';
