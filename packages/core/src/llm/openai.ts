/**
 * OpenAI-compatible completion client.
 *
 * Works against the OpenAI API or any endpoint speaking the same protocol
 * (set `baseURL`). `chat` sends system + user messages; `llama3` renders the
 * Llama-3 instruct template and uses the raw completions endpoint.
 */

import OpenAI, { type ClientOptions } from 'openai';
import { CompletionError, errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { formatLlama3Prompt, splitPrompt } from './prompt.js';
import { checkShape, extractJson, isRecord } from './shape.js';
import type {
  CompletionClient,
  CompletionRequest,
  CompletionResult,
  OutputShape,
  PromptFormat,
} from './types.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';

export interface OpenAICompletionClientOptions {
  apiKey: string;
  model?: string;
  baseURL?: string;
  promptFormat?: PromptFormat;
  temperature?: number;
  /** SDK-level retries for transient HTTP failures */
  maxRetries?: number;
  /** Custom fetch, passed through to the SDK */
  fetch?: ClientOptions['fetch'];
  logger?: Logger;
}

function shapeInstruction(shape: OutputShape): string {
  const fields = Object.entries(shape)
    .map(([name, type]) => `"${name}" (${type})`)
    .join(', ');
  return `Respond with ONLY a JSON object with these fields: ${fields}. Do not wrap it in markdown fences.`;
}

export class OpenAICompletionClient implements CompletionClient {
  readonly model: string;
  private readonly client: OpenAI;
  private readonly promptFormat: PromptFormat;
  private readonly temperature: number;
  private readonly log: Logger;

  constructor(opts: OpenAICompletionClientOptions) {
    if (!opts.apiKey) {
      throw new CompletionError('OpenAI API key is not configured. Set OPENAI_API_KEY or llm.apiKey in the config file.');
    }
    this.client = new OpenAI({
      apiKey: opts.apiKey,
      baseURL: opts.baseURL,
      maxRetries: opts.maxRetries ?? 2,
      fetch: opts.fetch,
    });
    this.model = opts.model ?? DEFAULT_MODEL;
    this.promptFormat = opts.promptFormat ?? 'chat';
    this.temperature = opts.temperature ?? 0.1;
    this.log = opts.logger ?? createLogger('llm');
  }

  async complete(request: CompletionRequest): Promise<CompletionResult> {
    const started = performance.now();
    let raw: string;
    try {
      raw =
        this.promptFormat === 'llama3'
          ? await this.callCompletions(request)
          : await this.callChat(request);
    } catch (err: unknown) {
      if (err instanceof CompletionError) throw err;
      throw new CompletionError(`Completion request failed: ${errorMessage(err)}`, { cause: err });
    }
    this.log.debug({ model: this.model, ms: Math.round(performance.now() - started), chars: raw.length }, 'Completion received');

    if (!request.shape) {
      return { kind: 'text', text: raw };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(extractJson(raw));
    } catch {
      this.log.debug('Structured completion was not JSON; returning text');
      return { kind: 'text', text: raw };
    }
    const check = checkShape(parsed, request.shape);
    if (!check.ok) {
      // JSON without the requested field carries no query; never hand it on as SQL text.
      this.log.debug({ errors: check.errors }, 'Structured completion did not match shape');
      return { kind: 'structured', fields: isRecord(parsed) ? parsed : {} };
    }
    return { kind: 'structured', fields: check.fields };
  }

  private async callChat(request: CompletionRequest): Promise<string> {
    const { system, user } = splitPrompt(request.prompt, request.question);
    const systemContent = request.shape ? `${system}\n\n${shapeInstruction(request.shape)}` : system;
    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (systemContent) {
      messages.push({ role: 'system', content: systemContent });
    }
    messages.push({ role: 'user', content: user });

    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages,
        temperature: this.temperature,
        max_tokens: request.maxTokens,
        response_format: request.shape ? { type: 'json_object' } : undefined,
      },
      { signal: request.signal },
    );

    const content = response.choices[0]?.message?.content;
    if (content == null) {
      throw new CompletionError('Completion endpoint returned no choices.');
    }
    return content;
  }

  private async callCompletions(request: CompletionRequest): Promise<string> {
    const { system, user } = splitPrompt(request.prompt, request.question);
    const systemContent = request.shape ? `${system}\n\n${shapeInstruction(request.shape)}` : system;

    const response = await this.client.completions.create(
      {
        model: this.model,
        prompt: formatLlama3Prompt(user, systemContent),
        temperature: this.temperature,
        max_tokens: request.maxTokens,
      },
      { signal: request.signal },
    );

    const text = response.choices[0]?.text;
    if (text == null) {
      throw new CompletionError('Completion endpoint returned no choices.');
    }
    return text;
  }
}
