/**
 * Generate → validate → repair → fallback.
 *
 * The loop owns the attempt counter and the candidate history for one
 * request. Completion failures (including timeouts) never escape it: they
 * become an empty candidate that fails validation, and once the attempt
 * budget is spent the deterministic fallback query is returned.
 */

import { CompletionError, SchemaUnavailableError, errorMessage } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { buildPrompt, type PromptMode } from '../llm/prompt.js';
import { isRecord } from '../llm/shape.js';
import type { CompletionClient, CompletionResult, OutputShape } from '../llm/types.js';
import { assertTableName, type SchemaDescriptor } from '../schema/types.js';
import { stripCodeFences } from '../sql/fences.js';
import { synthesizeFallback } from '../sql/fallback.js';
import { validateQuery, type ValidationVerdict } from '../sql/validator.js';

export type LoopState = 'GENERATING' | 'VALIDATING' | 'REPAIRING' | 'SUCCEEDED' | 'EXHAUSTED';

export interface GenerationContext {
  readonly question: string;
  readonly schema: SchemaDescriptor;
  readonly table: string;
}

export interface Candidate {
  readonly sql: string;
  /** 1-based completion call number */
  readonly attempt: number;
  readonly mode: PromptMode;
  readonly verdict: ValidationVerdict;
  /** Set when the completion call itself failed */
  readonly completionError?: string;
}

export interface GenerationOutcome {
  query: string;
  /** Completion calls made */
  attempts: number;
  usedFallback: boolean;
  state: 'SUCCEEDED' | 'EXHAUSTED';
  candidates: readonly Candidate[];
}

export interface QueryGeneratorOptions {
  client: CompletionClient;
  logger?: Logger;
  /** Token budget per completion call */
  maxTokens?: number;
  /** Per-call timeout; 0 disables it */
  timeoutMs?: number;
  /** Structured field carrying the query; null requests plain text */
  queryField?: string | null;
}

export const DEFAULT_MAX_REPAIR_ATTEMPTS = 1;
export const DEFAULT_QUERY_FIELD = 'clickhouse_query';

/**
 * Pull the query text out of a completion. Anything unusable (missing key,
 * non-string value, a reply outside the CompletionResult union) becomes the
 * empty string. A bare string is taken as plain text.
 */
export function extractQueryText(result: unknown, field: string | null): string {
  if (typeof result === 'string') return result;
  if (!isRecord(result)) return '';
  switch (result.kind) {
    case 'text':
      return typeof result.text === 'string' ? result.text : '';
    case 'structured': {
      if (field === null || !isRecord(result.fields)) return '';
      const value = result.fields[field];
      return typeof value === 'string' ? value : '';
    }
    default:
      return '';
  }
}

export class QueryGenerator {
  private readonly client: CompletionClient;
  private readonly log: Logger;
  private readonly maxTokens: number;
  private readonly timeoutMs: number;
  private readonly queryField: string | null;
  private readonly shape: OutputShape | undefined;

  constructor(opts: QueryGeneratorOptions) {
    this.client = opts.client;
    this.log = opts.logger ?? createLogger('repair-loop');
    this.maxTokens = opts.maxTokens ?? 600;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.queryField = opts.queryField === undefined ? DEFAULT_QUERY_FIELD : opts.queryField;
    this.shape = this.queryField === null ? undefined : Object.freeze({ [this.queryField]: 'string' as const });
  }

  async generateQuery(
    question: string,
    schema: SchemaDescriptor,
    table: string,
    maxRepairAttempts: number = DEFAULT_MAX_REPAIR_ATTEMPTS,
  ): Promise<GenerationOutcome> {
    if (!Number.isInteger(maxRepairAttempts) || maxRepairAttempts < 0) {
      throw new RangeError(`maxRepairAttempts must be a non-negative integer, got ${maxRepairAttempts}`);
    }
    assertTableName(table);
    if (schema.size === 0) {
      throw new SchemaUnavailableError(table, `Schema for "${table}" has no columns.`);
    }

    const context: GenerationContext = Object.freeze({ question, schema, table });
    const maxAttempts = 1 + maxRepairAttempts;
    const candidates: Candidate[] = [];
    let state: LoopState = 'GENERATING';

    while (candidates.length < maxAttempts) {
      const attempt = candidates.length + 1;
      const mode: PromptMode = state === 'REPAIRING' ? 'repair' : 'generate';
      const previous = candidates.at(-1);

      const prompt = buildPrompt({
        ...context,
        mode,
        priorCandidate: previous?.sql,
        priorReasons: previous?.verdict.reasons,
      });
      this.log.debug({ state, attempt, table }, 'Requesting completion');

      const { sql, completionError } = await this.requestCandidate(prompt, question, attempt);

      state = 'VALIDATING';
      const verdict = validateQuery(sql, schema);
      candidates.push({ sql, attempt, mode, verdict, completionError });

      if (verdict.valid) {
        state = 'SUCCEEDED';
        this.log.debug({ state, attempt }, 'Candidate accepted');
        return { query: sql, attempts: attempt, usedFallback: false, state, candidates };
      }

      this.log.info(
        { attempt, reasons: verdict.reasons.map((r) => r.message) },
        'Candidate rejected by validator',
      );
      state = 'REPAIRING';
    }

    state = 'EXHAUSTED';
    const query = synthesizeFallback(schema, table);
    this.log.warn({ state, attempts: candidates.length, table }, 'Repair attempts exhausted; using fallback query');
    return { query, attempts: candidates.length, usedFallback: true, state, candidates };
  }

  private async requestCandidate(
    prompt: string,
    question: string,
    attempt: number,
  ): Promise<{ sql: string; completionError?: string }> {
    try {
      const result: unknown = await this.completeWithTimeout(prompt, question);
      return { sql: stripCodeFences(extractQueryText(result, this.queryField)) };
    } catch (err: unknown) {
      if (!(err instanceof CompletionError)) {
        throw err;
      }
      this.log.warn({ attempt, err: err.message }, 'Completion failed; treating attempt as empty candidate');
      return { sql: '', completionError: err.message };
    }
  }

  private async completeWithTimeout(prompt: string, question: string): Promise<CompletionResult> {
    const request = { prompt, question, shape: this.shape, maxTokens: this.maxTokens };
    if (this.timeoutMs <= 0) {
      try {
        return await this.client.complete(request);
      } catch (err: unknown) {
        throw asCompletionError(err);
      }
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new CompletionError(`Completion timed out after ${this.timeoutMs}ms`));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([this.client.complete({ ...request, signal: controller.signal }), timeout]);
    } catch (err: unknown) {
      throw asCompletionError(err);
    } finally {
      clearTimeout(timer);
    }
  }
}

function asCompletionError(err: unknown): CompletionError {
  if (err instanceof CompletionError) return err;
  return new CompletionError(`Completion failed: ${errorMessage(err)}`, { cause: err });
}

/**
 * One-shot form of QueryGenerator.generateQuery.
 */
export function generateQuery(
  client: CompletionClient,
  question: string,
  schema: SchemaDescriptor,
  table: string,
  maxRepairAttempts: number = DEFAULT_MAX_REPAIR_ATTEMPTS,
): Promise<GenerationOutcome> {
  return new QueryGenerator({ client }).generateQuery(question, schema, table, maxRepairAttempts);
}
