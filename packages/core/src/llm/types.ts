/**
 * Completion capability contract consumed by the repair loop.
 */

/** Field types a structured completion can be asked for. */
export type ShapeFieldType = 'string' | 'number' | 'boolean';

/** Requested structured output: field name → type. */
export type OutputShape = Readonly<Record<string, ShapeFieldType>>;

export type CompletionResult =
  | { kind: 'text'; text: string }
  | { kind: 'structured'; fields: Readonly<Record<string, unknown>> };

export interface CompletionRequest {
  prompt: string;
  /** The question rendered at the end of `prompt`, so chat clients can split it off exactly */
  question?: string;
  /** When set, the client asks the model for a JSON object with these fields */
  shape?: OutputShape;
  maxTokens: number;
  signal?: AbortSignal;
}

export interface CompletionClient {
  /** Rejects with CompletionError on transport, timeout or quota failure. */
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

export type PromptFormat = 'chat' | 'llama3';
