export type GenerationPurpose =
  | 'analysis'
  | 'questions'
  | 'outline'
  | 'chapter'
  | 'critique'
  | 'extraction'
  | 'digest'
  | 'continuity';

export interface GenerationRequest {
  purpose: GenerationPurpose;
  prompt: string;
  system?: string;
  temperature?: number;
  maxTokens?: number;
  model?: string;
  json?: boolean;
  signal?: AbortSignal;
}

/**
 * Prompt in, text out. Implementations raise `TransportError` for retryable failures and
 * `GenerationCancelledError` when the signal aborts the call.
 */
export interface ModelTransport {
  generate(request: GenerationRequest): Promise<string>;
}
