import { OpenAI } from 'openai';
import ApiError from '../../utils/ApiError';
import { GenerationCancelledError, TransportError } from '../../utils/errors';
import { getLogger } from '../../utils/logger';
import { appConfig } from '../../config/appConfig';
import { recordModelCall } from '../../utils/metrics';
import type { GenerationRequest, ModelTransport } from '../modelTransport';

export interface UsageRecord {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ChatCompletionParams {
  model: string;
  system?: string;
  prompt: string;
  temperature: number;
  maxTokens?: number;
  json: boolean;
}

export interface ChatCompletionResult {
  id?: string;
  content: string | null;
  finishReason: string | null;
  usage?: UsageRecord;
}

export interface OpenAIClient {
  complete(params: ChatCompletionParams, options: { signal?: AbortSignal; timeout: number }): Promise<ChatCompletionResult>;
}

export type ClientFactory = (config: { apiKey: string; baseUrl: string }) => OpenAIClient;

export interface OpenAITransportOptions {
  clientFactory?: ClientFactory;
  baseUrl?: string;
  apiKey?: string;
  defaultModel?: string;
  timeoutMs?: number;
}

const DEFAULT_TEMPERATURE = 0.7;

const RETRYABLE_STATUS = new Set([408, 409, 425, 429, 500, 502, 503, 504]);

export const createOpenAIClient: ClientFactory = ({ apiKey, baseUrl }) => {
  const client = new OpenAI({ apiKey, baseURL: baseUrl, maxRetries: 0 });
  return {
    async complete(params, { signal, timeout }) {
      const response = await client.chat.completions.create(
        {
          model: params.model,
          messages: params.system
            ? [
                { role: 'system', content: params.system },
                { role: 'user', content: params.prompt },
              ]
            : [{ role: 'user', content: params.prompt }],
          temperature: params.temperature,
          max_tokens: params.maxTokens,
          response_format: params.json ? { type: 'json_object' } : undefined,
          stream: false,
        },
        { signal, timeout }
      );
      const [choice] = response.choices;
      return {
        id: response.id,
        content: choice?.message?.content ?? null,
        finishReason: choice?.finish_reason ?? null,
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens,
            }
          : undefined,
      };
    },
  };
};

/**
 * Model transport over the OpenAI-compatible chat completions protocol. Local runtimes such as
 * Ollama serve it under `/v1`, so the base URL is all that changes between backends.
 */
class OpenAITransport implements ModelTransport {
  private client: OpenAIClient;

  private defaultModel: string;

  private timeoutMs: number;

  private logger = getLogger({ module: 'model-transport' });

  constructor({
    clientFactory = createOpenAIClient,
    baseUrl = appConfig.model.baseUrl,
    apiKey = appConfig.model.apiKey,
    defaultModel = appConfig.model.name,
    timeoutMs = appConfig.model.timeoutMs,
  }: OpenAITransportOptions = {}) {
    this.client = clientFactory({ apiKey, baseUrl });
    this.defaultModel = defaultModel;
    this.timeoutMs = timeoutMs;
  }

  async generate(request: GenerationRequest): Promise<string> {
    const model = request.model?.trim() || this.defaultModel;
    const startedAt = Date.now();

    let result: ChatCompletionResult;
    try {
      result = await this.client.complete(
        {
          model,
          system: request.system,
          prompt: request.prompt,
          temperature: request.temperature ?? DEFAULT_TEMPERATURE,
          maxTokens: request.maxTokens,
          json: request.json ?? false,
        },
        { signal: request.signal, timeout: this.timeoutMs }
      );
    } catch (error) {
      const failure = this.mapClientError(error, request.signal);
      recordModelCall(request.purpose, Date.now() - startedAt, failure instanceof ApiError ? failure.code ?? 'error' : 'error');
      throw failure;
    }

    const content = result.content?.trim() ?? '';
    this.logger.debug(
      {
        purpose: request.purpose,
        model,
        requestId: result.id,
        finishReason: result.finishReason,
        durationMs: Date.now() - startedAt,
        usage: result.usage,
      },
      'Model call completed'
    );

    recordModelCall(request.purpose, Date.now() - startedAt, content ? 'ok' : 'MODEL_BAD_RESPONSE');
    if (!content) {
      throw new TransportError('empty', `Model returned an empty ${request.purpose} response`);
    }
    return content;
  }

  private mapClientError(error: unknown, signal?: AbortSignal): Error {
    if (error instanceof ApiError) {
      return error;
    }
    if (error instanceof OpenAI.APIUserAbortError || signal?.aborted) {
      return new GenerationCancelledError();
    }
    // Timeout subclasses the connection error, so it is checked first.
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new TransportError('timeout', `Model request timed out after ${this.timeoutMs}ms`);
    }
    if (error instanceof OpenAI.APIConnectionError) {
      return new TransportError('unavailable', `Model endpoint unreachable: ${error.message}`);
    }
    if (error instanceof OpenAI.APIError) {
      const status = error.status ?? 500;
      if (status === 408 || status === 504) {
        return new TransportError('timeout', `Model endpoint timed out (${status})`);
      }
      if (RETRYABLE_STATUS.has(status)) {
        return new TransportError('unavailable', `Model endpoint responded ${status}: ${error.message}`);
      }
      return new ApiError(502, `Model endpoint rejected the request (${status}): ${error.message}`, { status }, 'MODEL_REQUEST_REJECTED');
    }
    if (error instanceof Error) {
      return new TransportError('unavailable', `Model request failed: ${error.message}`);
    }
    return new TransportError('unavailable', 'Unknown error during model request');
  }
}

export default OpenAITransport;
