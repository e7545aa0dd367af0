/**
 * CerebrasClient Service
 * Streaming wrapper around the Cerebras SDK chat completions API
 *
 * Yields text fragments as they arrive and maps SDK failures to CerebrasError
 */

import Cerebras from '@cerebras/cerebras_cloud_sdk';
import { ChatMessage } from './PromptBuilder';

/**
 * Error types for upstream failure classification
 */
export enum CerebrasErrorType {
  QuotaExceeded = 'quota_exceeded',
  RateLimited = 'rate_limited',
  TokenExhausted = 'token_exhausted',
  InvalidKey = 'invalid_key',
  NetworkError = 'network_error',
  ModelUnavailable = 'model_unavailable',
  Timeout = 'timeout',
  Aborted = 'aborted',
  Unknown = 'unknown'
}

/**
 * Custom error class for Cerebras API errors
 */
export class CerebrasError extends Error {
  constructor(
    message: string,
    public readonly errorType: CerebrasErrorType,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'CerebrasError';
  }
}

/**
 * Parameters for one streaming completion
 */
export interface CompletionStreamRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
}

/**
 * Interface for CerebrasClient
 */
export interface ICerebrasClient {
  /**
   * Opens a streaming completion and yields each text fragment in arrival order.
   * Aborting the signal releases the upstream connection.
   */
  streamCompletion(
    request: CompletionStreamRequest,
    apiKey: string,
    signal: AbortSignal
  ): AsyncIterable<string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Pulls the delta text out of a streamed chunk, or '' when it has none
 */
export function extractDeltaContent(chunk: unknown): string {
  if (!isRecord(chunk) || !Array.isArray(chunk.choices)) {
    return '';
  }
  const choice: unknown = chunk.choices[0];
  if (!isRecord(choice) || !isRecord(choice.delta)) {
    return '';
  }
  const content = choice.delta.content;
  return typeof content === 'string' ? content : '';
}

/**
 * Returns the message of an error chunk, or null for regular chunks
 */
export function extractStreamError(chunk: unknown): string | null {
  if (!isRecord(chunk) || !('error' in chunk) || chunk.error == null) {
    return null;
  }
  const error = chunk.error;
  if (isRecord(error) && typeof error.message === 'string') {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Upstream stream reported an error';
}

/**
 * Categorizes SDK and transport errors
 */
export function toCerebrasError(error: unknown): CerebrasError {
  if (error instanceof CerebrasError) {
    return error;
  }

  const fields: Record<string, unknown> = isRecord(error) ? error : {};
  const statusCode = typeof fields.status === 'number' ? fields.status : undefined;
  const message = typeof fields.message === 'string' && fields.message ? fields.message : 'Unknown error';
  const errorName = typeof fields.name === 'string' ? fields.name : '';
  const lowerMessage = message.toLowerCase();

  // Authentication errors (401, 403)
  if (errorName.includes('Authentication') || statusCode === 401 || statusCode === 403) {
    return new CerebrasError('Invalid or unauthorized API key', CerebrasErrorType.InvalidKey, statusCode);
  }

  // Rate limit errors (429)
  if (errorName.includes('RateLimit') || statusCode === 429) {
    if (lowerMessage.includes('quota')) {
      return new CerebrasError('API quota exceeded', CerebrasErrorType.QuotaExceeded, statusCode);
    }
    return new CerebrasError('Rate limit exceeded', CerebrasErrorType.RateLimited, statusCode);
  }

  // Model unavailable (503, or 404 for the model)
  if (
    statusCode === 503 ||
    (statusCode === 404 && lowerMessage.includes('model')) ||
    (lowerMessage.includes('model') && lowerMessage.includes('unavailable'))
  ) {
    return new CerebrasError('Model temporarily unavailable', CerebrasErrorType.ModelUnavailable, statusCode);
  }

  // Token exhaustion (402)
  if (statusCode === 402) {
    return new CerebrasError('Token quota exhausted', CerebrasErrorType.TokenExhausted, statusCode);
  }

  if (errorName.includes('Timeout')) {
    return new CerebrasError('Request to Cerebras API timed out', CerebrasErrorType.Timeout);
  }

  // Network/connection errors
  if (
    errorName.includes('Connection') ||
    errorName.includes('Network') ||
    (error instanceof TypeError && message.includes('fetch'))
  ) {
    return new CerebrasError('Network error connecting to Cerebras API', CerebrasErrorType.NetworkError);
  }

  return new CerebrasError(message, CerebrasErrorType.Unknown, statusCode);
}

/**
 * CerebrasClient implementation
 * Uses the official Cerebras SDK in streaming mode
 */
export class CerebrasClient implements ICerebrasClient {
  constructor(private readonly baseURL: string | null = null) {}

  async *streamCompletion(
    request: CompletionStreamRequest,
    apiKey: string,
    signal: AbortSignal
  ): AsyncGenerator<string> {
    // No automatic retries
    const client = new Cerebras({ apiKey, baseURL: this.baseURL ?? undefined, maxRetries: 0 });

    try {
      const stream = await client.chat.completions.create(
        {
          model: request.model,
          messages: request.messages.map(msg => ({
            role: msg.role,
            content: msg.content
          })),
          temperature: request.temperature,
          max_completion_tokens: request.maxTokens,
          stream: true
        },
        { signal }
      );

      for await (const chunk of stream) {
        const streamError = extractStreamError(chunk);
        if (streamError !== null) {
          throw new CerebrasError(streamError, CerebrasErrorType.Unknown);
        }
        const content = extractDeltaContent(chunk);
        if (content) {
          yield content;
        }
      }
    } catch (error) {
      if (signal.aborted) {
        throw abortError(signal);
      }
      throw toCerebrasError(error);
    }

    // The SDK ends the iteration quietly when the request is aborted
    if (signal.aborted) {
      throw abortError(signal);
    }
  }
}

function abortError(signal: AbortSignal): CerebrasError {
  return signal.reason instanceof CerebrasError
    ? signal.reason
    : new CerebrasError('Request was cancelled', CerebrasErrorType.Aborted);
}
