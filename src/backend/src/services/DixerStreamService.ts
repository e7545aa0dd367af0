/**
 * DixerStreamService
 * Relays a streaming Cerebras completion to the caller as StreamEvents,
 * then parses the accumulated text into a question and an answer
 */

import { AppConfig, GenerationRequest, GenerationResult, StreamEvent } from '../models/types';
import { CerebrasClient, CerebrasError, CerebrasErrorType, ICerebrasClient, toCerebrasError } from './CerebrasClient';
import { IPromptBuilder, promptBuilder } from './PromptBuilder';
import { IResponseParser, responseParser } from './ResponseParser';
import { encodeStreamEvent } from '../utils/sse';

const TEMPERATURE = 0.7;
const MAX_TOKEN_BUDGET = 4000;

export const TOPIC_REQUIRED_MESSAGE = 'Please provide a topic or announcement.';
export const API_KEY_MISSING_MESSAGE =
  'Cerebras API key not configured. Please set CEREBRAS_API_KEY environment variable.';

/**
 * Upper bound on output tokens for a target answer length
 */
export function calculateTokenBudget(wordCount: number): number {
  return Math.min(wordCount * 2 + 500, MAX_TOKEN_BUDGET);
}

/**
 * Interface for DixerStreamService
 */
export interface IDixerStreamService {
  /**
   * Yields Chunk events as fragments arrive, then one Done or Error event.
   * Aborting the signal (or returning early) stops the upstream request.
   */
  streamGeneration(request: GenerationRequest, signal?: AbortSignal): AsyncGenerator<StreamEvent>;

  /**
   * Same sequence as streamGeneration, encoded as SSE frames
   */
  streamSSE(request: GenerationRequest, signal?: AbortSignal): AsyncGenerator<string>;

  /**
   * Runs a generation to completion and returns the parsed result
   */
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResult>;
}

/**
 * Restartable timer that fires once when no activity is seen for `ms`
 */
class IdleTimer {
  private handle: NodeJS.Timeout | null = null;

  constructor(
    private readonly ms: number,
    private readonly onIdle: () => void
  ) {}

  reset(): void {
    this.clear();
    this.handle = setTimeout(this.onIdle, this.ms);
  }

  clear(): void {
    if (this.handle) {
      clearTimeout(this.handle);
      this.handle = null;
    }
  }
}

/**
 * DixerStreamService implementation
 * Each call owns its own buffer and abort controller; no state is shared between streams
 */
export class DixerStreamService implements IDixerStreamService {
  private client: ICerebrasClient;
  private builder: IPromptBuilder;
  private parser: IResponseParser;

  constructor(
    private readonly config: AppConfig,
    clientInstance?: ICerebrasClient,
    builderInstance?: IPromptBuilder,
    parserInstance?: IResponseParser
  ) {
    this.client = clientInstance || new CerebrasClient(config.baseURL);
    this.builder = builderInstance || promptBuilder;
    this.parser = parserInstance || responseParser;
  }

  async *streamGeneration(request: GenerationRequest, signal?: AbortSignal): AsyncGenerator<StreamEvent> {
    if (!request.topic.trim()) {
      yield { type: 'error', message: TOPIC_REQUIRED_MESSAGE };
      return;
    }
    const apiKey = this.config.apiKey?.trim();
    if (!apiKey) {
      yield { type: 'error', message: API_KEY_MISSING_MESSAGE };
      return;
    }
    if (signal?.aborted) {
      return;
    }

    const prompt = this.builder.buildPrompt(request);
    const maxTokens = calculateTokenBudget(request.targetWordCount);

    const controller = new AbortController();
    const onCallerAbort = (): void => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onCallerAbort, { once: true });

    const timeoutMs = this.config.streamIdleTimeoutMs;
    const idleTimer = new IdleTimer(timeoutMs, () => {
      controller.abort(
        new CerebrasError(`Upstream stream timed out after ${timeoutMs} ms`, CerebrasErrorType.Timeout)
      );
    });

    let buffer = '';
    let chunkCount = 0;
    let terminal: StreamEvent | null = null;

    console.log(`Dixer stream started (model=${request.model}, max_tokens=${maxTokens})`);

    try {
      idleTimer.reset();
      const fragments = this.client.streamCompletion(
        {
          model: request.model,
          messages: this.builder.toMessages(prompt),
          temperature: TEMPERATURE,
          maxTokens
        },
        apiKey,
        controller.signal
      );

      for await (const fragment of fragments) {
        idleTimer.reset();
        if (!fragment) {
          continue;
        }
        buffer += fragment;
        chunkCount++;
        // The consumer's own pace does not count as upstream idle time
        idleTimer.clear();
        yield { type: 'chunk', text: fragment };
        idleTimer.reset();
      }
      idleTimer.clear();
      if (signal?.aborted) {
        return;
      }
      // An idle timeout can end the upstream iteration without an error
      if (controller.signal.aborted) {
        throw toCerebrasError(controller.signal.reason);
      }

      const parsed = this.parser.parse(buffer);
      terminal = { type: 'done', question: parsed.question, answer: parsed.answer };
      console.log(`Dixer stream completed: ${chunkCount} chunks, ${buffer.length} characters`);
    } catch (error) {
      if (signal?.aborted) {
        console.log('Dixer stream cancelled by caller');
        return;
      }
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : error;
      const upstreamError = toCerebrasError(reason);
      console.error(`Dixer stream failed (${upstreamError.errorType}): ${upstreamError.message}`);
      terminal = { type: 'error', message: upstreamError.message };
    } finally {
      idleTimer.clear();
      signal?.removeEventListener('abort', onCallerAbort);
      // Releases the upstream connection when the consumer stops early
      controller.abort();
    }

    if (terminal) {
      yield terminal;
    }
  }

  async *streamSSE(request: GenerationRequest, signal?: AbortSignal): AsyncGenerator<string> {
    for await (const event of this.streamGeneration(request, signal)) {
      yield encodeStreamEvent(event);
    }
  }

  async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResult> {
    let raw = '';
    for await (const event of this.streamGeneration(request, signal)) {
      switch (event.type) {
        case 'chunk':
          raw += event.text;
          break;
        case 'done':
          return { success: true, question: event.question, answer: event.answer, raw };
        case 'error':
          return { success: false, error: event.message };
      }
    }
    return { success: false, error: 'Generation was cancelled' };
  }
}
