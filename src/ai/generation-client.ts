/**
 * Generation Client
 *
 * The single text-generation boundary of the pipeline: system + user prompt in,
 * text out. Failures are normalised to three PipelineError codes so the stage
 * retry policy can treat them uniformly:
 * - GENERATION_RATE_LIMITED (429)
 * - GENERATION_TIMEOUT (our deadline or a 408/504)
 * - GENERATION_INVALID_RESPONSE (empty text, other API errors)
 */

import { createOpenRouter } from '@openrouter/ai-sdk-provider';
import { APICallError, generateText, type LanguageModel } from 'ai';

import { GENERATION_CONFIG } from '../pipeline/config';
import { createSemaphore } from '../pipeline/concurrency';
import { errorMessage, isPipelineError, PipelineError } from '../pipeline/types';

// ============================================================================
// Types
// ============================================================================

export interface CompletionRequest {
  readonly systemPrompt: string;
  readonly userPrompt: string;
  readonly maxTokens: number;
  readonly temperature: number;
  /** Overrides the client's default model id */
  readonly model?: string;
  readonly signal?: AbortSignal;
}

export interface GenerationClient {
  /**
   * @throws PipelineError GENERATION_RATE_LIMITED | GENERATION_TIMEOUT | GENERATION_INVALID_RESPONSE
   */
  complete(request: CompletionRequest): Promise<string>;
}

/**
 * The slice of the AI SDK's generateText this client uses.
 * Injected in tests; defaults to the real call.
 */
export type GenerateTextFn = (options: {
  readonly model: LanguageModel;
  readonly system: string;
  readonly prompt: string;
  readonly maxOutputTokens: number;
  readonly temperature: number;
  readonly maxRetries: number;
  readonly abortSignal: AbortSignal;
}) => Promise<{ readonly text: string }>;

export interface OpenRouterGenerationClientOptions {
  /** Defaults to OPENROUTER_API_KEY */
  readonly apiKey?: string;
  readonly defaultModel?: string;
  readonly timeoutMs?: number;
  readonly generateText?: GenerateTextFn;
  /** Resolves a model id; defaults to the OpenRouter provider */
  readonly createModel?: (modelId: string) => LanguageModel;
}

// ============================================================================
// Error Mapping
// ============================================================================

/**
 * Maps anything thrown by the AI SDK to a generation PipelineError.
 */
export function toGenerationError(error: unknown, timedOut: boolean): PipelineError {
  if (isPipelineError(error)) return error;

  if (timedOut || (error instanceof Error && error.name === 'TimeoutError')) {
    return new PipelineError('GENERATION_TIMEOUT', 'generation call timed out', { cause: error });
  }

  if (APICallError.isInstance(error)) {
    const status = error.statusCode;
    if (status === 429) {
      return new PipelineError('GENERATION_RATE_LIMITED', error.message, { cause: error, status });
    }
    if (status === 408 || status === 504) {
      return new PipelineError('GENERATION_TIMEOUT', error.message, { cause: error, status });
    }
    // Bad credentials will not fix themselves between attempts
    const retryable = status !== 401 && status !== 403;
    return new PipelineError('GENERATION_INVALID_RESPONSE', error.message, {
      cause: error,
      retryable,
      ...(status !== undefined ? { status } : {}),
    });
  }

  const message = errorMessage(error);
  if (/rate.?limit|too.?many.?requests/i.test(message)) {
    return new PipelineError('GENERATION_RATE_LIMITED', message, { cause: error });
  }
  return new PipelineError('GENERATION_INVALID_RESPONSE', message, { cause: error });
}

// ============================================================================
// OpenRouter Client
// ============================================================================

const defaultGenerateText: GenerateTextFn = async (options) => {
  const result = await generateText(options);
  return { text: result.text };
};

/**
 * GenerationClient backed by OpenRouter through the AI SDK.
 * The SDK's own retries are disabled; retry belongs to the stage policy.
 */
export function createOpenRouterGenerationClient(
  options: OpenRouterGenerationClientOptions = {}
): GenerationClient {
  const createModel =
    options.createModel ??
    ((modelId: string): LanguageModel => {
      const apiKey = options.apiKey ?? process.env.OPENROUTER_API_KEY;
      if (!apiKey) {
        throw new PipelineError('CONFIG_ERROR', 'OPENROUTER_API_KEY environment variable is required');
      }
      return createOpenRouter({ apiKey })(modelId);
    });
  const run = options.generateText ?? defaultGenerateText;
  const timeoutMs = options.timeoutMs ?? GENERATION_CONFIG.TIMEOUT_MS;

  return {
    async complete(request) {
      const modelId = request.model ?? options.defaultModel ?? GENERATION_CONFIG.DRAFT_MODEL;
      const model = createModel(modelId);

      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeoutMs);
      const onAbort = (): void => controller.abort();
      request.signal?.addEventListener('abort', onAbort, { once: true });

      let text: string;
      try {
        ({ text } = await run({
          model,
          system: request.systemPrompt,
          prompt: request.userPrompt,
          maxOutputTokens: request.maxTokens,
          temperature: request.temperature,
          maxRetries: 0,
          abortSignal: controller.signal,
        }));
      } catch (error) {
        throw toGenerationError(error, timedOut);
      } finally {
        clearTimeout(timer);
        request.signal?.removeEventListener('abort', onAbort);
      }

      const trimmed = text.trim();
      if (trimmed.length === 0) {
        throw new PipelineError('GENERATION_INVALID_RESPONSE', `model ${modelId} returned empty text`);
      }
      return trimmed;
    },
  };
}

/**
 * Wraps a client in a counting semaphore so at most `concurrency` calls are
 * in flight across every work item sharing the wrapper.
 */
export function withConcurrencyLimit(client: GenerationClient, concurrency: number): GenerationClient {
  const limit = createSemaphore(concurrency);
  return {
    complete: (request) => limit(() => client.complete(request)),
  };
}
