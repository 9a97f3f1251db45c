import { createChildLogger } from '@tessera/shared/src/logger.js';
import {
  CancelledError,
  ConfigurationError,
  RateLimitError,
  TimeoutError,
  TransportError,
  toError,
} from '@tessera/shared/src/utils/errors.js';
import type { TesseraError } from '@tessera/shared/src/utils/errors.js';
import type { LlmSettings } from '@tessera/schemas/src/pipeline-config.schema.js';
import { createMockClient } from './mock-llm-client.js';

const log = createChildLogger('llm:client');

export interface LlmCallOptions {
  readonly temperature?: number;
  readonly maxTokens?: number;
  readonly timeoutMs?: number;
  readonly signal?: AbortSignal;
}

export interface LlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  /** Requests JSON output mode from providers that support it. */
  readonly jsonSchema?: object;
  readonly options?: LlmCallOptions;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface LlmClient {
  invoke(request: LlmRequest): Promise<LlmResponse>;
}

export type ChatTurn = ['system' | 'human', string];

/** The slice of a LangChain chat model the client relies on. */
export interface ChatModel {
  invoke(
    messages: ChatTurn[],
    options?: { signal?: AbortSignal },
  ): Promise<{
    content: string | readonly unknown[];
    usage_metadata?: { input_tokens: number; output_tokens: number };
  }>;
}

export interface ChatModelParams {
  readonly temperature: number;
  readonly maxTokens?: number;
  readonly jsonMode: boolean;
}

export type ChatModelFactory = (params: ChatModelParams) => Promise<ChatModel>;

function messageText(content: string | readonly unknown[]): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .map((part) =>
      typeof part === 'object' && part !== null && 'text' in part && typeof part.text === 'string'
        ? part.text
        : '',
    )
    .join('');
}

function statusCodeOf(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined) {
    return statusCode === 429 || statusCode >= 500;
  }

  const message = error.message.toLowerCase();
  const transientPatterns = [
    '429', 'rate limit', 'too many requests',
    '500', '502', '503', 'internal server error', 'bad gateway', 'service unavailable',
    'econnreset', 'etimedout', 'timeout', 'network',
    'socket hang up', 'econnrefused',
  ];

  return transientPatterns.some((pattern) => message.includes(pattern));
}

function isRateLimit(error: Error): boolean {
  if (statusCodeOf(error) === 429) {
    return true;
  }
  const message = error.message.toLowerCase();
  return message.includes('rate limit') || message.includes('too many requests');
}

interface InvocationSignals {
  readonly caller?: AbortSignal;
  readonly timeout?: AbortSignal;
  readonly timeoutMs?: number;
}

function mapInvocationError(
  label: string,
  error: unknown,
  signals: InvocationSignals,
): TesseraError {
  const cause = toError(error);

  if (signals.caller?.aborted) {
    return new CancelledError(`${label} invocation was cancelled`, cause);
  }
  if (signals.timeout?.aborted && signals.timeoutMs !== undefined) {
    return new TimeoutError(
      `${label} invocation timed out after ${String(signals.timeoutMs)}ms`,
      signals.timeoutMs,
      cause,
    );
  }
  if (isRateLimit(cause)) {
    return new RateLimitError(`${label} rate limit exceeded: ${cause.message}`, cause);
  }
  return new TransportError(
    `${label} invocation failed: ${cause.message}`,
    isTransientError(cause),
    cause,
  );
}

/**
 * Wraps a chat model factory with per-call option handling, timeouts and
 * cancellation. Retries are left to the caller, so LangChain's own retry
 * loop must be disabled by the factory.
 */
export function createChatModelClient(
  label: string,
  settings: Pick<LlmSettings, 'temperature' | 'maxTokens' | 'timeoutMs'>,
  buildModel: ChatModelFactory,
): LlmClient {
  return {
    async invoke(request: LlmRequest): Promise<LlmResponse> {
      const options = request.options ?? {};
      const caller = options.signal;
      if (caller?.aborted) {
        throw new CancelledError(`${label} invocation was cancelled`);
      }

      const timeoutMs = options.timeoutMs ?? settings.timeoutMs;
      const timeout = timeoutMs !== undefined ? AbortSignal.timeout(timeoutMs) : undefined;
      const active = [caller, timeout].filter((s): s is AbortSignal => s !== undefined);
      const signal = active.length > 0 ? AbortSignal.any(active) : undefined;

      const model = await buildModel({
        temperature: options.temperature ?? settings.temperature,
        maxTokens: options.maxTokens ?? settings.maxTokens,
        jsonMode: request.jsonSchema !== undefined,
      });

      log.debug(
        { provider: label, systemPromptLength: request.systemPrompt.length, timeoutMs },
        'LLM invocation',
      );

      try {
        const response = await model.invoke(
          [
            ['system', request.systemPrompt],
            ['human', request.userMessage],
          ],
          signal ? { signal } : undefined,
        );

        const tokenUsage = response.usage_metadata
          ? {
              input: response.usage_metadata.input_tokens,
              output: response.usage_metadata.output_tokens,
            }
          : undefined;
        if (tokenUsage) {
          log.debug({ provider: label, tokenUsage }, 'LLM token usage');
        }

        return { content: messageText(response.content), tokenUsage };
      } catch (error) {
        const mapped = mapInvocationError(label, error, { caller, timeout, timeoutMs });
        log.warn({ provider: label, code: mapped.code, error: mapped.message }, 'LLM invocation failed');
        throw mapped;
      }
    },
  };
}

function createOpenAiClient(settings: LlmSettings): LlmClient {
  const { apiKey } = settings;
  if (!apiKey) {
    throw new ConfigurationError(
      'An API key is required for the OpenAI LLM client (set llm.apiKey or OPENAI_API_KEY)',
    );
  }

  log.info({ model: settings.model }, 'Using OpenAI LLM client');

  return createChatModelClient('OpenAI', settings, async (params) => {
    const { ChatOpenAI } = await import('@langchain/openai');
    return new ChatOpenAI({
      model: settings.model,
      apiKey,
      temperature: params.temperature,
      maxTokens: params.maxTokens,
      maxRetries: 0,
      modelKwargs: params.jsonMode ? { response_format: { type: 'json_object' } } : undefined,
    });
  });
}

function createVertexClient(settings: LlmSettings): LlmClient {
  const { projectId, location } = settings;
  if (!projectId) {
    throw new ConfigurationError(
      'A GCP project id is required for the Vertex AI LLM client (set llm.projectId or GCP_PROJECT_ID)',
    );
  }

  log.info({ projectId, location, model: settings.model }, 'Using Vertex AI LLM client');

  return createChatModelClient('Vertex AI', settings, async (params) => {
    const { ChatVertexAI } = await import('@langchain/google-vertexai');
    return new ChatVertexAI({
      model: settings.model,
      location,
      temperature: params.temperature,
      maxOutputTokens: params.maxTokens,
      maxRetries: 0,
      authOptions: { projectId },
      responseMimeType: params.jsonMode ? 'application/json' : 'text/plain',
    });
  });
}

export function createLlmClient(settings: LlmSettings): LlmClient {
  switch (settings.provider) {
    case 'mock':
      return createMockClient();
    case 'openai':
      return createOpenAiClient(settings);
    case 'vertex':
      return createVertexClient(settings);
  }
}
