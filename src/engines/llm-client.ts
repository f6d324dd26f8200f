/**
 * LLM transport for the planner.
 *
 * Generators depend on the `LlmService` interface, never on the SDK, so tests
 * substitute deterministic stubs. `LLMClient` is the Anthropic-backed
 * implementation.
 *
 * API key resolution order:
 * 1. `anthropicApiKey` passed in config
 * 2. Environment variable: ANTHROPIC_API_KEY
 * 3. Config file: planner.config.json → anthropicApiKey
 * 4. None: `isAvailable()` is false and LLM-backed stages are skipped
 */

import Anthropic from '@anthropic-ai/sdk';
import { ErrorCode, PlannerError } from '../utils/errors.js';
import { readConfigFile } from '../utils/config.js';
import { parseJsonResponse } from '../utils/json.js';
import { logger } from '../utils/logger.js';

/**
 * Model selection for different tasks
 */
export type LLMModel = 'haiku' | 'sonnet';

export interface LLMUsage {
  inputTokens: number;
  outputTokens: number;
}

/**
 * One prompt/response exchange
 */
export interface LlmRequest {
  system: string;
  user: string;
  /** `json` asks the model for a bare JSON document */
  format?: 'text' | 'json';
  model?: LLMModel;
  maxTokens?: number;
  temperature?: number;
  /** Label recorded in the cost ledger */
  operation?: string;
}

export interface LlmCompletion {
  text: string;
  model: string;
  usage?: LLMUsage;
}

/**
 * What the pipeline needs from a language model.
 */
export interface LlmService {
  isAvailable(): boolean;
  complete(request: LlmRequest): Promise<LlmCompletion>;
}

/**
 * Error codes for LLM client operations
 */
export enum LLMErrorCode {
  NO_API_KEY = 'NO_API_KEY',
  API_ERROR = 'API_ERROR',
  RATE_LIMIT = 'RATE_LIMIT',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
}

/**
 * Error raised by the LLM transport or by response parsing
 */
export class LLMError extends PlannerError {
  public readonly reason: LLMErrorCode;

  constructor(message: string, reason: LLMErrorCode, cause?: unknown) {
    const unavailable = reason === LLMErrorCode.NO_API_KEY || reason === LLMErrorCode.CONFIGURATION_ERROR;
    super(message, unavailable ? ErrorCode.SERVICE_UNAVAILABLE : ErrorCode.EXTERNAL_SERVICE_ERROR, {
      cause,
      details: { reason },
      isRetryable: reason === LLMErrorCode.RATE_LIMIT || reason === LLMErrorCode.API_ERROR,
    });
    this.name = 'LLMError';
    this.reason = reason;
  }
}

/**
 * Model name mapping for Anthropic API
 */
const MODEL_NAMES: Record<LLMModel, string> = {
  haiku: 'claude-3-5-haiku-20241022',
  sonnet: 'claude-3-5-sonnet-20241022',
};

/**
 * Default token limits for each model
 */
const DEFAULT_MAX_TOKENS: Record<LLMModel, number> = {
  haiku: 4096,
  sonnet: 8192,
};

/**
 * Dollars per million tokens
 */
export const MODEL_PRICING: Record<LLMModel, { input: number; output: number }> = {
  haiku: { input: 0.8, output: 4 },
  sonnet: { input: 3, output: 15 },
};

export interface RetryConfig {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Base delay in milliseconds for exponential backoff */
  baseDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Jitter factor (0-1) to add randomness to delays */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.3,
};

/**
 * Exponential backoff (`base * 2^attempt`, capped) with symmetric jitter.
 *
 * @param attempt - Current attempt number (0-indexed)
 */
export function calculateBackoffDelay(attempt: number, config: RetryConfig = DEFAULT_RETRY_CONFIG): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);
  const jitter = cappedDelay * config.jitterFactor * (Math.random() - 0.5);
  return Math.max(0, Math.round(cappedDelay + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Dollar cost of one call, rounded to 4 decimals.
 */
export function calculateCostUsd(usage: LLMUsage | undefined, model: LLMModel = 'sonnet'): number {
  if (!usage) return 0;
  const pricing = MODEL_PRICING[model];
  const cost = (usage.inputTokens * pricing.input + usage.outputTokens * pricing.output) / 1_000_000;
  return Math.round(cost * 10_000) / 10_000;
}

/**
 * Model key for a resolved model name, defaulting to sonnet pricing.
 */
export function modelKeyFor(modelName: string): LLMModel {
  return modelName.includes('haiku') ? 'haiku' : 'sonnet';
}

/**
 * The slice of the Anthropic SDK this client uses
 */
export interface MessagesApi {
  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<Anthropic.Message>;
}

/**
 * Configuration for the LLM client
 */
export interface LLMClientConfig {
  /** Anthropic API key (optional - will try environment/config if not provided) */
  anthropicApiKey?: string;
  /** Pre-built messages API, mainly for tests */
  messages?: MessagesApi;
  retry?: Partial<RetryConfig>;
}

const JSON_INSTRUCTION = 'Respond with a single valid JSON document and nothing else.';

/**
 * Anthropic-backed LlmService with retry on transient errors
 */
export class LLMClient implements LlmService {
  private readonly apiKey: string | null;
  private readonly retry: RetryConfig;
  private messages: MessagesApi | null;

  constructor(config?: LLMClientConfig) {
    this.retry = { ...DEFAULT_RETRY_CONFIG, ...config?.retry };
    this.messages = config?.messages ?? null;
    this.apiKey = config?.messages ? 'injected' : this.resolveApiKey(config?.anthropicApiKey);

    if (this.apiKey) {
      logger.debug('LLM client initialized', undefined, {
        source: config?.anthropicApiKey ? 'provided' : 'environment/config',
      });
    } else {
      logger.warn('LLM client initialized without API key; LLM stages will be skipped');
    }
  }

  private resolveApiKey(providedKey?: string): string | null {
    if (providedKey) {
      return providedKey;
    }

    const envKey = process.env.ANTHROPIC_API_KEY;
    if (envKey) {
      logger.debug('Using API key from ANTHROPIC_API_KEY environment variable');
      return envKey;
    }

    return readConfigFile().anthropicApiKey ?? null;
  }

  private getMessages(): MessagesApi {
    if (this.messages) {
      return this.messages;
    }
    if (!this.apiKey) {
      throw new LLMError(
        'No API key available. Set ANTHROPIC_API_KEY or provide in config.',
        LLMErrorCode.NO_API_KEY
      );
    }
    const client = new Anthropic({ apiKey: this.apiKey, maxRetries: 0 });
    this.messages = client.messages;
    return this.messages;
  }

  public isAvailable(): boolean {
    return this.apiKey !== null;
  }

  /**
   * Run one completion, retrying 408, 429 and 5xx responses with backoff.
   *
   * @throws {LLMError} If generation fails after all retries
   */
  public async complete(request: LlmRequest): Promise<LlmCompletion> {
    this.validatePrompt(request.user);

    const model = request.model ?? 'sonnet';
    const modelName = MODEL_NAMES[model];
    const maxTokens = request.maxTokens ?? DEFAULT_MAX_TOKENS[model];
    const system = request.format === 'json' ? `${request.system}\n\n${JSON_INSTRUCTION}` : request.system;
    const startTime = Date.now();

    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.getMessages().create({
          model: modelName,
          max_tokens: maxTokens,
          temperature: request.temperature ?? 0.7,
          system,
          messages: [{ role: 'user', content: request.user }],
        });

        const text = this.extractContent(response);
        const usage: LLMUsage = {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        };

        logger.debug('LLM generation completed', undefined, {
          model,
          elapsedMs: Date.now() - startTime,
          inputTokens: usage.inputTokens,
          outputTokens: usage.outputTokens,
          contentLength: text.length,
        });

        return { text, model: modelName, usage };
      } catch (error: unknown) {
        if (error instanceof LLMError) {
          throw error;
        }
        const status = statusOf(error);
        if (!isRetryableStatus(status) || attempt >= this.retry.maxRetries) {
          throw this.wrapError(error, Date.now() - startTime);
        }

        const delayMs = calculateBackoffDelay(attempt, this.retry);
        logger.warn('LLM generation failed, retrying', error, {
          attempt: attempt + 1,
          maxRetries: this.retry.maxRetries,
          delayMs,
          status,
        });
        await sleep(delayMs);
      }
    }
  }

  private wrapError(error: unknown, elapsedMs: number): LLMError {
    const status = statusOf(error);

    if (status === 429) {
      logger.warn('Rate limit exceeded', error, { elapsedMs });
      return new LLMError('Rate limit exceeded. Please try again later.', LLMErrorCode.RATE_LIMIT, error);
    }

    if (status !== undefined) {
      logger.error('API error during generation', error, { status, elapsedMs });
      const message = error instanceof Error ? error.message : 'Unknown error';
      return new LLMError(`API error: ${message}`, LLMErrorCode.API_ERROR, error);
    }

    logger.error('Unknown error during generation', error, { elapsedMs });
    return new LLMError('Failed to generate response', LLMErrorCode.API_ERROR, error);
  }

  private extractContent(response: Anthropic.Message): string {
    for (const block of response.content) {
      if (block.type === 'text' && block.text) {
        return block.text;
      }
    }
    throw new LLMError('Invalid API response: no text content found', LLMErrorCode.INVALID_RESPONSE);
  }

  public validatePrompt(prompt: string): void {
    if (!prompt || prompt.trim().length === 0) {
      throw new LLMError('Prompt cannot be empty', LLMErrorCode.CONFIGURATION_ERROR);
    }
    if (prompt.length > 100000) {
      logger.warn('Very long prompt detected', undefined, { length: prompt.length });
    }
  }

  /**
   * Get recommended model for a specific task type
   */
  public static getRecommendedModel(taskType: 'validation' | 'generation'): LLMModel {
    return taskType === 'validation' ? 'haiku' : 'sonnet';
  }
}

function statusOf(error: unknown): number | undefined {
  return error instanceof Anthropic.APIError ? error.status : undefined;
}

function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return false;
  return status === 429 || status === 408 || (status >= 500 && status < 600);
}

/**
 * Create a new LLM client instance
 */
export function createClient(config?: LLMClientConfig): LLMClient {
  return new LLMClient(config);
}

export interface JsonCompletion {
  data: unknown;
  completion: LlmCompletion;
}

/**
 * Ask for JSON and parse it.
 *
 * @throws {LLMError} NO_API_KEY when the service is unavailable, INVALID_RESPONSE
 * when the output is not JSON, or whatever the transport raised.
 */
export async function requestJson(llm: LlmService, request: Omit<LlmRequest, 'format'>): Promise<JsonCompletion> {
  if (!llm.isAvailable()) {
    throw new LLMError('LLM service is not available', LLMErrorCode.NO_API_KEY);
  }
  const completion = await llm.complete({ ...request, format: 'json' });
  const data = parseJsonResponse(completion.text);
  if (data === null) {
    throw new LLMError('Model output was not valid JSON', LLMErrorCode.INVALID_RESPONSE);
  }
  return { data, completion };
}
